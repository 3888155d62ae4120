import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RelayCycleError } from '../utils/errorCodes';
import { FileLogger, createLogger, nullLogger } from '../utils/logger/logger';

describe('FileLogger', () => {
    let dir = '';

    before(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relaycycle-logs-'));
    });

    after(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('appends a captured exception with tags and breadcrumbs as one JSON line', async () => {
        const logsDir = path.join(dir, 'nested');
        const fileLogger = new FileLogger(logsDir);

        fileLogger.setTag('direction', 'next');
        fileLogger.addBreadcrumb({ category: 'mullvad', message: 'mullvad status', level: 'info' });
        await fileLogger.captureException(new RelayCycleError('CONNECTION_TIMEOUT', 'Connection timed out after 15s'));

        const lines = fs.readFileSync(path.join(logsDir, 'relaycycle.log'), 'utf8').trim().split('\n');
        assert.equal(lines.length, 1);

        const entry = JSON.parse(lines[0] ?? '{}');
        assert.equal(entry.level, 'error');
        assert.equal(entry.message, 'Exception: Connection timed out after 15s');
        assert.deepEqual(entry.tags, { direction: 'next' });
        assert.equal(entry.data.code, 'CONNECTION_TIMEOUT');
        assert.equal(entry.data.name, 'RelayCycleError');
        assert.deepEqual(entry.breadcrumbs.map((b: { message: string }) => b.message), ['mullvad status']);
    });

    it('writes messages at the requested level', async () => {
        const fileLogger = new FileLogger(dir);

        await fileLogger.captureMessage('home location missing', 'warning');

        const entry = JSON.parse(fs.readFileSync(fileLogger.path, 'utf8').trim());
        assert.equal(entry.level, 'warning');
        assert.equal(entry.message, 'home location missing');
    });

    it('rotates the log once it grows past 1 MB', async () => {
        const logsDir = path.join(dir, 'rotating');
        const fileLogger = new FileLogger(logsDir);
        fs.writeFileSync(fileLogger.path, 'x'.repeat(1024 * 1024 + 1));

        await fileLogger.captureException(new RelayCycleError('NO_CONNECTIVITY'));

        assert.equal(fs.statSync(`${fileLogger.path}.1`).size, 1024 * 1024 + 1);
        const lines = fs.readFileSync(fileLogger.path, 'utf8').trim().split('\n');
        assert.equal(lines.length, 1);
        assert.equal(JSON.parse(lines[0] ?? '{}').message, 'Exception: No internet connection');
    });
});

describe('createLogger', () => {
    it('returns the null logger when disabled', () => {
        assert.equal(createLogger({ logsDir: '/nonexistent', enabled: false }), nullLogger);
    });
});
