import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { Breadcrumb } from '@sentry/core';
import { MullvadClient, shellQuote } from '../mullvadClient';
import { ISentryLogger, nullLogger } from '../utils/logger/logger';
import { MockCommandExecutor, fail, ok } from './mocks';

const recordingReporter = (): ISentryLogger & { breadcrumbs: Breadcrumb[] } => {
    const breadcrumbs: Breadcrumb[] = [];
    return {
        ...nullLogger,
        breadcrumbs,
        addBreadcrumb: (breadcrumb: Breadcrumb) => {
            breadcrumbs.push(breadcrumb);
        }
    };
};

describe('MullvadClient', () => {
    it('issues set location with the country and city codes', async () => {
        const executor = new MockCommandExecutor().setCommandResult('mullvad relay set location de ber', ok());
        const client = new MullvadClient({ bin: 'mullvad', commandTimeout: 1000, executor });

        await client.setRelayLocation({ countryCode: 'de', cityCode: 'ber' });

        assert.deepEqual(executor.getExecutedCommands(), ['mullvad relay set location de ber']);
    });

    it('uses the configured binary', async () => {
        const executor = new MockCommandExecutor().setCommandResult('/opt/mullvad/bin/mullvad connect', ok());
        const client = new MullvadClient({ bin: '/opt/mullvad/bin/mullvad', commandTimeout: 1000, executor });

        await client.connect();

        assert.deepEqual(executor.getExecutedCommands(), ['/opt/mullvad/bin/mullvad connect']);
    });

    it('quotes a binary path containing spaces', async () => {
        const executor = new MockCommandExecutor().setCommandResult("'/opt/Mullvad VPN/mullvad' status", ok('Disconnected'));
        const client = new MullvadClient({ bin: '/opt/Mullvad VPN/mullvad', commandTimeout: 1000, executor });

        assert.equal(await client.status(), 'Disconnected');
        assert.equal(shellQuote("it's"), "'it'\\''s'");
    });

    it('runs every command with the configured timeout', async () => {
        const executor = new MockCommandExecutor()
            .setCommandResult('mullvad status', ok('Disconnected'))
            .setCommandResult('mullvad relay list', ok(''))
            .setCommandResult('mullvad relay set location de ber', ok())
            .setCommandResult('mullvad connect', ok())
            .setCommandResult('mullvad reconnect', ok());
        const client = new MullvadClient({ bin: 'mullvad', commandTimeout: 4321, executor });

        await client.status();
        await client.relayList();
        await client.setRelayLocation({ countryCode: 'de', cityCode: 'ber' });
        await client.connect();
        await client.reconnect();

        assert.deepEqual(executor.getExecutedTimeouts(), [4321, 4321, 4321, 4321, 4321]);
    });

    it('refuses a location that is not a plain code', async () => {
        const executor = new MockCommandExecutor();
        const client = new MullvadClient({ bin: 'mullvad', commandTimeout: 1000, executor });

        await assert.rejects(client.setRelayLocation({ countryCode: 'de', cityCode: 'ber; reboot' }), {
            code: 'COMMAND_FAILED',
            message: 'Invalid relay location "de ber; reboot"'
        });
        assert.deepEqual(executor.getExecutedCommands(), []);
    });

    it('maps failing commands to COMMAND_FAILED', async () => {
        const executor = new MockCommandExecutor()
            .setCommandResult('mullvad relay set location de ber', fail())
            .setCommandResult('mullvad connect', fail())
            .setCommandResult('mullvad reconnect', fail());
        const client = new MullvadClient({ bin: 'mullvad', commandTimeout: 1000, executor });

        await assert.rejects(client.setRelayLocation({ countryCode: 'de', cityCode: 'ber' }), {
            code: 'COMMAND_FAILED',
            message: 'Failed to set relay de ber'
        });
        await assert.rejects(client.connect(), {
            code: 'COMMAND_FAILED',
            message: 'Connect failed, check internet connection'
        });
        await assert.rejects(client.reconnect(), {
            code: 'COMMAND_FAILED',
            message: 'Reconnect failed, check internet connection'
        });
    });

    it('leaves a breadcrumb for each command and its failure', async () => {
        const reporter = recordingReporter();
        const executor = new MockCommandExecutor()
            .setCommandResult('mullvad status', ok('Disconnected'))
            .setCommandResult('mullvad relay list', fail());
        const client = new MullvadClient({ bin: 'mullvad', commandTimeout: 1000, executor, reporter });

        assert.equal(await client.status(), 'Disconnected');
        await assert.rejects(client.relayList(), { code: 'DAEMON_UNAVAILABLE' });

        assert.deepEqual(reporter.breadcrumbs.map(b => [b.level, b.message]), [
            ['info', 'mullvad status'],
            ['info', 'mullvad relay list'],
            ['error', 'mullvad relay list failed']
        ]);
    });
});
