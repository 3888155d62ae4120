import { existsSync, mkdirSync } from 'fs';
import { promises as fs } from 'fs';
import { join } from 'path';
import type { Breadcrumb } from '@sentry/core';

export type SeverityLevel = NonNullable<Breadcrumb['level']>;

export type Extras = Record<string, unknown>;

export interface ISentryLogger {
  captureException(exception: Error, context?: Extras): Promise<string>;
  captureMessage(message: string, level?: SeverityLevel): Promise<string>;
  setTag(key: string, value: string): void;
  setExtra(key: string, value: unknown): void;
  addBreadcrumb(breadcrumb: Breadcrumb): void;
}

interface StoredBreadcrumb extends Breadcrumb {
  timestamp: number;
}

const MAX_BREADCRUMBS = 100;

/**
 * Sentry-shaped logger that appends JSON entries to `<logsDir>/relaycycle.log`.
 * The tool usually runs from a key binding without a terminal, so this file
 * is where a failed invocation can be inspected afterwards.
 */
export class FileLogger implements ISentryLogger {
  private readonly logFile: string;
  private tags: Record<string, string> = {};
  private extras: Extras = {};
  private breadcrumbs: StoredBreadcrumb[] = [];
  private maxLogFileSize: number = 1024 * 1024; // 1 MB

  constructor(private readonly logsDir: string) {
    this.logFile = join(logsDir, 'relaycycle.log');
    this.ensureLogDir();
  }

  get path(): string {
    return this.logFile;
  }

  private ensureLogDir(): void {
    if (!existsSync(this.logsDir)) {
      mkdirSync(this.logsDir, { recursive: true });
    }
  }

  private formatLogEntry(level: SeverityLevel, message: string, data?: Extras): string {
    const logEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      tags: Object.keys(this.tags).length > 0 ? this.tags : undefined,
      extras: Object.keys(this.extras).length > 0 ? this.extras : undefined,
      breadcrumbs: this.breadcrumbs.length > 0 ? this.breadcrumbs.slice(-20) : undefined,
      data
    };

    return JSON.stringify(logEntry) + '\n';
  }

  private async rotateLogFile(): Promise<void> {
    const stats = existsSync(this.logFile) ? await fs.stat(this.logFile) : null;
    if (stats && stats.size > this.maxLogFileSize) {
      await fs.rename(this.logFile, `${this.logFile}.1`);
    }
  }

  private async writeLogAsync(logEntry: string): Promise<void> {
    try {
      await this.rotateLogFile();
      await fs.appendFile(this.logFile, logEntry);
    } catch (writeError) {
      console.error('Failed to write to log file:', writeError);
    }
  }

  async captureException(exception: Error, context?: Extras): Promise<string> {
    const errorData: Extras = {
      name: exception.name,
      message: exception.message,
      stack: exception.stack,
      code: 'code' in exception ? exception.code : undefined,
      context
    };

    await this.writeLogAsync(this.formatLogEntry('error', `Exception: ${exception.message}`, errorData));

    return this.generateEventId();
  }

  async captureMessage(message: string, level: SeverityLevel = 'info'): Promise<string> {
    await this.writeLogAsync(this.formatLogEntry(level, message));

    return this.generateEventId();
  }

  setTag(key: string, value: string): void {
    this.tags[key] = value;
  }

  setExtra(key: string, value: unknown): void {
    this.extras[key] = value;
  }

  addBreadcrumb(breadcrumb: Breadcrumb): void {
    this.breadcrumbs.push({
      ...breadcrumb,
      timestamp: Date.now() / 1000
    });

    if (this.breadcrumbs.length > MAX_BREADCRUMBS) {
      this.breadcrumbs = this.breadcrumbs.slice(-MAX_BREADCRUMBS);
    }
  }

  private generateEventId(): string {
    return Math.random().toString(36).substring(2, 15) + Math.random().toString(36).substring(2, 15);
  }
}

export const nullLogger: ISentryLogger = {
  captureException: async () => '',
  captureMessage: async () => '',
  setTag: () => {},
  setExtra: () => {},
  addBreadcrumb: () => {},
};

export function createLogger(options: { logsDir: string; enabled: boolean }): ISentryLogger {
  return options.enabled ? new FileLogger(options.logsDir) : nullLogger;
}
