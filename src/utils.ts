import * as os from 'os';
import * as path from 'path';
import { exec } from 'child_process';
import { promisify } from 'util';
import { CommandExecutor, ExecResult, LogLevel } from './types';

const execAsync = promisify(exec);

/**
 * Level-filtered console logger. Writes to stderr so that stdout carries
 * only the progress and result messages.
 */
export class Logger {
    private levels: Record<LogLevel, number> = {
        error: 0,
        warn: 1,
        info: 2,
        debug: 3
    };
    private currentLevel: number = 2; // default to 'info' level

    constructor(level: LogLevel = 'info') {
        this.setLevel(level);
    }

    setLevel(level: LogLevel): void {
        this.currentLevel = this.levels[level] ?? this.levels.info;
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (this.levels[level] <= this.currentLevel) {
            const timestamp = new Date().toISOString();
            const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
            console.error(prefix, message, ...args);
        }
    }

    error(message: string, ...args: unknown[]): void {
        this.log('error', message, ...args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.log('warn', message, ...args);
    }

    info(message: string, ...args: unknown[]): void {
        this.log('info', message, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.log('debug', message, ...args);
    }
}

export function isLogLevel(value: unknown): value is LogLevel {
    return value === 'error' || value === 'warn' || value === 'info' || value === 'debug';
}

export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');

/**
 * Resolves after the given number of milliseconds
 */
export function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Cache directory following the XDG base directory convention
 */
export function cacheDir(): string {
    return process.env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
}

export function configDir(): string {
    return process.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

/**
 * Runs a shell command, rejecting once the timeout elapses
 */
export async function execWithTimeout(command: string, timeout: number = 30000): Promise<ExecResult> {
    try {
        const { stdout, stderr } = await execAsync(command, { timeout });
        return { stdout: stdout.trim(), stderr: stderr.trim() };
    } catch (error) {
        throw new Error(`Command timeout or error: ${errorMessage(error)}`, { cause: error });
    }
}

export const shellExecutor: CommandExecutor = {
    execute: (command, timeout) => execWithTimeout(command, timeout)
};
