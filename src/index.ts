#!/usr/bin/env node
import configManager from './config';
import {
    RelayCycler,
    connectingMessage,
    formatOutcome,
    parseDirection,
    switchingMessage
} from './cycler';
import { loadHomeReference } from './homeLocation';
import { MullvadClient } from './mullvadClient';
import { runPreflight } from './preflight';
import { AppConfig, CommandExecutor, CycleOutcome } from './types';
import { errorMessage, logger, shellExecutor } from './utils';
import { isRelayCycleError } from './utils/errorCodes';
import { createLogger, ISentryLogger } from './utils/logger/logger';

export const USAGE = 'Usage: relaycycle [next|previous]';

export const exitCodes = {
    OK: 0,
    FATAL: 1,
    USAGE: 2
} as const;

export interface RunOptions {
    config?: AppConfig;
    executor?: CommandExecutor;
    fetchFn?: typeof fetch;
    sleep?: (ms: number) => Promise<void>;
    reporter?: ISentryLogger;
    print?: (line: string) => void;
    printError?: (line: string) => void;
}

/**
 * Runs one invocation and resolves with the process exit code
 */
export async function main(args: string[] = process.argv.slice(2), options: RunOptions = {}): Promise<number> {
    const print = options.print ?? ((line: string) => console.log(line));
    const printError = options.printError ?? ((line: string) => console.error(line));

    const direction = args.length > 1 ? null : parseDirection(args[0]);
    if (direction === null) {
        printError(USAGE);
        return exitCodes.USAGE;
    }

    let config: AppConfig;
    try {
        config = options.config ?? configManager.load();
    } catch (error) {
        printError(`Invalid configuration: ${errorMessage(error)}`);
        return exitCodes.FATAL;
    }
    logger.setLevel(config.logLevel);

    const reporter = options.reporter ?? createLogger({ logsDir: config.logsDir, enabled: config.incidentLog });
    const client = new MullvadClient({
        bin: config.mullvadBin,
        commandTimeout: config.commandTimeout,
        executor: options.executor ?? shellExecutor,
        reporter
    });

    try {
        await runPreflight(client, {
            connectivityCheckUrl: config.connectivityCheckUrl,
            connectivityTimeout: config.connectivityTimeout,
            skipConnectivityCheck: config.skipConnectivityCheck,
            ...(options.fetchFn && { fetchFn: options.fetchFn })
        });

        const home = loadHomeReference(config.homeLocationFile);
        const cycler = new RelayCycler({
            client,
            home,
            connectTimeout: config.connectTimeout,
            pollInterval: config.pollInterval,
            reporter,
            ...(options.sleep && { sleep: options.sleep })
        });

        cycler.on('connecting', () => print(connectingMessage()));
        cycler.on('switching', (from: string, to: string) => print(switchingMessage(from, to)));
        cycler.on('connected', (outcome: CycleOutcome) => print(formatOutcome(outcome)));

        await cycler.cycle(direction);
        return exitCodes.OK;
    } catch (error) {
        if (!isRelayCycleError(error)) {
            logger.error('Unexpected error:', error);
        }
        printError(errorMessage(error));
        reporter.setExtra('config', config);
        await reporter.captureException(error instanceof Error ? error : new Error(String(error)));
        return exitCodes.FATAL;
    }
}

if (require.main === module) {
    main()
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(error);
            process.exitCode = exitCodes.FATAL;
        });
}
