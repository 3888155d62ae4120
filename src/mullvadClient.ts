import { CommandExecutor, RelayLocation } from './types';
import { errorMessage, shellExecutor } from './utils';
import { ErrorCode, RelayCycleError } from './utils/errorCodes';
import { ISentryLogger, nullLogger } from './utils/logger/logger';

export interface MullvadClientOptions {
  bin: string;
  commandTimeout: number;
  executor?: CommandExecutor;
  reporter?: ISentryLogger;
}

const LOCATION_CODE = /^[a-z0-9]+$/;
const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

/**
 * Single-quotes a word for `sh` unless it is made of safe characters only
 */
export function shellQuote(word: string): string {
  return SHELL_SAFE.test(word) ? word : `'${word.replace(/'/g, `'\\''`)}'`;
}

/**
 * Thin wrapper over the `mullvad` CLI. Success of a mutating command is its
 * exit status; nothing but `status` and `relay list` output is parsed.
 */
export class MullvadClient {
  private readonly bin: string;
  private readonly commandTimeout: number;
  private readonly executor: CommandExecutor;
  private readonly reporter: ISentryLogger;

  constructor({ bin, commandTimeout, executor = shellExecutor, reporter = nullLogger }: MullvadClientOptions) {
    this.bin = bin;
    this.commandTimeout = commandTimeout;
    this.executor = executor;
    this.reporter = reporter;
  }

  async status(): Promise<string> {
    return this.run(['status'], 'DAEMON_UNAVAILABLE');
  }

  async relayList(): Promise<string> {
    return this.run(['relay', 'list'], 'DAEMON_UNAVAILABLE');
  }

  async setRelayLocation({ countryCode, cityCode }: RelayLocation): Promise<void> {
    if (!LOCATION_CODE.test(countryCode) || !LOCATION_CODE.test(cityCode)) {
      throw new RelayCycleError('COMMAND_FAILED', `Invalid relay location "${countryCode} ${cityCode}"`);
    }
    await this.run(['relay', 'set', 'location', countryCode, cityCode], 'COMMAND_FAILED',
      `Failed to set relay ${countryCode} ${cityCode}`);
  }

  async connect(): Promise<void> {
    await this.run(['connect'], 'COMMAND_FAILED', 'Connect failed, check internet connection');
  }

  async reconnect(): Promise<void> {
    await this.run(['reconnect'], 'COMMAND_FAILED', 'Reconnect failed, check internet connection');
  }

  private async run(args: string[], failureCode: ErrorCode, failureMessage?: string): Promise<string> {
    const command = [shellQuote(this.bin), ...args].join(' ');

    this.reporter.addBreadcrumb({
      category: 'mullvad',
      message: command,
      level: 'info'
    });

    try {
      const { stdout } = await this.executor.execute(command, this.commandTimeout);
      return stdout;
    } catch (error) {
      this.reporter.addBreadcrumb({
        category: 'mullvad',
        message: `${command} failed`,
        level: 'error',
        data: { error: errorMessage(error) }
      });
      throw new RelayCycleError(failureCode, failureMessage, { cause: error });
    }
  }
}
