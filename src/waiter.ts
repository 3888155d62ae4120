import { WaitOptions } from './types';
import { delay, errorMessage, logger } from './utils';
import { RelayCycleError } from './utils/errorCodes';

/**
 * Polls `probe` until it reports connected. The budget is
 * `floor(timeout / interval)` probes with a sleep after every miss; a probe
 * that throws counts as a miss.
 */
export async function waitUntilConnected(
  probe: () => Promise<boolean>,
  { interval, timeout, sleep = delay }: WaitOptions
): Promise<void> {
  const maxAttempts = Math.max(1, Math.floor(timeout / interval));

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let connected = false;
    try {
      connected = await probe();
    } catch (error) {
      logger.debug(`Status probe ${attempt}/${maxAttempts} failed:`, errorMessage(error));
    }

    if (connected) {
      logger.debug(`Connected after ${attempt} status probe(s)`);
      return;
    }

    await sleep(interval);
  }

  throw new RelayCycleError('CONNECTION_TIMEOUT', `Connection timed out after ${formatSeconds(timeout)}`);
}

const formatSeconds = (ms: number): string => `${Number((ms / 1000).toFixed(1))}s`;
