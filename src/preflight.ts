import { MullvadClient } from './mullvadClient';
import { errorMessage, logger } from './utils';
import { RelayCycleError } from './utils/errorCodes';

export interface PreflightOptions {
    connectivityCheckUrl: string;
    connectivityTimeout: number;
    skipConnectivityCheck: boolean;
    fetchFn?: typeof fetch;
}

/**
 * Fails with DAEMON_UNAVAILABLE when `mullvad status` cannot be run.
 */
export async function checkDaemon(client: MullvadClient): Promise<void> {
    await client.status();
}

/**
 * Network reachability probe. Any HTTP response counts as reachable;
 * only a network error or the timeout fails the check.
 */
export async function checkConnectivity(
    url: string,
    timeout: number,
    fetchFn: typeof fetch = fetch
): Promise<void> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
        const response = await fetchFn(url, { method: 'HEAD', signal: controller.signal });
        logger.debug(`Connectivity check ${url}: HTTP ${response.status}`);
    } catch (error) {
        logger.debug(`Connectivity check ${url} failed:`, errorMessage(error));
        throw new RelayCycleError('NO_CONNECTIVITY', undefined, { cause: error });
    } finally {
        clearTimeout(timeoutId);
    }
}

export async function runPreflight(client: MullvadClient, options: PreflightOptions): Promise<void> {
    await checkDaemon(client);

    if (options.skipConnectivityCheck) {
        logger.debug('Connectivity check skipped');
        return;
    }

    await checkConnectivity(options.connectivityCheckUrl, options.connectivityTimeout, options.fetchFn);
}
