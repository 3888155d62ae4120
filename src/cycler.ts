import { EventEmitter } from 'events';
import {
    ConnectionStatus,
    CycleOutcome,
    Direction,
    HomeReference,
    RankedRelay,
    RelayLocation
} from './types';
import { ConnectionStateReader } from './connectionState';
import { formatDistance, rankRelays } from './distance';
import { MullvadClient } from './mullvadClient';
import { parseRelayCatalog } from './relayCatalog';
import { errorMessage, logger } from './utils';
import { RelayCycleError } from './utils/errorCodes';
import { ISentryLogger, nullLogger } from './utils/logger/logger';
import { waitUntilConnected } from './waiter';

export function parseDirection(arg: string | undefined): Direction | null {
    switch (arg) {
        case undefined:
        case 'next':
            return 'next';
        case 'previous':
        case 'prev':
            return 'previous';
        default:
            return null;
    }
}

/**
 * Position of the relay's city in the candidate list, or null when the city
 * is not a candidate.
 */
export function locateIndex(candidates: readonly RelayLocation[], current: RelayLocation): number | null {
    const index = candidates.findIndex(candidate =>
        candidate.countryCode === current.countryCode && candidate.cityCode === current.cityCode);
    return index === -1 ? null : index;
}

export function cycleIndex(currentIndex: number, direction: Direction, count: number): number {
    if (count < 1) {
        throw new RangeError('Cannot cycle through an empty candidate list');
    }
    const step = direction === 'next' ? 1 : -1;
    return (currentIndex + step + count) % count;
}

export const relayLabel = ({ countryCode, cityCode }: RelayLocation): string => `${countryCode}-${cityCode}`;

export const connectingMessage = (): string => 'Connecting...';

export const switchingMessage = (from: string, to: string): string => `Switching relays (${from} -> ${to}) ...`;

export const formatOutcome = ({ relay, position, total }: CycleOutcome): string =>
    `Connected (${relay}) [${position}/${total}]`;

function candidateAt(candidates: readonly RankedRelay[], index: number): RankedRelay {
    const candidate = candidates[index];
    if (!candidate) {
        throw new RangeError(`Candidate index ${index} out of range (${candidates.length})`);
    }
    return candidate;
}

export interface RelayCyclerOptions {
    client: MullvadClient;
    home: HomeReference;
    connectTimeout: number;
    pollInterval: number;
    sleep?: (ms: number) => Promise<void>;
    reporter?: ISentryLogger;
}

/**
 * Moves the tunnel to the next or previous relay city of the active country,
 * ordered by distance from home.
 *
 * Events:
 * - `connecting` (target: RankedRelay), before connecting from the disconnected state
 * - `switching` (from: string, to: string), before reconnecting to another city
 * - `connected` (outcome: CycleOutcome), once the daemon reports "Connected"
 */
export class RelayCycler extends EventEmitter {
    private readonly client: MullvadClient;
    private readonly reader: ConnectionStateReader;
    private readonly home: HomeReference;
    private readonly connectTimeout: number;
    private readonly pollInterval: number;
    private readonly sleep: ((ms: number) => Promise<void>) | undefined;
    private readonly reporter: ISentryLogger;

    constructor(options: RelayCyclerOptions) {
        super();
        this.client = options.client;
        this.reader = new ConnectionStateReader(options.client);
        this.home = options.home;
        this.connectTimeout = options.connectTimeout;
        this.pollInterval = options.pollInterval;
        this.sleep = options.sleep;
        this.reporter = options.reporter ?? nullLogger;
    }

    /**
     * Candidate list for a country, nearest to home first
     */
    async buildCandidates(countryCode: string): Promise<RankedRelay[]> {
        const catalog = await this.client.relayList();
        const candidates = rankRelays(this.home, parseRelayCatalog(catalog, countryCode));

        logger.debug(`Candidates for ${countryCode}: ${candidates
            .map(c => `${relayLabel(c)} (${formatDistance(c.distanceKm)})`)
            .join(', ') || 'none'}`);

        return candidates;
    }

    async cycle(direction: Direction = 'next'): Promise<CycleOutcome> {
        this.reporter.setTag('direction', direction);

        const status = await this.reader.read();
        const countryCode = this.resolveCountry(status);

        this.reporter.addBreadcrumb({
            category: 'cycle',
            message: status.connected ? `connected via ${status.relayHostname}` : 'disconnected',
            level: 'info',
            data: { countryCode }
        });

        const candidates = await this.buildCandidates(countryCode);
        if (candidates.length === 0) {
            throw new RelayCycleError('NO_CANDIDATE_RELAYS', `No relays found for country: ${countryCode}`);
        }

        return status.connected
            ? this.switchRelay(status, candidates, direction)
            : this.connectNearest(candidates);
    }

    private resolveCountry(status: ConnectionStatus): string {
        if (!status.connected) {
            return this.home.countryCode;
        }
        if (!status.relayCountryCode) {
            logger.warn('Connected but no relay reported by the daemon, using home country');
            return this.home.countryCode;
        }
        return status.relayCountryCode;
    }

    private async connectNearest(candidates: RankedRelay[]): Promise<CycleOutcome> {
        const target = candidateAt(candidates, 0);

        this.emit('connecting', target);
        logger.info(`Connecting to nearest relay ${relayLabel(target)}`);

        await this.client.setRelayLocation(target);
        await this.client.connect();
        await this.waitForConnection();

        return this.finish({
            kind: 'connected',
            relay: await this.reportedRelay(target),
            position: 1,
            total: candidates.length,
            to: relayLabel(target)
        });
    }

    private async switchRelay(
        status: ConnectionStatus,
        candidates: RankedRelay[],
        direction: Direction
    ): Promise<CycleOutcome> {
        const current: RelayLocation = { countryCode: status.relayCountryCode, cityCode: status.relayCityCode };
        const located = locateIndex(candidates, current);
        if (located === null) {
            logger.debug(`${relayLabel(current)} is not a candidate, cycling from the nearest relay`);
        }

        const currentIndex = located ?? 0;
        const nextIndex = cycleIndex(currentIndex, direction, candidates.length);
        const target = candidateAt(candidates, nextIndex);
        const from = relayLabel(current);
        const to = relayLabel(target);

        this.emit('switching', from, to);
        logger.info(`Switching relays ${from} -> ${to} (${direction})`);

        await this.client.setRelayLocation(target);
        await this.client.reconnect();
        await this.waitForConnection();

        return this.finish({
            kind: 'switched',
            relay: await this.reportedRelay(target),
            position: nextIndex + 1,
            total: candidates.length,
            from,
            to
        });
    }

    private async waitForConnection(): Promise<void> {
        await waitUntilConnected(() => this.reader.isConnected(), {
            interval: this.pollInterval,
            timeout: this.connectTimeout,
            ...(this.sleep && { sleep: this.sleep })
        });
    }

    /**
     * Relay hostname the daemon reports after connecting, e.g. `de-ber-wg-001`
     */
    private async reportedRelay(target: RankedRelay): Promise<string> {
        try {
            const status = await this.reader.read();
            return status.relayHostname || relayLabel(target);
        } catch (error) {
            logger.warn('Could not read relay after connecting:', errorMessage(error));
            return relayLabel(target);
        }
    }

    private finish(outcome: CycleOutcome): CycleOutcome {
        this.emit('connected', outcome);
        return outcome;
    }
}
