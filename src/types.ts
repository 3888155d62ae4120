// Type definitions for relaycycle

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export type Direction = 'next' | 'previous';

export interface HomeReference {
  latitude: number;
  longitude: number;
  countryCode: string;
}

export interface RelayCityRecord {
  countryCode: string;
  cityCode: string;
  latitude: number;
  longitude: number;
}

export interface RankedRelay {
  countryCode: string;
  cityCode: string;
  distanceKm: number;
}

export type RelayLocation = Pick<RankedRelay, 'countryCode' | 'cityCode'>;

export interface ConnectionStatus {
  connected: boolean;
  relayCountryCode: string;
  relayCityCode: string;
  relayHostname: string;
}

export interface CycleOutcome {
  kind: 'connected' | 'switched';
  relay: string;
  position: number;
  total: number;
  from?: string;
  to: string;
}

export interface AppConfig {
  mullvadBin: string;
  homeLocationFile: string;
  connectTimeout: number;
  pollInterval: number;
  commandTimeout: number;
  connectivityCheckUrl: string;
  connectivityTimeout: number;
  skipConnectivityCheck: boolean;
  logLevel: LogLevel;
  logsDir: string;
  incidentLog: boolean;
}

export interface IConfigManager {
  load(): AppConfig;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
}

/**
 * Runs a shell command and resolves with its output, rejecting on a non-zero exit.
 */
export interface CommandExecutor {
  execute(command: string, timeout?: number): Promise<ExecResult>;
}

export interface WaitOptions {
  interval: number;
  timeout: number;
  sleep?: (ms: number) => Promise<void>;
}
