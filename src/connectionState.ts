import { ConnectionStatus } from './types';
import { MullvadClient } from './mullvadClient';

const RELAY_LINE = /^\s*Relay:\s*(\S+)/;

const disconnected: ConnectionStatus = {
  connected: false,
  relayCountryCode: '',
  relayCityCode: '',
  relayHostname: ''
};

/**
 * `mullvad status` prints the state on the first line ("Connected",
 * "Disconnected", "Connecting") and, when connected, a line such as
 * `    Relay:   de-ber-wg-001`.
 */
export const isConnectedStatus = (statusText: string): boolean => {
  const [firstLine = ''] = statusText.split(/\r?\n/);
  return firstLine.includes('Connected');
};

export const parseStatus = (statusText: string): ConnectionStatus => {
  if (!isConnectedStatus(statusText)) {
    return { ...disconnected };
  }

  let relayHostname = '';
  for (const line of statusText.split(/\r?\n/)) {
    const match = RELAY_LINE.exec(line);
    if (match?.[1]) {
      relayHostname = match[1];
      break;
    }
  }

  const [relayCountryCode = '', relayCityCode = ''] = relayHostname.split('-');

  return {
    connected: true,
    relayCountryCode,
    relayCityCode,
    relayHostname
  };
};

/**
 * Read-only view of the daemon state; every call queries the daemon again.
 */
export class ConnectionStateReader {
  constructor(private readonly client: MullvadClient) {}

  async read(): Promise<ConnectionStatus> {
    return parseStatus(await this.client.status());
  }

  async isConnected(): Promise<boolean> {
    return isConnectedStatus(await this.client.status());
  }
}
