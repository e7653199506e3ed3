import dgram from 'dgram';
import { EventEmitter } from 'events';
import { URL } from 'url';
import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { WamError, getErrorMessage } from './errors/wam-errors.js';
import { REFRESH_COMMANDS, WamSpeaker } from './wam-speaker.js';
import type { WamClient } from './protocol/client.js';
import type { AddressResolver } from './address-resolver.js';
import type { SpeakerSnapshot } from './types/wam.js';

export const SSDP_ADDRESS = '239.255.255.250';
export const SSDP_PORT = 1900;
export const WAM_SEARCH_TARGET = 'urn:samsung.com:device:RemoteControlReceiver:1';
export const DEFAULT_DISCOVERY_TIMEOUT = 5000;

const MX_VALUE = 3;

export interface SsdpResponse {
  location: string;
  host: string;
  searchTarget: string;
  usn: string;
}

export interface SsdpSearchOptions {
  searchTarget: string;
  // Local address to send from; the OS picks one when unset
  interfaceAddress?: string;
  timeout: number;
  signal?: AbortSignal;
}

/**
 * Sends one search and collects every reply that arrives within the window
 */
export interface SsdpSearcher {
  search(options: SsdpSearchOptions): Promise<SsdpResponse[]>;
}

/**
 * Parse an SSDP reply or NOTIFY datagram. The host comes from the LOCATION
 * URL; `sender` is used when the URL has no usable hostname.
 */
export function parseSsdpResponse(message: string, sender: string): SsdpResponse | null {
  const headers: Record<string, string> = {};

  for (const line of message.split(/\r?\n/)) {
    const colonIndex = line.indexOf(':');
    if (colonIndex > 0) {
      const key = line.substring(0, colonIndex).toLowerCase().trim();
      headers[key] = line.substring(colonIndex + 1).trim();
    }
  }

  const location = headers['location'];
  if (!location) {
    return null;
  }

  let host: string;
  try {
    host = new URL(location).hostname || sender;
  } catch {
    return null;
  }

  return {
    location,
    host,
    searchTarget: headers['st'] ?? headers['nt'] ?? '',
    usn: headers['usn'] ?? ''
  };
}

export function buildSearchMessage(searchTarget: string): string {
  return [
    'M-SEARCH * HTTP/1.1',
    `HOST: ${SSDP_ADDRESS}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${MX_VALUE}`,
    `ST: ${searchTarget}`,
    '',
    ''
  ].join('\r\n');
}

/**
 * UDP multicast searcher. One socket per search, closed when the window
 * ends or the signal aborts.
 */
export class DgramSsdpSearcher implements SsdpSearcher {
  async search(options: SsdpSearchOptions): Promise<SsdpResponse[]> {
    const { searchTarget, interfaceAddress, timeout, signal } = options;
    if (signal?.aborted) {
      return [];
    }

    const responses: SsdpResponse[] = [];
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });

    return new Promise<SsdpResponse[]>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      let settled = false;

      // Abort, socket error and the send callback can each end the search
      const finish = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onAbort);
        socket.removeAllListeners('message');
        socket.close();
        if (error) {
          reject(error);
        } else {
          resolve(responses);
        }
      };

      const onAbort = (): void => {
        debugManager.debug('discovery', 'SSDP search aborted');
        finish();
      };

      socket.on('message', (msg, rinfo) => {
        const response = parseSsdpResponse(msg.toString(), rinfo.address);
        if (response) {
          debugManager.trace('discovery', `SSDP reply from ${rinfo.address}`, response);
          responses.push(response);
        }
      });

      socket.once('error', (error) => {
        logger.error('Discovery socket error:', error);
        finish(new WamError(`SSDP search failed: ${error.message}`, 'DISCOVERY_ERROR', { cause: error }));
      });

      signal?.addEventListener('abort', onAbort, { once: true });

      socket.bind({ address: interfaceAddress, port: 0 }, () => {
        if (settled) {
          return;
        }
        if (interfaceAddress) {
          socket.setMulticastInterface(interfaceAddress);
        }
        socket.send(buildSearchMessage(searchTarget), SSDP_PORT, SSDP_ADDRESS, (error) => {
          if (settled) {
            return;
          }
          if (error) {
            finish(new WamError(`SSDP search failed: ${error.message}`, 'DISCOVERY_ERROR', { cause: error }));
            return;
          }
          debugManager.debug('discovery', `SSDP search sent from ${interfaceAddress ?? 'default interface'}`);
          timer = setTimeout(() => finish(), timeout);
        });
      });
    });
  }
}

export interface DiscoveredSpeaker {
  speaker: WamSpeaker;
  snapshot: SpeakerSnapshot;
}

export interface DiscoverOptions {
  interfaceAddress?: string;
  timeout?: number;
  signal?: AbortSignal;
}

export interface WamDiscoveryOptions {
  searcher?: SsdpSearcher;
  resolver?: AddressResolver;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface WamDiscovery {
  on(event: 'speaker-found', listener: (speaker: WamSpeaker, snapshot: SpeakerSnapshot) => void): this;
}

/**
 * Finds WAM speakers with an SSDP search and hydrates each one with a
 * full state refresh. A speaker that answers none of the refresh queries
 * is dropped; one that answers some is returned with a partial snapshot.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class WamDiscovery extends EventEmitter {
  private readonly searcher: SsdpSearcher;
  private readonly resolver?: AddressResolver;

  constructor(private readonly client: WamClient, options: WamDiscoveryOptions = {}) {
    super();
    this.searcher = options.searcher ?? new DgramSsdpSearcher();
    this.resolver = options.resolver;
  }

  async discover(options: DiscoverOptions = {}): Promise<DiscoveredSpeaker[]> {
    const responses = await this.searcher.search({
      searchTarget: WAM_SEARCH_TARGET,
      interfaceAddress: options.interfaceAddress,
      timeout: options.timeout ?? DEFAULT_DISCOVERY_TIMEOUT,
      signal: options.signal
    });

    const hosts: string[] = [];
    for (const response of responses) {
      if (response.searchTarget !== WAM_SEARCH_TARGET) {
        continue;
      }
      if (!hosts.includes(response.host)) {
        hosts.push(response.host);
      }
    }
    debugManager.info('discovery', `SSDP search found ${hosts.length} speaker(s)`);

    const results = await Promise.allSettled(hosts.map(host => this.hydrate(host)));

    const discovered: DiscoveredSpeaker[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        logger.warn(`Discovery: hydrating ${hosts[i] ?? 'unknown host'} failed: ${getErrorMessage(result.reason)}`);
      } else if (result.value) {
        discovered.push(result.value);
      }
    });
    return discovered;
  }

  private async hydrate(address: string): Promise<DiscoveredSpeaker | null> {
    const speaker = new WamSpeaker(this.client, { address });
    const snapshot = await speaker.refresh();

    if (snapshot.kind === 'partial' && snapshot.failures.length === REFRESH_COMMANDS.length) {
      logger.warn(`Discovery: ${address} answered SSDP but no WAM commands, dropping it`);
      return null;
    }
    if (snapshot.kind === 'partial') {
      debugManager.warn('discovery', `${address}: partial state, failed fields: ${snapshot.failures.map(f => f.field).join(', ')}`);
    }

    if (this.resolver) {
      try {
        speaker.mac = (await this.resolver.resolveMac(address)) ?? '';
      } catch (error) {
        logger.warn(`Discovery: MAC lookup for ${address} failed: ${getErrorMessage(error)}`);
      }
    }

    debugManager.info('discovery', `Found speaker ${speaker.label} at ${address}`);
    this.emit('speaker-found', speaker, snapshot);
    return { speaker, snapshot };
  }
}
