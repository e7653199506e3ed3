import logger from './utils/logger.js';
import { retry, isDefaultRetryable, type RetryOptions } from './utils/retry.js';
import { InvalidArgumentError, getErrorMessage } from './errors/wam-errors.js';
import { WamClient } from './protocol/client.js';
import { HttpTransport } from './protocol/transport.js';
import { NeighborTableResolver } from './address-resolver.js';
import { WamDiscovery, type DiscoverOptions } from './discovery.js';
import { GroupCoordinator, type GroupResult } from './group-coordinator.js';
import { SpeakerStore } from './speaker-store.js';
import { WamSpeaker } from './wam-speaker.js';
import type { Config, SpeakerSnapshot } from './types/wam.js';

export interface WamControllerOptions {
  client: WamClient;
  discovery: WamDiscovery;
  store: SpeakerStore;
  coordinator?: GroupCoordinator;
  retryOptions?: RetryOptions;
  interfaceAddress?: string;
  discoveryTimeout?: number;
}

/**
 * Front door for applications: keeps the speaker list, and runs discovery,
 * grouping, refresh and persistence over it.
 */
export class WamController {
  readonly client: WamClient;
  readonly discovery: WamDiscovery;
  readonly store: SpeakerStore;
  readonly coordinator: GroupCoordinator;
  private speakerList: WamSpeaker[] = [];

  constructor(private readonly options: WamControllerOptions) {
    this.client = options.client;
    this.discovery = options.discovery;
    this.store = options.store;
    this.coordinator = options.coordinator ?? new GroupCoordinator();
  }

  static fromConfig(config: Config): WamController {
    const client = new WamClient({
      transport: new HttpTransport({ timeout: config.httpTimeout }),
      port: config.port
    });
    return new WamController({
      client,
      discovery: new WamDiscovery(client, { resolver: new NeighborTableResolver(config.arpTable) }),
      store: new SpeakerStore(config.speakersFile),
      interfaceAddress: config.interfaceAddress,
      discoveryTimeout: config.discoveryTimeout
    });
  }

  get speakers(): readonly WamSpeaker[] {
    return this.speakerList;
  }

  /**
   * Combine discovered and stored speakers. Discovered ones win; stored ones
   * are kept only for addresses discovery did not see.
   */
  merge(discovered: readonly WamSpeaker[], stored: readonly WamSpeaker[]): WamSpeaker[] {
    const byAddress = new Map<string, WamSpeaker>();
    for (const speaker of [...discovered, ...stored]) {
      if (!byAddress.has(speaker.address)) {
        byAddress.set(speaker.address, speaker);
      }
    }
    this.speakerList = [...byAddress.values()];
    return this.speakerList;
  }

  async loadStored(): Promise<WamSpeaker[]> {
    const records = await this.store.load();
    return records.map(record => WamSpeaker.fromRecord(this.client, record));
  }

  async discover(options: DiscoverOptions = {}): Promise<WamSpeaker[]> {
    const found = await this.discovery.discover({
      interfaceAddress: options.interfaceAddress ?? this.options.interfaceAddress,
      timeout: options.timeout ?? this.options.discoveryTimeout,
      signal: options.signal
    });
    return found.map(result => result.speaker);
  }

  /**
   * Load the stored list and run discovery, then merge the two
   */
  async start(options: DiscoverOptions = {}): Promise<readonly WamSpeaker[]> {
    const stored = await this.loadStored();
    const discovered = await this.discover(options);
    this.merge(discovered, stored);
    logger.info(`${this.speakerList.length} speaker(s) known (${discovered.length} discovered, ${stored.length} stored)`);
    return this.speakerList;
  }

  /** Match by name (case-insensitive) first, then by address */
  findSpeaker(nameOrAddress: string): WamSpeaker | undefined {
    const wanted = nameOrAddress.trim().toLowerCase();
    return this.speakerList.find(speaker => speaker.name.toLowerCase() === wanted)
      ?? this.speakerList.find(speaker => speaker.address === nameOrAddress.trim());
  }

  /**
   * Group speakers by name or address. The first one becomes the main speaker.
   */
  async createGroup(name: string, members: readonly string[]): Promise<GroupResult> {
    if (members.length < 2) {
      throw new InvalidArgumentError('A group needs at least two speakers', 'members', members);
    }
    const speakers = members.map(member => {
      const speaker = this.findSpeaker(member);
      if (!speaker) {
        throw new InvalidArgumentError(`Speaker '${member}' not found`, 'members', member);
      }
      return speaker;
    });
    return this.coordinator.createGroup(name, speakers);
  }

  /**
   * Ungroup every speaker that reports a group name. Failures are logged and
   * the remaining speakers are still tried.
   */
  async ungroupAll(): Promise<WamSpeaker[]> {
    const ungrouped: WamSpeaker[] = [];
    for (const speaker of this.speakerList.filter(s => s.groupName !== '')) {
      try {
        await this.coordinator.dissolveGroup(speaker);
        ungrouped.push(speaker);
      } catch (error) {
        logger.warn(`Ungrouping ${speaker.label} failed: ${getErrorMessage(error)}`);
      }
    }
    return ungrouped;
  }

  /**
   * Refresh every speaker, retrying those whose queries hit network errors.
   * A speaker that still fails keeps its last snapshot; nothing is thrown.
   */
  async refreshAll(): Promise<SpeakerSnapshot[]> {
    return Promise.all(this.speakerList.map(speaker => this.refreshWithRetry(speaker)));
  }

  async persist(): Promise<void> {
    await this.store.save(this.speakerList.map(speaker => speaker.toRecord()));
  }

  private async refreshWithRetry(speaker: WamSpeaker): Promise<SpeakerSnapshot> {
    const attempt: { last?: SpeakerSnapshot } = {};
    try {
      return await retry(async () => {
        const snapshot = await speaker.refresh();
        attempt.last = snapshot;
        const retryable = snapshot.kind === 'partial' ? snapshot.failures.find(f => isDefaultRetryable(f.error)) : undefined;
        if (retryable) {
          throw retryable.error;
        }
        return snapshot;
      }, this.options.retryOptions, `refresh ${speaker.address}`);
    } catch (error) {
      logger.warn(`Refreshing ${speaker.label} failed: ${getErrorMessage(error)}`);
      if (!attempt.last) {
        throw error;
      }
      return attempt.last;
    }
  }
}
