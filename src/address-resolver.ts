import { readFile } from 'fs/promises';
import { debugManager } from './utils/debug-manager.js';

export const DEFAULT_ARP_TABLE = '/proc/net/arp';

const EMPTY_MAC = '00:00:00:00:00:00';

/**
 * Maps a speaker's IP address to its hardware address
 */
export interface AddressResolver {
  resolveMac(address: string): Promise<string | null>;
}

/**
 * Lowercase, colon-separated form of a MAC address. Accepts any separator
 * (or none). Returns null for anything that is not 12 hex digits, and for
 * the all-zero address an incomplete neighbor entry carries.
 */
export function normalizeMac(value?: string | null): string | null {
  const cleaned = value?.trim().replace(/[^a-fA-F0-9]/g, '').toLowerCase();
  if (!cleaned || cleaned.length !== 12) {
    return null;
  }
  const mac = cleaned.match(/.{2}/g)?.join(':') ?? null;
  return mac === EMPTY_MAC ? null : mac;
}

/**
 * Parse the Linux neighbor table into address -> MAC pairs
 */
export function parseNeighborTable(content: string): Map<string, string> {
  const entries = new Map<string, string>();
  // First line is the column header
  for (const line of content.split('\n').slice(1)) {
    const columns = line.trim().split(/\s+/);
    const address = columns[0];
    const mac = normalizeMac(columns[3]);
    if (address && mac) {
      entries.set(address, mac);
    }
  }
  return entries;
}

/**
 * Looks addresses up in the kernel's neighbor table. A speaker that has just
 * answered an SSDP search or a WAM command will normally be present.
 */
export class NeighborTableResolver implements AddressResolver {
  constructor(private readonly tablePath: string = DEFAULT_ARP_TABLE) {}

  async resolveMac(address: string): Promise<string | null> {
    let content: string;
    try {
      content = await readFile(this.tablePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        debugManager.debug('discovery', `Neighbor table ${this.tablePath} not found, MAC unknown for ${address}`);
        return null;
      }
      throw error;
    }

    const mac = parseNeighborTable(content).get(address) ?? null;
    debugManager.trace('discovery', `Resolved ${address} -> ${mac ?? 'unknown'}`);
    return mac;
  }
}

/**
 * Fixed address -> MAC map, for installs with known hardware
 */
export class StaticAddressResolver implements AddressResolver {
  private readonly entries = new Map<string, string>();

  constructor(entries: Record<string, string> = {}) {
    for (const [address, mac] of Object.entries(entries)) {
      const normalized = normalizeMac(mac);
      if (normalized) {
        this.entries.set(address, normalized);
      }
    }
  }

  async resolveMac(address: string): Promise<string | null> {
    return this.entries.get(address) ?? null;
  }
}
