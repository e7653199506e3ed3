import fs from 'fs/promises';
import path from 'path';
import { debugManager } from './utils/debug-manager.js';
import { WamError, getErrorMessage } from './errors/wam-errors.js';
import type { OnOff, RepeatMode, StoredSpeaker } from './types/wam.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(entry: Record<string, unknown>, key: string, fallback: string): string {
  const value = entry[key];
  return typeof value === 'string' ? value : fallback;
}

function onOffField(entry: Record<string, unknown>, key: string): OnOff {
  return entry[key] === 'on' ? 'on' : 'off';
}

function repeatField(entry: Record<string, unknown>): RepeatMode {
  const value = entry.Repeat;
  return value === 'one' || value === 'all' ? value : 'off';
}

/**
 * Validate one stored entry. Only IPAddress is required; other fields fall
 * back to device defaults.
 */
function toStoredSpeaker(entry: unknown, index: number, file: string): StoredSpeaker {
  if (!isRecord(entry) || typeof entry.IPAddress !== 'string' || entry.IPAddress === '') {
    throw new WamError(`${file}: entry ${index} has no IPAddress`, 'CONFIG_ERROR');
  }
  const volume = entry.Volume;
  return {
    IPAddress: entry.IPAddress,
    Name: stringField(entry, 'Name', ''),
    LED: onOffField(entry, 'LED'),
    Mute: onOffField(entry, 'Mute'),
    Volume: typeof volume === 'number' && Number.isInteger(volume) ? volume : 10,
    GroupName: stringField(entry, 'GroupName', ''),
    Repeat: repeatField(entry),
    MAC: stringField(entry, 'MAC', '')
  };
}

/**
 * JSON file of known speakers, so a restart can skip discovery
 */
export class SpeakerStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<StoredSpeaker[]> {
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        debugManager.debug('store', `${this.filePath} not found, no stored speakers`);
        return [];
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      throw new WamError(`Invalid JSON in ${this.filePath}: ${getErrorMessage(error)}`, 'CONFIG_ERROR', { cause: error });
    }
    if (!Array.isArray(parsed)) {
      throw new WamError(`${this.filePath} must contain a JSON array`, 'CONFIG_ERROR');
    }

    const speakers = parsed.map((entry, i) => toStoredSpeaker(entry, i, this.filePath));
    debugManager.debug('store', `Loaded ${speakers.length} speaker(s) from ${this.filePath}`);
    return speakers;
  }

  async save(speakers: readonly StoredSpeaker[]): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    // Write to a temp file first then rename
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(speakers, null, 2));
    await fs.rename(tempPath, this.filePath);
    debugManager.debug('store', `Saved ${speakers.length} speaker(s) to ${this.filePath}`);
  }
}
