import { EventEmitter } from 'events';
import { InvalidArgumentError, ProtocolError } from './errors/wam-errors.js';
import { cdata, command, dec, str, type Command } from './protocol/command.js';
import type { WamClient } from './protocol/client.js';
import type { WamReply } from './protocol/response.js';
import { debugManager } from './utils/debug-manager.js';
import type {
  ApInfo,
  OnOff,
  PlaybackControl,
  PlayTime,
  RepeatMode,
  SnapshotFailure,
  SpeakerField,
  SpeakerSnapshot,
  SpeakerState,
  StoredSpeaker
} from './types/wam.js';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 30;
export const EQ_BAND_COUNT = 7;
export const EQ_BAND_MIN = -10;
export const EQ_BAND_MAX = 10;

/**
 * Built-in 7-band EQ presets by name. Lookup is case-insensitive.
 */
export const EQ_PRESETS = {
  'none': 0,
  'pop': 1,
  'jazz': 2,
  'classic': 3,
  'custom 1': 4,
  'custom 2': 5
} as const satisfies Record<string, number>;

const MAX_EQ_PRESET_INDEX = 5;

/** Commands a refresh sends, in order */
export const REFRESH_COMMANDS = [
  'GetSpkName',
  'GetLed',
  'GetMute',
  'GetVolume',
  'GetGroupName',
  'GetApInfo',
  'GetRepeatMode'
] as const;

export const DEFAULT_STATE: Readonly<SpeakerState> = {
  name: '',
  led: 'off',
  mute: 'off',
  volume: 10,
  groupName: '',
  repeat: 'off',
  ssid: ''
};

const STATE_FIELDS: readonly SpeakerField[] = ['name', 'led', 'mute', 'volume', 'groupName', 'repeat', 'ssid'];
const ON_OFF: readonly string[] = ['on', 'off'];
const REPEAT_MODES: readonly string[] = ['off', 'one', 'all'];

function isOnOff(value: unknown): value is OnOff {
  return typeof value === 'string' && ON_OFF.includes(value);
}

function isRepeatMode(value: unknown): value is RepeatMode {
  return typeof value === 'string' && REPEAT_MODES.includes(value);
}

function assertOnOff(field: string, value: unknown): asserts value is OnOff {
  if (!isOnOff(value)) {
    throw new InvalidArgumentError(`${field} must be 'on' or 'off'`, field, value);
  }
}

function assertIndex(field: string, value: number, max = MAX_EQ_PRESET_INDEX): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidArgumentError(`${field} must be an integer between 0 and ${max}`, field, value);
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Resolve an EQ preset name or index to the index the device expects
 */
export function resolveEqPreset(preset: string | number): number {
  if (typeof preset === 'number') {
    assertIndex('presetindex', preset);
    return preset;
  }
  const key = preset.trim().toLowerCase();
  const match = Object.entries(EQ_PRESETS).find(([name]) => name === key);
  if (!match) {
    throw new InvalidArgumentError(`Unknown EQ preset: ${preset}`, 'presetindex', preset);
  }
  return match[1];
}

export interface WamSpeakerOptions {
  address: string;
  mac?: string;
  state?: Partial<SpeakerState>;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export declare interface WamSpeaker {
  on(event: 'state-change', listener: (state: SpeakerState, previous: SpeakerState) => void): this;
}

/**
 * One WAM speaker on the network. Holds a snapshot of the device's state
 * and exposes one method per device command.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class WamSpeaker extends EventEmitter {
  public readonly address: string;
  public mac: string;
  private current: SpeakerState;

  constructor(private readonly client: WamClient, options: WamSpeakerOptions) {
    super();
    this.address = options.address;
    this.mac = options.mac ?? '';
    this.current = { ...DEFAULT_STATE, ...options.state };
  }

  static fromRecord(client: WamClient, record: StoredSpeaker): WamSpeaker {
    return new WamSpeaker(client, {
      address: record.IPAddress,
      mac: record.MAC,
      state: {
        name: record.Name,
        led: record.LED,
        mute: record.Mute,
        volume: record.Volume,
        groupName: record.GroupName,
        repeat: record.Repeat
      }
    });
  }

  get state(): Readonly<SpeakerState> {
    return this.current;
  }

  get name(): string {
    return this.current.name;
  }

  get groupName(): string {
    return this.current.groupName;
  }

  /** Display name, falling back to the address for unnamed speakers */
  get label(): string {
    return this.current.name || this.address;
  }

  toRecord(): StoredSpeaker {
    return {
      IPAddress: this.address,
      Name: this.current.name,
      LED: this.current.led,
      Mute: this.current.mute,
      Volume: this.current.volume,
      GroupName: this.current.groupName,
      Repeat: this.current.repeat,
      MAC: this.mac
    };
  }

  async send(cmd: Command): Promise<WamReply> {
    return this.client.execute(this.address, cmd);
  }

  private update(patch: Partial<SpeakerState>): void {
    const previous = this.current;
    const next = { ...previous, ...patch };
    const changed = STATE_FIELDS.some(field => next[field] !== previous[field]);
    this.current = next;
    if (changed) {
      this.emit('state-change', next, previous);
    }
  }

  /**
   * Re-query every mirrored field, one command at a time. Not atomic: the
   * device may change between queries. Failed fields keep their previous value.
   */
  async refresh(): Promise<SpeakerSnapshot> {
    const queries: Array<{ field: SpeakerField; command: string; read: () => Promise<Partial<SpeakerState>> }> = [
      { field: 'name', command: 'GetSpkName', read: async () => ({ name: await this.getName() }) },
      { field: 'led', command: 'GetLed', read: async () => ({ led: await this.getLed() }) },
      { field: 'mute', command: 'GetMute', read: async () => ({ mute: await this.getMute() }) },
      { field: 'volume', command: 'GetVolume', read: async () => ({ volume: await this.getVolume() }) },
      { field: 'groupName', command: 'GetGroupName', read: async () => ({ groupName: await this.getGroupName() }) },
      { field: 'ssid', command: 'GetApInfo', read: async () => ({ ssid: (await this.getApInfo()).ssid }) },
      { field: 'repeat', command: 'GetRepeatMode', read: async () => ({ repeat: await this.getRepeatMode() }) }
    ];

    const failures: SnapshotFailure[] = [];
    for (const query of queries) {
      try {
        this.update(await query.read());
      } catch (error) {
        debugManager.debug('discovery', `${this.address}: ${query.command} failed`, { error: toError(error).message });
        failures.push({ field: query.field, command: query.command, error: toError(error) });
      }
    }

    const state = { ...this.current };
    return failures.length === 0
      ? { kind: 'complete', address: this.address, state }
      : { kind: 'partial', address: this.address, state, failures };
  }

  // Name
  async getName(): Promise<string> {
    const reply = await this.send(command('GetSpkName'));
    const name = reply.text('spkname');
    this.update({ name });
    return name;
  }

  async setName(name: string): Promise<void> {
    if (name.trim() === '') {
      throw new InvalidArgumentError('Speaker name must not be empty', 'spkname', name);
    }
    await this.send(command('SetSpkName', cdata('spkname', name)));
    this.update({ name });
  }

  // Volume
  /**
   * Sets the volume. Values above 30 are clamped to 30; negative or
   * fractional values are rejected before anything is sent.
   */
  async setVolume(level: number): Promise<number> {
    if (!Number.isInteger(level) || level < MIN_VOLUME) {
      throw new InvalidArgumentError(`Volume must be a non-negative integer, got ${level}`, 'volume', level);
    }
    const clamped = Math.min(MAX_VOLUME, level);
    await this.send(command('SetVolume', dec('volume', clamped)));
    this.update({ volume: clamped });
    return clamped;
  }

  async getVolume(): Promise<number> {
    const reply = await this.send(command('GetVolume'));
    const volume = reply.integer('volume');
    this.update({ volume });
    return volume;
  }

  // Mute
  async setMute(value: string): Promise<void> {
    assertOnOff('mute', value);
    await this.send(command('SetMute', str('mute', value)));
    this.update({ mute: value });
  }

  async getMute(): Promise<OnOff> {
    const reply = await this.send(command('GetMute'));
    const mute = this.readOnOff(reply, 'mute');
    this.update({ mute });
    return mute;
  }

  // LED
  async setLed(value: string): Promise<void> {
    assertOnOff('led', value);
    await this.send(command('SetLed', str('option', value)));
    this.update({ led: value });
  }

  async getLed(): Promise<OnOff> {
    const reply = await this.send(command('GetLed'));
    const led = this.readOnOff(reply, 'led');
    this.update({ led });
    return led;
  }

  // Playback
  private async playbackControl(control: PlaybackControl): Promise<void> {
    await this.send(command('SetPlaybackControl', str('playbackcontrol', control)));
  }

  async play(): Promise<void> {
    await this.playbackControl('play');
  }

  async resume(): Promise<void> {
    await this.playbackControl('resume');
  }

  async pause(): Promise<void> {
    await this.playbackControl('pause');
  }

  async nextTrack(): Promise<void> {
    await this.playbackControl('next');
  }

  async previousTrack(): Promise<void> {
    await this.playbackControl('previous');
  }

  /**
   * Starts playback of a stream URL. The device fetches the stream itself;
   * nothing here checks that the URL is reachable.
   */
  async playFromUrl(url: string, resume = false): Promise<void> {
    if (url.trim() === '') {
      throw new InvalidArgumentError('URL must not be empty', 'url', url);
    }
    await this.send(command(
      'SetUrlPlayback',
      cdata('url', url),
      dec('buffersize', 0),
      dec('seektime', 0),
      dec('resume', resume ? 1 : 0)
    ));
  }

  async seek(seconds: number): Promise<void> {
    if (!Number.isInteger(seconds) || seconds < 0) {
      throw new InvalidArgumentError('Play time must be a non-negative integer', 'playtime', seconds);
    }
    await this.send(command('SetSearchTime', dec('playtime', seconds)));
  }

  async getPlayTime(): Promise<PlayTime> {
    const reply = await this.send(command('GetCurrentPlayTime'));
    return {
      elapsed: reply.integer('playtime'),
      total: reply.optionalInteger('timelength')
    };
  }

  async getMusicInfo(): Promise<WamReply> {
    return this.send(command('GetMusicInfo'));
  }

  // Repeat and shuffle
  async setRepeatMode(mode: string): Promise<void> {
    if (!isRepeatMode(mode)) {
      throw new InvalidArgumentError(`Repeat mode must be one of ${REPEAT_MODES.join(', ')}`, 'repeatmode', mode);
    }
    await this.send(command('SetRepeatMode', str('repeatmode', mode)));
    this.update({ repeat: mode });
  }

  async repeatOne(): Promise<void> {
    await this.setRepeatMode('one');
  }

  async repeatAll(): Promise<void> {
    await this.setRepeatMode('all');
  }

  async repeatOff(): Promise<void> {
    await this.setRepeatMode('off');
  }

  async getRepeatMode(): Promise<RepeatMode> {
    const reply = await this.send(command('GetRepeatMode'));
    const repeat = reply.text('repeat');
    if (!isRepeatMode(repeat)) {
      throw new ProtocolError(`unexpected repeat mode "${repeat}"`, 'GetRepeatMode', reply.rawResponse);
    }
    this.update({ repeat });
    return repeat;
  }

  async setShuffle(enabled: boolean): Promise<void> {
    await this.send(command('SetShuffleMode', str('shufflemode', enabled ? 'on' : 'off')));
  }

  // Grouping
  async getGroupName(): Promise<string> {
    const reply = await this.send(command('GetGroupName'));
    const groupName = reply.text('groupname');
    this.update({ groupName });
    return groupName;
  }

  /**
   * Leaves any group. Accepted by an ungrouped speaker as well.
   */
  async ungroup(): Promise<void> {
    await this.send(command('SetUngroup'));
    this.update({ groupName: '' });
  }

  /** Records a group name the device accepted on this speaker's behalf */
  markGrouped(groupName: string): void {
    this.update({ groupName });
  }

  // Network
  async getApInfo(): Promise<ApInfo> {
    const reply = await this.send(command('GetApInfo'));
    const info: ApInfo = {
      ssid: reply.text('ssid'),
      bssid: reply.optionalText('bssid'),
      channel: reply.optionalInteger('channel')
    };
    this.update({ ssid: info.ssid });
    return info;
  }

  // Equalizer
  async getEqMode(): Promise<WamReply> {
    return this.send(command('GetEQMode'));
  }

  async setEqMode(mode: string): Promise<void> {
    if (mode.trim() === '') {
      throw new InvalidArgumentError('EQ mode must not be empty', 'eqmode', mode);
    }
    await this.send(command('SetEQMode', str('eqmode', mode)));
  }

  async get7BandEqList(): Promise<WamReply> {
    return this.send(command('Get7BandEQList'));
  }

  /**
   * Selects a 7-band preset by name (None, Pop, Jazz, Classic, Custom 1,
   * Custom 2) or index 0-5. Unknown names are rejected.
   */
  async set7BandPreset(preset: string | number): Promise<number> {
    const index = resolveEqPreset(preset);
    await this.send(command('Set7bandEQMode', dec('presetindex', index)));
    return index;
  }

  async set7BandValues(presetIndex: number, values: readonly number[]): Promise<void> {
    assertIndex('presetindex', presetIndex);
    if (values.length !== EQ_BAND_COUNT) {
      throw new InvalidArgumentError(`Exactly ${EQ_BAND_COUNT} EQ values are required, got ${values.length}`, 'eqvalue', values);
    }
    values.forEach((value, i) => {
      if (!Number.isInteger(value) || value < EQ_BAND_MIN || value > EQ_BAND_MAX) {
        throw new InvalidArgumentError(
          `EQ band ${i + 1} must be an integer between ${EQ_BAND_MIN} and ${EQ_BAND_MAX}`,
          `eqvalue${i + 1}`,
          value
        );
      }
    });
    await this.send(command(
      'Set7bandEQValue',
      dec('presetindex', presetIndex),
      ...values.map((value, i) => dec(`eqvalue${i + 1}`, value))
    ));
  }

  async addCustomEqMode(presetIndex: number, presetName: string): Promise<void> {
    assertIndex('presetindex', presetIndex);
    if (presetName.trim() === '') {
      throw new InvalidArgumentError('Preset name must not be empty', 'presetname', presetName);
    }
    await this.send(command('AddCustomEQMode', dec('presetindex', presetIndex), str('presetname', presetName)));
  }

  async removeCustomEqMode(presetIndex: number): Promise<void> {
    assertIndex('presetindex', presetIndex);
    await this.send(command('DelCustomEQMode', dec('presetindex', presetIndex)));
  }

  // Content providers
  async getCpInfo(): Promise<WamReply> {
    return this.send(command('GetCpInfo'));
  }

  async getRadioInfo(): Promise<WamReply> {
    return this.send(command('GetRadioInfo'));
  }

  private readOnOff(reply: WamReply, field: string): OnOff {
    const value = reply.text(field);
    if (!isOnOff(value)) {
      throw new ProtocolError(`unexpected ${field} value "${value}"`, reply.command, reply.rawResponse);
    }
    return value;
  }
}
