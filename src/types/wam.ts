export type OnOff = 'on' | 'off';

export type RepeatMode = 'off' | 'one' | 'all';

export type PlaybackControl = 'play' | 'resume' | 'pause' | 'next' | 'previous';

/**
 * Mirrored device state. The speaker is authoritative; these values are a
 * snapshot valid until the next refresh or command.
 */
export interface SpeakerState {
  name: string;
  led: OnOff;
  mute: OnOff;
  volume: number;
  groupName: string;
  repeat: RepeatMode;
  ssid: string;
}

export type SpeakerField = keyof SpeakerState;

export interface SnapshotFailure {
  field: SpeakerField;
  command: string;
  error: Error;
}

/**
 * Result of one refresh pass. `partial` means at least one query failed and
 * the listed fields still carry their previous values.
 */
export type SpeakerSnapshot =
  | { kind: 'complete'; address: string; state: SpeakerState }
  | { kind: 'partial'; address: string; state: SpeakerState; failures: SnapshotFailure[] };

export interface ApInfo {
  ssid: string;
  bssid?: string;
  channel?: number;
}

export interface PlayTime {
  elapsed: number;
  total?: number;
}

/**
 * Record layout of the speaker list file
 */
export interface StoredSpeaker {
  IPAddress: string;
  Name: string;
  LED: OnOff;
  Mute: OnOff;
  Volume: number;
  GroupName: string;
  Repeat: RepeatMode;
  MAC: string;
}

export interface Config {
  logLevel: string;
  debugCategories?: string[];
  // Local interface address discovery binds to; the OS picks one when unset
  interfaceAddress?: string;
  discoveryTimeout: number;
  httpTimeout: number;
  port: number;
  speakersFile: string;
  arpTable: string;
}
