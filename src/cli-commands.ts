import { InvalidArgumentError } from './errors/wam-errors.js';
import type { WamController } from './controller.js';
import type { WamSpeaker } from './wam-speaker.js';

export type Output = (line: string) => void;

export const USAGE = [
  'Usage: wam <command> [arguments]',
  '',
  'Commands:',
  '  discover [timeoutMs]                 Search the network and save the speaker list',
  '  list                                 List known speakers',
  '  info <speaker>                       Refresh and show a speaker\'s state',
  '  volume <speaker> [0-30]              Get or set the volume',
  '  mute <speaker> [on|off]              Get or set mute',
  '  led <speaker> [on|off]               Get or set the LED',
  '  repeat <speaker> [off|one|all]       Get or set the repeat mode',
  '  playback <speaker> <play|pause|resume|next|prev>',
  '  group create <name> <speaker> <speaker>...',
  '  group ungroup                        Ungroup every grouped speaker'
].join('\n');

function formatSpeaker(speaker: WamSpeaker): string {
  const group = speaker.groupName ? ` [${speaker.groupName}]` : '';
  return `${speaker.label} (${speaker.address})${group}`;
}

function requireSpeaker(controller: WamController, nameOrAddress: string | undefined): WamSpeaker {
  if (!nameOrAddress) {
    throw new InvalidArgumentError('A speaker name or address is required', 'speaker');
  }
  const speaker = controller.findSpeaker(nameOrAddress);
  if (!speaker) {
    throw new InvalidArgumentError(`Speaker '${nameOrAddress}' not found`, 'speaker', nameOrAddress);
  }
  return speaker;
}

function parseInteger(field: string, value: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new InvalidArgumentError(`${field} must be an integer, got '${value}'`, field, value);
  }
  return parseInt(value, 10);
}

/**
 * Run one command line against the controller. Every command except
 * `discover` works from the stored speaker list.
 */
export async function runCommand(controller: WamController, args: readonly string[], write: Output): Promise<void> {
  const [name, ...rest] = args;

  if (name === undefined || name === 'help' || name === '--help') {
    write(USAGE);
    return;
  }

  if (name === 'discover') {
    const timeout = rest[0] === undefined ? undefined : parseInteger('timeout', rest[0]);
    const speakers = await controller.start({ timeout });
    await controller.persist();
    write(`Found ${speakers.length} speaker(s)`);
    speakers.forEach(speaker => write(formatSpeaker(speaker)));
    return;
  }

  controller.merge([], await controller.loadStored());

  switch (name) {
    case 'list':
      if (controller.speakers.length === 0) {
        write('No speakers known, run discover first');
      }
      controller.speakers.forEach(speaker => write(formatSpeaker(speaker)));
      return;

    case 'info': {
      const speaker = requireSpeaker(controller, rest[0]);
      const snapshot = await speaker.refresh();
      write(JSON.stringify({ address: speaker.address, mac: speaker.mac, ...snapshot.state }, null, 2));
      if (snapshot.kind === 'partial') {
        write(`Could not read: ${snapshot.failures.map(f => f.field).join(', ')}`);
      }
      break;
    }

    case 'volume': {
      const speaker = requireSpeaker(controller, rest[0]);
      if (rest[1] === undefined) {
        write(`${speaker.label} volume: ${await speaker.getVolume()}`);
        return;
      }
      const level = await speaker.setVolume(parseInteger('volume', rest[1]));
      write(`${speaker.label} volume set to ${level}`);
      break;
    }

    case 'mute':
    case 'led': {
      const speaker = requireSpeaker(controller, rest[0]);
      const value = rest[1];
      if (value === undefined) {
        const current = name === 'mute' ? await speaker.getMute() : await speaker.getLed();
        write(`${speaker.label} ${name}: ${current}`);
        return;
      }
      await (name === 'mute' ? speaker.setMute(value) : speaker.setLed(value));
      write(`${speaker.label} ${name} ${value}`);
      break;
    }

    case 'repeat': {
      const speaker = requireSpeaker(controller, rest[0]);
      if (rest[1] === undefined) {
        write(`${speaker.label} repeat: ${await speaker.getRepeatMode()}`);
        return;
      }
      await speaker.setRepeatMode(rest[1]);
      write(`${speaker.label} repeat ${rest[1]}`);
      break;
    }

    case 'playback': {
      const speaker = requireSpeaker(controller, rest[0]);
      const action = rest[1];
      switch (action) {
        case 'play': await speaker.play(); break;
        case 'pause': await speaker.pause(); break;
        case 'resume': await speaker.resume(); break;
        case 'next': await speaker.nextTrack(); break;
        case 'prev': await speaker.previousTrack(); break;
        default:
          throw new InvalidArgumentError(`Unknown playback action '${action ?? ''}'`, 'action', action);
      }
      write(`${speaker.label}: ${action}`);
      return;
    }

    case 'group': {
      const [action, groupName, ...members] = rest;
      if (action === 'ungroup') {
        const ungrouped = await controller.ungroupAll();
        write(`Ungrouped ${ungrouped.length} speaker(s)`);
      } else if (action === 'create' && groupName) {
        const result = await controller.createGroup(groupName, members);
        if (result.kind !== 'grouped') {
          throw result.error;
        }
        write(`Group "${groupName}" created on ${result.group.main.label}`);
      } else {
        throw new InvalidArgumentError('Use: group create <name> <speaker>... or group ungroup', 'action', action);
      }
      break;
    }

    default:
      throw new InvalidArgumentError(`Unknown command '${name}'\n\n${USAGE}`, 'command', name);
  }

  await controller.persist();
}
