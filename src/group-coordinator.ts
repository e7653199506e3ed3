import logger from './utils/logger.js';
import { debugManager } from './utils/debug-manager.js';
import { GroupingError, InvalidArgumentError, WamError, getErrorMessage } from './errors/wam-errors.js';
import { cdata, command, dec, str, type Command } from './protocol/command.js';
import type { WamSpeaker } from './wam-speaker.js';

const UNKNOWN_MAC = '00:00:00:00:00:00';

export type GroupRole = 'ungrouped' | 'grouping' | 'grouped-main' | 'grouped-sub';

export interface Group {
  name: string;
  main: WamSpeaker;
  subs: WamSpeaker[];
  members: WamSpeaker[];
}

interface FailureContext {
  groupName: string;
  members: WamSpeaker[];
  step: number;
  error: Error;
}

/**
 * Outcome of a grouping attempt. On failure `step` is the zero-based index
 * of the step that failed: one ungroup per member in order, then the group
 * command. Steps before it completed and are not rolled back.
 */
export type GroupResult =
  | { kind: 'grouped'; group: Group }
  | (FailureContext & { kind: 'ungroup-failed'; speaker: WamSpeaker })
  | (FailureContext & { kind: 'group-command-failed' });

export type GroupFailure = Exclude<GroupResult, { kind: 'grouped' }>;

export interface CreateGroupOptions {
  // Step to start from; earlier steps are assumed done
  fromStep?: number;
}

/**
 * The SetMultispkGroup command sent to the main speaker
 */
export function buildGroupCommand(name: string, main: WamSpeaker, subs: readonly WamSpeaker[]): Command {
  return command(
    'SetMultispkGroup',
    cdata('name', name),
    dec('index', 1),
    str('type', 'main'),
    dec('spknum', subs.length + 1),
    str('audiosourcemacaddr', main.mac || UNKNOWN_MAC),
    cdata('audiosourcename', main.name),
    str('audiosourcetype', 'speaker'),
    ...subs.flatMap(sub => [
      str('subspkip', sub.address),
      str('subspkmacaddr', sub.mac || UNKNOWN_MAC)
    ])
  );
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

interface TrackedGroup {
  name: string;
  main: WamSpeaker;
  subs: WamSpeaker[];
}

/**
 * Runs the grouping sequence and tracks each speaker's role in groups it made.
 * Speakers it has not grouped report `ungrouped`.
 */
export class GroupCoordinator {
  // Keyed by main speaker address
  private readonly groups = new Map<string, TrackedGroup>();
  private readonly inFlight = new Set<string>();

  roleOf(speaker: WamSpeaker): GroupRole {
    if (this.inFlight.has(speaker.address)) {
      return 'grouping';
    }
    if (this.groups.has(speaker.address)) {
      return 'grouped-main';
    }
    return this.groupWithSub(speaker.address) ? 'grouped-sub' : 'ungrouped';
  }

  /**
   * Ungroups every member, then sends the group command to the first one.
   * The first member becomes the main speaker; the rest are subs.
   */
  async createGroup(name: string, members: readonly WamSpeaker[], options: CreateGroupOptions = {}): Promise<GroupResult> {
    this.validate(name, members);

    const fromStep = options.fromStep ?? 0;
    if (!Number.isInteger(fromStep) || fromStep < 0 || fromStep > members.length) {
      throw new InvalidArgumentError(`fromStep must be between 0 and ${members.length}`, 'fromStep', fromStep);
    }

    const busy = members.find(member => this.roleOf(member) === 'grouping');
    if (busy) {
      throw new WamError(`${busy.label} is already being grouped`, 'GROUP_BUSY');
    }

    const [main, ...subs] = members;
    if (!main) {
      throw new InvalidArgumentError('A group needs at least one speaker', 'members', members);
    }

    members.forEach(member => this.inFlight.add(member.address));
    debugManager.info('group', `Creating group "${name}" on ${main.label} with ${subs.length} sub speaker(s), from step ${fromStep}`);

    for (let step = fromStep; step < members.length; step++) {
      const speaker = members[step];
      if (!speaker) {
        continue;
      }
      try {
        debugManager.debug('group', `Step ${step}: ungroup ${speaker.label}`);
        await speaker.ungroup();
        this.detach(speaker);
      } catch (error) {
        this.release(members);
        logger.warn(`Grouping "${name}" failed at step ${step} (ungroup ${speaker.label}): ${getErrorMessage(error)}`);
        return { kind: 'ungroup-failed', groupName: name, members: [...members], step, speaker, error: toError(error) };
      }
    }

    const groupStep = members.length;
    try {
      debugManager.debug('group', `Step ${groupStep}: SetMultispkGroup on ${main.label}`);
      await main.send(buildGroupCommand(name, main, subs));
    } catch (error) {
      this.release(members);
      logger.warn(`Grouping "${name}" failed at step ${groupStep} (group command): ${getErrorMessage(error)}`);
      return { kind: 'group-command-failed', groupName: name, members: [...members], step: groupStep, error: toError(error) };
    }

    this.release(members);
    this.groups.set(main.address, { name, main, subs: [...subs] });
    for (const member of members) {
      member.markGrouped(name);
    }

    debugManager.info('group', `Group "${name}" created`);
    return { kind: 'grouped', group: { name, main, subs, members: [...members] } };
  }

  /** Continues a failed attempt from the step that failed */
  async resumeGroup(failure: GroupFailure): Promise<GroupResult> {
    return this.createGroup(failure.groupName, failure.members, { fromStep: failure.step });
  }

  async createGroupOrThrow(name: string, members: readonly WamSpeaker[], options: CreateGroupOptions = {}): Promise<Group> {
    const result = await this.createGroup(name, members, options);
    switch (result.kind) {
      case 'grouped':
        return result.group;
      case 'ungroup-failed':
        throw new GroupingError(
          `Could not ungroup ${result.speaker.label} while creating group "${name}"`,
          name,
          result.step,
          result.speaker.address,
          result.error
        );
      case 'group-command-failed':
        throw new GroupingError(
          `Group command for "${name}" failed`,
          name,
          result.step,
          result.members[0]?.address ?? '',
          result.error
        );
    }
  }

  /**
   * Ungroups one speaker. On a main speaker the device breaks up the whole
   * group; on a sub only that speaker leaves.
   */
  async dissolveGroup(speaker: WamSpeaker): Promise<void> {
    await speaker.ungroup();
    this.detach(speaker);
    debugManager.info('group', `${speaker.label} left its group`);
  }

  private validate(name: string, members: readonly WamSpeaker[]): void {
    if (name.trim() === '') {
      throw new InvalidArgumentError('Group name must not be empty', 'name', name);
    }
    if (members.length === 0) {
      throw new InvalidArgumentError('A group needs at least one speaker', 'members', members);
    }
    const seen = new Set<string>();
    for (const member of members) {
      if (seen.has(member.address)) {
        throw new InvalidArgumentError(`Speaker ${member.address} is listed twice`, 'members', member.address);
      }
      seen.add(member.address);
    }
  }

  private release(members: readonly WamSpeaker[]): void {
    members.forEach(member => this.inFlight.delete(member.address));
  }

  private groupWithSub(address: string): TrackedGroup | undefined {
    for (const group of this.groups.values()) {
      if (group.subs.some(sub => sub.address === address)) {
        return group;
      }
    }
    return undefined;
  }

  /**
   * Drops a speaker that has just been ungrouped from the group it was in.
   * A main takes its subs with it, and a main left without subs is ungrouped.
   */
  private detach(speaker: WamSpeaker): void {
    const led = this.groups.get(speaker.address);
    if (led) {
      this.groups.delete(speaker.address);
      led.subs.forEach(sub => sub.markGrouped(''));
      debugManager.debug('group', `Group "${led.name}" dissolved with its main speaker ${speaker.label}`);
      return;
    }

    const group = this.groupWithSub(speaker.address);
    if (!group) {
      return;
    }
    group.subs = group.subs.filter(sub => sub.address !== speaker.address);
    if (group.subs.length === 0) {
      this.groups.delete(group.main.address);
      group.main.markGrouped('');
      debugManager.debug('group', `Group "${group.name}" has no sub speakers left`);
    }
  }
}
