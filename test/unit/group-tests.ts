import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { GroupCoordinator, buildGroupCommand } from '../../src/group-coordinator.js';
import { WamSpeaker } from '../../src/wam-speaker.js';
import { cdata, dec, str } from '../../src/protocol/command.js';
import { GroupingError, InvalidArgumentError, ProtocolError, WamError } from '../../src/errors/wam-errors.js';
import { MockTransport, createMockClient, speakerState, wamReply } from '../helpers/mock-factory.js';

const KITCHEN = '192.168.1.40';
const OFFICE = '192.168.1.41';
const PATIO = '192.168.1.42';

describe('Group Coordinator', () => {
  let transport: MockTransport;
  let coordinator: GroupCoordinator;
  let kitchen: WamSpeaker;
  let office: WamSpeaker;
  let patio: WamSpeaker;

  beforeEach(() => {
    const mock = createMockClient();
    transport = mock.transport;
    coordinator = new GroupCoordinator();
    kitchen = new WamSpeaker(mock.client, { address: KITCHEN, mac: 'aa:bb:cc:dd:ee:01', state: speakerState({ name: 'Kitchen' }) });
    office = new WamSpeaker(mock.client, { address: OFFICE, state: speakerState({ name: 'Office' }) });
    patio = new WamSpeaker(mock.client, { address: PATIO, mac: 'aa:bb:cc:dd:ee:03', state: speakerState({ name: 'Patio' }) });
  });

  function sent(): string[] {
    return transport.requests.map(r => `${r.address} ${r.command.name}`);
  }

  describe('createGroup', () => {
    it('should ungroup every member, then group on the main speaker', async () => {
      const result = await coordinator.createGroup('Downstairs', [kitchen, office, patio]);

      assert.deepStrictEqual(sent(), [
        `${KITCHEN} SetUngroup`,
        `${OFFICE} SetUngroup`,
        `${PATIO} SetUngroup`,
        `${KITCHEN} SetMultispkGroup`
      ]);
      assert.strictEqual(result.kind, 'grouped');
      if (result.kind !== 'grouped') return;
      assert.strictEqual(result.group.name, 'Downstairs');
      assert.strictEqual(result.group.main, kitchen);
      assert.deepStrictEqual(result.group.subs.map(s => s.address), [OFFICE, PATIO]);
      assert.deepStrictEqual(result.group.members.map(s => s.address), [KITCHEN, OFFICE, PATIO]);
    });

    it('should send the group parameters in order', async () => {
      await coordinator.createGroup('Downstairs', [kitchen, office, patio]);

      assert.deepStrictEqual(transport.lastCommand('SetMultispkGroup')?.params, [
        cdata('name', 'Downstairs'),
        dec('index', 1),
        str('type', 'main'),
        dec('spknum', 3),
        str('audiosourcemacaddr', 'aa:bb:cc:dd:ee:01'),
        cdata('audiosourcename', 'Kitchen'),
        str('audiosourcetype', 'speaker'),
        str('subspkip', OFFICE),
        str('subspkmacaddr', '00:00:00:00:00:00'),
        str('subspkip', PATIO),
        str('subspkmacaddr', 'aa:bb:cc:dd:ee:03')
      ]);
    });

    it('should use the all-zero MAC for a main speaker without one', () => {
      const cmd = buildGroupCommand('Solo', office, []);
      assert.deepStrictEqual(cmd.params[3], dec('spknum', 1));
      assert.deepStrictEqual(cmd.params[4], str('audiosourcemacaddr', '00:00:00:00:00:00'));
      assert.strictEqual(cmd.params.length, 7);
    });

    it('should record roles and group names on success', async () => {
      await coordinator.createGroup('Downstairs', [kitchen, office]);

      assert.strictEqual(coordinator.roleOf(kitchen), 'grouped-main');
      assert.strictEqual(coordinator.roleOf(office), 'grouped-sub');
      assert.strictEqual(coordinator.roleOf(patio), 'ungrouped');
      assert.strictEqual(kitchen.groupName, 'Downstairs');
      assert.strictEqual(office.groupName, 'Downstairs');
    });

    it('should report members as grouping while the sequence runs', async () => {
      const pending = coordinator.createGroup('Downstairs', [kitchen, office]);
      assert.strictEqual(coordinator.roleOf(kitchen), 'grouping');
      assert.strictEqual(coordinator.roleOf(office), 'grouping');
      await pending;
    });

    it('should refuse to group a speaker that is already being grouped', async () => {
      const pending = coordinator.createGroup('Downstairs', [kitchen, office]);
      await assert.rejects(
        coordinator.createGroup('Upstairs', [patio, office]),
        (error: unknown) => error instanceof WamError && error.code === 'GROUP_BUSY'
      );
      await pending;
    });

    it('should validate its arguments before sending anything', async () => {
      await assert.rejects(coordinator.createGroup('  ', [kitchen]), InvalidArgumentError);
      await assert.rejects(coordinator.createGroup('Empty', []), InvalidArgumentError);
      await assert.rejects(coordinator.createGroup('Twice', [kitchen, kitchen]), {
        name: 'InvalidArgumentError',
        message: `Speaker ${KITCHEN} is listed twice`
      });
      await assert.rejects(coordinator.createGroup('Late', [kitchen, office], { fromStep: 3 }), InvalidArgumentError);
      assert.strictEqual(transport.requests.length, 0);
    });
  });

  describe('failures', () => {
    it('should stop at the first failed ungroup and say which step failed', async () => {
      transport.fail('SetUngroup', OFFICE);

      const result = await coordinator.createGroup('Downstairs', [kitchen, office, patio]);

      assert.strictEqual(result.kind, 'ungroup-failed');
      if (result.kind !== 'ungroup-failed') return;
      assert.strictEqual(result.step, 1);
      assert.strictEqual(result.speaker, office);
      assert.deepStrictEqual(sent(), [`${KITCHEN} SetUngroup`, `${OFFICE} SetUngroup`]);
      assert.strictEqual(coordinator.roleOf(kitchen), 'ungrouped');
      assert.strictEqual(coordinator.roleOf(office), 'ungrouped');
    });

    it('should resume from the failed step', async () => {
      transport.fail('SetUngroup', OFFICE);
      const failure = await coordinator.createGroup('Downstairs', [kitchen, office, patio]);
      assert.notStrictEqual(failure.kind, 'grouped');
      if (failure.kind === 'grouped') return;

      transport.reply('SetUngroup', wamReply('SetUngroup'), OFFICE);
      const before = transport.requests.length;
      const result = await coordinator.resumeGroup(failure);

      assert.strictEqual(result.kind, 'grouped');
      assert.deepStrictEqual(sent().slice(before), [
        `${OFFICE} SetUngroup`,
        `${PATIO} SetUngroup`,
        `${KITCHEN} SetMultispkGroup`
      ]);
    });

    it('should report a rejected group command', async () => {
      transport.reply('SetMultispkGroup', wamReply('SetMultispkGroup', '', { result: 'ng' }), KITCHEN);

      const result = await coordinator.createGroup('Downstairs', [kitchen, office]);

      assert.strictEqual(result.kind, 'group-command-failed');
      if (result.kind !== 'group-command-failed') return;
      assert.strictEqual(result.step, 2);
      assert(result.error instanceof ProtocolError);
      assert.strictEqual(kitchen.groupName, '');
      assert.strictEqual(coordinator.roleOf(kitchen), 'ungrouped');
    });

    it('should throw a GroupingError when asked to', async () => {
      transport.fail('SetUngroup', OFFICE);

      await assert.rejects(
        coordinator.createGroupOrThrow('Downstairs', [kitchen, office]),
        (error: unknown) => error instanceof GroupingError
          && error.step === 1
          && error.speakerAddress === OFFICE
          && error.groupName === 'Downstairs'
      );
    });
  });

  describe('dissolveGroup', () => {
    it('should ungroup only the given sub speaker', async () => {
      await coordinator.createGroup('Downstairs', [kitchen, office, patio]);
      const before = transport.requests.length;

      await coordinator.dissolveGroup(office);

      assert.deepStrictEqual(sent().slice(before), [`${OFFICE} SetUngroup`]);
      assert.strictEqual(coordinator.roleOf(office), 'ungrouped');
      assert.strictEqual(office.groupName, '');
      assert.strictEqual(coordinator.roleOf(kitchen), 'grouped-main');
      assert.strictEqual(coordinator.roleOf(patio), 'grouped-sub');
      assert.strictEqual(patio.groupName, 'Downstairs');
    });

    it('should break up the whole group when the main speaker leaves', async () => {
      await coordinator.createGroup('Living', [kitchen, office, patio]);
      const before = transport.requests.length;

      await coordinator.dissolveGroup(kitchen);

      assert.deepStrictEqual(sent().slice(before), [`${KITCHEN} SetUngroup`]);
      for (const speaker of [kitchen, office, patio]) {
        assert.strictEqual(coordinator.roleOf(speaker), 'ungrouped');
        assert.strictEqual(speaker.groupName, '');
      }
    });

    it('should ungroup a main speaker whose last sub leaves', async () => {
      await coordinator.createGroup('Living', [kitchen, office]);

      await coordinator.dissolveGroup(office);

      assert.strictEqual(coordinator.roleOf(kitchen), 'ungrouped');
      assert.strictEqual(kitchen.groupName, '');
    });
  });

  describe('regrouping', () => {
    it('should take a sub out of its old group when it joins a new one', async () => {
      await coordinator.createGroup('Downstairs', [kitchen, office, patio]);

      await coordinator.createGroup('Upstairs', [patio, office]);

      assert.strictEqual(coordinator.roleOf(patio), 'grouped-main');
      assert.strictEqual(coordinator.roleOf(office), 'grouped-sub');
      assert.strictEqual(coordinator.roleOf(kitchen), 'ungrouped');
      assert.strictEqual(kitchen.groupName, '');
      assert.strictEqual(office.groupName, 'Upstairs');
    });

    it('should release the old main speaker when its only sub moves', async () => {
      await coordinator.createGroup('G1', [kitchen, office]);

      await coordinator.createGroup('G2', [patio, office]);

      assert.strictEqual(coordinator.roleOf(kitchen), 'ungrouped');
      assert.strictEqual(kitchen.groupName, '');
      assert.strictEqual(coordinator.roleOf(patio), 'grouped-main');
    });

    it('should break up the old group when its main joins as a sub', async () => {
      await coordinator.createGroup('G1', [kitchen, office]);

      await coordinator.createGroup('G2', [patio, kitchen]);

      assert.strictEqual(coordinator.roleOf(kitchen), 'grouped-sub');
      assert.strictEqual(kitchen.groupName, 'G2');
      assert.strictEqual(coordinator.roleOf(office), 'ungrouped');
      assert.strictEqual(office.groupName, '');
    });
  });
});
