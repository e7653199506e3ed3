import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { WamClient } from '../../src/protocol/client.js';
import { command, commandUrl, dec, decodeCommand } from '../../src/protocol/command.js';
import type { Transport } from '../../src/protocol/transport.js';
import { ProtocolError, TransportError } from '../../src/errors/wam-errors.js';
import { MockTransport, wamReply } from '../helpers/mock-factory.js';

/**
 * Transport that answers each command after a per-command delay and logs
 * when each request starts and ends
 */
class DelayedTransport implements Transport {
  readonly events: string[] = [];

  constructor(private readonly delays: Record<string, number>) {}

  async get(url: string): Promise<string> {
    const host = new URL(url).hostname;
    const name = decodeCommand(url.slice(url.indexOf('?cmd=') + 5)).name;
    this.events.push(`start ${host} ${name}`);
    await new Promise(resolve => setTimeout(resolve, this.delays[name] ?? 0));
    this.events.push(`end ${host} ${name}`);
    if (name === 'Broken') {
      throw new TransportError(host, 'connect ECONNRESET');
    }
    return wamReply(name);
  }
}

describe('WamClient', () => {
  let transport: MockTransport;
  let client: WamClient;

  beforeEach(() => {
    transport = new MockTransport();
    client = new WamClient({ transport });
  });

  it('should send the encoded command to the speaker', async () => {
    const cmd = command('SetVolume', dec('volume', 9));
    await client.execute('192.168.1.30', cmd);

    assert.strictEqual(transport.requests.length, 1);
    assert.strictEqual(transport.requests[0]?.url, commandUrl('192.168.1.30', cmd));
    assert.deepStrictEqual(transport.requests[0]?.command, cmd);
  });

  it('should route content-provider commands to CPM', async () => {
    await client.execute('192.168.1.30', command('GetRadioInfo'));
    assert.strictEqual(transport.requests[0]?.endpoint, 'CPM');
  });

  it('should use the configured port', async () => {
    const custom = new WamClient({ transport, port: 8080 });
    await custom.execute('10.0.0.5', command('GetVolume'));
    assert.strictEqual(transport.requests[0]?.url, 'http://10.0.0.5:8080/UIC?cmd=%3Cname%3EGetVolume%3C/name%3E');
  });

  it('should return the parsed reply', async () => {
    transport.reply('GetVolume', wamReply('GetVolume', '<volume>7</volume>'));
    const reply = await client.execute('192.168.1.30', command('GetVolume'));
    assert.strictEqual(reply.integer('volume'), 7);
  });

  it('should surface a device failure as a ProtocolError', async () => {
    transport.reply('SetVolume', wamReply('SetVolume', '', { result: 'ng' }));
    await assert.rejects(client.execute('192.168.1.30', command('SetVolume', dec('volume', 3))), ProtocolError);
  });

  it('should pass transport failures through unchanged', async () => {
    transport.unreachable('192.168.1.31');
    await assert.rejects(client.execute('192.168.1.31', command('GetVolume')), {
      name: 'TransportError',
      message: 'Transport error for 192.168.1.31: connect EHOSTUNREACH'
    });
  });

  describe('ordering', () => {
    it('should run commands to one speaker one at a time, in call order', async () => {
      const delayed = new DelayedTransport({ Slow: 30, Fast: 0 });
      const ordered = new WamClient({ transport: delayed });

      await Promise.all([
        ordered.execute('10.0.0.1', command('Slow')),
        ordered.execute('10.0.0.1', command('Fast'))
      ]);

      assert.deepStrictEqual(delayed.events, [
        'start 10.0.0.1 Slow',
        'end 10.0.0.1 Slow',
        'start 10.0.0.1 Fast',
        'end 10.0.0.1 Fast'
      ]);
    });

    it('should not hold one speaker behind another', async () => {
      const delayed = new DelayedTransport({ Slow: 30, Fast: 0 });
      const ordered = new WamClient({ transport: delayed });

      await Promise.all([
        ordered.execute('10.0.0.1', command('Slow')),
        ordered.execute('10.0.0.2', command('Fast'))
      ]);

      assert.strictEqual(delayed.events.indexOf('end 10.0.0.2 Fast') < delayed.events.indexOf('end 10.0.0.1 Slow'), true);
    });

    it('should keep going after a failed command', async () => {
      const delayed = new DelayedTransport({ Broken: 10 });
      const ordered = new WamClient({ transport: delayed });

      const results = await Promise.allSettled([
        ordered.execute('10.0.0.1', command('Broken')),
        ordered.execute('10.0.0.1', command('GetVolume'))
      ]);

      assert.strictEqual(results[0]?.status, 'rejected');
      assert.strictEqual(results[1]?.status, 'fulfilled');
      assert.deepStrictEqual(delayed.events, [
        'start 10.0.0.1 Broken',
        'end 10.0.0.1 Broken',
        'start 10.0.0.1 GetVolume',
        'end 10.0.0.1 GetVolume'
      ]);
    });
  });
});
