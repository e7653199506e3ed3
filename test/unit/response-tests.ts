import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseResponse } from '../../src/protocol/response.js';
import { ProtocolError } from '../../src/errors/wam-errors.js';
import { wamReply } from '../helpers/mock-factory.js';

describe('Response Parsing', () => {
  describe('parseResponse', () => {
    it('should read an integer field', () => {
      const reply = parseResponse('UIC', 'GetVolume', wamReply('GetVolume', '<volume>15</volume>'));
      assert.strictEqual(reply.integer('volume'), 15);
      assert.strictEqual(reply.command, 'GetVolume');
    });

    it('should read CDATA fields', () => {
      const reply = parseResponse('UIC', 'GetSpkName', wamReply('GetSpkName', '<spkname><![CDATA[Living Room]]></spkname>'));
      assert.strictEqual(reply.text('spkname'), 'Living Room');
    });

    it('should read an empty element as an empty string', () => {
      const reply = parseResponse('UIC', 'GetGroupName', wamReply('GetGroupName', '<groupname></groupname>'));
      assert.strictEqual(reply.text('groupname'), '');
    });

    it('should accept a CPM reply', () => {
      const body = wamReply('GetRadioInfo', '<title>Test Radio</title>', { endpoint: 'CPM' });
      const reply = parseResponse('CPM', 'GetRadioInfo', body);
      assert.strictEqual(reply.text('title'), 'Test Radio');
    });

    it('should accept a response without a result attribute', () => {
      const reply = parseResponse('UIC', 'GetMute', '<UIC><response><mute>on</mute></response></UIC>');
      assert.strictEqual(reply.text('mute'), 'on');
    });

    it('should report a device failure', () => {
      const body = wamReply('GetVolume', '', { result: 'ng' });
      assert.throws(() => parseResponse('UIC', 'GetVolume', body), {
        name: 'ProtocolError',
        message: 'GetVolume: device reported failure (result="ng")'
      });
    });

    it('should keep the raw body on protocol errors', () => {
      const body = wamReply('GetVolume', '', { result: 'error' });
      assert.throws(
        () => parseResponse('UIC', 'GetVolume', body),
        (error: unknown) => error instanceof ProtocolError && error.rawResponse === body && error.command === 'GetVolume'
      );
    });

    it('should reject an empty body', () => {
      assert.throws(() => parseResponse('UIC', 'GetVolume', '  '), {
        name: 'ProtocolError',
        message: 'GetVolume: empty response body'
      });
    });

    it('should reject malformed XML', () => {
      assert.throws(() => parseResponse('UIC', 'GetVolume', '<UIC><response result="ok">'), {
        name: 'ProtocolError',
        message: /^GetVolume: malformed XML/
      });
    });

    it('should reject a reply under the wrong root element', () => {
      assert.throws(() => parseResponse('CPM', 'GetCpInfo', wamReply('GetCpInfo')), {
        name: 'ProtocolError',
        message: 'GetCpInfo: response has no <CPM> root element'
      });
    });

    it('should reject a reply without a response element', () => {
      assert.throws(() => parseResponse('UIC', 'GetVolume', '<UIC><method>GetVolume</method></UIC>'), {
        name: 'ProtocolError',
        message: 'GetVolume: response has no <response> element'
      });
    });
  });

  describe('WamReply accessors', () => {
    const reply = parseResponse(
      'UIC',
      'GetCurrentPlayTime',
      wamReply('GetCurrentPlayTime', '<playtime>42</playtime><state>loud</state>')
    );

    it('should report a missing field instead of defaulting', () => {
      assert.throws(() => reply.text('timelength'), {
        name: 'ProtocolError',
        message: 'GetCurrentPlayTime: response has no <timelength> field'
      });
    });

    it('should reject non-integer text where an integer is expected', () => {
      assert.throws(() => reply.integer('state'), {
        name: 'ProtocolError',
        message: 'GetCurrentPlayTime: <state> is not an integer: "loud"'
      });
    });

    it('should return undefined for absent optional fields', () => {
      assert.strictEqual(reply.optionalInteger('timelength'), undefined);
      assert.strictEqual(reply.optionalText('timelength'), undefined);
      assert.strictEqual(reply.optionalInteger('playtime'), 42);
    });
  });
});
