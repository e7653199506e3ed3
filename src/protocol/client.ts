import { buildCommandXml, commandUrl, endpointFor, WAM_PORT, type Command } from './command.js';
import { parseResponse, type WamReply } from './response.js';
import { HttpTransport, type Transport } from './transport.js';
import { debugManager } from '../utils/debug-manager.js';

export interface WamClientOptions {
  transport?: Transport;
  port?: number;
  timeout?: number;
}

/**
 * Sends commands to speakers and parses their replies.
 * Commands to one address run one at a time, in call order, so concurrent
 * callers cannot race the device's own state. Different speakers are independent.
 */
export class WamClient {
  readonly port: number;
  private readonly transport: Transport;
  private readonly queues = new Map<string, Promise<unknown>>();

  constructor(options: WamClientOptions = {}) {
    this.port = options.port ?? WAM_PORT;
    this.transport = options.transport ?? new HttpTransport({ timeout: options.timeout });
  }

  async execute(address: string, cmd: Command): Promise<WamReply> {
    return this.enqueue(address, () => this.send(address, cmd));
  }

  private async send(address: string, cmd: Command): Promise<WamReply> {
    const endpoint = endpointFor(cmd.name);
    debugManager.debug('protocol', `${address} ${endpoint} ${cmd.name}`, { xml: buildCommandXml(cmd) });

    const body = await this.transport.get(commandUrl(address, cmd, this.port));
    debugManager.trace('protocol', `${address} ${cmd.name} replied`, { body });

    return parseResponse(endpoint, cmd.name, body);
  }

  private enqueue<T>(address: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(address) ?? Promise.resolve();
    // Run after the previous command settles, whatever its outcome
    const next = previous.then(task, task);
    const tail = next.then(() => undefined, () => undefined);
    this.queues.set(address, tail);
    void tail.then(() => {
      if (this.queues.get(address) === tail) {
        this.queues.delete(address);
      }
    });
    return next;
  }
}
