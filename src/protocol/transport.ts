import { request as httpRequest, type RequestOptions } from 'http';
import { URL } from 'url';
import { TransportError } from '../errors/wam-errors.js';
import { debugManager } from '../utils/debug-manager.js';

/**
 * Moves a request URL to a speaker and hands back the raw body.
 * Implementations must bound their wait and must not look at the content.
 */
export interface Transport {
  get(url: string): Promise<string>;
}

export interface HttpTransportOptions {
  timeout?: number;
}

export const DEFAULT_HTTP_TIMEOUT = 5000;

/**
 * Plain HTTP GET transport. The timeout bounds the whole request, not just
 * idle time on the socket. No retries.
 */
export class HttpTransport implements Transport {
  private readonly timeout: number;

  constructor(options: HttpTransportOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_HTTP_TIMEOUT;
  }

  async get(url: string): Promise<string> {
    const target = new URL(url);
    const address = target.hostname;
    const startedAt = Date.now();

    const requestOptions: RequestOptions = {
      hostname: target.hostname,
      port: target.port ? parseInt(target.port, 10) : 80,
      path: target.pathname + target.search,
      method: 'GET'
    };

    return new Promise<string>((resolve, reject) => {
      let deadline: NodeJS.Timeout | undefined;

      const fail = (error: Error): void => {
        clearTimeout(deadline);
        reject(new TransportError(address, error));
      };

      const req = httpRequest(requestOptions, (res) => {
        let body = '';
        res.setEncoding('utf8');

        res.on('data', (chunk: string) => {
          body += chunk;
        });

        res.on('error', (error: Error) => {
          fail(error);
        });

        res.on('end', () => {
          clearTimeout(deadline);
          const statusCode = res.statusCode ?? 0;
          debugManager.trace('transport', `GET ${address} -> ${statusCode} in ${Date.now() - startedAt}ms`);
          if (statusCode < 200 || statusCode >= 300) {
            reject(new TransportError(address, `HTTP ${statusCode}`, statusCode));
            return;
          }
          resolve(body);
        });
      });

      req.on('error', (error: Error) => {
        debugManager.debug('transport', `GET ${address} failed: ${error.message}`);
        fail(error);
      });

      deadline = setTimeout(() => {
        const error = new Error(`Request timeout after ${this.timeout}ms`);
        fail(error);
        req.destroy(error);
      }, this.timeout);

      req.end();
    });
  }
}
