/**
 * DCT HTTP client.
 *
 * Authenticates every request with an API key (`Authorization: apk <key>`)
 * against the configured base URL.
 *
 * @module dct/client
 */

import type { Dispatcher } from 'undici';
import type { SecretString } from '../auth/index.js';
import { DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config.js';
import { HttpTransport, type RequestOptions } from '../client/http.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';

export interface DctClientConfig {
  /** DCT API base URL (e.g. "https://dct.example.com/v3") */
  baseUrl: string;
  apiKey: SecretString;
  timeout?: number;
  userAgent?: string;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Formats the Authorization header value. A key that already carries the
 * `apk ` scheme is sent unchanged.
 */
export function apiKeyHeader(apiKey: string): string {
  return /^apk\s/i.test(apiKey) ? apiKey : `apk ${apiKey}`;
}

export class DctClient {
  private readonly transport: HttpTransport;
  private readonly apiKey: SecretString;
  private readonly logger: Logger;

  constructor(config: DctClientConfig) {
    this.apiKey = config.apiKey;
    this.logger = config.logger ?? new NoopLogger();
    this.transport = new HttpTransport({
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      dispatcher: config.dispatcher,
    });
  }

  getBaseUrl(): string {
    return this.transport.getBaseUrl();
  }

  /**
   * Make a GET request; resolves to the parsed JSON body.
   */
  async get(path: string, options?: RequestOptions): Promise<unknown> {
    this.logger.debug('DCT request', { method: 'GET', path });
    const response = await this.transport.request('GET', path, undefined, this.withAuth(options));
    return response.data;
  }

  /**
   * Make a POST request; resolves to the parsed JSON body.
   */
  async post(path: string, body: unknown, options?: RequestOptions): Promise<unknown> {
    this.logger.debug('DCT request', { method: 'POST', path });
    const response = await this.transport.request('POST', path, body, this.withAuth(options));
    return response.data;
  }

  private withAuth(options?: RequestOptions): RequestOptions {
    return {
      ...options,
      headers: {
        ...options?.headers,
        'Authorization': apiKeyHeader(this.apiKey.expose()),
      },
    };
  }
}
