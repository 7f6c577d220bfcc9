/**
 * Delphix Engine HTTP Client
 *
 * Client for the legacy path-based JSON API (`/resources/json/delphix/...`):
 * - Session setup and login with engine credentials
 * - Session cookie propagation
 * - Envelope unwrapping (`OKResult` / `ErrorResult`)
 *
 * @module client
 */

import type { Dispatcher } from 'undici';
import type { CredentialProvider } from '../auth/index.js';
import { StaticCredentialProvider } from '../auth/index.js';
import type { ApiVersion, EngineDefinition, PluginConfiguration } from '../config.js';
import { DEFAULT_API_VERSION, DEFAULT_TIMEOUT, DEFAULT_USER_AGENT } from '../config.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import { DelphixError, DelphixErrorKind, isDelphixError } from '../types/errors.js';
import type { EngineResponse } from '../types/resources.js';
import { parseEngineResponse } from '../types/resources.js';
import { HttpTransport, type HttpMethod, type RequestOptions } from './http.js';
import { SessionManager } from './session.js';

/** Root of the legacy API. */
export const API_ROOT = '/resources/json/delphix';

/**
 * Engine client configuration.
 */
export interface EngineClientConfig {
  /** Engine host name or base URL */
  address: string;
  credentialProvider: CredentialProvider;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** API version announced when the session is opened */
  apiVersion?: ApiVersion;
  userAgent?: string;
  /** undici dispatcher (connection pool, proxy, or a MockAgent in tests) */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

/**
 * Client for one Delphix Engine.
 */
export class EngineClient {
  private readonly address: string;
  private readonly transport: HttpTransport;
  private readonly session = new SessionManager();
  private readonly credentialProvider: CredentialProvider;
  private readonly apiVersion: ApiVersion;
  private readonly logger: Logger;

  constructor(config: EngineClientConfig) {
    this.address = config.address;
    this.credentialProvider = config.credentialProvider;
    this.apiVersion = config.apiVersion ?? DEFAULT_API_VERSION;
    this.logger = config.logger ?? new NoopLogger();
    this.transport = new HttpTransport({
      baseUrl: config.address,
      timeout: config.timeout ?? DEFAULT_TIMEOUT,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
      dispatcher: config.dispatcher,
    });
  }

  /**
   * Address as configured, for messages shown to users.
   */
  getEngineAddress(): string {
    return this.address;
  }

  isLoggedIn(): boolean {
    return this.session.isAuthenticated();
  }

  /**
   * Open a session and log in.
   *
   * @throws DelphixError of kind `LoginFailed` when the engine rejects the
   *   credentials, or a connectivity error when it cannot be reached.
   */
  async login(): Promise<void> {
    this.session.invalidate();

    await this.post(`${API_ROOT}/session`, {
      type: 'APISession',
      version: { type: 'APIVersion', ...this.apiVersion },
    });

    const credentials = await this.credentialProvider.getCredentials();
    try {
      await this.post(`${API_ROOT}/login`, {
        type: 'LoginRequest',
        username: credentials.username,
        password: credentials.password.expose(),
      });
    } catch (error) {
      if (isDelphixError(error) && !error.isConnectivityError()) {
        throw new DelphixError(DelphixErrorKind.LoginFailed, error.message, {
          statusCode: error.statusCode,
          errorId: error.errorId,
          cause: error,
        });
      }
      throw error;
    }

    this.session.markAuthenticated();
    this.logger.debug('Logged in to engine', { engine: this.address, user: credentials.username });
  }

  /**
   * Close the session on the engine side and forget it locally.
   */
  async logout(): Promise<void> {
    if (!this.session.isAuthenticated()) {
      return;
    }
    try {
      await this.post(`${API_ROOT}/logout`, {});
    } finally {
      this.session.invalidate();
    }
  }

  /**
   * Issue a GET and unwrap the envelope.
   */
  async get(path: string, options?: RequestOptions): Promise<EngineResponse> {
    return this.request('GET', path, undefined, options);
  }

  /**
   * Issue a POST and unwrap the envelope.
   */
  async post(path: string, body: unknown, options?: RequestOptions): Promise<EngineResponse> {
    return this.request('POST', path, body, options);
  }

  private async request(
    method: HttpMethod,
    path: string,
    body: unknown,
    options?: RequestOptions
  ): Promise<EngineResponse> {
    const headers: Record<string, string> = { ...options?.headers };
    const cookie = this.session.cookieHeader();
    if (cookie) {
      headers['Cookie'] = cookie;
    }

    this.logger.debug('Engine request', { method, path });
    const response = await this.transport.request(method, path, body, { ...options, headers });
    this.session.update(response.headers);

    return parseEngineResponse(response.data);
  }
}

/**
 * Create a client for a configured engine.
 */
export function createEngineClient(
  engine: EngineDefinition,
  config: Pick<PluginConfiguration, 'timeout' | 'apiVersion' | 'userAgent'>,
  options: { dispatcher?: Dispatcher; logger?: Logger } = {}
): EngineClient {
  return new EngineClient({
    address: engine.address,
    credentialProvider: new StaticCredentialProvider(engine.username, engine.password),
    timeout: config.timeout,
    apiVersion: config.apiVersion,
    userAgent: config.userAgent,
    dispatcher: options.dispatcher,
    logger: options.logger,
  });
}

export { HttpTransport, normalizeBaseUrl, extractErrorMessage } from './http.js';
export type { HttpMethod, HttpResponse, RequestOptions, HttpTransportOptions } from './http.js';
export { SessionManager } from './session.js';
