/**
 * HTTP transport shared by the engine and DCT clients.
 *
 * One call is one request: there is no retry layer. Failures are mapped to
 * {@link DelphixError} so callers can tell a connectivity problem from an
 * error the remote side reported.
 *
 * @module client/http
 */

import { fetch, type Dispatcher, type Headers, type Response } from 'undici';
import { DelphixError, DelphixErrorKind, isDelphixError } from '../types/errors.js';

/**
 * HTTP method types.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * HTTP request options.
 */
export interface RequestOptions {
  /** Request headers */
  headers?: Record<string, string>;
}

/**
 * HTTP response structure.
 */
export interface HttpResponse<T = unknown> {
  status: number;
  headers: Headers;
  /** Parsed JSON body, or undefined for an empty body */
  data: T;
}

export interface HttpTransportOptions {
  /** Base URL every request path is resolved against */
  baseUrl: string;
  /** Request timeout in milliseconds */
  timeout: number;
  userAgent: string;
  /** undici dispatcher; tests pass a MockAgent here */
  dispatcher?: Dispatcher;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pulls a human-readable message out of an error body.
 *
 * Understands the engine's `ErrorResult` (`error.details`), DCT's
 * `{ errors: [{ message }] }` and plain `{ message }` bodies.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    return body.trim() || undefined;
  }
  if (!isRecord(body)) {
    return undefined;
  }
  if (isRecord(body.error) && typeof body.error.details === 'string') {
    return body.error.details;
  }
  if (Array.isArray(body.errors)) {
    const messages = body.errors
      .map((e) => (isRecord(e) && typeof e.message === 'string' ? e.message : undefined))
      .filter((m): m is string => m !== undefined);
    if (messages.length > 0) {
      return messages.join('; ');
    }
  }
  if (typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

/**
 * Thin wrapper over undici's fetch.
 */
export class HttpTransport {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpTransportOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options?: RequestOptions
  ): Promise<HttpResponse> {
    const url = this.buildUrl(path);

    const headers: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': this.options.userAgent,
      ...options?.headers,
    };
    const payload = buildBody(body);
    if (payload !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.send(url, method, headers, payload);
    const text = await response.text();

    if (!response.ok) {
      const message =
        extractErrorMessage(tryParseJson(text) ?? text) || `HTTP ${response.status} error`;
      throw DelphixError.fromResponse(response.status, message);
    }

    const data = parseJson(text);

    return {
      status: response.status,
      headers: response.headers,
      data,
    };
  }

  /**
   * Perform the fetch, mapping transport failures to connectivity errors.
   */
  private async send(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    payload: string | undefined
  ): Promise<Response> {
    const requestTimeout = this.options.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), requestTimeout);

    try {
      return await fetch(url, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
        dispatcher: this.options.dispatcher,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw DelphixError.timeout(`Request timeout after ${requestTimeout}ms`);
      }
      throw toNetworkError(error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildUrl(path: string): string {
    const normalizedPath = path.startsWith('/') ? path : `/${path}`;
    return new URL(`${this.baseUrl}${normalizedPath}`).toString();
  }
}

function buildBody(body: unknown): string | undefined {
  if (body === undefined || body === null) {
    return undefined;
  }
  if (typeof body === 'string') {
    return body;
  }
  return JSON.stringify(body);
}

function parseJson(text: string): unknown {
  if (text.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw DelphixError.deserialization(
      `Failed to parse JSON response: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function toNetworkError(error: unknown): DelphixError {
  if (isDelphixError(error)) {
    return error;
  }
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? error.cause : undefined;
    const detail = cause ? `${error.message}: ${cause.message}` : error.message;
    return new DelphixError(DelphixErrorKind.ConnectionFailed, detail, { cause: error });
  }
  return new DelphixError(DelphixErrorKind.NetworkError, 'Unknown network error');
}

/**
 * Removes trailing slashes and adds `http://` to a bare host.
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  return /^https?:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}
