import { setTimeout as delay } from 'node:timers/promises';
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { AuthError, ClientError, type GitportError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import type { HttpOptions } from './types.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
}

export interface RestResponse {
  status: number;
  url: string;
  headers: Response['headers'];
  /** Parsed JSON body; `undefined` when the provider sent no content. */
  data: unknown;
}

export interface RestClientOptions extends HttpOptions {
  /** Label used in log lines and error messages. */
  name: string;
  baseUrl: string;
  headers: Record<string, string>;
  fetch?: FetchLike;
  /** Base of the linear back-off between attempts. */
  retryDelayMs?: number;
  logger?: Logger;
}

const USER_AGENT = 'gitport-cli';

/**
 * JSON-over-HTTPS transport shared by the provider adapters.
 * Every request is bounded by `timeoutMs`; network failures and gateway
 * errors are retried up to `retries` extra times.
 */
export class RestClient {
  readonly baseUrl: string;
  readonly maxPages: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(private readonly options: RestClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.maxPages = options.maxPages;
    this.fetchImpl = options.fetch ?? fetch;
    this.logger = options.logger ?? createLogger(options.name);
  }

  get origin(): string {
    return new URL(this.baseUrl).origin;
  }

  get(pathOrUrl: string, query?: Record<string, QueryValue>): Promise<RestResponse> {
    return this.request('GET', pathOrUrl, { query });
  }

  post(pathOrUrl: string, body?: unknown): Promise<RestResponse> {
    return this.request('POST', pathOrUrl, { body });
  }

  put(pathOrUrl: string, body?: unknown): Promise<RestResponse> {
    return this.request('PUT', pathOrUrl, { body });
  }

  patch(pathOrUrl: string, body?: unknown): Promise<RestResponse> {
    return this.request('PATCH', pathOrUrl, { body });
  }

  delete(pathOrUrl: string): Promise<RestResponse> {
    return this.request('DELETE', pathOrUrl);
  }

  /** Resolves a path against the base URL; absolute URLs pass through untouched. */
  url(pathOrUrl: string, query?: Record<string, QueryValue>): string {
    const url = /^https?:\/\//i.test(pathOrUrl) ? new URL(pathOrUrl) : new URL(`${this.baseUrl}${pathOrUrl}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async request(method: string, pathOrUrl: string, options: RequestOptions = {}): Promise<RestResponse> {
    const url = this.url(pathOrUrl, options.query);
    const retries = Math.max(0, this.options.retries);
    const backoff = this.options.retryDelayMs ?? 250;
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.attempt(method, url, options.body);
      } catch (error) {
        if (error instanceof ClientError && error.retryable && attempt < retries) {
          this.logger.debug(`retrying ${method} ${url} after ${error.message} (attempt ${attempt + 2}/${retries + 1})`);
          await delay(backoff * (attempt + 1));
          continue;
        }
        throw error;
      }
    }
  }

  private async attempt(method: string, url: string, body: unknown): Promise<RestResponse> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
      ...this.options.headers,
    };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    this.logger.debug(`${method} ${url}`);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new ClientError('NetworkError', `${this.options.name}: ${method} ${url} failed: ${reason}`);
    } finally {
      clearTimeout(timer);
    }
    this.logger.debug(`${response.status} ${method} ${url}`);

    if (!response.ok) {
      throw classifyStatus(response.status, response.headers, `${this.options.name}: ${method} ${url}`, text);
    }
    return { status: response.status, url, headers: response.headers, data: parseBody(text, url) };
  }
}

function parseBody(text: string, url: string): unknown {
  if (text.trim() === '') return undefined;
  try {
    return JSON.parse(text);
  } catch {
    throw new ClientError('MalformedResponse', `Response from ${url} is not valid JSON`);
  }
}

/** Maps a non-success HTTP status onto the error taxonomy. */
export function classifyStatus(
  status: number,
  headers: Pick<Response['headers'], 'get'>,
  context: string,
  bodyText = '',
): GitportError {
  const detail = extractMessage(bodyText);
  const message = `${context} returned ${status}${detail ? `: ${detail}` : ''}`;
  if (status === 401) return new AuthError('TokenExpired', message);
  if (status === 403) {
    if (headers.get('x-ratelimit-remaining') === '0') {
      return new ClientError('RateLimited', message, status);
    }
    return new AuthError('Forbidden', message);
  }
  if (status === 404 || status === 410) return new ClientError('NotFound', message, status);
  if (status === 429) return new ClientError('RateLimited', message, status);
  if (status >= 400 && status < 500) return new ClientError('Conflict', message, status);
  return new ClientError('ServerError', message, status);
}

function extractMessage(text: string): string | undefined {
  if (!text.trim()) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text.trim().slice(0, 200);
  }
  if (typeof parsed !== 'object' || parsed === null) return undefined;
  if ('message' in parsed && typeof parsed.message === 'string') return parsed.message;
  if ('error' in parsed) {
    const inner = parsed.error;
    if (typeof inner === 'string') return inner;
    if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
      return inner.message;
    }
  }
  return undefined;
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}`;
}
