import { Agent, fetch, Headers } from 'undici';
import type { Dispatcher, Response } from 'undici';
import type { Logger } from 'pino';
import { silentLogger } from '@hcloud-sdk/shared';
import type { z } from 'zod';
import { decodeBody } from './decode';
import { HcloudError, ResponseDecodeError, TransportError, classifyErrorResponse } from './errors';
import type {
  HcloudTransportOptions,
  HttpMethod,
  QueryParams,
  RateLimitInfo,
  RequestDescriptor,
  RequestOptions,
  ResponseEnvelope,
  TokenSupplier
} from './types';

export const DEFAULT_BASE_URL = 'https://api.hetzner.cloud/v1';

const DEFAULT_USER_AGENT = 'hcloud-sdk-node/0.1.0';

/** Links the caller's signal to the request controller; the returned function detaches it. */
function combineSignals(primary: AbortController, external?: AbortSignal): () => void {
  if (!external) {
    return () => {};
  }
  if (external.aborted) {
    primary.abort(external.reason);
    return () => {};
  }
  const forward = () => {
    primary.abort(external.reason);
  };
  external.addEventListener('abort', forward, { once: true });
  return () => external.removeEventListener('abort', forward);
}

function hasToken(token: TokenSupplier | undefined): token is TokenSupplier {
  if (typeof token === 'function') {
    return true;
  }
  return typeof token === 'string' && token.trim().length > 0;
}

async function resolveToken(token: TokenSupplier): Promise<string> {
  const resolved = typeof token === 'function' ? await token() : token;
  const trimmed = resolved.trim();
  if (trimmed.length === 0) {
    throw new HcloudError('Hetzner Cloud API token resolved to an empty value');
  }
  return trimmed;
}

function readInteger(headers: Headers, name: string): number | null {
  const raw = headers.get(name);
  if (raw === null) {
    return null;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : null;
}

export function parseRateLimit(headers: Headers): RateLimitInfo | null {
  const limit = readInteger(headers, 'RateLimit-Limit');
  const remaining = readInteger(headers, 'RateLimit-Remaining');
  const reset = readInteger(headers, 'RateLimit-Reset');
  if (limit === null || remaining === null || reset === null) {
    return null;
  }
  return { limit, remaining, resetAt: new Date(reset * 1000) };
}

function parsePayload(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Single choke point for calls against the Hetzner Cloud API. Holds the
 * token and connection settings; keeps no state between calls.
 */
export class HcloudTransport {
  readonly baseUrl: string;
  private readonly token: TokenSupplier;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent: string;
  private readonly logger: Logger;

  constructor(options: HcloudTransportOptions) {
    if (!hasToken(options.token)) {
      throw new HcloudError('HcloudTransport requires a token');
    }
    if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 0)) {
      throw new HcloudError('HcloudTransport timeoutMs must be a non-negative number');
    }
    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    try {
      new URL(baseUrl);
    } catch (err) {
      throw new HcloudError(`HcloudTransport baseUrl is not a valid URL: ${baseUrl}`, { cause: err });
    }

    this.baseUrl = baseUrl;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.dispatcher =
      options.dispatcher ??
      (options.verifySsl === false ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined);
    this.defaultHeaders = { ...(options.defaultHeaders ?? {}) };
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.logger = options.logger ?? silentLogger;
  }

  send(descriptor: RequestDescriptor): Promise<ResponseEnvelope<unknown>>;
  send<S extends z.ZodTypeAny>(descriptor: RequestDescriptor, schema: S): Promise<ResponseEnvelope<z.infer<S>>>;
  async send<S extends z.ZodTypeAny>(
    descriptor: RequestDescriptor,
    schema?: S
  ): Promise<ResponseEnvelope<z.infer<S> | unknown>> {
    const { method, path } = descriptor;
    const { response, text, durationMs } = await this.execute(descriptor);
    const rateLimit = parseRateLimit(response.headers);

    if (!response.ok) {
      const error = classifyErrorResponse(
        { status: response.status, statusText: response.statusText, method, path, rateLimit },
        parsePayload(text)
      );
      this.logger.debug(
        { method, path, status: response.status, code: error.code, durationMs },
        'hcloud request failed'
      );
      throw error;
    }

    this.logger.debug({ method, path, status: response.status, durationMs }, 'hcloud request completed');

    let data: unknown;
    if (response.status === 204 || text.length === 0) {
      data = undefined;
    } else {
      try {
        data = JSON.parse(text);
      } catch (err) {
        throw decodeFailure(method, path, err);
      }
    }

    return {
      status: response.status,
      headers: response.headers,
      data: schema ? decodeBody(schema, data, { method, path }) : data,
      rateLimit
    };
  }

  /** Sends the request and returns the decoded body only. */
  async request<S extends z.ZodTypeAny>(descriptor: RequestDescriptor, schema: S): Promise<z.infer<S>> {
    const envelope = await this.send(descriptor, schema);
    return envelope.data;
  }

  /** Sends the request and discards the body (204 responses, plain deletes). */
  async requestVoid(descriptor: RequestDescriptor): Promise<void> {
    await this.send(descriptor);
  }

  get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    options: RequestOptions & { query?: QueryParams } = {}
  ): Promise<z.infer<S>> {
    return this.request({ method: 'GET', path, ...options }, schema);
  }

  post<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S, options: RequestOptions = {}): Promise<z.infer<S>> {
    return this.request({ method: 'POST', path, body, ...options }, schema);
  }

  put<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S, options: RequestOptions = {}): Promise<z.infer<S>> {
    return this.request({ method: 'PUT', path, body, ...options }, schema);
  }

  delete(path: string, options: RequestOptions = {}): Promise<void> {
    return this.requestVoid({ method: 'DELETE', path, ...options });
  }

  private async execute(
    descriptor: RequestDescriptor
  ): Promise<{ response: Response; text: string; durationMs: number }> {
    const { method, path } = descriptor;
    const headers = await this.buildHeaders();
    let body: string | undefined;
    if (descriptor.body !== undefined) {
      body = JSON.stringify(descriptor.body);
      headers.set('Content-Type', 'application/json');
    }

    const url = this.buildUrl(path, descriptor.query);
    const controller = new AbortController();
    const detachSignal = combineSignals(controller, descriptor.signal);
    const timeoutMs = descriptor.timeoutMs ?? this.timeoutMs;
    let timedOut = false;
    let timeout: NodeJS.Timeout | undefined;
    if (timeoutMs > 0) {
      timeout = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    const startedAt = Date.now();
    const failure = (err: unknown, statusCode: number | null): TransportError => {
      const reason = timedOut ? 'timeout' : controller.signal.aborted ? 'aborted' : 'network';
      this.logger.debug(
        { method, path, reason, status: statusCode ?? undefined, durationMs: Date.now() - startedAt },
        'hcloud request did not complete'
      );
      const during = statusCode === null ? '' : ` while reading the ${statusCode} response body`;
      const detail = err instanceof Error ? describeNetworkError(err) : String(err);
      return new TransportError(
        reason === 'timeout'
          ? `${method} ${path} timed out after ${timeoutMs}ms${during}`
          : reason === 'aborted'
            ? `${method} ${path} was aborted${during}`
            : `${method} ${path} failed${during}: ${detail}`,
        { reason, method, path, statusCode, cause: err }
      );
    };

    try {
      let response: Response;
      try {
        response = await fetch(url, {
          method,
          headers,
          body,
          signal: controller.signal,
          dispatcher: this.dispatcher
        });
      } catch (err) {
        throw failure(err, null);
      }
      try {
        const text = await response.text();
        return { response, text, durationMs: Date.now() - startedAt };
      } catch (err) {
        throw failure(err, response.status);
      }
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
      detachSignal();
    }
  }

  private async buildHeaders(): Promise<Headers> {
    const headers = new Headers({ Accept: 'application/json' });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      headers.set(key, value);
    }
    headers.set('User-Agent', this.userAgent);
    headers.set('Authorization', `Bearer ${await resolveToken(this.token)}`);
    return headers;
  }

  private buildUrl(path: string, query?: QueryParams): URL {
    const url = new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        if (isList(value)) {
          for (const entry of value) {
            url.searchParams.append(key, String(entry));
          }
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }
}

function isList(value: QueryParams[string]): value is ReadonlyArray<string | number> {
  return Array.isArray(value);
}

// undici reports connection problems as `TypeError: fetch failed` with the socket error as cause
function describeNetworkError(err: Error): string {
  const cause = err.cause;
  if (cause instanceof Error && cause.message) {
    return cause.message;
  }
  return err.message;
}

function decodeFailure(method: HttpMethod, path: string, err: unknown): ResponseDecodeError {
  const message = err instanceof Error ? err.message : String(err);
  return new ResponseDecodeError(`Response body for ${method} ${path} is not valid JSON`, {
    method,
    path,
    issues: [`<root>: ${message}`],
    cause: err
  });
}
