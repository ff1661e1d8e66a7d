import type { Logger } from 'pino';
import type { Dispatcher, Headers } from 'undici';
import type { LabelSelector } from './labelSelector';

export type TokenSupplier = string | (() => string | Promise<string>);

export interface HcloudTransportOptions {
  token: TokenSupplier;
  baseUrl?: string;
  /** Per-request timeout. `0` disables it. */
  timeoutMs?: number;
  verifySsl?: boolean;
  /** Underlying undici transport, for custom pooling, proxies or socket timeouts. Wins over `verifySsl`. */
  dispatcher?: Dispatcher;
  userAgent?: string;
  defaultHeaders?: Record<string, string>;
  logger?: Logger;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | ReadonlyArray<string | number> | undefined;

export type QueryParams = Record<string, QueryValue>;

export interface RequestOptions {
  signal?: AbortSignal;
  /** Overrides the client timeout for this call. */
  timeoutMs?: number;
}

export interface RequestDescriptor extends RequestOptions {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  resetAt: Date;
}

export interface ResponseEnvelope<T> {
  status: number;
  headers: Headers;
  data: T;
  rateLimit: RateLimitInfo | null;
}

export interface FieldError {
  name: string;
  messages: string[];
}

export type ResourceId = number | string;

export interface PaginationParams {
  page?: number;
  perPage?: number;
}

export interface ListParams extends PaginationParams {
  name?: string;
  labelSelector?: LabelSelector;
  sort?: string | readonly string[];
}
