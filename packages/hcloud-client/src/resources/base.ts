import { z } from 'zod';
import { decodeBody } from '../decode';
import { ValidationError } from '../errors';
import { formatLabelSelector } from '../labelSelector';
import { listEnvelopeSchema, objectEnvelopeSchema } from '../schemas/common';
import type { Pagination } from '../schemas/common';
import { actionEnvelopeSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { HcloudTransport } from '../transport';
import type {
  FieldError,
  HttpMethod,
  ListParams,
  PaginationParams,
  QueryParams,
  RequestOptions,
  ResourceId
} from '../types';

export const MAX_PER_PAGE = 100;

export interface Page<T> {
  items: T[];
  pagination: Pagination | null;
}

export interface ResourceDefinition<S extends z.ZodTypeAny> {
  /** Collection path, e.g. `/servers`. */
  path: string;
  /** Key wrapping a single item in responses, e.g. `server`. */
  singular: string;
  /** Key wrapping the item array in list responses, e.g. `servers`. */
  plural: string;
  schema: S;
}

export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
}

/**
 * Converts the top-level keys of a flat input to the API's snake_case and
 * drops `undefined` values. Nested values (labels, rules) are passed as is.
 */
export function snakeBody(input: object): Record<string, unknown> {
  const body: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (value !== undefined) {
      body[toSnakeCase(key)] = value;
    }
  }
  return body;
}

export function encodeId(id: ResourceId): string {
  return encodeURIComponent(String(id));
}

export function validatePagination(method: HttpMethod, path: string, params: PaginationParams | undefined): void {
  const fields: FieldError[] = [];
  if (params?.perPage !== undefined && (!Number.isInteger(params.perPage) || params.perPage < 1 || params.perPage > MAX_PER_PAGE)) {
    fields.push({ name: 'per_page', messages: [`must be an integer between 1 and ${MAX_PER_PAGE}`] });
  }
  if (params?.page !== undefined && (!Number.isInteger(params.page) || params.page < 1)) {
    fields.push({ name: 'page', messages: ['must be an integer greater than or equal to 1'] });
  }
  if (fields.length > 0) {
    throw ValidationError.local(method, path, fields);
  }
}

export function paginationQuery(params: PaginationParams | undefined): QueryParams {
  return { page: params?.page, per_page: params?.perPage };
}

/**
 * Read side shared by every resource: list, iterate and retrieve against a
 * fixed collection path. Writable resources add create, update and delete.
 */
export class ResourceClient<S extends z.ZodTypeAny, TListParams extends ListParams = ListParams> {
  protected readonly transport: HcloudTransport;
  protected readonly definition: ResourceDefinition<S>;

  constructor(transport: HcloudTransport, definition: ResourceDefinition<S>) {
    this.transport = transport;
    this.definition = definition;
  }

  async list(params?: TListParams, options?: RequestOptions): Promise<Page<z.infer<S>>> {
    return this.fetchPage(this.definition.path, this.definition.plural, this.definition.schema, this.listQuery(params), params, options);
  }

  async *iterate(params?: TListParams, options?: RequestOptions): AsyncGenerator<z.infer<S>> {
    const { path, plural, schema } = this.definition;
    const query = this.listQuery(params);
    let page = params?.page ?? 1;
    for (;;) {
      const result = await this.fetchPage(path, plural, schema, { ...query, page }, { page, perPage: params?.perPage }, options);
      yield* result.items;
      const next = result.pagination?.next_page ?? null;
      if (next === null || next <= page) {
        return;
      }
      page = next;
    }
  }

  async listAll(params?: TListParams, options?: RequestOptions): Promise<z.infer<S>[]> {
    const items: z.infer<S>[] = [];
    for await (const item of this.iterate(params, options)) {
      items.push(item);
    }
    return items;
  }

  async retrieve(id: ResourceId, options?: RequestOptions): Promise<z.infer<S>> {
    const path = this.itemPath(id);
    const data = await this.transport.get(path, objectEnvelopeSchema, options);
    return decodeBody(this.definition.schema, data[this.definition.singular], { method: 'GET', path });
  }

  /** Query parameters for `list`; resources with extra filters extend it. */
  protected listQuery(params: TListParams | undefined): QueryParams {
    const sort = params?.sort;
    return {
      name: params?.name,
      label_selector: formatLabelSelector(params?.labelSelector),
      sort: typeof sort === 'string' ? [sort] : sort,
      ...paginationQuery(params)
    };
  }

  protected itemPath(id: ResourceId, ...segments: string[]): string {
    return [this.definition.path, encodeId(id), ...segments].join('/');
  }

  protected async fetchPage<T extends z.ZodTypeAny>(
    path: string,
    key: string,
    schema: T,
    query: QueryParams,
    pagination: PaginationParams | undefined,
    options?: RequestOptions
  ): Promise<Page<z.infer<T>>> {
    validatePagination('GET', path, pagination);
    const data = await this.transport.get(path, listEnvelopeSchema, { ...options, query });
    const items = decodeBody(z.array(schema), data[key], { method: 'GET', path });
    return { items, pagination: data.meta?.pagination ?? null };
  }

  protected async updateResource(id: ResourceId, body: Record<string, unknown>, options?: RequestOptions): Promise<z.infer<S>> {
    const path = this.itemPath(id);
    const data = await this.transport.put(path, body, objectEnvelopeSchema, options);
    return decodeBody(this.definition.schema, data[this.definition.singular], { method: 'PUT', path });
  }

  protected async createResource(body: Record<string, unknown>, options?: RequestOptions): Promise<z.infer<S>> {
    const path = this.definition.path;
    const data = await this.transport.post(path, body, objectEnvelopeSchema, options);
    return decodeBody(this.definition.schema, data[this.definition.singular], { method: 'POST', path });
  }

  protected async deleteResource(id: ResourceId, options?: RequestOptions): Promise<void> {
    await this.transport.delete(this.itemPath(id), options);
  }

  protected async deleteWithAction(id: ResourceId, options?: RequestOptions): Promise<Action> {
    const data = await this.transport.request({ method: 'DELETE', path: this.itemPath(id), ...options }, actionEnvelopeSchema);
    return data.action;
  }
}
