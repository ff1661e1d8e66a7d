import { z } from 'zod';
import { decodeBody } from '../decode';
import { listEnvelopeSchema } from '../schemas/common';
import { actionEnvelopeSchema, actionSchema } from '../schemas/action';
import type { Action, ActionStatus } from '../schemas/action';
import type { HcloudTransport } from '../transport';
import type { PaginationParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { encodeId, paginationQuery, validatePagination } from './base';
import type { Page } from './base';

export interface ActionListParams extends PaginationParams {
  id?: number | readonly number[];
  status?: ActionStatus | readonly ActionStatus[];
  sort?: string | readonly string[];
}

function toList<T>(value: T | readonly T[] | undefined): readonly T[] | undefined {
  if (value === undefined) {
    return undefined;
  }
  return isReadonlyList(value) ? value : [value];
}

function isReadonlyList<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}

function actionQuery(params: ActionListParams | undefined): QueryParams {
  return {
    id: toList(params?.id),
    status: toList(params?.status),
    sort: toList(params?.sort),
    ...paginationQuery(params)
  };
}

/**
 * Actions scoped to one resource type: `/servers/actions`,
 * `/servers/{id}/actions` and the `POST /servers/{id}/actions/{command}`
 * commands. Resource specific subclasses expose the commands by name.
 */
export class ResourceActionsClient {
  protected readonly transport: HcloudTransport;
  protected readonly basePath: string;

  constructor(transport: HcloudTransport, basePath: string) {
    this.transport = transport;
    this.basePath = basePath;
  }

  async list(params?: ActionListParams, options?: RequestOptions): Promise<Page<Action>> {
    return this.fetchActions(`${this.basePath}/actions`, params, options);
  }

  async retrieve(actionId: number, options?: RequestOptions): Promise<Action> {
    const path = `${this.basePath}/actions/${encodeId(actionId)}`;
    const data = await this.transport.request({ method: 'GET', path, ...options }, actionEnvelopeSchema);
    return data.action;
  }

  /** Actions recorded for a single resource. */
  async listFor(resourceId: ResourceId, params?: ActionListParams, options?: RequestOptions): Promise<Page<Action>> {
    return this.fetchActions(`${this.basePath}/${encodeId(resourceId)}/actions`, params, options);
  }

  protected commandPath(resourceId: ResourceId, command: string): string {
    return `${this.basePath}/${encodeId(resourceId)}/actions/${command}`;
  }

  protected async run(
    resourceId: ResourceId,
    command: string,
    body?: Record<string, unknown>,
    options?: RequestOptions
  ): Promise<Action> {
    const data = await this.transport.request(
      { method: 'POST', path: this.commandPath(resourceId, command), body, ...options },
      actionEnvelopeSchema
    );
    return data.action;
  }

  /** Commands whose response carries more than the action. */
  protected async runWith<S extends z.ZodTypeAny>(
    resourceId: ResourceId,
    command: string,
    body: Record<string, unknown> | undefined,
    schema: S,
    options?: RequestOptions
  ): Promise<z.infer<S>> {
    return this.transport.request({ method: 'POST', path: this.commandPath(resourceId, command), body, ...options }, schema);
  }

  private async fetchActions(path: string, params: ActionListParams | undefined, options?: RequestOptions): Promise<Page<Action>> {
    validatePagination('GET', path, params);
    const data = await this.transport.request(
      { method: 'GET', path, query: actionQuery(params), ...options },
      listEnvelopeSchema
    );
    const items = decodeBody(z.array(actionSchema), data.actions, { method: 'GET', path });
    return { items, pagination: data.meta?.pagination ?? null };
  }
}

/** The global `/actions` endpoint. */
export class ActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '');
  }
}
