import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import { paginationSchema } from '../schemas/common';
import type { Labels } from '../schemas/common';
import { rrsetSchema, zoneSchema } from '../schemas/dns';
import type { RRSet, RRSetRecord, RRSetType, Zone } from '../schemas/dns';
import { formatLabelSelector } from '../labelSelector';
import type { LabelSelector } from '../labelSelector';
import type { HcloudTransport } from '../transport';
import type { ListParams, PaginationParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, encodeId, paginationQuery, snakeBody, validatePagination } from './base';
import type { Page } from './base';

export interface ZoneListParams extends ListParams {
  mode?: Zone['mode'];
}

export interface PrimaryNameserverInput {
  address: string;
  port?: number;
  tsigAlgorithm?: string;
  tsigKey?: string;
}

export interface CreateZoneInput {
  name: string;
  mode: Zone['mode'];
  ttl?: number;
  labels?: Labels;
  /** Secondary zones only. */
  primaryNameservers?: readonly PrimaryNameserverInput[];
  /** Primary zones only: initial content in BIND zone file format. */
  zonefile?: string;
}

export interface RRSetListParams extends PaginationParams {
  name?: string;
  type?: RRSetType | readonly RRSetType[];
  labelSelector?: LabelSelector;
  sort?: string | readonly string[];
}

export interface CreateRRSetInput {
  name: string;
  type: RRSetType;
  /** `undefined` inherits the zone TTL. The minimum is enforced by the API. */
  ttl?: number;
  records: readonly RRSetRecord[];
  labels?: Labels;
}

const createZoneResponseSchema = z.object({ zone: zoneSchema, action: actionSchema });

const zonefileResponseSchema = z.object({ zonefile: z.string() });

const createRRSetResponseSchema = z.object({ rrset: rrsetSchema, action: actionSchema });

const rrsetActionResponseSchema = z.object({ action: actionSchema });

const rrsetEnvelopeSchema = z.object({ rrset: rrsetSchema });

const rrsetListResponseSchema = z.object({
  rrsets: z.array(rrsetSchema),
  meta: z.object({ pagination: paginationSchema }).passthrough().optional()
});

export class ZoneActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/zones');
  }

  /** Default TTL for records without their own. */
  changeTtl(id: ResourceId, ttl: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_ttl', { ttl }, options);
  }

  changePrimaryNameservers(
    id: ResourceId,
    primaryNameservers: readonly PrimaryNameserverInput[],
    options?: RequestOptions
  ): Promise<Action> {
    return this.run(id, 'change_primary_nameservers', { primary_nameservers: primaryNameservers.map((ns) => snakeBody(ns)) }, options);
  }

  /** Replaces the zone content with a BIND zone file. */
  importZonefile(id: ResourceId, zonefile: string, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'import_zonefile', { zonefile }, options);
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

/**
 * Commands on one RRSet. Their actions are zone actions, so `list` and
 * `retrieve` read `/zones/actions`.
 */
export class RRSetActionsClient extends ResourceActionsClient {
  private readonly zonePath: string;

  constructor(transport: HcloudTransport, zone: ResourceId) {
    super(transport, '/zones');
    this.zonePath = `/zones/${encodeId(zone)}/rrsets`;
  }

  setRecords(name: string, type: RRSetType, records: readonly RRSetRecord[], options?: RequestOptions): Promise<Action> {
    return this.runOn(name, type, 'set_records', { records }, options);
  }

  addRecords(
    name: string,
    type: RRSetType,
    records: readonly RRSetRecord[],
    ttl?: number,
    options?: RequestOptions
  ): Promise<Action> {
    return this.runOn(name, type, 'add_records', { records, ttl }, options);
  }

  removeRecords(name: string, type: RRSetType, records: readonly RRSetRecord[], options?: RequestOptions): Promise<Action> {
    return this.runOn(name, type, 'remove_records', { records }, options);
  }

  /** `null` falls back to the zone TTL. */
  changeTtl(name: string, type: RRSetType, ttl: number | null, options?: RequestOptions): Promise<Action> {
    return this.runOn(name, type, 'change_ttl', { ttl }, options);
  }

  changeProtection(name: string, type: RRSetType, input: { change: boolean }, options?: RequestOptions): Promise<Action> {
    return this.runOn(name, type, 'change_protection', snakeBody(input), options);
  }

  private async runOn(
    name: string,
    type: RRSetType,
    command: string,
    body: Record<string, unknown>,
    options?: RequestOptions
  ): Promise<Action> {
    const path = `${this.zonePath}/${encodeId(name)}/${type}/actions/${command}`;
    const data = await this.transport.request({ method: 'POST', path, body, ...options }, rrsetActionResponseSchema);
    return data.action;
  }
}

/** RRSets of one zone, addressed by `(name, type)`. */
export class RRSetsClient {
  private readonly transport: HcloudTransport;
  private readonly basePath: string;
  private readonly actionsClient: RRSetActionsClient;

  constructor(transport: HcloudTransport, zone: ResourceId) {
    this.transport = transport;
    this.basePath = `/zones/${encodeId(zone)}/rrsets`;
    this.actionsClient = new RRSetActionsClient(transport, zone);
  }

  async list(params?: RRSetListParams, options?: RequestOptions): Promise<Page<RRSet>> {
    const path = this.basePath;
    validatePagination('GET', path, params);
    const type = params?.type;
    const sort = params?.sort;
    const query: QueryParams = {
      name: params?.name,
      type: typeof type === 'string' ? [type] : type,
      label_selector: formatLabelSelector(params?.labelSelector),
      sort: typeof sort === 'string' ? [sort] : sort,
      ...paginationQuery(params)
    };
    const data = await this.transport.request({ method: 'GET', path, query, ...options }, rrsetListResponseSchema);
    return { items: data.rrsets, pagination: data.meta?.pagination ?? null };
  }

  async retrieve(name: string, type: RRSetType, options?: RequestOptions): Promise<RRSet> {
    const data = await this.transport.request(
      { method: 'GET', path: this.rrsetPath(name, type), ...options },
      rrsetEnvelopeSchema
    );
    return data.rrset;
  }

  async create(input: CreateRRSetInput, options?: RequestOptions): Promise<{ rrset: RRSet; action: Action }> {
    return this.transport.request(
      { method: 'POST', path: this.basePath, body: snakeBody(input), ...options },
      createRRSetResponseSchema
    );
  }

  /** Only labels can be updated in place; records change through `actions()`. */
  async update(name: string, type: RRSetType, input: { labels: Labels }, options?: RequestOptions): Promise<RRSet> {
    const data = await this.transport.request(
      { method: 'PUT', path: this.rrsetPath(name, type), body: snakeBody(input), ...options },
      rrsetEnvelopeSchema
    );
    return data.rrset;
  }

  async delete(name: string, type: RRSetType, options?: RequestOptions): Promise<Action> {
    const data = await this.transport.request(
      { method: 'DELETE', path: this.rrsetPath(name, type), ...options },
      rrsetActionResponseSchema
    );
    return data.action;
  }

  actions(): RRSetActionsClient {
    return this.actionsClient;
  }

  private rrsetPath(name: string, type: RRSetType): string {
    return `${this.basePath}/${encodeId(name)}/${type}`;
  }
}

export class ZonesClient extends ResourceClient<typeof zoneSchema, ZoneListParams> {
  private readonly actionsClient: ZoneActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/zones', singular: 'zone', plural: 'zones', schema: zoneSchema });
    this.actionsClient = new ZoneActionsClient(transport);
  }

  async create(input: CreateZoneInput, options?: RequestOptions): Promise<{ zone: Zone; action: Action }> {
    const { primaryNameservers, ...rest } = input;
    const body = snakeBody(rest);
    if (primaryNameservers) {
      body.primary_nameservers = primaryNameservers.map((ns) => snakeBody(ns));
    }
    return this.transport.request({ method: 'POST', path: this.definition.path, body, ...options }, createZoneResponseSchema);
  }

  update(id: ResourceId, input: { labels: Labels }, options?: RequestOptions): Promise<Zone> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.deleteWithAction(id, options);
  }

  async exportZonefile(id: ResourceId, options?: RequestOptions): Promise<string> {
    const data = await this.transport.request({ method: 'GET', path: this.itemPath(id, 'zonefile'), ...options }, zonefileResponseSchema);
    return data.zonefile;
  }

  actions(): ZoneActionsClient {
    return this.actionsClient;
  }

  rrsets(zone: ResourceId): RRSetsClient {
    return new RRSetsClient(this.transport, zone);
  }

  protected listQuery(params: ZoneListParams | undefined): QueryParams {
    return { ...super.listQuery(params), mode: params?.mode };
  }
}
