import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { primaryIpSchema } from '../schemas/networking';
import type { PrimaryIp } from '../schemas/networking';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface PrimaryIpListParams extends ListParams {
  ip?: string;
}

export interface CreatePrimaryIpInput {
  name: string;
  type: 'ipv4' | 'ipv6';
  assigneeType?: 'server';
  /** Either `assigneeId` or `datacenter` is required. */
  assigneeId?: number;
  datacenter?: string;
  autoDelete?: boolean;
  labels?: Labels;
}

export interface UpdatePrimaryIpInput {
  name?: string;
  autoDelete?: boolean;
  labels?: Labels;
}

const createPrimaryIpResponseSchema = z.object({
  primary_ip: primaryIpSchema,
  action: actionSchema.nullable().default(null)
});

export class PrimaryIpActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/primary_ips');
  }

  /** The server must be powered off. */
  assign(id: ResourceId, assigneeId: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'assign', { assignee_id: assigneeId, assignee_type: 'server' }, options);
  }

  unassign(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'unassign', undefined, options);
  }

  changeDnsPtr(id: ResourceId, input: { ip: string; dnsPtr: string | null }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_dns_ptr', snakeBody({ ip: input.ip, dnsPtr: input.dnsPtr }), options);
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

export class PrimaryIpsClient extends ResourceClient<typeof primaryIpSchema, PrimaryIpListParams> {
  private readonly actionsClient: PrimaryIpActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/primary_ips', singular: 'primary_ip', plural: 'primary_ips', schema: primaryIpSchema });
    this.actionsClient = new PrimaryIpActionsClient(transport);
  }

  async create(input: CreatePrimaryIpInput, options?: RequestOptions): Promise<{ primaryIp: PrimaryIp; action: Action | null }> {
    const data = await this.transport.request(
      { method: 'POST', path: this.definition.path, body: snakeBody({ ...input, assigneeType: input.assigneeType ?? 'server' }), ...options },
      createPrimaryIpResponseSchema
    );
    return { primaryIp: data.primary_ip, action: data.action };
  }

  update(id: ResourceId, input: UpdatePrimaryIpInput, options?: RequestOptions): Promise<PrimaryIp> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): PrimaryIpActionsClient {
    return this.actionsClient;
  }

  protected listQuery(params: PrimaryIpListParams | undefined): QueryParams {
    return { ...super.listQuery(params), ip: params?.ip };
  }
}
