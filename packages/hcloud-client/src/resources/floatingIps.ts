import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { floatingIpSchema } from '../schemas/networking';
import type { FloatingIp } from '../schemas/networking';
import type { HcloudTransport } from '../transport';
import type { ListParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface CreateFloatingIpInput {
  type: 'ipv4' | 'ipv6';
  /** Either `server` or `homeLocation` is required. */
  server?: number;
  homeLocation?: string;
  name?: string;
  description?: string;
  labels?: Labels;
}

export interface UpdateFloatingIpInput {
  name?: string;
  description?: string;
  labels?: Labels;
}

const createFloatingIpResponseSchema = z.object({
  floating_ip: floatingIpSchema,
  action: actionSchema.nullable().default(null)
});

export class FloatingIpActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/floating_ips');
  }

  assign(id: ResourceId, server: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'assign', { server }, options);
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

export class FloatingIpsClient extends ResourceClient<typeof floatingIpSchema, ListParams> {
  private readonly actionsClient: FloatingIpActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/floating_ips', singular: 'floating_ip', plural: 'floating_ips', schema: floatingIpSchema });
    this.actionsClient = new FloatingIpActionsClient(transport);
  }

  /** The action is `null` unless the address was assigned to a server on creation. */
  async create(input: CreateFloatingIpInput, options?: RequestOptions): Promise<{ floatingIp: FloatingIp; action: Action | null }> {
    const data = await this.transport.request(
      { method: 'POST', path: this.definition.path, body: snakeBody(input), ...options },
      createFloatingIpResponseSchema
    );
    return { floatingIp: data.floating_ip, action: data.action };
  }

  update(id: ResourceId, input: UpdateFloatingIpInput, options?: RequestOptions): Promise<FloatingIp> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): FloatingIpActionsClient {
    return this.actionsClient;
  }
}
