import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { imageSchema, serverSchema } from '../schemas/compute';
import type { Image, Server, ServerStatus } from '../schemas/compute';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface ServerListParams extends ListParams {
  status?: ServerStatus | readonly ServerStatus[];
}

export interface CreateServerInput {
  name: string;
  serverType: string | number;
  image: string | number;
  location?: string | number;
  datacenter?: string | number;
  sshKeys?: readonly (string | number)[];
  volumes?: readonly number[];
  networks?: readonly number[];
  firewalls?: readonly number[];
  userData?: string;
  labels?: Labels;
  automount?: boolean;
  startAfterCreate?: boolean;
  placementGroup?: number;
  publicNet?: {
    enableIpv4?: boolean;
    enableIpv6?: boolean;
    ipv4?: number | null;
    ipv6?: number | null;
  };
}

export interface UpdateServerInput {
  name?: string;
  labels?: Labels;
}

export interface CreateServerResult {
  server: Server;
  action: Action;
  nextActions: Action[];
  rootPassword: string | null;
}

const createServerResponseSchema = z.object({
  server: serverSchema,
  action: actionSchema,
  next_actions: z.array(actionSchema).default([]),
  root_password: z.string().nullable().default(null)
});

const passwordActionSchema = z.object({
  action: actionSchema,
  root_password: z.string().nullable().default(null)
});

const createImageResponseSchema = z.object({ image: imageSchema, action: actionSchema });

const consoleResponseSchema = z.object({ action: actionSchema, wss_url: z.string(), password: z.string() });

export interface PasswordActionResult {
  action: Action;
  rootPassword: string | null;
}

export class ServerActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/servers');
  }

  powerOn(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'poweron', undefined, options);
  }

  /** Cuts power immediately; see `shutdown` for a graceful stop. */
  powerOff(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'poweroff', undefined, options);
  }

  reboot(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'reboot', undefined, options);
  }

  reset(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'reset', undefined, options);
  }

  shutdown(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'shutdown', undefined, options);
  }

  async rebuild(id: ResourceId, input: { image: string | number }, options?: RequestOptions): Promise<PasswordActionResult> {
    const data = await this.runWith(id, 'rebuild', { image: input.image }, passwordActionSchema, options);
    return { action: data.action, rootPassword: data.root_password };
  }

  changeType(id: ResourceId, input: { serverType: string | number; upgradeDisk: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_type', snakeBody(input), options);
  }

  async enableRescue(
    id: ResourceId,
    input: { type?: 'linux64'; sshKeys?: readonly number[] } = {},
    options?: RequestOptions
  ): Promise<PasswordActionResult> {
    const data = await this.runWith(id, 'enable_rescue', snakeBody(input), passwordActionSchema, options);
    return { action: data.action, rootPassword: data.root_password };
  }

  disableRescue(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'disable_rescue', undefined, options);
  }

  enableBackup(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'enable_backup', undefined, options);
  }

  disableBackup(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'disable_backup', undefined, options);
  }

  async createImage(
    id: ResourceId,
    input: { description?: string; type?: 'snapshot' | 'backup'; labels?: Labels } = {},
    options?: RequestOptions
  ): Promise<{ image: Image; action: Action }> {
    return this.runWith(id, 'create_image', snakeBody(input), createImageResponseSchema, options);
  }

  attachIso(id: ResourceId, iso: string | number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'attach_iso', { iso }, options);
  }

  detachIso(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'detach_iso', undefined, options);
  }

  changeProtection(id: ResourceId, input: { delete?: boolean; rebuild?: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }

  attachToNetwork(
    id: ResourceId,
    input: { network: number; ip?: string; aliasIps?: readonly string[]; ipRange?: string },
    options?: RequestOptions
  ): Promise<Action> {
    return this.run(id, 'attach_to_network', snakeBody(input), options);
  }

  detachFromNetwork(id: ResourceId, network: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'detach_from_network', { network }, options);
  }

  changeAliasIps(id: ResourceId, input: { network: number; aliasIps: readonly string[] }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_alias_ips', snakeBody(input), options);
  }

  async requestConsole(
    id: ResourceId,
    options?: RequestOptions
  ): Promise<{ action: Action; wssUrl: string; password: string }> {
    const data = await this.runWith(id, 'request_console', undefined, consoleResponseSchema, options);
    return { action: data.action, wssUrl: data.wss_url, password: data.password };
  }

  addToPlacementGroup(id: ResourceId, placementGroup: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'add_to_placement_group', { placement_group: placementGroup }, options);
  }

  removeFromPlacementGroup(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'remove_from_placement_group', undefined, options);
  }

  changeDnsPtr(id: ResourceId, input: { ip: string; dnsPtr: string | null }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_dns_ptr', snakeBody({ ip: input.ip, dnsPtr: input.dnsPtr }), options);
  }
}

export class ServersClient extends ResourceClient<typeof serverSchema, ServerListParams> {
  private readonly actionsClient: ServerActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/servers', singular: 'server', plural: 'servers', schema: serverSchema });
    this.actionsClient = new ServerActionsClient(transport);
  }

  /**
   * Creation is asynchronous: the server comes back `initializing` together
   * with the action that boots it.
   */
  async create(input: CreateServerInput, options?: RequestOptions): Promise<CreateServerResult> {
    const data = await this.transport.request(
      { method: 'POST', path: this.definition.path, body: serverBody(input), ...options },
      createServerResponseSchema
    );
    return {
      server: data.server,
      action: data.action,
      nextActions: data.next_actions,
      rootPassword: data.root_password
    };
  }

  update(id: ResourceId, input: UpdateServerInput, options?: RequestOptions): Promise<Server> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.deleteWithAction(id, options);
  }

  actions(): ServerActionsClient {
    return this.actionsClient;
  }

  protected listQuery(params: ServerListParams | undefined): QueryParams {
    const status = params?.status;
    return { ...super.listQuery(params), status: typeof status === 'string' ? [status] : status };
  }
}

function serverBody(input: CreateServerInput): Record<string, unknown> {
  const { firewalls, publicNet, ...rest } = input;
  const body = snakeBody(rest);
  if (firewalls) {
    body.firewalls = firewalls.map((firewall) => ({ firewall }));
  }
  if (publicNet) {
    body.public_net = snakeBody(publicNet);
  }
  return body;
}
