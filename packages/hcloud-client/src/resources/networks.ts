import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { networkSchema } from '../schemas/networking';
import type { Network } from '../schemas/networking';
import type { HcloudTransport } from '../transport';
import type { ListParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface SubnetInput {
  type: 'cloud' | 'server' | 'vswitch';
  networkZone: string;
  ipRange?: string;
  vswitchId?: number;
}

export interface RouteInput {
  destination: string;
  gateway: string;
}

export interface CreateNetworkInput {
  name: string;
  ipRange: string;
  subnets?: readonly SubnetInput[];
  routes?: readonly RouteInput[];
  exposeRoutesToVswitch?: boolean;
  labels?: Labels;
}

export interface UpdateNetworkInput {
  name?: string;
  exposeRoutesToVswitch?: boolean;
  labels?: Labels;
}

export class NetworkActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/networks');
  }

  addSubnet(id: ResourceId, subnet: SubnetInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'add_subnet', snakeBody(subnet), options);
  }

  deleteSubnet(id: ResourceId, ipRange: string, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'delete_subnet', { ip_range: ipRange }, options);
  }

  addRoute(id: ResourceId, route: RouteInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'add_route', snakeBody(route), options);
  }

  deleteRoute(id: ResourceId, route: RouteInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'delete_route', snakeBody(route), options);
  }

  changeIpRange(id: ResourceId, ipRange: string, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_ip_range', { ip_range: ipRange }, options);
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

export class NetworksClient extends ResourceClient<typeof networkSchema> {
  private readonly actionsClient: NetworkActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/networks', singular: 'network', plural: 'networks', schema: networkSchema });
    this.actionsClient = new NetworkActionsClient(transport);
  }

  create(input: CreateNetworkInput, options?: RequestOptions): Promise<Network> {
    const { subnets, routes, ...rest } = input;
    const body = snakeBody(rest);
    if (subnets) {
      body.subnets = subnets.map((subnet) => snakeBody(subnet));
    }
    if (routes) {
      body.routes = routes.map((route) => snakeBody(route));
    }
    return this.createResource(body, options);
  }

  update(id: ResourceId, input: UpdateNetworkInput, options?: RequestOptions): Promise<Network> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): NetworkActionsClient {
    return this.actionsClient;
  }
}
