import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { loadBalancerSchema } from '../schemas/networking';
import type { LoadBalancer } from '../schemas/networking';
import { formatLabelSelector } from '../labelSelector';
import type { LabelSelector } from '../labelSelector';
import type { HcloudTransport } from '../transport';
import type { RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export type LoadBalancerAlgorithm = 'round_robin' | 'least_connections';

export interface LoadBalancerServiceInput {
  protocol: 'tcp' | 'http' | 'https';
  listenPort: number;
  destinationPort: number;
  proxyprotocol?: boolean;
  /** Passed to the API unchanged, in its snake_case wire form. */
  healthCheck?: Record<string, unknown>;
  /** Passed to the API unchanged, in its snake_case wire form. */
  http?: Record<string, unknown>;
}

export type LoadBalancerTargetInput =
  | { type: 'server'; server: number; usePrivateIp?: boolean }
  | { type: 'label_selector'; labelSelector: LabelSelector; usePrivateIp?: boolean }
  | { type: 'ip'; ip: string };

export interface CreateLoadBalancerInput {
  name: string;
  loadBalancerType: string | number;
  /** Either `location` or `networkZone` is required. */
  location?: string;
  networkZone?: string;
  algorithm?: LoadBalancerAlgorithm;
  services?: readonly LoadBalancerServiceInput[];
  targets?: readonly LoadBalancerTargetInput[];
  publicInterface?: boolean;
  network?: number;
  labels?: Labels;
}

export interface UpdateLoadBalancerInput {
  name?: string;
  labels?: Labels;
}

const createLoadBalancerResponseSchema = z.object({
  load_balancer: loadBalancerSchema,
  action: actionSchema
});

function targetBody(target: LoadBalancerTargetInput): Record<string, unknown> {
  switch (target.type) {
    case 'server':
      return snakeBody({ type: 'server', server: { id: target.server }, usePrivateIp: target.usePrivateIp });
    case 'label_selector':
      return snakeBody({
        type: 'label_selector',
        labelSelector: { selector: formatLabelSelector(target.labelSelector) ?? '' },
        usePrivateIp: target.usePrivateIp
      });
    case 'ip':
      return { type: 'ip', ip: { ip: target.ip } };
  }
}

function serviceBody(service: LoadBalancerServiceInput): Record<string, unknown> {
  return snakeBody(service);
}

export class LoadBalancerActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/load_balancers');
  }

  addService(id: ResourceId, service: LoadBalancerServiceInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'add_service', serviceBody(service), options);
  }

  /** Matches the service by `listenPort`; only supplied fields change. */
  updateService(
    id: ResourceId,
    service: Partial<LoadBalancerServiceInput> & { listenPort: number },
    options?: RequestOptions
  ): Promise<Action> {
    return this.run(id, 'update_service', snakeBody(service), options);
  }

  deleteService(id: ResourceId, listenPort: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'delete_service', { listen_port: listenPort }, options);
  }

  addTarget(id: ResourceId, target: LoadBalancerTargetInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'add_target', targetBody(target), options);
  }

  removeTarget(id: ResourceId, target: LoadBalancerTargetInput, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'remove_target', targetBody(target), options);
  }

  changeAlgorithm(id: ResourceId, algorithm: LoadBalancerAlgorithm, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_algorithm', { type: algorithm }, options);
  }

  changeType(id: ResourceId, loadBalancerType: string | number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_type', { load_balancer_type: loadBalancerType }, options);
  }

  attachToNetwork(id: ResourceId, input: { network: number; ip?: string }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'attach_to_network', snakeBody(input), options);
  }

  detachFromNetwork(id: ResourceId, network: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'detach_from_network', { network }, options);
  }

  enablePublicInterface(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'enable_public_interface', undefined, options);
  }

  disablePublicInterface(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'disable_public_interface', undefined, options);
  }

  changeDnsPtr(id: ResourceId, input: { ip: string; dnsPtr: string | null }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_dns_ptr', snakeBody({ ip: input.ip, dnsPtr: input.dnsPtr }), options);
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

export class LoadBalancersClient extends ResourceClient<typeof loadBalancerSchema> {
  private readonly actionsClient: LoadBalancerActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, {
      path: '/load_balancers',
      singular: 'load_balancer',
      plural: 'load_balancers',
      schema: loadBalancerSchema
    });
    this.actionsClient = new LoadBalancerActionsClient(transport);
  }

  async create(input: CreateLoadBalancerInput, options?: RequestOptions): Promise<{ loadBalancer: LoadBalancer; action: Action }> {
    const { algorithm, services, targets, ...rest } = input;
    const body = snakeBody(rest);
    if (algorithm) {
      body.algorithm = { type: algorithm };
    }
    if (services) {
      body.services = services.map(serviceBody);
    }
    if (targets) {
      body.targets = targets.map(targetBody);
    }
    const data = await this.transport.request(
      { method: 'POST', path: this.definition.path, body, ...options },
      createLoadBalancerResponseSchema
    );
    return { loadBalancer: data.load_balancer, action: data.action };
  }

  update(id: ResourceId, input: UpdateLoadBalancerInput, options?: RequestOptions): Promise<LoadBalancer> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): LoadBalancerActionsClient {
    return this.actionsClient;
  }
}
