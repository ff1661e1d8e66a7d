import { z } from 'zod';
import {
  datacenterSchema,
  isoSchema,
  loadBalancerTypeSchema,
  locationSchema,
  pricingSchema,
  serverTypeSchema
} from '../schemas/catalog';
import type { Pricing } from '../schemas/catalog';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions } from '../types';
import { ResourceClient } from './base';

export class LocationsClient extends ResourceClient<typeof locationSchema> {
  constructor(transport: HcloudTransport) {
    super(transport, { path: '/locations', singular: 'location', plural: 'locations', schema: locationSchema });
  }
}

export class DatacentersClient extends ResourceClient<typeof datacenterSchema> {
  constructor(transport: HcloudTransport) {
    super(transport, { path: '/datacenters', singular: 'datacenter', plural: 'datacenters', schema: datacenterSchema });
  }
}

export class ServerTypesClient extends ResourceClient<typeof serverTypeSchema> {
  constructor(transport: HcloudTransport) {
    super(transport, { path: '/server_types', singular: 'server_type', plural: 'server_types', schema: serverTypeSchema });
  }
}

export class LoadBalancerTypesClient extends ResourceClient<typeof loadBalancerTypeSchema> {
  constructor(transport: HcloudTransport) {
    super(transport, {
      path: '/load_balancer_types',
      singular: 'load_balancer_type',
      plural: 'load_balancer_types',
      schema: loadBalancerTypeSchema
    });
  }
}

export interface IsoListParams extends ListParams {
  architecture?: 'x86' | 'arm';
  includeArchitectureWildcard?: boolean;
}

export class IsosClient extends ResourceClient<typeof isoSchema, IsoListParams> {
  constructor(transport: HcloudTransport) {
    super(transport, { path: '/isos', singular: 'iso', plural: 'isos', schema: isoSchema });
  }

  protected listQuery(params: IsoListParams | undefined): QueryParams {
    return {
      ...super.listQuery(params),
      architecture: params?.architecture,
      include_architecture_wildcard: params?.includeArchitectureWildcard
    };
  }
}

const pricingResponseSchema = z.object({ pricing: pricingSchema });

/** Billing: prices for every resource type, per location. */
export class PricingClient {
  private readonly transport: HcloudTransport;

  constructor(transport: HcloudTransport) {
    this.transport = transport;
  }

  async get(options?: RequestOptions): Promise<Pricing> {
    const data = await this.transport.request({ method: 'GET', path: '/pricing', ...options }, pricingResponseSchema);
    return data.pricing;
  }
}
