import type { Labels } from '../schemas/common';
import { placementGroupSchema } from '../schemas/compute';
import type { PlacementGroup } from '../schemas/compute';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceClient, snakeBody } from './base';

export interface PlacementGroupListParams extends ListParams {
  type?: 'spread';
}

export class PlacementGroupsClient extends ResourceClient<typeof placementGroupSchema, PlacementGroupListParams> {
  constructor(transport: HcloudTransport) {
    super(transport, {
      path: '/placement_groups',
      singular: 'placement_group',
      plural: 'placement_groups',
      schema: placementGroupSchema
    });
  }

  create(input: { name: string; type?: 'spread'; labels?: Labels }, options?: RequestOptions): Promise<PlacementGroup> {
    return this.createResource(snakeBody({ ...input, type: input.type ?? 'spread' }), options);
  }

  update(id: ResourceId, input: { name?: string; labels?: Labels }, options?: RequestOptions): Promise<PlacementGroup> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  protected listQuery(params: PlacementGroupListParams | undefined): QueryParams {
    return { ...super.listQuery(params), type: params?.type };
  }
}
