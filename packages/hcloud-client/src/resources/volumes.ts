import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { volumeSchema } from '../schemas/storage';
import type { Volume } from '../schemas/storage';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export type VolumeStatus = Volume['status'];

export interface VolumeListParams extends ListParams {
  status?: VolumeStatus | readonly VolumeStatus[];
}

export interface CreateVolumeInput {
  name: string;
  /** Size in GB. */
  size: number;
  location?: string;
  server?: number;
  automount?: boolean;
  format?: 'xfs' | 'ext4';
  labels?: Labels;
}

export interface UpdateVolumeInput {
  name?: string;
  labels?: Labels;
}

const createVolumeResponseSchema = z.object({
  volume: volumeSchema,
  action: actionSchema,
  next_actions: z.array(actionSchema).default([])
});

export class VolumeActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/volumes');
  }

  attach(id: ResourceId, input: { server: number; automount?: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'attach', snakeBody(input), options);
  }

  detach(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'detach', undefined, options);
  }

  /** Volumes only grow; the size is in GB. */
  resize(id: ResourceId, size: number, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'resize', { size }, options);
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

export class VolumesClient extends ResourceClient<typeof volumeSchema, VolumeListParams> {
  private readonly actionsClient: VolumeActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/volumes', singular: 'volume', plural: 'volumes', schema: volumeSchema });
    this.actionsClient = new VolumeActionsClient(transport);
  }

  async create(
    input: CreateVolumeInput,
    options?: RequestOptions
  ): Promise<{ volume: Volume; action: Action; nextActions: Action[] }> {
    const data = await this.transport.request(
      { method: 'POST', path: this.definition.path, body: snakeBody(input), ...options },
      createVolumeResponseSchema
    );
    return { volume: data.volume, action: data.action, nextActions: data.next_actions };
  }

  update(id: ResourceId, input: UpdateVolumeInput, options?: RequestOptions): Promise<Volume> {
    return this.updateResource(id, snakeBody(input), options);
  }

  /** The volume must be detached first. */
  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): VolumeActionsClient {
    return this.actionsClient;
  }

  protected listQuery(params: VolumeListParams | undefined): QueryParams {
    const status = params?.status;
    return { ...super.listQuery(params), status: typeof status === 'string' ? [status] : status };
  }
}
