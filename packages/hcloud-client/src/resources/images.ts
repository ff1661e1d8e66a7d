import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { imageSchema } from '../schemas/compute';
import type { Image } from '../schemas/compute';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export type ImageType = Image['type'];

export interface ImageListParams extends ListParams {
  type?: ImageType | readonly ImageType[];
  status?: Image['status'] | readonly Image['status'][];
  boundTo?: number;
  includeDeprecated?: boolean;
  architecture?: 'x86' | 'arm';
}

export interface UpdateImageInput {
  description?: string;
  /** Only a backup can be converted, and only to a snapshot. */
  type?: 'snapshot';
  labels?: Labels;
}

export class ImageActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/images');
  }

  changeProtection(id: ResourceId, input: { delete: boolean }, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'change_protection', snakeBody(input), options);
  }
}

/** Images are created from servers; see `ServerActionsClient.createImage`. */
export class ImagesClient extends ResourceClient<typeof imageSchema, ImageListParams> {
  private readonly actionsClient: ImageActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/images', singular: 'image', plural: 'images', schema: imageSchema });
    this.actionsClient = new ImageActionsClient(transport);
  }

  update(id: ResourceId, input: UpdateImageInput, options?: RequestOptions): Promise<Image> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): ImageActionsClient {
    return this.actionsClient;
  }

  protected listQuery(params: ImageListParams | undefined): QueryParams {
    const type = params?.type;
    const status = params?.status;
    return {
      ...super.listQuery(params),
      type: typeof type === 'string' ? [type] : type,
      status: typeof status === 'string' ? [status] : status,
      bound_to: params?.boundTo,
      include_deprecated: params?.includeDeprecated,
      architecture: params?.architecture
    };
  }
}
