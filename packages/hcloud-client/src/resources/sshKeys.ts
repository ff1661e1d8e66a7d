import type { Labels } from '../schemas/common';
import { sshKeySchema } from '../schemas/compute';
import type { SshKey } from '../schemas/compute';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceClient, snakeBody } from './base';

export interface SshKeyListParams extends ListParams {
  fingerprint?: string;
}

export class SshKeysClient extends ResourceClient<typeof sshKeySchema, SshKeyListParams> {
  constructor(transport: HcloudTransport) {
    super(transport, { path: '/ssh_keys', singular: 'ssh_key', plural: 'ssh_keys', schema: sshKeySchema });
  }

  create(input: { name: string; publicKey: string; labels?: Labels }, options?: RequestOptions): Promise<SshKey> {
    return this.createResource(snakeBody(input), options);
  }

  update(id: ResourceId, input: { name?: string; labels?: Labels }, options?: RequestOptions): Promise<SshKey> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  protected listQuery(params: SshKeyListParams | undefined): QueryParams {
    return { ...super.listQuery(params), fingerprint: params?.fingerprint };
  }
}
