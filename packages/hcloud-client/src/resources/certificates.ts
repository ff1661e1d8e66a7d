import { z } from 'zod';
import { actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { certificateSchema } from '../schemas/networking';
import type { Certificate } from '../schemas/networking';
import type { HcloudTransport } from '../transport';
import type { ListParams, QueryParams, RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface CertificateListParams extends ListParams {
  type?: 'uploaded' | 'managed' | readonly ('uploaded' | 'managed')[];
}

export type CreateCertificateInput =
  | { type?: 'uploaded'; name: string; certificate: string; privateKey: string; labels?: Labels }
  | { type: 'managed'; name: string; domainNames: readonly string[]; labels?: Labels };

export interface UpdateCertificateInput {
  name?: string;
  labels?: Labels;
}

const createCertificateResponseSchema = z.object({
  certificate: certificateSchema,
  action: actionSchema.nullable().default(null)
});

export class CertificateActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/certificates');
  }

  /** Retries issuance or renewal of a managed certificate. */
  retry(id: ResourceId, options?: RequestOptions): Promise<Action> {
    return this.run(id, 'retry', undefined, options);
  }
}

export class CertificatesClient extends ResourceClient<typeof certificateSchema, CertificateListParams> {
  private readonly actionsClient: CertificateActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/certificates', singular: 'certificate', plural: 'certificates', schema: certificateSchema });
    this.actionsClient = new CertificateActionsClient(transport);
  }

  /** Managed certificates come with the issuance action; uploaded ones with `null`. */
  async create(input: CreateCertificateInput, options?: RequestOptions): Promise<{ certificate: Certificate; action: Action | null }> {
    return this.transport.request(
      { method: 'POST', path: this.definition.path, body: snakeBody(input), ...options },
      createCertificateResponseSchema
    );
  }

  update(id: ResourceId, input: UpdateCertificateInput, options?: RequestOptions): Promise<Certificate> {
    return this.updateResource(id, snakeBody(input), options);
  }

  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): CertificateActionsClient {
    return this.actionsClient;
  }

  protected listQuery(params: CertificateListParams | undefined): QueryParams {
    const type = params?.type;
    return { ...super.listQuery(params), type: typeof type === 'string' ? [type] : type };
  }
}
