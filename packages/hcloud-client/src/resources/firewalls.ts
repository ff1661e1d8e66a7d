import { z } from 'zod';
import { actionListEnvelopeSchema, actionSchema } from '../schemas/action';
import type { Action } from '../schemas/action';
import type { Labels } from '../schemas/common';
import { firewallSchema } from '../schemas/networking';
import type { Firewall } from '../schemas/networking';
import { formatLabelSelector } from '../labelSelector';
import type { LabelSelector } from '../labelSelector';
import type { HcloudTransport } from '../transport';
import type { RequestOptions, ResourceId } from '../types';
import { ResourceActionsClient } from './actions';
import { ResourceClient, snakeBody } from './base';

export interface FirewallRuleInput {
  direction: 'in' | 'out';
  protocol: 'tcp' | 'udp' | 'icmp' | 'esp' | 'gre';
  /** Single port or range (`80`, `1024-2048`); tcp and udp only. */
  port?: string;
  sourceIps?: readonly string[];
  destinationIps?: readonly string[];
  description?: string;
}

export type FirewallTargetInput =
  | { type: 'server'; server: number }
  | { type: 'label_selector'; labelSelector: LabelSelector };

export interface CreateFirewallInput {
  name: string;
  rules?: readonly FirewallRuleInput[];
  applyTo?: readonly FirewallTargetInput[];
  labels?: Labels;
}

export interface UpdateFirewallInput {
  name?: string;
  labels?: Labels;
}

const createFirewallResponseSchema = z.object({
  firewall: firewallSchema,
  actions: z.array(actionSchema).default([])
});

function targetBody(target: FirewallTargetInput): Record<string, unknown> {
  if (target.type === 'server') {
    return { type: 'server', server: { id: target.server } };
  }
  return { type: 'label_selector', label_selector: { selector: formatLabelSelector(target.labelSelector) ?? '' } };
}

export class FirewallActionsClient extends ResourceActionsClient {
  constructor(transport: HcloudTransport) {
    super(transport, '/firewalls');
  }

  /** Replaces every rule of the firewall. */
  async setRules(id: ResourceId, rules: readonly FirewallRuleInput[], options?: RequestOptions): Promise<Action[]> {
    const data = await this.runWith(id, 'set_rules', { rules: rules.map((rule) => snakeBody(rule)) }, actionListEnvelopeSchema, options);
    return data.actions;
  }

  async applyToResources(id: ResourceId, targets: readonly FirewallTargetInput[], options?: RequestOptions): Promise<Action[]> {
    const data = await this.runWith(id, 'apply_to_resources', { apply_to: targets.map(targetBody) }, actionListEnvelopeSchema, options);
    return data.actions;
  }

  async removeFromResources(id: ResourceId, targets: readonly FirewallTargetInput[], options?: RequestOptions): Promise<Action[]> {
    const data = await this.runWith(id, 'remove_from_resources', { remove_from: targets.map(targetBody) }, actionListEnvelopeSchema, options);
    return data.actions;
  }
}

export class FirewallsClient extends ResourceClient<typeof firewallSchema> {
  private readonly actionsClient: FirewallActionsClient;

  constructor(transport: HcloudTransport) {
    super(transport, { path: '/firewalls', singular: 'firewall', plural: 'firewalls', schema: firewallSchema });
    this.actionsClient = new FirewallActionsClient(transport);
  }

  async create(input: CreateFirewallInput, options?: RequestOptions): Promise<{ firewall: Firewall; actions: Action[] }> {
    const body: Record<string, unknown> = { name: input.name, labels: input.labels };
    if (input.rules) {
      body.rules = input.rules.map((rule) => snakeBody(rule));
    }
    if (input.applyTo) {
      body.apply_to = input.applyTo.map(targetBody);
    }
    return this.transport.request(
      { method: 'POST', path: this.definition.path, body: snakeBody(body), ...options },
      createFirewallResponseSchema
    );
  }

  update(id: ResourceId, input: UpdateFirewallInput, options?: RequestOptions): Promise<Firewall> {
    return this.updateResource(id, snakeBody(input), options);
  }

  /** Fails with a conflict while the firewall is still applied to resources. */
  delete(id: ResourceId, options?: RequestOptions): Promise<void> {
    return this.deleteResource(id, options);
  }

  actions(): FirewallActionsClient {
    return this.actionsClient;
  }
}
