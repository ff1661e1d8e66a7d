import { z } from 'zod';
import { dnsPtrSchema, labelsSchema, protectionSchema } from './common';
import { locationSchema, loadBalancerTypeSchema } from './catalog';

export const networkSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    ip_range: z.string(),
    subnets: z.array(
      z
        .object({
          type: z.enum(['cloud', 'server', 'vswitch']),
          ip_range: z.string().optional(),
          network_zone: z.string(),
          gateway: z.string(),
          vswitch_id: z.number().int().nullable().optional()
        })
        .passthrough()
    ),
    routes: z.array(z.object({ destination: z.string(), gateway: z.string() })),
    servers: z.array(z.number().int()),
    load_balancers: z.array(z.number().int()).optional(),
    expose_routes_to_vswitch: z.boolean().optional(),
    created: z.string(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type Network = z.infer<typeof networkSchema>;

export const firewallRuleSchema = z
  .object({
    direction: z.enum(['in', 'out']),
    protocol: z.enum(['tcp', 'udp', 'icmp', 'esp', 'gre']),
    port: z.string().nullable().optional(),
    source_ips: z.array(z.string()).optional(),
    destination_ips: z.array(z.string()).optional(),
    description: z.string().nullable().optional()
  })
  .passthrough();

export type FirewallRule = z.infer<typeof firewallRuleSchema>;

export const firewallResourceSchema = z
  .object({
    type: z.enum(['server', 'label_selector']),
    server: z.object({ id: z.number().int() }).optional(),
    label_selector: z.object({ selector: z.string() }).optional()
  })
  .passthrough();

export type FirewallResource = z.infer<typeof firewallResourceSchema>;

export const firewallSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    rules: z.array(firewallRuleSchema),
    applied_to: z.array(firewallResourceSchema),
    created: z.string(),
    labels: labelsSchema
  })
  .passthrough();

export type Firewall = z.infer<typeof firewallSchema>;

export const floatingIpSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string().nullable(),
    ip: z.string(),
    type: z.enum(['ipv4', 'ipv6']),
    server: z.number().int().nullable(),
    dns_ptr: z.array(dnsPtrSchema),
    home_location: locationSchema,
    blocked: z.boolean(),
    created: z.string(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type FloatingIp = z.infer<typeof floatingIpSchema>;

export const primaryIpSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    ip: z.string(),
    type: z.enum(['ipv4', 'ipv6']),
    assignee_id: z.number().int().nullable(),
    assignee_type: z.literal('server'),
    auto_delete: z.boolean(),
    blocked: z.boolean(),
    dns_ptr: z.array(dnsPtrSchema),
    created: z.string(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type PrimaryIp = z.infer<typeof primaryIpSchema>;

export const certificateSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    type: z.enum(['uploaded', 'managed']),
    certificate: z.string().nullable(),
    domain_names: z.array(z.string()),
    fingerprint: z.string().nullable(),
    not_valid_before: z.string().nullable(),
    not_valid_after: z.string().nullable(),
    created: z.string(),
    status: z
      .object({
        issuance: z.enum(['pending', 'completed', 'failed']),
        renewal: z.enum(['scheduled', 'pending', 'failed', 'unavailable']),
        error: z.object({ code: z.string(), message: z.string() }).nullable().optional()
      })
      .passthrough()
      .nullable()
      .optional(),
    used_by: z.array(z.object({ id: z.number().int(), type: z.string() }).passthrough()),
    labels: labelsSchema
  })
  .passthrough();

export type Certificate = z.infer<typeof certificateSchema>;

export const loadBalancerServiceSchema = z
  .object({
    protocol: z.enum(['tcp', 'http', 'https']),
    listen_port: z.number().int(),
    destination_port: z.number().int(),
    proxyprotocol: z.boolean(),
    health_check: z.record(z.unknown()).optional(),
    http: z.record(z.unknown()).optional()
  })
  .passthrough();

export type LoadBalancerService = z.infer<typeof loadBalancerServiceSchema>;

export const loadBalancerTargetSchema = z
  .object({
    type: z.enum(['server', 'label_selector', 'ip']),
    server: z.object({ id: z.number().int() }).optional(),
    label_selector: z.object({ selector: z.string() }).optional(),
    ip: z.object({ ip: z.string() }).optional(),
    use_private_ip: z.boolean().optional()
  })
  .passthrough();

export type LoadBalancerTarget = z.infer<typeof loadBalancerTargetSchema>;

export const loadBalancerSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    public_net: z.object({ enabled: z.boolean() }).passthrough(),
    private_net: z.array(z.object({ network: z.number().int(), ip: z.string() }).passthrough()),
    location: locationSchema,
    load_balancer_type: loadBalancerTypeSchema,
    algorithm: z.object({ type: z.enum(['round_robin', 'least_connections']) }),
    services: z.array(loadBalancerServiceSchema),
    targets: z.array(loadBalancerTargetSchema),
    created: z.string(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type LoadBalancer = z.infer<typeof loadBalancerSchema>;
