import { z } from 'zod';
import { idNameSchema, ipv4Schema, ipv6Schema, labelsSchema, protectionSchema } from './common';
import { datacenterSchema, isoSchema, serverTypeSchema } from './catalog';

export const SERVER_STATUSES = [
  'initializing',
  'starting',
  'running',
  'stopping',
  'off',
  'deleting',
  'migrating',
  'rebuilding',
  'unknown'
] as const;

export type ServerStatus = (typeof SERVER_STATUSES)[number];

export const imageSchema = z
  .object({
    id: z.number().int(),
    type: z.enum(['system', 'app', 'snapshot', 'backup', 'temporary']),
    status: z.enum(['available', 'creating', 'unavailable']),
    name: z.string().nullable(),
    description: z.string(),
    image_size: z.number().nullable().optional(),
    disk_size: z.number(),
    created: z.string(),
    os_flavor: z.string(),
    os_version: z.string().nullable().optional(),
    architecture: z.string().optional(),
    rapid_deploy: z.boolean().optional(),
    deprecated: z.string().nullable().optional(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type Image = z.infer<typeof imageSchema>;

export const placementGroupSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    type: z.literal('spread'),
    created: z.string(),
    servers: z.array(z.number().int()),
    labels: labelsSchema
  })
  .passthrough();

export type PlacementGroup = z.infer<typeof placementGroupSchema>;

export const sshKeySchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    fingerprint: z.string(),
    public_key: z.string(),
    created: z.string(),
    labels: labelsSchema
  })
  .passthrough();

export type SshKey = z.infer<typeof sshKeySchema>;

export const serverSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    status: z.enum(SERVER_STATUSES),
    created: z.string(),
    public_net: z
      .object({
        ipv4: ipv4Schema.nullable(),
        ipv6: ipv6Schema.nullable(),
        floating_ips: z.array(z.number().int()),
        firewalls: z.array(z.object({ id: z.number().int(), status: z.string() }).passthrough()).optional()
      })
      .passthrough()
      .optional(),
    private_net: z
      .array(z.object({ network: z.number().int(), ip: z.string(), alias_ips: z.array(z.string()) }).passthrough())
      .optional(),
    server_type: z.union([serverTypeSchema, idNameSchema]),
    datacenter: datacenterSchema.optional(),
    image: imageSchema.nullable().optional(),
    iso: isoSchema.nullable().optional(),
    rescue_enabled: z.boolean().optional(),
    locked: z.boolean().optional(),
    backup_window: z.string().nullable().optional(),
    protection: z.object({ delete: z.boolean(), rebuild: z.boolean() }).passthrough().optional(),
    labels: labelsSchema,
    volumes: z.array(z.number().int()).optional(),
    primary_disk_size: z.number().optional(),
    placement_group: placementGroupSchema.nullable().optional()
  })
  .passthrough();

export type Server = z.infer<typeof serverSchema>;
