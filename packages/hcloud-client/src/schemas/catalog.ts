import { z } from 'zod';

export const locationSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    country: z.string(),
    city: z.string(),
    latitude: z.number(),
    longitude: z.number(),
    network_zone: z.string()
  })
  .passthrough();

export type Location = z.infer<typeof locationSchema>;

export const datacenterSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    location: locationSchema,
    server_types: z
      .object({
        supported: z.array(z.number().int()),
        available: z.array(z.number().int()),
        available_for_migration: z.array(z.number().int())
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type Datacenter = z.infer<typeof datacenterSchema>;

const priceSchema = z.object({ net: z.string(), gross: z.string() });

const locationPriceSchema = z
  .object({
    location: z.string(),
    price_hourly: priceSchema.optional(),
    price_monthly: priceSchema
  })
  .passthrough();

export const serverTypeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    cores: z.number().int(),
    memory: z.number(),
    disk: z.number(),
    storage_type: z.enum(['local', 'network']),
    cpu_type: z.enum(['shared', 'dedicated']),
    architecture: z.string().optional(),
    deprecated: z.boolean().nullable().optional(),
    prices: z.array(locationPriceSchema).optional()
  })
  .passthrough();

export type ServerType = z.infer<typeof serverTypeSchema>;

export const loadBalancerTypeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    description: z.string(),
    max_connections: z.number().int(),
    max_services: z.number().int(),
    max_targets: z.number().int(),
    max_assigned_certificates: z.number().int(),
    deprecated: z.string().nullable().optional(),
    prices: z.array(locationPriceSchema).optional()
  })
  .passthrough();

export type LoadBalancerType = z.infer<typeof loadBalancerTypeSchema>;

export const isoSchema = z
  .object({
    id: z.number().int(),
    name: z.string().nullable(),
    description: z.string(),
    type: z.enum(['public', 'private']).nullable(),
    architecture: z.string().nullable().optional()
  })
  .passthrough();

export type Iso = z.infer<typeof isoSchema>;

export const pricingSchema = z
  .object({
    currency: z.string(),
    vat_rate: z.string(),
    server_types: z.array(z.object({ id: z.number().int(), name: z.string(), prices: z.array(locationPriceSchema) }).passthrough()),
    load_balancer_types: z
      .array(z.object({ id: z.number().int(), name: z.string(), prices: z.array(locationPriceSchema) }).passthrough())
      .optional()
  })
  .passthrough();

export type Pricing = z.infer<typeof pricingSchema>;
