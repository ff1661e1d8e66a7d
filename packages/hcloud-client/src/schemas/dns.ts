import { z } from 'zod';
import { labelsSchema, protectionSchema } from './common';

export const RRSET_TYPES = ['A', 'AAAA', 'CNAME', 'MX', 'NS', 'PTR', 'SOA', 'SRV', 'TXT'] as const;

export type RRSetType = (typeof RRSET_TYPES)[number];

export const zoneSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    mode: z.enum(['primary', 'secondary']),
    status: z.enum(['ok', 'updating', 'error']),
    ttl: z.number().int(),
    created: z.string(),
    record_count: z.number().int().optional(),
    primary_nameservers: z.array(z.object({ address: z.string(), port: z.number().int().optional() }).passthrough()).optional(),
    authoritative_nameservers: z.object({ assigned: z.array(z.string()) }).passthrough().optional(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type Zone = z.infer<typeof zoneSchema>;

export const rrsetRecordSchema = z.object({
  value: z.string(),
  comment: z.string().nullable().optional()
});

export type RRSetRecord = z.infer<typeof rrsetRecordSchema>;

export const rrsetSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.enum(RRSET_TYPES),
    ttl: z.number().int().nullable(),
    records: z.array(rrsetRecordSchema),
    zone: z.number().int(),
    protection: z.object({ change: z.boolean() }).passthrough().optional(),
    labels: labelsSchema
  })
  .passthrough();

export type RRSet = z.infer<typeof rrsetSchema>;
