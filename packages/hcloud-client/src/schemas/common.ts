import { z } from 'zod';

export const errorPayloadSchema = z.object({
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional()
    })
    .passthrough()
});

export const validationDetailsSchema = z.object({
  fields: z.array(
    z.object({
      name: z.string(),
      messages: z.array(z.string()).default([])
    })
  )
});

export const paginationSchema = z.object({
  page: z.number().int(),
  per_page: z.number().int(),
  previous_page: z.number().int().nullable(),
  next_page: z.number().int().nullable(),
  last_page: z.number().int().nullable(),
  total_entries: z.number().int().nullable()
});

export type Pagination = z.infer<typeof paginationSchema>;

/** Outer shape of every list response; the item array sits under a resource specific key. */
export const listEnvelopeSchema = z
  .object({
    meta: z.object({ pagination: paginationSchema }).passthrough().optional()
  })
  .passthrough();

export const labelsSchema = z.record(z.string());

export type Labels = z.infer<typeof labelsSchema>;

export const protectionSchema = z.object({ delete: z.boolean() }).passthrough();

export const idNameSchema = z.object({ id: z.number().int(), name: z.string() }).passthrough();

export const ipv4Schema = z
  .object({
    ip: z.string(),
    blocked: z.boolean().optional(),
    dns_ptr: z.string().nullable().optional()
  })
  .passthrough();

export const dnsPtrSchema = z.object({ ip: z.string(), dns_ptr: z.string() });

export const ipv6Schema = z
  .object({
    ip: z.string(),
    blocked: z.boolean().optional(),
    dns_ptr: z.array(dnsPtrSchema).nullable().optional()
  })
  .passthrough();

/** Any JSON object; single items sit under a resource specific key. */
export const objectEnvelopeSchema = z.object({}).passthrough();
