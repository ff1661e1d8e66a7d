import { z } from 'zod';
import { labelsSchema, protectionSchema } from './common';
import { locationSchema } from './catalog';

export const volumeSchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    status: z.enum(['creating', 'available']),
    size: z.number(),
    server: z.number().int().nullable(),
    location: locationSchema,
    linux_device: z.string().nullable(),
    format: z.string().nullable().optional(),
    created: z.string(),
    protection: protectionSchema.optional(),
    labels: labelsSchema
  })
  .passthrough();

export type Volume = z.infer<typeof volumeSchema>;
