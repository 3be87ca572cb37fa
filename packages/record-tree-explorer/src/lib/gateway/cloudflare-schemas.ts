import { z } from 'zod';

export const apiMessageSchema = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  message: z.string(),
});

export const resultInfoSchema = z.object({
  page: z.number().int(),
  per_page: z.number().int().optional(),
  total_pages: z.number().int().optional(),
  count: z.number().int().optional(),
  total_count: z.number().int().optional(),
});

export const zoneSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

export const dnsRecordSchema = z.object({
  id: z.string().min(1),
  zone_id: z.string().optional(),
  name: z.string(),
  type: z.string(),
  content: z.string(),
  ttl: z.number().int(),
  proxied: z.boolean().optional().default(false),
  priority: z.number().int().optional(),
  comment: z.string().nullable().optional(),
});

export const deletedRecordSchema = z.object({
  id: z.string(),
});

/** Envelope shared by every v4 endpoint. */
export function envelopeSchema<TResult extends z.ZodTypeAny>(result: TResult) {
  return z.object({
    success: z.boolean(),
    errors: z.array(apiMessageSchema).default([]),
    messages: z.array(apiMessageSchema).optional(),
    result: result.nullable().optional(),
    result_info: resultInfoSchema.nullable().optional(),
  });
}

export const errorEnvelopeSchema = z.object({
  success: z.boolean().optional(),
  errors: z.array(apiMessageSchema).default([]),
});

export type CloudflareZone = z.infer<typeof zoneSchema>;
export type CloudflareDnsRecord = z.infer<typeof dnsRecordSchema>;
export type CloudflareResultInfo = z.infer<typeof resultInfoSchema>;

export const zoneListEnvelopeSchema = envelopeSchema(z.array(zoneSchema));
export const recordListEnvelopeSchema = envelopeSchema(z.array(dnsRecordSchema));
export const recordEnvelopeSchema = envelopeSchema(dnsRecordSchema);
export const deletedRecordEnvelopeSchema = envelopeSchema(deletedRecordSchema);
