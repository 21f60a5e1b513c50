import { z } from 'zod';
import { config } from '../../lib/config.js';

export const extractRequestSchema = z.object({
  html: z
    .string()
    .refine((html) => Buffer.byteLength(html, 'utf8') <= config.maxFragmentBytes, {
      message: 'Fragment too large',
    }),
});

export const extractResponseSchema = z.object({
  value: z.number().int().nonnegative().nullable(),
  cached: z.boolean(),
});

export const interceptResponseSchema = z.discriminatedUnion('transformed', [
  z.object({ transformed: z.literal(true), value: z.number().int().nonnegative() }),
  z.object({ transformed: z.literal(false), html: z.string() }),
]);

export const invalidateRequestSchema = z.object({
  reason: z.enum(['settings-change', 'uninstall', 'manual']),
});

export const invalidateResponseSchema = z.object({
  cleared: z.number().int().nonnegative(),
});

export const clearEntryParamsSchema = z.object({
  key: z.string().min(1),
});

export const clearEntryResponseSchema = z.object({
  cleared: z.boolean(),
});

export const errorResponseSchema = z.object({
  error: z.object({
    code: z.enum([
      'BadRequest',
      'NotFound',
      'InternalError',
      'ServiceUnavailable',
      'TooManyRequests',
      'VALIDATION_ERROR',
      'RATE_LIMIT_EXCEEDED',
      'CACHE_UNAVAILABLE',
      'INTERNAL_ERROR',
    ]),
    message: z.string(),
    statusCode: z.number(),
    details: z.record(z.string(), z.unknown()).optional(),
  }),
});

export type ExtractRequestSchema = z.infer<typeof extractRequestSchema>;
export type ExtractResponseSchema = z.infer<typeof extractResponseSchema>;
export type InterceptResponseSchema = z.infer<typeof interceptResponseSchema>;
export type InvalidateRequestSchema = z.infer<typeof invalidateRequestSchema>;
export type ErrorResponseSchema = z.infer<typeof errorResponseSchema>;
