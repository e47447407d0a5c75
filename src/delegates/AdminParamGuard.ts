// src/delegates/AdminParamGuard.ts
import { z } from 'zod';

const IsoDate = z
  .string()
  .trim()
  .min(1)
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'must be an ISO-8601 date' })
  .transform((s) => new Date(s));

export const ConversionQuerySchema = z.object({
  from: IsoDate.optional(),
  to: IsoDate.optional(),
  funnel: z.enum(['language', 'non_language']).optional(),
});

export const OutboxQuerySchema = z.object({
  status: z.enum(['pending', 'success', 'error']).default('error'),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

export const BatchBodySchema = z.object({
  limit: z.number().int().min(1).max(1000).optional(),
});

export class AdminParamGuard {
  /** Validates request input; failures are TypeErrors the controller turns into 400s. */
  parse<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
      const detail = result.error.issues
        .map((i) => `${i.path.length ? i.path.join('.') : 'body'} ${i.message}`)
        .join('; ');
      throw new TypeError(detail);
    }
    return result.data;
  }
}
