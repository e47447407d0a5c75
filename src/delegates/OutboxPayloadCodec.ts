// src/delegates/OutboxPayloadCodec.ts
import { z } from 'zod';

import type { ContactAttributes, FunnelType, OutboxJobRow } from '../contracts/domain';
import { PayloadDecodeError } from '../contracts/errors';

const AttributeValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const FunnelTypeSchema = z.enum(['language', 'non_language']) satisfies z.ZodType<FunnelType>;

export const OutboxPayloadSchema = z.object({
  email: z
    .string({ required_error: "Missing required field 'email'" })
    .min(1, "Field 'email' must not be empty"),
  funnel_type: FunnelTypeSchema.optional(),
  user_id: z.number().int().nullable().optional(),
  test_id: z.number().int().nullable().optional(),
  list_ids: z.array(z.number().int().positive()).optional(),
  attributes: z.record(AttributeValueSchema).optional(),
  update_enabled: z.boolean().optional(),
  purchased_at: z.string().optional(),
  order_ref: z.number().int().optional(),
});

export type OutboxPayload = z.infer<typeof OutboxPayloadSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}

/** Parses and validates the JSON snapshot stored on a job. */
export function decodeOutboxPayload(job: Pick<OutboxJobRow, 'id' | 'payload'>): OutboxPayload {
  let raw: unknown;
  try {
    raw = JSON.parse(job.payload);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new PayloadDecodeError(`Invalid JSON payload for job ${job.id}: ${reason}`);
  }
  const parsed = OutboxPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    throw new PayloadDecodeError(`Invalid payload for job ${job.id}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function buildUpsertPayload(input: {
  email: string;
  funnelType: FunnelType;
  userId: number | null;
  testId: number | null;
  listId: number;
}): OutboxPayload {
  return {
    email: input.email,
    funnel_type: input.funnelType,
    user_id: input.userId,
    test_id: input.testId,
    list_ids: [input.listId],
    attributes: { FUNNEL_TYPE: input.funnelType },
  };
}

export const PURCHASE_ATTRIBUTES = {
  purchased: 'CERTIFICATE_PURCHASED',
  purchasedAt: 'CERTIFICATE_PURCHASED_AT',
} as const;

export function buildPurchasePayload(input: {
  email: string;
  funnelType: FunnelType;
  userId: number | null;
  testId: number | null;
  purchasedAt: Date;
  orderRef: number;
}): OutboxPayload {
  const iso = input.purchasedAt.toISOString();
  return {
    email: input.email,
    funnel_type: input.funnelType,
    user_id: input.userId,
    test_id: input.testId,
    list_ids: [],
    attributes: {
      FUNNEL_TYPE: input.funnelType,
      [PURCHASE_ATTRIBUTES.purchased]: 1,
      [PURCHASE_ATTRIBUTES.purchasedAt]: iso,
    },
    purchased_at: iso,
    order_ref: input.orderRef,
  };
}

/** Attributes sent for update_after_purchase: stored ones plus the purchase flags. */
export function purchaseAttributes(payload: OutboxPayload): ContactAttributes {
  return {
    ...(payload.attributes ?? {}),
    [PURCHASE_ATTRIBUTES.purchased]: 1,
    [PURCHASE_ATTRIBUTES.purchasedAt]: payload.purchased_at ?? '',
  };
}
