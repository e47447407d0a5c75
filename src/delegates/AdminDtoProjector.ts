// src/delegates/AdminDtoProjector.ts
import type { OutboxJobRow } from '../contracts/domain';

export type OutboxJobDto = {
  id: number;
  funnelEntryId: number;
  operationType: string;
  status: string;
  retryCount: number;
  lastError?: string;
  payload: unknown;
  createdAt: number;
  updatedAt: number;
};

export class AdminDtoProjector {
  outboxJobToDto(r: OutboxJobRow): OutboxJobDto {
    return {
      id: r.id,
      funnelEntryId: r.funnel_entry_id,
      operationType: r.operation_type,
      status: r.status,
      retryCount: r.retry_count,
      lastError: r.last_error ?? undefined,
      payload: this.parsePayload(r.payload),
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    };
  }

  // Broken snapshots are shown verbatim so they can be inspected.
  private parsePayload(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      return raw;
    }
  }
}
