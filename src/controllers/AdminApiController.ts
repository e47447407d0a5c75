// src/controllers/AdminApiController.ts
import type { Request, Response } from 'express';
import type { z } from 'zod';

import type { IOutboxStore } from '../contracts/dao';
import type { IOutboxWorker } from '../contracts/interfaces';
import type { ConversionReportService } from '../services/ConversionReportService';
import {
  AdminParamGuard,
  BatchBodySchema,
  ConversionQuerySchema,
  OutboxQuerySchema,
} from '../delegates/AdminParamGuard';
import { AdminDtoProjector } from '../delegates/AdminDtoProjector';
import { Logger } from '../utils/logger';

type Deps = {
  outbox: IOutboxStore;
  worker: IOutboxWorker;
  reports: ConversionReportService;
  /** Default batch size for requeue/run when the body names none. */
  batchLimit: number;
};

export class AdminApiController {
  private readonly paramGuard = new AdminParamGuard();
  private readonly projector = new AdminDtoProjector();
  private readonly log = new Logger('admin');

  constructor(private readonly deps: Deps) {}

  getConversionReport(req: Request, res: Response): void {
    const q = this.parseOrReject(res, ConversionQuerySchema, req.query);
    if (!q) return;
    const funnels = this.deps.reports.report({ from: q.from, to: q.to }, q.funnel);
    res.json({ funnels });
  }

  listOutbox(req: Request, res: Response): void {
    const q = this.parseOrReject(res, OutboxQuerySchema, req.query);
    if (!q) return;
    const counts = this.deps.outbox.countByStatus();
    const jobs = this.deps.outbox.listByStatus(q.status, q.limit).map((r) => this.projector.outboxJobToDto(r));
    res.json({ counts, jobs });
  }

  requeueErrors(req: Request, res: Response): void {
    const body = this.parseOrReject(res, BatchBodySchema, req.body);
    if (!body) return;
    const requeued = this.deps.outbox.requeueErrors(body.limit ?? this.deps.batchLimit);
    this.log.info(`Requeued ${requeued} failed job(s)`);
    res.json({ requeued });
  }

  async runOutbox(req: Request, res: Response): Promise<void> {
    const body = this.parseOrReject(res, BatchBodySchema, req.body);
    if (!body) return;
    const summary = await this.deps.worker.runOnce(body.limit ?? this.deps.batchLimit);
    if (summary.skipped) {
      res.status(409).json({ error: 'outbox_run_in_flight' });
      return;
    }
    res.json(summary);
  }

  // Sends the 400 itself and yields undefined when the input is rejected.
  private parseOrReject<S extends z.AnyZodObject>(res: Response, schema: S, input: unknown): z.output<S> | undefined {
    try {
      return this.paramGuard.parse(schema, input);
    } catch (e) {
      const detail = e instanceof Error ? e.message : 'invalid request';
      res.status(400).json({ error: 'bad_request', detail });
      return undefined;
    }
  }
}
