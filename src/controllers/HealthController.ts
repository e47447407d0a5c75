// src/controllers/HealthController.ts
import type { Request, Response } from 'express';

import { Logger } from '../utils/logger';

export class HealthController {
  private readonly log = new Logger('http');

  /** `probe` should throw when the database handle is unusable. */
  constructor(private readonly probe: () => void = () => undefined) {}

  public getRoot(_req: Request, res: Response): void {
    try {
      this.probe();
    } catch (e) {
      this.log.error('Health probe failed', e);
      res.status(503).send('UNAVAILABLE');
      return;
    }
    res.status(200).send('OK');
  }
}
