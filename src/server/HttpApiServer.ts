// src/server/HttpApiServer.ts
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';

import type { AdminApiController } from '../controllers/AdminApiController';
import type { HealthController } from '../controllers/HealthController';
import type { AdminAuth } from '../middleware/AdminAuth';
import { AdminSurfaceBinder } from '../delegates/AdminSurfaceBinder';
import { errorMessage } from '../contracts/errors';
import { Logger } from '../utils/logger';

const JSON_LIMIT = '64kb';

export type HttpDeps = {
  adminCtrl: AdminApiController;
  healthCtrl: HealthController;
  adminAuth: AdminAuth;
};

export class HttpApiServer {
  private readonly adminBinder = new AdminSurfaceBinder();
  private readonly log = new Logger('http');

  createApp(deps: HttpDeps): Express {
    const app = express();
    app.disable('x-powered-by');
    this.composeRoutesAndMiddleware(app, deps);
    return app;
  }

  composeRoutesAndMiddleware(app: Express, deps: HttpDeps): void {
    app.get('/', (req, res) => deps.healthCtrl.getRoot(req, res));
    this.adminBinder.bindAdminAuth(app, deps.adminAuth);

    app.get('/api/admin/reports/conversion', (req, res) => deps.adminCtrl.getConversionReport(req, res));
    app.get('/api/admin/outbox', (req, res) => deps.adminCtrl.listOutbox(req, res));
    app.post(
      '/api/admin/outbox/requeue',
      express.json({ limit: JSON_LIMIT }),
      (req, res) => deps.adminCtrl.requeueErrors(req, res),
    );
    app.post(
      '/api/admin/outbox/run',
      express.json({ limit: JSON_LIMIT }),
      (req, res, next) => {
        deps.adminCtrl.runOutbox(req, res).catch(next);
      },
    );

    // body-parser errors carry their own status (400/413)
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const status = HttpApiServer.statusOf(err);
      if (status >= 500) this.log.error('Unhandled request error', err);
      res.status(status).json({ error: status >= 500 ? 'internal_error' : errorMessage(err, 'bad_request') });
    });
  }

  listen(app: Express, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = app.listen(port, () => {
        this.log.info(`Admin API listening on :${port}`);
        resolve(server);
      });
      server.once('error', reject);
    });
  }

  private static statusOf(err: unknown): number {
    if (typeof err === 'object' && err !== null && 'status' in err) {
      const s = err.status;
      if (typeof s === 'number' && s >= 400 && s < 600) return s;
    }
    return 500;
  }
}
