import type { Express, RequestHandler } from 'express';

export type AdminGuard = { authenticateAdmin: RequestHandler };

export class AdminSurfaceBinder {
  private mountedAuth = false;

  public bindAdminAuth(app: Express, adminAuth: AdminGuard): void {
    if (this.mountedAuth) return;
    app.use('/api/admin', (req, res, next) => adminAuth.authenticateAdmin(req, res, next));
    this.mountedAuth = true;
  }
}
