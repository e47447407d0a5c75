// src/middleware/AdminAuth.ts
import type { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';

/** Bearer-token guard for /api/admin. Without a configured token every request is refused. */
export class AdminAuth {
  private readonly bearer?: string;

  constructor(token: string | undefined) {
    this.bearer = token?.trim() || undefined;
  }

  authenticateAdmin = (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;

    if (this.bearer && header && header.startsWith('Bearer ')) {
      const token = header.slice(7).trim();
      if (this.timingSafeEqualStr(token, this.bearer)) {
        next();
        return;
      }
    }

    res.status(401).send('Unauthorized');
  };

  private timingSafeEqualStr(a: string, b: string): boolean {
    const ab = Buffer.from(a, 'utf8');
    const bb = Buffer.from(b, 'utf8');
    if (ab.length !== bb.length) return false;
    return crypto.timingSafeEqual(ab, bb);
  }
}
