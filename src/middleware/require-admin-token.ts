import { timingSafeEqual } from "node:crypto";
import type { Request, Response, NextFunction } from "express";

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer-token guard for the admin API. With no token configured the admin
 * routes are switched off rather than left open.
 */
export function requireAdminToken(adminToken: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminToken) {
      res.status(503).json({ error: "Admin API disabled: ADMIN_TOKEN is not set" });
      return;
    }
    const header = req.headers.authorization ?? "";
    const match = /^Bearer\s+(.+)$/i.exec(header);
    if (!match || !tokensMatch(match[1].trim(), adminToken)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }
    next();
  };
}
