import type { Application } from "express";
import { requireAdminToken } from "../middleware/require-admin-token.js";
import * as codesHandlers from "./codes.js";
import type { CodesRouteConfig } from "./codes.js";

export type RoutesConfig = CodesRouteConfig & {
  adminToken?: string;
};

export function registerRoutes(app: Application, config: RoutesConfig): void {
  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.use("/api/admin", requireAdminToken(config.adminToken));
  app.get("/api/admin/codes", codesHandlers.listCodes(config));
  app.post("/api/admin/codes/sweep", codesHandlers.sweepCodes(config));
  app.post("/api/admin/codes/mark", codesHandlers.markCodes(config));
}
