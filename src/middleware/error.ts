import type { Request, Response, NextFunction } from "express";

type StatusError = Error & { status?: number };

export function errorHandler(
  err: StatusError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status = err.status ?? 500;
  if (status >= 500) {
    console.error("[Server] Unhandled error", { message: err.message });
  }
  const message = err.message || "Internal server error";
  res.status(status).json({ error: message });
}
