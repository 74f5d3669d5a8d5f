import crypto from "crypto";
import { NextFunction, Request, Response } from "express";

export function attachRequestContext(req: Request, res: Response, next: NextFunction) {
  const incoming = req.get("x-request-id");
  const requestId = incoming && /^[A-Za-z0-9._-]{8,128}$/.test(incoming) ? incoming : crypto.randomUUID();
  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.locals.startedAt = Date.now();
  res.setHeader("X-Request-Id", requestId);
  next();
}
