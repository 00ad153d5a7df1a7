import { createHmac, timingSafeEqual } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import type { AppConfig } from "../config";
import { buildSafeRequestLogMetadata, type Logger } from "./logger";

const MUTATING_METHODS = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export const CSRF_FIELD_NAME = "csrf_token";

export function issueCsrfToken(secret: string, userId: number): string {
  return createHmac("sha256", secret).update(`csrf:${userId}`).digest("base64url");
}

export function isValidCsrfToken(secret: string, userId: number, token: string | undefined): boolean {
  if (!token) {
    return false;
  }

  const expected = Buffer.from(issueCsrfToken(secret, userId));
  const received = Buffer.from(token);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

function readSubmittedToken(req: Request): string | undefined {
  const body: unknown = req.body;
  if (body && typeof body === "object") {
    const field: unknown = Reflect.get(body, CSRF_FIELD_NAME);
    if (typeof field === "string" && field.length > 0) {
      return field;
    }
  }

  return req.header("x-csrf-token") ?? undefined;
}

export function requireCsrfToken(config: AppConfig, logger: Logger) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!MUTATING_METHODS.has(req.method)) {
      next();
      return;
    }

    const userId = req.auth?.userId;
    if (userId === undefined || !isValidCsrfToken(config.csrfSecret, userId, readSubmittedToken(req))) {
      logger.warn("blog_csrf_rejected", buildSafeRequestLogMetadata(req));
      res.status(403).type("text/plain").send("Invalid CSRF token");
      return;
    }

    next();
  };
}
