import type { NextFunction, Request, Response } from "express";
import type { AuthContext, UserRole } from "../types/context";

const USER_ID_PATTERN = /^\d+$/;

function normalizeRole(rawRole: string | undefined): UserRole {
  return rawRole?.trim().toUpperCase() === "ADMIN" ? "ADMIN" : "USER";
}

function parseUserId(rawUserId: string | undefined): number | undefined {
  const value = rawUserId?.trim();
  if (!value || !USER_ID_PATTERN.test(value)) {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : undefined;
}

// Identity is asserted by the upstream gateway through request headers.
export function hydrateAuthFromHeaders(req: Request, _res: Response, next: NextFunction): void {
  const userId = parseUserId(req.header("x-user-id"));
  if (userId === undefined) {
    req.auth = undefined;
    next();
    return;
  }

  const authContext: AuthContext = {
    userId,
    role: normalizeRole(req.header("x-user-role")),
    isAuthenticated: true
  };

  req.auth = authContext;
  next();
}

export function requireAuthenticated(req: Request, res: Response, next: NextFunction): void {
  if (!req.auth?.isAuthenticated) {
    res.status(401).type("text/plain").send("Authentication required");
    return;
  }

  next();
}
