import type { NextFunction, Request, Response } from "express";
import type { AppConfig } from "../config";

export function applyDevAuthFallback(config: AppConfig) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (config.devAuthBypassEnabled && !req.auth) {
      req.auth = {
        userId: config.devAuthBypassUserId,
        role: config.devAuthBypassUserRole,
        isAuthenticated: true
      };
    }

    next();
  };
}
