import type { NextFunction, Request, Response } from "express";
import type { AppConfig } from "../config";
import { issueCsrfToken } from "../security/csrf";
import { buildSafeRequestLogMetadata, type Logger } from "../security/logger";
import { NotFoundError } from "./errors";
import { renderStatusPage, type PageContext } from "./render";
import type { BlogRepository } from "./repository";

const ID_PATTERN = /^\d+$/;

export interface BlogRouteContext {
  config: AppConfig;
  repository: BlogRepository;
  logger: Logger;
  now: () => Date;
}

export function readIdParam(req: Request, name: string): number {
  const raw = req.params[name];
  if (typeof raw !== "string" || !ID_PATTERN.test(raw)) {
    throw new NotFoundError();
  }

  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new NotFoundError();
  }

  return parsed;
}

export function readStringParam(req: Request, name: string): string {
  const raw = req.params[name];
  if (typeof raw !== "string" || raw.length === 0) {
    throw new NotFoundError();
  }

  return raw;
}

export function buildPageContext(req: Request, config: AppConfig): PageContext {
  const viewer = req.currentUser;

  return {
    viewer,
    csrfToken: viewer ? issueCsrfToken(config.csrfSecret, viewer.id) : undefined,
    timeZone: config.timeZone
  };
}

export function sendPage(res: Response, status: number, html: string): void {
  res.status(status).type("html").send(html);
}

export function sendNotFound(req: Request, res: Response, config: AppConfig): void {
  sendPage(
    res,
    404,
    renderStatusPage(buildPageContext(req, config), 404, "Page not found", "The page you requested does not exist.")
  );
}

/**
 * Current signed-in profile. The auth guard runs first, so a missing profile
 * here means the identity vanished mid-request.
 */
export function requireCurrentUser(req: Request) {
  if (!req.currentUser) {
    throw new NotFoundError();
  }

  return req.currentUser;
}

export function handleBlogRouteError(req: Request, res: Response, error: unknown, context: BlogRouteContext): void {
  if (error instanceof NotFoundError) {
    sendNotFound(req, res, context.config);
    return;
  }

  context.logger.error("blog_route_failed", {
    ...buildSafeRequestLogMetadata(req),
    error
  });
  sendPage(
    res,
    500,
    renderStatusPage(buildPageContext(req, context.config), 500, "Server error", "Something went wrong. Try again later.")
  );
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

export function route(context: BlogRouteContext, handler: AsyncHandler) {
  return (req: Request, res: Response, _next: NextFunction): void => {
    handler(req, res).catch((error: unknown) => handleBlogRouteError(req, res, error, context));
  };
}
