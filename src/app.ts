import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppConfig } from "./config";
import { createCommentRouter } from "./blog/comment-routes";
import { handleBlogRouteError, sendNotFound, type BlogRouteContext } from "./blog/http";
import { createPostRouter } from "./blog/post-routes";
import { createProfileRouter } from "./blog/profile-routes";
import { InMemoryBlogRepository, type BlogRepository } from "./blog/repository";
import { createBlogRouter } from "./blog/routes";
import { hydrateAuthFromHeaders } from "./middleware/auth";
import { loadCurrentUser } from "./middleware/current-user";
import { applyDevAuthFallback } from "./middleware/dev-auth";
import { createHtmlSecurityHeaders } from "./security/headers";
import { appLogger, type Logger } from "./security/logger";
import { InMemoryRateLimitStore, createWriteRateLimit, type RateLimitStore } from "./security/rate-limit";

export interface AppDependencies {
  logger?: Logger;
  blogRepository?: BlogRepository;
  rateLimitStore?: RateLimitStore;
  healthCheck?: () => Promise<void> | void;
  now?: () => Date;
}

function createFallbackRepository(): BlogRepository {
  return new InMemoryBlogRepository({
    users: [
      { id: 1, username: "editor", firstName: "Local", lastName: "Editor", email: "editor@example.com", isStaff: true }
    ],
    categories: [
      { id: 1, title: "General", description: "Posts without a narrower topic.", slug: "general", isPublished: true }
    ],
    posts: [
      {
        id: 1,
        title: "Welcome",
        text: "This post comes from the in-memory repository used when no database is configured.",
        pubDate: "2026-01-01T09:00:00.000Z",
        isPublished: true,
        categoryId: 1,
        authorId: 1
      }
    ]
  });
}

export function createApp(config: AppConfig, dependencies: AppDependencies = {}): Express {
  const app = express();
  const logger = dependencies.logger ?? appLogger;
  const repository = dependencies.blogRepository ?? createFallbackRepository();
  const rateLimitStore = dependencies.rateLimitStore ?? new InMemoryRateLimitStore();
  const healthCheck = dependencies.healthCheck ?? (() => undefined);
  const context: BlogRouteContext = {
    config,
    repository,
    logger,
    now: dependencies.now ?? (() => new Date())
  };

  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false, limit: "128kb" }));

  app.get("/healthz", async (_req, res) => {
    try {
      await healthCheck();
      res.status(200).json({ ok: true });
      return;
    } catch (error) {
      logger.error("health_check_failed", { error });
      res.status(503).json({ ok: false });
    }
  });

  app.use(hydrateAuthFromHeaders);
  app.use(applyDevAuthFallback(config));
  app.use(loadCurrentUser(repository));
  app.use(createHtmlSecurityHeaders(config));
  app.use(createWriteRateLimit(config, { store: rateLimitStore, logger, now: () => context.now().getTime() }));

  app.use(createBlogRouter(context));
  app.use(createPostRouter(context));
  app.use(createCommentRouter(context));
  app.use(createProfileRouter(context));

  app.use((req: Request, res: Response) => {
    sendNotFound(req, res, config);
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    handleBlogRouteError(req, res, error, context);
  });

  return app;
}
