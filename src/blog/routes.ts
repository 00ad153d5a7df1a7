import { Router, type Request, type Response } from "express";
import { NotFoundError } from "./errors";
import { buildPageContext, readStringParam, route, sendPage, type BlogRouteContext } from "./http";
import { renderCategoryPage, renderIndexPage } from "./pages";
import { resolvePageWindow, type PageWindow } from "./pagination";
import { STYLESHEET } from "./render";
import type { PostListFilter, PostSummary } from "./repository";

export async function loadPostPage(
  context: BlogRouteContext,
  filter: PostListFilter,
  rawPage: unknown
): Promise<{ posts: PostSummary[]; window: PageWindow }> {
  const totalCount = await context.repository.countPosts(filter);
  const window = resolvePageWindow(totalCount, rawPage);
  const posts = await context.repository.listPosts(filter, { limit: window.limit, offset: window.offset });
  return { posts, window };
}

export function createBlogRouter(context: BlogRouteContext): Router {
  const router = Router();

  router.get("/assets/styles.css", (_req: Request, res: Response) => {
    res.setHeader("Cache-Control", "public, max-age=300");
    res.status(200).type("text/css").send(STYLESHEET);
  });

  router.get(
    "/",
    route(context, async (req, res) => {
      const { posts, window } = await loadPostPage(
        context,
        { visibility: { kind: "published", now: context.now() } },
        req.query.page
      );

      sendPage(
        res,
        200,
        renderIndexPage(
          buildPageContext(req, context.config),
          posts.map((post) => ({ post })),
          window
        )
      );
    })
  );

  router.get(
    "/category/:slug",
    route(context, async (req, res) => {
      const category = await context.repository.findCategoryBySlug(readStringParam(req, "slug"));
      if (!category || !category.isPublished) {
        throw new NotFoundError("category not found");
      }

      const { posts, window } = await loadPostPage(
        context,
        { visibility: { kind: "published", now: context.now() }, categoryId: category.id },
        req.query.page
      );

      sendPage(
        res,
        200,
        renderCategoryPage(
          buildPageContext(req, context.config),
          category,
          posts.map((post) => ({ post })),
          window
        )
      );
    })
  );

  return router;
}
