import { Router, type NextFunction, type Request, type Response } from "express";
import { requireAuthenticated } from "../middleware/auth";
import { requireCsrfToken } from "../security/csrf";
import { NotFoundError } from "./errors";
import { readPostFormValues, validatePostForm, type FieldErrors, type PostFormValues } from "./forms";
import {
  buildPageContext,
  handleBlogRouteError,
  readIdParam,
  requireCurrentUser,
  route,
  sendPage,
  type BlogRouteContext
} from "./http";
import { renderDeletePostPage, renderPostDetailPage, renderPostFormPage } from "./pages";
import { postPath, profilePath } from "./render";
import type { PostRecord } from "./repository";
import { toDateTimeLocalValue } from "./timestamps";
import { canDeletePost, canEditPost, canViewPost } from "./visibility";

function valuesFromPost(post: PostRecord, timeZone: string): PostFormValues {
  return {
    title: post.title,
    text: post.text,
    pub_date: toDateTimeLocalValue(post.pubDate, timeZone),
    location: post.location ?? "",
    category: post.category ? String(post.category.id) : "",
    is_published: post.isPublished,
    image: post.image ?? ""
  };
}

export function createPostRouter(context: BlogRouteContext): Router {
  const router = Router();
  const { config, repository, logger } = context;
  const csrf = requireCsrfToken(config, logger);

  async function renderForm(
    req: Request,
    res: Response,
    status: number,
    view: { heading: string; action: string; submitLabel: string; values: PostFormValues; errors: FieldErrors }
  ): Promise<void> {
    const categories = await repository.listCategories();
    sendPage(res, status, renderPostFormPage(buildPageContext(req, config), { ...view, categories }));
  }

  // Anonymous editors are sent back to the post rather than challenged.
  function redirectAnonymousToPost(req: Request, res: Response, next: NextFunction): void {
    if (req.auth?.isAuthenticated) {
      next();
      return;
    }

    try {
      res.redirect(302, postPath(readIdParam(req, "postId")));
    } catch (error) {
      handleBlogRouteError(req, res, error, context);
    }
  }

  async function loadEditablePost(req: Request, res: Response): Promise<PostRecord | null> {
    const post = await repository.findPostById(readIdParam(req, "postId"));
    if (!post) {
      throw new NotFoundError("post not found");
    }

    if (!canEditPost(post, req.auth)) {
      res.redirect(302, postPath(post.id));
      return null;
    }

    return post;
  }

  async function loadDeletablePost(req: Request): Promise<PostRecord> {
    const post = await repository.findPostById(readIdParam(req, "postId"));
    if (!post || !canDeletePost(post, req.auth)) {
      throw new NotFoundError("post not found");
    }

    return post;
  }

  router.get(
    "/posts/create",
    requireAuthenticated,
    route(context, async (req, res) => {
      await renderForm(req, res, 200, {
        heading: "New post",
        action: "/posts/create",
        submitLabel: "Publish",
        values: {
          title: "",
          text: "",
          pub_date: toDateTimeLocalValue(context.now().toISOString(), config.timeZone),
          location: "",
          category: "",
          is_published: true,
          image: ""
        },
        errors: {}
      });
    })
  );

  router.post(
    "/posts/create",
    requireAuthenticated,
    csrf,
    route(context, async (req, res) => {
      const author = requireCurrentUser(req);
      const values = readPostFormValues(req.body);
      const categories = await repository.listCategories();
      const result = validatePostForm(values, {
        timeZone: config.timeZone,
        categoryIds: new Set(categories.map((category) => category.id))
      });

      if (!result.ok) {
        await renderForm(req, res, 400, {
          heading: "New post",
          action: "/posts/create",
          submitLabel: "Publish",
          values,
          errors: result.errors
        });
        return;
      }

      const post = await repository.createPost({ ...result.value, authorId: author.id });
      logger.info("blog_post_created", { postId: post.id, authorId: author.id });
      res.redirect(302, profilePath(author.username));
    })
  );

  router.get(
    "/posts/:postId",
    route(context, async (req, res) => {
      const post = await repository.findPostById(readIdParam(req, "postId"));
      if (!post || !canViewPost(post, req.auth, context.now())) {
        throw new NotFoundError("post not found");
      }

      const comments = await repository.listComments(post.id);
      sendPage(
        res,
        200,
        renderPostDetailPage(buildPageContext(req, config), {
          post,
          comments,
          canEdit: canEditPost(post, req.auth),
          canDelete: canDeletePost(post, req.auth)
        })
      );
    })
  );

  router.get(
    "/posts/:postId/edit",
    redirectAnonymousToPost,
    route(context, async (req, res) => {
      const post = await loadEditablePost(req, res);
      if (!post) {
        return;
      }

      await renderForm(req, res, 200, {
        heading: "Edit post",
        action: `${postPath(post.id)}/edit`,
        submitLabel: "Save",
        values: valuesFromPost(post, config.timeZone),
        errors: {}
      });
    })
  );

  router.post(
    "/posts/:postId/edit",
    redirectAnonymousToPost,
    csrf,
    route(context, async (req, res) => {
      const post = await loadEditablePost(req, res);
      if (!post) {
        return;
      }

      const editor = requireCurrentUser(req);
      const values = readPostFormValues(req.body);
      const categories = await repository.listCategories();
      const result = validatePostForm(values, {
        timeZone: config.timeZone,
        categoryIds: new Set(categories.map((category) => category.id))
      });

      if (!result.ok) {
        await renderForm(req, res, 400, {
          heading: "Edit post",
          action: `${postPath(post.id)}/edit`,
          submitLabel: "Save",
          values,
          errors: result.errors
        });
        return;
      }

      const updated = await repository.updatePost(post.id, result.value);
      if (!updated) {
        throw new NotFoundError("post not found");
      }

      logger.info("blog_post_updated", { postId: updated.id, authorId: editor.id });
      res.redirect(302, profilePath(editor.username));
    })
  );

  router.get(
    "/posts/:postId/delete",
    requireAuthenticated,
    route(context, async (req, res) => {
      const post = await loadDeletablePost(req);
      sendPage(res, 200, renderDeletePostPage(buildPageContext(req, config), post));
    })
  );

  router.post(
    "/posts/:postId/delete",
    requireAuthenticated,
    csrf,
    route(context, async (req, res) => {
      const viewer = requireCurrentUser(req);
      const post = await loadDeletablePost(req);
      await repository.deletePost(post.id);

      logger.info("blog_post_deleted", { postId: post.id, authorId: post.author.id, deletedBy: viewer.id });
      res.redirect(302, profilePath(viewer.username));
    })
  );

  return router;
}
