import { Router, type Request } from "express";
import { requireAuthenticated } from "../middleware/auth";
import { requireCsrfToken } from "../security/csrf";
import { NotFoundError } from "./errors";
import { readCommentFormValues, validateCommentForm } from "./forms";
import { buildPageContext, readIdParam, requireCurrentUser, route, sendPage, type BlogRouteContext } from "./http";
import { renderDeleteCommentPage, renderEditCommentPage, renderPostDetailPage } from "./pages";
import { postPath } from "./render";
import type { CommentRecord } from "./repository";
import { canDeletePost, canEditPost, canModifyComment, canViewPost } from "./visibility";

export function createCommentRouter(context: BlogRouteContext): Router {
  const router = Router();
  const { config, repository, logger } = context;
  const csrf = requireCsrfToken(config, logger);

  // Only the author may touch a comment, and only through the post it belongs to.
  async function loadOwnComment(req: Request): Promise<CommentRecord> {
    const postId = readIdParam(req, "postId");
    const comment = await repository.findCommentById(readIdParam(req, "commentId"));
    if (!comment || comment.postId !== postId || !canModifyComment(comment, req.auth)) {
      throw new NotFoundError("comment not found");
    }

    return comment;
  }

  router.post(
    "/posts/:postId/comment",
    requireAuthenticated,
    csrf,
    route(context, async (req, res) => {
      const author = requireCurrentUser(req);
      const post = await repository.findPostById(readIdParam(req, "postId"));
      if (!post || !canViewPost(post, req.auth, context.now())) {
        throw new NotFoundError("post not found");
      }

      const values = readCommentFormValues(req.body);
      const result = validateCommentForm(values);
      if (!result.ok) {
        const comments = await repository.listComments(post.id);
        sendPage(
          res,
          400,
          renderPostDetailPage(buildPageContext(req, config), {
            post,
            comments,
            canEdit: canEditPost(post, req.auth),
            canDelete: canDeletePost(post, req.auth),
            commentValues: values,
            commentErrors: result.errors
          })
        );
        return;
      }

      const comment = await repository.createComment({ postId: post.id, authorId: author.id, text: result.value.text });
      logger.info("blog_comment_created", { commentId: comment.id, postId: post.id, authorId: author.id });
      res.redirect(302, postPath(post.id));
    })
  );

  router.get(
    "/posts/:postId/edit_comment/:commentId",
    requireAuthenticated,
    route(context, async (req, res) => {
      const comment = await loadOwnComment(req);
      sendPage(
        res,
        200,
        renderEditCommentPage(buildPageContext(req, config), comment, { text: comment.text }, {})
      );
    })
  );

  router.post(
    "/posts/:postId/edit_comment/:commentId",
    requireAuthenticated,
    csrf,
    route(context, async (req, res) => {
      const comment = await loadOwnComment(req);
      const values = readCommentFormValues(req.body);
      const result = validateCommentForm(values);
      if (!result.ok) {
        sendPage(res, 400, renderEditCommentPage(buildPageContext(req, config), comment, values, result.errors));
        return;
      }

      const updated = await repository.updateComment(comment.id, result.value.text);
      if (!updated) {
        throw new NotFoundError("comment not found");
      }

      logger.info("blog_comment_updated", { commentId: updated.id, postId: updated.postId });
      res.redirect(302, postPath(updated.postId));
    })
  );

  router.get(
    "/posts/:postId/delete_comment/:commentId",
    requireAuthenticated,
    route(context, async (req, res) => {
      const comment = await loadOwnComment(req);
      sendPage(res, 200, renderDeleteCommentPage(buildPageContext(req, config), comment));
    })
  );

  router.post(
    "/posts/:postId/delete_comment/:commentId",
    requireAuthenticated,
    csrf,
    route(context, async (req, res) => {
      const comment = await loadOwnComment(req);
      await repository.deleteComment(comment.id);

      logger.info("blog_comment_deleted", { commentId: comment.id, postId: comment.postId });
      res.redirect(302, postPath(comment.postId));
    })
  );

  return router;
}
