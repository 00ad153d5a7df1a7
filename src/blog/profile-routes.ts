import { Router } from "express";
import { requireAuthenticated } from "../middleware/auth";
import { requireCsrfToken } from "../security/csrf";
import { ConflictError, NotFoundError } from "./errors";
import { readProfileFormValues, validateProfileForm } from "./forms";
import {
  buildPageContext,
  readStringParam,
  requireCurrentUser,
  route,
  sendPage,
  type BlogRouteContext
} from "./http";
import { renderProfileFormPage, renderProfilePage } from "./pages";
import { profilePath } from "./render";
import { loadPostPage } from "./routes";
import { describePublicationState, resolveListingVisibility } from "./visibility";

export function createProfileRouter(context: BlogRouteContext): Router {
  const router = Router();
  const { config, repository, logger } = context;

  router.get(
    "/profile/:username",
    route(context, async (req, res) => {
      const profile = await repository.findUserByUsername(readStringParam(req, "username"));
      if (!profile) {
        throw new NotFoundError("user not found");
      }

      const now = context.now();
      const visibility = resolveListingVisibility(req.auth, profile.id, now);
      const { posts, window } = await loadPostPage(context, { visibility, authorId: profile.id }, req.query.page);
      const isOwnerView = visibility.kind === "all";

      sendPage(
        res,
        200,
        renderProfilePage(
          buildPageContext(req, config),
          profile,
          posts.map((post) => ({ post, state: isOwnerView ? describePublicationState(post, now) : undefined })),
          window
        )
      );
    })
  );

  router.get(
    "/edit_profile",
    requireAuthenticated,
    route(context, async (req, res) => {
      const user = requireCurrentUser(req);
      sendPage(
        res,
        200,
        renderProfileFormPage(
          buildPageContext(req, config),
          {
            username: user.username,
            first_name: user.firstName,
            last_name: user.lastName,
            email: user.email
          },
          {}
        )
      );
    })
  );

  router.post(
    "/edit_profile",
    requireAuthenticated,
    requireCsrfToken(config, logger),
    route(context, async (req, res) => {
      const user = requireCurrentUser(req);
      const values = readProfileFormValues(req.body);
      const result = validateProfileForm(values);
      if (!result.ok) {
        sendPage(res, 400, renderProfileFormPage(buildPageContext(req, config), values, result.errors));
        return;
      }

      try {
        const updated = await repository.updateUserProfile(user.id, result.value);
        if (!updated) {
          throw new NotFoundError("user not found");
        }

        logger.info("blog_profile_updated", { userId: updated.id });
        res.redirect(302, profilePath(updated.username));
      } catch (error) {
        if (error instanceof ConflictError && error.field) {
          sendPage(
            res,
            400,
            renderProfileFormPage(buildPageContext(req, config), values, { [error.field]: error.message })
          );
          return;
        }
        throw error;
      }
    })
  );

  return router;
}
