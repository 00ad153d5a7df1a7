import type { NextFunction, Request, Response } from "express";
import type { BlogRepository } from "../blog/repository";

/**
 * Resolves the asserted identity to a stored profile. An id with no matching
 * user is treated as anonymous; staff accounts are promoted to the ADMIN role.
 */
export function loadCurrentUser(repository: BlogRepository) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const auth = req.auth;
    if (!auth) {
      req.currentUser = undefined;
      next();
      return;
    }

    repository
      .findUserById(auth.userId)
      .then((user) => {
        if (user) {
          req.currentUser = user;
          req.auth = user.isStaff ? { ...auth, role: "ADMIN" } : auth;
        } else {
          req.auth = undefined;
          req.currentUser = undefined;
        }
        next();
      })
      .catch(next);
  };
}
