import type { AuthContext } from "../types/context";

export type PostVisibility = { kind: "published"; now: Date } | { kind: "all" };

export interface VisibilityCandidate {
  pubDate: string;
  isPublished: boolean;
  author: { id: number };
  category: { isPublished: boolean } | null;
}

export interface OwnedRecord {
  author: { id: number };
}

/**
 * A post is public once its publication time has passed and both the post and
 * its category are flagged as published. Posts without a category never are.
 */
export function isPostPubliclyVisible(post: VisibilityCandidate, now: Date): boolean {
  const pubDate = Date.parse(post.pubDate);
  if (Number.isNaN(pubDate) || pubDate > now.getTime()) {
    return false;
  }

  return post.isPublished && post.category?.isPublished === true;
}

export function isOwnedBy(record: OwnedRecord, viewer: AuthContext | undefined): boolean {
  return viewer?.isAuthenticated === true && record.author.id === viewer.userId;
}

export function canViewPost(post: VisibilityCandidate, viewer: AuthContext | undefined, now: Date): boolean {
  return isOwnedBy(post, viewer) || isPostPubliclyVisible(post, now);
}

export function resolveListingVisibility(
  viewer: AuthContext | undefined,
  ownerId: number | undefined,
  now: Date
): PostVisibility {
  if (ownerId !== undefined && viewer?.isAuthenticated && viewer.userId === ownerId) {
    return { kind: "all" };
  }

  return { kind: "published", now };
}

export function canEditPost(post: OwnedRecord, viewer: AuthContext | undefined): boolean {
  return isOwnedBy(post, viewer);
}

export function canDeletePost(post: OwnedRecord, viewer: AuthContext | undefined): boolean {
  return isOwnedBy(post, viewer) || (viewer?.isAuthenticated === true && viewer.role === "ADMIN");
}

export function canModifyComment(comment: OwnedRecord, viewer: AuthContext | undefined): boolean {
  return isOwnedBy(comment, viewer);
}

export type PublicationState = "published" | "scheduled" | "unpublished" | "category-hidden";

export function describePublicationState(post: VisibilityCandidate, now: Date): PublicationState {
  if (!post.isPublished) {
    return "unpublished";
  }
  if (post.category?.isPublished !== true) {
    return "category-hidden";
  }
  if (Date.parse(post.pubDate) > now.getTime()) {
    return "scheduled";
  }
  return "published";
}
