import { describe, expect, it } from "vitest";
import {
  canDeletePost,
  canEditPost,
  canViewPost,
  describePublicationState,
  isPostPubliclyVisible,
  resolveListingVisibility,
  type VisibilityCandidate
} from "../src/blog/visibility";
import type { AuthContext } from "../src/types/context";

const NOW = new Date("2026-03-10T12:00:00.000Z");

function post(overrides: Partial<VisibilityCandidate> = {}): VisibilityCandidate {
  return {
    pubDate: "2026-03-10T11:59:00.000Z",
    isPublished: true,
    author: { id: 1 },
    category: { isPublished: true },
    ...overrides
  };
}

const author: AuthContext = { userId: 1, role: "USER", isAuthenticated: true };
const reader: AuthContext = { userId: 2, role: "USER", isAuthenticated: true };
const admin: AuthContext = { userId: 3, role: "ADMIN", isAuthenticated: true };

describe("isPostPubliclyVisible", () => {
  it("requires a past publication time and both published flags", () => {
    expect(isPostPubliclyVisible(post(), NOW)).toBe(true);
    expect(isPostPubliclyVisible(post({ pubDate: NOW.toISOString() }), NOW)).toBe(true);
    expect(isPostPubliclyVisible(post({ pubDate: "2026-03-10T12:00:01.000Z" }), NOW)).toBe(false);
    expect(isPostPubliclyVisible(post({ isPublished: false }), NOW)).toBe(false);
    expect(isPostPubliclyVisible(post({ category: { isPublished: false } }), NOW)).toBe(false);
  });

  it("never exposes posts without a category", () => {
    expect(isPostPubliclyVisible(post({ category: null }), NOW)).toBe(false);
  });

  it("treats an unparseable publication time as not yet published", () => {
    expect(isPostPubliclyVisible(post({ pubDate: "soon" }), NOW)).toBe(false);
  });
});

describe("canViewPost", () => {
  it("lets the author bypass every publication rule", () => {
    const hidden = post({ isPublished: false, category: null, pubDate: "2027-01-01T00:00:00.000Z" });

    expect(canViewPost(hidden, author, NOW)).toBe(true);
    expect(canViewPost(hidden, reader, NOW)).toBe(false);
    expect(canViewPost(hidden, admin, NOW)).toBe(false);
    expect(canViewPost(hidden, undefined, NOW)).toBe(false);
  });
});

describe("post permissions", () => {
  it("restricts editing to the author", () => {
    expect(canEditPost(post(), author)).toBe(true);
    expect(canEditPost(post(), admin)).toBe(false);
    expect(canEditPost(post(), undefined)).toBe(false);
  });

  it("allows deletion by the author or an admin", () => {
    expect(canDeletePost(post(), author)).toBe(true);
    expect(canDeletePost(post(), admin)).toBe(true);
    expect(canDeletePost(post(), reader)).toBe(false);
  });
});

describe("resolveListingVisibility", () => {
  it("returns the unfiltered view only to the owner", () => {
    expect(resolveListingVisibility(author, 1, NOW)).toEqual({ kind: "all" });
    expect(resolveListingVisibility(reader, 1, NOW)).toEqual({ kind: "published", now: NOW });
    expect(resolveListingVisibility(author, undefined, NOW)).toEqual({ kind: "published", now: NOW });
  });
});

describe("describePublicationState", () => {
  it("reports the first rule that hides the post", () => {
    expect(describePublicationState(post(), NOW)).toBe("published");
    expect(describePublicationState(post({ pubDate: "2026-04-01T00:00:00.000Z" }), NOW)).toBe("scheduled");
    expect(describePublicationState(post({ category: null, pubDate: "2026-04-01T00:00:00.000Z" }), NOW)).toBe(
      "category-hidden"
    );
    expect(describePublicationState(post({ isPublished: false, category: null }), NOW)).toBe("unpublished");
  });
});
