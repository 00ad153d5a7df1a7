import type request from "supertest";
import type { AppConfig } from "../../src/config";
import { InMemoryBlogRepository, type InMemorySeed } from "../../src/blog/repository";
import { issueCsrfToken } from "../../src/security/csrf";
import type { Logger } from "../../src/security/logger";

export const TEST_CSRF_SECRET = "test-csrf-secret-value";
export const FIXED_NOW = new Date("2026-03-10T12:00:00.000Z");

export const ALICE_ID = 1;
export const BOB_ID = 2;
export const CAROL_ID = 3;

export function createConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 3000,
    timeZone: "UTC",
    csrfSecret: TEST_CSRF_SECRET,
    devAuthBypassEnabled: false,
    devAuthBypassUserId: ALICE_ID,
    devAuthBypassUserRole: "USER",
    rateLimit: { enabled: false, writePerMinute: 30 },
    securityHeaders: {
      isProduction: false,
      cspReportOnly: true,
      cspFrameAncestors: ["'none'"],
      cspConnectSrc: ["'self'"],
      cspImgSrc: ["'self'", "data:", "https:"]
    },
    ...overrides
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};

/**
 * At FIXED_NOW the publicly visible posts are 2, 6 and 1 (newest first).
 * Post 3 is scheduled, 4 unpublished, 5 in a hidden category, 7 uncategorised.
 */
export function buildSeed(): InMemorySeed {
  return {
    users: [
      { id: ALICE_ID, username: "alice", firstName: "Alice", lastName: "Writer", email: "alice@example.com", isStaff: false },
      { id: BOB_ID, username: "bob", firstName: "Bob", lastName: "Reader", email: "bob@example.com", isStaff: false },
      { id: CAROL_ID, username: "carol", firstName: "Carol", lastName: "Moderator", email: "carol@example.com", isStaff: true }
    ],
    categories: [
      { id: 1, title: "Travel", description: "Trips and places.", slug: "travel", isPublished: true },
      { id: 2, title: "Hidden", description: "Not ready yet.", slug: "hidden", isPublished: false }
    ],
    posts: [
      { id: 1, title: "Visible old", text: "First trip.", pubDate: "2026-03-01T10:00:00.000Z", isPublished: true, categoryId: 1, authorId: ALICE_ID },
      { id: 2, title: "Visible new", text: "Second trip.", pubDate: "2026-03-05T10:00:00.000Z", isPublished: true, categoryId: 1, authorId: ALICE_ID, location: "Harbour" },
      { id: 3, title: "Scheduled", text: "Coming soon.", pubDate: "2026-03-20T10:00:00.000Z", isPublished: true, categoryId: 1, authorId: ALICE_ID },
      { id: 4, title: "Unpublished", text: "Draft text.", pubDate: "2026-03-02T10:00:00.000Z", isPublished: false, categoryId: 1, authorId: ALICE_ID },
      { id: 5, title: "Hidden category", text: "Parked.", pubDate: "2026-03-03T10:00:00.000Z", isPublished: true, categoryId: 2, authorId: ALICE_ID },
      { id: 6, title: "Market day", text: "Stalls and noise.", pubDate: "2026-03-04T10:00:00.000Z", isPublished: true, categoryId: 1, authorId: BOB_ID },
      { id: 7, title: "Uncategorised", text: "No home.", pubDate: "2026-03-01T08:00:00.000Z", isPublished: true, categoryId: null, authorId: ALICE_ID }
    ],
    comments: [
      { id: 1, postId: 2, authorId: BOB_ID, text: "Nice trip", createdAt: "2026-03-06T00:00:00.000Z" },
      { id: 2, postId: 2, authorId: ALICE_ID, text: "Thanks", createdAt: "2026-03-06T01:00:00.000Z" }
    ]
  };
}

export function createRepository(): InMemoryBlogRepository {
  return new InMemoryBlogRepository(buildSeed());
}

export function asUser(req: request.Test, userId: number, role: "ADMIN" | "USER" = "USER"): request.Test {
  return req.set("x-user-id", String(userId)).set("x-user-role", role);
}

export function csrfFor(userId: number): string {
  return issueCsrfToken(TEST_CSRF_SECRET, userId);
}

export function listedPostIds(html: string): number[] {
  return [...html.matchAll(/<h2 class="bl-card-title"><a href="\/posts\/(\d+)">/g)].map((match) => Number(match[1]));
}
