import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { CSRF_FIELD_NAME } from "../security/csrf";
import type { FieldErrors } from "./forms";
import type { PageWindow } from "./pagination";
import type { UserProfile } from "./repository";

export const STYLESHEET = readFileSync(resolve(__dirname, "../../src/styles/blog.css"), "utf8");

export const EXCERPT_MAX_LENGTH = 220;

export interface PageContext {
  viewer?: UserProfile;
  csrfToken?: string;
  timeZone: string;
}

export function escapeHtml(input: string): string {
  return input
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#039;");
}

export function profilePath(username: string): string {
  return `/profile/${encodeURIComponent(username)}`;
}

export function postPath(postId: number): string {
  return `/posts/${postId}`;
}

export function categoryPath(slug: string): string {
  return `/category/${encodeURIComponent(slug)}`;
}

export function createExcerpt(text: string, maxLength = EXCERPT_MAX_LENGTH): string {
  const plain = text
    .replace(/```[\s\S]*?```/g, " ")
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1")
    .replace(/[*_#>`~]/g, " ")
    .replace(/\s+/g, " ")
    .trim();

  const characters = Array.from(plain);
  if (characters.length <= maxLength) {
    return plain;
  }

  return `${characters.slice(0, maxLength - 1).join("").trim()}…`;
}

export function renderCsrfField(context: PageContext): string {
  return context.csrfToken
    ? `<input type="hidden" name="${CSRF_FIELD_NAME}" value="${escapeHtml(context.csrfToken)}" />`
    : "";
}

export function renderFieldError(errors: FieldErrors, field: string): string {
  const message = errors[field];
  return message ? `<p class="bl-field-error" id="${field}-error">${escapeHtml(message)}</p>` : "";
}

function buildPageLink(basePath: string, page: number): string {
  const params = new URLSearchParams();
  params.set("page", String(page));
  return `${basePath}?${params.toString()}`;
}

export function renderPagination(basePath: string, window: PageWindow): string {
  if (window.numPages <= 1) {
    return "";
  }

  const previousLink =
    window.previousPageNumber !== null
      ? `<a class="ds-button ds-button--secondary" rel="prev" href="${escapeHtml(buildPageLink(basePath, window.previousPageNumber))}">Newer posts</a>`
      : `<span class="bl-pagination-spacer" aria-hidden="true"></span>`;
  const nextLink =
    window.nextPageNumber !== null
      ? `<a class="ds-button ds-button--secondary" rel="next" href="${escapeHtml(buildPageLink(basePath, window.nextPageNumber))}">Older posts</a>`
      : `<span class="bl-pagination-spacer" aria-hidden="true"></span>`;

  return `<nav class="bl-pagination" aria-label="Pagination">
        ${previousLink}
        <span class="bl-pagination-status">Page ${window.number} of ${window.numPages}</span>
        ${nextLink}
      </nav>`;
}

function renderNavigation(context: PageContext): string {
  if (!context.viewer) {
    return `<nav class="bl-nav"><a href="/">Home</a></nav>`;
  }

  return `<nav class="bl-nav">
        <a href="/">Home</a>
        <a href="/posts/create">New post</a>
        <a href="${escapeHtml(profilePath(context.viewer.username))}">${escapeHtml(context.viewer.username)}</a>
        <a href="/edit_profile">Edit profile</a>
      </nav>`;
}

export function renderLayout(context: PageContext, title: string, content: string): string {
  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(title)} · Blog</title>
    <link rel="stylesheet" href="/assets/styles.css" />
  </head>
  <body class="ds-root bl-page">
    <header class="bl-header">
      <a class="bl-brand" href="/">Blog</a>
      ${renderNavigation(context)}
    </header>
    <main class="bl-main">
      ${content}
    </main>
  </body>
</html>`;
}

export function renderStatusPage(context: PageContext, status: number, heading: string, message: string): string {
  return renderLayout(
    context,
    heading,
    `<section class="bl-status ds-surface" data-status="${status}">
        <h1 class="ds-text ds-text--heading">${escapeHtml(heading)}</h1>
        <p class="ds-text ds-text--muted">${escapeHtml(message)}</p>
        <a class="ds-button ds-button--secondary" href="/">Back to the home page</a>
      </section>`
  );
}
