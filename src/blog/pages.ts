import { renderMarkdownSafe } from "../security/markdown";
import type { CommentFormValues, FieldErrors, PostFormValues, ProfileFormValues } from "./forms";
import type { PageWindow } from "./pagination";
import {
  categoryPath,
  createExcerpt,
  escapeHtml,
  postPath,
  profilePath,
  renderCsrfField,
  renderFieldError,
  renderLayout,
  renderPagination,
  type PageContext
} from "./render";
import type { Category, CommentRecord, PostRecord, PostSummary, UserProfile } from "./repository";
import { formatDisplayTimestamp } from "./timestamps";
import type { PublicationState } from "./visibility";

const PUBLICATION_STATE_LABELS: Record<Exclude<PublicationState, "published">, string> = {
  scheduled: "Scheduled",
  unpublished: "Unpublished",
  "category-hidden": "Category hidden"
};

export interface ListedPost {
  post: PostSummary;
  state?: PublicationState;
}

function renderPostMeta(context: PageContext, post: PostRecord): string {
  const category = post.category
    ? ` in <a href="${escapeHtml(categoryPath(post.category.slug))}">${escapeHtml(post.category.title)}</a>`
    : "";
  const location = post.location ? ` · ${escapeHtml(post.location)}` : "";

  return `<p class="bl-post-meta ds-text ds-text--muted">
          <time datetime="${escapeHtml(post.pubDate)}">${escapeHtml(formatDisplayTimestamp(post.pubDate, context.timeZone))}</time>
          by <a href="${escapeHtml(profilePath(post.author.username))}">@${escapeHtml(post.author.username)}</a>${category}${location}
        </p>`;
}

function renderStateBadge(state: PublicationState | undefined): string {
  if (!state || state === "published") {
    return "";
  }

  return `<span class="bl-badge bl-badge--${state}">${PUBLICATION_STATE_LABELS[state]}</span>`;
}

function renderPostCard(context: PageContext, entry: ListedPost): string {
  const { post } = entry;

  return `<li class="bl-feed-row">
          <article class="bl-card ds-surface ds-surface--raised">
            <header class="bl-card-header">
              ${renderStateBadge(entry.state)}
              <h2 class="bl-card-title"><a href="${postPath(post.id)}">${escapeHtml(post.title)}</a></h2>
              ${renderPostMeta(context, post)}
            </header>
            <p class="bl-card-excerpt ds-text ds-text--body">${escapeHtml(createExcerpt(post.text))}</p>
            <footer class="bl-card-footer">
              <a href="${postPath(post.id)}#comments">Comments: ${post.commentCount}</a>
            </footer>
          </article>
        </li>`;
}

function renderPostFeed(context: PageContext, posts: ListedPost[], emptyMessage: string): string {
  if (posts.length === 0) {
    return `<p class="bl-empty-state ds-text ds-text--muted">${escapeHtml(emptyMessage)}</p>`;
  }

  return `<ol class="bl-feed">${posts.map((entry) => renderPostCard(context, entry)).join("")}</ol>`;
}

export function renderIndexPage(context: PageContext, posts: ListedPost[], window: PageWindow): string {
  return renderLayout(
    context,
    "Latest posts",
    `<header class="bl-page-header">
        <h1 class="ds-text ds-text--heading">Latest posts</h1>
      </header>
      ${renderPostFeed(context, posts, "Nothing has been published yet.")}
      ${renderPagination("/", window)}`
  );
}

export function renderCategoryPage(
  context: PageContext,
  category: Category,
  posts: ListedPost[],
  window: PageWindow
): string {
  const description = category.description
    ? `<p class="ds-text ds-text--muted">${escapeHtml(category.description)}</p>`
    : "";

  return renderLayout(
    context,
    category.title,
    `<header class="bl-page-header">
        <h1 class="ds-text ds-text--heading">${escapeHtml(category.title)}</h1>
        ${description}
      </header>
      ${renderPostFeed(context, posts, "No posts in this category yet.")}
      ${renderPagination(categoryPath(category.slug), window)}`
  );
}

export function renderProfilePage(
  context: PageContext,
  profile: UserProfile,
  posts: ListedPost[],
  window: PageWindow
): string {
  const fullName = [profile.firstName, profile.lastName].filter((part) => part.length > 0).join(" ");
  const isOwner = context.viewer?.id === profile.id;
  const ownerActions = isOwner
    ? `<p class="bl-profile-actions"><a class="ds-button ds-button--secondary" href="/edit_profile">Edit profile</a></p>`
    : "";

  return renderLayout(
    context,
    `@${profile.username}`,
    `<header class="bl-page-header bl-profile">
        <h1 class="ds-text ds-text--heading">@${escapeHtml(profile.username)}</h1>
        ${fullName ? `<p class="bl-profile-name">${escapeHtml(fullName)}</p>` : ""}
        ${ownerActions}
      </header>
      ${renderPostFeed(context, posts, "No posts yet.")}
      ${renderPagination(profilePath(profile.username), window)}`
  );
}

export interface PostDetailView {
  post: PostRecord;
  comments: CommentRecord[];
  canEdit: boolean;
  canDelete: boolean;
  commentValues?: CommentFormValues;
  commentErrors?: FieldErrors;
}

function renderComment(context: PageContext, postId: number, comment: CommentRecord): string {
  const actions =
    context.viewer?.id === comment.author.id
      ? `<p class="bl-comment-actions">
              <a href="${postPath(postId)}/edit_comment/${comment.id}">Edit</a>
              <a href="${postPath(postId)}/delete_comment/${comment.id}">Delete</a>
            </p>`
      : "";

  return `<li class="bl-comment" id="comment-${comment.id}">
            <p class="bl-comment-meta ds-text ds-text--muted">
              <a href="${escapeHtml(profilePath(comment.author.username))}">@${escapeHtml(comment.author.username)}</a>
              <time datetime="${escapeHtml(comment.createdAt)}">${escapeHtml(formatDisplayTimestamp(comment.createdAt, context.timeZone))}</time>
            </p>
            <p class="bl-comment-text">${escapeHtml(comment.text)}</p>
            ${actions}
          </li>`;
}

function renderCommentForm(context: PageContext, action: string, values: CommentFormValues, errors: FieldErrors, submitLabel: string): string {
  return `<form class="bl-form" method="post" action="${escapeHtml(action)}">
          ${renderCsrfField(context)}
          <label for="comment-text">Comment</label>
          <textarea id="comment-text" name="text" rows="4" required>${escapeHtml(values.text)}</textarea>
          ${renderFieldError(errors, "text")}
          <button class="ds-button ds-button--primary" type="submit">${escapeHtml(submitLabel)}</button>
        </form>`;
}

export function renderPostDetailPage(context: PageContext, view: PostDetailView): string {
  const { post } = view;
  const image = post.image
    ? `<img class="bl-post-image" src="${escapeHtml(post.image)}" alt="${escapeHtml(post.title)}" />`
    : "";
  const ownerActions = [
    view.canEdit ? `<a class="ds-button ds-button--secondary" href="${postPath(post.id)}/edit">Edit</a>` : "",
    view.canDelete ? `<a class="ds-button ds-button--danger" href="${postPath(post.id)}/delete">Delete</a>` : ""
  ]
    .filter((link) => link.length > 0)
    .join("\n        ");
  const commentForm = context.viewer
    ? renderCommentForm(
        context,
        `${postPath(post.id)}/comment`,
        view.commentValues ?? { text: "" },
        view.commentErrors ?? {},
        "Add comment"
      )
    : "";
  const comments =
    view.comments.length > 0
      ? `<ol class="bl-comments">${view.comments.map((comment) => renderComment(context, post.id, comment)).join("")}</ol>`
      : `<p class="bl-empty-state ds-text ds-text--muted">No comments yet.</p>`;

  return renderLayout(
    context,
    post.title,
    `<article class="bl-detail ds-surface ds-surface--raised">
        <header class="bl-detail-header">
          <h1 class="ds-text ds-text--heading">${escapeHtml(post.title)}</h1>
          ${renderPostMeta(context, post)}
          ${ownerActions ? `<p class="bl-detail-actions">${ownerActions}</p>` : ""}
        </header>
        ${image}
        <div class="bl-detail-body">${renderMarkdownSafe(post.text)}</div>
      </article>
      <section class="bl-comments-section" id="comments" aria-label="Comments">
        <h2 class="ds-text ds-text--subheading">Comments (${view.comments.length})</h2>
        ${comments}
        ${commentForm}
      </section>`
  );
}

export interface PostFormView {
  heading: string;
  action: string;
  submitLabel: string;
  values: PostFormValues;
  errors: FieldErrors;
  categories: Category[];
}

function renderCategoryOptions(categories: Category[], selected: string): string {
  const placeholder = `<option value=""${selected === "" ? " selected" : ""}>---------</option>`;
  const options = categories.map((category) => {
    const value = String(category.id);
    const isSelected = value === selected ? " selected" : "";
    return `<option value="${value}"${isSelected}>${escapeHtml(category.title)}</option>`;
  });

  return [placeholder, ...options].join("");
}

export function renderPostFormPage(context: PageContext, view: PostFormView): string {
  const { values, errors } = view;

  return renderLayout(
    context,
    view.heading,
    `<section class="bl-form-page ds-surface">
        <h1 class="ds-text ds-text--heading">${escapeHtml(view.heading)}</h1>
        <form class="bl-form" method="post" action="${escapeHtml(view.action)}">
          ${renderCsrfField(context)}
          <label for="post-title">Title</label>
          <input id="post-title" name="title" type="text" maxlength="256" value="${escapeHtml(values.title)}" required />
          ${renderFieldError(errors, "title")}
          <label for="post-text">Text</label>
          <textarea id="post-text" name="text" rows="12" required>${escapeHtml(values.text)}</textarea>
          ${renderFieldError(errors, "text")}
          <label for="post-pub-date">Publication date</label>
          <input id="post-pub-date" name="pub_date" type="datetime-local" value="${escapeHtml(values.pub_date)}" required />
          <p class="bl-field-hint">Times without an offset are read in ${escapeHtml(context.timeZone)}. A future date schedules the post.</p>
          ${renderFieldError(errors, "pub_date")}
          <label for="post-location">Location</label>
          <input id="post-location" name="location" type="text" maxlength="256" value="${escapeHtml(values.location)}" />
          ${renderFieldError(errors, "location")}
          <label for="post-category">Category</label>
          <select id="post-category" name="category" required>${renderCategoryOptions(view.categories, values.category)}</select>
          ${renderFieldError(errors, "category")}
          <label class="bl-checkbox" for="post-is-published">
            <input id="post-is-published" name="is_published" type="checkbox" value="on"${values.is_published ? " checked" : ""} />
            Published
          </label>
          <label for="post-image">Image URL</label>
          <input id="post-image" name="image" type="url" value="${escapeHtml(values.image)}" />
          ${renderFieldError(errors, "image")}
          <button class="ds-button ds-button--primary" type="submit">${escapeHtml(view.submitLabel)}</button>
        </form>
      </section>`
  );
}

export function renderDeletePostPage(context: PageContext, post: PostRecord): string {
  return renderLayout(
    context,
    "Delete post",
    `<section class="bl-form-page ds-surface">
        <h1 class="ds-text ds-text--heading">Delete post</h1>
        <p>Delete <strong>${escapeHtml(post.title)}</strong> and all of its comments? This cannot be undone.</p>
        <form class="bl-form" method="post" action="${postPath(post.id)}/delete">
          ${renderCsrfField(context)}
          <button class="ds-button ds-button--danger" type="submit">Delete</button>
          <a class="ds-button ds-button--secondary" href="${postPath(post.id)}">Cancel</a>
        </form>
      </section>`
  );
}

export function renderEditCommentPage(
  context: PageContext,
  comment: CommentRecord,
  values: CommentFormValues,
  errors: FieldErrors
): string {
  return renderLayout(
    context,
    "Edit comment",
    `<section class="bl-form-page ds-surface">
        <h1 class="ds-text ds-text--heading">Edit comment</h1>
        ${renderCommentForm(context, `${postPath(comment.postId)}/edit_comment/${comment.id}`, values, errors, "Save")}
      </section>`
  );
}

export function renderDeleteCommentPage(context: PageContext, comment: CommentRecord): string {
  return renderLayout(
    context,
    "Delete comment",
    `<section class="bl-form-page ds-surface">
        <h1 class="ds-text ds-text--heading">Delete comment</h1>
        <blockquote class="bl-comment-text">${escapeHtml(comment.text)}</blockquote>
        <form class="bl-form" method="post" action="${postPath(comment.postId)}/delete_comment/${comment.id}">
          ${renderCsrfField(context)}
          <button class="ds-button ds-button--danger" type="submit">Delete</button>
          <a class="ds-button ds-button--secondary" href="${postPath(comment.postId)}">Cancel</a>
        </form>
      </section>`
  );
}

export function renderProfileFormPage(context: PageContext, values: ProfileFormValues, errors: FieldErrors): string {
  return renderLayout(
    context,
    "Edit profile",
    `<section class="bl-form-page ds-surface">
        <h1 class="ds-text ds-text--heading">Edit profile</h1>
        <form class="bl-form" method="post" action="/edit_profile">
          ${renderCsrfField(context)}
          <label for="profile-username">Username</label>
          <input id="profile-username" name="username" type="text" maxlength="150" value="${escapeHtml(values.username)}" required />
          ${renderFieldError(errors, "username")}
          <label for="profile-first-name">First name</label>
          <input id="profile-first-name" name="first_name" type="text" maxlength="150" value="${escapeHtml(values.first_name)}" />
          ${renderFieldError(errors, "first_name")}
          <label for="profile-last-name">Last name</label>
          <input id="profile-last-name" name="last_name" type="text" maxlength="150" value="${escapeHtml(values.last_name)}" />
          ${renderFieldError(errors, "last_name")}
          <label for="profile-email">Email</label>
          <input id="profile-email" name="email" type="email" maxlength="254" value="${escapeHtml(values.email)}" />
          ${renderFieldError(errors, "email")}
          <button class="ds-button ds-button--primary" type="submit">Save</button>
        </form>
      </section>`
  );
}
