import type { Pool } from "pg";
import { ConflictError } from "./errors";
import type { PostWriteInput, ProfileWriteInput } from "./forms";
import { isPostPubliclyVisible, type PostVisibility } from "./visibility";

export interface UserProfile {
  id: number;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  isStaff: boolean;
}

export interface Category {
  id: number;
  title: string;
  description: string;
  slug: string;
  isPublished: boolean;
  createdAt: string;
}

export interface AuthorRef {
  id: number;
  username: string;
}

export interface PostCategoryRef {
  id: number;
  title: string;
  slug: string;
  isPublished: boolean;
}

export interface PostRecord {
  id: number;
  title: string;
  text: string;
  pubDate: string;
  location: string | null;
  image: string | null;
  isPublished: boolean;
  createdAt: string;
  author: AuthorRef;
  category: PostCategoryRef | null;
}

export interface PostSummary extends PostRecord {
  commentCount: number;
}

export interface CommentRecord {
  id: number;
  postId: number;
  text: string;
  createdAt: string;
  author: AuthorRef;
}

export interface PostListFilter {
  visibility: PostVisibility;
  categoryId?: number;
  authorId?: number;
}

export interface PaginationInput {
  limit: number;
  offset: number;
}

export interface CreatePostInput extends PostWriteInput {
  authorId: number;
}

export interface CreateCommentInput {
  postId: number;
  authorId: number;
  text: string;
}

export interface BlogRepository {
  countPosts(filter: PostListFilter): Promise<number>;
  listPosts(filter: PostListFilter, pagination: PaginationInput): Promise<PostSummary[]>;
  findPostById(id: number): Promise<PostRecord | null>;
  createPost(input: CreatePostInput): Promise<PostRecord>;
  updatePost(id: number, input: PostWriteInput): Promise<PostRecord | null>;
  deletePost(id: number): Promise<boolean>;
  listCategories(): Promise<Category[]>;
  findCategoryBySlug(slug: string): Promise<Category | null>;
  listComments(postId: number): Promise<CommentRecord[]>;
  findCommentById(id: number): Promise<CommentRecord | null>;
  createComment(input: CreateCommentInput): Promise<CommentRecord>;
  updateComment(id: number, text: string): Promise<CommentRecord | null>;
  deleteComment(id: number): Promise<boolean>;
  findUserById(id: number): Promise<UserProfile | null>;
  findUserByUsername(username: string): Promise<UserProfile | null>;
  updateUserProfile(id: number, input: ProfileWriteInput): Promise<UserProfile | null>;
}

interface UserRow {
  id: number;
  username: string;
  first_name: string;
  last_name: string;
  email: string;
  is_staff: boolean;
}

interface CategoryRow {
  id: number;
  title: string;
  description: string;
  slug: string;
  is_published: boolean;
  created_at: Date;
}

interface PostRow {
  id: number;
  title: string;
  text: string;
  pub_date: Date;
  location: string | null;
  image: string | null;
  is_published: boolean;
  created_at: Date;
  author_id: number;
  author_username: string;
  category_id: number | null;
  category_title: string | null;
  category_slug: string | null;
  category_is_published: boolean | null;
}

interface PostSummaryRow extends PostRow {
  comment_count: number;
}

interface CommentRow {
  id: number;
  post_id: number;
  text: string;
  created_at: Date;
  author_id: number;
  author_username: string;
}

const POST_SELECT = `
  SELECT
    p.id,
    p.title,
    p.text,
    p.pub_date,
    p.location,
    p.image,
    p.is_published,
    p.created_at,
    u.id AS author_id,
    u.username AS author_username,
    c.id AS category_id,
    c.title AS category_title,
    c.slug AS category_slug,
    c.is_published AS category_is_published
`;

const POST_FROM = `
  FROM blog_posts p
  JOIN blog_users u ON u.id = p.author_id
  LEFT JOIN blog_categories c ON c.id = p.category_id
`;

const COMMENT_SELECT = `
  SELECT
    cm.id,
    cm.post_id,
    cm.text,
    cm.created_at,
    u.id AS author_id,
    u.username AS author_username
  FROM blog_comments cm
  JOIN blog_users u ON u.id = cm.author_id
`;

function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

function toUserProfile(row: UserRow): UserProfile {
  return {
    id: row.id,
    username: row.username,
    firstName: row.first_name,
    lastName: row.last_name,
    email: row.email,
    isStaff: row.is_staff
  };
}

function toCategory(row: CategoryRow): Category {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    slug: row.slug,
    isPublished: row.is_published,
    createdAt: row.created_at.toISOString()
  };
}

function toPostRecord(row: PostRow): PostRecord {
  const category =
    row.category_id !== null && row.category_slug !== null
      ? {
          id: row.category_id,
          title: row.category_title ?? "",
          slug: row.category_slug,
          isPublished: row.category_is_published === true
        }
      : null;

  return {
    id: row.id,
    title: row.title,
    text: row.text,
    pubDate: row.pub_date.toISOString(),
    location: row.location,
    image: row.image,
    isPublished: row.is_published,
    createdAt: row.created_at.toISOString(),
    author: { id: row.author_id, username: row.author_username },
    category
  };
}

function toCommentRecord(row: CommentRow): CommentRecord {
  return {
    id: row.id,
    postId: row.post_id,
    text: row.text,
    createdAt: row.created_at.toISOString(),
    author: { id: row.author_id, username: row.author_username }
  };
}

export function buildPostWhere(filter: PostListFilter, values: unknown[]): string {
  const where: string[] = [];

  if (filter.visibility.kind === "published") {
    values.push(filter.visibility.now);
    where.push(`p.pub_date <= $${values.length}`);
    where.push("p.is_published = true");
    where.push("c.is_published = true");
  }

  if (filter.categoryId !== undefined) {
    values.push(filter.categoryId);
    where.push(`p.category_id = $${values.length}`);
  }

  if (filter.authorId !== undefined) {
    values.push(filter.authorId);
    where.push(`p.author_id = $${values.length}`);
  }

  return where.length > 0 ? `WHERE ${where.join(" AND ")}` : "";
}

export class PostgresBlogRepository implements BlogRepository {
  constructor(private readonly pool: Pool) {}

  async countPosts(filter: PostListFilter): Promise<number> {
    const values: unknown[] = [];
    const where = buildPostWhere(filter, values);
    const result = await this.pool.query<{ total: number }>(
      `
        SELECT count(*)::int AS total
        ${POST_FROM}
        ${where}
      `,
      values
    );

    return result.rows[0]?.total ?? 0;
  }

  async listPosts(filter: PostListFilter, pagination: PaginationInput): Promise<PostSummary[]> {
    const values: unknown[] = [];
    const where = buildPostWhere(filter, values);
    values.push(pagination.limit);
    values.push(pagination.offset);

    const result = await this.pool.query<PostSummaryRow>(
      `
        ${POST_SELECT},
          (SELECT count(*)::int FROM blog_comments cm WHERE cm.post_id = p.id) AS comment_count
        ${POST_FROM}
        ${where}
        ORDER BY p.pub_date DESC, p.id DESC
        LIMIT $${values.length - 1} OFFSET $${values.length}
      `,
      values
    );

    return result.rows.map((row) => ({
      ...toPostRecord(row),
      commentCount: row.comment_count
    }));
  }

  async findPostById(id: number): Promise<PostRecord | null> {
    const result = await this.pool.query<PostRow>(
      `
        ${POST_SELECT}
        ${POST_FROM}
        WHERE p.id = $1
        LIMIT 1
      `,
      [id]
    );

    const row = result.rows[0];
    return row ? toPostRecord(row) : null;
  }

  async createPost(input: CreatePostInput): Promise<PostRecord> {
    const insertResult = await this.pool.query<{ id: number }>(
      `
        INSERT INTO blog_posts (
          title,
          text,
          pub_date,
          location,
          category_id,
          is_published,
          image,
          author_id
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
        RETURNING id
      `,
      [
        input.title,
        input.text,
        input.pubDate,
        input.location,
        input.categoryId,
        input.isPublished,
        input.image,
        input.authorId
      ]
    );

    const inserted = insertResult.rows[0];
    const post = inserted ? await this.findPostById(inserted.id) : null;
    if (!post) {
      throw new Error("created post could not be read back");
    }

    return post;
  }

  async updatePost(id: number, input: PostWriteInput): Promise<PostRecord | null> {
    const result = await this.pool.query(
      `
        UPDATE blog_posts
        SET
          title = $1,
          text = $2,
          pub_date = $3,
          location = $4,
          category_id = $5,
          is_published = $6,
          image = $7
        WHERE id = $8
      `,
      [input.title, input.text, input.pubDate, input.location, input.categoryId, input.isPublished, input.image, id]
    );

    if (result.rowCount === 0) {
      return null;
    }

    return this.findPostById(id);
  }

  async deletePost(id: number): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM blog_posts WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async listCategories(): Promise<Category[]> {
    const result = await this.pool.query<CategoryRow>(
      `
        SELECT id, title, description, slug, is_published, created_at
        FROM blog_categories
        ORDER BY title ASC, id ASC
      `
    );

    return result.rows.map(toCategory);
  }

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    const result = await this.pool.query<CategoryRow>(
      `
        SELECT id, title, description, slug, is_published, created_at
        FROM blog_categories
        WHERE slug = $1
        LIMIT 1
      `,
      [slug]
    );

    const row = result.rows[0];
    return row ? toCategory(row) : null;
  }

  async listComments(postId: number): Promise<CommentRecord[]> {
    const result = await this.pool.query<CommentRow>(
      `
        ${COMMENT_SELECT}
        WHERE cm.post_id = $1
        ORDER BY cm.created_at ASC, cm.id ASC
      `,
      [postId]
    );

    return result.rows.map(toCommentRecord);
  }

  async findCommentById(id: number): Promise<CommentRecord | null> {
    const result = await this.pool.query<CommentRow>(
      `
        ${COMMENT_SELECT}
        WHERE cm.id = $1
        LIMIT 1
      `,
      [id]
    );

    const row = result.rows[0];
    return row ? toCommentRecord(row) : null;
  }

  async createComment(input: CreateCommentInput): Promise<CommentRecord> {
    const insertResult = await this.pool.query<{ id: number }>(
      `
        INSERT INTO blog_comments (post_id, author_id, text)
        VALUES ($1, $2, $3)
        RETURNING id
      `,
      [input.postId, input.authorId, input.text]
    );

    const inserted = insertResult.rows[0];
    const comment = inserted ? await this.findCommentById(inserted.id) : null;
    if (!comment) {
      throw new Error("created comment could not be read back");
    }

    return comment;
  }

  async updateComment(id: number, text: string): Promise<CommentRecord | null> {
    const result = await this.pool.query("UPDATE blog_comments SET text = $1 WHERE id = $2", [text, id]);
    if (result.rowCount === 0) {
      return null;
    }

    return this.findCommentById(id);
  }

  async deleteComment(id: number): Promise<boolean> {
    const result = await this.pool.query("DELETE FROM blog_comments WHERE id = $1", [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async findUserById(id: number): Promise<UserProfile | null> {
    const result = await this.pool.query<UserRow>(
      `
        SELECT id, username, first_name, last_name, email, is_staff
        FROM blog_users
        WHERE id = $1
        LIMIT 1
      `,
      [id]
    );

    const row = result.rows[0];
    return row ? toUserProfile(row) : null;
  }

  async findUserByUsername(username: string): Promise<UserProfile | null> {
    const result = await this.pool.query<UserRow>(
      `
        SELECT id, username, first_name, last_name, email, is_staff
        FROM blog_users
        WHERE username = $1
        LIMIT 1
      `,
      [username]
    );

    const row = result.rows[0];
    return row ? toUserProfile(row) : null;
  }

  async updateUserProfile(id: number, input: ProfileWriteInput): Promise<UserProfile | null> {
    try {
      const result = await this.pool.query<UserRow>(
        `
          UPDATE blog_users
          SET
            username = $1,
            first_name = $2,
            last_name = $3,
            email = $4
          WHERE id = $5
          RETURNING id, username, first_name, last_name, email, is_staff
        `,
        [input.username, input.firstName, input.lastName, input.email, id]
      );

      const row = result.rows[0];
      return row ? toUserProfile(row) : null;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("A user with that username already exists.", "username");
      }
      throw error;
    }
  }
}

export type InMemoryUser = UserProfile;

export interface InMemoryCategory extends Omit<Category, "createdAt"> {
  createdAt?: string;
}

export interface InMemoryPost {
  id: number;
  title: string;
  text: string;
  pubDate: string;
  location?: string | null;
  image?: string | null;
  isPublished: boolean;
  categoryId: number | null;
  authorId: number;
  createdAt?: string;
}

export interface InMemoryComment {
  id: number;
  postId: number;
  authorId: number;
  text: string;
  createdAt?: string;
}

export interface InMemorySeed {
  users?: InMemoryUser[];
  categories?: InMemoryCategory[];
  posts?: InMemoryPost[];
  comments?: InMemoryComment[];
}

type StoredPost = Required<InMemoryPost>;
type StoredComment = Required<InMemoryComment>;

function nextIdAfter(records: Array<{ id: number }>): number {
  return records.reduce((max, record) => Math.max(max, record.id), 0) + 1;
}

function normalizeIso(value: string): string {
  return new Date(value).toISOString();
}

export class InMemoryBlogRepository implements BlogRepository {
  private users: UserProfile[];
  private categories: Category[];
  private posts: StoredPost[];
  private comments: StoredComment[];
  private nextPostId: number;
  private nextCommentId: number;

  constructor(seed: InMemorySeed = {}) {
    const now = new Date().toISOString();
    this.users = (seed.users ?? []).map((user) => ({ ...user }));
    this.categories = (seed.categories ?? []).map((category) => ({
      ...category,
      createdAt: category.createdAt ?? now
    }));
    this.posts = (seed.posts ?? []).map((post) => ({
      ...post,
      pubDate: normalizeIso(post.pubDate),
      location: post.location ?? null,
      image: post.image ?? null,
      createdAt: post.createdAt ?? now
    }));
    this.comments = (seed.comments ?? []).map((comment) => ({
      ...comment,
      createdAt: comment.createdAt ?? now
    }));
    this.nextPostId = nextIdAfter(this.posts);
    this.nextCommentId = nextIdAfter(this.comments);
  }

  async countPosts(filter: PostListFilter): Promise<number> {
    return this.filterPosts(filter).length;
  }

  async listPosts(filter: PostListFilter, pagination: PaginationInput): Promise<PostSummary[]> {
    return this.filterPosts(filter)
      .sort((left, right) => Date.parse(right.pubDate) - Date.parse(left.pubDate) || right.id - left.id)
      .slice(pagination.offset, pagination.offset + pagination.limit)
      .map((post) => ({
        ...post,
        commentCount: this.comments.filter((comment) => comment.postId === post.id).length
      }));
  }

  async findPostById(id: number): Promise<PostRecord | null> {
    const post = this.posts.find((candidate) => candidate.id === id);
    return post ? this.hydratePost(post) : null;
  }

  async createPost(input: CreatePostInput): Promise<PostRecord> {
    const post: StoredPost = {
      id: this.nextPostId++,
      title: input.title,
      text: input.text,
      pubDate: normalizeIso(input.pubDate),
      location: input.location,
      image: input.image,
      isPublished: input.isPublished,
      categoryId: input.categoryId,
      authorId: input.authorId,
      createdAt: new Date().toISOString()
    };

    this.posts.push(post);
    return this.hydratePost(post);
  }

  async updatePost(id: number, input: PostWriteInput): Promise<PostRecord | null> {
    const index = this.posts.findIndex((post) => post.id === id);
    const existing = this.posts[index];
    if (!existing) {
      return null;
    }

    const updated: StoredPost = {
      ...existing,
      title: input.title,
      text: input.text,
      pubDate: normalizeIso(input.pubDate),
      location: input.location,
      image: input.image,
      isPublished: input.isPublished,
      categoryId: input.categoryId
    };

    this.posts[index] = updated;
    return this.hydratePost(updated);
  }

  async deletePost(id: number): Promise<boolean> {
    const before = this.posts.length;
    this.posts = this.posts.filter((post) => post.id !== id);
    this.comments = this.comments.filter((comment) => comment.postId !== id);
    return this.posts.length < before;
  }

  async listCategories(): Promise<Category[]> {
    return [...this.categories].sort((left, right) => left.title.localeCompare(right.title) || left.id - right.id);
  }

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    return this.categories.find((category) => category.slug === slug) ?? null;
  }

  async listComments(postId: number): Promise<CommentRecord[]> {
    return this.comments
      .filter((comment) => comment.postId === postId)
      .sort((left, right) => Date.parse(left.createdAt) - Date.parse(right.createdAt) || left.id - right.id)
      .map((comment) => this.hydrateComment(comment));
  }

  async findCommentById(id: number): Promise<CommentRecord | null> {
    const comment = this.comments.find((candidate) => candidate.id === id);
    return comment ? this.hydrateComment(comment) : null;
  }

  async createComment(input: CreateCommentInput): Promise<CommentRecord> {
    const comment: StoredComment = {
      id: this.nextCommentId++,
      postId: input.postId,
      authorId: input.authorId,
      text: input.text,
      createdAt: new Date().toISOString()
    };

    this.comments.push(comment);
    return this.hydrateComment(comment);
  }

  async updateComment(id: number, text: string): Promise<CommentRecord | null> {
    const comment = this.comments.find((candidate) => candidate.id === id);
    if (!comment) {
      return null;
    }

    comment.text = text;
    return this.hydrateComment(comment);
  }

  async deleteComment(id: number): Promise<boolean> {
    const before = this.comments.length;
    this.comments = this.comments.filter((comment) => comment.id !== id);
    return this.comments.length < before;
  }

  async findUserById(id: number): Promise<UserProfile | null> {
    const user = this.users.find((candidate) => candidate.id === id);
    return user ? { ...user } : null;
  }

  async findUserByUsername(username: string): Promise<UserProfile | null> {
    const user = this.users.find((candidate) => candidate.username === username);
    return user ? { ...user } : null;
  }

  async updateUserProfile(id: number, input: ProfileWriteInput): Promise<UserProfile | null> {
    const index = this.users.findIndex((user) => user.id === id);
    const existing = this.users[index];
    if (!existing) {
      return null;
    }

    if (this.users.some((user) => user.id !== id && user.username === input.username)) {
      throw new ConflictError("A user with that username already exists.", "username");
    }

    const updated: UserProfile = { ...existing, ...input };
    this.users[index] = updated;
    return { ...updated };
  }

  private filterPosts(filter: PostListFilter): PostRecord[] {
    return this.posts
      .filter((post) => filter.categoryId === undefined || post.categoryId === filter.categoryId)
      .filter((post) => filter.authorId === undefined || post.authorId === filter.authorId)
      .map((post) => this.hydratePost(post))
      .filter((post) => filter.visibility.kind === "all" || isPostPubliclyVisible(post, filter.visibility.now));
  }

  private authorRef(authorId: number): AuthorRef {
    const author = this.users.find((user) => user.id === authorId);
    return { id: authorId, username: author?.username ?? "" };
  }

  private hydratePost(post: StoredPost): PostRecord {
    const category = this.categories.find((candidate) => candidate.id === post.categoryId);

    return {
      id: post.id,
      title: post.title,
      text: post.text,
      pubDate: post.pubDate,
      location: post.location,
      image: post.image,
      isPublished: post.isPublished,
      createdAt: post.createdAt,
      author: this.authorRef(post.authorId),
      category: category
        ? { id: category.id, title: category.title, slug: category.slug, isPublished: category.isPublished }
        : null
    };
  }

  private hydrateComment(comment: StoredComment): CommentRecord {
    return {
      id: comment.id,
      postId: comment.postId,
      text: comment.text,
      createdAt: comment.createdAt,
      author: this.authorRef(comment.authorId)
    };
  }
}
