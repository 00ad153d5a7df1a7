import { loadDatabaseConfig } from "../../src/config";
import { createDatabasePool } from "../../src/db/connection";
import { migrateUp } from "../../src/db/migrations";
import { formatError } from "./format-error";

const DEV_USERS = [
  { username: "editor", firstName: "Dev", lastName: "Editor", email: "editor@example.com", isStaff: true },
  { username: "reader", firstName: "Dev", lastName: "Reader", email: "reader@example.com", isStaff: false }
] as const;

const DEV_CATEGORIES = [
  { slug: "travel", title: "Travel", description: "Trips and places.", isPublished: true },
  { slug: "drafts", title: "Drafts", description: "Hidden while being assembled.", isPublished: false }
] as const;

const DEV_POSTS = [
  {
    title: "First trip of the season",
    text: "Notes from the road.\n\n**Highlights**: a quiet lake and a long walk.",
    location: "Lakeside",
    categorySlug: "travel",
    isPublished: true,
    pubDateOffsetHours: -48
  },
  {
    title: "Scheduled follow-up",
    text: "Goes live tomorrow.",
    location: null,
    categorySlug: "travel",
    isPublished: true,
    pubDateOffsetHours: 24
  },
  {
    title: "Post in a hidden category",
    text: "Only the author sees this one.",
    location: null,
    categorySlug: "drafts",
    isPublished: true,
    pubDateOffsetHours: -1
  }
] as const;

async function main() {
  if (process.env.NODE_ENV === "production") {
    throw new Error("seed-dev must not run in production");
  }

  const pool = createDatabasePool(loadDatabaseConfig());

  try {
    await migrateUp(pool);

    const userIds = new Map<string, number>();
    for (const user of DEV_USERS) {
      const result = await pool.query<{ id: number }>(
        `
          INSERT INTO blog_users (username, first_name, last_name, email, is_staff)
          VALUES ($1, $2, $3, $4, $5)
          ON CONFLICT (username)
          DO UPDATE SET
            first_name = EXCLUDED.first_name,
            last_name = EXCLUDED.last_name,
            email = EXCLUDED.email,
            is_staff = EXCLUDED.is_staff
          RETURNING id
        `,
        [user.username, user.firstName, user.lastName, user.email, user.isStaff]
      );
      const row = result.rows[0];
      if (row) {
        userIds.set(user.username, row.id);
      }
    }

    const categoryIds = new Map<string, number>();
    for (const category of DEV_CATEGORIES) {
      const result = await pool.query<{ id: number }>(
        `
          INSERT INTO blog_categories (slug, title, description, is_published)
          VALUES ($1, $2, $3, $4)
          ON CONFLICT (slug)
          DO UPDATE SET
            title = EXCLUDED.title,
            description = EXCLUDED.description,
            is_published = EXCLUDED.is_published
          RETURNING id
        `,
        [category.slug, category.title, category.description, category.isPublished]
      );
      const row = result.rows[0];
      if (row) {
        categoryIds.set(category.slug, row.id);
      }
    }

    const authorId = userIds.get("editor");
    if (authorId === undefined) {
      throw new Error("seed author was not created");
    }

    await pool.query("DELETE FROM blog_posts WHERE author_id = $1", [authorId]);
    for (const post of DEV_POSTS) {
      const pubDate = new Date(Date.now() + post.pubDateOffsetHours * 60 * 60 * 1000);
      await pool.query(
        `
          INSERT INTO blog_posts (title, text, pub_date, location, category_id, is_published, author_id)
          VALUES ($1, $2, $3, $4, $5, $6, $7)
        `,
        [post.title, post.text, pubDate, post.location, categoryIds.get(post.categorySlug) ?? null, post.isPublished, authorId]
      );
    }

    console.info(`Seeded ${DEV_USERS.length} users, ${DEV_CATEGORIES.length} categories and ${DEV_POSTS.length} posts.`);
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  console.error(`Dev seed failed:\n${formatError(error)}`);
  process.exitCode = 1;
});
