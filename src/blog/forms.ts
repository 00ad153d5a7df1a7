import { normalizePublicationTimestamp } from "./timestamps";

export const TITLE_MAX_LENGTH = 256;
export const LOCATION_MAX_LENGTH = 256;
export const COMMENT_MAX_LENGTH = 5_000;
export const USERNAME_MAX_LENGTH = 150;
export const NAME_MAX_LENGTH = 150;
export const EMAIL_MAX_LENGTH = 254;

const USERNAME_PATTERN = /^[\w.@+-]+$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const FALSE_CHECKBOX_VALUES = new Set(["", "false", "0", "off"]);

export type FieldErrors = Record<string, string>;

export type FormResult<T> = { ok: true; value: T } | { ok: false; errors: FieldErrors };

export interface PostFormValues {
  title: string;
  text: string;
  pub_date: string;
  location: string;
  category: string;
  is_published: boolean;
  image: string;
}

export interface PostWriteInput {
  title: string;
  text: string;
  pubDate: string;
  location: string | null;
  categoryId: number;
  isPublished: boolean;
  image: string | null;
}

export interface CommentFormValues {
  text: string;
}

export interface ProfileFormValues {
  username: string;
  first_name: string;
  last_name: string;
  email: string;
}

export interface ProfileWriteInput {
  username: string;
  firstName: string;
  lastName: string;
  email: string;
}

export interface PostFormOptions {
  timeZone: string;
  categoryIds: ReadonlySet<number>;
}

// Limits count characters (code points), as the database varchar columns do.
export function characterLength(value: string): number {
  return Array.from(value).length;
}

function readField(body: unknown, name: string): string {
  if (!body || typeof body !== "object") {
    return "";
  }

  const raw: unknown = Reflect.get(body, name);
  const value = Array.isArray(raw) ? raw[raw.length - 1] : raw;
  return typeof value === "string" ? value : "";
}

function readCheckbox(body: unknown, name: string): boolean {
  return !FALSE_CHECKBOX_VALUES.has(readField(body, name).trim().toLowerCase());
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function parseCategoryId(value: string): number | undefined {
  if (!/^\d+$/.test(value)) {
    return undefined;
  }

  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

export function readPostFormValues(body: unknown): PostFormValues {
  return {
    title: readField(body, "title"),
    text: readField(body, "text"),
    pub_date: readField(body, "pub_date"),
    location: readField(body, "location"),
    category: readField(body, "category"),
    is_published: readCheckbox(body, "is_published"),
    image: readField(body, "image")
  };
}

export function validatePostForm(values: PostFormValues, options: PostFormOptions): FormResult<PostWriteInput> {
  const errors: FieldErrors = {};

  const title = values.title.trim();
  if (title.length === 0) {
    errors.title = "This field is required.";
  } else if (characterLength(title) > TITLE_MAX_LENGTH) {
    errors.title = `Ensure this value has at most ${TITLE_MAX_LENGTH} characters.`;
  }

  const text = values.text.trim();
  if (text.length === 0) {
    errors.text = "This field is required.";
  }

  let pubDate: string | null = null;
  if (values.pub_date.trim().length === 0) {
    errors.pub_date = "This field is required.";
  } else {
    pubDate = normalizePublicationTimestamp(values.pub_date, options.timeZone);
    if (!pubDate) {
      errors.pub_date = "Enter a valid date/time.";
    }
  }

  const location = values.location.trim();
  if (characterLength(location) > LOCATION_MAX_LENGTH) {
    errors.location = `Ensure this value has at most ${LOCATION_MAX_LENGTH} characters.`;
  }

  const categoryId = parseCategoryId(values.category.trim());
  if (values.category.trim().length === 0) {
    errors.category = "This field is required.";
  } else if (categoryId === undefined || !options.categoryIds.has(categoryId)) {
    errors.category = "Select a valid choice.";
  }

  const image = values.image.trim();
  if (image.length > 0 && !isHttpUrl(image)) {
    errors.image = "Enter a valid http or https URL.";
  }

  if (Object.keys(errors).length > 0 || pubDate === null || categoryId === undefined) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: {
      title,
      text,
      pubDate,
      location: location.length > 0 ? location : null,
      categoryId,
      isPublished: values.is_published,
      image: image.length > 0 ? image : null
    }
  };
}

export function readCommentFormValues(body: unknown): CommentFormValues {
  return { text: readField(body, "text") };
}

export function validateCommentForm(values: CommentFormValues): FormResult<{ text: string }> {
  const text = values.text.trim();
  if (text.length === 0) {
    return { ok: false, errors: { text: "This field is required." } };
  }
  if (characterLength(text) > COMMENT_MAX_LENGTH) {
    return { ok: false, errors: { text: `Ensure this value has at most ${COMMENT_MAX_LENGTH} characters.` } };
  }

  return { ok: true, value: { text } };
}

export function readProfileFormValues(body: unknown): ProfileFormValues {
  return {
    username: readField(body, "username"),
    first_name: readField(body, "first_name"),
    last_name: readField(body, "last_name"),
    email: readField(body, "email")
  };
}

export function validateProfileForm(values: ProfileFormValues): FormResult<ProfileWriteInput> {
  const errors: FieldErrors = {};

  const username = values.username.trim();
  if (username.length === 0) {
    errors.username = "This field is required.";
  } else if (characterLength(username) > USERNAME_MAX_LENGTH) {
    errors.username = `Ensure this value has at most ${USERNAME_MAX_LENGTH} characters.`;
  } else if (!USERNAME_PATTERN.test(username)) {
    errors.username = "Enter a valid username. Use letters, digits and @/./+/-/_ only.";
  }

  const firstName = values.first_name.trim();
  if (characterLength(firstName) > NAME_MAX_LENGTH) {
    errors.first_name = `Ensure this value has at most ${NAME_MAX_LENGTH} characters.`;
  }

  const lastName = values.last_name.trim();
  if (characterLength(lastName) > NAME_MAX_LENGTH) {
    errors.last_name = `Ensure this value has at most ${NAME_MAX_LENGTH} characters.`;
  }

  const email = values.email.trim();
  if (characterLength(email) > EMAIL_MAX_LENGTH || (email.length > 0 && !EMAIL_PATTERN.test(email))) {
    errors.email = "Enter a valid email address.";
  }

  if (Object.keys(errors).length > 0) {
    return { ok: false, errors };
  }

  return { ok: true, value: { username, firstName, lastName, email } };
}
