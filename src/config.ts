import type { UserRole } from "./types/context";
import { isValidTimeZone } from "./blog/timestamps";

export interface SecurityHeadersConfig {
  isProduction: boolean;
  cspReportOnly: boolean;
  cspFrameAncestors: string[];
  cspConnectSrc: string[];
  cspImgSrc: string[];
}

export interface RateLimitConfig {
  enabled: boolean;
  writePerMinute: number;
}

export interface AppConfig {
  port: number;
  timeZone: string;
  csrfSecret: string;
  devAuthBypassEnabled: boolean;
  devAuthBypassUserId: number;
  devAuthBypassUserRole: UserRole;
  rateLimit?: Partial<RateLimitConfig>;
  securityHeaders?: Partial<SecurityHeadersConfig>;
}

export interface DatabaseConfig {
  connectionString: string;
  poolSize: number;
  statementTimeoutMs: number;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
}

export const DEFAULT_TIME_ZONE = "UTC";
const DEV_CSRF_SECRET = "dev-only-csrf-secret";
const MIN_CSRF_SECRET_LENGTH = 16;

const CSP_KEYWORDS = new Set(["none", "self", "unsafe-inline", "unsafe-eval", "strict-dynamic"]);

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.toLowerCase();
  if (normalized === "true") {
    return true;
  }
  if (normalized === "false") {
    return false;
  }
  return defaultValue;
}

function parseUserRole(value: string | undefined, defaultValue: UserRole): UserRole {
  const normalized = value?.trim().toUpperCase();
  if (normalized === "ADMIN" || normalized === "USER") {
    return normalized;
  }

  return defaultValue;
}

function parsePositiveInteger(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return defaultValue;
  }

  return parsed;
}

function parseCsvList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function normalizeCspSource(source: string): string {
  const trimmed = source.trim();
  const withoutQuotes = trimmed.replace(/^'(.*)'$/, "$1").toLowerCase();
  return CSP_KEYWORDS.has(withoutQuotes) ? `'${withoutQuotes}'` : trimmed;
}

function parseCspSourceList(value: string | undefined, fallback: string[]): string[] {
  const parsed = parseCsvList(value).map(normalizeCspSource);
  return parsed.length > 0 ? parsed : fallback;
}

function resolveTimeZone(value: string | undefined): string {
  const zone = value?.trim();
  if (!zone) {
    return DEFAULT_TIME_ZONE;
  }

  if (!isValidTimeZone(zone)) {
    throw new Error(`TIME_ZONE must be a valid IANA time zone, got "${zone}"`);
  }

  return zone;
}

function resolveCsrfSecret(value: string | undefined, isProduction: boolean): string {
  const secret = value?.trim() ?? "";
  if (secret.length >= MIN_CSRF_SECRET_LENGTH) {
    return secret;
  }

  if (isProduction) {
    throw new Error(`CSRF_SECRET must be at least ${MIN_CSRF_SECRET_LENGTH} characters in production`);
  }

  return DEV_CSRF_SECRET;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const isProduction = (env.NODE_ENV ?? "").toLowerCase() === "production";

  // The impersonation fallback exists for local browsing only.
  const devAuthBypassEnabled = !isProduction && parseBoolean(env.BLOG_DEV_AUTH_BYPASS, false);

  return {
    port: parsePositiveInteger(env.PORT, 3000),
    timeZone: resolveTimeZone(env.TIME_ZONE),
    csrfSecret: resolveCsrfSecret(env.CSRF_SECRET, isProduction),
    devAuthBypassEnabled,
    devAuthBypassUserId: parsePositiveInteger(env.BLOG_DEV_USER_ID, 1),
    devAuthBypassUserRole: parseUserRole(env.BLOG_DEV_USER_ROLE, "USER"),
    rateLimit: {
      enabled: parseBoolean(env.RATE_LIMIT_ENABLED, true),
      writePerMinute: parsePositiveInteger(env.RATE_LIMIT_WRITE_PER_MIN, 30)
    },
    securityHeaders: {
      isProduction,
      cspReportOnly: parseBoolean(env.BLOG_CSP_REPORT_ONLY, !isProduction),
      cspFrameAncestors: parseCspSourceList(env.CSP_FRAME_ANCESTORS, ["'none'"]),
      cspConnectSrc: parseCspSourceList(env.CSP_CONNECT_SRC, ["'self'"]),
      cspImgSrc: parseCspSourceList(env.CSP_IMG_SRC, ["'self'", "data:", "https:"])
    }
  };
}

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const connectionString = env.DATABASE_URL?.trim();
  if (!connectionString) {
    throw new Error("DATABASE_URL is required");
  }

  return {
    connectionString,
    poolSize: parsePositiveInteger(env.DATABASE_POOL_MAX, 10),
    statementTimeoutMs: parsePositiveInteger(env.DATABASE_STATEMENT_TIMEOUT_MS, 10_000),
    ssl: parseBoolean(env.DATABASE_SSL, false),
    sslRejectUnauthorized: parseBoolean(env.DATABASE_SSL_REJECT_UNAUTHORIZED, true)
  };
}
