import { describe, expect, it } from "vitest";
import type { Request } from "express";
import {
  buildSafeRequestLogMetadata,
  createLogger,
  parseLogLevel,
  sanitizeLogMetadata,
  type LogLevel
} from "../src/security/logger";

describe("sanitizeLogMetadata", () => {
  it("redacts content, contact and secret-looking keys", () => {
    const metadata = sanitizeLogMetadata({
      postId: 12,
      text: "comment body",
      email: "alice@example.com",
      csrf_token: "abc123",
      nested: {
        body: "post body",
        ok: true
      }
    });

    expect(metadata).toEqual({
      postId: 12,
      text: "[REDACTED]",
      email: "[REDACTED]",
      csrf_token: "[REDACTED]",
      nested: {
        body: "[REDACTED]",
        ok: true
      }
    });
  });

  it("redacts authorization and cookie headers", () => {
    const metadata = sanitizeLogMetadata({
      headers: {
        authorization: "Bearer secret",
        cookie: "session=secret",
        "x-user-id": "7"
      }
    });

    expect(metadata).toEqual({
      headers: {
        authorization: "[REDACTED]",
        cookie: "[REDACTED]",
        "x-user-id": "7"
      }
    });
  });

  it("reduces errors to their name and message", () => {
    expect(sanitizeLogMetadata({ error: new TypeError("boom") })).toEqual({
      error: { name: "TypeError", message: "boom" }
    });
  });
});

describe("buildSafeRequestLogMetadata", () => {
  it("omits the request body and records the resolved user", () => {
    const request: Partial<Request> = {
      method: "POST",
      originalUrl: "/posts/2/comment",
      url: "/posts/2/comment",
      ip: "127.0.0.1",
      auth: { userId: 7, role: "USER", isAuthenticated: true },
      headers: {
        authorization: "Bearer secret",
        cookie: "session=secret",
        "x-user-id": "7"
      }
    };

    const metadata = buildSafeRequestLogMetadata(request as Request);

    expect(metadata).toEqual({
      method: "POST",
      path: "/posts/2/comment",
      ip: "127.0.0.1",
      userId: 7,
      headers: {
        authorization: "[REDACTED]",
        cookie: "[REDACTED]",
        "x-user-id": "7"
      }
    });
    expect("body" in metadata).toBe(false);
  });
});

describe("createLogger", () => {
  it("writes one redacted JSON line per event", () => {
    const lines: Array<[LogLevel, string]> = [];
    const logger = createLogger({
      sink: (level, line) => lines.push([level, line]),
      clock: () => new Date("2026-03-10T12:00:00.000Z")
    });

    logger.warn("blog_csrf_rejected", { userId: 7, csrf_token: "abc123" });

    expect(lines).toEqual([
      [
        "warn",
        '{"level":"warn","timestamp":"2026-03-10T12:00:00.000Z","event":"blog_csrf_rejected","metadata":{"userId":7,"csrf_token":"[REDACTED]"}}'
      ]
    ]);
  });

  it("drops events below the minimum level", () => {
    const levels: LogLevel[] = [];
    const logger = createLogger({ minLevel: "warn", sink: (level) => levels.push(level) });

    logger.info("server_started");
    logger.warn("blog_write_rate_limited");
    logger.error("blog_route_failed");

    expect(levels).toEqual(["warn", "error"]);
  });

  it("parses LOG_LEVEL values case-insensitively", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "error")).toBe("error");
  });
});
