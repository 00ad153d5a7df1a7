import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "../src/app";
import { FIXED_NOW, createConfig, createRepository, silentLogger } from "./support/blog-fixtures";

describe("blog HTML security headers", () => {
  it("applies report-only CSP and baseline headers outside production", async () => {
    const app = createApp(createConfig(), { blogRepository: createRepository(), logger: silentLogger, now: () => FIXED_NOW });
    const response = await request(app).get("/");

    expect(response.status).toBe(200);

    const reportOnlyCsp = response.headers["content-security-policy-report-only"];
    expect(reportOnlyCsp).toBeTypeOf("string");
    expect(reportOnlyCsp).toContain("default-src 'none'");
    expect(reportOnlyCsp).toContain("script-src 'none'");
    expect(reportOnlyCsp).toContain("style-src 'self'");
    expect(reportOnlyCsp).toContain("form-action 'self'");
    expect(reportOnlyCsp).toContain("frame-ancestors 'none'");

    expect(response.headers["content-security-policy"]).toBeUndefined();
    expect(response.headers["x-powered-by"]).toBeUndefined();
    expect(response.headers["x-content-type-options"]).toBe("nosniff");
    expect(response.headers["referrer-policy"]).toBe("strict-origin-when-cross-origin");
    expect(response.headers["permissions-policy"]).toBe("geolocation=(), microphone=(), camera=(), payment=()");
    expect(response.headers["strict-transport-security"]).toBeUndefined();
  });

  it("enforces CSP and HSTS when configured for production", async () => {
    const app = createApp(
      createConfig({
        securityHeaders: {
          isProduction: true,
          cspReportOnly: false,
          cspFrameAncestors: ["'self'", "https://www.example.com"],
          cspConnectSrc: ["'self'"],
          cspImgSrc: ["'self'", "https://images.example.com"]
        }
      }),
      { blogRepository: createRepository(), logger: silentLogger, now: () => FIXED_NOW }
    );

    const response = await request(app).get("/posts/2");

    expect(response.status).toBe(200);

    const enforcedCsp = response.headers["content-security-policy"];
    expect(enforcedCsp).toContain("frame-ancestors 'self' https://www.example.com");
    expect(enforcedCsp).toContain("img-src 'self' https://images.example.com");
    expect(enforcedCsp).toContain("upgrade-insecure-requests");
    expect(response.headers["content-security-policy-report-only"]).toBeUndefined();
    expect(response.headers["strict-transport-security"]).toBe("max-age=31536000; includeSubDomains");
    expect(response.headers["x-frame-options"]).toBe("DENY");
  });
});
