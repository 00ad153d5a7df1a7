import express from "express";
import request from "supertest";
import { describe, expect, it } from "vitest";
import { hydrateAuthFromHeaders, requireAuthenticated } from "../src/middleware/auth";
import { loadCurrentUser } from "../src/middleware/current-user";
import { applyDevAuthFallback } from "../src/middleware/dev-auth";
import { ALICE_ID, CAROL_ID, createConfig, createRepository } from "./support/blog-fixtures";
import type { AppConfig } from "../src/config";

function createTestApp(overrides: Partial<AppConfig> = {}) {
  const app = express();
  app.use(hydrateAuthFromHeaders);
  app.use(applyDevAuthFallback(createConfig(overrides)));
  app.use(loadCurrentUser(createRepository()));
  app.get("/private", requireAuthenticated, (req, res) => {
    res.status(200).json({ userId: req.auth?.userId, role: req.auth?.role, username: req.currentUser?.username });
  });
  return app;
}

describe("auth guard", () => {
  it("returns 401 when not authenticated", async () => {
    const response = await request(createTestApp()).get("/private");

    expect(response.status).toBe(401);
    expect(response.text).toBe("Authentication required");
  });

  it("ignores non-numeric user ids", async () => {
    const response = await request(createTestApp()).get("/private").set("x-user-id", "user-1");

    expect(response.status).toBe(401);
  });

  it("returns 401 for an id with no stored profile", async () => {
    const response = await request(createTestApp()).get("/private").set("x-user-id", "99");

    expect(response.status).toBe(401);
  });

  it("resolves the stored profile for a known user", async () => {
    const response = await request(createTestApp()).get("/private").set("x-user-id", String(ALICE_ID));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ userId: ALICE_ID, role: "USER", username: "alice" });
  });

  it("promotes staff accounts to the ADMIN role", async () => {
    const response = await request(createTestApp())
      .get("/private")
      .set("x-user-id", String(CAROL_ID))
      .set("x-user-role", "USER");

    expect(response.body).toEqual({ userId: CAROL_ID, role: "ADMIN", username: "carol" });
  });

  it("falls back to the configured dev identity when bypass is enabled", async () => {
    const response = await request(createTestApp({ devAuthBypassEnabled: true, devAuthBypassUserId: ALICE_ID })).get(
      "/private"
    );

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ userId: ALICE_ID, role: "USER", username: "alice" });
  });
});
