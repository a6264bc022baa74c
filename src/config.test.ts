import * as path from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";

const base = { TOKEN_SECRET: "test-secret-value-123" };

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig(base);
    expect(config).toEqual({
      port: 3000,
      databaseFile: path.resolve("taskboard.db"),
      tokenSecret: "test-secret-value-123",
      tokenTtlSeconds: 1800,
      admin: null,
    });
  });

  it("reads every variable", () => {
    const config = loadConfig({
      ...base,
      PORT: "8080",
      DATABASE_FILE: ":memory:",
      TOKEN_TTL_MINUTES: "5",
      ADMIN_EMAIL: "root@example.com",
      ADMIN_PASSWORD: "root-password",
      ADMIN_NAME: "Root",
    });
    expect(config.port).toBe(8080);
    expect(config.databaseFile).toBe(":memory:");
    expect(config.tokenTtlSeconds).toBe(300);
    expect(config.admin).toEqual({
      email: "root@example.com",
      password: "root-password",
      fullName: "Root",
    });
  });

  it("refuses to start without a signing secret", () => {
    expect(() => loadConfig({})).toThrow("Invalid configuration: TOKEN_SECRET: is required");
  });

  it("refuses a short secret", () => {
    expect(() => loadConfig({ TOKEN_SECRET: "short" })).toThrow(
      "TOKEN_SECRET: must be at least 16 characters"
    );
  });

  it("rejects a bad port", () => {
    expect(() => loadConfig({ ...base, PORT: "not-a-port" })).toThrow(/PORT/);
  });

  it("needs the admin email and password together", () => {
    expect(() => loadConfig({ ...base, ADMIN_EMAIL: "root@example.com" })).toThrow(
      "ADMIN_EMAIL and ADMIN_PASSWORD must be set together"
    );
  });
});
