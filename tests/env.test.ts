import { describe, it, expect } from "vitest";
import { parseConfig } from "../src/config/env.js";
import { ConfigError } from "../src/errors.js";

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    parseConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.issues;
    throw error;
  }
  return [];
}

describe("parseConfig", () => {
  it("fills in defaults", () => {
    const config = parseConfig({ VERCEL_GATEWAY_KEY: "test-secret" });

    expect(config.apiKey).toBe("test-secret");
    expect(config.target).toEqual({
      dialect: "mysql",
      host: "localhost",
      port: 3306,
      user: "root",
      password: "",
      database: undefined,
      poolSize: 5,
    });
    expect(config.executor).toEqual({ maxRetries: 3, generationTimeoutMs: 120_000, executionTimeoutMs: 30_000 });
    expect(config.memory).toEqual({ keepTail: 40, windowSize: 60, maxSummaryLength: 8000 });
    expect(config.schemaMaxAgeMs).toBe(1_800_000);
  });

  it("coerces numeric settings", () => {
    const config = parseConfig({
      VERCEL_GATEWAY_KEY: "test-secret",
      MAX_SQL_RETRIES: "5",
      TARGET_PORT: "3307",
      SCHEMA_MAX_AGE_MINUTES: "0.5",
    });

    expect(config.executor.maxRetries).toBe(5);
    expect(config.target.port).toBe(3307);
    expect(config.schemaMaxAgeMs).toBe(30_000);
  });

  it("requires the gateway key", () => {
    expect(issuesOf({ VERCEL_GATEWAY_KEY: "" })).toEqual(["VERCEL_GATEWAY_KEY: VERCEL_GATEWAY_KEY is required"]);
  });

  it("rejects a window smaller than the kept tail", () => {
    expect(
      issuesOf({ VERCEL_GATEWAY_KEY: "test-secret", KEEP_RECENT_MESSAGES: "50", SUMMARY_WINDOW_SIZE: "40" })
    ).toEqual(["SUMMARY_WINDOW_SIZE: SUMMARY_WINDOW_SIZE must be >= KEEP_RECENT_MESSAGES"]);
  });

  it("rejects a retry budget of zero", () => {
    const issues = issuesOf({ VERCEL_GATEWAY_KEY: "test-secret", MAX_SQL_RETRIES: "0" });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith("MAX_SQL_RETRIES: ")).toBe(true);
  });

  it("rejects an unknown dialect", () => {
    expect(() => parseConfig({ VERCEL_GATEWAY_KEY: "test-secret", TARGET_DIALECT: "postgres" })).toThrow(ConfigError);
  });
});
