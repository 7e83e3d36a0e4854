import { describe, expect, test } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  test("uses development defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.env).toBe("development");
    expect(config.isDev).toBe(true);
    expect(config.logLevel).toBe("debug");
    expect(config.responsesFile).toBe("responses.txt");
  });

  test("defaults to info level in production", () => {
    const config = loadConfig({ NODE_ENV: "production" });

    expect(config.isDev).toBe(false);
    expect(config.logLevel).toBe("info");
  });

  test("honours LOG_LEVEL and HTTP_RESPONSES_FILE", () => {
    const config = loadConfig({ LOG_LEVEL: "warn", HTTP_RESPONSES_FILE: "/tmp/canned.txt" });

    expect(config.logLevel).toBe("warn");
    expect(config.responsesFile).toBe("/tmp/canned.txt");
  });

  test("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ZodError);
  });
});
