import { z } from "zod";

const logLevels = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.enum(logLevels).optional(),
  HTTP_RESPONSES_FILE: z.string().min(1).default("responses.txt"),
});

export type LogLevel = (typeof logLevels)[number];

export interface Config {
  env: string;
  isDev: boolean;
  logLevel: LogLevel;
  responsesFile: string;
}

/**
 * Build the fixture configuration from an environment map.
 *
 * Throws a ZodError when a variable is set to something unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  const isDev = parsed.NODE_ENV !== "production";

  return {
    env: parsed.NODE_ENV,
    isDev,
    // Logging
    logLevel: parsed.LOG_LEVEL ?? (isDev ? "debug" : "info"),
    // Canned responses
    responsesFile: parsed.HTTP_RESPONSES_FILE,
  };
}

export const config = loadConfig();

export default config;
