import { z } from "zod";
import { ConfigError } from "../errors.js";
import { logger } from "../utils/logger.js";

const envSchema = z
  .object({
    VERCEL_GATEWAY_KEY: z.string().min(1, "VERCEL_GATEWAY_KEY is required"),
    MODEL: z.string().default("anthropic/claude-sonnet-4.5"),
    DB_PATH: z.string().default("./sqlthread.sqlite"),

    TARGET_DIALECT: z.enum(["mysql", "sqlite"]).default("mysql"),
    TARGET_HOST: z.string().default("localhost"),
    TARGET_PORT: z.coerce.number().int().positive().default(3306),
    TARGET_USER: z.string().default("root"),
    TARGET_PASSWORD: z.string().default(""),
    TARGET_DATABASE: z.string().optional(),
    TARGET_POOL_SIZE: z.coerce.number().int().positive().default(5),

    MAX_SQL_RETRIES: z.coerce.number().int().min(1).default(3),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
    EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    KEEP_RECENT_MESSAGES: z.coerce.number().int().min(1).default(40),
    SUMMARY_WINDOW_SIZE: z.coerce.number().int().min(1).default(60),
    MAX_SUMMARY_LENGTH: z.coerce.number().int().positive().default(8000),
    SCHEMA_MAX_AGE_MINUTES: z.coerce.number().min(0).default(30),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  })
  .refine((env) => env.SUMMARY_WINDOW_SIZE >= env.KEEP_RECENT_MESSAGES, {
    message: "SUMMARY_WINDOW_SIZE must be >= KEEP_RECENT_MESSAGES",
    path: ["SUMMARY_WINDOW_SIZE"],
  });

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    logLevel: env.LOG_LEVEL,
    apiKey: env.VERCEL_GATEWAY_KEY,
    model: env.MODEL,
    dbPath: env.DB_PATH,

    target: {
      dialect: env.TARGET_DIALECT,
      host: env.TARGET_HOST,
      port: env.TARGET_PORT,
      user: env.TARGET_USER,
      password: env.TARGET_PASSWORD,
      database: env.TARGET_DATABASE,
      poolSize: env.TARGET_POOL_SIZE,
    },

    executor: {
      maxRetries: env.MAX_SQL_RETRIES,
      generationTimeoutMs: env.GENERATION_TIMEOUT_MS,
      executionTimeoutMs: env.EXECUTION_TIMEOUT_MS,
    },

    memory: {
      keepTail: env.KEEP_RECENT_MESSAGES,
      windowSize: env.SUMMARY_WINDOW_SIZE,
      maxSummaryLength: env.MAX_SUMMARY_LENGTH,
    },

    schemaMaxAgeMs: Math.round(env.SCHEMA_MAX_AGE_MINUTES * 60_000),
  } as const;
}

export type Config = ReturnType<typeof toConfig>;

/**
 * Validate a raw environment. Throws ConfigError listing every failing key.
 */
export function parseConfig(rawEnv: NodeJS.ProcessEnv): Config {
  const result = envSchema.safeParse(rawEnv);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
    );
  }
  return toConfig(result.data);
}

/**
 * Load configuration for the CLI. Exits the process when validation fails.
 */
export function loadConfig(rawEnv: NodeJS.ProcessEnv = process.env): Config {
  try {
    const config = parseConfig(rawEnv);

    // Log configuration on load (without sensitive data)
    logger.info(
      {
        model: config.model,
        database: config.dbPath,
        target: `${config.target.dialect}://${config.target.user}@${config.target.host}:${config.target.port}`,
        maxRetries: config.executor.maxRetries,
        window: `${config.memory.windowSize} (keep ${config.memory.keepTail})`,
      },
      "Configuration loaded"
    );

    return config;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ issues: error.issues }, "Environment validation failed");
      process.exit(1);
    }
    throw error;
  }
}
