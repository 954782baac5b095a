/**
 * Configuration management with validation
 */

import { config } from "dotenv";
import { z } from "zod";

// Load environment variables
config();

export const DEFAULT_USER_AGENT =
  "DeadLinkFinder/1.0 (Research project for identifying broken links)";

/** Numeric settings arrive as strings; non-numeric strings are left for zod to reject. */
const numeric = (schema: z.ZodNumber) =>
  z.preprocess((value) => {
    if (typeof value !== "string") return value;
    const parsed = Number(value.trim());
    return Number.isNaN(parsed) ? value : parsed;
  }, schema);

function blank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export const LogLevelSchema = z
  .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
  .default("info");

export const NodeEnvSchema = z.enum(["development", "production", "test"]).default("development");

/**
 * Configuration schema with validation
 */
const ConfigSchema = z.object({
  // Persistence
  logFile: z.string().min(1).default("wikipedia_dead_links.json"),
  availableDomainsFile: z.string().min(1).default("available_domains.json"),
  outputDir: z.string().min(1).default("./output"),

  // Crawl settings
  maxWorkers: numeric(z.number().int().min(1).max(50)).default(10),
  maxPages: numeric(z.number().int().positive()).default(10),
  requestTimeout: numeric(z.number().int().positive()).default(10_000),
  articleDelayMs: numeric(z.number().int().nonnegative()).default(1_000),

  // Endpoints
  wikipediaBaseUrl: z
    .string()
    .url("WIKIPEDIA_BASE_URL must be a valid URL")
    .default("https://en.wikipedia.org"),
  rdapBaseUrl: z.string().url("RDAP_BASE_URL must be a valid URL").default("https://rdap.org"),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),

  // Environment
  nodeEnv: NodeEnvSchema,
  logLevel: LogLevelSchema,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/** Values supplied on the command line; they win over the environment. */
export type ConfigOverrides = Partial<Record<keyof AppConfig, string | number>>;

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

/**
 * Load and validate configuration from an environment map plus overrides.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const rawConfig: Record<string, unknown> = {
    logFile: blank(env.LOG_FILE),
    availableDomainsFile: blank(env.AVAILABLE_DOMAINS_FILE),
    outputDir: blank(env.OUTPUT_DIR),
    maxWorkers: blank(env.MAX_WORKERS),
    maxPages: blank(env.MAX_PAGES),
    requestTimeout: blank(env.REQUEST_TIMEOUT),
    articleDelayMs: blank(env.ARTICLE_DELAY_MS),
    wikipediaBaseUrl: blank(env.WIKIPEDIA_BASE_URL),
    rdapBaseUrl: blank(env.RDAP_BASE_URL),
    userAgent: blank(env.USER_AGENT),
    nodeEnv: blank(env.NODE_ENV),
    logLevel: blank(env.LOG_LEVEL),
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) rawConfig[key] = value;
  }

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigError(
      result.error.errors.map((err) => `${err.path.join(".")}: ${err.message}`)
    );
  }
  return result.data;
}
