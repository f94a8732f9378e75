import { z } from "zod";
import { ConfigError } from "./errors.js";
import { SecretString, type Credentials } from "./registry/auth.js";
import { parsePlatform } from "./registry/platform.js";
import type { Platform } from "./registry/types.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  REGISTRY_URL: z
    .string({ required_error: "REGISTRY_URL is required" })
    .url("REGISTRY_URL must be an absolute URL"),
  REGISTRY_USERNAME: optionalString,
  REGISTRY_PASSWORD: optionalString,
  REGSCOPE_PREFERRED_PLATFORM: optionalString.refine(
    (value) => value === undefined || parsePlatform(value) !== null,
    "expected os/architecture[/variant]",
  ),
  REGSCOPE_PAGE_SIZE: z.coerce.number().int().positive().max(10_000).default(1000),
  REGSCOPE_LOG_FILE: optionalString,
  REGSCOPE_LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export type BrowserConfig = Readonly<{
  registryUrl: string;
  credentials: Credentials | undefined;
  preferredPlatform: Platform | undefined;
  pageSize: number;
  logFile: string | undefined;
  logLevel: (typeof LOG_LEVELS)[number];
}>;

/**
 * Reads the browser configuration from environment variables.
 *
 * Credentials are only used when both the username and the password are set.
 * Throws {@link ConfigError} listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrowserConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fieldErrors: Record<string, string[]> = {};
    for (const [field, problems] of Object.entries(parsed.error.flatten().fieldErrors)) {
      if (problems && problems.length > 0) fieldErrors[field] = problems;
    }
    throw new ConfigError(fieldErrors);
  }

  const vars = parsed.data;
  const credentials =
    vars.REGISTRY_USERNAME && vars.REGISTRY_PASSWORD
      ? { username: vars.REGISTRY_USERNAME, password: new SecretString(vars.REGISTRY_PASSWORD) }
      : undefined;

  return {
    registryUrl: vars.REGISTRY_URL,
    credentials,
    preferredPlatform: vars.REGSCOPE_PREFERRED_PLATFORM
      ? (parsePlatform(vars.REGSCOPE_PREFERRED_PLATFORM) ?? undefined)
      : undefined,
    pageSize: vars.REGSCOPE_PAGE_SIZE,
    logFile: vars.REGSCOPE_LOG_FILE,
    logLevel: vars.REGSCOPE_LOG_LEVEL,
  };
}
