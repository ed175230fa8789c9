// =============================================================================
// @weekly-digest/shared — Environment + YAML configuration with validation
// =============================================================================
// Environment variables carry deployment settings (paths, contact, logging,
// schedule). The YAML file carries the interest profile and run limits.
// Both are validated with Zod; any failure is fatal and happens before the
// pipeline touches the network.
// =============================================================================

import { readFile } from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { DigestConfigSchema, type DigestConfig } from "./schemas.js";

// ---------------------------------------------------------------------------
// Environment schema
// ---------------------------------------------------------------------------

/** "true"/"1"/"yes" → true, "false"/"0"/"no"/"" → false */
const booleanFlagSchema = z.string().transform((val, ctx) => {
  const normalized = val.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no", ""].includes(normalized)) return false;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `Expected a boolean flag, got "${val}"`,
  });
  return z.NEVER;
});

const envSchema = z.object({
  DIGEST_CONFIG: z.string().min(1).default("config.yaml"),
  ARXIV_CONTACT: z.string().min(1).default("contact@example.com"),
  OUTPUT_DIR: z.string().min(1).default("out"),
  FONT_PATH: z.string().min(1).optional(),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
  CRON_ENABLED: booleanFlagSchema.default("false"),
  CRON_SCHEDULE: z.string().min(1).default("0 9 * * 4"),
  CRON_TIMEZONE: z.string().min(1).default("Asia/Tokyo"),
});

export type EnvConfig = z.infer<typeof envSchema>;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Flattens Zod issues into "path: message" pairs for a single error line */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

// ---------------------------------------------------------------------------
// Loaders
// ---------------------------------------------------------------------------

/**
 * Load and validate deployment settings from environment variables.
 *
 * Throws if a value is present but malformed; every variable has a default.
 */
export function loadEnvConfig(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(`Invalid environment: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Validate an already-parsed YAML document. */
export function parseDigestConfig(raw: unknown): DigestConfig {
  const result = DigestConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid digest config: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Read the YAML profile at `path` and validate it.
 *
 * A missing file, malformed YAML or missing required key all throw.
 */
export async function loadDigestConfig(path: string): Promise<DigestConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new Error(
      `Cannot read digest config ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (err) {
    throw new Error(
      `Malformed YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseDigestConfig(raw);
}
