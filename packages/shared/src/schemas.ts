// =============================================================================
// @weekly-digest/shared — Zod schemas for the YAML digest configuration
// =============================================================================
// Required keys fail validation; optional weights and lists fall back to the
// documented defaults so downstream code can trust the parsed object.
// =============================================================================

import { z } from "zod";

// ---------------------------------------------------------------------------
// Reusable field schemas
// ---------------------------------------------------------------------------

const termSchema = z.string().min(1);

const weightSchema = z.number().finite().default(1);

const weightedTermSchema = z.object({
  term: termSchema,
  weight: weightSchema,
});

const priorityAuthorSchema = z.object({
  name: termSchema,
  weight: weightSchema,
});

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const LimitsSchema = z.object({
  max_fetch: z.number().int().min(1).max(30000),
  lookback_days: z.number().int().min(0),
  max_details: z.number().int().min(1).optional(),
});
export type Limits = z.infer<typeof LimitsSchema>;

export const ScoringSchema = z.object({
  title_weight: z.number().finite().default(1.0),
  abstract_weight: z.number().finite().default(1.0),
  author_weight: z.number().finite().default(1.0),
  category_weight: z.number().finite().default(0.5),
  threshold: z.number().finite(),
});
export type Scoring = z.infer<typeof ScoringSchema>;

export const ProfileSchema = z.object({
  keywords: z.array(weightedTermSchema).default([]),
  authors_priority: z.array(priorityAuthorSchema).default([]),
  msc_terms: z.array(weightedTermSchema).default([]),
  exclude: z.array(termSchema).default([]),
});

export const OutputSchema = z.object({
  filename_prefix: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, "filename_prefix must not contain path separators"),
  include_others_titles: z.boolean().default(false),
});
export type Output = z.infer<typeof OutputSchema>;

// ---------------------------------------------------------------------------
// Digest configuration
// ---------------------------------------------------------------------------

export const DigestConfigSchema = z
  .object({
    mode: z.enum(["surnames", "theorems"]).default("surnames"),
    limits: LimitsSchema,
    scoring: ScoringSchema,
    profile: ProfileSchema,
    output: OutputSchema,
  })
  .superRefine((cfg, ctx) => {
    if (cfg.mode === "theorems" && cfg.limits.max_details === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["limits", "max_details"],
        message: "Required in theorems mode",
      });
    }
  });
export type DigestConfig = z.infer<typeof DigestConfigSchema>;
