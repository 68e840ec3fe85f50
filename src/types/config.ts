/**
 * Scanline — Pipeline Configuration Schema
 *
 * The configuration is validated once at startup, frozen, and passed
 * into every component constructor.
 */

import { z } from 'zod';

// ============================================================
// HELPERS
// ============================================================

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern, 'i');
    return true;
  } catch {
    return false;
  }
}

const RegexSchema = z.string().min(1).refine(isValidRegex, {
  message: 'Invalid regular expression',
});

const HandleSchema = z
  .string()
  .min(1)
  .transform(handle => handle.replace(/^@/, ''));

const TagSchema = z.string().regex(/^#[\w-]+$/, 'Tags look like #word');

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

// ============================================================
// TOPICS & ACCOUNTS
// ============================================================

export const TopicConfigSchema = z.object({
  slug: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'Slugs are lower-case kebab-case'),
  displayName: z.string().min(1),
  weight: z.number().positive(),
  searchQueries: z.array(z.string().min(1)).min(1),
});
export type TopicConfig = DeepReadonly<z.infer<typeof TopicConfigSchema>>;

export const AccountConfigSchema = z.object({
  handle: HandleSchema,
  label: z.string().optional(),
  group: z.string().min(1).default('Other'),
  /** Dedicated fetch call instead of batching with the rest of the group */
  solo: z.boolean().default(false),
});
export type AccountConfig = DeepReadonly<z.infer<typeof AccountConfigSchema>>;

// ============================================================
// QUALITY FILTERS
// ============================================================

export const ClaimRuleSchema = z.object({
  name: z.string().min(1),
  claimPattern: RegexSchema,
  trustedDomains: z.array(z.string().min(1)).min(1),
});
export type ClaimRule = DeepReadonly<z.infer<typeof ClaimRuleSchema>>;

export const SpamDetectionSchema = z.object({
  enabled: z.boolean().default(true),
  claimLinkMismatch: z
    .object({
      enabled: z.boolean().default(true),
      rules: z.array(ClaimRuleSchema).default([]),
    })
    .default({}),
  lowEffort: z
    .object({
      enabled: z.boolean().default(true),
      bodyLengthFloor: z.number().int().nonnegative().default(80),
      patterns: z.array(RegexSchema).default([]),
    })
    .default({}),
});
export type SpamDetectionConfig = DeepReadonly<z.infer<typeof SpamDetectionSchema>>;

export const QualityFiltersSchema = z.object({
  minEngagement: z
    .object({
      redditScore: z.number().int().nonnegative().default(0),
      xLikes: z.number().int().nonnegative().default(0),
    })
    .default({}),
  longFormMinChars: z.number().int().positive().default(400),
  longFormBonus: z.number().nonnegative().default(0),
  priorityAccountBonus: z.number().nonnegative().default(0),
  labAccountBonus: z.number().nonnegative().default(0),
  /** Hosts that count as long-form regardless of body length */
  articleDomains: z.array(z.string().min(1)).default([]),
  priorityAccounts: z
    .object({
      x: z.array(HandleSchema).default([]),
      redditSubreddits: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  /** Lab name → handles of the lab and its lead developers */
  labAccounts: z.record(z.string(), z.array(HandleSchema)).default({}),
  spamDetection: SpamDetectionSchema.default({}),
});
export type QualityFilters = DeepReadonly<z.infer<typeof QualityFiltersSchema>>;

// ============================================================
// RUN PARAMETERS
// ============================================================

export const ContentSourceSchema = z.enum(['reddit', 'x', 'web']);

export const RunParamsSchema = z.object({
  itemsPerTopic: z.number().int().positive().default(8),
  readingListMax: z.number().int().positive().default(15),
  /** Vault root directory */
  corpusPath: z.string().min(1),
  /** Folder inside the vault that receives daily notes */
  outputPath: z.string().min(1).default('Research/Dailies'),
  libraryPath: z.string().min(1).default('Research/Library'),
  /** Extra folders scanned for previously seen content */
  historyFolders: z.array(z.string().min(1)).default([]),
  sources: z.array(ContentSourceSchema).min(1).default(['reddit', 'x', 'web']),
  /** Defaults to one worker per topic plus one for must-follow */
  concurrency: z.number().int().positive().optional(),
  fetchTimeoutMs: z.number().int().positive().default(30000),
  /** Search window, in days, passed to sources that support one */
  lookbackDays: z.number().int().positive().max(30).default(1),
  /** Directory for the append-only promotion and feedback logs */
  stateDir: z.string().min(1).default('.scanline'),
});
export type RunParams = DeepReadonly<z.infer<typeof RunParamsSchema>>;

export const DedupSchema = z
  .object({
    /** Word-overlap ratio at which two titles are treated as the same item */
    titleSimilarity: z.number().min(0.5).max(1).default(0.8),
  })
  .default({});

export const TagsSchema = z
  .object({
    keep: TagSchema.default('#keep'),
    kept: TagSchema.default('#kept'),
    good: TagSchema.default('#good'),
    bad: TagSchema.default('#bad'),
    notedSuffix: z.string().regex(/^[\w-]+$/).default('-noted'),
  })
  .default({});
export type TagConfig = DeepReadonly<z.infer<typeof TagsSchema>>;

export const SynthesisSchema = z
  .object({
    model: z.string().min(1).default('claude-sonnet-4-5-20250929'),
    maxTokens: z.number().int().positive().default(2048),
  })
  .default({});

// ============================================================
// ROOT
// ============================================================

export const PipelineConfigSchema = z
  .object({
    topics: z.array(TopicConfigSchema).min(1),
    mustFollow: z.array(AccountConfigSchema).default([]),
    qualityFilters: QualityFiltersSchema.default({}),
    run: RunParamsSchema,
    dedup: DedupSchema,
    tags: TagsSchema,
    synthesis: SynthesisSchema,
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.topics.forEach((topic, index) => {
      if (seen.has(topic.slug)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['topics', index, 'slug'],
          message: `Duplicate topic slug "${topic.slug}"`,
        });
      }
      seen.add(topic.slug);
    });
  });

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
export type PipelineConfig = DeepReadonly<z.infer<typeof PipelineConfigSchema>>;
