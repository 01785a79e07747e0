import { z } from 'zod';
import { parseSize } from '../size';

/**
 * Directory and file names pruned by default, matched at any depth.
 */
export const DEFAULT_EXCLUDES = [
  'node_modules',
  '.git',
  '__pycache__',
  '.next',
  'dist',
  '.build',
  '.turbo',
  'venv',
  'env',
];

/** 1 MiB: files above this are not opened by content search. */
export const DEFAULT_MAX_CONTENT_SIZE = 1024 * 1024;

/**
 * Byte size given as a number or a human-readable string (`"512K"`, `"2M"`).
 */
export const SizeSchema = z.union([z.number().int().nonnegative(), z.string()]).transform((value, ctx) => {
  if (typeof value === 'number') {
    return value;
  }
  try {
    return parseSize(value);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: error instanceof Error ? error.message : String(error),
    });
    return z.NEVER;
  }
});

/** `ts` and `.TS` both become `.ts`; full names such as `.env.local` stay whole. */
export const ExtensionListSchema = z
  .array(z.string().min(1))
  .transform((list) => list.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase()));

export const SessionConfigSchema = z
  .object({
    maxResults: z.number().int().positive().default(1000).describe('Cap on held results'),
    fuzzyThreshold: z
      .number()
      .int()
      .min(0)
      .max(100)
      .default(65)
      .describe('Minimum fuzzy score to accept'),
    defaultExcludes: z.array(z.string()).default(DEFAULT_EXCLUDES),
    extraExcludes: z.array(z.string()).default([]),
    followSymlinks: z.boolean().default(false),
    searchHidden: z.boolean().default(false),
    respectGitignore: z.boolean().default(true),
    includeDirectories: z.boolean().default(false),
    maxDepth: z.number().int().positive().optional(),
    maxFileSizeForContentSearch: SizeSchema.default(DEFAULT_MAX_CONTENT_SIZE),
    minSize: SizeSchema.optional(),
    maxSize: SizeSchema.optional(),
    extensions: ExtensionListSchema.optional().describe('Only files with one of these extensions or names'),
    timeBudgetMs: z.number().int().positive().optional().describe('Self-cancel after this many ms'),
    ignoreCase: z.boolean().default(true),
    regex: z.boolean().default(true),
    wholeWord: z.boolean().default(false),
    excerptWidth: z.number().int().min(16).default(200),
    concurrency: z.number().int().positive().optional(),
    flushEvery: z.number().int().positive().default(50),
    flushIntervalMs: z.number().int().positive().default(100),
    stopOnCap: z.boolean().default(false),
    // Presentation-only keys, carried through untouched.
    showPreview: z.boolean().default(true),
    theme: z.record(z.string(), z.unknown()).optional(),
  })
  .refine((data) => data.minSize === undefined || data.maxSize === undefined || data.minSize <= data.maxSize, {
    message: 'minSize must not exceed maxSize',
    path: ['minSize'],
  });

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/** Keys the schema understands; anything else is reported as unknown. */
export const SESSION_CONFIG_KEYS: ReadonlySet<string> = new Set([
  'maxResults',
  'fuzzyThreshold',
  'defaultExcludes',
  'extraExcludes',
  'followSymlinks',
  'searchHidden',
  'respectGitignore',
  'includeDirectories',
  'maxDepth',
  'maxFileSizeForContentSearch',
  'minSize',
  'maxSize',
  'extensions',
  'timeBudgetMs',
  'ignoreCase',
  'regex',
  'wholeWord',
  'excerptWidth',
  'concurrency',
  'flushEvery',
  'flushIntervalMs',
  'stopOnCap',
  'showPreview',
  'theme',
]);
