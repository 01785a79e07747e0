import { z } from 'zod';
import { ConfigError } from '../errors';
import { escapeRegExp } from '../string-utils';
import { ExtensionListSchema, SizeSchema, type SessionConfigInput } from './schema';
import builtinPresets from './presets.json';

/**
 * A named search: which files to look at and, optionally, which content
 * patterns to look for in them.
 */
export const SearchPresetSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  extensions: ExtensionListSchema.optional(),
  excludeDirs: z.array(z.string()).default([]),
  minSize: SizeSchema.optional(),
  maxSize: SizeSchema.optional(),
  /** Plain strings; a file matches when any one of them occurs */
  contentPatterns: z.array(z.string().min(1)).default([]),
  ignoreCase: z.boolean().optional(),
  searchHidden: z.boolean().optional(),
});

export type SearchPreset = z.infer<typeof SearchPresetSchema>;

export const PresetMapSchema = z.record(z.string(), SearchPresetSchema);

export interface PresetSearch {
  query: { mode: 'content' | 'glob'; text: string };
  config: SessionConfigInput;
}

export const BUILTIN_PRESETS: Readonly<Record<string, SearchPreset>> = PresetMapSchema.parse(builtinPresets);

/**
 * Built-in presets overlaid with the ones defined in config files.
 * @throws ConfigError when a custom preset is malformed
 */
export function resolvePresets(custom: unknown = {}): Record<string, SearchPreset> {
  const parsed = PresetMapSchema.safeParse(custom);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => ['presets', ...issue.path].join('.'));
    const lines = parsed.error.issues.map((issue, i) => `  - [${fields[i]}] ${issue.message}`);
    throw new ConfigError(`Invalid presets:\n${lines.join('\n')}`, { details: { fields } });
  }
  return { ...BUILTIN_PRESETS, ...parsed.data };
}

/**
 * Turns a preset into a query and the session options it implies. Without
 * content patterns every file that passes the filters is a result.
 */
export function presetSearch(preset: SearchPreset): PresetSearch {
  const config: SessionConfigInput = {
    extensions: preset.extensions,
    extraExcludes: preset.excludeDirs,
    minSize: preset.minSize,
    maxSize: preset.maxSize,
    ignoreCase: preset.ignoreCase,
    searchHidden: preset.searchHidden,
  };
  if (preset.contentPatterns.length === 0) {
    return { query: { mode: 'glob', text: '*' }, config };
  }
  return {
    query: { mode: 'content', text: preset.contentPatterns.map(escapeRegExp).join('|') },
    config: { ...config, regex: true },
  };
}
