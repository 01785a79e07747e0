import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import {
  ConfigError,
  formatValidationResult,
  presetSearch,
  resolvePresets,
  validateSessionConfig,
  type ConfigValidationIssue,
  type PresetSearch,
  type SearchPreset,
  type SessionConfig,
  type SessionConfigInput,
} from '@treescout/shared';

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: SessionConfigInput; // CLI flags
  cwd?: string; // Search root (for the per-tree config)
  preset?: string; // Named preset to apply
}

export interface LoadedConfig {
  config: SessionConfig;
  /** Unknown keys found in config files */
  warnings: ConfigValidationIssue[];
  /** Config files that existed and were read, lowest precedence first */
  sources: string[];
  /** Built-in presets plus those defined under `presets` in config files */
  presets: Record<string, SearchPreset>;
  /** The query of the applied preset, when one was named */
  query?: PresetSearch['query'];
}

type ConfigRecord = Record<string, unknown>;

export const USER_CONFIG_DIR = '.treescout';
export const TREE_CONFIG_FILE = '.treescout.yaml';

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `max_results` → `maxResults`; camelCase keys pass through. */
export function toCamelCase(key: string): string {
  return key.replace(/_([a-z0-9])/g, (_, char: string) => char.toUpperCase());
}

export class ConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    let parsed: unknown;
    try {
      if (!fs.existsSync(filePath)) {
        return {};
      }
      const content = fs.readFileSync(filePath, 'utf8');
      parsed = yaml.load(content);
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, { cause: error });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping of options: ${filePath}`);
    }
    return this.normalizeKeys(parsed);
  }

  /** Top-level keys only; nested values such as `theme` are kept as written. */
  static normalizeKeys(raw: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = {};
    for (const [key, value] of Object.entries(raw)) {
      output[toCamelCase(key)] = value;
    }
    return output;
  }

  /** Preset bodies may use snake_case keys too (`content_patterns`). */
  static normalizePresets(raw: unknown): unknown {
    if (!isRecord(raw)) {
      return raw;
    }
    const output: ConfigRecord = {};
    for (const [name, body] of Object.entries(raw)) {
      output[name] = isRecord(body) ? this.normalizeKeys(body) : body;
    }
    return output;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static load(options: ConfigOptions = {}): LoadedConfig {
    const cwd = options.cwd || process.cwd();
    const sources: string[] = [];
    const read = (filePath: string): ConfigRecord => {
      const loaded = this.loadYaml(filePath);
      if (Object.keys(loaded).length > 0) sources.push(filePath);
      return loaded;
    };

    // 1. User config: ~/.treescout/config.yaml
    const userConfig = read(path.join(os.homedir(), USER_CONFIG_DIR, 'config.yaml'));

    // 2. Tree config: <root>/.treescout.yaml
    const treeConfig = read(path.join(cwd, TREE_CONFIG_FILE));

    // 3. Explicit --config file (if provided)
    let explicitConfig: ConfigRecord = {};
    if (options.configPath) {
      if (!fs.existsSync(options.configPath)) {
        throw new ConfigError(`Config file not found: ${options.configPath}`);
      }
      explicitConfig = read(options.configPath);
    }

    let fileConfig = this.mergeConfigs({}, userConfig);
    fileConfig = this.mergeConfigs(fileConfig, treeConfig);
    fileConfig = this.mergeConfigs(fileConfig, explicitConfig);
    const { presets: customPresets, ...fileOptions } = fileConfig;
    const presets = resolvePresets(this.normalizePresets(customPresets));

    // 4. Named preset: overrides config files, not flags
    let presetOptions: ConfigRecord = {};
    let query: PresetSearch['query'] | undefined;
    if (options.preset !== undefined) {
      if (!Object.hasOwn(presets, options.preset)) {
        throw new ConfigError(
          `Unknown preset '${options.preset}'. Available presets: ${Object.keys(presets).join(', ')}`,
        );
      }
      const search = presetSearch(presets[options.preset]);
      presetOptions = { ...search.config };
      query = search.query;
    }

    // 5. CLI flags; schema defaults fill whatever is still missing
    let merged = this.mergeConfigs(fileOptions, presetOptions);
    merged = this.mergeConfigs(merged, { ...options.flags });

    const result = validateSessionConfig(merged);
    if (!result.valid || !result.config) {
      throw new ConfigError(`Configuration validation failed:\n${formatValidationResult(result)}`, {
        details: { fields: result.errors.map((e) => e.field), sources },
      });
    }

    return { config: result.config, warnings: result.warnings, sources, presets, query };
  }
}
