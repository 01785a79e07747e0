import type { ZodError } from 'zod';
import { ConfigError } from '../errors';
import {
  SESSION_CONFIG_KEYS,
  SessionConfigSchema,
  type SessionConfig,
  type SessionConfigInput,
} from './schema';

export interface ConfigValidationIssue {
  field: string;
  message: string;
  code: 'INVALID_VALUE' | 'UNKNOWN_FIELD';
}

export interface ConfigValidationResult {
  valid: boolean;
  config?: SessionConfig;
  errors: ConfigValidationIssue[];
  warnings: ConfigValidationIssue[];
}

/**
 * Validates raw session options against the schema.
 *
 * Unknown keys are not errors: they are reported as warnings so a typo in a
 * config file is visible without breaking the search.
 */
export function validateSessionConfig(input: Record<string, unknown>): ConfigValidationResult {
  const warnings: ConfigValidationIssue[] = [];
  for (const field of Object.keys(input)) {
    if (!SESSION_CONFIG_KEYS.has(field)) {
      warnings.push({
        field,
        message: `Unknown config field '${field}'; this may be a typo or unsupported option`,
        code: 'UNKNOWN_FIELD',
      });
    }
  }

  const parsed = SessionConfigSchema.safeParse(input);
  if (!parsed.success) {
    return {
      valid: false,
      errors: toIssues(parsed.error),
      warnings,
    };
  }

  return { valid: true, config: parsed.data, errors: [], warnings };
}

/**
 * Parses session options, filling defaults.
 * @throws ConfigError listing every invalid field
 */
export function resolveSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  const parsed = SessionConfigSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }
  const result: ConfigValidationResult = {
    valid: false,
    errors: toIssues(parsed.error),
    warnings: [],
  };
  throw new ConfigError(formatValidationResult(result), {
    details: { fields: result.errors.map((e) => e.field) },
  });
}

function toIssues(error: ZodError): ConfigValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
    code: 'INVALID_VALUE',
  }));
}

/**
 * Formats validation errors and warnings into a human-readable string.
 */
export function formatValidationResult(result: ConfigValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Configuration errors:');
    for (const error of result.errors) {
      lines.push(`  - [${error.field}] ${error.message}`);
    }
  }

  if (result.warnings.length > 0) {
    lines.push('Configuration warnings:');
    for (const warning of result.warnings) {
      lines.push(`  - [${warning.field}] ${warning.message}`);
    }
  }

  return lines.join('\n');
}
