import { ConfigError } from './errors';

const UNITS: Record<string, number> = {
  K: 1024,
  M: 1024 ** 2,
  G: 1024 ** 3,
};

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*([KMG])?B?$/i;

/**
 * Converts a human-readable size (`"512"`, `"10K"`, `"1.5M"`, `"2GB"`) into bytes.
 * Units are binary (1K = 1024 bytes).
 */
export function parseSize(value: string): number {
  const match = SIZE_PATTERN.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid size "${value}". Expected a number with an optional K, M or G suffix.`);
  }
  const amount = Number.parseFloat(match[1]);
  const unit = match[2] ? UNITS[match[2].toUpperCase()] : 1;
  return Math.floor(amount * unit);
}

/**
 * Renders a byte count with one decimal and a single-letter unit, e.g. `1.5K`.
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of ['B', 'K', 'M', 'G']) {
    if (size < 1024) {
      return `${size.toFixed(1)}${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(1)}T`;
}
