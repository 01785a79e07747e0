import fs from 'node:fs/promises';
import path from 'node:path';
import isBinaryPath from 'is-binary-path';
import categoryTable from './categories.json';
import type { FileCategory } from '../types';

export const FILE_CATEGORIES: readonly FileCategory[] = [
  'source',
  'config',
  'image',
  'media',
  'document',
  'archive',
];

const categoryByExtension = new Map<string, FileCategory>();
for (const category of FILE_CATEGORIES) {
  for (const ext of categoryTable[category]) {
    categoryByExtension.set(ext, category);
  }
}

export function isFileCategory(value: string): value is FileCategory {
  return (FILE_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Lower-case extension with its dot. Dot-files such as `.env` have none.
 */
export function extensionOf(name: string): string {
  return path.extname(name).toLowerCase();
}

export function detectCategory(name: string, extension: string): FileCategory | undefined {
  // `.env`, `.env.local`, `.env.production`
  if (/^\.env(\.|$)/i.test(name)) {
    return 'config';
  }
  return categoryByExtension.get(extension);
}

const SAMPLE_BYTES = 1024;

/**
 * Binary when the extension is a known binary one, or when a NUL byte
 * appears in the first kilobyte.
 */
export async function isBinaryFile(filePath: string): Promise<boolean> {
  // 1. Check extension
  if (isBinaryPath(filePath)) {
    return true;
  }

  // 2. Sample content for NUL bytes
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SAMPLE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SAMPLE_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}
