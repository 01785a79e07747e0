import path from 'node:path';
import type { Entry } from '../src/types';
import { detectCategory, extensionOf } from '../src/walker/utils';

/**
 * Builds a frozen file entry under `/root` for matcher and collector tests.
 */
export function fileEntry(relativePath: string, overrides: Partial<Entry> = {}): Entry {
  const name = path.posix.basename(relativePath);
  const extension = extensionOf(name);
  return Object.freeze({
    path: path.posix.join('/root', relativePath),
    relativePath,
    name,
    kind: 'file' as const,
    size: 10,
    extension,
    category: detectCategory(name, extension),
    depth: relativePath.split('/').length,
    ...overrides,
  });
}
