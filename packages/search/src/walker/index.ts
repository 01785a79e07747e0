import nodeFs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';
import { InvalidRootError, errnoCode } from '@treescout/shared';
import type { Entry, EntryKind } from '../types';
import type { Diagnostics } from '../diagnostics';
import type { ExclusionPolicy } from '../exclusion';
import { detectCategory, extensionOf } from './utils';
import type { WalkerOptions, WalkerStats } from './types';

export * from './types';
export { detectCategory, extensionOf, isBinaryFile, isFileCategory, FILE_CATEGORIES } from './utils';

type Fs = typeof nodeFs;

interface PendingDir {
  absPath: string;
  relativePath: string;
  depth: number;
}

interface Child extends PendingDir {
  name: string;
  kind: EntryKind;
  size?: number;
  modifiedMs?: number;
}

/**
 * Resolves and validates the search root.
 * @throws InvalidRootError when the root is missing or not a directory
 */
export async function resolveRoot(root: string, fs: Fs = nodeFs): Promise<string> {
  const absRoot = path.resolve(root);
  let stats: Stats;
  try {
    stats = await fs.stat(absRoot);
  } catch (error) {
    const reason = errnoCode(error) === 'ENOENT' ? 'does not exist' : 'cannot be read';
    throw new InvalidRootError(absRoot, `Search root ${reason}: ${absRoot}`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new InvalidRootError(absRoot, `Search root is not a directory: ${absRoot}`);
  }
  return absRoot;
}

/**
 * Depth-first directory walker. Uses an explicit stack, so tree depth does not
 * grow the call stack, and visits children in name order.
 */
export class Walker {
  readonly stats: WalkerStats = { directoriesRead: 0, entriesEmitted: 0 };
  private readonly policy: ExclusionPolicy;
  private readonly diagnostics: Diagnostics;
  private readonly followSymlinks: boolean;
  private readonly includeDirectories: boolean;
  private readonly maxDepth?: number;
  private readonly fs: Fs;

  constructor(options: WalkerOptions, fs: Fs = nodeFs) {
    this.policy = options.policy;
    this.diagnostics = options.diagnostics;
    this.followSymlinks = options.followSymlinks ?? false;
    this.includeDirectories = options.includeDirectories ?? false;
    this.maxDepth = options.maxDepth;
    this.fs = fs;
  }

  /**
   * Lazily yields entries below `root`. Not resumable: a new call starts a new
   * walk with its own visited set.
   */
  async *walk(root: string, signal?: AbortSignal): AsyncGenerator<Entry> {
    const absRoot = await resolveRoot(root, this.fs);
    // Real paths of directories already taken in this walk; breaks symlink cycles.
    const visited = new Set<string>();
    visited.add(await this.fs.realpath(absRoot));

    const stack: PendingDir[] = [{ absPath: absRoot, relativePath: '', depth: 0 }];

    while (stack.length > 0) {
      if (signal?.aborted) return;
      const dir = stack.pop();
      if (!dir) break;

      let dirents: Dirent[];
      try {
        dirents = await this.fs.readdir(dir.absPath, { withFileTypes: true });
      } catch (error) {
        this.diagnostics.recordFsError(dir.absPath, error);
        continue;
      }
      this.stats.directoriesRead++;
      if (signal?.aborted) return;

      dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

      const children = await Promise.all(dirents.map((dirent) => this.classify(dirent, dir)));
      if (signal?.aborted) return;

      const subdirs: PendingDir[] = [];
      for (const child of children) {
        if (!child) continue;
        const { absPath, relativePath, name, depth } = child;

        if (child.kind === 'directory') {
          if (this.followSymlinks) {
            const real = await this.realpathOf(absPath);
            if (!real || visited.has(real)) continue;
            visited.add(real);
          }
          if (this.includeDirectories) {
            yield this.emit(absPath, relativePath, name, 'directory', depth);
          }
          if (this.maxDepth === undefined || depth < this.maxDepth) {
            subdirs.push({ absPath, relativePath, depth });
          }
        } else {
          yield this.emit(absPath, relativePath, name, 'file', depth, child);
        }
        if (signal?.aborted) return;
      }

      // Reverse so the alphabetically first subdirectory is expanded next.
      for (let i = subdirs.length - 1; i >= 0; i--) {
        stack.push(subdirs[i]);
      }
    }
  }

  /**
   * Works out whether a dirent is a file or a directory and applies the
   * exclusion policy. Symlinks are followed only when enabled; other kinds
   * (sockets, FIFOs, devices) are skipped. Regular files are pruned before
   * their stat call.
   */
  private async classify(dirent: Dirent, parent: PendingDir): Promise<Child | undefined> {
    const absPath = path.join(parent.absPath, dirent.name);
    const relativePath = parent.relativePath ? `${parent.relativePath}/${dirent.name}` : dirent.name;
    const base = { absPath, relativePath, name: dirent.name, depth: parent.depth + 1 };
    const pruned = (kind: EntryKind) => this.policy.shouldPrune({ name: dirent.name, relativePath, kind });

    if (dirent.isDirectory()) {
      return pruned('directory') ? undefined : { ...base, kind: 'directory' };
    }
    if (dirent.isFile()) {
      if (pruned('file')) return undefined;
      const stats = await this.statOf(absPath);
      return stats ? { ...base, kind: 'file', size: stats.size, modifiedMs: stats.mtimeMs } : undefined;
    }
    if (dirent.isSymbolicLink() && this.followSymlinks) {
      const stats = await this.statOf(absPath);
      if (!stats) return undefined;
      if (stats.isDirectory() && !pruned('directory')) {
        return { ...base, kind: 'directory' };
      }
      if (stats.isFile() && !pruned('file')) {
        return { ...base, kind: 'file', size: stats.size, modifiedMs: stats.mtimeMs };
      }
    }
    return undefined;
  }

  private async statOf(absPath: string): Promise<Stats | undefined> {
    try {
      return await this.fs.stat(absPath);
    } catch (error) {
      // Dangling symlinks and files removed mid-walk land here too.
      this.diagnostics.recordFsError(absPath, error);
      return undefined;
    }
  }

  private async realpathOf(absPath: string): Promise<string | undefined> {
    try {
      return await this.fs.realpath(absPath);
    } catch (error) {
      this.diagnostics.recordFsError(absPath, error);
      return undefined;
    }
  }

  private emit(
    absPath: string,
    relativePath: string,
    name: string,
    kind: EntryKind,
    depth: number,
    file?: Pick<Child, 'size' | 'modifiedMs'>,
  ): Entry {
    this.stats.entriesEmitted++;
    const extension = kind === 'file' ? extensionOf(name) : '';
    return Object.freeze({
      path: absPath,
      relativePath,
      name,
      kind,
      size: file?.size,
      modifiedMs: file?.modifiedMs,
      extension,
      category: kind === 'file' ? detectCategory(name, extension) : undefined,
      depth,
    });
  }
}
