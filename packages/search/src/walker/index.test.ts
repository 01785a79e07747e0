import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { InvalidRootError } from '@treescout/shared';
import { Walker, resolveRoot } from './index';
import { ExclusionPolicy } from '../exclusion';
import { Diagnostics } from '../diagnostics';
import type { Entry } from '../types';

describe('Walker', () => {
  let tmpDir: string;
  let diagnostics: Diagnostics;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treescout-walker-test-'));
    diagnostics = new Diagnostics();
  });

  afterEach(async () => {
    await fs.chmod(path.join(tmpDir, 'locked'), 0o755).catch(() => undefined);
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string | Buffer>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  function walker(options: Partial<ConstructorParameters<typeof Walker>[0]> = {}) {
    return new Walker({
      policy: new ExclusionPolicy({ excludes: ['node_modules', '.git'] }),
      diagnostics,
      ...options,
    });
  }

  async function collect(w: Walker, signal?: AbortSignal): Promise<Entry[]> {
    const entries: Entry[] = [];
    for await (const entry of w.walk(tmpDir, signal)) {
      entries.push(entry);
    }
    return entries;
  }

  it('walks depth-first in name order', async () => {
    await createFiles({
      'b.txt': 'b',
      'a.txt': 'a',
      'c/d.txt': 'd',
      'c/e/f.txt': 'f',
      'd/g.txt': 'g',
    });

    const entries = await collect(walker());
    expect(entries.map((e) => e.relativePath)).toEqual([
      'a.txt',
      'b.txt',
      'c/d.txt',
      'c/e/f.txt',
      'd/g.txt',
    ]);
  });

  it('fills entry metadata', async () => {
    await createFiles({ 'src/App.TSX': 'export {};' });

    const [entry] = await collect(walker());
    expect(entry).toEqual({
      path: path.join(tmpDir, 'src', 'App.TSX'),
      relativePath: 'src/App.TSX',
      name: 'App.TSX',
      kind: 'file',
      size: 10,
      modifiedMs: expect.any(Number),
      extension: '.tsx',
      category: 'source',
      depth: 2,
    });
    expect(Object.isFrozen(entry)).toBe(true);
  });

  it('records when each file was last modified', async () => {
    await createFiles({ 'old.txt': 'o' });
    const modified = new Date('2024-03-01T12:00:00Z');
    await fs.utimes(path.join(tmpDir, 'old.txt'), modified, modified);

    const [entry] = await collect(walker());
    expect(entry.modifiedMs).toBe(modified.getTime());
  });

  it('never yields entries below an excluded directory', async () => {
    await createFiles({
      'src/index.ts': 'kept',
      'node_modules/x/index.ts': 'pruned',
      'packages/a/node_modules/y/index.ts': 'pruned',
      '.git/config': 'pruned',
    });

    const entries = await collect(walker());
    expect(entries.map((e) => e.relativePath)).toEqual(['src/index.ts']);
    expect(entries.some((e) => e.relativePath.includes('node_modules'))).toBe(false);
  });

  it('yields files named only with dots when hidden entries are searched', async () => {
    await createFiles({ '...': 'dots', 'a.txt': 'a' });

    const policy = new ExclusionPolicy({ excludes: ['node_modules'], searchHidden: true });
    const entries = await collect(walker({ policy }));
    expect(entries.map((e) => e.relativePath)).toEqual(['...', 'a.txt']);
    expect(diagnostics.size).toBe(0);
  });

  it('yields directories when asked to', async () => {
    await createFiles({ 'docs/guide.md': '# guide' });

    const entries = await collect(walker({ includeDirectories: true }));
    expect(entries.map((e) => [e.relativePath, e.kind])).toEqual([
      ['docs', 'directory'],
      ['docs/guide.md', 'file'],
    ]);
    expect(entries[0].size).toBeUndefined();
  });

  it('stops descending at maxDepth', async () => {
    await createFiles({
      'top.txt': 't',
      'a/mid.txt': 'm',
      'a/b/deep.txt': 'd',
    });

    const entries = await collect(walker({ maxDepth: 2 }));
    expect(entries.map((e) => e.relativePath)).toEqual(['top.txt', 'a/mid.txt']);
  });

  it('skips symlinks unless following is enabled', async () => {
    await createFiles({ 'real/file.txt': 'x' });
    await fs.symlink(path.join(tmpDir, 'real'), path.join(tmpDir, 'link'));
    await fs.symlink(path.join(tmpDir, 'real', 'file.txt'), path.join(tmpDir, 'alias.txt'));

    const plain = await collect(walker());
    expect(plain.map((e) => e.relativePath)).toEqual(['real/file.txt']);
  });

  it('does not loop on symlink cycles when following', async () => {
    await createFiles({ 'a/file.txt': 'x' });
    await fs.symlink(tmpDir, path.join(tmpDir, 'a', 'loop'));
    await fs.symlink(path.join(tmpDir, 'a'), path.join(tmpDir, 'z-link'));

    const entries = await collect(walker({ followSymlinks: true }));
    expect(entries.map((e) => e.relativePath)).toEqual(['a/file.txt']);
  });

  it('follows symlinked files when enabled', async () => {
    await createFiles({ 'real/file.txt': 'x' });
    await fs.symlink(path.join(tmpDir, 'real', 'file.txt'), path.join(tmpDir, 'alias.txt'));

    const entries = await collect(walker({ followSymlinks: true }));
    expect(entries.map((e) => e.relativePath)).toEqual(['alias.txt', 'real/file.txt']);
  });

  it.skipIf(process.getuid?.() === 0)('records unreadable directories and keeps going', async () => {
    await createFiles({ 'locked/secret.txt': 's', 'open/ok.txt': 'o' });
    await fs.chmod(path.join(tmpDir, 'locked'), 0o000);

    const entries = await collect(walker());
    expect(entries.map((e) => e.relativePath)).toEqual(['open/ok.txt']);
    expect(diagnostics.summary().notes).toEqual([
      {
        kind: 'AccessDenied',
        path: path.join(tmpDir, 'locked'),
        message: `Access denied: ${path.join(tmpDir, 'locked')}`,
      },
    ]);
  });

  it('stops promptly once the signal is aborted', async () => {
    await createFiles({ 'a/1.txt': '1', 'b/2.txt': '2', 'c/3.txt': '3' });
    const controller = new AbortController();
    const w = walker();

    const seen: string[] = [];
    for await (const entry of w.walk(tmpDir, controller.signal)) {
      seen.push(entry.relativePath);
      controller.abort();
    }

    expect(seen).toEqual(['a/1.txt']);
    expect(w.stats.directoriesRead).toBe(2);
  });

  it('counts directories read and entries emitted', async () => {
    await createFiles({ 'a.txt': 'a', 'sub/b.txt': 'b' });
    const w = walker();
    await collect(w);
    expect(w.stats).toEqual({ directoriesRead: 2, entriesEmitted: 2 });
  });

  it('rejects a missing root', async () => {
    const w = new Walker({ policy: new ExclusionPolicy(), diagnostics });
    const missing = path.join(tmpDir, 'nope');
    await expect(w.walk(missing).next()).rejects.toThrow(InvalidRootError);
  });
});

describe('resolveRoot', () => {
  it('rejects a file root', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'treescout-root-test-'));
    const file = path.join(dir, 'plain.txt');
    await fs.writeFile(file, 'x');
    try {
      await expect(resolveRoot(file)).rejects.toThrow(`Search root is not a directory: ${file}`);
      await expect(resolveRoot(dir)).resolves.toBe(dir);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
