import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'node:stream';
import { stripAnsi } from '@treescout/shared';
import { main, name } from './program';
import type { CommandIO } from './commands/search';

describe('treescout CLI', () => {
  let tmpDir: string;
  let home: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errSpy: ReturnType<typeof vi.spyOn>;
  let io: CommandIO;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'treescout-cli-test-'));
    home = await fs.mkdtemp(path.join(os.tmpdir(), 'treescout-home-'));
    vi.stubEnv('HOME', home);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    io = { stdin: new PassThrough(), stderr: { isTTY: false, write: () => true } };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(tmpDir, { recursive: true, force: true });
    await fs.rm(home, { recursive: true, force: true });
  });

  async function createFiles(files: Record<string, string>) {
    for (const [filePath, content] of Object.entries(files)) {
      const fullPath = path.join(tmpDir, filePath);
      await fs.mkdir(path.dirname(fullPath), { recursive: true });
      await fs.writeFile(fullPath, content);
    }
  }

  function cli(...args: string[]) {
    return main(['node', 'treescout', ...args], io);
  }

  function jsonOutput(): Record<string, unknown> {
    expect(logSpy).toHaveBeenCalledTimes(1);
    return JSON.parse(String(logSpy.mock.calls[0][0]));
  }

  function stdout(): string {
    return logSpy.mock.calls.map((c) => stripAnsi(String(c[0]))).join('\n');
  }

  it('exports its package name', () => {
    expect(name).toBe('@treescout/cli');
  });

  it('prints ranked results as JSON', async () => {
    await createFiles({ 'a.txt': 'a', 'ab.txt': 'ab', 'b/c.txt': 'c' });

    const code = await cli('--json', 'search', 'a', tmpDir, '--threshold', '50');

    expect(code).toBe(0);
    const output = jsonOutput();
    expect(output.state).toBe('completed');
    expect(output.reason).toBe('exhausted');
    expect(output.results).toEqual([
      { path: 'a.txt', absolutePath: path.join(tmpDir, 'a.txt'), kind: 'file', score: 100, size: 1, modified: expect.any(String) },
      { path: 'ab.txt', absolutePath: path.join(tmpDir, 'ab.txt'), kind: 'file', score: 79, size: 2, modified: expect.any(String) },
    ]);
  });

  it('prints a table and a summary for people', async () => {
    await createFiles({ 'notes.txt': 'first\nTODO: fix this\n' });

    const code = await cli('search', 'TODO', tmpDir, '--mode', 'content');

    expect(code).toBe(0);
    const output = stdout();
    expect(output).toContain('notes.txt');
    expect(output).toContain('2:1 TODO: fix this');
    expect(output).toMatch(/Done: 1 result · 1 entries scanned in \d+ ms/);
  });

  it('says so when nothing matches', async () => {
    await createFiles({ 'a.txt': 'a' });

    expect(await cli('search', 'zzz', tmpDir)).toBe(0);
    expect(stdout().split('\n')[0]).toBe('No results found.');
  });

  it('applies snake_case options from the tree config', async () => {
    await createFiles({
      '.treescout.yaml': 'max_results: 1\n',
      'one.md': '1',
      'two.md': '2',
    });

    await cli('--json', 'search', '*.md', tmpDir, '--mode', 'glob');

    expect(jsonOutput().results).toEqual([
      { path: 'one.md', absolutePath: path.join(tmpDir, 'one.md'), kind: 'file', score: 100, size: 1, modified: expect.any(String) },
    ]);
  });

  it('lets flags override config files', async () => {
    await createFiles({ '.treescout.yaml': 'max_results: 1\n', 'one.md': '1', 'two.md': '2' });

    await cli('--json', 'search', '*.md', tmpDir, '--mode', 'glob', '--max-results', '5');

    expect(jsonOutput().results).toHaveLength(2);
  });

  it('treats content patterns literally with --literal', async () => {
    await createFiles({ 'a.txt': 'cost a+b\n', 'b.txt': 'aab\n' });

    await cli('--json', 'search', 'a+b', tmpDir, '--mode', 'content', '--literal');

    const results = jsonOutput().results;
    expect(Array.isArray(results) && results.map((r: { path: string }) => r.path)).toEqual(['a.txt']);
  });

  it('exits 1 with a JSON error for a missing root', async () => {
    const missing = path.join(tmpDir, 'nope');

    const code = await cli('--json', 'search', 'a', missing);

    expect(code).toBe(1);
    expect(jsonOutput()).toEqual({
      error: {
        code: 'InvalidRoot',
        message: `Search root does not exist: ${missing}`,
        details: { root: missing },
      },
    });
  });

  it('exits 1 for a malformed regular expression', async () => {
    const code = await cli('--json', 'search', '(open', tmpDir, '--mode', 'content');

    expect(code).toBe(1);
    expect(jsonOutput()).toMatchObject({ error: { code: 'InvalidQuery' } });
  });

  it('exits 2 for invalid configuration', async () => {
    await createFiles({ '.treescout.yaml': 'max_results: -1\n' });

    const code = await cli('search', 'a', tmpDir);

    expect(code).toBe(2);
    const messages = errSpy.mock.calls.map((c) => String(c[0]));
    expect(messages[0]).toContain('Configuration validation failed');
    expect(messages[0]).toContain('[maxResults]');
  });

  it('exits 2 for a missing --config file', async () => {
    const code = await cli('--json', '--config', path.join(tmpDir, 'absent.yaml'), 'search', 'a', tmpDir);

    expect(code).toBe(2);
    expect(jsonOutput()).toMatchObject({ error: { code: 'ConfigError' } });
  });

  it('exits 2 for bad usage', async () => {
    expect(await cli('search', 'a', tmpDir, '--mode', 'semantic')).toBe(2);
    expect(await cli('search', 'a', tmpDir, '--threshold', '101')).toBe(2);
  });

  it('warns about unknown config keys', async () => {
    await createFiles({ '.treescout.yaml': 'colour: red\n', 'a.txt': 'a' });

    expect(await cli('--json', 'search', 'a', tmpDir)).toBe(0);
    expect(errSpy).toHaveBeenCalledWith(
      JSON.stringify({
        warning: "Config warning [colour]: Unknown config field 'colour'; this may be a typo or unsupported option",
      }),
    );
  });

  it('narrows a search to listed extensions with --ext', async () => {
    await createFiles({ 'a.md': 'a', 'a.txt': 'a', 'b/a.MD': 'a' });

    await cli('--json', 'search', 'a', tmpDir, '--ext', 'md');

    const results = jsonOutput().results;
    expect(Array.isArray(results) && results.map((r: { path: string }) => r.path)).toEqual(['a.md', 'b/a.MD']);
  });

  it('runs a preset search', async () => {
    await createFiles({
      '.env': 'API_KEY=test-secret\nDEBUG=1\n',
      'notes.txt': 'API_KEY=elsewhere\n',
      'node_modules/pkg/.env': 'TOKEN=test-token\n',
    });

    const code = await cli('--json', 'preset', 'secrets', tmpDir);

    expect(code).toBe(0);
    const results = jsonOutput().results;
    expect(results).toEqual([
      expect.objectContaining({ path: '.env', line: 1, column: 1, excerpt: 'API_KEY=test-secret', matchCount: 2 }),
    ]);
  });

  it('lists presets as JSON', async () => {
    expect(await cli('--json', 'presets')).toBe(0);

    const output = jsonOutput();
    expect(Object.keys(output)).toEqual(['google_keys', 'secrets', 'configs', 'media', 'code']);
    expect(output.configs).toMatchObject({ title: 'Configuration Files', maxSize: 1024 * 1024 });
  });

  it('exits 2 for an unknown preset', async () => {
    const code = await cli('--json', 'preset', 'nope', tmpDir);

    expect(code).toBe(2);
    expect(jsonOutput()).toMatchObject({
      error: {
        code: 'ConfigError',
        message: "Unknown preset 'nope'. Available presets: google_keys, secrets, configs, media, code",
      },
    });
  });

  it('writes session events to --log-file', async () => {
    await createFiles({ 'a.txt': 'a' });
    const logFile = path.join(home, 'events.jsonl');

    await cli('--log-file', logFile, '--json', 'search', 'a', tmpDir);

    const lines = (await fs.readFile(logFile, 'utf8')).trim().split('\n');
    const types = lines.map((line) => JSON.parse(line).type);
    expect(types[0]).toBe('SessionStarted');
    expect(types[types.length - 1]).toBe('SessionFinished');
  });
});
