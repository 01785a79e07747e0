import { describe, it, expect } from 'vitest';
import { BUILTIN_PRESETS, presetSearch, resolvePresets } from './presets';
import { ConfigError } from '../errors';

describe('BUILTIN_PRESETS', () => {
  it('ships the standard presets', () => {
    expect(Object.keys(BUILTIN_PRESETS)).toEqual(['google_keys', 'secrets', 'configs', 'media', 'code']);
    expect(BUILTIN_PRESETS.media.minSize).toBe(10240);
    expect(BUILTIN_PRESETS.media.maxSize).toBe(104857600);
  });
});

describe('presetSearch', () => {
  it('searches file contents for any of the patterns', () => {
    const { query, config } = presetSearch(BUILTIN_PRESETS.secrets);

    expect(query).toEqual({ mode: 'content', text: 'API_KEY|SECRET|PASSWORD|TOKEN|PRIVATE_KEY' });
    expect(config).toMatchObject({
      regex: true,
      ignoreCase: true,
      searchHidden: true,
      maxSize: 2097152,
      extraExcludes: ['.build', 'dist', 'node_modules'],
    });
    expect(config.extensions).toContain('.env.local');
  });

  it('lists every filtered file when there are no patterns', () => {
    const { query, config } = presetSearch(BUILTIN_PRESETS.code);

    expect(query).toEqual({ mode: 'glob', text: '*' });
    expect(config.regex).toBeUndefined();
    expect(config.extensions).toEqual(['.py', '.js', '.ts', '.jsx', '.tsx', '.cpp', '.java']);
  });

  it('matches patterns literally', () => {
    const { dotted } = resolvePresets({ dotted: { title: 'Dotted', contentPatterns: ['v1.2', 'a+b'] } });
    expect(presetSearch(dotted).query.text).toBe('v1\\.2|a\\+b');
  });
});

describe('resolvePresets', () => {
  it('adds custom presets and lets them replace built-in ones', () => {
    const presets = resolvePresets({
      logs: { title: 'Logs', extensions: ['LOG'] },
      code: { title: 'Only TypeScript', extensions: ['ts'] },
    });

    expect(presets.logs.extensions).toEqual(['.log']);
    expect(presets.logs.excludeDirs).toEqual([]);
    expect(presets.code.title).toBe('Only TypeScript');
    expect(presets.secrets).toBe(BUILTIN_PRESETS.secrets);
  });

  it('rejects malformed presets with a ConfigError', () => {
    expect(() => resolvePresets({ bad: { extensions: ['x'] } })).toThrow(ConfigError);
    expect(() => resolvePresets({ bad: { extensions: ['x'] } })).toThrow('[presets.bad.title] Required');
  });
});
