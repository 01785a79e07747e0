import { describe, it, expect } from 'vitest';
import { InvalidQueryError } from '@treescout/shared';
import { TypeFilterMatcher, parseCategories } from './type-filter';
import { fileEntry } from '../../test/helpers';

describe('parseCategories', () => {
  it('parses one or several categories', () => {
    expect([...parseCategories('source')]).toEqual(['source']);
    expect([...parseCategories(' Image, media ')]).toEqual(['image', 'media']);
  });

  it('rejects unknown categories', () => {
    expect(() => parseCategories('spreadsheets')).toThrow(InvalidQueryError);
    expect(() => parseCategories('spreadsheets')).toThrow(
      'Unknown type category "spreadsheets". Expected one of: source, config, image, media, document, archive',
    );
    expect(() => parseCategories(' , ')).toThrow('Type filter needs at least one category');
  });
});

describe('TypeFilterMatcher', () => {
  it('matches files by detected category', () => {
    const matcher = new TypeFilterMatcher('config');

    expect(matcher.match(fileEntry('package.json'))?.score).toBe(100);
    expect(matcher.match(fileEntry('deploy/values.YAML'))?.score).toBe(100);
    expect(matcher.match(fileEntry('.env.production'))?.score).toBe(100);
    expect(matcher.match(fileEntry('src/index.ts'))).toBeUndefined();
    expect(matcher.match(fileEntry('LICENSE'))).toBeUndefined();
  });

  it('matches any of several categories', () => {
    const matcher = new TypeFilterMatcher('image,media');

    expect(matcher.match(fileEntry('logo.png'))).toBeDefined();
    expect(matcher.match(fileEntry('intro.mp4'))).toBeDefined();
    expect(matcher.match(fileEntry('notes.md'))).toBeUndefined();
  });

  it('ignores directories', () => {
    const matcher = new TypeFilterMatcher('source');
    const dir = fileEntry('src.ts', { kind: 'directory', size: undefined });
    expect(matcher.match(dir)).toBeUndefined();
  });
});
