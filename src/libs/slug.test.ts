import { describe, it, expect } from 'vitest';
import { buildOutputKey, generateFilename, slugify } from './slug';

describe('slugify', () => {
  it('lowercases and joins words with single hyphens', () => {
    expect(slugify('Hello, World! 2024')).toBe('hello-world-2024');
  });

  it('returns an empty string for empty input', () => {
    expect(slugify('')).toBe('');
    expect(slugify('!!!')).toBe('');
  });

  it('strips leading and trailing separators', () => {
    expect(slugify('  --The  Roman__Empire--  ')).toBe('the-roman-empire');
  });

  it('keeps at most 100 characters', () => {
    expect(slugify('a'.repeat(150))).toBe('a'.repeat(100));
  });

  it('does not end in a hyphen when the cut lands on a separator', () => {
    const slug = slugify(`${'a'.repeat(99)} b`);

    expect(slug).toBe('a'.repeat(99));
  });

  it('only produces lowercase letters, digits and inner hyphens', () => {
    const inputs = ['C++ & Rust: A Comparison', 'What is 2+2?', '  Über-cool CAFÉ  ', 'x'.repeat(50) + ' / ' + 'y'.repeat(80)];

    for (const input of inputs) {
      const slug = slugify(input);
      expect(slug.length).toBeLessThanOrEqual(100);
      expect(slug).toMatch(/^[a-z0-9]+(-[a-z0-9]+)*$/);
    }
  });
});

describe('generateFilename', () => {
  it('appends the category and extension to the slug', () => {
    expect(generateFilename('Hello, World! 2024', 'facts')).toBe('hello-world-2024-facts.html');
  });
});

describe('buildOutputKey', () => {
  it('places pages under output/', () => {
    expect(buildOutputKey('The Moon', 'history')).toBe('output/the-moon-history.html');
  });

  it('gives the same key for the same pair', () => {
    expect(buildOutputKey('The Moon', 'history')).toBe(buildOutputKey('the moon!', 'history'));
  });
});
