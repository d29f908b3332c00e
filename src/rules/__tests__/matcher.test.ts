import { describe, expect, it } from 'vitest';
import { containsKeyword, keywordName, matchedKeywords, strongestWeight, weightedSum } from '../matcher.js';

describe('containsKeyword', () => {
  it('matches whole words, case-insensitively', () => {
    expect(containsKeyword('Drop the old column', 'drop')).toBe(true);
    expect(containsKeyword('style the dropdown', 'drop')).toBe(false);
    expect(containsKeyword('allow all origins', 'all')).toBe(true);
    expect(containsKeyword('allow every origin', 'all')).toBe(false);
  });

  it('extends a stem marked with * to longer words', () => {
    expect(containsKeyword('Fix the Authentication flow', 'auth*')).toBe(true);
    expect(containsKeyword('rotate credentials', 'credential*')).toBe(true);
    expect(containsKeyword('Fix the Authentication flow', 'auth')).toBe(false);
  });

  it('does not match inside a word', () => {
    expect(containsKeyword('add oauth scopes', 'auth*')).toBe(false);
    expect(containsKeyword('rapid prototype', 'api')).toBe(false);
  });

  it('matches multi-word keywords and escapes regex characters', () => {
    expect(containsKeyword('please drop table users', 'drop table')).toBe(true);
    expect(containsKeyword('x+y', 'y')).toBe(true);
    expect(containsKeyword('cost is $5', '$5')).toBe(true);
  });
});

describe('weighted tables', () => {
  const table = { typo: 0.4, small: 0.3, only: 0.2 };

  it('sums the weights of every matched keyword', () => {
    expect(weightedSum('only a small typo', table)).toBeCloseTo(0.9);
    expect(weightedSum('nothing here', table)).toBe(0);
  });

  it('returns the strongest matched weight', () => {
    expect(strongestWeight('only a small typo', table)).toBe(0.4);
    expect(strongestWeight('nothing here', table)).toBe(0);
  });

  it('lists matches in table order', () => {
    expect(matchedKeywords('small typo', Object.keys(table))).toEqual(['typo', 'small']);
  });

  it('reports stems without their marker', () => {
    expect(keywordName('secret*')).toBe('secret');
    expect(keywordName('drop table')).toBe('drop table');
    expect(matchedKeywords('leaked secrets and tokens', ['secret*', 'token', 'leak*'])).toEqual(['secret', 'leak']);
    expect(weightedSum('rotating secrets', { 'secret*': 0.3, 'rotate': 0.2 })).toBe(0.3);
  });
});
