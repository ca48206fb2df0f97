import { describe, it, expect } from 'vitest';
import { findKeywords, matchesKeyword } from '../../../src/utils/keywords.js';

describe('matchesKeyword', () => {
  it('matches at the start of a word, case-insensitively', () => {
    expect(matchesKeyword('I was CHARGED twice', 'charge')).toBe(true);
    expect(matchesKeyword('There is a surcharge', 'charge')).toBe(false);
  });

  it('matches multi-word keywords', () => {
    expect(matchesKeyword('The app is not working', 'not working')).toBe(true);
  });

  it('treats regex characters literally', () => {
    expect(matchesKeyword('Is 2fa required?', '2fa')).toBe(true);
    expect(matchesKeyword('price (monthly)', 'price (')).toBe(true);
  });
});

describe('findKeywords', () => {
  it('returns matches in list order', () => {
    expect(findKeywords('wifi and router down', ['router', 'modem', 'wifi'])).toEqual(['router', 'wifi']);
  });
});
