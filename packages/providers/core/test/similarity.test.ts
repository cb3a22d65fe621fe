import { describe, expect, it } from 'vitest';

import { closestMatch, similarity } from '../src/match/similarity';

describe('similarity', () => {
  it('scores identical strings as 1 regardless of case', () => {
    expect(similarity('Hey Jude', 'Hey Jude')).toBe(1);
    expect(similarity('Hey Jude', 'HEY JUDE')).toBe(1);
  });

  it('scores strings shorter than a bigram as 0', () => {
    expect(similarity('a', 'a')).toBe(0);
  });

  it('counts shared bigrams', () => {
    // ab bc cd de ef fg gh shared out of ten bigrams each side
    expect(similarity('abcdefghijk', 'abcdefghxyz')).toBe(0.7);
  });
});

describe('closestMatch', () => {
  const query = 'Hey Jude The Beatles';

  it('returns the best option and prefers the first on ties', () => {
    const options = ['Let It Be The Beatles', 'Hey Jude The Beatles', 'hey jude the beatles'];

    expect(closestMatch(query, options, 0.7)).toEqual({ index: 1, score: 1 });
  });

  it('accepts a score equal to the threshold', () => {
    expect(closestMatch('abcdefghijk', ['abcdefghxyz'], 0.7)).toEqual({ index: 0, score: 0.7 });
  });

  it('rejects options below the threshold', () => {
    expect(closestMatch(query, ['Bohemian Rhapsody Queen', 'Let It Be The Beatles'], 0.7)).toBeNull();
  });

  it('returns null for no options', () => {
    expect(closestMatch(query, [], 0)).toBeNull();
  });
});
