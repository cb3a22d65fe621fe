import { stringSimilarity } from 'string-similarity-js';

export interface ClosestMatch {
  index: number;
  score: number;
}

/** Case-insensitive bigram (Dice) similarity in [0, 1]. */
export function similarity(a: string, b: string): number {
  return stringSimilarity(a, b);
}

/**
 * Best-scoring option for `query`, first on ties, accepted only when its score
 * reaches `threshold`.
 */
export function closestMatch(query: string, options: string[], threshold: number): ClosestMatch | null {
  let bestIndex = -1;
  let bestScore = -1;

  for (let index = 0; index < options.length; index += 1) {
    const score = similarity(query, options[index] ?? '');
    if (score > bestScore) {
      bestIndex = index;
      bestScore = score;
    }
  }

  if (bestIndex < 0 || bestScore < threshold) {
    return null;
  }
  return { index: bestIndex, score: bestScore };
}
