import {
  DEFAULT_FUZZY_THRESHOLD,
  DEFAULT_SEARCH_LIMIT,
  ORACLE_NONE,
  UNRESOLVED,
  errorMessage,
  type CandidateTrack,
  type CatalogSearch,
  type MatchDecision,
  type MatchOracle,
  type MatchTier,
  type TrackRef,
} from '@tracklift/contracts';

import { silentLogger, type Logger } from '../logger';
import { trackQuery } from '../normalize';
import { closestMatch } from './similarity';

export interface MatchResolverOptions {
  /** Omit to skip the oracle tier entirely. */
  oracle?: MatchOracle;
  fuzzyThreshold?: number;
  searchLimit?: number;
  logger?: Logger;
}

export const displayString = (candidate: CandidateTrack): string =>
  `${candidate.displayTitle} ${candidate.displayArtist}`.trim();

const QUOTE_WRAP = /^["'`]+|["'`]+$/g;

const resolved = (candidate: CandidateTrack, tier: MatchTier): MatchDecision => ({
  status: 'resolved',
  platformId: candidate.platformId,
  tier,
  candidate,
});

/**
 * Picks the destination track for one normalized source entry.
 *
 * Tiers, each tried only when the previous one produced nothing:
 *  1. structured exact query against the catalog (when the catalog supports it)
 *  2. oracle disambiguation over the candidate display strings
 *  3. fuzzy similarity against the same candidates, accepted at `fuzzyThreshold`
 */
export class MatchResolver {
  private readonly oracle?: MatchOracle;
  private readonly fuzzyThreshold: number;
  private readonly searchLimit: number;
  private readonly logger: Logger;

  constructor(options: MatchResolverOptions = {}) {
    this.oracle = options.oracle;
    this.fuzzyThreshold = options.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD;
    this.searchLimit = options.searchLimit ?? DEFAULT_SEARCH_LIMIT;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Destination write path: tier 1 against the catalog, then one free-text search
   * whose results go through {@link resolve}. Catalog errors propagate.
   */
  async resolveAgainst(query: TrackRef, catalog: CatalogSearch): Promise<MatchDecision> {
    if (catalog.searchExact && query.title.length > 0) {
      const hit = await catalog.searchExact(query);
      if (hit) {
        return resolved(hit, 'exact');
      }
    }

    const candidates = await catalog.search(query.title, query.artist, this.searchLimit);
    return this.resolve(query, candidates);
  }

  /** Tiers 2 and 3 over an already-fetched candidate list. Never throws. */
  async resolve(query: TrackRef, candidates: CandidateTrack[]): Promise<MatchDecision> {
    if (candidates.length === 0) {
      return UNRESOLVED;
    }

    const queryText = trackQuery(query);
    const displays = candidates.map(displayString);

    const picked = await this.askOracle(queryText, displays);
    if (picked !== null) {
      const candidate = candidates[displays.indexOf(picked)];
      if (candidate) {
        return resolved(candidate, 'oracle');
      }
      this.logger.debug({ query: queryText, answer: picked }, 'oracle answer matched no candidate');
    }

    const fuzzy = closestMatch(queryText, displays, this.fuzzyThreshold);
    if (fuzzy) {
      const candidate = candidates[fuzzy.index];
      if (candidate) {
        return resolved(candidate, 'fuzzy');
      }
    }

    return UNRESOLVED;
  }

  /** The oracle's answer, or null for `NONE` and for any failure. */
  private async askOracle(query: string, displays: string[]): Promise<string | null> {
    if (!this.oracle) return null;

    try {
      const answer = (await this.oracle(query, displays)).trim().replace(QUOTE_WRAP, '').trim();
      if (!answer || answer.toUpperCase() === ORACLE_NONE) {
        return null;
      }
      return answer;
    } catch (error) {
      this.logger.warn({ query, err: errorMessage(error) }, 'oracle selection failed, falling back to fuzzy match');
      return null;
    }
  }
}
