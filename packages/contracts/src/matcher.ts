import type { CandidateTrack } from './providers';

export type MatchTier = 'exact' | 'oracle' | 'fuzzy';

export type MatchDecision =
  | { status: 'resolved'; platformId: string; tier: MatchTier; candidate: CandidateTrack }
  | { status: 'unresolved' };

/**
 * Picks one candidate display string for a query, or answers `NONE`.
 * Implementations may be slow or wrong; callers treat any failure as `NONE`.
 */
export type MatchOracle = (query: string, candidates: string[]) => Promise<string>;

export const UNRESOLVED: MatchDecision = Object.freeze({ status: 'unresolved' });

export function isResolved(
  decision: MatchDecision,
): decision is Extract<MatchDecision, { status: 'resolved' }> {
  return decision.status === 'resolved';
}
