export const PLATFORM_NAMES = ['spotify', 'youtube'] as const;
export type PlatformName = (typeof PLATFORM_NAMES)[number];

/** Candidate shortlist size per catalog search. */
export const DEFAULT_SEARCH_LIMIT = 5;

/** Largest page both catalog search APIs accept. */
export const MAX_SEARCH_LIMIT = 50;

/** Minimum similarity (0-1) for the fuzzy tier to accept a candidate. */
export const DEFAULT_FUZZY_THRESHOLD = 0.7;

/** Upper bound on entries read from a source playlist. */
export const DEFAULT_READ_TRACK_LIMIT = 500;

export const DEFAULT_PLAYLIST_TITLE = 'Imported Playlist';

export const ORACLE_NONE = 'NONE';
