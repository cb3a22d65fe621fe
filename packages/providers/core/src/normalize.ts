import type { TrackRef } from '@tracklift/contracts';

const BRACKETED_SPAN = /[([].*?[)\]]/g;
const NOISE_TOKENS = /(official video|music video|lyrics|audio)/gi;
const WHITESPACE_RUN = /\s+/g;

function stripOnce(title: string): string {
  return title
    .replace(BRACKETED_SPAN, '')
    .replace(NOISE_TOKENS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Strips bracketed annotations and noise tokens ("official video", "lyrics", ...)
 * from a free-text title and collapses whitespace.
 *
 * Passes repeat until the title stops changing, so removing a token never leaves
 * a new one behind (`"audaudioio"` becomes `""`, not `"audio"`). May return `""`.
 */
export function normalizeTitle(raw: string): string {
  let current = raw;
  for (;;) {
    const next = stripOnce(current);
    if (next === current) return current;
    current = next;
  }
}

export function toTrackRef(title: string, artist: string | null | undefined): TrackRef {
  return Object.freeze({
    title: normalizeTitle(title),
    artist: (artist ?? '').replace(WHITESPACE_RUN, ' ').trim(),
  });
}

/** Renders a track the way the missing-tracks report lists it. */
export function formatTrackRef(ref: TrackRef): string {
  return `${ref.title} - ${ref.artist}`;
}

/** Query string handed to the oracle and the fuzzy tier. */
export function trackQuery(ref: TrackRef): string {
  return `${ref.title} ${ref.artist}`.trim();
}
