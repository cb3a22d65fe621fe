// Video titles on YouTube carry the artist in one of two places: the channel name
// of an auto-generated "Artist - Topic" channel, or an "Artist - Song" prefix.

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

const MAX_CODE_POINT = 0x10ffff;

/** Search snippets come back HTML-escaped (`&#39;`, `&amp;`, ...). */
export function decodeEntities(value: string): string {
  return value.replace(/&(#x?[0-9a-f]+|[a-z]+);/gi, (match, entity: string) => {
    if (entity.startsWith('#')) {
      const hex = entity[1] === 'x' || entity[1] === 'X';
      const code = Number.parseInt(entity.slice(hex ? 2 : 1), hex ? 16 : 10);
      return Number.isInteger(code) && code <= MAX_CODE_POINT ? String.fromCodePoint(code) : match;
    }
    return ENTITIES[entity.toLowerCase()] ?? match;
  });
}

const TOPIC_SUFFIX = /\s*-\s*topic$/i;

export const isTopicChannel = (channelTitle: string | null | undefined): boolean =>
  Boolean(channelTitle && TOPIC_SUFFIX.test(channelTitle));

export const sanitizeArtist = (channelTitle: string | null | undefined): string => {
  if (!channelTitle) return '';
  return channelTitle.replace(TOPIC_SUFFIX, '').trim();
};

/** Placeholder titles the API returns for entries that are no longer playable. */
const UNAVAILABLE_TITLES = new Set(['deleted video', 'private video']);

export const isUnavailableTitle = (title: string): boolean => UNAVAILABLE_TITLES.has(title.trim().toLowerCase());

export interface VideoTitleParts {
  title: string;
  artist: string;
}

/**
 * Splits a video title into song and artist. Topic channels name the artist
 * directly; otherwise a leading `"Artist - "` is taken as the artist, falling
 * back to the channel name.
 */
export function splitVideoTitle(rawTitle: string, channelTitle: string | null | undefined): VideoTitleParts {
  const title = decodeEntities(rawTitle).trim();
  const channel = sanitizeArtist(channelTitle ? decodeEntities(channelTitle) : channelTitle);

  if (isTopicChannel(channelTitle)) {
    return { title, artist: channel };
  }

  const dashIdx = title.indexOf(' - ');
  if (dashIdx > 0 && dashIdx < title.length - 3) {
    const artist = title.substring(0, dashIdx).trim();
    const song = title.substring(dashIdx + 3).trim();
    if (artist.length >= 2 && song.length >= 2) {
      return { title: song, artist };
    }
  }

  return { title, artist: channel };
}
