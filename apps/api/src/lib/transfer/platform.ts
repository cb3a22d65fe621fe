import { InvalidUrlError, type PlatformName } from '@tracklift/contracts';

export const PLATFORM_LABELS: Record<PlatformName, string> = {
  spotify: 'Spotify',
  youtube: 'YouTube',
};

// Checked in order; a signature matches the lowercased host or one of its parent domains.
const HOST_SIGNATURES: ReadonlyArray<readonly [string, PlatformName]> = [
  ['music.youtube.com', 'youtube'],
  ['youtube.com', 'youtube'],
  ['youtu.be', 'youtube'],
  ['spotify.com', 'spotify'],
];

/**
 * Parses a playlist URL, accepting only http and https.
 */
export function parsePlaylistUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new InvalidUrlError(`Not a valid URL: ${raw}`);
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new InvalidUrlError(`Playlist URL must use http or https, got ${url.protocol.replace(/:$/, '')}`);
  }
  return url;
}

/**
 * Which platform a playlist URL belongs to, by host. Makes no network call.
 */
export function detectPlatform(raw: string): PlatformName {
  const host = parsePlaylistUrl(raw).hostname.toLowerCase();
  const match = HOST_SIGNATURES.find(
    ([signature]) => host === signature || host.endsWith(`.${signature}`),
  );
  if (!match) {
    throw new InvalidUrlError(`Unsupported playlist host: ${host}`, 'unsupported_url');
  }
  return match[1];
}
