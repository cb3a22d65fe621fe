import type { PlatformName } from '@tracklift/contracts';

export type PlatformFlags = Record<PlatformName, boolean>;

const bool = (v: string | undefined, d = false) =>
  v ? ['1','true','yes','on'].includes(v.toLowerCase()) : d;

export function readFlags(source: NodeJS.ProcessEnv = process.env): PlatformFlags {
  return {
    spotify: bool(source.PLATFORMS_SPOTIFY_ENABLED, true),
    youtube: bool(source.PLATFORMS_YOUTUBE_ENABLED, true),
  };
}

export const flags: { platforms: PlatformFlags } = {
  platforms: readFlags(),
};

export function isPlatformEnabled(name: PlatformName, current: PlatformFlags = flags.platforms): boolean {
  return !!current[name];
}

