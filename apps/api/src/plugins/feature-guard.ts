import fp from 'fastify-plugin';

import type { PlatformName } from '@tracklift/contracts';

import { flags, isPlatformEnabled, type PlatformFlags } from '../config/flags';
import { problem } from '../lib/problem';

export type FeatureGuardOptions = {
  /** Defaults to the flags read from the environment at startup. */
  flags?: PlatformFlags;
};

export default fp<FeatureGuardOptions>(async (app, opts) => {
  const current = opts.flags ?? flags.platforms;

  app.decorate('requirePlatform', (name: PlatformName) => {
    if (!isPlatformEnabled(name, current)) {
      throw problem({
        status: 503,
        code: 'platform_disabled',
        message: `${name} platform is disabled`,
        details: { platform: name },
      });
    }
  });

  app.decorateRequest('requirePlatform', (name: PlatformName) => {
    app.requirePlatform(name);
  });
});

declare module 'fastify' {
  interface FastifyInstance {
    requirePlatform(name: PlatformName): void;
  }

  interface FastifyRequest {
    requirePlatform(name: PlatformName): void;
  }
}
