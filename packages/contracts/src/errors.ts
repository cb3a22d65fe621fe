import type { PlatformName } from './constants';

export type TransferErrorCode =
  | 'invalid_url'
  | 'unsupported_url'
  | 'playlist_unavailable'
  | 'search_unavailable'
  | 'playlist_creation_failed'
  | 'append_failed'
  | 'rate_limited';

/**
 * Base class for every failure the transfer core reports. `status` is the HTTP
 * status the API surfaces for it.
 */
export class TransferError extends Error {
  readonly code: TransferErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: TransferErrorCode,
    message: string,
    options: { status: number; cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TransferError';
    this.code = code;
    this.status = options.status;
    this.details = options.details;
  }
}

export class InvalidUrlError extends TransferError {
  constructor(message: string, code: 'invalid_url' | 'unsupported_url' = 'invalid_url') {
    super(code, message, { status: 400 });
    this.name = 'InvalidUrlError';
  }
}

export class PlaylistUnavailableError extends TransferError {
  constructor(public readonly platform: PlatformName, message: string, cause?: unknown) {
    super('playlist_unavailable', message, { status: 502, cause, details: { platform } });
    this.name = 'PlaylistUnavailableError';
  }
}

export class SearchUnavailableError extends TransferError {
  constructor(public readonly platform: PlatformName, message: string, cause?: unknown) {
    super('search_unavailable', message, { status: 502, cause, details: { platform } });
    this.name = 'SearchUnavailableError';
  }
}

export class PlaylistCreationFailedError extends TransferError {
  constructor(public readonly platform: PlatformName, message: string, cause?: unknown) {
    super('playlist_creation_failed', message, { status: 502, cause, details: { platform } });
    this.name = 'PlaylistCreationFailedError';
  }
}

export class AppendFailedError extends TransferError {
  constructor(
    public readonly platform: PlatformName,
    message: string,
    options: { cause?: unknown; matched?: number; playlistId?: string } = {},
  ) {
    super('append_failed', message, {
      status: 502,
      cause: options.cause,
      details: { platform, matched: options.matched, playlist_id: options.playlistId },
    });
    this.name = 'AppendFailedError';
  }
}

export class RateLimitedError extends TransferError {
  constructor(message: string, public readonly retryAfterMs: number) {
    super('rate_limited', message, { status: 429, details: { retry_after_ms: retryAfterMs } });
    this.name = 'RateLimitedError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
