/**
 * Error taxonomy
 *
 * NotFoundError and TransportError abort an invocation; ConfigError rejects
 * it before any request is made. Verdicts are not errors.
 */

/** No workflow run exists for the requested branch. */
export class NotFoundError extends Error {
  override name = 'NotFoundError';
}

export interface TransportErrorDetails {
  /** Request URL */
  url: string;
  /** HTTP status (null for network failures and timeouts) */
  status: number | null;
  rate_limit_remaining: number | null;
  rate_limit_reset: number | null;
}

/** The GitHub API could not be reached, answered non-2xx, or sent an unparsable body. */
export class TransportError extends Error {
  override name = 'TransportError';

  constructor(
    message: string,
    readonly details: TransportErrorDetails,
  ) {
    super(message);
  }
}

/** Invalid invocation parameters. */
export class ConfigError extends Error {
  override name = 'ConfigError';
}
