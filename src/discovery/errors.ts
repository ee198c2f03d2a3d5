export type FetchErrorCode =
  | 'timeout'
  | 'network'
  | 'dns'
  | 'http'
  | 'rate-limited'
  | 'cancelled';

/** Base class for every failed request the Fetcher reports. */
export abstract class FetchError extends Error {
  abstract readonly transient: boolean;

  constructor(
    message: string,
    readonly url: string,
    readonly code: FetchErrorCode,
    readonly status?: number,
    readonly attempts = 1,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Timeouts, connection resets, 5xx and 429 that survived every retry. */
export class TransientFetchError extends FetchError {
  readonly transient = true;
}

/** 4xx other than 429, and DNS resolution failures. Never retried. */
export class PermanentFetchError extends FetchError {
  readonly transient = false;
}

/** Malformed document. Returned by the extractor and counted per phase, never thrown. */
export class ParseError extends Error {
  constructor(message: string, readonly documentUrl: string) {
    super(message);
    this.name = 'ParseError';
  }
}

export type SuggestionFailureReason = 'quota' | 'disabled' | 'upstream' | 'timeout' | 'unparseable';

/** Quota exhaustion or model failure. Always resolved to the static fallback. */
export class SuggestionServiceError extends Error {
  constructor(message: string, readonly reason: SuggestionFailureReason) {
    super(message);
    this.name = 'SuggestionServiceError';
  }
}

/** Every request a phase made to the target failed at the network level. */
export class HostUnreachableError extends Error {
  constructor(readonly host: string, readonly failures: number) {
    super(`Host ${host} is unreachable (${failures} failed requests)`);
    this.name = 'HostUnreachableError';
  }
}

/** Invalid base URL, scope misconfiguration or frontier corruption. Ends the run. */
export class OrchestrationFatalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OrchestrationFatalError';
  }
}
