/** Classification used by the orchestrator's retry policy. */
export type FetchErrorKind = 'transient' | 'permanent';

export type FetchErrorReason =
  | 'timeout'
  | 'network'
  | 'http_status'
  | 'unparsable_payload';

/**
 * Failure to obtain a usable feed payload.
 *
 * Transient errors are retried on a later tick; permanent ones are
 * logged and the cycle is skipped.
 */
export class FetchError extends Error {
  override readonly name = 'FetchError';
  readonly kind: FetchErrorKind;
  readonly reason: FetchErrorReason;
  readonly status: number | undefined;

  constructor(
    kind: FetchErrorKind,
    reason: FetchErrorReason,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.kind = kind;
    this.reason = reason;
    this.status = options.status;
  }
}

/** A derivation or analysis step threw; the cycle is abandoned. */
export class ProcessingError extends Error {
  override readonly name = 'ProcessingError';
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Processing failed during ${stage}: ${detail}`, { cause });
    this.stage = stage;
  }
}

/** Invalid startup configuration. The only fatal error class. */
export class ConfigError extends Error {
  override readonly name = 'ConfigError';
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
