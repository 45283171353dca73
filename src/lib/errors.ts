/**
 * Feedkeeper — Error Taxonomy
 *
 * Every failure a cycle can hit is one of these classes. The `type` and
 * `kind` pair is what ends up in a CycleReport.
 */

// ============================================================
// BASE
// ============================================================

export abstract class FeedkeeperError extends Error {
  abstract readonly type: ReportErrorType;
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ReportErrorType =
  | 'FetchError'
  | 'ParseError'
  | 'StoreError'
  | 'TimeoutError'
  | 'SinkError'
  | 'ConfigError'
  | 'UnknownError';

// ============================================================
// FETCH
// ============================================================

/** `Cancelled`: collection is stopping and no request was sent */
export type FetchErrorKind = 'Network' | 'HttpStatus' | 'TooLarge' | 'Cancelled';

export class FetchError extends FeedkeeperError {
  readonly type = 'FetchError' as const;

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    readonly httpStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  /**
   * Network failures and 5xx responses are worth another attempt.
   * 4xx and oversized payloads are not.
   */
  get retryable(): boolean {
    if (this.kind === 'Network') return true;
    if (this.kind === 'HttpStatus') return (this.httpStatus ?? 0) >= 500;
    return false;
  }
}

// ============================================================
// PARSE
// ============================================================

export type ParseErrorKind = 'Malformed' | 'Unsupported';

export class ParseError extends FeedkeeperError {
  readonly type = 'ParseError' as const;

  constructor(readonly kind: ParseErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

// ============================================================
// STORE
// ============================================================

export type StoreErrorKind = 'Unavailable' | 'Corrupt';

export class StoreError extends FeedkeeperError {
  readonly type = 'StoreError' as const;

  constructor(readonly kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }

  /** Corruption means dedup correctness is gone for the whole process. */
  get fatal(): boolean {
    return this.kind === 'Corrupt';
  }
}

// ============================================================
// CYCLE / SINK / CONFIG
// ============================================================

export class CycleTimeoutError extends FeedkeeperError {
  readonly type = 'TimeoutError' as const;
  readonly kind = 'CycleTimeout';

  constructor(readonly feedId: string, readonly timeoutMs: number) {
    super(`Cycle for "${feedId}" exceeded ${timeoutMs}ms`);
  }
}

export class SinkError extends FeedkeeperError {
  readonly type = 'SinkError' as const;
  readonly kind = 'EmitFailed';
}

export class ConfigError extends FeedkeeperError {
  readonly type = 'ConfigError' as const;
  readonly kind = 'Invalid';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

// ============================================================
// HELPERS
// ============================================================

/**
 * Serializable error shape carried by cycle reports.
 */
export interface ReportError {
  type: ReportErrorType;
  kind: string;
  message: string;
  httpStatus?: number;
}

export function toReportError(error: unknown): ReportError {
  if (error instanceof FetchError) {
    return {
      type: error.type,
      kind: error.kind,
      message: error.message,
      ...(error.httpStatus !== undefined ? { httpStatus: error.httpStatus } : {}),
    };
  }

  if (error instanceof FeedkeeperError) {
    return { type: error.type, kind: error.kind, message: error.message };
  }

  return { type: 'UnknownError', kind: 'Unexpected', message: describeError(error) };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
