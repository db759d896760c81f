/**
 * Common application errors
 * ==========================
 *
 * Every error the API can surface carries a stable `code` and an HTTP
 * `statusCode`. The global error handler in app.ts turns them into
 * `{ ok: false, error: code, message }`.
 */

export class AppError extends Error {
  readonly code: string;
  readonly statusCode: number;

  constructor(code: string, message: string, statusCode = 500) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

// ═══════════════════════════════════════════════════════════════
// DATA ACQUISITION
// ═══════════════════════════════════════════════════════════════

export interface FailedSignal {
  signalClass: string;
  symbol: string;
  attempts: string[];
}

/**
 * Every source in a signal's chain failed.
 * Fatal in STRICT mode, absorbed into a substitute in LENIENT mode.
 */
export class DataUnavailableError extends AppError {
  readonly failures: FailedSignal[];

  constructor(failures: FailedSignal[]) {
    const summary = failures
      .map(f => `${f.signalClass}:${f.symbol} (${f.attempts.join(', ') || 'no sources'})`)
      .join('; ');
    super('DATA_UNAVAILABLE', `Market data unavailable: ${summary}`, 503);
    this.failures = failures;
  }
}

/**
 * A source answered but its payload could not be parsed into the expected
 * numeric fields. Handled like any other source failure.
 */
export class InvalidResponseShapeError extends AppError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super('INVALID_RESPONSE_SHAPE', `${source}: ${detail}`, 502);
    this.source = source;
  }
}

// ═══════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════

/** Unknown risk tier, malformed registry, bad environment. Never degraded. */
export class ConfigError extends AppError {
  constructor(message: string) {
    super('CONFIG_ERROR', message, 500);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
