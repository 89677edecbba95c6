/**
 * @fileoverview Quality gate error hierarchy
 *
 * Oracle and store failures are typed so the orchestration layer can map them
 * to a degraded verdict instead of surfacing them to the end user.
 * Configuration errors are the only ones meant to be fatal, and only at startup.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class GateError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// ORACLE ERRORS
// ============================================================================

export class OracleUnavailableError extends GateError {
  readonly code = 'ORACLE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    message: string,
    readonly attempts: number,
    readonly status?: number,
    readonly cause?: Error,
  ) {
    super(`Evaluation oracle unavailable: ${message}`);
    this.name = 'OracleUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        attempts: this.attempts,
        status: this.status,
        cause: this.cause?.message,
      },
    };
  }
}

export class OracleTimeoutError extends GateError {
  readonly code = 'ORACLE_TIMEOUT';
  readonly retryable = true;

  constructor(
    readonly timeoutMs: number,
    readonly attempts: number,
  ) {
    super(`Evaluation oracle did not respond within ${timeoutMs}ms (${attempts} attempt${attempts === 1 ? '' : 's'})`);
    this.name = 'OracleTimeoutError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { timeoutMs: this.timeoutMs, attempts: this.attempts },
    };
  }
}

export class OracleMalformedResponseError extends GateError {
  readonly code = 'ORACLE_MALFORMED_RESPONSE';
  readonly retryable = false;

  constructor(
    readonly issues: string[],
    readonly payload?: unknown,
  ) {
    super(`Evaluation oracle returned an unparseable payload: ${issues.join('; ')}`);
    this.name = 'OracleMalformedResponseError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues },
    };
  }
}

export type OracleError = OracleUnavailableError | OracleTimeoutError | OracleMalformedResponseError;

export function isOracleError(error: unknown): error is OracleError {
  return (
    error instanceof OracleUnavailableError ||
    error instanceof OracleTimeoutError ||
    error instanceof OracleMalformedResponseError
  );
}

// ============================================================================
// STORE ERRORS
// ============================================================================

export type StoreOperation = 'lookup' | 'escalate' | 'record_hit' | 'answer' | 'add' | 'list' | 'get';

export class StoreUnavailableError extends GateError {
  readonly code = 'STORE_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly operation: StoreOperation,
    message: string,
    readonly cause?: Error,
  ) {
    super(`Remediation store ${operation} failed: ${message}`);
    this.name = 'StoreUnavailableError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        cause: this.cause?.message,
      },
    };
  }
}

export class RemediationEntryNotFoundError extends GateError {
  readonly code = 'REMEDIATION_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly entryId: string) {
    super(`Remediation entry not found: ${entryId}`);
    this.name = 'RemediationEntryNotFoundError';
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigurationError extends GateError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: { issues: this.issues },
    };
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function getErrorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
