/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { ConfigurationError, GateError, RemediationEntryNotFoundError, StoreUnavailableError } from '../core/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'UNKNOWN_COMMAND'
  | 'CONFIG_INVALID'
  | 'STORE_REQUIRED'
  | 'STORE_ERROR'
  | 'ENTRY_NOT_FOUND';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `answer-gate help <command>` for usage information.',
  UNKNOWN_COMMAND: 'Run `answer-gate help` to list the available commands.',
  CONFIG_INVALID: 'Fix the listed fields in the config file or the GATE_* environment variables.',
  STORE_REQUIRED: 'Configure a remediation store (store.kind in the config file, GATE_STORE_PATH or GATE_STORE_URL).',
  STORE_ERROR: 'Check that the remediation store is reachable and retry.',
  ENTRY_NOT_FOUND: 'Run `answer-gate remediation list` to see entry ids.',
};

/** Usage errors exit with 1, everything else with 2 */
export const EXIT_CODES = {
  usage: 1,
  failure: 2,
} as const;

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map library errors onto CLI errors so they carry a code and a suggestion.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigurationError) {
    return createError('CONFIG_INVALID', error.message, error.issues.length > 0 ? { issues: error.issues } : undefined);
  }
  if (error instanceof RemediationEntryNotFoundError) {
    return createError('ENTRY_NOT_FOUND', error.message, { entryId: error.entryId });
  }
  if (error instanceof StoreUnavailableError) {
    return createError('STORE_ERROR', error.message, { operation: error.operation });
  }
  if (error instanceof GateError) {
    return new CliError(error.message, 'STORE_ERROR', undefined, { code: error.code });
  }
  if (error instanceof Error) {
    return new CliError(error.message, 'INVALID_ARGUMENT');
  }
  return new CliError(String(error), 'INVALID_ARGUMENT');
}

export function getExitCode(error: CliError): number {
  switch (error.code) {
    case 'INVALID_ARGUMENT':
    case 'UNKNOWN_COMMAND':
    case 'CONFIG_INVALID':
      return EXIT_CODES.usage;
    default:
      return EXIT_CODES.failure;
  }
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}

export function formatErrorJson(error: unknown): string {
  const cliError = toCliError(error);
  return JSON.stringify({
    error: {
      code: cliError.code,
      message: cliError.message,
      ...(cliError.suggestion ? { suggestion: cliError.suggestion } : {}),
      ...(cliError.details ? { details: cliError.details } : {}),
    },
  }, null, 2);
}
