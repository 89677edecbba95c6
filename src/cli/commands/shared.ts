import { getErrorMessage } from '../../core/errors.js';
import { createGateFromConfig, type GateRuntime } from '../../config/gate_factory.js';
import { loadGateConfig } from '../../config/loader.js';
import { joinContext } from '../../oracle/adapter.js';
import { buildMessages, buildSystemPrompt } from '../../prompt/rag_prompt.js';
import type { RemediationStore } from '../../remediation/types.js';
import type { ChatMessage } from '../../types.js';
import { createError } from '../errors.js';

export type RuntimeLoader = (configPath: string | undefined) => GateRuntime;

export interface CommandContext {
  /** Arguments after the command name */
  args: string[];
  loadRuntime: RuntimeLoader;
}

export const defaultRuntimeLoader: RuntimeLoader = (configPath) =>
  createGateFromConfig(loadGateConfig({ path: configPath }));

/** Options every command accepts */
export const COMMON_OPTIONS = {
  config: { type: 'string', short: 'c' },
  json: { type: 'boolean', default: false },
} as const;

/** Options shared by `detect` and `validate` */
export const TURN_OPTIONS = {
  query: { type: 'string', short: 'q' },
  context: { type: 'string', multiple: true },
  response: { type: 'string', short: 'r' },
  'system-prompt': { type: 'string' },
} as const;

/**
 * Run a `parseArgs` call, reporting bad flags as usage errors.
 */
export function withUsageErrors<R>(parse: () => R): R {
  try {
    return parse();
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function requireOption(value: string | undefined, flag: string, usage: string): string {
  if (value === undefined || value.trim() === '') {
    throw createError('INVALID_ARGUMENT', `--${flag} is required. Usage: ${usage}`);
  }
  return value;
}

export function parsePositiveInt(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw createError('INVALID_ARGUMENT', `--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export interface TurnInput {
  query: string;
  context: string[];
  response: string;
  prompt: ChatMessage[];
}

/**
 * Rebuild the prompt the generator would have seen for this turn.
 */
export function buildTurnInput(values: {
  query?: string;
  context?: string[];
  response?: string;
  'system-prompt'?: string;
}, usage: string, fallbackAnswer?: string): TurnInput {
  const query = requireOption(values.query, 'query', usage);
  const response = requireOption(values.response, 'response', usage);
  const context = values.context ?? [];
  const systemPrompt = values['system-prompt'] ?? buildSystemPrompt(fallbackAnswer);
  return {
    query,
    context,
    response,
    prompt: buildMessages(systemPrompt, query, joinContext(context)),
  };
}

/**
 * Parse repeated `--tag key=value` flags. Each key may appear once.
 */
export function parseTags(tags: string[] | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const tag of tags ?? []) {
    const separator = tag.indexOf('=');
    if (separator <= 0) {
      throw createError('INVALID_ARGUMENT', `--tag must look like key=value, got "${tag}"`);
    }
    const key = tag.slice(0, separator);
    if (Object.hasOwn(result, key)) {
      throw createError('INVALID_ARGUMENT', `--tag ${key} is given more than once`);
    }
    result[key] = tag.slice(separator + 1);
  }
  return result;
}

export function requireStore(runtime: GateRuntime): RemediationStore {
  if (!runtime.store) {
    throw createError('STORE_REQUIRED', 'This command needs a remediation store, but none is configured');
  }
  return runtime.store;
}
