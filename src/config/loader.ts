/**
 * @fileoverview Gate configuration loading
 *
 * Sources, later wins:
 * 1. schema defaults
 * 2. a YAML or JSON file (JSON is valid YAML)
 * 3. environment variables
 *
 * Invalid configuration throws ConfigurationError; call this at startup.
 */

import * as fs from 'node:fs';
import YAML from 'yaml';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { GateConfigSchema, type GateConfig } from './schema.js';

export interface LoadGateConfigOptions {
  /** Path to a YAML or JSON config file */
  path?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: RawSection, key: string): RawSection {
  const existing = raw[key];
  const copy: RawSection = isRecord(existing) ? { ...existing } : {};
  raw[key] = copy;
  return copy;
}

function readConfigFile(path: string): RawSection {
  let content: string;
  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}`, [getErrorMessage(error)]);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${path}`, [getErrorMessage(error)]);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a mapping at the top level`);
  }
  return parsed;
}

/**
 * Overlay environment variables onto a raw config object.
 */
export function applyEnvOverrides(raw: RawSection, env: NodeJS.ProcessEnv): RawSection {
  const result: RawSection = { ...raw };

  if (env.GATE_ORACLE_URL) {
    const oracle = section(result, 'oracle');
    oracle.kind = 'http';
    oracle.url = env.GATE_ORACLE_URL;
  }
  if (env.GATE_ORACLE_API_KEY) section(result, 'oracle').apiKey = env.GATE_ORACLE_API_KEY;
  if (env.GATE_ORACLE_MODEL) section(result, 'oracle').model = env.GATE_ORACLE_MODEL;
  if (env.GATE_QUALITY_PRESET) section(result, 'oracle').qualityPreset = env.GATE_QUALITY_PRESET;
  if (env.GATE_ORACLE_TIMEOUT_MS) section(result, 'oracle').timeoutMs = Number(env.GATE_ORACLE_TIMEOUT_MS);

  if (env.GATE_STORE_PATH) {
    const store = section(result, 'store');
    store.kind = 'sqlite';
    store.path = env.GATE_STORE_PATH;
  }
  if (env.GATE_STORE_URL) {
    const store = section(result, 'store');
    store.kind = 'http';
    store.url = env.GATE_STORE_URL;
  }
  if (env.GATE_STORE_PROJECT_ID) section(result, 'store').projectId = env.GATE_STORE_PROJECT_ID;
  if (env.GATE_STORE_API_KEY) section(result, 'store').apiKey = env.GATE_STORE_API_KEY;

  if (env.GATE_FAILURE_POLICY) result.failurePolicy = env.GATE_FAILURE_POLICY;

  return result;
}

/**
 * Validate a raw config object.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function parseGateConfig(raw: unknown): GateConfig {
  const parsed = GateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError('Invalid gate configuration', issues);
  }
  return parsed.data;
}

export function loadGateConfig(options: LoadGateConfigOptions = {}): GateConfig {
  const env = options.env ?? process.env;
  const fromFile = options.path ? readConfigFile(options.path) : {};
  return parseGateConfig(applyEnvOverrides(fromFile, env));
}
