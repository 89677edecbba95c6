import Database from 'better-sqlite3';
import { AnswerQualityGate } from '../gate/quality_gate.js';
import { OracleAdapter } from '../oracle/adapter.js';
import { HeuristicEvaluationOracle } from '../oracle/heuristic_oracle.js';
import { HttpEvaluationOracle, type FetchLike } from '../oracle/http_oracle.js';
import type { EvaluationOracle } from '../oracle/types.js';
import { RemediationClient } from '../remediation/client.js';
import { HttpRemediationStore } from '../remediation/http_store.js';
import { InMemoryRemediationStore } from '../remediation/memory_store.js';
import { SqliteRemediationStore } from '../remediation/sqlite_store.js';
import type { RemediationStore } from '../remediation/types.js';
import { logInfo } from '../telemetry/logger.js';
import { requiredMetrics, validateThresholdTable } from '../verdict/thresholds.js';
import type { GateConfig, OracleConfig, StoreConfig } from './schema.js';

export interface GateRuntime {
  gate: AnswerQualityGate;
  /** Undefined when the store kind is `none` */
  store?: RemediationStore;
  config: GateConfig;
  /** Releases the SQLite handle, if any */
  close(): void;
}

interface FactoryOptions {
  fetchImpl?: FetchLike;
}

export function createOracle(config: OracleConfig, options: FactoryOptions = {}): EvaluationOracle {
  if (config.kind === 'http' && config.url) {
    return new HttpEvaluationOracle({
      baseUrl: config.url,
      path: config.path,
      apiKey: config.apiKey,
      fetchImpl: options.fetchImpl,
    });
  }
  return new HeuristicEvaluationOracle({ fallbackAnswer: config.fallbackAnswer });
}

export function createStore(
  config: StoreConfig,
  options: FactoryOptions = {}
): { store?: RemediationStore; close(): void } {
  const similarityThreshold = config.similarityThreshold;
  switch (config.kind) {
    case 'memory':
      return { store: new InMemoryRemediationStore({ similarityThreshold }), close: () => {} };
    case 'sqlite': {
      const db = new Database(config.path ?? ':memory:');
      db.pragma('journal_mode = WAL');
      return { store: new SqliteRemediationStore(db, { similarityThreshold }), close: () => db.close() };
    }
    case 'http':
      return {
        store: new HttpRemediationStore({
          baseUrl: config.url ?? '',
          projectId: config.projectId ?? '',
          apiKey: config.apiKey,
          fetchImpl: options.fetchImpl,
        }),
        close: () => {},
      };
    case 'none':
      return { close: () => {} };
  }
}

/**
 * Build a ready-to-use gate from validated configuration.
 *
 * @throws ConfigurationError when the threshold table is invalid
 */
export function createGateFromConfig(config: GateConfig, options: FactoryOptions = {}): GateRuntime {
  const thresholds = validateThresholdTable(config.thresholds);
  const oracle = createOracle(config.oracle, options);
  const adapter = new OracleAdapter(oracle, {
    metrics: requiredMetrics(thresholds),
    model: config.oracle.model,
    qualityPreset: config.oracle.qualityPreset,
    timeoutMs: config.oracle.timeoutMs,
    retry: config.oracle.retry,
  });

  const { store, close } = createStore(config.store, options);
  const remediation = store
    ? new RemediationClient(store, {
        timeoutMs: config.store.timeoutMs,
        retry: config.store.retry,
        similarityThreshold: config.store.similarityThreshold,
      })
    : undefined;

  const gate = new AnswerQualityGate({
    adapter,
    thresholds,
    failurePolicy: config.failurePolicy,
    remediation,
  });

  logInfo('Quality gate configured', {
    oracle: oracle.name,
    store: config.store.kind,
    metrics: requiredMetrics(thresholds),
    failurePolicy: config.failurePolicy,
  });

  return { gate, store, config, close };
}
