/**
 * @fileoverview Gate configuration
 *
 * - `loadGateConfig`: file + environment, validated
 * - `createGateFromConfig`: wires oracle, store and gate from a config
 */

export {
  loadGateConfig,
  parseGateConfig,
  applyEnvOverrides,
  type LoadGateConfigOptions,
} from './loader.js';

export {
  GateConfigSchema,
  OracleConfigSchema,
  StoreConfigSchema,
  RetryPolicySchema,
  FailurePolicySchema,
  type GateConfig,
  type OracleConfig,
  type StoreConfig,
} from './schema.js';

export {
  createGateFromConfig,
  createOracle,
  createStore,
  type GateRuntime,
} from './gate_factory.js';
