export { computeVerdict, degradedVerdict, isTriggered, thresholdFor, type ComputeVerdictOptions } from './engine.js';
export {
  DEFAULT_THRESHOLDS,
  MetricRoleSchema,
  MetricThresholdSchema,
  ThresholdDirectionSchema,
  ThresholdTableSchema,
  mergeThresholds,
  requiredMetrics,
  validateThresholdTable,
} from './thresholds.js';
