/**
 * @fileoverview Gate configuration schema
 *
 * Every tunable that costs latency or changes behavior (deadlines, retries,
 * thresholds, failure policy) lives here so deployments set it explicitly.
 */

import { z } from 'zod';
import { DEFAULT_THRESHOLDS, ThresholdTableSchema } from '../verdict/thresholds.js';

export const RetryPolicySchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelayMs: z.number().int().min(0),
  maxDelayMs: z.number().int().min(0),
}).strict();

export const FailurePolicySchema = z.enum(['fail_open', 'fail_closed']);

export const OracleConfigSchema = z.object({
  kind: z.enum(['http', 'heuristic']).default('heuristic'),
  url: z.string().url().optional(),
  path: z.string().startsWith('/').optional(),
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  qualityPreset: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(10_000),
  retry: RetryPolicySchema.default({ maxRetries: 2, baseDelayMs: 500, maxDelayMs: 5_000 }),
  fallbackAnswer: z.string().min(1).optional(),
}).strict().superRefine((value, ctx) => {
  if (value.kind === 'http' && !value.url) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'url is required for an http oracle' });
  }
});

export const StoreConfigSchema = z.object({
  kind: z.enum(['none', 'memory', 'sqlite', 'http']).default('none'),
  path: z.string().min(1).optional(),
  url: z.string().url().optional(),
  projectId: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(5_000),
  retry: RetryPolicySchema.default({ maxRetries: 1, baseDelayMs: 250, maxDelayMs: 2_000 }),
  similarityThreshold: z.number().min(0).max(1).optional(),
}).strict().superRefine((value, ctx) => {
  if (value.kind === 'sqlite' && !value.path) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['path'], message: 'path is required for a sqlite store' });
  }
  if (value.kind === 'http' && (!value.url || !value.projectId)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'url and projectId are required for an http store' });
  }
});

function defaultThresholdInput(): Record<string, { threshold: number; direction: 'below' | 'above'; roles: Array<'guardrail' | 'escalation'> }> {
  return Object.fromEntries(
    Object.entries(DEFAULT_THRESHOLDS).map(([name, rule]) => [
      name,
      { threshold: rule.threshold, direction: rule.direction, roles: [...rule.roles] },
    ])
  );
}

export const GateConfigSchema = z.object({
  oracle: OracleConfigSchema.default({}),
  store: StoreConfigSchema.default({}),
  thresholds: ThresholdTableSchema.default(defaultThresholdInput),
  failurePolicy: FailurePolicySchema.default('fail_open'),
  guardrailMessage: z.string().min(1).optional(),
}).strict();

export type GateConfig = z.infer<typeof GateConfigSchema>;
export type OracleConfig = z.infer<typeof OracleConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
