/**
 * @fileoverview Threshold table schema and defaults
 *
 * Threshold tables are loaded from configuration, so they are validated with
 * zod once at startup and rejected with a ConfigurationError. The verdict
 * engine itself assumes a validated table.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import type { MetricThreshold, ThresholdTable } from '../types.js';

export const ThresholdDirectionSchema = z.enum(['below', 'above']);

export const MetricRoleSchema = z.enum(['guardrail', 'escalation']);

const ScoreSchema = z.number().min(0).max(1);

export const MetricThresholdSchema = z.object({
  threshold: ScoreSchema,
  direction: ThresholdDirectionSchema,
  roles: z
    .array(MetricRoleSchema)
    .min(1, 'at least one role is required')
    .refine((roles) => new Set(roles).size === roles.length, 'roles must be unique'),
  roleThresholds: z.object({
    guardrail: ScoreSchema.optional(),
    escalation: ScoreSchema.optional(),
  }).strict().optional(),
}).strict().superRefine((rule, ctx) => {
  for (const role of MetricRoleSchema.options) {
    if (rule.roleThresholds?.[role] !== undefined && !rule.roles.includes(role)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['roleThresholds', role],
        message: `${role} is not one of the metric's roles`,
      });
    }
  }
});

export const ThresholdTableSchema = z.record(z.string().min(1), MetricThresholdSchema);

/**
 * Defaults used when a deployment does not supply its own table:
 * low trustworthiness both guardrails and escalates, unhelpful answers
 * (typically the "I don't know" fallback) escalate only.
 */
const defaultThresholds: ThresholdTable = {
  trustworthiness: { threshold: 0.7, direction: 'below', roles: ['escalation', 'guardrail'] },
  response_helpfulness: { threshold: 0.23, direction: 'below', roles: ['escalation'] },
};

export const DEFAULT_THRESHOLDS: ThresholdTable = Object.freeze(defaultThresholds);

/**
 * Validate a raw threshold table.
 *
 * @throws ConfigurationError listing every invalid entry
 */
export function validateThresholdTable(raw: unknown): ThresholdTable {
  const parsed = ThresholdTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ConfigurationError('Invalid threshold table', issues);
  }
  const table: Record<string, MetricThreshold> = {};
  for (const [name, entry] of Object.entries(parsed.data)) {
    const rule: MetricThreshold = { ...entry, roles: Object.freeze([...entry.roles]) };
    if (entry.roleThresholds) rule.roleThresholds = Object.freeze({ ...entry.roleThresholds });
    table[name] = Object.freeze(rule);
  }
  return Object.freeze(table);
}

/**
 * Metric names the oracle must be asked for, sorted for stable requests.
 */
export function requiredMetrics(table: ThresholdTable): string[] {
  return Object.keys(table).sort();
}

/**
 * Merge overrides onto a base table. An override replaces the whole entry.
 */
export function mergeThresholds(base: ThresholdTable, overrides: ThresholdTable): ThresholdTable {
  return Object.freeze({ ...base, ...overrides });
}
