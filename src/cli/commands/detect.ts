import { parseArgs } from 'node:util';
import type { MetricThreshold, Verdict } from '../../types.js';
import type { GateConfig } from '../../config/schema.js';
import { thresholdFor } from '../../verdict/engine.js';
import { formatScore, printJson, printKeyValue, printTable } from '../format.js';
import { COMMON_OPTIONS, TURN_OPTIONS, buildTurnInput, withUsageErrors, type CommandContext } from './shared.js';

const USAGE = 'answer-gate detect --query <text> --response <text> [--context <text>...] [--config <path>] [--json]';

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}

function describeRule(rule: MetricThreshold): string {
  const base = `${rule.direction} ${rule.threshold}`;
  const overrides = rule.roles
    .filter((role) => rule.roleThresholds?.[role] !== undefined)
    .map((role) => `${role} ${thresholdFor(rule, role)}`);
  return overrides.length > 0 ? `${base} (${overrides.join(', ')})` : base;
}

/**
 * Print a verdict with the per-metric breakdown against its thresholds.
 */
export function printVerdict(verdict: Verdict, thresholds: GateConfig['thresholds']): void {
  console.log('Verdict:');
  printKeyValue([
    { key: 'Guardrail', value: yesNo(verdict.shouldGuardrail) },
    { key: 'Escalate', value: yesNo(verdict.shouldEscalate) },
    { key: 'Failing', value: verdict.failingMetrics.length > 0 ? verdict.failingMetrics.join(', ') : 'none' },
  ]);
  if (verdict.degraded) {
    printKeyValue([{ key: 'Degraded', value: `${verdict.degraded.reason} (${verdict.degraded.policy})` }]);
  }

  const names = Object.keys(verdict.scores).sort();
  if (names.length === 0) return;

  console.log();
  const failing = new Set(verdict.failingMetrics);
  printTable(
    ['Metric', 'Score', 'Threshold', 'Failing'],
    names.map((name) => {
      const rule = thresholds[name];
      return [
        name,
        formatScore(verdict.scores[name].score),
        rule ? describeRule(rule) : '-',
        yesNo(failing.has(name)),
      ];
    })
  );
}

export async function detectCommand(context: CommandContext): Promise<void> {
  const { values } = withUsageErrors(() =>
    parseArgs({
      args: context.args,
      options: { ...COMMON_OPTIONS, ...TURN_OPTIONS },
      allowPositionals: false,
      strict: true,
    })
  );

  const runtime = context.loadRuntime(values.config);
  try {
    const turn = buildTurnInput(values, USAGE, runtime.config.oracle.fallbackAnswer);
    const verdict = await runtime.gate.detect(turn);

    if (values.json) {
      printJson(verdict);
      return;
    }
    printVerdict(verdict, runtime.config.thresholds);
  } finally {
    runtime.close();
  }
}
