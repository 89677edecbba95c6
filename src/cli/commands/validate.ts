import { parseArgs } from 'node:util';
import { composeResponse } from '../../gate/compose.js';
import { printJson, printKeyValue } from '../format.js';
import { printVerdict } from './detect.js';
import {
  COMMON_OPTIONS,
  TURN_OPTIONS,
  buildTurnInput,
  parseTags,
  requireStore,
  withUsageErrors,
  type CommandContext,
} from './shared.js';

const USAGE =
  'answer-gate validate --query <text> --response <text> [--context <text>...] [--tag key=value...] [--config <path>] [--json]';

export async function validateCommand(context: CommandContext): Promise<void> {
  const { values } = withUsageErrors(() =>
    parseArgs({
      args: context.args,
      options: {
        ...COMMON_OPTIONS,
        ...TURN_OPTIONS,
        tag: { type: 'string', multiple: true },
      },
      allowPositionals: false,
      strict: true,
    })
  );

  const runtime = context.loadRuntime(values.config);
  try {
    requireStore(runtime);
    const turn = buildTurnInput(values, USAGE, runtime.config.oracle.fallbackAnswer);
    const result = await runtime.gate.validate({ ...turn, metadata: parseTags(values.tag) });
    const finalResponse = composeResponse(turn.response, result, runtime.config.guardrailMessage);

    if (values.json) {
      printJson({ ...result, finalResponse });
      return;
    }

    printVerdict(result.verdict, runtime.config.thresholds);
    console.log();
    console.log('Remediation:');
    printKeyValue([
      { key: 'Expert answer', value: result.expertAnswer },
      { key: 'Escalated', value: result.escalated ? 'yes' : 'no' },
      ...(result.storeError ? [{ key: 'Store error', value: result.storeError }] : []),
    ]);
    console.log();
    console.log('Final response:');
    console.log(finalResponse);
  } finally {
    runtime.close();
  }
}
