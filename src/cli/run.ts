/**
 * @fileoverview Command dispatch for the answer-gate CLI
 *
 * Kept apart from the bin entry so it can be driven in-process.
 */

import { showHelp } from './help.js';
import { detectCommand } from './commands/detect.js';
import { validateCommand } from './commands/validate.js';
import { remediationCommand } from './commands/remediation.js';
import { defaultRuntimeLoader, type CommandContext, type RuntimeLoader } from './commands/shared.js';
import { createError, formatError, formatErrorJson, getExitCode, toCliError } from './errors.js';

type Command = 'detect' | 'validate' | 'remediation';

const COMMANDS: Record<Command, (context: CommandContext) => Promise<void>> = {
  detect: detectCommand,
  validate: validateCommand,
  remediation: remediationCommand,
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Check if --json flag is present in arguments
 */
function hasJsonFlag(args: string[]): boolean {
  return args.includes('--json');
}

function outputError(error: unknown, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(error) : formatError(error));
}

export interface RunCliOptions {
  loadRuntime?: RuntimeLoader;
}

/**
 * Run the CLI with `args` (without the node and script paths).
 *
 * @returns the process exit code
 */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const [command, ...rest] = args;
  const jsonMode = hasJsonFlag(args);

  if (command === '--version' || command === '-v') {
    const { GATE_VERSION } = await import('../index.js');
    console.log(`answer-gate ${GATE_VERSION.string}`);
    return 0;
  }

  if (command === undefined || command === '--help' || command === '-h' || command === 'help') {
    showHelp(command === 'help' ? rest[0] : undefined);
    return 0;
  }

  if (!isCommand(command)) {
    const error = createError('UNKNOWN_COMMAND', `Unknown command: ${command}`, {
      available: Object.keys(COMMANDS),
    });
    outputError(error, jsonMode);
    return getExitCode(error);
  }

  if (rest.includes('--help') || rest.includes('-h')) {
    showHelp(command);
    return 0;
  }

  try {
    await COMMANDS[command]({ args: rest, loadRuntime: options.loadRuntime ?? defaultRuntimeLoader });
    return 0;
  } catch (error) {
    const cliError = toCliError(error);
    outputError(cliError, jsonMode);
    return getExitCode(cliError);
  }
}
