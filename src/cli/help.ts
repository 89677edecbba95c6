/**
 * @fileoverview Detailed help text for answer-gate CLI commands
 */

const HELP_TEXT: Record<string, string> = {
  main: `
answer-gate - Score, guardrail and escalate answers from a question-answering pipeline

USAGE:
    answer-gate <command> [options]

COMMANDS:
    detect              Score a response and print the verdict
    validate            Score a response and consult the remediation store
    remediation         List, inspect, add and answer remediation entries
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -c, --config <path> YAML or JSON config file
    --json              Print results (and errors) as JSON

ENVIRONMENT:
    GATE_ORACLE_URL, GATE_ORACLE_API_KEY, GATE_ORACLE_MODEL, GATE_QUALITY_PRESET,
    GATE_ORACLE_TIMEOUT_MS, GATE_STORE_PATH, GATE_STORE_URL, GATE_STORE_PROJECT_ID,
    GATE_STORE_API_KEY, GATE_FAILURE_POLICY, GATE_LOG_LEVEL

EXAMPLES:
    answer-gate detect -q "What is the return policy?" -r "30 days." --context "Returns within 30 days."
    answer-gate validate -c gate.config.yaml -q "Can I get a refund?" -r "I cannot answer."
    answer-gate remediation list --status unanswered

For more information on a specific command, run:
    answer-gate help <command>
`,

  detect: `
answer-gate detect - Score a response and print the verdict

USAGE:
    answer-gate detect --query <text> --response <text> [options]

OPTIONS:
    -q, --query <text>        The user question
    -r, --response <text>     The response to judge
    --context <text>          Retrieved context; repeat for several chunks
    --system-prompt <text>    System prompt the generator used (default: built-in RAG prompt)
    -c, --config <path>       Config file
    --json                    Print the verdict as JSON

DESCRIPTION:
    Runs the evaluation oracle and the threshold policy only. Never reads or
    writes the remediation store.
`,

  validate: `
answer-gate validate - Score a response and consult the remediation store

USAGE:
    answer-gate validate --query <text> --response <text> [options]

OPTIONS:
    -q, --query <text>        The user question
    -r, --response <text>     The response to judge
    --context <text>          Retrieved context; repeat for several chunks
    --system-prompt <text>    System prompt the generator used
    --tag <key=value>         Metadata logged with an escalated question; repeatable
    -c, --config <path>       Config file (must configure a store)
    --json                    Print the result as JSON

DESCRIPTION:
    When the verdict escalates, prints the stored expert answer for a similar
    question, or logs the question as unanswered for expert review.
`,

  remediation: `
answer-gate remediation - Manage remediation entries

USAGE:
    answer-gate remediation list [--status unanswered|answered] [--limit N]
    answer-gate remediation show <entry-id>
    answer-gate remediation add --question <text> --answer <text>
    answer-gate remediation answer <entry-id> --answer <text>

OPTIONS:
    -c, --config <path>       Config file (must configure a store)
    --json                    Print entries as JSON

DESCRIPTION:
    Answering an entry again replaces its answer and bumps its version.
`,
};

export function showHelp(command?: string): void {
  if (command && Object.hasOwn(HELP_TEXT, command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return Object.hasOwn(HELP_TEXT, command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
