import { parseArgs } from 'node:util';
import type { RemediationEntry, RemediationStatus } from '../../remediation/types.js';
import { createError } from '../errors.js';
import { printJson, printKeyValue, printTable, truncate } from '../format.js';
import {
  COMMON_OPTIONS,
  parsePositiveInt,
  requireOption,
  requireStore,
  withUsageErrors,
  type CommandContext,
} from './shared.js';

type Subcommand = 'list' | 'show' | 'add' | 'answer';

const USAGE: Record<Subcommand, string> = {
  list: 'answer-gate remediation list [--status unanswered|answered] [--limit N] [--json]',
  show: 'answer-gate remediation show <entry-id> [--json]',
  add: 'answer-gate remediation add --question <text> --answer <text> [--json]',
  answer: 'answer-gate remediation answer <entry-id> --answer <text> [--json]',
};

function isSubcommand(value: string | undefined): value is Subcommand {
  return value !== undefined && Object.hasOwn(USAGE, value);
}

function parseStatus(value: string | undefined): RemediationStatus | undefined {
  if (value === undefined) return undefined;
  if (value === 'unanswered' || value === 'answered') return value;
  throw createError('INVALID_ARGUMENT', `--status must be "unanswered" or "answered", got "${value}"`);
}

function requireEntryId(positionals: string[], usage: string): string {
  const entryId = positionals[0];
  if (!entryId) {
    throw createError('INVALID_ARGUMENT', `An entry id is required. Usage: ${usage}`);
  }
  return entryId;
}

function printEntry(entry: RemediationEntry): void {
  printKeyValue([
    { key: 'ID', value: entry.id },
    { key: 'Status', value: entry.status },
    { key: 'Question', value: entry.question },
    { key: 'Answer', value: entry.answer },
    { key: 'Seen', value: entry.seenCount },
    { key: 'Version', value: entry.version },
    { key: 'Created', value: entry.createdAt.toISOString() },
    { key: 'Updated', value: entry.updatedAt.toISOString() },
  ]);
}

export async function remediationCommand(context: CommandContext): Promise<void> {
  const [subcommand, ...rest] = context.args;
  if (!isSubcommand(subcommand)) {
    throw createError(
      'INVALID_ARGUMENT',
      `Unknown remediation subcommand: ${subcommand ?? '(none)'}. Use one of: ${Object.keys(USAGE).join(', ')}`
    );
  }

  const { values, positionals } = withUsageErrors(() =>
    parseArgs({
      args: rest,
      options: {
        ...COMMON_OPTIONS,
        status: { type: 'string' },
        limit: { type: 'string' },
        question: { type: 'string' },
        answer: { type: 'string' },
      },
      allowPositionals: true,
      strict: true,
    })
  );

  const runtime = context.loadRuntime(values.config);
  try {
    const store = requireStore(runtime);

    switch (subcommand) {
      case 'list': {
        const entries = await store.list({
          status: parseStatus(values.status),
          limit: parsePositiveInt(values.limit, 'limit'),
        });
        if (values.json) {
          printJson(entries);
          return;
        }
        if (entries.length === 0) {
          console.log('No remediation entries.');
          return;
        }
        printTable(
          ['ID', 'Status', 'Seen', 'Question', 'Answer'],
          entries.map((entry) => [
            entry.id,
            entry.status,
            String(entry.seenCount),
            truncate(entry.question, 48),
            entry.answer === null ? '-' : truncate(entry.answer, 48),
          ])
        );
        return;
      }

      case 'show': {
        const entryId = requireEntryId(positionals, USAGE.show);
        const entry = await store.get(entryId);
        if (!entry) {
          throw createError('ENTRY_NOT_FOUND', `Remediation entry not found: ${entryId}`, { entryId });
        }
        if (values.json) {
          printJson(entry);
          return;
        }
        printEntry(entry);
        return;
      }

      case 'add': {
        const question = requireOption(values.question, 'question', USAGE.add);
        const answer = requireOption(values.answer, 'answer', USAGE.add);
        const entry = await store.addRemediation(question, answer);
        if (values.json) {
          printJson(entry);
          return;
        }
        console.log(`Added remediation ${entry.id}`);
        return;
      }

      case 'answer': {
        const entryId = requireEntryId(positionals, USAGE.answer);
        const answer = requireOption(values.answer, 'answer', USAGE.answer);
        const entry = await store.answer(entryId, answer);
        if (values.json) {
          printJson(entry);
          return;
        }
        console.log(`Answered ${entry.id} (version ${entry.version})`);
        return;
      }
    }
  } finally {
    runtime.close();
  }
}
