/**
 * @fileoverview Oracle payload normalization
 *
 * Accepted payload shapes:
 * - `{ "scores": { "<metric>": <entry> } }`
 * - `{ "<metric>": <entry> }`
 *
 * where `<entry>` is a number, or an object with a numeric `score` and an
 * optional `explanation` (or `log.explanation`). Scores must lie in [0, 1].
 */

import { z } from 'zod';
import { OracleMalformedResponseError } from '../core/errors.js';
import type { MetricScore, MetricScores } from '../types.js';

const ScoreValueSchema = z.number().finite().min(0).max(1);

const ScoreObjectSchema = z.object({
  score: ScoreValueSchema,
  explanation: z.string().nullish(),
  log: z.object({ explanation: z.string().nullish() }).passthrough().nullish(),
}).passthrough();

const ScoreEntrySchema = z.union([ScoreValueSchema, ScoreObjectSchema]);

const ScoreMapSchema = z.record(z.string().min(1), ScoreEntrySchema);

type ScoreEntry = z.infer<typeof ScoreEntrySchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

function toMetricScore(entry: ScoreEntry): MetricScore {
  if (typeof entry === 'number') {
    return { score: entry };
  }
  const explanation = entry.explanation ?? entry.log?.explanation ?? undefined;
  return explanation ? { score: entry.score, explanation } : { score: entry.score };
}

/**
 * Normalize a raw oracle payload into metric scores.
 *
 * @throws OracleMalformedResponseError when the payload does not match
 */
export function parseOracleScores(payload: unknown): MetricScores {
  const candidate = isRecord(payload) && isRecord(payload.scores) ? payload.scores : payload;
  if (!isRecord(candidate)) {
    throw new OracleMalformedResponseError(['payload is not an object'], payload);
  }

  const parsed = ScoreMapSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new OracleMalformedResponseError(issues, payload);
  }

  const scores: MetricScores = {};
  for (const [name, entry] of Object.entries(parsed.data)) {
    scores[name] = toMetricScore(entry);
  }
  return scores;
}
