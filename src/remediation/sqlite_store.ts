/**
 * @fileoverview SQLite-backed remediation store
 *
 * Persistent store on better-sqlite3. Question matching scans entries of the
 * relevant status and scores them with bigram similarity; exact normalized
 * matches are found through an index first.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import { RemediationEntryNotFoundError, getErrorMessage } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { normalizeText } from '../utils/text.js';
import { findBestMatch, type ScoredEntry } from './matching.js';
import type { LocalStoreOptions } from './memory_store.js';
import {
  DEFAULT_SIMILARITY_THRESHOLD,
  type EscalationRecord,
  type LookupOptions,
  type RemediationEntry,
  type RemediationListFilter,
  type RemediationMatch,
  type RemediationStatus,
  type RemediationStore,
} from './types.js';

/**
 * Row type for the remediation_entries table.
 */
interface RemediationRow {
  id: string;
  question: string;
  normalized_question: string;
  answer: string | null;
  status: string;
  metadata: string;
  seen_count: number;
  version: number;
  created_at: number;
  updated_at: number;
}

function toStatus(value: string): RemediationStatus {
  return value === 'answered' ? 'answered' : 'unanswered';
}

function parseMetadata(id: string, raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    logWarning('Remediation entry has unreadable metadata', { id, error: getErrorMessage(error) });
  }
  return {};
}

function rowToEntry(row: RemediationRow): RemediationEntry {
  return {
    id: row.id,
    question: row.question,
    normalizedQuestion: row.normalized_question,
    answer: row.answer,
    status: toStatus(row.status),
    metadata: parseMetadata(row.id, row.metadata),
    seenCount: row.seen_count,
    version: row.version,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export class SqliteRemediationStore implements RemediationStore {
  private readonly db: Database.Database;
  private readonly similarityThreshold: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  private readonly stmtGet: Database.Statement<[string], RemediationRow>;
  private readonly stmtByStatus: Database.Statement<[string], RemediationRow>;
  private readonly stmtByNormalized: Database.Statement<[string, string], RemediationRow>;
  private readonly stmtInsert: Database.Statement<[RemediationRow]>;
  private readonly stmtBumpSeen: Database.Statement<[number, string]>;
  private readonly stmtRecordHit: Database.Statement<[string]>;
  private readonly stmtAnswer: Database.Statement<[string, number, string]>;
  private readonly stmtListAll: Database.Statement<[], RemediationRow>;

  /**
   * @param db - The better-sqlite3 database instance (`:memory:` works for tests)
   */
  constructor(db: Database.Database, options: LocalStoreOptions = {}) {
    this.db = db;
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());

    this.ensureTable();

    this.stmtGet = this.db.prepare<[string], RemediationRow>(`
      SELECT * FROM remediation_entries WHERE id = ?
    `);

    this.stmtByStatus = this.db.prepare<[string], RemediationRow>(`
      SELECT * FROM remediation_entries WHERE status = ? ORDER BY created_at ASC, rowid ASC
    `);

    this.stmtByNormalized = this.db.prepare<[string, string], RemediationRow>(`
      SELECT * FROM remediation_entries
      WHERE normalized_question = ? AND status = ?
      ORDER BY updated_at DESC
      LIMIT 1
    `);

    this.stmtInsert = this.db.prepare<[RemediationRow]>(`
      INSERT INTO remediation_entries
        (id, question, normalized_question, answer, status, metadata, seen_count, version, created_at, updated_at)
      VALUES
        (@id, @question, @normalized_question, @answer, @status, @metadata, @seen_count, @version, @created_at, @updated_at)
    `);

    this.stmtBumpSeen = this.db.prepare<[number, string]>(`
      UPDATE remediation_entries SET seen_count = seen_count + 1, updated_at = ? WHERE id = ?
    `);

    this.stmtRecordHit = this.db.prepare<[string]>(`
      UPDATE remediation_entries SET seen_count = seen_count + 1 WHERE id = ?
    `);

    this.stmtAnswer = this.db.prepare<[string, number, string]>(`
      UPDATE remediation_entries
      SET answer = ?, status = 'answered', version = version + 1, updated_at = ?
      WHERE id = ?
    `);

    this.stmtListAll = this.db.prepare<[], RemediationRow>(`
      SELECT * FROM remediation_entries ORDER BY created_at ASC, rowid ASC
    `);
  }

  /**
   * Ensure the remediation_entries table exists with proper schema.
   */
  private ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS remediation_entries (
        id TEXT PRIMARY KEY,
        question TEXT NOT NULL,
        normalized_question TEXT NOT NULL,
        answer TEXT,
        status TEXT NOT NULL CHECK (status IN ('unanswered', 'answered')),
        metadata TEXT NOT NULL DEFAULT '{}',
        seen_count INTEGER NOT NULL DEFAULT 0,
        version INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_remediation_status ON remediation_entries(status);
      CREATE INDEX IF NOT EXISTS idx_remediation_normalized ON remediation_entries(normalized_question);
    `);
  }

  private findSimilar(query: string, status: RemediationStatus, threshold: number): ScoredEntry | null {
    const normalized = normalizeText(query);
    if (!normalized) return null;
    const exact = this.stmtByNormalized.get(normalized, status);
    if (exact) {
      return { entry: rowToEntry(exact), similarity: 1 };
    }
    return findBestMatch(this.stmtByStatus.all(status).map(rowToEntry), query, threshold);
  }

  async lookup(query: string, options: LookupOptions = {}): Promise<RemediationMatch | null> {
    const threshold = options.similarityThreshold ?? this.similarityThreshold;
    const match = this.findSimilar(query, 'answered', threshold);
    if (!match || match.entry.answer === null) return null;
    return {
      entryId: match.entry.id,
      question: match.entry.question,
      answer: match.entry.answer,
      similarity: match.similarity,
    };
  }

  async escalate(query: string, metadata: Record<string, unknown>): Promise<EscalationRecord> {
    const run = this.db.transaction((): EscalationRecord => {
      const existing = this.findSimilar(query, 'unanswered', this.similarityThreshold);
      if (existing) {
        this.stmtBumpSeen.run(this.now().getTime(), existing.entry.id);
        return { entryId: existing.entry.id, created: false };
      }
      const timestamp = this.now().getTime();
      const id = this.generateId();
      this.stmtInsert.run({
        id,
        question: query,
        normalized_question: normalizeText(query),
        answer: null,
        status: 'unanswered',
        metadata: JSON.stringify(metadata),
        seen_count: 1,
        version: 0,
        created_at: timestamp,
        updated_at: timestamp,
      });
      return { entryId: id, created: true };
    });
    return run();
  }

  async recordHit(entryId: string): Promise<void> {
    const result = this.stmtRecordHit.run(entryId);
    if (result.changes === 0) throw new RemediationEntryNotFoundError(entryId);
  }

  async answer(entryId: string, answer: string): Promise<RemediationEntry> {
    const result = this.stmtAnswer.run(answer, this.now().getTime(), entryId);
    if (result.changes === 0) throw new RemediationEntryNotFoundError(entryId);
    return this.require(entryId);
  }

  async addRemediation(question: string, answer: string): Promise<RemediationEntry> {
    const timestamp = this.now().getTime();
    const id = this.generateId();
    this.stmtInsert.run({
      id,
      question,
      normalized_question: normalizeText(question),
      answer,
      status: 'answered',
      metadata: '{}',
      seen_count: 0,
      version: 1,
      created_at: timestamp,
      updated_at: timestamp,
    });
    return this.require(id);
  }

  async get(entryId: string): Promise<RemediationEntry | null> {
    const row = this.stmtGet.get(entryId);
    return row ? rowToEntry(row) : null;
  }

  async list(filter: RemediationListFilter = {}): Promise<RemediationEntry[]> {
    const rows = filter.status ? this.stmtByStatus.all(filter.status) : this.stmtListAll.all();
    const limited = filter.limit !== undefined ? rows.slice(0, filter.limit) : rows;
    return limited.map(rowToEntry);
  }

  private require(entryId: string): RemediationEntry {
    const row = this.stmtGet.get(entryId);
    if (!row) throw new RemediationEntryNotFoundError(entryId);
    return rowToEntry(row);
  }
}
