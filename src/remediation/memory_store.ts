/**
 * @fileoverview In-memory remediation store
 *
 * Process-local, lost on restart. Suited to tests and single-process demos.
 */

import { randomUUID } from 'node:crypto';
import { RemediationEntryNotFoundError } from '../core/errors.js';
import { normalizeText } from '../utils/text.js';
import { findBestMatch } from './matching.js';
import {
  DEFAULT_SIMILARITY_THRESHOLD,
  type EscalationRecord,
  type LookupOptions,
  type RemediationEntry,
  type RemediationListFilter,
  type RemediationMatch,
  type RemediationStore,
} from './types.js';

export interface LocalStoreOptions {
  similarityThreshold?: number;
  /** Injected for tests */
  now?: () => Date;
  /** Injected for tests */
  generateId?: () => string;
}

function cloneEntry(entry: RemediationEntry): RemediationEntry {
  return {
    ...entry,
    metadata: { ...entry.metadata },
    createdAt: new Date(entry.createdAt.getTime()),
    updatedAt: new Date(entry.updatedAt.getTime()),
  };
}

export class InMemoryRemediationStore implements RemediationStore {
  private readonly entries = new Map<string, RemediationEntry>();
  private readonly similarityThreshold: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: LocalStoreOptions = {}) {
    this.similarityThreshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? (() => randomUUID());
  }

  get size(): number {
    return this.entries.size;
  }

  async lookup(query: string, options: LookupOptions = {}): Promise<RemediationMatch | null> {
    const threshold = options.similarityThreshold ?? this.similarityThreshold;
    const answered = Array.from(this.entries.values()).filter((entry) => entry.status === 'answered');
    const match = findBestMatch(answered, query, threshold);
    if (!match || match.entry.answer === null) return null;
    return {
      entryId: match.entry.id,
      question: match.entry.question,
      answer: match.entry.answer,
      similarity: match.similarity,
    };
  }

  async escalate(query: string, metadata: Record<string, unknown>): Promise<EscalationRecord> {
    const unanswered = Array.from(this.entries.values()).filter((entry) => entry.status === 'unanswered');
    const existing = findBestMatch(unanswered, query, this.similarityThreshold);
    if (existing) {
      existing.entry.seenCount += 1;
      existing.entry.updatedAt = this.now();
      return { entryId: existing.entry.id, created: false };
    }

    const timestamp = this.now();
    const entry: RemediationEntry = {
      id: this.generateId(),
      question: query,
      normalizedQuestion: normalizeText(query),
      answer: null,
      status: 'unanswered',
      metadata: { ...metadata },
      seenCount: 1,
      version: 0,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.entries.set(entry.id, entry);
    return { entryId: entry.id, created: true };
  }

  async recordHit(entryId: string): Promise<void> {
    const entry = this.require(entryId);
    entry.seenCount += 1;
  }

  async answer(entryId: string, answer: string): Promise<RemediationEntry> {
    const entry = this.require(entryId);
    entry.answer = answer;
    entry.status = 'answered';
    entry.version += 1;
    entry.updatedAt = this.now();
    return cloneEntry(entry);
  }

  async addRemediation(question: string, answer: string): Promise<RemediationEntry> {
    const timestamp = this.now();
    const entry: RemediationEntry = {
      id: this.generateId(),
      question,
      normalizedQuestion: normalizeText(question),
      answer,
      status: 'answered',
      metadata: {},
      seenCount: 0,
      version: 1,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.entries.set(entry.id, entry);
    return cloneEntry(entry);
  }

  async get(entryId: string): Promise<RemediationEntry | null> {
    const entry = this.entries.get(entryId);
    return entry ? cloneEntry(entry) : null;
  }

  async list(filter: RemediationListFilter = {}): Promise<RemediationEntry[]> {
    const matching = Array.from(this.entries.values())
      .filter((entry) => !filter.status || entry.status === filter.status)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
    const limited = filter.limit !== undefined ? matching.slice(0, filter.limit) : matching;
    return limited.map(cloneEntry);
  }

  private require(entryId: string): RemediationEntry {
    const entry = this.entries.get(entryId);
    if (!entry) throw new RemediationEntryNotFoundError(entryId);
    return entry;
  }
}
