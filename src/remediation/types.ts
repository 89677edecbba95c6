/**
 * @fileoverview Remediation store contract
 *
 * A remediation store (a "project") holds questions that were escalated and
 * the expert answers given to them. Entries start `unanswered` and become
 * `answered` when a reviewer supplies an answer. Answering again replaces the
 * answer and bumps `version` (latest wins). Entries do not expire.
 */

export type RemediationStatus = 'unanswered' | 'answered';

export interface RemediationEntry {
  id: string;
  question: string;
  normalizedQuestion: string;
  answer: string | null;
  status: RemediationStatus;
  /** Context, response, scores and caller tags captured at escalation */
  metadata: Record<string, unknown>;
  /** Escalations and lookup hits that resolved to this entry */
  seenCount: number;
  /** Incremented on every answer change */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface RemediationMatch {
  entryId: string;
  question: string;
  answer: string;
  similarity: number;
}

export interface LookupOptions {
  /** Overrides the store's own similarity threshold */
  similarityThreshold?: number;
}

export interface EscalationRecord {
  entryId: string;
  /** False when the query was folded into an existing unanswered entry */
  created: boolean;
}

export interface RemediationListFilter {
  status?: RemediationStatus;
  limit?: number;
}

/**
 * A remediation store. `signal` on the gate's calls cancels an in-flight
 * remote request; local stores finish synchronously and take none.
 */
export interface RemediationStore {
  /**
   * Best answered entry whose question is similar enough to `query`, or null.
   */
  lookup(query: string, options?: LookupOptions, signal?: AbortSignal): Promise<RemediationMatch | null>;
  /**
   * Log `query` as unanswered, folding it into a similar unanswered entry
   * when one exists.
   */
  escalate(query: string, metadata: Record<string, unknown>, signal?: AbortSignal): Promise<EscalationRecord>;
  /** Count a lookup hit against an entry */
  recordHit(entryId: string, signal?: AbortSignal): Promise<void>;
  /** Set or replace the expert answer of an entry */
  answer(entryId: string, answer: string): Promise<RemediationEntry>;
  /** Add an answered entry directly */
  addRemediation(question: string, answer: string): Promise<RemediationEntry>;
  get(entryId: string): Promise<RemediationEntry | null>;
  list(filter?: RemediationListFilter): Promise<RemediationEntry[]>;
}

/** Default question similarity for local stores. */
export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;
