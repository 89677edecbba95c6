/**
 * @fileoverview Remote remediation store (project API client)
 *
 * Talks JSON over HTTP to a hosted project. Matching and deduplication happen
 * server side; this client only validates payload shapes.
 *
 * Routes, relative to `${baseUrl}/v1/projects/${projectId}`:
 *   POST   /remediations/lookup         { query, similarity_threshold? } -> { match }
 *   POST   /remediations/escalate       { query, metadata }              -> { id, created }
 *   POST   /remediations/:id/hits
 *   PUT    /remediations/:id/answer     { answer }                       -> entry
 *   POST   /remediations                { question, answer }             -> entry
 *   GET    /remediations/:id                                             -> entry
 *   GET    /remediations?status&limit                                    -> { entries }
 */

import { z } from 'zod';
import {
  RemediationEntryNotFoundError,
  StoreUnavailableError,
  getErrorMessage,
  type StoreOperation,
} from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { normalizeText } from '../utils/text.js';
import type { FetchLike } from '../oracle/http_oracle.js';
import type {
  EscalationRecord,
  LookupOptions,
  RemediationEntry,
  RemediationListFilter,
  RemediationMatch,
  RemediationStore,
} from './types.js';

const EntrySchema = z.object({
  id: z.string(),
  question: z.string(),
  normalized_question: z.string().optional(),
  answer: z.string().nullable(),
  status: z.enum(['unanswered', 'answered']),
  metadata: z.record(z.unknown()).optional(),
  seen_count: z.number().int().nonnegative().optional(),
  version: z.number().int().nonnegative().optional(),
  created_at: z.string(),
  updated_at: z.string(),
});

const LookupResponseSchema = z.object({
  match: z
    .object({
      id: z.string(),
      question: z.string(),
      answer: z.string(),
      similarity: z.number().min(0).max(1),
    })
    .nullable(),
});

const EscalateResponseSchema = z.object({ id: z.string(), created: z.boolean() });

const ListResponseSchema = z.object({ entries: z.array(EntrySchema) });

type EntryPayload = z.infer<typeof EntrySchema>;

function toEntry(payload: EntryPayload): RemediationEntry {
  return {
    id: payload.id,
    question: payload.question,
    normalizedQuestion: payload.normalized_question ?? normalizeText(payload.question),
    answer: payload.answer,
    status: payload.status,
    metadata: payload.metadata ?? {},
    seenCount: payload.seen_count ?? 0,
    version: payload.version ?? 0,
    createdAt: new Date(payload.created_at),
    updatedAt: new Date(payload.updated_at),
  };
}

export interface HttpRemediationStoreOptions {
  baseUrl: string;
  projectId: string;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

interface RequestOptions {
  body?: unknown;
  /** Turns a 404 into RemediationEntryNotFoundError */
  entryId?: string;
  signal?: AbortSignal;
}

export class HttpRemediationStore implements RemediationStore {
  private readonly root: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpRemediationStoreOptions) {
    this.root = `${options.baseUrl.replace(/\/+$/, '')}/v1/projects/${encodeURIComponent(options.projectId)}`;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  private async request<T>(
    operation: StoreOperation,
    method: string,
    path: string,
    schema: z.ZodType<T>,
    init: RequestOptions = {},
  ): Promise<T> {
    const { body, entryId, signal } = init;
    const url = `${this.root}${path}`;
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: this.headers(),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new StoreUnavailableError(operation, `network error: ${getErrorMessage(error)}`);
    }

    const text = await response.text();
    logDebug('Remediation store HTTP response', { method, url, status: response.status });

    if (response.status === 404 && entryId !== undefined) {
      throw new RemediationEntryNotFoundError(entryId);
    }
    if (!response.ok) {
      throw new StoreUnavailableError(operation, `HTTP ${response.status}: ${text.slice(0, 200)}`);
    }

    let payload: unknown = null;
    if (text.length > 0) {
      try {
        payload = JSON.parse(text);
      } catch {
        throw new StoreUnavailableError(operation, 'response body is not JSON');
      }
    }
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new StoreUnavailableError(operation, `unexpected payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  async lookup(query: string, options: LookupOptions = {}, signal?: AbortSignal): Promise<RemediationMatch | null> {
    const body: Record<string, unknown> = { query };
    if (options.similarityThreshold !== undefined) body.similarity_threshold = options.similarityThreshold;
    const { match } = await this.request('lookup', 'POST', '/remediations/lookup', LookupResponseSchema, {
      body,
      signal,
    });
    if (!match) return null;
    return { entryId: match.id, question: match.question, answer: match.answer, similarity: match.similarity };
  }

  async escalate(query: string, metadata: Record<string, unknown>, signal?: AbortSignal): Promise<EscalationRecord> {
    const result = await this.request('escalate', 'POST', '/remediations/escalate', EscalateResponseSchema, {
      body: { query, metadata },
      signal,
    });
    return { entryId: result.id, created: result.created };
  }

  async recordHit(entryId: string, signal?: AbortSignal): Promise<void> {
    await this.request('record_hit', 'POST', `/remediations/${encodeURIComponent(entryId)}/hits`, z.unknown(), {
      body: {},
      entryId,
      signal,
    });
  }

  async answer(entryId: string, answer: string): Promise<RemediationEntry> {
    const entry = await this.request(
      'answer',
      'PUT',
      `/remediations/${encodeURIComponent(entryId)}/answer`,
      EntrySchema,
      { body: { answer }, entryId },
    );
    return toEntry(entry);
  }

  async addRemediation(question: string, answer: string): Promise<RemediationEntry> {
    const entry = await this.request('add', 'POST', '/remediations', EntrySchema, { body: { question, answer } });
    return toEntry(entry);
  }

  async get(entryId: string): Promise<RemediationEntry | null> {
    try {
      const entry = await this.request('get', 'GET', `/remediations/${encodeURIComponent(entryId)}`, EntrySchema, { entryId });
      return toEntry(entry);
    } catch (error) {
      if (error instanceof RemediationEntryNotFoundError) return null;
      throw error;
    }
  }

  async list(filter: RemediationListFilter = {}): Promise<RemediationEntry[]> {
    const params = new URLSearchParams();
    if (filter.status) params.set('status', filter.status);
    if (filter.limit !== undefined) params.set('limit', String(filter.limit));
    const query = params.toString();
    const { entries } = await this.request('list', 'GET', `/remediations${query ? `?${query}` : ''}`, ListResponseSchema);
    return entries.map(toEntry);
  }
}
