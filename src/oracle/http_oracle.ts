/**
 * @fileoverview JSON-over-HTTP evaluation oracle
 *
 * POSTs the request to `${baseUrl}${path}` and returns the parsed JSON body.
 * Status handling: 429 and 5xx are retryable, other 4xx are not. Retries and
 * deadlines belong to the adapter; this class performs exactly one request.
 */

import { OracleMalformedResponseError, getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { OracleRequestError, type EvaluationOracle, type OracleRequest, type OracleResponse } from './types.js';
import type { ChatMessage } from '../types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpEvaluationOracleOptions {
  baseUrl: string;
  apiKey?: string;
  /** Defaults to `/v1/evaluate` */
  path?: string;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: FetchLike;
}

function toWireMessage(message: ChatMessage): Record<string, unknown> {
  const wire: Record<string, unknown> = { role: message.role, content: message.content };
  if (message.toolCallId) wire.tool_call_id = message.toolCallId;
  if (message.toolCalls && message.toolCalls.length > 0) {
    wire.tool_calls = message.toolCalls.map((call) => ({
      id: call.id,
      type: 'function',
      function: { name: call.name, arguments: call.arguments },
    }));
  }
  return wire;
}

export class HttpEvaluationOracle implements EvaluationOracle {
  readonly name = 'http';
  private readonly url: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpEvaluationOracleOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, '')}${options.path ?? '/v1/evaluate'}`;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }
    return headers;
  }

  async evaluate(request: OracleRequest, signal?: AbortSignal): Promise<OracleResponse> {
    const body = {
      query: request.query,
      context: request.context,
      prompt: request.prompt.map(toWireMessage),
      response: request.response,
      metrics: request.metrics,
      model: request.model,
      quality_preset: request.qualityPreset,
    };

    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal,
      });
    } catch (error) {
      throw new OracleRequestError(`network error: ${getErrorMessage(error)}`, true);
    }

    const text = await response.text();
    logDebug('Oracle HTTP response', { url: this.url, status: response.status });

    if (!response.ok) {
      const retryable = response.status === 429 || response.status >= 500;
      throw new OracleRequestError(`HTTP ${response.status}: ${text.slice(0, 200)}`, retryable, response.status);
    }

    try {
      const payload: unknown = JSON.parse(text);
      return payload;
    } catch {
      throw new OracleMalformedResponseError(['response body is not JSON'], text.slice(0, 200));
    }
  }
}
