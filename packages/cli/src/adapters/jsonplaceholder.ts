/**
 * JSONPlaceholder Adapter Base
 *
 * One GET per call, bounded by a timeout, no retries and no caching.
 * Every outcome, transport failures included, comes back as a ToolResult.
 */

import type { z } from 'zod';
import type { FetchOptions, ResourceAdapter, ToolResult } from '../tools/types.js';
import { adapterErrorResult, notFoundResult, okResult } from '../tools/result.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { logger } from '../utils/logger.js';

export type FetchFn = typeof fetch;

export interface JsonPlaceholderOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
}

export type PayloadCheck<T> = { ok: true; value: T } | { ok: false; error: string };

export abstract class JsonPlaceholderAdapter<T> implements ResourceAdapter<T> {
  abstract readonly toolName: string;
  /** Name of the id in diagnostics, e.g. "post_id" */
  protected abstract readonly idLabel: string;
  /** Resource name in not-found diagnostics, e.g. "post" */
  protected abstract readonly resource: string;
  protected abstract readonly schema: z.ZodType<T>;

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;

  constructor(options: JsonPlaceholderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  protected abstract buildPath(id: number): string;

  protected url(id: number): string {
    return `${this.baseUrl}${this.buildPath(id)}`;
  }

  protected checkPayload(body: unknown): PayloadCheck<T> {
    const parsed = this.schema.safeParse(body);
    if (parsed.success) {
      return { ok: true, value: parsed.data };
    }
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, error: `unexpected payload${where}: ${issue?.message ?? 'invalid'}` };
  }

  async fetch(id: number, options: FetchOptions = {}): Promise<ToolResult<T>> {
    if (!Number.isSafeInteger(id) || id <= 0) {
      return adapterErrorResult(this.toolName, `${this.idLabel} must be a positive integer`);
    }

    const url = this.url(id);
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    logger.debug(`[${this.toolName}] GET ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal
      });
    } catch (error) {
      const reason = options.signal?.aborted
        ? 'request cancelled'
        : timeout.aborted
          ? `timeout after ${this.timeoutMs}ms`
          : `connection failed: ${getErrorMessage(error)}`;
      logger.warn(`[${this.toolName}] ${reason}`, { url });
      return adapterErrorResult(this.toolName, reason);
    }

    if (response.status === 404) {
      return notFoundResult(this.toolName, `${this.resource} ${id} not found`);
    }
    if (!response.ok) {
      logger.warn(`[${this.toolName}] unexpected status ${response.status}`, { url });
      return adapterErrorResult(this.toolName, `HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      logger.warn(`[${this.toolName}] unreadable body`, { url, error: getErrorMessage(error) });
      return adapterErrorResult(this.toolName, 'response body is not JSON');
    }

    const checked = this.checkPayload(body);
    if (!checked.ok) {
      logger.warn(`[${this.toolName}] ${checked.error}`, { url });
      return adapterErrorResult(this.toolName, checked.error);
    }

    return okResult(this.toolName, checked.value);
  }
}
