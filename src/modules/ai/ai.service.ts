import { createHash } from 'node:crypto';
import NodeCache from 'node-cache';
import { isRecord } from '../../core/row-values.js';
import type { WarehouseClient } from '../../core/warehouse-client.js';
import type { AdvisoryResult, CacheStats } from './types/ai.types.js';

const CORTEX_COMPLETE_SQL = 'SELECT SNOWFLAKE.CORTEX.COMPLETE(?, ?) AS response';

const FEATURE_DISABLED_PATTERN = /unknown function|cortex.*(disabled|not enabled|not available)|not authorized|insufficient privileges/i;

interface AIServiceCacheStats extends CacheStats {
  avgCompletionMs: number;
}

/**
 * Anything that can run a completion through an open warehouse session.
 * Returns the raw COMPLETE value; shape varies with model and options.
 */
export interface CompletionModel {
  complete(client: WarehouseClient, model: string, prompt: string): Promise<unknown>;
}

class CortexModel implements CompletionModel {
  async complete(client: WarehouseClient, model: string, prompt: string): Promise<unknown> {
    const result = await client.query(CORTEX_COMPLETE_SQL, [model, prompt]);
    return result.rows[0]?.response ?? null;
  }
}

export class AIServiceError extends Error {
  constructor(
    message: string,
    readonly code: 'AI_REQUEST_FAILED' | 'AI_RESPONSE_INVALID' | 'AI_FEATURE_DISABLED' | 'AI_NO_SESSION',
    readonly details?: string
  ) {
    super(message);
    this.name = 'AIServiceError';
  }
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() ? value : null;
}

/**
 * Pull the answer text out of a COMPLETE response: a bare string, an
 * OpenAI-style `choices[0]` object, a top-level `content` or `text`, else the
 * whole response as indented JSON. Null for an empty response.
 */
export function extractCompletionText(response: unknown): string | null {
  if (response === null || response === undefined) return null;
  if (typeof response === 'string') return nonEmptyString(response);

  if (isRecord(response)) {
    const choice: unknown = Array.isArray(response.choices) ? response.choices[0] : undefined;
    if (isRecord(choice)) {
      const message = isRecord(choice.message) ? nonEmptyString(choice.message.content) : null;
      const text = message ?? nonEmptyString(choice.text);
      if (text) return text;
    }

    const direct = nonEmptyString(response.content) ?? nonEmptyString(response.text);
    if (direct) return direct;
  }

  return JSON.stringify(response, null, 2);
}

interface AIServiceDependencies {
  model?: CompletionModel;
  cacheTtlSeconds?: number;
  maxCacheSize?: number;
}

export class AIService {
  private readonly suggestionCache: NodeCache;
  private readonly model: CompletionModel;

  private hits = 0;
  private misses = 0;
  private requests = 0;
  private totalCompletionMs = 0;

  constructor(dependencies?: AIServiceDependencies) {
    this.model = dependencies?.model ?? new CortexModel();
    this.suggestionCache = new NodeCache({
      stdTTL: dependencies?.cacheTtlSeconds ?? 3600,
      checkperiod: 300,
      maxKeys: dependencies?.maxCacheSize ?? 500,
      useClones: false
    });
  }

  /**
   * Ask Cortex for optimization suggestions. Never throws: every failure
   * degrades to `status: 'unavailable'` with a reason.
   */
  async generateSuggestions(
    userId: string,
    client: WarehouseClient | null,
    prompt: string,
    model: string
  ): Promise<AdvisoryResult> {
    const startedAt = Date.now();
    this.requests += 1;

    const cacheKey = this.getCacheKey(model, prompt);
    const cached = this.suggestionCache.get<string>(cacheKey);
    if (cached !== undefined) {
      this.hits += 1;
      this.log(userId, 'generateSuggestions', 'SUCCESS', Date.now() - startedAt, 'Cache:HIT');
      return { status: 'ok', suggestions: cached, cached: true };
    }

    this.misses += 1;

    try {
      if (!client) {
        throw new AIServiceError('No active warehouse session', 'AI_NO_SESSION');
      }

      this.log(userId, 'generateSuggestions', 'CALL_CORTEX', Date.now() - startedAt, `Model:${model} Cache:MISS`);
      const raw = await this.callModel(client, model, prompt);
      const suggestions = extractCompletionText(raw);
      if (!suggestions) {
        throw new AIServiceError('Cortex returned an empty response', 'AI_RESPONSE_INVALID');
      }

      this.suggestionCache.set(cacheKey, suggestions);
      const duration = Date.now() - startedAt;
      this.totalCompletionMs += duration;
      this.log(userId, 'generateSuggestions', 'SUCCESS', duration, `Chars:${suggestions.length}`);
      return { status: 'ok', suggestions, cached: false };
    } catch (error) {
      const failure =
        error instanceof AIServiceError
          ? error
          : new AIServiceError('Cortex request failed', 'AI_REQUEST_FAILED', error instanceof Error ? error.message : String(error));
      this.log(userId, 'generateSuggestions', 'ERROR', Date.now() - startedAt, `${failure.code} ${failure.details ?? failure.message}`);
      return { status: 'unavailable', suggestions: null, reason: this.describeFailure(failure) };
    }
  }

  /**
   * Return service cache and latency metrics.
   */
  getCacheStats(): AIServiceCacheStats {
    const hitRate = this.requests === 0 ? 0 : this.hits / this.requests;
    const avgCompletionMs = this.misses === 0 ? 0 : this.totalCompletionMs / this.misses;
    return {
      cachedItems: this.suggestionCache.keys().length,
      hits: this.hits,
      misses: this.misses,
      requests: this.requests,
      hitRate: Number(hitRate.toFixed(4)),
      avgCompletionMs: Number(avgCompletionMs.toFixed(2))
    };
  }

  clearCache(): void {
    this.suggestionCache.flushAll();
  }

  private async callModel(client: WarehouseClient, model: string, prompt: string): Promise<unknown> {
    try {
      return await this.model.complete(client, model, prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (FEATURE_DISABLED_PATTERN.test(message)) {
        throw new AIServiceError('Cortex is not available for this account or role', 'AI_FEATURE_DISABLED', message);
      }
      throw new AIServiceError('Cortex request failed', 'AI_REQUEST_FAILED', message);
    }
  }

  private describeFailure(error: AIServiceError): string {
    switch (error.code) {
      case 'AI_NO_SESSION':
        return 'No active connection';
      case 'AI_FEATURE_DISABLED':
        return 'Cortex AI is disabled or not authorized for the current role';
      case 'AI_RESPONSE_INVALID':
        return 'No response from Cortex AI';
      default:
        return error.details ? `Cortex AI call failed: ${error.details}` : 'Cortex AI call failed';
    }
  }

  private getCacheKey(model: string, prompt: string): string {
    const digest = createHash('sha256').update(model).update('\u0000').update(prompt).digest('hex');
    return `suggestion:${digest}`;
  }

  private log(userId: string, operation: string, status: string, durationMs: number, details: string): void {
    console.log(
      `[${new Date().toISOString()}] [AI-SERVICE] [USER-${userId}] [${operation}] [${status}] ${durationMs}ms ${details}`
    );
  }
}
