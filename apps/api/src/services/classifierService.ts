import { classifyByKeywords, DEPARTMENT_TEAMS, DEPARTMENTS, FALLBACK_MODEL_VERSION } from '@ticket-triage/domain';
import type { ClassificationResult, Department, IncomingTicket } from '@ticket-triage/domain';
import type { TextGenerator } from '../lib/anthropic';
import { ClassificationError } from '../lib/errors';
import { DEFAULT_RETRY_POLICY, withRetry } from '../lib/retry';
import type { RetryOptions, RetryPolicy } from '../lib/retry';
import { ClassificationCache, fingerprint } from './classificationCache';
import { parseClassificationResponse } from './classificationParser';
import { buildClassificationPrompt } from './classificationPrompt';

const GENERATION_PARAMS = { temperature: 0.1, maxTokens: 500 };

export interface TicketClassifierOptions {
  cache?: ClassificationCache;
  cacheSize?: number;
  retryPolicy?: RetryPolicy;
  /** Overrides the backoff sleep, mainly for tests. */
  sleep?: RetryOptions['sleep'];
}

export interface ClassifierStats {
  modelName: string;
  aiEnabled: boolean;
  cacheSize: number;
  cacheCapacity: number;
  departments: Department[];
  teams: Record<Department, readonly string[]>;
}

/**
 * AI classification with a keyword fallback.
 * `classify` never rejects: every backend or parsing failure ends in the fallback result.
 */
export class TicketClassifier {
  private readonly cache: ClassificationCache;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: RetryOptions['sleep'];

  constructor(
    private readonly generator: TextGenerator | null,
    options: TicketClassifierOptions = {}
  ) {
    this.cache = options.cache ?? new ClassificationCache(options.cacheSize);
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep;
  }

  get aiEnabled(): boolean {
    return this.generator !== null;
  }

  async classify(ticket: IncomingTicket, ticketId = 'unassigned'): Promise<ClassificationResult> {
    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);

    const key = fingerprint(ticket.title, ticket.description);
    const cached = this.cache.get(key);
    if (cached) {
      console.log(`[Classifier] ${ticketId} cache hit: ${cached.department}`);
      return cached;
    }

    if (!this.generator) {
      return classifyByKeywords(ticket.title, ticket.description, elapsed());
    }

    try {
      const result = await this.classifyWithModel(this.generator, ticket, ticketId, elapsed);
      this.cache.set(key, result);
      console.log(
        `[Classifier] ${ticketId} classified as ${result.department}/${result.assignedTo} ` +
          `(confidence ${result.confidenceScore}, ${result.processingTimeMs}ms)`
      );
      return result;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[Classifier] ${ticketId} classification failed, using keyword fallback: ${reason}`);
      return classifyByKeywords(ticket.title, ticket.description, elapsed());
    }
  }

  private async classifyWithModel(
    generator: TextGenerator,
    ticket: IncomingTicket,
    ticketId: string,
    elapsed: () => number
  ): Promise<ClassificationResult> {
    const prompt = buildClassificationPrompt(ticket);

    const responseText = await withRetry(
      async () => {
        const text = await generator.generate(prompt, GENERATION_PARAMS);
        if (!text.trim()) {
          throw new ClassificationError('Empty response from classifier');
        }
        return text;
      },
      { ...this.retryPolicy, label: `classify ${ticketId}`, sleep: this.sleep }
    );

    const parsed = parseClassificationResponse(responseText);
    if (!parsed) {
      throw new ClassificationError('Could not parse classification response');
    }
    if (parsed.coercedDepartment !== undefined) {
      console.warn(`[Classifier] ${ticketId} unknown department "${parsed.coercedDepartment}", using GENERAL`);
    }

    return Object.freeze({
      department: parsed.department,
      assignedTo: parsed.team,
      confidenceScore: parsed.confidence,
      reasoning: parsed.reasoning,
      processingTimeMs: elapsed(),
      modelVersion: generator.modelName,
    });
  }

  getStats(): ClassifierStats {
    return {
      modelName: this.generator?.modelName ?? FALLBACK_MODEL_VERSION,
      aiEnabled: this.aiEnabled,
      cacheSize: this.cache.size,
      cacheCapacity: this.cache.capacity,
      departments: [...DEPARTMENTS],
      teams: DEPARTMENT_TEAMS,
    };
  }

  clearCache(): void {
    this.cache.clear();
    console.log('[Classifier] Cache cleared');
  }
}
