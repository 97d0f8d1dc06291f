import axios from 'axios';
import type { AxiosResponse } from 'axios';
import {
  CircuitBreakerRegistry,
  SYSTEM_NAMES,
  extractExternalTicketId,
  failedRouting,
  resolveSystem,
  transformPayload,
} from '@ticket-triage/domain';
import type {
  CircuitState,
  ProcessedTicket,
  RoutingResult,
  SystemName,
  TeamMapping,
  TicketPayload,
} from '@ticket-triage/domain';
import { CircuitOpenError, DeliveryError, HttpStatusError, TransportError } from '../lib/errors';
import { DEFAULT_TIMEOUTS, POOL_LIMITS, createHttpClient } from '../lib/httpClient';
import type { HttpClient, HttpTimeouts } from '../lib/httpClient';
import { DEFAULT_RETRY_POLICY, withRetry } from '../lib/retry';
import type { RetryOptions, RetryPolicy } from '../lib/retry';

export const USER_AGENT = 'TicketTriageAgent/1.0';

const PROBE_TIMEOUTS = { connectMs: 5_000, readMs: 10_000 };

export interface RouterCredentials {
  jiraToken?: string;
  freshserviceToken?: string;
}

export interface TicketRouterOptions {
  breakers?: CircuitBreakerRegistry;
  retryPolicy?: RetryPolicy;
  httpClient?: HttpClient;
  timeouts?: HttpTimeouts;
  credentials?: RouterCredentials;
  jiraProjectKey?: string;
  now?: () => number;
  sleep?: RetryOptions['sleep'];
}

export interface EndpointProbeResult {
  success: boolean;
  endpoint: string;
  statusCode?: number;
  responseTimeMs?: number;
  error?: string;
}

export interface RouterStats {
  circuits: Record<string, CircuitState>;
  failureThreshold: number;
  resetTimeoutMs: number;
  supportedSystems: SystemName[];
  pool: typeof POOL_LIMITS;
  timeouts: HttpTimeouts;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Empty → {}; JSON object → itself; any other JSON value or plain text → { body }. */
export function parseResponseBody(text: string): Record<string, unknown> {
  if (!text.trim()) return {};

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return { body: text };
  }
  return isRecord(value) ? value : { body: value };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Delivers classified tickets to the system behind a team mapping.
 * `route` never rejects; every failure comes back as a RoutingResult.
 */
export class TicketRouter {
  private readonly breakers: CircuitBreakerRegistry;
  private readonly retryPolicy: RetryPolicy;
  private readonly http: HttpClient;
  private readonly credentials: RouterCredentials;
  private readonly jiraProjectKey: string | undefined;
  private readonly now: () => number;
  private readonly sleep: RetryOptions['sleep'];

  constructor(options: TicketRouterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.breakers = options.breakers ?? new CircuitBreakerRegistry({ now: this.now });
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.http = options.httpClient ?? createHttpClient(options.timeouts ?? DEFAULT_TIMEOUTS);
    this.credentials = options.credentials ?? {};
    this.jiraProjectKey = options.jiraProjectKey;
    this.sleep = options.sleep;
  }

  async route(ticket: ProcessedTicket, mapping: TeamMapping): Promise<RoutingResult> {
    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);
    const endpoint = mapping.apiEndpoint;

    if (this.breakers.isOpen(endpoint)) {
      console.warn(`[Router] ${ticket.ticketId} circuit breaker open for ${endpoint}, not attempting delivery`);
      return failedRouting('circuit_breaker', new CircuitOpenError(endpoint).message, elapsed());
    }

    const system = resolveSystem(endpoint);
    const payload = transformPayload(ticket, system, {
      jiraProjectKey: this.jiraProjectKey,
      now: () => new Date(this.now()),
    });
    const headers = this.buildHeaders(system, mapping.apiHeaders);

    try {
      const result = await withRetry(
        async (attempt) => {
          if (attempt > 1 && this.breakers.isOpen(endpoint)) {
            throw new CircuitOpenError(endpoint);
          }
          return this.deliver(ticket.ticketId, system, mapping.apiMethod, endpoint, headers, payload, elapsed);
        },
        {
          ...this.retryPolicy,
          label: `route ${ticket.ticketId}`,
          shouldRetry: (err) => err instanceof DeliveryError,
          sleep: this.sleep,
        }
      );

      console.log(
        `[Router] ${ticket.ticketId} routed to ${system} (external id ${result.externalTicketId ?? 'none'})`
      );
      return result;
    } catch (err) {
      if (err instanceof CircuitOpenError) {
        console.warn(`[Router] ${ticket.ticketId} ${err.message}, stopping retries`);
        return failedRouting('circuit_breaker', err.message, elapsed());
      }
      if (err instanceof DeliveryError) {
        console.error(`[Router] ${ticket.ticketId} routing to ${endpoint} failed: ${err.message}`);
        return failedRouting(system, err.message, elapsed(), err.statusCode);
      }

      const message = `Unexpected error: ${errorMessage(err)}`;
      console.error(`[Router] ${ticket.ticketId} routing to ${endpoint} failed: ${message}`);
      return failedRouting(system, message, elapsed());
    }
  }

  /** System defaults first, then the mapping's own headers, which win. */
  buildHeaders(system: SystemName, overrides: Record<string, string>): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': USER_AGENT,
      'Content-Type': 'application/json',
    };

    if (system === 'jira' && this.credentials.jiraToken) {
      headers.Authorization = `Bearer ${this.credentials.jiraToken}`;
    } else if (system === 'freshservice' && this.credentials.freshserviceToken) {
      headers.Authorization = `Basic ${this.credentials.freshserviceToken}`;
    }

    return { ...headers, ...overrides };
  }

  // One attempt. Every failure is recorded against the endpoint before it is thrown.
  private async deliver(
    ticketId: string,
    system: SystemName,
    method: string,
    endpoint: string,
    headers: Record<string, string>,
    payload: TicketPayload,
    elapsed: () => number
  ): Promise<RoutingResult> {
    const attemptStarted = performance.now();
    let response: AxiosResponse<string>;

    try {
      response = await this.http.instance.request<string>({
        method,
        url: endpoint,
        headers,
        data: payload,
        signal: AbortSignal.timeout(this.http.deadlineMs),
      });
    } catch (err) {
      this.breakers.recordFailure(endpoint);
      if (axios.isAxiosError(err) || axios.isCancel(err)) {
        throw new TransportError(errorMessage(err));
      }
      throw err;
    }

    const status = response.status;
    const text = typeof response.data === 'string' ? response.data : '';
    console.log(
      `[Router] ${ticketId} ${method.toUpperCase()} ${endpoint} → ${status} ` +
        `(${Math.round(performance.now() - attemptStarted)}ms)`
    );

    if (status < 200 || status >= 300) {
      this.breakers.recordFailure(endpoint);
      throw new HttpStatusError(status, text);
    }

    this.breakers.recordSuccess(endpoint);
    const responseData = parseResponseBody(text);

    return {
      success: true,
      systemName: system,
      externalTicketId: extractExternalTicketId(system, responseData, this.now()),
      responseData,
      errorMessage: null,
      httpStatusCode: status,
      processingTimeMs: elapsed(),
    };
  }

  /** Connectivity probe. Leaves breaker state untouched. */
  async testEndpoint(endpoint: string, method = 'GET'): Promise<EndpointProbeResult> {
    const started = performance.now();
    try {
      const response = await this.http.instance.request<string>({
        method,
        url: endpoint,
        headers: { 'User-Agent': USER_AGENT },
        timeout: PROBE_TIMEOUTS.readMs,
        signal: AbortSignal.timeout(PROBE_TIMEOUTS.connectMs + PROBE_TIMEOUTS.readMs),
      });
      return {
        success: true,
        endpoint,
        statusCode: response.status,
        responseTimeMs: Math.round(performance.now() - started),
      };
    } catch (err) {
      return { success: false, endpoint, error: errorMessage(err) };
    }
  }

  getStats(): RouterStats {
    return {
      circuits: this.breakers.snapshot(),
      failureThreshold: this.breakers.threshold,
      resetTimeoutMs: this.breakers.resetTimeout,
      supportedSystems: [...SYSTEM_NAMES],
      pool: POOL_LIMITS,
      timeouts: this.http.timeouts,
    };
  }

  close(): void {
    this.http.close();
  }
}
