// Routing Result
// Produced exactly once per routing attempt sequence.

import type { SystemName } from './systemResolver';
import type { ProcessedTicket } from './tickets';

// 'circuit_breaker': short-circuited, no call made. 'unrouted': no team mapping existed.
export type RoutedSystem = SystemName | 'circuit_breaker' | 'unrouted';

export interface RoutingResult {
  success: boolean;
  systemName: RoutedSystem;
  externalTicketId: string | null;
  responseData: Record<string, unknown>;
  errorMessage: string | null;
  httpStatusCode: number | null;
  processingTimeMs: number;
}

export function failedRouting(
  systemName: RoutedSystem,
  errorMessage: string,
  processingTimeMs: number,
  httpStatusCode: number | null = null
): RoutingResult {
  return {
    success: false,
    systemName,
    externalTicketId: null,
    responseData: {},
    errorMessage,
    httpStatusCode,
    processingTimeMs,
  };
}

/** Copies a routing outcome onto the ticket: routed on success, failed otherwise. */
export function applyRouting(ticket: ProcessedTicket, result: RoutingResult): ProcessedTicket {
  return {
    ...ticket,
    status: result.success ? 'routed' : 'failed',
    routedToSystem: result.systemName,
    externalTicketId: result.externalTicketId ?? undefined,
    routingError: result.errorMessage ?? undefined,
  };
}
