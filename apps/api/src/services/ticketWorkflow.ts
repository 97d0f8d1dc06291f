import { applyClassification, applyRouting, failedRouting } from '@ticket-triage/domain';
import type { ClassificationResult, ProcessedTicket, RoutingResult } from '@ticket-triage/domain';
import type { TicketClassifier } from './classifierService';
import type { TicketRouter } from './routerService';
import { getTeamMapping } from './teamMappingService';
import type { TeamMappingStore } from './teamMappingService';
import type { TicketLogStore } from './ticketLogService';

export interface WorkflowDeps {
  classifier: Pick<TicketClassifier, 'classify'>;
  router: Pick<TicketRouter, 'route'>;
  mappings: TeamMappingStore;
  logs: TicketLogStore;
}

export interface WorkflowOutcome {
  ticket: ProcessedTicket;
  classification: ClassificationResult | null;
  routing: RoutingResult | null;
}

type WorkflowPhase = 'classification' | 'mapping lookup' | 'routing' | 'persistence';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Classify → look up mapping → route → log, strictly in that order.
 * Never rejects: an unexpected error marks the ticket failed and is persisted when possible.
 */
export async function processTicketWorkflow(
  received: ProcessedTicket,
  deps: WorkflowDeps
): Promise<WorkflowOutcome> {
  const started = performance.now();
  const id = received.ticketId;

  let ticket = received;
  let classification: ClassificationResult | null = null;
  let routing: RoutingResult | null = null;
  let phase: WorkflowPhase = 'classification';

  try {
    classification = await deps.classifier.classify(ticket, id);
    ticket = applyClassification(ticket, classification);

    phase = 'mapping lookup';
    const mapping = await getTeamMapping(deps.mappings, classification.department, ticket.priority);

    if (!mapping) {
      const message = `No team mapping found for department ${classification.department}`;
      console.warn(`[Workflow] ${id} ${phase}: ${message}`);
      routing = failedRouting('unrouted', message, 0);
    } else {
      phase = 'routing';
      routing = await deps.router.route(ticket, mapping);
    }
    ticket = applyRouting(ticket, routing);

    phase = 'persistence';
    await deps.logs.upsert(ticket);

    console.log(
      `[Workflow] ${id} completed: ${ticket.status} via ${ticket.routedToSystem ?? 'none'} ` +
        `(${Math.round(performance.now() - started)}ms)`
    );
  } catch (err) {
    const message = `Processing error: ${errorMessage(err)}`;
    console.error(`[Workflow] ${id} ${phase} failed: ${message}`);
    ticket = { ...ticket, status: 'failed', routingError: message };

    try {
      await deps.logs.upsert(ticket);
    } catch (persistErr) {
      console.error(`[Workflow] ${id} persistence failed: ${errorMessage(persistErr)}`);
    }
  }

  return { ticket, classification, routing };
}
