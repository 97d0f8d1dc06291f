// Domain package exports
export { DEPARTMENTS, PRIORITIES, PRIORITY_RANK, DEPARTMENT_TEAMS, isDepartment, defaultTeamFor, resolveTeam } from './departments';
export type { Department, Priority } from './departments';

export { createIncomingTicket, createProcessedTicket, applyClassification, TicketValidationError } from './tickets';
export type { TicketStatus, IncomingTicket, IncomingTicketInput, ProcessedTicket, ClassificationResult, TeamMapping } from './tickets';

export { classifyByKeywords, FALLBACK_MODEL_VERSION } from './fallbackClassifier';

export { resolveSystem, SYSTEM_NAMES } from './systemResolver';
export type { SystemName } from './systemResolver';

export { transformPayload, toJiraPayload, toFreshservicePayload, toSlackPayload, toGenericPayload } from './payloadTransformer';
export type {
  TicketPayload,
  JiraIssuePayload,
  FreshserviceTicketPayload,
  SlackMessagePayload,
  GenericTicketPayload,
  TransformOptions,
} from './payloadTransformer';

export { CircuitBreakerRegistry, DEFAULT_FAILURE_THRESHOLD, DEFAULT_RESET_TIMEOUT_MS } from './circuitBreaker';
export type { CircuitState, CircuitBreakerOptions } from './circuitBreaker';

export { extractExternalTicketId, EXTRACTION_RULES } from './ticketIdExtractor';
export type { ExtractionRule } from './ticketIdExtractor';

export { selectTeamMapping } from './teamMappingSelector';

export { failedRouting, applyRouting } from './routingResult';
export type { RoutingResult, RoutedSystem } from './routingResult';
