// Ticket model
// Pure types and constructors — no framework imports.
// Throws TicketValidationError when required fields are blank.

import type { Department, Priority } from './departments';

export type TicketStatus = 'received' | 'classified' | 'routed' | 'failed';

export interface IncomingTicket {
  title: string;
  description: string;
  email: string;
  priority: Priority;
  metadata: Record<string, unknown>;
}

export interface ProcessedTicket extends IncomingTicket {
  ticketId: string;
  createdAt?: Date;
  status: TicketStatus;

  // Classification
  department?: Department;
  assignedTo?: string;
  confidenceScore?: number;
  classificationReasoning?: string;

  // Routing
  routedToSystem?: string;
  externalTicketId?: string;
  routingError?: string;
}

export interface ClassificationResult {
  readonly department: Department;
  readonly assignedTo: string;
  readonly confidenceScore: number;   // 0.0–1.0
  readonly reasoning: string;
  readonly processingTimeMs: number;
  readonly modelVersion: string;      // 'fallback-keywords' for keyword results
}

export interface TeamMapping {
  id?: number;
  department: Department;
  teamName: string;
  apiEndpoint: string;
  apiMethod: string;
  apiHeaders: Record<string, string>;
  priorityThreshold: Priority;
  isActive: boolean;
}

export class TicketValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TicketValidationError';
  }
}

export interface IncomingTicketInput {
  title: string;
  description: string;
  email: string;
  priority?: Priority;
  metadata?: Record<string, unknown>;
}

/**
 * Builds an IncomingTicket. Priority defaults to medium.
 * Throws TicketValidationError if title, description or email is blank.
 */
export function createIncomingTicket(input: IncomingTicketInput): IncomingTicket {
  if (!input.title.trim()) {
    throw new TicketValidationError('Ticket title cannot be empty');
  }
  if (!input.description.trim()) {
    throw new TicketValidationError('Ticket description cannot be empty');
  }
  if (!input.email.trim()) {
    throw new TicketValidationError('Email cannot be empty');
  }

  return {
    title: input.title,
    description: input.description,
    email: input.email,
    priority: input.priority ?? 'medium',
    metadata: input.metadata ?? {},
  };
}

export function createProcessedTicket(
  incoming: IncomingTicket,
  ticketId: string,
  createdAt: Date = new Date()
): ProcessedTicket {
  return {
    ...incoming,
    ticketId,
    createdAt,
    status: 'received',
  };
}

export function applyClassification(
  ticket: ProcessedTicket,
  classification: ClassificationResult
): ProcessedTicket {
  return {
    ...ticket,
    status: 'classified',
    department: classification.department,
    assignedTo: classification.assignedTo,
    confidenceScore: classification.confidenceScore,
    classificationReasoning: classification.reasoning,
  };
}
