// Payload Transformer
// Pure functions — one wire format per downstream system profile.
// Field names here are contracts with third-party APIs; do not rename them.

import type { Priority } from './departments';
import type { SystemName } from './systemResolver';
import type { ProcessedTicket } from './tickets';

// ─── Jira ─────────────────────────────────────────────────────────────────────

export interface JiraIssuePayload {
  fields: {
    project: { key: string };
    summary: string;
    description: {
      type: 'doc';
      version: 1;
      content: Array<{
        type: 'paragraph';
        content: Array<{ type: 'text'; text: string }>;
      }>;
    };
    issuetype: { name: string };
    priority: { name: string };
    reporter: { emailAddress: string };
    labels: string[];
    customfield_10001: string | null;
  };
}

const JIRA_PRIORITY: Record<Priority, string> = {
  low:      'Low',
  medium:   'Medium',
  high:     'High',
  critical: 'Highest',
};

// ─── Freshservice ─────────────────────────────────────────────────────────────

export interface FreshserviceTicketPayload {
  ticket: {
    subject: string;
    description: string;
    email: string;
    priority: number;
    status: number;
    source: number;
    tags: string[];
    custom_fields: {
      assigned_team: string | null;
      ai_confidence: number;
      classification_reasoning: string;
    };
  };
}

const FRESHSERVICE_PRIORITY: Record<Priority, number> = {
  low:      1,
  medium:   2,
  high:     3,
  critical: 4,
};

const FRESHSERVICE_STATUS_OPEN = 2;
const FRESHSERVICE_SOURCE_EMAIL = 2;

// ─── Slack ────────────────────────────────────────────────────────────────────

export interface SlackField {
  title: string;
  value: string;
  short: boolean;
}

export interface SlackMessagePayload {
  text: string;
  attachments: Array<{
    color: string;
    fields: SlackField[];
    footer: string;
    ts: number;
  }>;
}

const SLACK_COLOR: Record<Priority, string> = {
  low:      '#36a64f', // green
  medium:   '#ff9500', // orange
  high:     '#ff0000', // red
  critical: '#800080', // purple
};

const SLACK_DESCRIPTION_LIMIT = 300;

// ─── Generic ──────────────────────────────────────────────────────────────────

export interface GenericTicketPayload {
  ticket_id: string;
  title: string;
  description: string;
  email: string;
  priority: Priority;
  metadata: Record<string, unknown>;
  created_at: string | null;
  status: string;
  department: string | null;
  assigned_to: string | null;
  confidence_score: number | null;
  classification_reasoning: string | null;
  routed_to_system: string | null;
  external_ticket_id: string | null;
  routing_error: string | null;
}

export type TicketPayload =
  | JiraIssuePayload
  | FreshserviceTicketPayload
  | SlackMessagePayload
  | GenericTicketPayload;

export interface TransformOptions {
  /** Jira project the issue is filed under. Defaults to SUPP. */
  jiraProjectKey?: string;
  /** Clock for Slack's `ts` when the ticket has no creation time. */
  now?: () => Date;
}

function departmentLabel(ticket: ProcessedTicket): string {
  return `department:${(ticket.department ?? 'GENERAL').toLowerCase()}`;
}

export function toJiraPayload(ticket: ProcessedTicket, options: TransformOptions = {}): JiraIssuePayload {
  const confidenceLabel =
    ticket.confidenceScore !== undefined
      ? `confidence:${Math.trunc(ticket.confidenceScore * 100)}`
      : 'confidence:unknown';

  return {
    fields: {
      project: { key: options.jiraProjectKey ?? 'SUPP' },
      summary: ticket.title,
      description: {
        type: 'doc',
        version: 1,
        content: [
          {
            type: 'paragraph',
            content: [{ type: 'text', text: ticket.description }],
          },
        ],
      },
      issuetype: { name: 'Task' },
      priority: { name: JIRA_PRIORITY[ticket.priority] },
      reporter: { emailAddress: ticket.email },
      labels: [departmentLabel(ticket), 'auto-routed', confidenceLabel],
      customfield_10001: ticket.assignedTo ?? null,
    },
  };
}

export function toFreshservicePayload(ticket: ProcessedTicket): FreshserviceTicketPayload {
  const tags = [departmentLabel(ticket), 'auto-routed'];
  if (ticket.assignedTo) tags.push(ticket.assignedTo);

  return {
    ticket: {
      subject: ticket.title,
      description: ticket.description,
      email: ticket.email,
      priority: FRESHSERVICE_PRIORITY[ticket.priority],
      status: FRESHSERVICE_STATUS_OPEN,
      source: FRESHSERVICE_SOURCE_EMAIL,
      tags,
      custom_fields: {
        assigned_team: ticket.assignedTo ?? null,
        ai_confidence: ticket.confidenceScore ?? 0.0,
        classification_reasoning: ticket.classificationReasoning ?? '',
      },
    },
  };
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function toSlackPayload(ticket: ProcessedTicket, options: TransformOptions = {}): SlackMessagePayload {
  const sentAt = ticket.createdAt ?? (options.now ?? (() => new Date()))();

  return {
    text: `New Ticket: ${ticket.title}`,
    attachments: [
      {
        color: SLACK_COLOR[ticket.priority],
        fields: [
          { title: 'Title',       value: ticket.title,                                             short: false },
          { title: 'Description', value: truncate(ticket.description, SLACK_DESCRIPTION_LIMIT),    short: false },
          { title: 'Reporter',    value: ticket.email,                                             short: true },
          { title: 'Priority',    value: ticket.priority.toUpperCase(),                            short: true },
          { title: 'Department',  value: ticket.department ?? 'GENERAL',                           short: true },
          { title: 'Assigned To', value: ticket.assignedTo ?? 'Unassigned',                        short: true },
        ],
        footer: `Ticket ID: ${ticket.ticketId}`,
        ts: Math.floor(sentAt.getTime() / 1000),
      },
    ],
  };
}

export function toGenericPayload(ticket: ProcessedTicket): GenericTicketPayload {
  return {
    ticket_id: ticket.ticketId,
    title: ticket.title,
    description: ticket.description,
    email: ticket.email,
    priority: ticket.priority,
    metadata: ticket.metadata,
    created_at: ticket.createdAt ? ticket.createdAt.toISOString() : null,
    status: ticket.status,
    department: ticket.department ?? null,
    assigned_to: ticket.assignedTo ?? null,
    confidence_score: ticket.confidenceScore ?? null,
    classification_reasoning: ticket.classificationReasoning ?? null,
    routed_to_system: ticket.routedToSystem ?? null,
    external_ticket_id: ticket.externalTicketId ?? null,
    routing_error: ticket.routingError ?? null,
  };
}

/**
 * Converts a processed ticket into the wire format of the given system.
 * webhook_test and unknown both get the generic payload.
 */
export function transformPayload(
  ticket: ProcessedTicket,
  system: SystemName,
  options: TransformOptions = {}
): TicketPayload {
  switch (system) {
    case 'jira':
      return toJiraPayload(ticket, options);
    case 'freshservice':
      return toFreshservicePayload(ticket);
    case 'slack':
      return toSlackPayload(ticket, options);
    case 'webhook_test':
    case 'unknown':
      return toGenericPayload(ticket);
  }
}
