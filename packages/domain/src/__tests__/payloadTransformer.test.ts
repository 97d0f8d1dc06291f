import { describe, it, expect } from 'vitest';
import {
  transformPayload,
  toJiraPayload,
  toFreshservicePayload,
  toSlackPayload,
  toGenericPayload,
} from '../payloadTransformer';
import type { ProcessedTicket } from '../tickets';

const createdAt = new Date('2024-03-01T09:30:00Z');

function makeTicket(overrides: Partial<ProcessedTicket> = {}): ProcessedTicket {
  return {
    ticketId: 'TKT-ABCD1234',
    title: 'Laptop will not boot',
    description: 'Black screen after the latest update.',
    email: 'reporter@example.com',
    priority: 'medium',
    metadata: { source: 'test' },
    createdAt,
    status: 'classified',
    department: 'IT',
    assignedTo: 'it_support_team',
    confidenceScore: 0.85,
    classificationReasoning: 'Hardware issue',
    ...overrides,
  };
}

describe('payloadTransformer', () => {
  // ─── Jira ───────────────────────────────────────────────────────────────────

  describe('jira', () => {
    it('critical priority → Highest', () => {
      const payload = toJiraPayload(makeTicket({ priority: 'critical' }));
      expect(payload.fields.priority.name).toBe('Highest');
    });

    it('maps low/medium/high to Low/Medium/High', () => {
      expect(toJiraPayload(makeTicket({ priority: 'low' })).fields.priority.name).toBe('Low');
      expect(toJiraPayload(makeTicket({ priority: 'medium' })).fields.priority.name).toBe('Medium');
      expect(toJiraPayload(makeTicket({ priority: 'high' })).fields.priority.name).toBe('High');
    });

    it('builds summary, rich-text description and reporter', () => {
      const { fields } = toJiraPayload(makeTicket());
      expect(fields.summary).toBe('Laptop will not boot');
      expect(fields.description).toEqual({
        type: 'doc',
        version: 1,
        content: [
          {
            type: 'paragraph',
            content: [{ type: 'text', text: 'Black screen after the latest update.' }],
          },
        ],
      });
      expect(fields.reporter).toEqual({ emailAddress: 'reporter@example.com' });
      expect(fields.issuetype).toEqual({ name: 'Task' });
      expect(fields.customfield_10001).toBe('it_support_team');
    });

    it('labels carry department, auto-routed and integer confidence', () => {
      const { fields } = toJiraPayload(makeTicket());
      expect(fields.labels).toEqual(['department:it', 'auto-routed', 'confidence:85']);
    });

    it('confidence label drops the fraction rather than rounding up', () => {
      const { fields } = toJiraPayload(makeTicket({ confidenceScore: 0.999 }));
      expect(fields.labels[2]).toBe('confidence:99');
    });

    it('labels fall back to general/unknown without classification', () => {
      const { fields } = toJiraPayload(
        makeTicket({ department: undefined, confidenceScore: undefined })
      );
      expect(fields.labels).toEqual(['department:general', 'auto-routed', 'confidence:unknown']);
    });

    it('uses SUPP unless a project key is given', () => {
      expect(toJiraPayload(makeTicket()).fields.project.key).toBe('SUPP');
      expect(toJiraPayload(makeTicket(), { jiraProjectKey: 'OPS' }).fields.project.key).toBe('OPS');
    });
  });

  // ─── Freshservice ───────────────────────────────────────────────────────────

  describe('freshservice', () => {
    it('critical priority → 4', () => {
      expect(toFreshservicePayload(makeTicket({ priority: 'critical' })).ticket.priority).toBe(4);
    });

    it('maps low/medium/high to 1/2/3', () => {
      expect(toFreshservicePayload(makeTicket({ priority: 'low' })).ticket.priority).toBe(1);
      expect(toFreshservicePayload(makeTicket({ priority: 'medium' })).ticket.priority).toBe(2);
      expect(toFreshservicePayload(makeTicket({ priority: 'high' })).ticket.priority).toBe(3);
    });

    it('builds the ticket object with fixed status and source codes', () => {
      const { ticket } = toFreshservicePayload(makeTicket());
      expect(ticket).toEqual({
        subject: 'Laptop will not boot',
        description: 'Black screen after the latest update.',
        email: 'reporter@example.com',
        priority: 2,
        status: 2,
        source: 2,
        tags: ['department:it', 'auto-routed', 'it_support_team'],
        custom_fields: {
          assigned_team: 'it_support_team',
          ai_confidence: 0.85,
          classification_reasoning: 'Hardware issue',
        },
      });
    });

    it('defaults custom fields when unclassified', () => {
      const { ticket } = toFreshservicePayload(
        makeTicket({
          department: undefined,
          assignedTo: undefined,
          confidenceScore: undefined,
          classificationReasoning: undefined,
        })
      );
      expect(ticket.tags).toEqual(['department:general', 'auto-routed']);
      expect(ticket.custom_fields).toEqual({
        assigned_team: null,
        ai_confidence: 0,
        classification_reasoning: '',
      });
    });
  });

  // ─── Slack ──────────────────────────────────────────────────────────────────

  describe('slack', () => {
    it('colors the attachment by priority', () => {
      expect(toSlackPayload(makeTicket({ priority: 'low' })).attachments[0].color).toBe('#36a64f');
      expect(toSlackPayload(makeTicket({ priority: 'medium' })).attachments[0].color).toBe('#ff9500');
      expect(toSlackPayload(makeTicket({ priority: 'high' })).attachments[0].color).toBe('#ff0000');
      expect(toSlackPayload(makeTicket({ priority: 'critical' })).attachments[0].color).toBe('#800080');
    });

    it('builds text, fields, footer and ts from the ticket', () => {
      const payload = toSlackPayload(makeTicket());
      expect(payload.text).toBe('New Ticket: Laptop will not boot');

      const [attachment] = payload.attachments;
      expect(attachment.fields).toEqual([
        { title: 'Title', value: 'Laptop will not boot', short: false },
        { title: 'Description', value: 'Black screen after the latest update.', short: false },
        { title: 'Reporter', value: 'reporter@example.com', short: true },
        { title: 'Priority', value: 'MEDIUM', short: true },
        { title: 'Department', value: 'IT', short: true },
        { title: 'Assigned To', value: 'it_support_team', short: true },
      ]);
      expect(attachment.footer).toBe('Ticket ID: TKT-ABCD1234');
      expect(attachment.ts).toBe(Math.floor(createdAt.getTime() / 1000));
    });

    it('truncates descriptions over 300 chars with an ellipsis', () => {
      const long = 'x'.repeat(301);
      const field = toSlackPayload(makeTicket({ description: long })).attachments[0].fields[1];
      expect(field.value).toBe(`${'x'.repeat(300)}...`);
    });

    it('keeps a 300-char description as is', () => {
      const exact = 'y'.repeat(300);
      const field = toSlackPayload(makeTicket({ description: exact })).attachments[0].fields[1];
      expect(field.value).toBe(exact);
    });

    it('uses the current time when the ticket has no creation time', () => {
      const now = new Date('2024-05-05T05:05:05Z');
      const payload = toSlackPayload(makeTicket({ createdAt: undefined }), { now: () => now });
      expect(payload.attachments[0].ts).toBe(Math.floor(now.getTime() / 1000));
    });

    it('shows GENERAL / Unassigned when unclassified', () => {
      const fields = toSlackPayload(
        makeTicket({ department: undefined, assignedTo: undefined })
      ).attachments[0].fields;
      expect(fields[4].value).toBe('GENERAL');
      expect(fields[5].value).toBe('Unassigned');
    });
  });

  // ─── Generic ────────────────────────────────────────────────────────────────

  describe('generic', () => {
    it('serializes every ticket field with snake_case keys', () => {
      expect(toGenericPayload(makeTicket())).toEqual({
        ticket_id: 'TKT-ABCD1234',
        title: 'Laptop will not boot',
        description: 'Black screen after the latest update.',
        email: 'reporter@example.com',
        priority: 'medium',
        metadata: { source: 'test' },
        created_at: '2024-03-01T09:30:00.000Z',
        status: 'classified',
        department: 'IT',
        assigned_to: 'it_support_team',
        confidence_score: 0.85,
        classification_reasoning: 'Hardware issue',
        routed_to_system: null,
        external_ticket_id: null,
        routing_error: null,
      });
    });
  });

  // ─── Dispatch ───────────────────────────────────────────────────────────────

  describe('transformPayload', () => {
    const ticket = makeTicket();

    it('dispatches to the system transformer', () => {
      expect(transformPayload(ticket, 'jira')).toEqual(toJiraPayload(ticket));
      expect(transformPayload(ticket, 'freshservice')).toEqual(toFreshservicePayload(ticket));
      expect(transformPayload(ticket, 'slack')).toEqual(toSlackPayload(ticket));
    });

    it('webhook_test and unknown both use the generic payload', () => {
      expect(transformPayload(ticket, 'webhook_test')).toEqual(toGenericPayload(ticket));
      expect(transformPayload(ticket, 'unknown')).toEqual(toGenericPayload(ticket));
    });

    it('passes options through to jira', () => {
      const payload = transformPayload(ticket, 'jira', { jiraProjectKey: 'HELP' });
      expect(payload).toEqual(toJiraPayload(ticket, { jiraProjectKey: 'HELP' }));
    });
  });
});
