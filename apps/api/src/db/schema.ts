import { pgTable, serial, text, boolean, jsonb, real, timestamp, index } from 'drizzle-orm/pg-core';
import type { Department, Priority, TicketStatus } from '@ticket-triage/domain';

// ─── Team mappings ────────────────────────────────────────────────────────────

export const teamMappings = pgTable(
  'team_mappings',
  {
    id: serial('id').primaryKey(),
    department: text('department').$type<Department>().notNull(),
    teamName: text('team_name').notNull(),
    apiEndpoint: text('api_endpoint').notNull(),
    apiMethod: text('api_method').default('POST').notNull(),
    apiHeaders: jsonb('api_headers').$type<Record<string, string>>().default({}).notNull(),
    priorityThreshold: text('priority_threshold').$type<Priority>().default('medium').notNull(),
    isActive: boolean('is_active').default(true).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    departmentIdx: index('idx_team_mappings_department').on(table.department),
  })
);

export type TeamMappingRow = typeof teamMappings.$inferSelect;
export type NewTeamMappingRow = typeof teamMappings.$inferInsert;

// ─── Ticket logs ──────────────────────────────────────────────────────────────

export const ticketLogs = pgTable(
  'ticket_logs',
  {
    id: serial('id').primaryKey(),
    ticketId: text('ticket_id').notNull().unique(),
    title: text('title').notNull(),
    description: text('description').notNull(),
    email: text('email').notNull(),
    priority: text('priority').$type<Priority>().notNull(),
    department: text('department').$type<Department>(),
    assignedTo: text('assigned_to'),
    status: text('status').$type<TicketStatus>().notNull(),
    confidenceScore: real('confidence_score'),
    externalTicketId: text('external_ticket_id'),
    routedToSystem: text('routed_to_system'),
    metadata: jsonb('metadata').$type<Record<string, unknown>>().default({}).notNull(),
    errorMessage: text('error_message'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    departmentIdx: index('idx_ticket_logs_department').on(table.department),
    statusIdx: index('idx_ticket_logs_status').on(table.status),
  })
);

export type TicketLogRow = typeof ticketLogs.$inferSelect;
export type NewTicketLogRow = typeof ticketLogs.$inferInsert;
