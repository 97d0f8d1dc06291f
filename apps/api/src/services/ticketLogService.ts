import { count, eq, sql } from 'drizzle-orm';
import type { ProcessedTicket } from '@ticket-triage/domain';
import type { Database } from '../lib/db';
import { ticketLogs } from '../db/schema';
import type { NewTicketLogRow, TicketLogRow } from '../db/schema';

export interface TicketMetrics {
  totalTicketsProcessed: number;
  successRate: number; // percent, two decimals
  departmentDistribution: Record<string, number>;
}

export interface TicketLogStore {
  /** Inserts the ticket's log row or updates the row with the same ticket id. */
  upsert(ticket: ProcessedTicket): Promise<void>;
  findByTicketId(ticketId: string): Promise<TicketLogRow | null>;
  getMetrics(): Promise<TicketMetrics>;
  /** Cheap round-trip used by the health check. */
  ping(): Promise<void>;
}

export function successRate(routed: number, total: number): number {
  return total > 0 ? Math.round((routed / total) * 10_000) / 100 : 0;
}

function toLogRow(ticket: ProcessedTicket): NewTicketLogRow {
  return {
    ticketId: ticket.ticketId,
    title: ticket.title,
    description: ticket.description,
    email: ticket.email,
    priority: ticket.priority,
    department: ticket.department ?? null,
    assignedTo: ticket.assignedTo ?? null,
    status: ticket.status,
    confidenceScore: ticket.confidenceScore ?? null,
    externalTicketId: ticket.externalTicketId ?? null,
    routedToSystem: ticket.routedToSystem ?? null,
    metadata: ticket.metadata,
    errorMessage: ticket.routingError ?? null,
  };
}

export class DrizzleTicketLogStore implements TicketLogStore {
  constructor(private readonly db: Database) {}

  async upsert(ticket: ProcessedTicket): Promise<void> {
    const row = toLogRow(ticket);

    // Identity and reporter fields are fixed at insert time
    await this.db
      .insert(ticketLogs)
      .values({ ...row, createdAt: ticket.createdAt ?? new Date() })
      .onConflictDoUpdate({
        target: ticketLogs.ticketId,
        set: {
          department: row.department,
          assignedTo: row.assignedTo,
          status: row.status,
          confidenceScore: row.confidenceScore,
          externalTicketId: row.externalTicketId,
          routedToSystem: row.routedToSystem,
          metadata: row.metadata,
          errorMessage: row.errorMessage,
          updatedAt: new Date(),
        },
      });
  }

  async findByTicketId(ticketId: string): Promise<TicketLogRow | null> {
    const [row] = await this.db.select().from(ticketLogs).where(eq(ticketLogs.ticketId, ticketId)).limit(1);
    return row ?? null;
  }

  async getMetrics(): Promise<TicketMetrics> {
    const [totals] = await this.db
      .select({
        total: count(),
        routed: sql<number>`count(*) filter (where ${ticketLogs.status} = 'routed')::int`,
      })
      .from(ticketLogs);

    const departments = await this.db
      .select({ department: ticketLogs.department, total: count() })
      .from(ticketLogs)
      .where(sql`${ticketLogs.department} is not null`)
      .groupBy(ticketLogs.department);

    const departmentDistribution: Record<string, number> = {};
    for (const { department, total } of departments) {
      if (department) departmentDistribution[department] = total;
    }

    const total = totals?.total ?? 0;
    return {
      totalTicketsProcessed: total,
      successRate: successRate(totals?.routed ?? 0, total),
      departmentDistribution,
    };
  }

  async ping(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }
}
