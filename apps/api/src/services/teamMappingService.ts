import { and, eq } from 'drizzle-orm';
import { selectTeamMapping } from '@ticket-triage/domain';
import type { Department, Priority, TeamMapping } from '@ticket-triage/domain';
import type { Database } from '../lib/db';
import { teamMappings } from '../db/schema';
import type { TeamMappingRow } from '../db/schema';

export interface TeamMappingStore {
  findActiveByDepartment(department: Department): Promise<TeamMapping[]>;
  findAllActive(): Promise<TeamMapping[]>;
}

function toTeamMapping(row: TeamMappingRow): TeamMapping {
  return {
    id: row.id,
    department: row.department,
    teamName: row.teamName,
    apiEndpoint: row.apiEndpoint,
    apiMethod: row.apiMethod,
    apiHeaders: row.apiHeaders,
    priorityThreshold: row.priorityThreshold,
    isActive: row.isActive,
  };
}

export class DrizzleTeamMappingStore implements TeamMappingStore {
  constructor(private readonly db: Database) {}

  async findActiveByDepartment(department: Department): Promise<TeamMapping[]> {
    const rows = await this.db
      .select()
      .from(teamMappings)
      .where(and(eq(teamMappings.department, department), eq(teamMappings.isActive, true)));
    return rows.map(toTeamMapping);
  }

  async findAllActive(): Promise<TeamMapping[]> {
    const rows = await this.db.select().from(teamMappings).where(eq(teamMappings.isActive, true));
    return rows.map(toTeamMapping);
  }
}

/**
 * Picks the mapping for a department and ticket priority.
 * Returns null when the department has no active mapping.
 */
export async function getTeamMapping(
  store: TeamMappingStore,
  department: Department,
  priority: Priority
): Promise<TeamMapping | null> {
  const mappings = await store.findActiveByDepartment(department);
  return selectTeamMapping(mappings, priority);
}
