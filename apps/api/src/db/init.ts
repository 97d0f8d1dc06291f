import { sql } from 'drizzle-orm';
import type { Database } from '../lib/db';
import { teamMappings } from './schema';
import type { NewTeamMappingRow } from './schema';

export const DEFAULT_TEAM_MAPPINGS: NewTeamMappingRow[] = [
  {
    department: 'IT',
    teamName: 'it_support_team',
    apiEndpoint: 'https://your-domain.atlassian.net/rest/api/3/issue',
    apiMethod: 'POST',
    apiHeaders: {},
    priorityThreshold: 'low',
  },
  {
    department: 'HR',
    teamName: 'hr_operations',
    apiEndpoint: 'https://your-domain.freshservice.com/api/v2/tickets',
    apiMethod: 'POST',
    apiHeaders: {},
    priorityThreshold: 'medium',
  },
  {
    department: 'FACILITIES',
    teamName: 'facilities_management',
    apiEndpoint: 'https://webhook.site/facilities-test',
    apiMethod: 'POST',
    apiHeaders: {},
    priorityThreshold: 'low',
  },
  {
    department: 'SECURITY',
    teamName: 'infosec_team',
    apiEndpoint: 'https://webhook.site/security-test',
    apiMethod: 'POST',
    apiHeaders: {},
    priorityThreshold: 'high',
  },
];

/**
 * Creates the tables when missing and seeds default team mappings into an empty table.
 * Safe to run on every startup.
 */
export async function initializeDatabase(db: Database): Promise<void> {
  console.log('[Database] Initializing schema...');

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS team_mappings (
      id SERIAL PRIMARY KEY,
      department TEXT NOT NULL,
      team_name TEXT NOT NULL,
      api_endpoint TEXT NOT NULL,
      api_method TEXT NOT NULL DEFAULT 'POST',
      api_headers JSONB NOT NULL DEFAULT '{}'::jsonb,
      priority_threshold TEXT NOT NULL DEFAULT 'medium',
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_team_mappings_department ON team_mappings (department)`);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS ticket_logs (
      id SERIAL PRIMARY KEY,
      ticket_id TEXT NOT NULL UNIQUE,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      email TEXT NOT NULL,
      priority TEXT NOT NULL,
      department TEXT,
      assigned_to TEXT,
      status TEXT NOT NULL,
      confidence_score REAL,
      external_ticket_id TEXT,
      routed_to_system TEXT,
      metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
      error_message TEXT,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_ticket_logs_department ON ticket_logs (department)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_ticket_logs_status ON ticket_logs (status)`);

  const [{ count }] = await db.select({ count: sql<number>`count(*)::int` }).from(teamMappings);
  if (count === 0) {
    await db.insert(teamMappings).values(DEFAULT_TEAM_MAPPINGS);
    console.log(`[Database] Inserted ${DEFAULT_TEAM_MAPPINGS.length} default team mappings`);
  }

  console.log('[Database] Schema ready');
}
