// Team Mapping Selector
// Pure function — picks the mapping for a ticket priority from a department's mappings.

import { PRIORITY_RANK } from './departments';
import type { Priority } from './departments';
import type { TeamMapping } from './tickets';

/**
 * Selects the active mapping with the highest threshold the ticket priority meets.
 * If the priority meets none of them, the highest-threshold mapping is used.
 * Returns null when there is no active mapping at all.
 */
export function selectTeamMapping(mappings: TeamMapping[], priority: Priority): TeamMapping | null {
  const active = mappings
    .filter((m) => m.isActive)
    .sort((a, b) => PRIORITY_RANK[b.priorityThreshold] - PRIORITY_RANK[a.priorityThreshold]);

  if (active.length === 0) return null;

  const ticketRank = PRIORITY_RANK[priority];
  return active.find((m) => ticketRank >= PRIORITY_RANK[m.priorityThreshold]) ?? active[0];
}
