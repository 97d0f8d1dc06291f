// Departments, priorities and candidate teams
// Pure data — no framework imports.

export const DEPARTMENTS = ['IT', 'HR', 'FINANCE', 'FACILITIES', 'LEGAL', 'SECURITY', 'GENERAL'] as const;
export type Department = (typeof DEPARTMENTS)[number];

export const PRIORITIES = ['low', 'medium', 'high', 'critical'] as const;
export type Priority = (typeof PRIORITIES)[number];

export const PRIORITY_RANK: Record<Priority, number> = {
  low:      1,
  medium:   2,
  high:     3,
  critical: 4,
};

// The first entry of each list is the department's default team
export const DEPARTMENT_TEAMS: Record<Department, readonly string[]> = {
  IT:         ['it_support_team', 'network_team', 'security_team', 'infrastructure_team'],
  HR:         ['hr_operations', 'recruiting_team', 'benefits_team', 'employee_relations'],
  FACILITIES: ['facilities_management', 'maintenance_team', 'office_services'],
  FINANCE:    ['finance_team', 'accounting_team', 'procurement_team'],
  LEGAL:      ['legal_team', 'compliance_team', 'contracts_team'],
  SECURITY:   ['physical_security', 'infosec_team', 'compliance_security'],
  GENERAL:    ['general_support', 'admin_team'],
};

export function isDepartment(value: unknown): value is Department {
  return typeof value === 'string' && (DEPARTMENTS as readonly string[]).includes(value);
}

export function defaultTeamFor(department: Department): string {
  return DEPARTMENT_TEAMS[department][0];
}

/**
 * Returns `team` when it belongs to the department's candidate list,
 * otherwise the department's default team.
 */
export function resolveTeam(department: Department, team: string): string {
  return DEPARTMENT_TEAMS[department].includes(team) ? team : defaultTeamFor(department);
}
