// External Ticket ID Extraction
// Pure function — an ordered table of (path, key) rules per system, first hit wins.

import type { SystemName } from './systemResolver';

export interface ExtractionRule {
  path: readonly string[]; // nested objects to descend into, empty for top level
  key: string;
}

const GENERIC_KEYS = ['id', 'ticket_id', 'key', 'number'];
const GENERIC_CONTAINERS = ['ticket', 'issue', 'data'];

const GENERIC_RULES: readonly ExtractionRule[] = [
  ...GENERIC_KEYS.map((key) => ({ path: [], key })),
  ...GENERIC_CONTAINERS.flatMap((container) => GENERIC_KEYS.map((key) => ({ path: [container], key }))),
];

// Slack incoming webhooks never return an identifier; one is synthesized instead
export const EXTRACTION_RULES: Record<SystemName, readonly ExtractionRule[]> = {
  jira:         [{ path: [], key: 'key' }, { path: [], key: 'id' }],
  freshservice: [{ path: ['ticket'], key: 'id' }],
  slack:        [],
  webhook_test: GENERIC_RULES,
  unknown:      GENERIC_RULES,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asIdentifier(value: unknown): string | null {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function applyRule(body: Record<string, unknown>, rule: ExtractionRule): string | null {
  let current: unknown = body;
  for (const segment of rule.path) {
    if (!isRecord(current)) return null;
    current = current[segment];
  }
  return isRecord(current) ? asIdentifier(current[rule.key]) : null;
}

/**
 * Pulls the downstream ticket identifier out of a parsed response body.
 * Returns null when no rule yields a string or numeric value.
 */
export function extractExternalTicketId(
  system: SystemName,
  body: unknown,
  nowMs: number = Date.now()
): string | null {
  if (system === 'slack') {
    return `slack_${Math.floor(nowMs / 1000)}`;
  }
  if (!isRecord(body)) return null;

  for (const rule of EXTRACTION_RULES[system]) {
    const id = applyRule(body, rule);
    if (id !== null) return id;
  }
  return null;
}
