import { z } from 'zod';
import { isDepartment, resolveTeam } from '@ticket-triage/domain';
import type { Department } from '@ticket-triage/domain';

export interface ParsedClassification {
  department: Department;
  team: string;
  confidence: number;
  reasoning: string;
  /** Set when the model named a department outside the enumeration. */
  coercedDepartment?: string;
}

const rawClassificationSchema = z.object({
  department: z.string(),
  team: z.string(),
  // Numbers, or numeric strings; null, booleans and blanks are rejected
  confidence: z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite()),
  reasoning: z.string(),
});

/**
 * Returns the first balanced `{...}` substring, honouring braces inside
 * JSON strings. Null when there is no opening brace or it never closes.
 */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

/**
 * Parses and validates a model reply.
 * Returns null if no JSON object is found, it doesn't parse, or a required field is missing.
 * An unknown department becomes GENERAL, confidence is clamped to [0, 1],
 * and a team outside the department's candidates becomes its default team.
 */
export function parseClassificationResponse(responseText: string): ParsedClassification | null {
  const json = extractJsonObject(responseText.trim());
  if (!json) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    return null;
  }

  const parsed = rawClassificationSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { team, confidence, reasoning } = parsed.data;
  const department = isDepartment(parsed.data.department) ? parsed.data.department : 'GENERAL';

  return {
    department,
    team: resolveTeam(department, team),
    confidence: Math.max(0, Math.min(1, confidence)),
    reasoning,
    ...(department !== parsed.data.department && { coercedDepartment: parsed.data.department }),
  };
}
