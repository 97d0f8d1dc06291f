// Keyword Fallback Classifier
// Pure function — no framework imports, no I/O.
// Used whenever the AI classifier is disabled, failing, or returns output we can't use.

import keywordData from './data/keywords.json';
import { defaultTeamFor } from './departments';
import type { Department } from './departments';
import type { ClassificationResult } from './tickets';

type ScoredDepartment = Exclude<Department, 'GENERAL'>;

// Iteration order decides ties: the first department to reach the best score wins
const SCORED_DEPARTMENTS: readonly ScoredDepartment[] = [
  'IT',
  'HR',
  'FACILITIES',
  'SECURITY',
  'FINANCE',
  'LEGAL',
];

const KEYWORDS: Record<ScoredDepartment, readonly string[]> = keywordData;

export const FALLBACK_MODEL_VERSION = 'fallback-keywords';

const NO_MATCH_CONFIDENCE = 0.3;
const MAX_CONFIDENCE = 0.7;

/** Number of the department's keywords that appear anywhere in the text. */
function scoreDepartment(department: ScoredDepartment, text: string): number {
  return KEYWORDS[department].filter((keyword) => text.includes(keyword)).length;
}

/**
 * Classify a ticket from its title and description alone.
 * Zero matches → GENERAL at 0.3; otherwise confidence = min(0.7, 0.4 + 0.1 × score).
 * Never throws.
 */
export function classifyByKeywords(
  title: string,
  description: string,
  processingTimeMs = 0
): ClassificationResult {
  const text = `${title.toLowerCase()} ${description.toLowerCase()}`;

  let bestDepartment: Department = 'GENERAL';
  let bestScore = 0;

  for (const department of SCORED_DEPARTMENTS) {
    const score = scoreDepartment(department, text);
    if (score > bestScore) {
      bestDepartment = department;
      bestScore = score;
    }
  }

  // (4 + score) / 10 keeps the one-decimal steps exact
  const confidenceScore =
    bestScore === 0 ? NO_MATCH_CONFIDENCE : Math.min(MAX_CONFIDENCE, (4 + bestScore) / 10);

  return Object.freeze({
    department: bestDepartment,
    assignedTo: defaultTeamFor(bestDepartment),
    confidenceScore,
    reasoning: `Fallback classification based on keyword analysis. Matched ${bestScore} keywords for ${bestDepartment}.`,
    processingTimeMs,
    modelVersion: FALLBACK_MODEL_VERSION,
  });
}
