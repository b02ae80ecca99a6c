/**
 * Sensitivity Filter
 *
 * Flags queries that mention confidential data (passwords, cards, bank,
 * social security). Plain substring match, no word boundaries: "ssn" inside
 * a longer word still counts.
 */

import { SENSITIVE_TERMS } from './keywords.js';

export function findSensitiveTerms(query: string, terms: readonly string[] = SENSITIVE_TERMS): string[] {
  const lower = query.toLowerCase();
  return terms.filter((term) => lower.includes(term));
}

export function isSensitive(query: string, terms: readonly string[] = SENSITIVE_TERMS): boolean {
  const lower = query.toLowerCase();
  return terms.some((term) => lower.includes(term));
}
