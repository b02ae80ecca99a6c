/**
 * Query Classifier
 *
 * Keyword intent classification. Pure and total: every string, including
 * the empty one, maps to exactly one category.
 */

import type { IntentCategory } from './types.js';
import { DEFAULT_ROUTING_KEYWORDS, KEYWORD_PRIORITY, type RoutingKeywords } from './keywords.js';

/**
 * Queries shorter than this (in words) with no keyword hit are simple.
 */
export const SIMPLE_QUERY_MAX_WORDS = 10;

export function countWords(query: string): number {
  return query.split(/\s+/).filter((w) => w.length > 0).length;
}

/**
 * Returns the keyword that decided the category, for logging.
 */
export function matchKeyword(
  query: string,
  keywords: RoutingKeywords = DEFAULT_ROUTING_KEYWORDS
): { intent: IntentCategory; keyword: string } | null {
  const lower = query.toLowerCase();

  for (const intent of KEYWORD_PRIORITY) {
    const keyword = keywords[intent].find((k) => lower.includes(k));
    if (keyword !== undefined) {
      return { intent, keyword };
    }
  }

  return null;
}

export function classify(query: string, keywords: RoutingKeywords = DEFAULT_ROUTING_KEYWORDS): IntentCategory {
  const match = matchKeyword(query, keywords);
  if (match) {
    return match.intent;
  }

  return countWords(query) < SIMPLE_QUERY_MAX_WORDS ? 'simple' : 'complex';
}
