export { classify, countWords, matchKeyword, SIMPLE_QUERY_MAX_WORDS } from './classifier.js';
export { isSensitive, findSensitiveTerms } from './sensitivity-filter.js';
export { routeQuery, resolveMode, INTENT_ROUTES, type RoutingContext } from './routing-engine.js';
export {
  DEFAULT_ROUTING_KEYWORDS,
  SENSITIVE_TERMS,
  KEYWORD_PRIORITY,
  mergeKeywords,
  type RoutingKeywords,
  type KeywordIntent,
} from './keywords.js';
export * from './types.js';
