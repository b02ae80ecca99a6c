/**
 * Routing Engine
 *
 * Decides where a query is answered. Rules, first match wins:
 *   1. preference on_device          → on_device / user_preference
 *   2. preference cloud              → cloud / user_preference, or on_device / network_unavailable
 *   3. sensitive query               → on_device / privacy_sensitive
 *   4. offline                       → on_device / network_unavailable
 *   5. intent (see INTENT_ROUTES)
 *
 * Explicit preferences are honored before the sensitivity filter runs.
 */

import { createLogger } from '../../utils/logger.js';
import { classify } from './classifier.js';
import { findSensitiveTerms } from './sensitivity-filter.js';
import { mergeKeywords, type RoutingKeywords } from './keywords.js';
import type {
  AIMode,
  ConnectivityCapability,
  IntentCategory,
  ProfileSnapshot,
  Provider,
  RoutingDecision,
  RoutingReason,
} from './types.js';

const logger = createLogger('router');

export interface RoutingContext {
  connectivity: ConnectivityCapability;
  /** Used when the profile is absent or carries no preference */
  defaultMode: AIMode;
  keywords?: Partial<RoutingKeywords>;
}

export const INTENT_ROUTES: Readonly<Record<IntentCategory, { provider: Provider; reason: RoutingReason }>> = {
  simple: { provider: 'on_device', reason: 'simple_query' },
  reminder: { provider: 'on_device', reason: 'simple_query' },
  medical_advice: { provider: 'cloud', reason: 'complex_query' },
  emotional_support: { provider: 'cloud', reason: 'complex_query' },
  complex: { provider: 'cloud', reason: 'complex_query' },
  health_analysis: { provider: 'hybrid', reason: 'needs_preprocessing' },
};

export function resolveMode(profile: ProfileSnapshot | null | undefined, defaultMode: AIMode): AIMode {
  return profile?.preferredAIMode ?? defaultMode;
}

function decide(query: string, mode: AIMode, context: RoutingContext): RoutingDecision {
  if (mode === 'on_device') {
    return { provider: 'on_device', reason: 'user_preference' };
  }

  // Read once; the same value serves every rule below
  const connected = context.connectivity.isConnected();

  if (mode === 'cloud') {
    if (!connected) {
      return { provider: 'on_device', reason: 'network_unavailable' };
    }
    const terms = findSensitiveTerms(query);
    if (terms.length > 0) {
      logger.warn('sensitive_query_to_cloud', { mode, terms });
    }
    return { provider: 'cloud', reason: 'user_preference' };
  }

  if (findSensitiveTerms(query).length > 0) {
    return { provider: 'on_device', reason: 'privacy_sensitive' };
  }

  if (!connected) {
    return { provider: 'on_device', reason: 'network_unavailable' };
  }

  const intent = classify(query, mergeKeywords(context.keywords));
  return { ...INTENT_ROUTES[intent], intent };
}

export function routeQuery(
  query: string,
  profile: ProfileSnapshot | null | undefined,
  context: RoutingContext
): RoutingDecision {
  const mode = resolveMode(profile, context.defaultMode);
  const decision = decide(query, mode, context);

  logger.info('routing_decision', {
    mode,
    provider: decision.provider,
    reason: decision.reason,
    ...(decision.intent && { intent: decision.intent }),
  });

  return decision;
}
