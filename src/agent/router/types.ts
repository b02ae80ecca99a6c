/**
 * Hybrid Router Types
 *
 * Values shared by the classifier, the routing engine and the assistant
 * orchestrator, plus the capability interfaces the orchestrator calls.
 */

import type { LLMError } from '../../llm/types.js';

/**
 * User preference for where answers are produced.
 */
export const AI_MODES = ['on_device', 'cloud', 'hybrid'] as const;

export type AIMode = (typeof AI_MODES)[number];

export function isAIMode(value: string): value is AIMode {
  return (AI_MODES as readonly string[]).includes(value);
}

/**
 * Where a query is executed. `hybrid` is the three-step pipeline
 * (context on device, answer in the cloud, personalization on device).
 */
export type Provider = 'on_device' | 'cloud' | 'hybrid';

export type RoutingReason =
  | 'user_preference'
  | 'privacy_sensitive'
  | 'network_unavailable'
  | 'simple_query'
  | 'complex_query'
  | 'needs_preprocessing';

export type IntentCategory =
  | 'simple'
  | 'reminder'
  | 'medical_advice'
  | 'emotional_support'
  | 'health_analysis'
  | 'complex';

export interface RoutingDecision {
  provider: Provider;
  reason: RoutingReason;
  /** Only set when the decision reached the classifier */
  intent?: IntentCategory;
}

/**
 * One user turn, as typed or transcribed.
 */
export interface UserQuery {
  readonly text: string;
  readonly isVoiceInput?: boolean;
}

// ============= Profile snapshot =============

export interface MedicationSummary {
  name: string;
  /** "500 mg", "1 tableta" */
  dosage: string;
  /** Next scheduled dose, null when none in the coming week */
  nextDoseAt: Date | null;
}

export interface AppointmentSummary {
  title: string;
  doctorName: string;
  location: string;
  date: Date;
}

export interface VitalSummary {
  /** Display name, e.g. "Presion Arterial" */
  label: string;
  /** Value with unit, e.g. "120/80 mmHg" */
  value: string;
  status: 'low' | 'normal' | 'high';
  measuredAt: Date;
}

/**
 * Read-only view of the care recipient. The assistant never mutates it.
 */
export interface ProfileSnapshot {
  readonly firstName: string;
  readonly lastName: string;
  readonly age: number;
  readonly medicalConditions: readonly string[];
  readonly allergies: readonly string[];
  readonly activeMedications: readonly MedicationSummary[];
  readonly upcomingAppointments: readonly AppointmentSummary[];
  readonly latestVitals: readonly VitalSummary[];
  readonly preferredAIMode?: AIMode;
}

// ============= Capabilities =============

/**
 * On-device processing. Every method resolves; none rejects.
 */
export interface OnDeviceCapability {
  process(query: string, profile?: ProfileSnapshot | null): Promise<string>;
  buildContext(profile?: ProfileSnapshot | null): Promise<string>;
  personalize(text: string, profile?: ProfileSnapshot | null): Promise<string>;
}

export type CloudResult =
  | { ok: true; content: string }
  | { ok: false; error: LLMError };

/**
 * Cloud language model. Failures come back as values, not rejections.
 */
export interface CloudCapability {
  chat(query: string, context: string | undefined, profile?: ProfileSnapshot | null): Promise<CloudResult>;
}

export interface ConnectivityCapability {
  isConnected(): boolean;
}

// ============= Orchestrator output =============

export interface AssistantResponse {
  content: string;
  /** Provider that actually produced the content */
  provider: Provider;
  processingTimeMs: number;
  /** true iff provider is on_device */
  wasPrivacyPreserving: boolean;
  decision: RoutingDecision;
  fellBack: boolean;
  error?: LLMError;
}

export type QueryState =
  | 'idle'
  | 'routing'
  | 'dispatching'
  | 'succeeded'
  | 'falling_back'
  | 'fallback_succeeded';

export interface AssistantStats {
  totalQueries: number;
  byProvider: Record<Provider, number>;
  byReason: Record<RoutingReason, number>;
  fallbacks: number;
  avgProcessingTimeMs: number;
  resetAt: Date;
}
