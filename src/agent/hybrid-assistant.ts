/**
 * Hybrid Assistant
 *
 * Routes each query and runs it on device, in the cloud, or through the
 * hybrid pipeline (context on device → cloud answer → greeting on device).
 * A failed cloud step is answered once more on device; `process` never
 * rejects as long as the on-device capability keeps its contract.
 *
 * Per query: idle → routing → dispatching → succeeded
 *                                          → falling_back → fallback_succeeded
 */

import { config } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import type { LLMError } from '../llm/types.js';
import {
  routeQuery,
  type RoutingKeywords,
  type AIMode,
  type AssistantResponse,
  type AssistantStats,
  type CloudCapability,
  type CloudResult,
  type ConnectivityCapability,
  type OnDeviceCapability,
  type ProfileSnapshot,
  type Provider,
  type QueryState,
  type RoutingDecision,
} from './router/index.js';

const logger = createLogger('assistant');

export interface HybridAssistantDeps {
  onDevice: OnDeviceCapability;
  cloud: CloudCapability;
  connectivity: ConnectivityCapability;
}

export interface HybridAssistantConfig {
  /** Mode for profiles without a preference */
  defaultMode: AIMode;
  keywords?: Partial<RoutingKeywords>;
}

const DEFAULT_CONFIG: HybridAssistantConfig = {
  defaultMode: config.assistant.defaultMode,
};

export class HybridAssistant {
  private deps: HybridAssistantDeps;
  private config: HybridAssistantConfig;
  private stats: AssistantStats;
  private inFlight = 0;
  private state: QueryState = 'idle';
  private lastErrorValue: LLMError | null = null;
  private currentProviderValue: Provider | null = null;

  constructor(deps: HybridAssistantDeps, config?: Partial<HybridAssistantConfig>) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.stats = this.createEmptyStats();
  }

  get isProcessing(): boolean {
    return this.inFlight > 0;
  }

  /** Error of the most recent query that fell back, cleared when a new query starts */
  get lastError(): LLMError | null {
    return this.lastErrorValue;
  }

  /** Provider chosen for the most recent query */
  get currentProvider(): Provider | null {
    return this.currentProviderValue;
  }

  get queryState(): QueryState {
    return this.state;
  }

  async process(query: string, profile?: ProfileSnapshot | null): Promise<AssistantResponse> {
    const startTime = Date.now();
    this.inFlight++;
    this.lastErrorValue = null;

    try {
      this.transition('routing');
      const decision = routeQuery(query, profile, {
        connectivity: this.deps.connectivity,
        defaultMode: this.config.defaultMode,
        keywords: this.config.keywords,
      });
      this.currentProviderValue = decision.provider;

      this.transition('dispatching');
      const result = await this.dispatch(decision, query, profile);

      if (result.ok) {
        this.transition('succeeded');
        return this.finish({
          content: result.content,
          provider: decision.provider,
          decision,
          fellBack: false,
          startTime,
        });
      }

      this.lastErrorValue = result.error;
      this.transition('falling_back');
      logger.warn('falling_back_to_on_device', {
        provider: decision.provider,
        code: result.error.code,
        error: result.error.message,
      });

      const content = await this.deps.onDevice.process(query, profile);
      this.transition('fallback_succeeded');
      return this.finish({
        content,
        provider: 'on_device',
        decision,
        fellBack: true,
        error: result.error,
        startTime,
      });
    } finally {
      this.inFlight--;
    }
  }

  private async dispatch(
    decision: RoutingDecision,
    query: string,
    profile?: ProfileSnapshot | null
  ): Promise<CloudResult> {
    const { onDevice, cloud } = this.deps;

    switch (decision.provider) {
      case 'on_device':
        return { ok: true, content: await onDevice.process(query, profile) };

      case 'cloud':
        return cloud.chat(query, undefined, profile);

      case 'hybrid': {
        const context = await onDevice.buildContext(profile);
        const result = await cloud.chat(query, context, profile);
        if (!result.ok) {
          return result;
        }
        return { ok: true, content: await onDevice.personalize(result.content, profile) };
      }

      default: {
        const unreachable: never = decision.provider;
        throw new Error(`Unhandled provider: ${String(unreachable)}`);
      }
    }
  }

  private finish(params: {
    content: string;
    provider: Provider;
    decision: RoutingDecision;
    fellBack: boolean;
    error?: LLMError;
    startTime: number;
  }): AssistantResponse {
    const processingTimeMs = Date.now() - params.startTime;
    this.recordStats(params.provider, params.decision, params.fellBack, processingTimeMs);

    logger.info('query_processed', {
      provider: params.provider,
      reason: params.decision.reason,
      fell_back: params.fellBack,
      latency_ms: processingTimeMs,
    });

    const response: AssistantResponse = {
      content: params.content,
      provider: params.provider,
      processingTimeMs,
      wasPrivacyPreserving: params.provider === 'on_device',
      decision: params.decision,
      fellBack: params.fellBack,
    };
    if (params.error) {
      response.error = params.error;
    }
    return response;
  }

  private transition(next: QueryState): void {
    logger.debug('query_state', { from: this.state, to: next });
    this.state = next;
  }

  // ============= Stats =============

  private createEmptyStats(): AssistantStats {
    return {
      totalQueries: 0,
      byProvider: { on_device: 0, cloud: 0, hybrid: 0 },
      byReason: {
        user_preference: 0,
        privacy_sensitive: 0,
        network_unavailable: 0,
        simple_query: 0,
        complex_query: 0,
        needs_preprocessing: 0,
      },
      fallbacks: 0,
      avgProcessingTimeMs: 0,
      resetAt: new Date(),
    };
  }

  private recordStats(provider: Provider, decision: RoutingDecision, fellBack: boolean, latencyMs: number): void {
    this.stats.totalQueries++;
    this.stats.byProvider[provider]++;
    this.stats.byReason[decision.reason]++;
    if (fellBack) {
      this.stats.fallbacks++;
    }

    // Incremental average: new_avg = old_avg + (new_value - old_avg) / n
    const n = this.stats.totalQueries;
    this.stats.avgProcessingTimeMs = this.stats.avgProcessingTimeMs + (latencyMs - this.stats.avgProcessingTimeMs) / n;
  }

  getStats(): AssistantStats {
    return {
      ...this.stats,
      byProvider: { ...this.stats.byProvider },
      byReason: { ...this.stats.byReason },
    };
  }

  resetStats(): void {
    this.stats = this.createEmptyStats();
    logger.info('Assistant stats reset');
  }
}
