/**
 * Cloud Assistant
 *
 * Adapter between the orchestrator and a chat-completion client. Whatever
 * the client throws comes back as a CloudResult failure.
 */

import { config } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { TimeoutError, withTimeout } from '../../utils/timeout.js';
import { createLLMError, isLLMError, type LLMClient, type LLMError } from '../../llm/types.js';
import { createOpenAIClient } from '../../llm/openai.js';
import type { CloudCapability, CloudResult, ProfileSnapshot } from '../router/types.js';
import { buildSystemPrompt } from './prompt-builder.js';

const logger = createLogger('cloud');

function toLLMError(error: unknown): LLMError {
  if (isLLMError(error)) {
    return error;
  }
  if (error instanceof TimeoutError) {
    return createLLMError(error.message, 'TIMEOUT_ERROR', undefined, true);
  }
  const message = error instanceof Error ? error.message : 'Unknown error';
  return createLLMError(message, 'UNKNOWN_ERROR');
}

export class CloudAssistant implements CloudCapability {
  private client: LLMClient;
  private timeoutMs: number;

  /**
   * @param timeoutMs - bound on the whole answer, client retries included
   */
  constructor(client: LLMClient = createOpenAIClient(), timeoutMs: number = config.cloud.timeoutMs) {
    this.client = client;
    this.timeoutMs = timeoutMs;
  }

  /**
   * The profile only reaches the model through `context`; the hybrid
   * pipeline builds it on device.
   */
  async chat(query: string, context: string | undefined, _profile?: ProfileSnapshot | null): Promise<CloudResult> {
    const startTime = Date.now();
    const controller = new AbortController();

    try {
      const response = await withTimeout(
        this.client.complete(buildSystemPrompt(context), [{ role: 'user', content: query }], {
          signal: controller.signal,
        }),
        this.timeoutMs,
        `Cloud answer timed out after ${this.timeoutMs}ms`,
        () => controller.abort()
      );

      logger.info('cloud_answer', {
        latency_ms: Date.now() - startTime,
        with_context: Boolean(context),
        total_tokens: response.usage.totalTokens,
        finish_reason: response.finishReason,
      });

      return { ok: true, content: response.content };
    } catch (error) {
      const llmError = toLLMError(error);
      logger.warn('cloud_failed', {
        code: llmError.code,
        status: llmError.status,
        message: llmError.message,
        latency_ms: Date.now() - startTime,
      });
      return { ok: false, error: llmError };
    }
  }
}
