import { z } from 'zod';
import { config } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import {
  type ChatTurn,
  type CompleteOptions,
  type LLMResponse,
  type LLMClient,
  codeForStatus,
  createLLMError,
} from './types.js';

const logger = createLogger('openai');

interface ChatCompletionRequest {
  model: string;
  messages: ChatTurn[];
  temperature?: number;
  max_tokens?: number;
}

const ChatCompletionResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string(),
        content: z.string().nullable(),
      }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

const ErrorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

const DEFAULT_RETRY_DELAYS: readonly number[] = [1000, 2000, 4000];
const RETRYABLE_STATUS_CODES = [429, 500, 502, 503, 504];

const FINISH_REASONS: readonly LLMResponse['finishReason'][] = ['stop', 'length', 'content_filter', 'tool_calls'];

/**
 * Resolves early when the signal aborts.
 */
async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }
  return new Promise(resolve => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    logger.debug('Non-JSON body', { body: text.slice(0, 200) });
    return null;
  }
}

function toFinishReason(raw: string | null): LLMResponse['finishReason'] {
  return FINISH_REASONS.find((reason) => reason === raw) ?? 'stop';
}

export interface OpenAIClientOptions {
  apiKey?: string;
  baseUrl?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-request timeout */
  timeoutMs?: number;
  retryDelays?: readonly number[];
}

/**
 * Client for OpenAI-compatible chat completion endpoints.
 */
export class OpenAIClient implements LLMClient {
  private apiKey: string | undefined;
  private baseUrl: string;
  private model: string;
  private temperature: number;
  private maxTokens: number;
  private timeoutMs: number;
  private retryDelays: readonly number[];

  constructor(options?: OpenAIClientOptions) {
    this.apiKey = options?.apiKey ?? config.cloud.apiKey;
    this.baseUrl = options?.baseUrl ?? config.cloud.baseUrl;
    this.model = options?.model ?? config.cloud.model;
    this.temperature = options?.temperature ?? 0.7;
    this.maxTokens = options?.maxTokens ?? 500;
    this.timeoutMs = options?.timeoutMs ?? config.cloud.timeoutMs;
    this.retryDelays = options?.retryDelays ?? DEFAULT_RETRY_DELAYS;
  }

  async complete(systemPrompt: string, messages: ChatTurn[], options?: CompleteOptions): Promise<LLMResponse> {
    const requestBody: ChatCompletionRequest = {
      model: this.model,
      messages: [{ role: 'system', content: systemPrompt }, ...messages],
      temperature: this.temperature,
      max_tokens: this.maxTokens,
    };

    const response = await this.makeRequest(requestBody, options?.signal);

    const choice = response.choices[0];
    const content = choice?.message.content?.trim();
    if (!choice || !content) {
      throw createLLMError('No response choice returned', 'INVALID_RESPONSE');
    }

    return {
      content,
      usage: {
        promptTokens: response.usage?.prompt_tokens ?? 0,
        completionTokens: response.usage?.completion_tokens ?? 0,
        totalTokens: response.usage?.total_tokens ?? 0,
      },
      finishReason: toFinishReason(choice.finish_reason),
    };
  }

  private async makeRequest(
    body: ChatCompletionRequest,
    signal: AbortSignal | undefined,
    attempt: number = 0
  ): Promise<ChatCompletionResponse> {
    if (!this.apiKey) {
      throw createLLMError('CLOUD_API_KEY not configured', 'CONFIG_ERROR');
    }
    if (signal?.aborted) {
      throw createLLMError('Request aborted', 'ABORTED');
    }

    const url = `${this.baseUrl}/chat/completions`;

    logger.debug(`Request attempt ${attempt + 1}`, {
      model: body.model,
      messageCount: body.messages.length,
    });

    let response: Response;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (signal?.aborted) {
          logger.debug('Request aborted by caller');
          throw createLLMError('Request aborted', 'ABORTED');
        }
        logger.error('Request timed out', { timeout_ms: this.timeoutMs });
        throw createLLMError(`Request timed out after ${this.timeoutMs}ms`, 'TIMEOUT_ERROR', undefined, true);
      }

      const networkError = error instanceof Error ? error.message : 'Unknown network error';
      logger.error('Network error', networkError);

      const retryDelay = this.retryDelays[attempt];
      if (retryDelay !== undefined) {
        logger.info(`Retrying in ${retryDelay}ms...`);
        await sleep(retryDelay, signal);
        return this.makeRequest(body, signal, attempt + 1);
      }

      throw createLLMError(`Network error: ${networkError}`, 'NETWORK_ERROR', undefined, true);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }

    const text = await response.text();

    if (!response.ok) {
      const errorBody = ErrorResponseSchema.safeParse(parseJson(text));
      const errorMessage = errorBody.success ? errorBody.data.error.message : `HTTP ${response.status}`;

      logger.error('API error', { status: response.status, message: errorMessage });

      const isRetryable = RETRYABLE_STATUS_CODES.includes(response.status);
      const errorRetryDelay = this.retryDelays[attempt];
      if (isRetryable && errorRetryDelay !== undefined) {
        logger.info(`Retrying in ${errorRetryDelay}ms...`);
        await sleep(errorRetryDelay, signal);
        return this.makeRequest(body, signal, attempt + 1);
      }

      throw createLLMError(errorMessage, codeForStatus(response.status), response.status, isRetryable);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(parseJson(text));
    if (!parsed.success) {
      throw createLLMError('Malformed chat completion response', 'INVALID_RESPONSE', response.status);
    }

    logger.debug('Response received', {
      usage: parsed.data.usage,
      finishReason: parsed.data.choices[0]?.finish_reason,
    });

    return parsed.data;
  }
}

export function createOpenAIClient(options?: OpenAIClientOptions): LLMClient {
  return new OpenAIClient(options);
}
