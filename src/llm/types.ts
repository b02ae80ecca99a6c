export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatTurn {
  role: MessageRole;
  content: string;
}

export interface LLMResponse {
  content: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'content_filter' | 'tool_calls';
}

export interface CompleteOptions {
  /** Aborting stops the request in flight and any retry still to come */
  signal?: AbortSignal;
}

export interface LLMClient {
  complete(systemPrompt: string, messages: ChatTurn[], options?: CompleteOptions): Promise<LLMResponse>;
}

export type LLMErrorCode =
  | 'CONFIG_ERROR'
  | 'NETWORK_ERROR'
  | 'TIMEOUT_ERROR'
  | 'ABORTED'
  | 'API_ERROR'
  | 'RATE_LIMITED'
  | 'AUTH_ERROR'
  | 'INVALID_RESPONSE'
  | 'UNKNOWN_ERROR';

export interface LLMError extends Error {
  code: LLMErrorCode;
  status?: number;
  retryable: boolean;
}

class ProviderError extends Error implements LLMError {
  code: LLMErrorCode;
  status?: number;
  retryable: boolean;

  constructor(message: string, code: LLMErrorCode, status: number | undefined, retryable: boolean) {
    super(message);
    this.name = 'LLMError';
    this.code = code;
    this.status = status;
    this.retryable = retryable;
  }
}

export function createLLMError(
  message: string,
  code: LLMErrorCode,
  status?: number,
  retryable: boolean = false
): LLMError {
  return new ProviderError(message, code, status, retryable);
}

export function isLLMError(error: unknown): error is LLMError {
  return error instanceof ProviderError;
}

/**
 * HTTP status → error code.
 */
export function codeForStatus(status: number): LLMErrorCode {
  if (status === 401 || status === 403) return 'AUTH_ERROR';
  if (status === 429) return 'RATE_LIMITED';
  return 'API_ERROR';
}
