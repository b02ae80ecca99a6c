/**
 * Ollama Client
 *
 * Local model used by the on-device assistant for open questions that no
 * template covers. Runs on the same machine (default localhost:11434), so
 * nothing sent here leaves the device.
 */

import { z } from 'zod';
import { config } from '../utils/config.js';
import { createLogger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeout.js';

const logger = createLogger('ollama');

const GenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean(),
  eval_count: z.number().optional(),
  total_duration: z.number().optional(),
});

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })).optional(),
});

export interface OllamaGenerateOptions {
  temperature?: number;
  top_p?: number;
  num_predict?: number;
}

function sameModel(installed: string, wanted: string): boolean {
  return installed.replace(':latest', '') === wanted.replace(':latest', '');
}

/**
 * Checks Ollama is running and, when given, that the model is installed.
 */
export async function checkOllamaAvailability(
  modelName: string = config.ollama.model
): Promise<{ available: boolean; model?: string; error?: string }> {
  try {
    const response = await fetch(`${config.ollama.url}/api/tags`, {
      method: 'GET',
      signal: AbortSignal.timeout(5000),
    });

    if (!response.ok) {
      return { available: false, error: `Ollama returned ${response.status}` };
    }

    const parsed = TagsResponseSchema.safeParse(await response.json());
    const models = parsed.success ? parsed.data.models ?? [] : [];

    if (!models.some((m) => sameModel(m.name, modelName))) {
      return {
        available: false,
        error: `Model ${modelName} not found. Run: ollama pull ${modelName}`,
      };
    }

    return { available: true, model: modelName };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    return { available: false, error: `Cannot connect to Ollama: ${message}` };
  }
}

/**
 * Generates a completion from the local model.
 *
 * @throws Error when Ollama is unreachable, answers non-2xx or times out
 */
export async function generateWithOllama(
  prompt: string,
  options: OllamaGenerateOptions = {},
  modelName: string = config.ollama.model
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), TIMEOUTS.LOCAL_MODEL);

  try {
    logger.debug('Sending request to Ollama', {
      model: modelName,
      promptLength: prompt.length,
    });

    const response = await fetch(`${config.ollama.url}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: modelName,
        prompt,
        stream: false,
        options: {
          temperature: options.temperature ?? 0.4,
          top_p: options.top_p ?? 0.9,
          num_predict: options.num_predict ?? 256,
        },
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`Ollama API error: ${response.status} - ${errorText}`);
    }

    const parsed = GenerateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Ollama returned an unexpected body');
    }

    logger.debug('Ollama response received', {
      responseLength: parsed.data.response.length,
      evalCount: parsed.data.eval_count,
      totalDuration: parsed.data.total_duration,
    });

    return parsed.data.response.trim();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new Error(`Ollama request timed out after ${TIMEOUTS.LOCAL_MODEL}ms`);
    }
    throw error;
  } finally {
    clearTimeout(timeoutId);
  }
}
