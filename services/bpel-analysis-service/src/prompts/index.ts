/**
 * Prompt Registry & Executor
 *
 * Each prompt is:
 * - Typed with Zod schemas for output validation
 * - Versioned, so stored analyses record which prompt drafted their text
 *
 * Prompts only draft prose for the PRD. Nothing a prompt returns feeds back
 * into the extracted summary.
 */

import { z } from 'zod';
import Anthropic from '@anthropic-ai/sdk';
import { config } from '../config';
import { createLogger, truncate } from '../../../../shared/utils';

const logger = createLogger('prompts');

// ============================================================================
// Types
// ============================================================================

export interface PromptDefinition<TInput, TOutput> {
  /** Unique identifier */
  id: string;
  /** Semantic version */
  version: string;
  description: string;
  systemPrompt: string;
  buildUserMessage: (input: TInput) => string;
  outputSchema: z.ZodType<TOutput>;
  modelPreferences?: {
    preferredModel?: string;
    temperature?: number;
    maxTokens?: number;
  };
}

export interface PromptExecutionResult<T> {
  success: boolean;
  data?: T;
  error?: string;
  rawResponse?: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
  model: string;
  promptVersion: string;
  executionTimeMs: number;
}

export interface PromptInfo {
  id: string;
  version: string;
  description: string;
}

// ============================================================================
// Prompt Registry
// ============================================================================

const promptRegistry = new Map<string, PromptInfo>();

export function registerPrompt<TInput, TOutput>(prompt: PromptDefinition<TInput, TOutput>): PromptDefinition<TInput, TOutput> {
  promptRegistry.set(prompt.id, { id: prompt.id, version: prompt.version, description: prompt.description });
  return prompt;
}

export function listPrompts(): PromptInfo[] {
  return Array.from(promptRegistry.values());
}

// ============================================================================
// Prompt Executor
// ============================================================================

const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.2;

let anthropic: Anthropic | undefined;

function client(): Anthropic {
  if (!anthropic) {
    anthropic = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return anthropic;
}

/**
 * Pull the JSON document out of a model response (handles markdown fences and
 * leading prose).
 */
export function extractJson(rawResponse: string): string {
  let jsonStr = rawResponse.trim();

  const fenced = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced) {
    jsonStr = fenced[1].trim();
  }

  const jsonStart = jsonStr.search(/[[{]/);
  if (jsonStart > 0) {
    jsonStr = jsonStr.slice(jsonStart);
  }
  return jsonStr;
}

/**
 * Execute a prompt with validation
 */
export async function executePrompt<TInput, TOutput>(
  prompt: PromptDefinition<TInput, TOutput>,
  input: TInput,
  options?: {
    model?: string;
    temperature?: number;
    maxTokens?: number;
  }
): Promise<PromptExecutionResult<TOutput>> {
  const startTime = Date.now();
  const model = options?.model ?? prompt.modelPreferences?.preferredModel ?? config.aiModel;
  const temperature = options?.temperature ?? prompt.modelPreferences?.temperature ?? DEFAULT_TEMPERATURE;
  const maxTokens = options?.maxTokens ?? prompt.modelPreferences?.maxTokens ?? DEFAULT_MAX_TOKENS;

  const failure = (error: string, rawResponse?: string): PromptExecutionResult<TOutput> => ({
    success: false,
    error,
    rawResponse,
    model,
    promptVersion: prompt.version,
    executionTimeMs: Date.now() - startTime,
  });

  try {
    const response = await client().messages.create({
      model,
      max_tokens: maxTokens,
      temperature,
      system: prompt.systemPrompt,
      messages: [{ role: 'user', content: prompt.buildUserMessage(input) }],
    });

    const textBlock = response.content.find(c => c.type === 'text');
    if (!textBlock || textBlock.type !== 'text') {
      return failure('No text content in response');
    }

    const rawResponse = textBlock.text;
    const jsonStr = extractJson(rawResponse);

    let parsed: unknown;
    try {
      parsed = JSON.parse(jsonStr);
    } catch (parseError) {
      logger.warn('JSON parse failed', { promptId: prompt.id, response: truncate(rawResponse, 500) });
      return failure(`Failed to parse JSON: ${parseError instanceof Error ? parseError.message : String(parseError)}`, rawResponse);
    }

    const validated = prompt.outputSchema.safeParse(parsed);
    if (!validated.success) {
      return failure(`Validation failed: ${validated.error.message}`, rawResponse);
    }

    return {
      success: true,
      data: validated.data,
      rawResponse,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model,
      promptVersion: prompt.version,
      executionTimeMs: Date.now() - startTime,
    };
  } catch (error) {
    return failure(error instanceof Error ? error.message : 'Unknown error');
  }
}
