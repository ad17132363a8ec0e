/**
 * AI Service
 *
 * Optional language-model drafting on top of the deterministic analysis. The
 * analysis never depends on it: without an API key, or when the call fails,
 * the PRD is rendered without the AI section.
 */

import { config } from '../config';
import { executePrompt } from '../prompts';
import { businessOverviewPrompt, BusinessOverview } from '../prompts/business-overview';
import { BpelSummary } from '../types/summary';
import { Logger } from '../../../../shared/utils';

export function isAnthropicConfigured(): boolean {
  return config.anthropicApiKey.length > 0;
}

export async function draftBusinessOverview(summary: BpelSummary, logger: Logger): Promise<BusinessOverview | undefined> {
  if (!isAnthropicConfigured()) {
    logger.warn('AI overview requested but ANTHROPIC_API_KEY is not set', { process: summary.process.name });
    return undefined;
  }

  const result = await executePrompt(businessOverviewPrompt, { summary });
  if (!result.success || !result.data) {
    logger.warn('AI overview failed, continuing without it', {
      process: summary.process.name,
      error: result.error,
      model: result.model,
    });
    return undefined;
  }

  logger.info('AI overview drafted', {
    process: summary.process.name,
    model: result.model,
    promptVersion: result.promptVersion,
    executionTimeMs: result.executionTimeMs,
  });
  return result.data;
}
