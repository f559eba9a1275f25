/**
 * Text completion client: Claude only.
 * Never import Anthropic directly in pipeline modules; go through here.
 */
import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../utils/logger.js';

export interface ClaudeOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
}

export interface ClaudeResponse {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

export interface ClaudeClient {
  generateCompletion(prompt: string, systemPrompt?: string, signal?: AbortSignal): Promise<ClaudeResponse>;
}

const isTextBlock = (block: Anthropic.ContentBlock): block is Anthropic.TextBlock => block.type === 'text';

export function createClaudeClient(opts: ClaudeOptions): ClaudeClient {
  const anthropic = new Anthropic({ apiKey: opts.apiKey });

  return {
    async generateCompletion(prompt, systemPrompt, signal) {
      logger.debug('claude.generateCompletion', { model: opts.model, maxTokens: opts.maxTokens });

      const res = await anthropic.messages.create(
        {
          model: opts.model,
          max_tokens: opts.maxTokens,
          temperature: opts.temperature,
          ...(systemPrompt ? { system: systemPrompt } : {}),
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      );

      const text = res.content.filter(isTextBlock).map(b => b.text).join('\n');
      logger.debug('claude.generateCompletion complete', {
        inputTokens: res.usage.input_tokens,
        outputTokens: res.usage.output_tokens,
        stopReason: res.stop_reason,
      });

      return {
        text,
        inputTokens:  res.usage.input_tokens,
        outputTokens: res.usage.output_tokens,
      };
    },
  };
}
