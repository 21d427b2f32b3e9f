/**
 * Content collaborator
 * Generates research, drafts, reviews and classifications; adapters never throw, they answer {error}
 */

import OpenAI from 'openai';
import { ContentConfig } from '../config/types';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

export interface ContentRequest {
  stage: string;
  prompt: string;
  priorStageOutput: string;
  leadContext: string;
  // Ask the model for a JSON object
  json?: boolean;
  signal?: AbortSignal;
}

export type ContentResponse = { text: string } | { error: string };

export interface ContentClient {
  generate(request: ContentRequest): Promise<ContentResponse>;
}

const SYSTEM_PROMPT =
  'You are a sales development assistant for a small web agency. ' +
  'Be concrete, brief and factual. Never invent facts about the business.';

export class OpenAIContentClient implements ContentClient {
  private readonly client: OpenAI;

  constructor(
    private readonly config: ContentConfig,
    client?: OpenAI
  ) {
    this.client = client ?? new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
  }

  async generate(request: ContentRequest): Promise<ContentResponse> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          response_format: request.json ? { type: 'json_object' } : undefined,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: request.prompt },
          ],
        },
        { signal: request.signal }
      );

      const text = completion.choices[0]?.message?.content?.trim() ?? '';
      if (!text) {
        return { error: `Empty ${request.stage} response` };
      }
      return { text };
    } catch (error) {
      logger.debug('Content request failed', { stage: request.stage, error: errorMessage(error) });
      return { error: errorMessage(error) };
    }
  }
}
