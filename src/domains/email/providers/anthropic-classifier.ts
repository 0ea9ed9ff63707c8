/**
 * @fileoverview Classification service backed by the Anthropic Messages API.
 *
 * Sends one email per request with a JSON-only instruction prompt and
 * returns the parsed JSON untouched; the categorizer validates it.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { ClassificationError } from '../../../utils/errors.js';
import { buildClassificationMessage, buildClassificationPrompt } from '../service/prompt.js';
import type {
  ClassificationInput,
  ClassificationService,
  ClassifyOptions,
  OwnOrganization,
} from '../types.js';

const DEFAULT_MAX_TOKENS = 512;

export interface AnthropicClassifierOptions {
  client: Anthropic;
  modelId: string;
  ownOrganization: OwnOrganization;
  maxTokens?: number;
}

/**
 * Parse a JSON answer, tolerating a surrounding markdown code fence.
 * @throws ClassificationError when the text is not JSON
 */
export function parseJsonResponse(text: string): unknown {
  let jsonText = text.trim();
  const codeBlockMatch = jsonText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (codeBlockMatch) {
    jsonText = codeBlockMatch[1].trim();
  }

  try {
    return JSON.parse(jsonText);
  } catch {
    throw new ClassificationError('Classifier response is not valid JSON', { length: jsonText.length });
  }
}

export class AnthropicClassificationService implements ClassificationService {
  private readonly systemPrompt: string;

  constructor(private readonly options: AnthropicClassifierOptions) {
    this.systemPrompt = buildClassificationPrompt(options.ownOrganization);
  }

  async classify(input: ClassificationInput, { signal, timeoutMs }: ClassifyOptions): Promise<unknown> {
    const response = await this.options.client.messages.create(
      {
        model: this.options.modelId,
        max_tokens: this.options.maxTokens ?? DEFAULT_MAX_TOKENS,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: buildClassificationMessage(input) }],
      },
      { signal, timeout: timeoutMs, maxRetries: 0 }
    );

    const textBlock = response.content.find(
      (block): block is TextBlock => block.type === 'text'
    );
    if (!textBlock) {
      throw new ClassificationError('No text response from classifier');
    }
    return parseJsonResponse(textBlock.text);
  }
}
