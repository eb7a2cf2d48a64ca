import Anthropic from '@anthropic-ai/sdk';
import { Logger } from '../utils/logger.js';
import { TextGenerator } from './text-generator.js';

export interface AnthropicGeneratorOptions {
  apiKey: string | undefined;
  model: string;
  maxTokens: number;
}

export class EmptyCompletionError extends Error {
  constructor(readonly model: string) {
    super(`Model ${model} returned no text`);
    this.name = 'EmptyCompletionError';
  }
}

export class AnthropicTextGenerator implements TextGenerator {
  private client: Anthropic;
  private model: string;
  private maxTokens: number;

  constructor(options: AnthropicGeneratorOptions) {
    this.client = new Anthropic({
      apiKey: options.apiKey || 'demo-key'
    });
    this.model = options.model;
    this.maxTokens = options.maxTokens;
  }

  async generate(systemPrompt: string, userMessage: string): Promise<string> {
    const startTime = Date.now();
    Logger.inference(`[Anthropic] Request model=${this.model} systemPrompt=${systemPrompt.length} chars`);

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      system: systemPrompt,
      messages: [{ role: 'user', content: userMessage }]
    });

    const text = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('')
      .trim();

    Logger.inference(`[Anthropic] Response in ${Date.now() - startTime}ms`, {
      stopReason: response.stop_reason,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens
    });

    if (!text) {
      throw new EmptyCompletionError(this.model);
    }
    return text;
  }
}
