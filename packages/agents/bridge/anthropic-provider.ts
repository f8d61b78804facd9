// Generation provider backed by the Anthropic Messages API

import Anthropic from '@anthropic-ai/sdk';
import type { GenerationProvider } from '../types/provider.js';
import { MalformedOutputError } from '../utils/errors.js';
import { tryParseFirstJsonObject } from '../utils/json.js';

const JSON_DIRECTIVE = 'Respond with a single valid JSON object and nothing else. Do not wrap it in code fences.';

export interface MessageRequest {
  model: string;
  maxTokens: number;
  temperature: number;
  system: string;
  content: string;
}

/** Sends one message and resolves with the concatenated text of the reply */
export type MessageSender = (request: MessageRequest) => Promise<string>;

export function anthropicSender(client: Anthropic): MessageSender {
  return async (request) => {
    const response = await client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.system,
      messages: [{ role: 'user', content: request.content }],
    });
    return response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
  };
}

export interface AnthropicProviderOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  /** Defaults to ANTHROPIC_API_KEY via the SDK */
  apiKey?: string;
  /** Replaces the SDK client, e.g. in tests */
  send?: MessageSender;
}

export class AnthropicProvider implements GenerationProvider {
  readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly send: MessageSender;

  constructor(options: AnthropicProviderOptions) {
    this.model = options.model;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
    this.send = options.send ?? anthropicSender(new Anthropic({ apiKey: options.apiKey }));
  }

  async complete(instructions: string, content: string): Promise<string> {
    const text = await this.send({
      model: this.model,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      system: instructions,
      content,
    });
    if (text.trim() === '') throw new Error(`${this.model} returned an empty completion`);
    return text.trim();
  }

  async completeStructured(instructions: string, content: string): Promise<unknown> {
    const text = await this.send({
      model: this.model,
      maxTokens: this.maxTokens,
      temperature: this.temperature,
      system: `${instructions}\n\n${JSON_DIRECTIVE}`,
      content,
    });
    const parsed = tryParseFirstJsonObject(text);
    if (!parsed) throw new MalformedOutputError(text);
    return parsed;
  }
}
