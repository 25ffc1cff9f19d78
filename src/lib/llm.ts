// src/lib/llm.ts
import { OpenAI } from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import type { AppConfig } from '../config/env.js';

/**
 * One single-turn completion: system instructions plus a user prompt
 */
export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Minimal chat-completion seam shared by every pipeline component.
 * Implementations return the raw text of the first choice ('' if none)
 * and throw on transport or API errors.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

/**
 * OpenAI chat completions. Also serves OpenAI-compatible endpoints
 * (Groq, local gateways) through baseURL.
 */
export class OpenAiCompletionClient implements CompletionClient {
  private openai: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string = DEFAULT_OPENAI_MODEL,
    baseURL?: string
  ) {
    this.openai = new OpenAI({ apiKey, baseURL });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.prompt },
      ],
    });

    return response.choices[0]?.message?.content ?? '';
  }
}

export class AnthropicCompletionClient implements CompletionClient {
  private anthropic: Anthropic;

  constructor(
    apiKey: string,
    private readonly model: string = DEFAULT_ANTHROPIC_MODEL
  ) {
    this.anthropic = new Anthropic({ apiKey });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.anthropic.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.system,
      messages: [
        {
          role: 'user',
          content: request.prompt,
        },
      ],
    });

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      return '';
    }
    return content.text;
  }
}

/**
 * Build the completion client for the configured provider
 *
 * @throws Error if AI_API_KEY is missing
 */
export function createCompletionClient(ai: AppConfig['ai']): CompletionClient {
  if (!ai.apiKey) {
    throw new Error('AI_API_KEY environment variable is required');
  }

  if (ai.provider === 'anthropic') {
    return new AnthropicCompletionClient(ai.apiKey, ai.model);
  }
  return new OpenAiCompletionClient(ai.apiKey, ai.model, ai.baseUrl);
}

/**
 * Sometimes the model wraps output in markdown code blocks - strip them
 */
export function stripCodeFences(text: string): string {
  let cleaned = text.trim();
  if (cleaned.startsWith('```')) {
    cleaned = cleaned.replace(/^```[a-zA-Z]*\s*/, '').replace(/\s*```$/, '');
  }
  return cleaned.trim();
}
