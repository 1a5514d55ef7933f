// DeepSeek Provider
// Non-streaming chat completions against the official DeepSeek API

import { z } from 'zod';
import { env } from '../env.js';
import { ProviderError } from '../utils/errors.js';
import type { Provider, ProviderMessage, ProviderOptions, ProviderResponse } from './types.js';

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullish(),
      }),
    }),
  ),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export interface DeepSeekProviderConfig {
  apiKey?: string;
  baseUrl?: string;
}

export class DeepSeekProvider implements Provider {
  name = 'deepseek';
  private apiKey: string;
  private baseUrl: string;

  constructor(config: DeepSeekProviderConfig = {}) {
    this.apiKey = config.apiKey ?? env.DEEPSEEK_API_KEY;
    this.baseUrl = (config.baseUrl ?? env.DEEPSEEK_BASE_URL).replace(/\/+$/, '');
    if (!this.apiKey) {
      throw new Error('DEEPSEEK_API_KEY not configured');
    }
  }

  async sendChat(messages: ProviderMessage[], options: ProviderOptions): Promise<ProviderResponse> {
    const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: options.model || env.DEEPSEEK_MODEL,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        max_tokens: options.maxTokens,
        temperature: options.temperature,
        stream: false,
      }),
      signal: options.signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new ProviderError(this.name, response.status, `DeepSeek API error: ${response.status} - ${error}`);
    }

    const data = ChatCompletionSchema.parse(await response.json());
    const message = data.choices[0]?.message;

    return {
      content: message?.content ?? '',
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
    };
  }
}
