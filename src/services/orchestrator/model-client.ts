// Model Client
// Wraps a provider so that every failure mode collapses into an empty response

import { setTimeout as sleep } from 'timers/promises';
import type { Provider, ProviderMessage } from '../../providers/types.js';
import { ProviderError, errorMessage } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import type { CompletionClient, CompletionRequest } from './types.js';

export interface ModelClientOptions {
  model: string;
  /** A call that exceeds it counts as an empty response. */
  timeoutMs?: number;
  /** Wait applied after an HTTP 429 before the empty response is returned. */
  rateLimitBackoffMs?: number;
  logger?: Logger;
}

export class ModelClient implements CompletionClient {
  private readonly timeoutMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly log: Logger;

  constructor(
    private readonly provider: Provider,
    private readonly options: ModelClientOptions,
  ) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? 5_000;
    this.log = options.logger ?? componentLogger('model-client', { model: options.model });
  }

  async complete(messages: ProviderMessage[], request: CompletionRequest): Promise<string | null> {
    try {
      const response = await this.provider.sendChat(messages, {
        model: this.options.model,
        maxTokens: request.maxTokens,
        temperature: request.temperature,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      return response.content.trim() ? response.content : null;
    } catch (error) {
      if (error instanceof ProviderError && error.isRateLimited) {
        this.log.warn({ backoffMs: this.rateLimitBackoffMs }, 'Rate limit reached, backing off');
        await sleep(this.rateLimitBackoffMs);
        return null;
      }
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        this.log.warn({ timeoutMs: this.timeoutMs }, 'Model call timed out');
        return null;
      }
      this.log.error({ err: errorMessage(error) }, 'Model call failed');
      return null;
    }
  }
}
