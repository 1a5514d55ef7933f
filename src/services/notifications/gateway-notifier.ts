// Gateway Notifier
// Posts session status updates to the caller's webhook; never throws

import { Agent, request, type Dispatcher } from 'undici';
import { errorMessage } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import type { Notifier, ProgressPayload, SessionProgress } from './types.js';

export interface GatewayNotifierOptions {
  timeoutMs?: number;
  /** Externally owned dispatcher; left open by close(). */
  dispatcher?: Dispatcher;
  /** Builds the notifier's own channel on first send; closed by close(). */
  createAgent?: (timeoutMs: number) => Dispatcher;
  logger?: Logger;
}

export function toPayload(progress: SessionProgress): ProgressPayload {
  return {
    sessionId: progress.sessionId,
    partialMessage: progress.message,
    status: progress.status,
    isComplete: progress.isComplete,
  };
}

export function createWebhookAgent(timeoutMs: number): Dispatcher {
  return new Agent({
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    connect: { timeout: timeoutMs },
  });
}

export class GatewayNotifier implements Notifier {
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly external?: Dispatcher;
  private readonly createAgent: (timeoutMs: number) => Dispatcher;
  private agent?: Dispatcher;
  private closed = false;

  constructor(options: GatewayNotifierOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.external = options.dispatcher;
    this.createAgent = options.createAgent ?? createWebhookAgent;
    this.log = options.logger ?? componentLogger('gateway-notifier');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private dispatcher(): Dispatcher {
    if (this.external) return this.external;
    if (!this.agent) {
      this.agent = this.createAgent(this.timeoutMs);
    }
    return this.agent;
  }

  async send(progress: SessionProgress): Promise<boolean> {
    if (this.closed) {
      this.log.warn({ sessionId: progress.sessionId }, 'Notifier already closed, update dropped');
      return false;
    }

    try {
      const { statusCode, body } = await request(progress.callbackUrl, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify(toPayload(progress)),
        dispatcher: this.dispatcher(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      const text = await body.text();

      if (statusCode < 200 || statusCode >= 300) {
        this.log.warn(
          { sessionId: progress.sessionId, statusCode, body: text.slice(0, 200) },
          'Webhook rejected status update',
        );
        return false;
      }

      this.log.debug({ sessionId: progress.sessionId, status: progress.status }, 'Status update delivered');
      return true;
    } catch (error) {
      this.log.warn({ sessionId: progress.sessionId, err: errorMessage(error) }, 'Failed to deliver status update');
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const agent = this.agent;
    this.agent = undefined;
    if (agent) {
      await agent.close();
    }
  }
}
