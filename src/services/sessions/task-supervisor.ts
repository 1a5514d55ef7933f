// Task Supervisor
// Runs chat sessions detached from the HTTP request that started them

import { env } from '../../env.js';
import { errorMessage } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { GatewayNotifier } from '../notifications/gateway-notifier.js';
import type { Notifier } from '../notifications/types.js';
import type { ChatSessionService, SessionFactory } from './chat-session.js';

export const START_MESSAGE = 'Message received, starting analysis...';

export interface SessionTask {
  sessionId: string;
  callbackUrl: string;
  message: string;
  userRole?: string;
  previousMessages?: string[];
}

export type SessionOutcome = 'completed' | 'error';

export interface TaskSupervisorOptions {
  /** Channel for the error update when no session could be created. */
  createNotifier?: () => Notifier;
  logger?: Logger;
}

export class TaskSupervisor {
  private readonly inFlight = new Set<Promise<SessionOutcome>>();
  private readonly log: Logger;
  private readonly createNotifier: () => Notifier;

  constructor(
    private readonly createSession: SessionFactory,
    options: TaskSupervisorOptions = {},
  ) {
    this.log = options.logger ?? componentLogger('task-supervisor');
    this.createNotifier =
      options.createNotifier ?? (() => new GatewayNotifier({ timeoutMs: env.NOTIFIER_TIMEOUT_MS }));
  }

  get activeCount(): number {
    return this.inFlight.size;
  }

  /**
   * Starts the session in the background. The returned promise is tracked
   * and never rejects.
   */
  launch(task: SessionTask): Promise<SessionOutcome> {
    const execution = this.run(task).catch((error: unknown) => {
      this.log.error({ sessionId: task.sessionId, err: errorMessage(error) }, 'Session run escaped supervision');
      return 'error' as const;
    });
    this.inFlight.add(execution);
    void execution.finally(() => this.inFlight.delete(execution));
    return execution;
  }

  /**
   * Runs one session end to end. Exactly one terminal update is sent and
   * the session's resources are released on every path.
   */
  async run(task: SessionTask): Promise<SessionOutcome> {
    const { sessionId, callbackUrl } = task;
    let session: ChatSessionService | undefined;

    try {
      session = this.createSession({ sessionId, callbackUrl });
      await session.notify('processing', START_MESSAGE, false);
      await session.initialize();

      const result = await session.ask(task.message, {
        previousMessages: task.previousMessages,
        userRole: task.userRole,
      });

      this.log.info(
        { sessionId, iterations: result.iterations, toolCalls: result.toolCalls, termination: result.termination },
        'Session completed',
      );
      await session.notify('completed', result.response, true);
      return 'completed';
    } catch (error) {
      this.log.error({ sessionId, err: errorMessage(error) }, 'Session failed');
      const message = `Error processing the message: ${errorMessage(error)}`;
      if (session) {
        await session.notify('error', message, true);
      } else {
        await this.notifyWithoutSession(task, message);
      }
      return 'error';
    } finally {
      if (session) {
        await session.close();
      }
    }
  }

  private async notifyWithoutSession(task: SessionTask, message: string): Promise<void> {
    const notifier = this.createNotifier();
    try {
      await notifier.send({
        sessionId: task.sessionId,
        callbackUrl: task.callbackUrl,
        message,
        status: 'error',
        isComplete: true,
      });
    } finally {
      await notifier.close();
    }
  }

  /** Waits for every in-flight session to finish. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }
}
