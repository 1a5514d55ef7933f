// Chat Session Service
// Owns one session's capabilities, notifier channel and orchestrator

import { env } from '../../env.js';
import { getProvider } from '../../providers/index.js';
import type { Provider } from '../../providers/types.js';
import { AppError, errorMessage } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { connectMcpServers } from '../mcp/index.js';
import { GatewayNotifier } from '../notifications/gateway-notifier.js';
import { GatewayProgressReporter, type ProgressTarget } from '../notifications/progress-reporter.js';
import { silentProgress, type NotificationStatus, type Notifier } from '../notifications/types.js';
import { ResultClassifier } from '../orchestrator/classifier.js';
import { ToolExecutor } from '../orchestrator/executor.js';
import { ModelClient } from '../orchestrator/model-client.js';
import { ToolOrchestrator, type SessionHistory } from '../orchestrator/orchestrator.js';
import type { OrchestratorOptions, OrchestratorResult } from '../orchestrator/types.js';
import { getBuiltinTools } from '../tools/index.js';
import { ToolRegistry } from '../tools/registry.js';
import type { CapabilityProvider, ToolDefinition } from '../tools/types.js';

export interface ChatSessionConfig {
  /** Resolved on initialize() when given as a function. */
  provider: Provider | (() => Provider);
  model: string;
  /** Model used for result classification; defaults to `model`. */
  classifierModel?: string;
  modelTimeoutMs?: number;
  /** Opens the session's external capability connections. */
  connectCapabilities?: () => Promise<CapabilityProvider>;
  builtinTools?: ToolDefinition[];
  allowedTools?: string[];
  toolTimeoutMs?: number;
  orchestrator?: OrchestratorOptions;
  /** Webhook channel and its target; absent for synchronous sessions. */
  notifier?: Notifier;
  target?: ProgressTarget;
  logger?: Logger;
}

export class ChatSessionService {
  private readonly log: Logger;
  private provider?: Provider;
  private capabilities?: CapabilityProvider;
  private registry?: ToolRegistry;
  private setup?: Promise<void>;
  private closed = false;

  constructor(private readonly config: ChatSessionConfig) {
    this.log = config.logger ?? componentLogger('chat-session', { sessionId: config.target?.sessionId });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get tools(): string[] {
    return this.registry?.names() ?? [];
  }

  async initialize(): Promise<void> {
    if (this.closed) {
      throw AppError.internal('Chat session is closed');
    }
    if (!this.setup) {
      this.setup = this.connect();
    }
    await this.setup;
  }

  private async connect(): Promise<void> {
    const { provider } = this.config;
    this.provider = typeof provider === 'function' ? provider() : provider;

    if (this.config.connectCapabilities) {
      this.capabilities = await this.config.connectCapabilities();
    }
    const catalog = [
      ...(this.config.builtinTools ?? []),
      ...(this.capabilities?.getToolDefinitions() ?? []),
    ];
    this.registry = ToolRegistry.fromCatalog(catalog, this.config.allowedTools ?? []);
    this.log.info({ tools: this.registry.names() }, 'Session initialized');
  }

  /**
   * Sends one status update to the session's webhook. Returns false when the
   * session has no webhook or delivery failed.
   */
  async notify(status: NotificationStatus, message: string, isComplete: boolean): Promise<boolean> {
    const { notifier, target } = this.config;
    if (!notifier || !target) return false;
    return notifier.send({ ...target, message, status, isComplete });
  }

  async ask(query: string, history: SessionHistory = {}): Promise<OrchestratorResult> {
    await this.initialize();
    const { registry, provider } = this;
    if (!registry || !provider) {
      throw AppError.internal('Chat session is not initialized');
    }

    const { model, notifier, target } = this.config;
    const timeoutMs = this.config.modelTimeoutMs;
    const client = new ModelClient(provider, { model, timeoutMs });
    const classifierClient = new ModelClient(provider, { model: this.config.classifierModel ?? model, timeoutMs });

    const orchestrator = new ToolOrchestrator(
      {
        client,
        classifier: new ResultClassifier(classifierClient),
        executor: new ToolExecutor(registry, { timeoutMs: this.config.toolTimeoutMs }),
        toolsDescription: registry.describe(),
        progress: notifier && target ? new GatewayProgressReporter(notifier, target) : silentProgress,
      },
      this.config.orchestrator,
    );

    return orchestrator.run(query, history);
  }

  /** Releases capability connections, then the notifier channel. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.capabilities) {
      try {
        await this.capabilities.close();
      } catch (error) {
        this.log.warn({ err: errorMessage(error) }, 'Failed to close capability provider');
      }
    }
    if (this.config.notifier) {
      try {
        await this.config.notifier.close();
      } catch (error) {
        this.log.warn({ err: errorMessage(error) }, 'Failed to close notifier');
      }
    }
  }
}

export type SessionFactory = (target?: ProgressTarget) => ChatSessionService;

/**
 * Builds sessions from environment configuration. A webhook notifier is
 * created only for sessions with a callback target.
 */
export function createSessionFactory(): SessionFactory {
  return target =>
    new ChatSessionService({
      provider: () => getProvider('deepseek'),
      model: env.DEEPSEEK_MODEL,
      classifierModel: env.CLASSIFIER_MODEL,
      modelTimeoutMs: env.MODEL_TIMEOUT_MS,
      connectCapabilities: () => connectMcpServers(env.MCP_CONFIG_PATH),
      builtinTools: getBuiltinTools(),
      allowedTools: env.ALLOWED_TOOLS,
      toolTimeoutMs: env.TOOL_TIMEOUT_MS,
      orchestrator: {
        maxIterations: env.MAX_ITERATIONS,
        iterationDelayMs: env.ITERATION_DELAY_MS,
      },
      notifier: target ? new GatewayNotifier({ timeoutMs: env.NOTIFIER_TIMEOUT_MS }) : undefined,
      target,
    });
}
