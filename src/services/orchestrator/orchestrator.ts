// Tool Orchestrator
// Bounded loop: model reply → extract requests → execute → classify → follow up

import { setTimeout as sleep } from 'timers/promises';
import type { ProviderMessage } from '../../providers/types.js';
import { AppError } from '../../utils/errors.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { silentProgress, type ProgressSink } from '../notifications/types.js';
import type { ResultClassifier } from './classifier.js';
import type { ToolExecutor } from './executor.js';
import { looksLikeToolRequest, parseToolRequests } from './parser.js';
import {
  buildAlternativePrompt,
  buildContinuePrompt,
  buildCorrectivePrompt,
  buildEvidenceSummary,
  buildFinalPrompt,
  buildFollowUpAssistantNote,
  buildHistoryMessage,
  buildSimplifiedRetryPrompt,
  buildSystemPreamble,
  containsSentinel,
  synthesisTimeoutAnswer,
  toolLoopFallbackAnswer,
} from './prompts.js';
import type {
  CompletionClient,
  CompletionRequest,
  ConversationContext,
  FollowUpKind,
  IterationOutcome,
  OrchestratorOptions,
  OrchestratorResult,
  TerminationReason,
  ToolExecutionRecord,
  ToolInvocationRequest,
} from './types.js';

/** Default budget and hard ceiling for one run. */
export const DEFAULT_MAX_ITERATIONS = 10;

const INITIAL_MAX_TOKENS = 2000;
const FINAL_MAX_TOKENS = 1500;
const SIMPLIFIED_RETRY: CompletionRequest = { maxTokens: 300, temperature: 0.3 };
const FOLLOW_UP_MAX_TOKENS: Record<FollowUpKind, number> = {
  corrective: 700,
  continue: 500,
  alternative: 600,
};

export interface SessionHistory {
  previousMessages?: string[];
  userRole?: string;
}

export interface OrchestratorDeps {
  client: CompletionClient;
  classifier: ResultClassifier;
  executor: ToolExecutor;
  /** Capability description rendered into the system preamble. */
  toolsDescription: string;
  progress?: ProgressSink;
  logger?: Logger;
}

export function partitionRecords(records: ToolExecutionRecord[]): IterationOutcome {
  return {
    succeeded: records.filter(r => r.classification === 'success'),
    failed: records.filter(r => r.classification === 'error'),
  };
}

/**
 * Failures with budget left get a corrective prompt; otherwise any success
 * gets the lighter prompt and a fully failed iteration asks for another approach.
 */
export function selectFollowUpKind(outcome: IterationOutcome, iteration: number, maxIterations: number): FollowUpKind {
  if (outcome.failed.length > 0 && iteration < maxIterations) return 'corrective';
  if (outcome.succeeded.length > 0) return 'continue';
  return 'alternative';
}

export class ToolOrchestrator {
  private readonly maxIterations: number;
  private readonly iterationDelayMs: number;
  private readonly temperature: number;
  private readonly progress: ProgressSink;
  private readonly log: Logger;

  constructor(private readonly deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
    this.maxIterations = Math.min(DEFAULT_MAX_ITERATIONS, Math.max(1, options.maxIterations ?? DEFAULT_MAX_ITERATIONS));
    this.iterationDelayMs = options.iterationDelayMs ?? 2000;
    this.temperature = options.temperature ?? 0.7;
    this.progress = deps.progress ?? silentProgress;
    this.log = deps.logger ?? componentLogger('orchestrator');
  }

  async run(query: string, history: SessionHistory = {}): Promise<OrchestratorResult> {
    const seed = this.buildSeedContext(query, history);
    let reply = await this.initialReply(seed, query, history.userRole);

    const context: ConversationContext = [...seed];
    const records: ToolExecutionRecord[] = [];
    let iteration = 0;
    let termination: TerminationReason | undefined;

    while (iteration < this.maxIterations) {
      iteration++;

      const requests = looksLikeToolRequest(reply) ? parseToolRequests(reply) : [];
      if (requests.length === 0) {
        termination = records.length === 0 ? 'direct' : 'no_requests';
        break;
      }

      this.log.info({ iteration, maxIterations: this.maxIterations, tools: requests.map(r => r.name) }, 'Executing tool requests');
      const iterationRecords = await this.executeIteration(requests, iteration);
      records.push(...iterationRecords);

      const next = await this.followUp(context, iterationRecords, iteration, query);
      if (next === null) {
        this.log.warn({ iteration }, 'Model stopped responding, ending iterations');
        termination = 'model_unavailable';
        break;
      }
      reply = next;

      if (containsSentinel(reply)) {
        termination = 'sentinel';
        break;
      }

      if (iteration < this.maxIterations && this.iterationDelayMs > 0) {
        await sleep(this.iterationDelayMs);
      }
    }

    const reason = termination ?? (looksLikeToolRequest(reply) ? 'budget' : 'no_requests');
    const { succeeded, failed } = partitionRecords(records);

    if (records.length === 0) {
      this.log.info({ iterations: iteration, termination: reason }, 'Answered without tools');
      return { response: reply, iterations: iteration, toolCalls: 0, succeeded: 0, failed: 0, termination: reason };
    }

    const response = await this.synthesize(seed, records, query);
    this.log.info(
      { iterations: iteration, toolCalls: records.length, succeeded: succeeded.length, failed: failed.length, termination: reason },
      'Tool loop finished',
    );

    return {
      response,
      iterations: iteration,
      toolCalls: records.length,
      succeeded: succeeded.length,
      failed: failed.length,
      termination: reason,
    };
  }

  private buildSeedContext(query: string, history: SessionHistory): ConversationContext {
    const messages: ProviderMessage[] = [
      { role: 'system', content: buildSystemPreamble(this.deps.toolsDescription, history.userRole) },
    ];
    if (history.previousMessages && history.previousMessages.length > 0) {
      messages.push({ role: 'system', content: buildHistoryMessage(history.previousMessages) });
    }
    messages.push({ role: 'user', content: query });
    return messages;
  }

  private async initialReply(seed: ConversationContext, query: string, userRole?: string): Promise<string> {
    const request: CompletionRequest = { maxTokens: INITIAL_MAX_TOKENS, temperature: this.temperature };

    const first = await this.deps.client.complete(seed, request);
    if (first !== null) return first;

    this.log.warn('Initial model call returned nothing, retrying with reduced context');
    const reduced: ProviderMessage[] = [
      { role: 'system', content: buildSystemPreamble(this.deps.toolsDescription, userRole) },
      { role: 'user', content: query },
    ];
    const retry = await this.deps.client.complete(reduced, request);
    if (retry !== null) return retry;

    throw AppError.upstreamUnavailable();
  }

  private async executeIteration(requests: ToolInvocationRequest[], iteration: number): Promise<ToolExecutionRecord[]> {
    await this.progress.publish({ type: 'tools_requested', iteration, tools: requests.map(r => r.name) });

    const records: ToolExecutionRecord[] = [];
    for (const [index, request] of requests.entries()) {
      await this.progress.publish({
        type: 'tool_started',
        iteration,
        tool: request.name,
        position: index + 1,
        total: requests.length,
      });

      const rawResult = await this.deps.executor.invoke(request.name, request.arguments);
      const classification = await this.deps.classifier.classifyAs(request, rawResult);
      records.push({ request, rawResult, classification, iterationIndex: iteration });

      this.log.debug({ iteration, tool: request.name, classification }, 'Tool result classified');
      await this.progress.publish({ type: 'tool_completed', iteration, tool: request.name, classification });
    }

    return records;
  }

  private async followUp(
    context: ConversationContext,
    iterationRecords: ToolExecutionRecord[],
    iteration: number,
    query: string,
  ): Promise<string | null> {
    const outcome = partitionRecords(iterationRecords);
    const kind = selectFollowUpKind(outcome, iteration, this.maxIterations);
    const prompt = this.buildFollowUpPrompt(kind, iterationRecords, query);

    await this.progress.publish({
      type: 'follow_up',
      iteration,
      kind,
      succeeded: outcome.succeeded.length,
      failed: outcome.failed.length,
    });

    context.push(
      { role: 'assistant', content: buildFollowUpAssistantNote(kind, iteration) },
      { role: 'user', content: prompt },
    );

    const reply = await this.deps.client.complete(context, {
      maxTokens: FOLLOW_UP_MAX_TOKENS[kind],
      temperature: this.temperature,
    });
    if (reply !== null) return reply;

    this.log.warn({ iteration, kind }, 'Follow-up returned nothing, retrying with simplified context');
    return this.deps.client.complete(
      [{ role: 'user', content: buildSimplifiedRetryPrompt(query, iteration) }],
      SIMPLIFIED_RETRY,
    );
  }

  private buildFollowUpPrompt(kind: FollowUpKind, iterationRecords: ToolExecutionRecord[], query: string): string {
    const outcome = partitionRecords(iterationRecords);
    switch (kind) {
      case 'corrective':
        return buildCorrectivePrompt(outcome.failed, outcome.succeeded, query);
      case 'continue':
        return buildContinuePrompt(iterationRecords, query);
      case 'alternative':
        return buildAlternativePrompt(outcome.failed, query);
    }
  }

  private async synthesize(seed: ConversationContext, records: ToolExecutionRecord[], query: string): Promise<string> {
    const { succeeded, failed } = partitionRecords(records);
    await this.progress.publish({ type: 'synthesizing', succeeded: succeeded.length, failed: failed.length });

    const finalReply = await this.deps.client.complete(
      [...seed, { role: 'user', content: buildFinalPrompt(buildEvidenceSummary(records), query) }],
      { maxTokens: FINAL_MAX_TOKENS, temperature: this.temperature },
    );

    if (finalReply === null) {
      this.log.warn('Final answer call returned nothing');
      return synthesisTimeoutAnswer(succeeded.length, failed.length);
    }
    if (looksLikeToolRequest(finalReply)) {
      this.log.warn('Final answer still requested tools, substituting summary');
      return toolLoopFallbackAnswer(succeeded.length, failed.length);
    }
    return finalReply;
  }
}
