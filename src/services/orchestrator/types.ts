// Orchestrator Types

import type { ProviderMessage } from '../../providers/types.js';
import type { CapabilityResult } from '../tools/types.js';

export interface ToolInvocationRequest {
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

export type Classification = 'success' | 'error';

export interface ToolExecutionRecord {
  request: ToolInvocationRequest;
  rawResult: CapabilityResult;
  classification: Classification;
  iterationIndex: number;
}

export interface IterationOutcome {
  succeeded: ToolExecutionRecord[];
  failed: ToolExecutionRecord[];
}

export type FollowUpKind = 'corrective' | 'continue' | 'alternative';

export type TerminationReason =
  | 'direct'
  | 'sentinel'
  | 'no_requests'
  | 'budget'
  | 'model_unavailable';

export interface OrchestratorResult {
  response: string;
  iterations: number;
  toolCalls: number;
  succeeded: number;
  failed: number;
  termination: TerminationReason;
}

export interface OrchestratorOptions {
  maxIterations?: number;
  iterationDelayMs?: number;
  temperature?: number;
}

/**
 * Options accepted by a single chat completion. `null` from the completion
 * function means the model produced nothing (timeout or transport error).
 */
export interface CompletionRequest {
  maxTokens: number;
  temperature: number;
}

export interface CompletionClient {
  complete(messages: ProviderMessage[], request: CompletionRequest): Promise<string | null>;
}

export type ConversationContext = ProviderMessage[];
