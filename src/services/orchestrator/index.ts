// Orchestrator Module - Main exports

export { ToolOrchestrator, selectFollowUpKind, partitionRecords, DEFAULT_MAX_ITERATIONS } from './orchestrator.js';
export type { OrchestratorDeps, SessionHistory } from './orchestrator.js';
export { parseToolRequests, looksLikeToolRequest } from './parser.js';
export { ToolExecutor, capResultSize, RESULT_SIZE_LIMIT } from './executor.js';
export { ResultClassifier, heuristicIsError } from './classifier.js';
export { ModelClient } from './model-client.js';
export type { ModelClientOptions } from './model-client.js';
export { SENTINEL_TOKEN } from './prompts.js';
export type {
  CompletionClient,
  OrchestratorOptions,
  OrchestratorResult,
  TerminationReason,
  ToolExecutionRecord,
  ToolInvocationRequest,
} from './types.js';
