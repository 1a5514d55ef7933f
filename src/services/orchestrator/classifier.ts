// Result Classifier
// Decides whether a tool result is a failure, asking a secondary model first

import type { CapabilityResult } from '../tools/types.js';
import { errorMessage } from '../../utils/errors.js';
import { safeStringify } from '../../utils/json.js';
import { componentLogger, type Logger } from '../../utils/logger.js';
import { CLASSIFIER_ERROR_TOKEN, buildClassificationPrompt } from './prompts.js';
import type { Classification, CompletionClient, ToolInvocationRequest } from './types.js';

export const ERROR_INDICATORS = [
  'error',
  'missing',
  'not found',
  'denied',
  'forbidden',
  'invalid',
  'failed',
  'unable',
] as const;

const CLASSIFIER_TEMPERATURE = 0.1;
const CLASSIFIER_MAX_TOKENS = 10;

/**
 * Substring scan over the serialized result. Pure.
 */
export function heuristicIsError(result: CapabilityResult): boolean {
  const text = safeStringify(result).toLowerCase();
  return ERROR_INDICATORS.some(indicator => text.includes(indicator));
}

/**
 * A reply counts as an error only when it contains the error token. A reply
 * with neither token is treated as success.
 */
export function replyIndicatesError(reply: string): boolean {
  return reply.toUpperCase().includes(CLASSIFIER_ERROR_TOKEN);
}

export class ResultClassifier {
  private readonly log: Logger;

  constructor(private readonly client: CompletionClient, logger?: Logger) {
    this.log = logger ?? componentLogger('classifier');
  }

  /** Returns true when the result represents a failure. */
  async classify(request: ToolInvocationRequest, result: CapabilityResult): Promise<boolean> {
    let reply: string | null;
    try {
      reply = await this.client.complete(
        [{ role: 'user', content: buildClassificationPrompt(request, result) }],
        { maxTokens: CLASSIFIER_MAX_TOKENS, temperature: CLASSIFIER_TEMPERATURE },
      );
    } catch (error) {
      this.log.warn({ tool: request.name, err: errorMessage(error) }, 'Classification call failed, using heuristic');
      return heuristicIsError(result);
    }

    if (reply === null) {
      this.log.debug({ tool: request.name }, 'Classifier returned nothing, using heuristic');
      return heuristicIsError(result);
    }

    const isError = replyIndicatesError(reply);
    this.log.debug({ tool: request.name, reply: reply.trim(), isError }, 'Result classified');
    return isError;
  }

  async classifyAs(request: ToolInvocationRequest, result: CapabilityResult): Promise<Classification> {
    return (await this.classify(request, result)) ? 'error' : 'success';
  }
}
