// Capability Invoker
// Executes tools requested by the orchestrator; never throws

import type { ToolRegistry } from '../tools/registry.js';
import type { CapabilityResult } from '../tools/types.js';
import { errorMessage } from '../../utils/errors.js';
import { safeStringify } from '../../utils/json.js';
import { componentLogger, type Logger } from '../../utils/logger.js';

export const RESULT_SIZE_LIMIT = 5000;
export const TRUNCATION_NOTICE = '\n... (result truncated)';

export interface ToolExecutorOptions {
  timeoutMs?: number;
  maxResultChars?: number;
  logger?: Logger;
}

/**
 * Replaces results whose pretty-printed form exceeds the limit with a preview
 * and the original length.
 */
export function capResultSize(result: CapabilityResult, limit: number = RESULT_SIZE_LIMIT): CapabilityResult {
  const serialized = safeStringify(result, 2);
  if (serialized.length <= limit) {
    return result;
  }
  return {
    truncated_result: serialized.slice(0, limit) + TRUNCATION_NOTICE,
    original_length: serialized.length,
  };
}

export class ToolExecutor {
  private timeoutMs: number;
  private maxResultChars: number;
  private log: Logger;

  constructor(private registry: ToolRegistry, options: ToolExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxResultChars = options.maxResultChars ?? RESULT_SIZE_LIMIT;
    this.log = options.logger ?? componentLogger('executor');
  }

  async invoke(name: string, args: Readonly<Record<string, unknown>>): Promise<CapabilityResult> {
    const startTime = Date.now();
    const tool = this.registry.get(name);

    if (!tool) {
      this.log.warn({ tool: name }, 'Requested tool is not registered');
      return { error: `Tool "${name}" is not available` };
    }

    let result: CapabilityResult;
    try {
      result = await this.withTimeout(tool.invoke({ ...args }), name);
    } catch (error) {
      result = { error: `Error calling tool "${name}": ${errorMessage(error)}` };
    }

    const capped = capResultSize(result, this.maxResultChars);
    this.log.debug(
      { tool: name, durationMs: Date.now() - startTime, truncated: capped !== result },
      'Tool invocation finished',
    );
    return capped;
  }

  private async withTimeout<T>(promise: Promise<T>, name: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Tool "${name}" timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      if (timer) clearTimeout(timer);
    }
  }
}
