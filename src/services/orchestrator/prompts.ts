// Prompt templates for the tool loop

import { safeStringify } from '../../utils/json.js';
import type { CapabilityResult } from '../tools/types.js';
import type { FollowUpKind, ToolExecutionRecord, ToolInvocationRequest } from './types.js';

/** Literal the model emits to end the loop voluntarily. */
export const SENTINEL_TOKEN = 'LISTO';

export const CLASSIFIER_ERROR_TOKEN = 'ERROR';
export const CLASSIFIER_SUCCESS_TOKEN = 'SUCCESS';

const MAX_SUCCESS_EVIDENCE = 3;
const MAX_FAILURE_EVIDENCE = 2;
const SUCCESS_PREVIEW_CHARS = 1000;
const FAILURE_PREVIEW_CHARS = 500;
const CLASSIFIER_RESULT_CHARS = 1000;

export function containsSentinel(reply: string): boolean {
  return reply.toUpperCase().includes(SENTINEL_TOKEN);
}

export function buildSystemPreamble(toolsDescription: string, userRole?: string): string {
  const role = userRole ? `\nThe person asking is a ${userRole}; tailor the answer to that role.\n` : '';

  return `You are an intelligent assistant with access to external tools.
${role}
${toolsDescription}

IMPORTANT:
- If you need specific information to answer the user, you may use these tools
- To use a tool, answer with this JSON format:

\`\`\`json
{
  "tool_request": {
    "tool_name": "tool_name",
    "arguments": {
      "param1": "value1",
      "param2": "value2"
    }
  },
  "reason": "Why you need this tool"
}
\`\`\`

- You may request several tools in one answer, one JSON block each
- If you already have enough information, or you are told NOT to use more tools, answer directly
- If you do not need tools, simply answer normally`;
}

export function buildHistoryMessage(previousMessages: string[]): string {
  return `Previous conversation:\n${previousMessages.join('\n')}`;
}

function formatArgs(request: ToolInvocationRequest): string {
  return safeStringify(request.arguments);
}

function formatResult(result: CapabilityResult): string {
  return safeStringify(result);
}

interface FollowUpSections {
  heading: string;
  question: string;
  guidance: string[];
  closing: string;
}

function renderFollowUp(sections: FollowUpSections): string {
  return [
    sections.heading,
    '',
    `Original question: ${sections.question}`,
    '',
    ...sections.guidance,
    '',
    sections.closing,
  ].join('\n');
}

export function buildCorrectivePrompt(
  failed: ToolExecutionRecord[],
  succeeded: ToolExecutionRecord[],
  question: string,
): string {
  const errorContext = failed
    .map(r => `- Error in '${r.request.name}' with arguments ${formatArgs(r.request)}: ${formatResult(r.rawResult)}`)
    .join('\n');
  const successContext = succeeded.length > 0
    ? `\nSuccessful tools: ${succeeded.map(r => r.request.name).join(', ')}`
    : '';

  return renderFollowUp({
    heading: `ERRORS DETECTED:\n${errorContext}${successContext}`,
    question,
    guidance: [
      'The errors above were identified automatically. Analyze each specific error and:',
      '',
      '1. If required parameters are missing (like "missing required parameter: path"), add the missing parameters',
      '2. If there are format or syntax problems, fix the structure of the call',
      '3. If it is a permission or access error, try an alternative tool',
      '4. If an identifier (name, id, owner) is wrong, verify the correct one first',
      '5. If a resource was not found, check that it exists with a broader query',
      '',
      'IMPORTANT:',
      '- Learn from each specific error and correct it',
      '- Use the JSON format for new tool requests',
      `- If you already have enough successful information, answer "${SENTINEL_TOKEN}"`,
      '- Do not repeat exactly the same failing call',
    ],
    closing: 'Which tool will you use to fix these specific errors, or can you already answer?',
  });
}

export function buildContinuePrompt(records: ToolExecutionRecord[], question: string): string {
  return renderFollowUp({
    heading: `Results: executed ${records.length} tool(s): ${records.map(r => r.request.name).join(', ')}`,
    question,
    guidance: [
      'Do you need to run more specific tools, or can you answer already?',
      'If you need another tool, use it with the JSON format.',
    ],
    closing: `If you have enough, answer "${SENTINEL_TOKEN}".`,
  });
}

export function buildAlternativePrompt(failed: ToolExecutionRecord[], question: string): string {
  const errorContext = failed.map(r => `- ${r.request.name}: ${formatResult(r.rawResult)}`).join('\n');

  return renderFollowUp({
    heading: `All tools failed:\n${errorContext}`,
    question,
    guidance: [
      'All the previous tools failed. Please:',
      '1. Analyze the errors and find a different strategy',
      '2. Use alternative tools or different parameters',
      `3. If you think you can answer partially with general knowledge, answer "${SENTINEL_TOKEN}"`,
    ],
    closing: 'Which alternative tool will you try?',
  });
}

export function buildFollowUpAssistantNote(kind: FollowUpKind, iteration: number): string {
  switch (kind) {
    case 'corrective':
      return `I executed tools in iteration ${iteration} but found some errors.`;
    case 'continue':
      return `I executed the tools for iteration ${iteration}.`;
    case 'alternative':
      return `Every tool I executed in iteration ${iteration} failed.`;
  }
}

export function buildSimplifiedRetryPrompt(question: string, iteration: number): string {
  return `Original question: ${question}

Iteration ${iteration} completed. Do you need more specific tools (JSON format) or can you answer "${SENTINEL_TOKEN}"?`;
}

export function buildEvidenceSummary(records: ToolExecutionRecord[]): string {
  const successes = records.filter(r => r.classification === 'success');
  const failures = records.filter(r => r.classification === 'error');

  let summary = `Tools executed: ${records.length} (✅ ${successes.length} succeeded, ❌ ${failures.length} failed)\n`;

  if (successes.length > 0) {
    summary += '\n🟢 SUCCESSFUL RESULTS:\n';
    successes.slice(0, MAX_SUCCESS_EVIDENCE).forEach((r, i) => {
      const preview = formatResult(r.rawResult).slice(0, SUCCESS_PREVIEW_CHARS);
      summary += `${i + 1}. ${r.request.name}: ${preview}...\n`;
    });
  }

  if (failures.length > 0) {
    summary += '\n🔴 ERRORS FOUND:\n';
    failures.slice(0, MAX_FAILURE_EVIDENCE).forEach((r, i) => {
      const preview = formatResult(r.rawResult).slice(0, FAILURE_PREVIEW_CHARS);
      summary += `${i + 1}. ${r.request.name}: ${preview}...\n`;
    });
  }

  return summary;
}

export function buildFinalPrompt(evidence: string, question: string): string {
  return `Based on these tool results:

${evidence}

Answer the original question: ${question}

INSTRUCTIONS:
- If you have successful results, use them to answer completely
- If you only have errors, explain what was attempted and why it did not work
- If you have a mix, answer with the available information and mention the limitations
- Be concise but complete
- Use only the information in the results above

IMPORTANT: do NOT use more tools. Answer directly with the available information.`;
}

/**
 * Answer used when the synthesis reply still asks for tools.
 */
export function toolLoopFallbackAnswer(succeeded: number, failed: number): string {
  if (succeeded > 0) {
    return `Based on the ${succeeded} successful tool result(s) obtained, the necessary tools were executed and the results include information relevant to your query. ${failed} tool call(s) failed, but enough data was gathered for the analysis.`;
  }
  return `Tried to execute ${succeeded + failed} tool call(s), but all of them failed. The most common errors were access problems, incorrect parameters or resources not found. You may need to verify the identifiers, parameters or access permissions involved.`;
}

/**
 * Answer used when the synthesis call produced nothing.
 */
export function synthesisTimeoutAnswer(succeeded: number, failed: number): string {
  if (succeeded > 0) {
    return `Executed ${succeeded} tool call(s) successfully (and ${failed} failed), but generating the final answer timed out. The successful results are available.`;
  }
  return `Tried to execute ${succeeded + failed} tool call(s) but all of them failed. The errors include access problems, incorrect parameters or resources not found.`;
}

export function buildClassificationPrompt(request: ToolInvocationRequest, result: CapabilityResult): string {
  return `Analyze this tool result and decide whether it is an ${CLASSIFIER_ERROR_TOKEN} or a ${CLASSIFIER_SUCCESS_TOKEN}:

TOOL USED: ${request.name}
ARGUMENTS: ${safeStringify(request.arguments, 2)}
RESULT: ${safeStringify(result, 2).slice(0, CLASSIFIER_RESULT_CHARS)}

CRITERIA:
- ${CLASSIFIER_ERROR_TOKEN} if: it contains error messages, missing parameters, resources not found, denied permissions, wrong format
- ${CLASSIFIER_SUCCESS_TOKEN} if: it returns valid data, lists, objects with useful information

Answer with ONLY one word: "${CLASSIFIER_ERROR_TOKEN}" or "${CLASSIFIER_SUCCESS_TOKEN}"`;
}
