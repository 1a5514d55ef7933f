// Tool Request Parser
// Extracts tool requests from free-form model text
//
// The model is asked to answer with objects shaped like
//   {"tool_request": {"tool_name": "...", "arguments": {...}}, "reason": "..."}
// either inside ```json fences or inline with surrounding prose.

import { isRecord } from '../../utils/json.js';
import { componentLogger } from '../../utils/logger.js';
import type { ToolInvocationRequest } from './types.js';

const log = componentLogger('parser');

export const TOOL_REQUEST_MARKER = 'tool_request';
const JSON_FENCE = '```json';
const FENCE = '```';

/**
 * Cheap pre-check: the marker plus braces, or a ```json fence.
 */
export function looksLikeToolRequest(response: string): boolean {
  if (!response) return false;
  const hasMarker = response.includes(TOOL_REQUEST_MARKER) && response.includes('{') && response.includes('}');
  return hasMarker || response.toLowerCase().includes(JSON_FENCE);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Accepts a decoded value only when it nests a request with a tool name.
 */
export function toToolRequest(candidate: unknown): ToolInvocationRequest | null {
  if (!isRecord(candidate)) return null;
  const nested = candidate[TOOL_REQUEST_MARKER];
  if (!isRecord(nested)) return null;

  const name = typeof nested.tool_name === 'string' ? nested.tool_name.trim() : '';
  if (!name) return null;

  const args = isRecord(nested.arguments) ? { ...nested.arguments } : {};
  return Object.freeze({ name, arguments: Object.freeze(args) });
}

function parseFencedBlocks(response: string): ToolInvocationRequest[] {
  const requests: ToolInvocationRequest[] = [];
  let current: string[] = [];
  let inBlock = false;

  for (const line of response.split('\n')) {
    if (line.toLowerCase().includes(JSON_FENCE)) {
      inBlock = true;
      current = [];
      continue;
    }
    if (inBlock && line.includes(FENCE)) {
      inBlock = false;
      const body = current.join('\n').trim();
      if (body) {
        const request = toToolRequest(tryParseJson(body));
        if (request) {
          requests.push(request);
        } else {
          log.debug({ preview: body.slice(0, 120) }, 'Skipping fenced block without a valid tool request');
        }
      }
      current = [];
      continue;
    }
    if (inBlock) {
      current.push(line);
    }
  }

  return requests;
}

/**
 * Finds complete top-level `{...}` spans. Braces inside JSON strings are
 * ignored; an unterminated span at the end of the text is dropped.
 */
export function findTopLevelObjects(text: string): string[] {
  const spans: string[] = [];
  let depth = 0;
  let start = -1;
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (depth > 0 && inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"' && depth > 0) {
      inString = true;
    } else if (ch === '{') {
      if (depth === 0) start = i;
      depth++;
    } else if (ch === '}' && depth > 0) {
      depth--;
      if (depth === 0) {
        spans.push(text.slice(start, i + 1));
      }
    }
  }

  return spans;
}

function parseInlineObjects(text: string): ToolInvocationRequest[] {
  const requests: ToolInvocationRequest[] = [];

  for (const span of findTopLevelObjects(text)) {
    const request = toToolRequest(tryParseJson(span));
    if (request) {
      requests.push(request);
      continue;
    }
    // A malformed wrapper may still contain well-formed requests
    requests.push(...parseInlineObjects(span.slice(1, -1)));
  }

  return requests;
}

function parseOuterSpan(response: string): ToolInvocationRequest[] {
  const start = response.indexOf('{');
  const end = response.lastIndexOf('}');
  if (start === -1 || end <= start) return [];
  const request = toToolRequest(tryParseJson(response.slice(start, end + 1)));
  return request ? [request] : [];
}

/**
 * Returns every tool request in order of appearance. The first strategy that
 * yields anything wins: ```json fences, then inline objects, then the span
 * between the first `{` and the last `}`.
 */
export function parseToolRequests(response: string): ToolInvocationRequest[] {
  if (!response) return [];

  const fenced = parseFencedBlocks(response);
  if (fenced.length > 0) {
    log.debug({ count: fenced.length }, 'Tool requests from fenced blocks');
    return fenced;
  }

  const inline = parseInlineObjects(response);
  if (inline.length > 0) {
    log.debug({ count: inline.length }, 'Tool requests from inline objects');
    return inline;
  }

  const outer = parseOuterSpan(response);
  if (outer.length > 0) {
    log.debug('Tool request from outer brace span');
  }
  return outer;
}
