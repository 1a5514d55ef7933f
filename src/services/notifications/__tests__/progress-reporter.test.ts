import { describe, it, expect, vi } from 'vitest';
import { GatewayProgressReporter, describeProgressEvent } from '../progress-reporter.js';
import type { SessionProgress } from '../types.js';

function createFakeNotifier() {
  return {
    send: vi.fn(async (_progress: SessionProgress) => true),
    close: vi.fn(async () => {}),
  };
}

describe('describeProgressEvent', () => {
  it('should render every event kind', () => {
    expect(describeProgressEvent({ type: 'tools_requested', iteration: 2, tools: ['a', 'b'] })).toBe(
      'Iteration 2: running 2 tool(s): a, b',
    );
    expect(describeProgressEvent({ type: 'tool_started', iteration: 2, tool: 'a', position: 1, total: 2 })).toBe(
      'Running tool 1/2: a',
    );
    expect(describeProgressEvent({ type: 'tool_completed', iteration: 2, tool: 'a', classification: 'error' })).toBe(
      'Tool a reported an error',
    );
    expect(
      describeProgressEvent({ type: 'follow_up', iteration: 2, kind: 'corrective', succeeded: 1, failed: 1 }),
    ).toBe('Analyzing 1 failed tool call(s) to correct the approach');
    expect(describeProgressEvent({ type: 'synthesizing', succeeded: 3, failed: 1 })).toBe(
      'Generating final answer (3 succeeded, 1 failed)',
    );
  });
});

describe('GatewayProgressReporter', () => {
  it('should forward events as processing updates', async () => {
    const notifier = createFakeNotifier();
    const reporter = new GatewayProgressReporter(notifier, { sessionId: 's-1', callbackUrl: 'http://gateway.test/hook' });

    await reporter.publish({ type: 'tool_completed', iteration: 1, tool: 'search', classification: 'success' });

    expect(notifier.send).toHaveBeenCalledWith({
      sessionId: 's-1',
      callbackUrl: 'http://gateway.test/hook',
      message: 'Tool search returned a result',
      status: 'processing',
      isComplete: false,
    });
  });
});
