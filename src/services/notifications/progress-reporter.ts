// Progress Reporter
// Renders orchestrator progress events as `processing` webhook updates

import type { FollowUpEvent, Notifier, ProgressEvent, ProgressSink } from './types.js';

export interface ProgressTarget {
  sessionId: string;
  callbackUrl: string;
}

function describeFollowUp(event: FollowUpEvent): string {
  switch (event.kind) {
    case 'corrective':
      return `Analyzing ${event.failed} failed tool call(s) to correct the approach`;
    case 'continue':
      return 'Checking whether more information is needed';
    case 'alternative':
      return 'All tools failed, looking for an alternative strategy';
  }
}

export function describeProgressEvent(event: ProgressEvent): string {
  switch (event.type) {
    case 'tools_requested':
      return `Iteration ${event.iteration}: running ${event.tools.length} tool(s): ${event.tools.join(', ')}`;
    case 'tool_started':
      return `Running tool ${event.position}/${event.total}: ${event.tool}`;
    case 'tool_completed':
      return event.classification === 'success'
        ? `Tool ${event.tool} returned a result`
        : `Tool ${event.tool} reported an error`;
    case 'follow_up':
      return describeFollowUp(event);
    case 'synthesizing':
      return `Generating final answer (${event.succeeded} succeeded, ${event.failed} failed)`;
  }
}

export class GatewayProgressReporter implements ProgressSink {
  constructor(
    private readonly notifier: Notifier,
    private readonly target: ProgressTarget,
  ) {}

  async publish(event: ProgressEvent): Promise<void> {
    await this.notifier.send({
      sessionId: this.target.sessionId,
      callbackUrl: this.target.callbackUrl,
      message: describeProgressEvent(event),
      status: 'processing',
      isComplete: false,
    });
  }
}
