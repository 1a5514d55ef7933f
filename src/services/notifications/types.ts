// Notification Types

import type { Classification, FollowUpKind } from '../orchestrator/types.js';

export type NotificationStatus = 'processing' | 'completed' | 'error';

/**
 * One status update addressed to a session's callback target.
 */
export interface SessionProgress {
  sessionId: string;
  callbackUrl: string;
  message: string;
  status: NotificationStatus;
  isComplete: boolean;
}

/** JSON body posted to the callback target. */
export interface ProgressPayload {
  sessionId: string;
  partialMessage: string;
  status: NotificationStatus;
  isComplete: boolean;
}

export interface ToolsRequestedEvent {
  type: 'tools_requested';
  iteration: number;
  tools: string[];
}

export interface ToolStartedEvent {
  type: 'tool_started';
  iteration: number;
  tool: string;
  position: number;
  total: number;
}

export interface ToolCompletedEvent {
  type: 'tool_completed';
  iteration: number;
  tool: string;
  classification: Classification;
}

export interface FollowUpEvent {
  type: 'follow_up';
  iteration: number;
  kind: FollowUpKind;
  succeeded: number;
  failed: number;
}

export interface SynthesizingEvent {
  type: 'synthesizing';
  succeeded: number;
  failed: number;
}

/**
 * State transitions published by the orchestration loop.
 */
export type ProgressEvent =
  | ToolsRequestedEvent
  | ToolStartedEvent
  | ToolCompletedEvent
  | FollowUpEvent
  | SynthesizingEvent;

export interface ProgressSink {
  publish(event: ProgressEvent): Promise<void>;
}

export const silentProgress: ProgressSink = {
  async publish() {},
};

export interface Notifier {
  send(progress: SessionProgress): Promise<boolean>;
  close(): Promise<void>;
}
