/**
 * Chat Routes
 * POST /v1/chat starts a background session that reports to a webhook;
 * POST /v1/ask runs a session and answers in the response body.
 */

import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { SessionFactory } from '../services/sessions/chat-session.js';
import { START_MESSAGE, type TaskSupervisor } from '../services/sessions/task-supervisor.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

const HistorySchema = {
  userRole: z.string().min(1).max(100).optional(),
  previousMessages: z.array(z.string().max(2000)).max(50).optional(),
};

const ChatRequestSchema = z.object({
  sessionId: z.string().min(1).max(200),
  message: z.string().min(1).max(2000),
  callbackUrl: z.string().url(),
  ...HistorySchema,
});

const AskRequestSchema = z.object({
  message: z.string().min(1).max(2000),
  ...HistorySchema,
});

export interface ChatRoutesOptions {
  supervisor: TaskSupervisor;
  createSession: SessionFactory;
}

export const chatRoutes: FastifyPluginAsync<ChatRoutesOptions> = async (server, opts) => {
  const { supervisor, createSession } = opts;

  server.setErrorHandler((error, request, reply) => {
    const appError = error instanceof AppError ? error : AppError.internal();
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, 'Chat request failed');
    }
    return reply.code(appError.statusCode).send(formatErrorResponse(appError));
  });

  // POST /v1/chat - Accept a message and process it in the background
  server.post('/chat', async (request, reply) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.flatten());
      return reply.code(400).send(formatErrorResponse(error, true));
    }
    const body = parsed.data;

    void supervisor.launch({
      sessionId: body.sessionId,
      callbackUrl: body.callbackUrl,
      message: body.message,
      userRole: body.userRole,
      previousMessages: body.previousMessages,
    });
    request.log.info({ sessionId: body.sessionId }, 'Session launched');

    return reply.code(202).send({
      sessionId: body.sessionId,
      message: START_MESSAGE,
      messageType: 'status',
      timestamp: new Date().toISOString(),
      isComplete: false,
    });
  });

  // POST /v1/ask - Run a session and return the answer directly
  server.post('/ask', async (request, reply) => {
    const parsed = AskRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      const error = AppError.validationError('Invalid request body', parsed.error.flatten());
      return reply.code(400).send(formatErrorResponse(error, true));
    }
    const body = parsed.data;

    const session = createSession();
    try {
      const result = await session.ask(body.message, {
        previousMessages: body.previousMessages,
        userRole: body.userRole,
      });
      return {
        response: result.response,
        iterations: result.iterations,
        toolCalls: result.toolCalls,
        termination: result.termination,
      };
    } finally {
      await session.close();
    }
  });
};
