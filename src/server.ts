// HTTP server assembly, shared by the entry point and route tests

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { chatRoutes } from './routes/chat.js';
import type { SessionFactory } from './services/sessions/chat-session.js';
import { TaskSupervisor } from './services/sessions/task-supervisor.js';
import { logger } from './utils/logger.js';

export interface ServerOptions {
  createSession: SessionFactory;
  corsOrigins?: string[];
}

export async function buildServer(options: ServerOptions) {
  const server = Fastify({ logger });
  const supervisor = new TaskSupervisor(options.createSession);

  await server.register(cors, {
    origin: options.corsOrigins ?? ['http://localhost:3000', 'http://127.0.0.1:3000'],
    credentials: true,
  });

  // Main health endpoint with /v1 prefix
  server.get('/v1/health', async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: '1.0.0',
    };
  });

  // Legacy redirect
  server.get('/health', async (request, reply) => {
    return reply.code(301).redirect('/v1/health');
  });

  await server.register(chatRoutes, { prefix: '/v1', supervisor, createSession: options.createSession });

  // Let background sessions send their terminal update before exit
  server.addHook('onClose', async () => {
    await supervisor.drain();
  });

  return server;
}
