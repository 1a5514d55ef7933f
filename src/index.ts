// Tool-loop API
// Accepts chat messages, runs the tool orchestration loop and reports progress to webhooks

// Load environment variables from .env file
import 'dotenv/config';

import { buildServer } from './server.js';
import { env, logConfiguration } from './env.js';
import { createSessionFactory } from './services/sessions/chat-session.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = await buildServer({ createSession: createSessionFactory() });

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.log.info({ signal }, 'Shutting down, waiting for running sessions');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        server.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start server
try {
  await server.listen({ port: PORT, host: HOST });
  console.log(`Tool-loop API listening on http://${HOST}:${PORT}`);
  console.log(`Health: http://${HOST}:${PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
