/**
 * Node entry point
 *
 * Reads the Env bindings from process.env, validates them and serves the
 * Hono app with @hono/node-server.
 */

import { serve } from '@hono/node-server';
import app from './index.js';
import { validateEnv, logValidationErrors, loadEnv } from './utils/env-validation.js';
import { createLogger } from './utils/logger.js';

const DEFAULT_PORT = 3000;

const env = loadEnv();
const logger = createLogger(env);

const validation = validateEnv(env);
if (!validation.valid) {
  logValidationErrors(validation.errors, logger);
  if (env.ENVIRONMENT === 'production') {
    process.exit(1);
  }
}

const port = Number(process.env.PORT ?? DEFAULT_PORT);

serve(
  {
    fetch: (request) => app.fetch(request, env),
    port,
  },
  (info) => {
    logger.info({ port: info.port }, 'Server listening');
  }
);
