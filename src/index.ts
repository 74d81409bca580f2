/**
 * cleancue Profanity API
 * Hono application (served on Node by src/server.ts)
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { Env } from './types.js';

// Import route handlers
import { profanityRouter } from './handlers/profanity.js';
import { languagesRouter } from './handlers/languages.js';

// Import middleware
import {
  requestContextMiddleware,
  getRequestId,
  getLogger,
  REQUEST_ID_HEADER,
  type RequestContextVariables,
} from './middleware/request-context.js';
import { validateEnv, logValidationErrors, loadEnv, type EnvValidationResult } from './utils/env-validation.js';
import { ErrorCode, errorResponse } from './utils/api-response.js';
import { CleanCueError } from './utils/errors.js';
import { SERVICE_NAME } from './utils/logger.js';

// Create Hono app with typed bindings
const app = new Hono<{ Bindings: Env; Variables: RequestContextVariables }>();

// Validation results per bindings object, so each configuration is checked once
const envValidation = new WeakMap<Env, EnvValidationResult>();

// Bindings for callers that pass none (app.request without env, other adapters)
let processBindings: Env | null = null;

// ============================================
// GLOBAL MIDDLEWARE
// ============================================

// Fall back to process.env when no bindings were passed
app.use('*', async (c, next) => {
  if (c.env === undefined) {
    processBindings ??= loadEnv();
    c.env = processBindings;
  }
  await next();
});

// Request ID and structured request logger (early, for tracing)
app.use('*', requestContextMiddleware);

// Environment validation middleware
app.use('*', async (c, next) => {
  let result = envValidation.get(c.env);
  if (!result) {
    result = validateEnv(c.env);
    envValidation.set(c.env, result);
    if (!result.valid) {
      logValidationErrors(result.errors, c.get('logger'));
    }
  }

  if (!result.valid) {
    // In production, fail fast on misconfiguration
    if (c.env.ENVIRONMENT === 'production') {
      return c.json({ success: false, error: ErrorCode.SERVICE_UNAVAILABLE, message: 'Service misconfigured' }, 500);
    }
    // In development, log warnings but continue
    c.get('logger').warn('Continuing with invalid env configuration (development mode)');
  }
  await next();
});

// Security headers middleware
app.use('*', async (c, next) => {
  await next();
  // Prevent MIME-type sniffing attacks
  c.header('X-Content-Type-Options', 'nosniff');
  // Prevent clickjacking by denying iframe embedding
  c.header('X-Frame-Options', 'DENY');
  // Enforce HTTPS for 1 year (only in production)
  if (c.env.ENVIRONMENT === 'production') {
    c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  }
});

// CORS configuration
app.use(
  '*',
  cors({
    origin: (origin, c) => {
      const allowedOrigin = c.env.CORS_ORIGIN;
      // Additional allowed origins from environment (comma-separated)
      const additionalOrigins = c.env.ADDITIONAL_CORS_ORIGINS
        ? c.env.ADDITIONAL_CORS_ORIGINS.split(',').map((o: string) => o.trim())
        : [];

      // SECURITY: Don't allow requests without an Origin header
      if (!origin) {
        return null;
      }

      if (origin === allowedOrigin || additionalOrigins.includes(origin)) {
        return origin;
      }

      // SECURITY: Only allow specific localhost ports in development
      if (c.env.ENVIRONMENT === 'development') {
        const allowedDevOrigins = [
          'http://localhost:5173',   // Vite dev server
          'http://127.0.0.1:5173',   // Vite dev server (IP)
        ];
        if (allowedDevOrigins.includes(origin)) {
          return origin;
        }
      }

      return null;
    },
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', REQUEST_ID_HEADER],
    exposeHeaders: [REQUEST_ID_HEADER],
    maxAge: 86400,
  })
);

// SECURITY: Content-Type validation for requests with a body
app.use('/api/*', async (c, next) => {
  if (c.req.method === 'POST') {
    const contentType = c.req.header('content-type');
    const contentLength = c.req.header('content-length');
    const hasBody = contentLength !== undefined && parseInt(contentLength, 10) > 0;

    if (hasBody && (!contentType || !contentType.includes('application/json'))) {
      return errorResponse(c, ErrorCode.UNSUPPORTED_MEDIA_TYPE, 'Content-Type must be application/json', 415);
    }
  }
  await next();
});

// ============================================
// HEALTH CHECK
// ============================================

app.get('/', (c) => {
  return c.json({
    name: SERVICE_NAME,
    version: c.env.API_VERSION,
    status: 'healthy',
    environment: c.env.ENVIRONMENT,
  });
});

app.get('/health', (c) => {
  return c.json({ status: 'ok', timestamp: new Date().toISOString() });
});

// ============================================
// API ROUTES
// ============================================

app.route('/api/v1/profanity', profanityRouter);
app.route('/api/v1/languages', languagesRouter);

// ============================================
// ERROR HANDLING
// ============================================

// 404 handler
app.notFound((c) => {
  return errorResponse(c, ErrorCode.NOT_FOUND, `Route ${c.req.method} ${c.req.path} not found`, 404);
});

// Global error handler
app.onError((err, c) => {
  if (err instanceof CleanCueError) {
    return errorResponse(c, err.code, err.message, err.status);
  }

  const requestId = getRequestId(c);
  // Don't expose internal errors outside development
  const isDev = c.env.ENVIRONMENT === 'development';

  getLogger(c).error({ err, operation: 'globalErrorHandler' }, 'Unhandled error');

  return c.json(
    {
      success: false,
      error: ErrorCode.INTERNAL_ERROR,
      message: isDev ? err.message : 'An unexpected error occurred',
      requestId,
      ...(isDev && { stack: err.stack }),
    },
    500
  );
});

export default app;
