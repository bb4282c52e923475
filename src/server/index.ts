/**
 * API Server
 *
 * HTTP server exposing the kitchen assistant. Queries can be answered in one
 * JSON response or streamed as Server-Sent Events, one event per workflow
 * transition followed by the final response.
 *
 * Endpoints:
 * - GET /health: Server health check
 * - GET /config: Current configuration summary
 * - POST /api/query: Run a query, respond with the FinalResponse
 * - POST /api/query/stream: Run a query with SSE progress events
 *
 * Dependencies:
 * - hono: Lightweight web framework for edge/Node.js
 * - @hono/node-server: Node.js adapter for Hono
 * - @hono/zod-validator: Request validation using Zod schemas
 */
import { serve } from '@hono/node-server';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { streamSSE } from 'hono/streaming';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AppSettings } from '../config/schema.js';
import { loadSettings } from '../config/settings.js';
import type { Transition } from '../workflow/state.js';
import { createAssistant, type KitchenAssistant } from '../workflow/runner.js';
import { serverLogger, setupErrorHandlers } from '../utils/logger.js';
import { errorMessage } from '../errors.js';
import { VERSION } from '../version.js';

export interface ServerOptions {
  assistant: KitchenAssistant;
  settings: AppSettings;
  /** Log each request to the console as well as the log file. */
  consoleLog?: boolean;
}

const QueryInputSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty'),
  session_id: z.string().min(1).optional(),
  attachments: z
    .array(
      z.object({
        name: z.string(),
        media_type: z.string(),
        data: z.string().optional(),
      })
    )
    .default([]),
});

type QueryInput = z.infer<typeof QueryInputSchema>;

function toAttachments(input: QueryInput) {
  return input.attachments.map((a) => ({
    name: a.name,
    mediaType: a.media_type,
    ...(a.data !== undefined ? { data: a.data } : {}),
  }));
}

export function createServer({ assistant, settings, consoleLog = false }: ServerOptions) {
  const app = new Hono();

  app.use('/*', cors());

  if (consoleLog) {
    app.use('/*', logger());
  }

  // Always log requests to file
  app.use('/*', async (c, next) => {
    const start = Date.now();
    await next();
    const ms = Date.now() - start;
    serverLogger.info(
      { method: c.req.method, path: c.req.path, status: c.res.status, ms },
      'request'
    );
  });

  app.get('/health', (c) => {
    return c.json({
      status: 'healthy',
      version: VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/config', (c) => {
    const { orchestration } = settings;
    return c.json({
      models: {
        default: settings.models.default.name,
        roles: Object.fromEntries(
          Object.entries(settings.models.roles).map(([role, model]) => [role, model?.name])
        ),
      },
      llm_host: settings.llm.host,
      orchestration: {
        agent_timeout_ms: orchestration.agent_timeout_ms,
        max_retries: orchestration.max_retries,
        workflow_deadline_ms: orchestration.workflow_deadline_ms,
        parallel_dispatch: orchestration.parallel_dispatch,
        extra_dependencies: orchestration.dependencies.length,
      },
      shopping_platforms: settings.shopping.platforms,
    });
  });

  app.post('/api/query', zValidator('json', QueryInputSchema), async (c) => {
    const input = c.req.valid('json');
    const sessionId = input.session_id ?? crypto.randomUUID();

    const response = await assistant.submitQuery(input.text, sessionId, toAttachments(input), {
      signal: c.req.raw.signal,
    });
    return c.json(response);
  });

  app.post('/api/query/stream', zValidator('json', QueryInputSchema), async (c) => {
    const input = c.req.valid('json');
    const sessionId = input.session_id ?? crypto.randomUUID();

    return streamSSE(c, async (stream) => {
      const controller = new AbortController();
      stream.onAbort(() => controller.abort());

      // Transitions fire synchronously inside the loop; keep writes ordered
      let writes: Promise<void> = Promise.resolve();
      const onTransition = (transition: Transition) => {
        writes = writes
          .then(() => stream.writeSSE({ event: 'transition', data: JSON.stringify(transition) }))
          .catch((error: unknown) => {
            serverLogger.warn(
              { sessionId, error: errorMessage(error) },
              'Dropped transition event'
            );
          });
      };

      try {
        const response = await assistant.submitQuery(
          input.text,
          sessionId,
          toAttachments(input),
          { signal: controller.signal, onTransition }
        );
        await writes;
        await stream.writeSSE({ event: 'response', data: JSON.stringify(response) });
      } catch (error) {
        await writes;
        serverLogger.error({ sessionId, error: errorMessage(error) }, 'Streaming query failed');
        await stream.writeSSE({
          event: 'error',
          data: JSON.stringify({ error: errorMessage(error) }),
        });
      }
    });
  });

  app.onError((error, c) => {
    serverLogger.error({ path: c.req.path, error: errorMessage(error) }, 'Unhandled request error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export function startServer(port: number = 8001, settingsPath?: string) {
  setupErrorHandlers(serverLogger);

  const settings = loadSettings(settingsPath);
  const assistant = createAssistant(settings);
  const app = createServer({ assistant, settings, consoleLog: true });

  serverLogger.info({ port }, 'Starting kitchen-conductor server');

  const server = serve({
    fetch: app.fetch,
    port,
  });

  serverLogger.info({ port, url: `http://localhost:${port}` }, 'Server started');

  return server;
}
