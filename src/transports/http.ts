/**
 * transports/http.ts
 *
 * Standard HTTP transport. Each request is synchronous: receive → dispatch → respond.
 *
 * Routes:
 *   GET  /tools/list    → Returns all registered tool schemas (OpenAI function format)
 *   POST /tools/call    → Executes a single tool invocation
 *   GET  /health        → Liveness check
 */

import express, { Request, Response, NextFunction } from 'express';
import { ToolRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { ToolkitError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { isRecord } from '../core/values';

const log = scopedLogger('transports/http');

const REQUEST_TIMEOUT_MS = 110000;

/**
 * Function-calling clients often replace "." with "_" in tool names, so
 * "cleaner_clean_temp" resolves to "cleaner.clean_temp". Names that match
 * nothing are returned unchanged and fail in the registry.
 */
export function normalizeToolName(name: string, known: string[]): string {
  if (known.includes(name)) return name;
  const flat = name.replace(/\./g, '_');
  return known.find(k => k.replace(/\./g, '_') === flat) ?? name;
}

function stringField(body: Record<string, unknown>, key: string): string | undefined {
  const v = body[key];
  return typeof v === 'string' && v !== '' ? v : undefined;
}

export function createHttpTransport(registry: ToolRegistry): express.Application {
  const app = express();
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setTimeout(REQUEST_TIMEOUT_MS, () => {
      log.warn({ path: req.path }, 'Request timeout');
      if (!res.headersSent) {
        res.status(503).json({ error: 'Request timeout', message: 'The request took too long to complete' });
      }
    });
    next();
  });

  // -----------------------------------------------------------------------
  // GET /tools/list
  // -----------------------------------------------------------------------
  app.get('/tools/list', (_req: Request, res: Response) => {
    res.json({
      object: 'list',
      data: registry.list().map(t => ({ type: 'function', function: t }))
    });
  });

  // -----------------------------------------------------------------------
  // POST /tools/call
  // -----------------------------------------------------------------------
  app.post('/tools/call', async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const params = isRecord(body) ? body : {};
    const header = req.get('x-correlation-id');
    const correlationId = header && header.trim() !== '' ? header : generateCorrelationId();

    const rawName = stringField(params, 'tool') ?? stringField(params, 'name');
    if (!rawName) {
      res.status(400).json({ error: 'Provide "tool" (or "name") and "arguments"', correlationId });
      return;
    }

    const toolName = normalizeToolName(rawName, registry.listToolNames());
    try {
      const result = await registry.invoke({
        tool: toolName,
        args: isRecord(params.arguments) ? params.arguments : {},
        meta: { source: 'http', timestamp: Date.now(), correlationId }
      });

      res.json({
        object: 'tool_call_result',
        type: 'success',
        results: [{ tool: toolName, result }],
        correlationId
      });
    } catch (e) {
      const toolkitError = e instanceof ToolkitError ? e : null;
      log.error({ correlationId, tool: toolName, error: errorMessage(e) }, 'Tool call failed');

      res.status(toolkitError ? 400 : 500).json({
        object: 'tool_call_result',
        type: 'error',
        error: {
          code: toolkitError ? toolkitError.code : 'INTERNAL_ERROR',
          message: errorMessage(e),
          details: toolkitError?.details
        },
        correlationId
      });
    }
  });

  // -----------------------------------------------------------------------
  // GET /health
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', tools: registry.list().length });
  });

  // -----------------------------------------------------------------------
  // Error handler (malformed JSON bodies land here)
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: err.message, path: req.path, method: req.method }, 'Unhandled error in HTTP transport');

    if (!res.headersSent) {
      const status = err instanceof SyntaxError ? 400 : 500;
      res.status(status).json({ error: status === 400 ? 'Malformed JSON body' : 'Internal server error', message: err.message });
    }
  });

  return app;
}
