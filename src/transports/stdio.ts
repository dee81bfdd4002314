/**
 * transports/stdio.ts
 *
 * JSON-RPC 2.0 over stdin/stdout. This is the transport used by agent
 * clients that spawn the server as a child process and communicate via
 * pipes. Logs go to stderr, so stdout carries nothing but responses.
 *
 * Protocol:
 *   Client sends:  { "jsonrpc": "2.0", "id": N, "method": "tools/list" | "tools/call", "params": {...} }
 *   Server sends:  { "jsonrpc": "2.0", "id": N, "result": {...} }
 *                  or { "jsonrpc": "2.0", "id": N, "error": { "code": N, "message": "..." } }
 *
 * Input is newline-delimited JSON (one complete JSON object per line).
 */

import * as readline from 'readline';
import { ToolRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { ToolkitError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { isRecord } from '../core/values';

const log = scopedLogger('transports/stdio');

export const PROTOCOL_VERSION = '2024-11-05';

type RpcId = number | string | null;

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

export interface ServerInfo {
  name: string;
  version: string;
}

function rpcId(value: unknown): RpcId {
  return typeof value === 'number' || typeof value === 'string' ? value : null;
}

function stringParam(params: Record<string, unknown>, key: string): string | undefined {
  const v = params[key];
  return typeof v === 'string' && v !== '' ? v : undefined;
}

/**
 * Handles one decoded request and returns the response to write.
 * Errors thrown by the registry become JSON-RPC errors: -32000 for
 * toolkit errors (with data.errorCode), -32603 for anything else.
 */
export async function handleRpcRequest(
  request: unknown,
  registry: ToolRegistry,
  serverInfo: ServerInfo
): Promise<JsonRpcResponse> {
  if (!isRecord(request) || typeof request.method !== 'string') {
    return {
      jsonrpc: '2.0',
      id: isRecord(request) ? rpcId(request.id) : null,
      error: { code: -32600, message: 'Invalid request: "method" must be a string' }
    };
  }

  const id = rpcId(request.id);
  const method = request.method;
  const params = isRecord(request.params) ? request.params : {};

  try {
    switch (method) {
      // ---------------------------------------------------------------
      // initialize - protocol handshake
      // ---------------------------------------------------------------
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo
          }
        };

      // ---------------------------------------------------------------
      // tools/list
      // ---------------------------------------------------------------
      case 'tools/list':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            tools: registry.list().map(t => ({
              name: t.name,
              description: t.description,
              inputSchema: t.parameters
            }))
          }
        };

      // ---------------------------------------------------------------
      // tools/call
      // ---------------------------------------------------------------
      case 'tools/call': {
        const toolName = stringParam(params, 'name') ?? stringParam(params, 'tool');
        if (!toolName) {
          return {
            jsonrpc: '2.0',
            id,
            error: { code: -32600, message: 'Provide "name" (or "tool") and "arguments"' }
          };
        }

        const correlationId = stringParam(params, 'correlationId') ?? generateCorrelationId();
        const result = await registry.invoke({
          tool: toolName,
          args: isRecord(params.arguments) ? params.arguments : {},
          meta: { source: 'stdio', timestamp: Date.now(), correlationId }
        });

        return {
          jsonrpc: '2.0',
          id,
          result: {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            isError: !result.success
          }
        };
      }

      // ---------------------------------------------------------------
      // ping (simple health check)
      // ---------------------------------------------------------------
      case 'ping':
        return { jsonrpc: '2.0', id, result: { pong: true, tools: registry.list().length } };

      default:
        return { jsonrpc: '2.0', id, error: { code: -32601, message: `Unknown method: "${method}"` } };
    }
  } catch (e) {
    const toolkitError = e instanceof ToolkitError ? e : null;
    log.error({ method, error: errorMessage(e) }, 'Stdio handler error');

    return {
      jsonrpc: '2.0',
      id,
      error: {
        code: toolkitError ? -32000 : -32603,
        message: errorMessage(e),
        data: toolkitError ? { errorCode: toolkitError.code, details: toolkitError.details } : undefined
      }
    };
  }
}

export interface StdioStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Runs once input has closed and every pending response is written. */
  onDrained: () => void;
}

function processStreams(): StdioStreams {
  return { input: process.stdin, output: process.stdout, onDrained: () => process.exit(0) };
}

export function startStdioTransport(
  registry: ToolRegistry,
  serverInfo: ServerInfo,
  streams: StdioStreams = processStreams()
): readline.Interface {
  log.info('Stdio transport started, listening on stdin');

  const rl = readline.createInterface({ input: streams.input, terminal: false });
  const pending = new Set<Promise<void>>();

  rl.on('line', (line: string) => {
    const trimmed = line.trim();
    if (!trimmed) return;

    let request: unknown;
    try {
      request = JSON.parse(trimmed);
    } catch (e) {
      // No id to answer to
      log.warn({ raw: trimmed, error: errorMessage(e) }, 'Failed to parse JSON-RPC request');
      return;
    }

    const task = handleRpcRequest(request, registry, serverInfo)
      .then((response) => {
        streams.output.write(JSON.stringify(response) + '\n');
      })
      .catch((e: unknown) => {
        log.error({ error: errorMessage(e) }, 'Critical error in stdio line handler');
      })
      .finally(() => {
        pending.delete(task);
      });
    pending.add(task);
  });

  // A piped client may close stdin before its last answers are ready
  rl.on('close', () => {
    log.info({ pending: pending.size }, 'Stdin closed, finishing pending requests');
    Promise.allSettled(Array.from(pending))
      .then(() => {
        log.info('Stdio transport shut down');
        streams.onDrained();
      })
      .catch((e: unknown) => {
        log.error({ error: errorMessage(e) }, 'Failed to drain stdio transport');
      });
  });

  return rl;
}
