/**
 * core/hooks.ts
 *
 * Central registry for named hooks.
 * TSDs reference hooks by string name (e.g. "log_action").
 * This module resolves those names to actual functions.
 *
 * log_action is registered at the bottom of this file. Tool modules add
 * their own hooks via registerHook() (system_info registers
 * refresh_system_info).
 */

import * as fs from 'fs';
import * as path from 'path';
import { HookModule, PreHookFn, PostHookFn } from './types';
import { HookNotFoundError, HookError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/hooks');

// The registry: name → { pre?, post? }
const hookRegistry = new Map<string, HookModule>();

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

export function registerHook(name: string, mod: HookModule): void {
  hookRegistry.set(name, mod);
  log.debug({ name }, 'Hook registered');
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export function resolveHook(name: string): HookModule {
  const mod = hookRegistry.get(name);
  if (!mod) throw new HookNotFoundError(name);
  return mod;
}

export function listHooks(): string[] {
  return Array.from(hookRegistry.keys());
}

/**
 * Safe pre-hook runner. Resolves the name, calls .pre(), wraps errors.
 */
export async function runPreHook(
  name: string,
  ctx: Parameters<PreHookFn>[0]
): Promise<Record<string, unknown>> {
  const mod = resolveHook(name);

  if (!mod.pre) {
    log.debug({ hookName: name }, 'Hook has no pre function, skipping');
    return ctx.args;
  }

  try {
    return await mod.pre(ctx);
  } catch (e) {
    throw new HookError(name, 'pre', e);
  }
}

/**
 * Safe post-hook runner. Resolves the name, calls .post(), wraps errors.
 */
export async function runPostHook(
  name: string,
  ctx: Parameters<PostHookFn>[0]
): Promise<typeof ctx.result> {
  const mod = resolveHook(name);

  if (!mod.post) {
    log.debug({ hookName: name }, 'Hook has no post function, skipping');
    return ctx.result;
  }

  try {
    return await mod.post(ctx);
  } catch (e) {
    throw new HookError(name, 'post', e);
  }
}

// ===========================================================================
// Built-in hooks
// ===========================================================================

/**
 * log_action (pre + post)
 * Appends a structured JSON line per phase to SessionConfig.auditLogPath.
 */
registerHook('log_action', {
  pre: async (ctx) => {
    appendAuditLog(ctx.sessionConfig.auditLogPath, {
      phase: 'pre',
      tool: ctx.toolName,
      args: ctx.args,
      timestamp: new Date().toISOString()
    });
    return ctx.args;
  },
  post: async (ctx) => {
    appendAuditLog(ctx.sessionConfig.auditLogPath, {
      phase: 'post',
      tool: ctx.toolName,
      success: ctx.result.success,
      error: ctx.result.error,
      timestamp: new Date().toISOString()
    });
    return ctx.result;
  }
});

function appendAuditLog(configuredPath: string | undefined, entry: Record<string, unknown>): void {
  const logPath = path.resolve(process.cwd(), configuredPath ?? 'audit.log');
  fs.appendFileSync(logPath, JSON.stringify(entry) + '\n');
}
