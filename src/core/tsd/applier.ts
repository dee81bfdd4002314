/**
 * core/tsd/applier.ts
 *
 * Runs one tool call under its TSD. Gate checks (rate limit, elevation,
 * TSD input schema) throw before anything executes; after the pre-hook
 * the call is attempted up to maxRetries + 1 times, each attempt under
 * timeoutMs. A call that still fails goes to the fallback tool, and the
 * post-hook sees whichever result came last.
 */

import Ajv from 'ajv';
import { TaskSpecificDefinition, ToolInvocation, ToolResult, SessionConfig } from '../types';
import { runPreHook, runPostHook } from '../hooks';
import {
  TimeoutError,
  RateLimitError,
  ElevationError,
  ValidationError,
  errorCode,
  errorMessage
} from '../errors';
import { isElevated } from '../elevation';
import { scopedLogger } from '../logger';

const log = scopedLogger('core/tsd/applier');
const ajv = new Ajv({ allErrors: true });

// Call timestamps per tool, newest last, kept for one second
const recentCalls = new Map<string, number[]>();

const RATE_WINDOW_MS = 1000;

function checkRateLimit(tsd: TaskSpecificDefinition, now: number): void {
  if (!tsd.rateLimits) return;

  const { maxCallsPerSecond, burstAllowance } = tsd.rateLimits;
  const calls = (recentCalls.get(tsd.toolName) ?? []).filter(ts => ts > now - RATE_WINDOW_MS);
  if (calls.length >= maxCallsPerSecond + burstAllowance) {
    recentCalls.set(tsd.toolName, calls);
    throw new RateLimitError(tsd.toolName);
  }
  calls.push(now);
  recentCalls.set(tsd.toolName, calls);
}

/** Forgets every recorded call. */
export function resetRateLimits(): void {
  recentCalls.clear();
}

function checkElevation(tsd: TaskSpecificDefinition, sessionConfig: SessionConfig): void {
  if (!tsd.requiresElevation) return;

  const preApproved = sessionConfig.elevationPreApproved === true &&
    (sessionConfig.elevationWhitelist ?? []).includes(tsd.toolName);
  if (preApproved) {
    log.debug({ tool: tsd.toolName }, 'Elevation pre-approved by session');
    return;
  }
  if (!isElevated()) throw new ElevationError(tsd.toolName);
}

function checkInput(tsd: TaskSpecificDefinition, args: Record<string, unknown>): void {
  if (!tsd.inputValidation) return;
  if (!ajv.validate(tsd.inputValidation, args)) {
    throw new ValidationError(tsd.toolName, ajv.errors ?? []);
  }
}

/** Delay before retry number `attempt` (1-based). */
export function computeDelay(tsd: TaskSpecificDefinition, attempt: number): number {
  const policy = tsd.retryPolicy;
  if (!policy) return 0;

  switch (policy.backoff) {
    case 'linear':      return policy.baseDelayMs * attempt;
    case 'exponential': return policy.baseDelayMs * 2 ** attempt;
    default:            return 0;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** One attempt. A throw or a timeout becomes a failed result. */
async function attempt(
  run: () => Promise<ToolResult>,
  toolName: string,
  timeoutMs: number | undefined
): Promise<ToolResult> {
  const start = Date.now();
  let timer: NodeJS.Timeout | undefined;
  try {
    if (!timeoutMs) return await run();
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(toolName, timeoutMs)), timeoutMs);
    });
    return await Promise.race([run(), expired]);
  } catch (e) {
    return {
      success: false,
      error: { code: errorCode(e, 'EXECUTION_ERROR'), message: errorMessage(e) },
      durationMs: Date.now() - start
    };
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export interface ApplierExecuteFn {
  (toolName: string, args: Record<string, unknown>): Promise<ToolResult>;
}

/**
 * Wraps `executeFn` with the policies of `tsd`. Without a TSD the tool runs
 * once, as is. `fallbackFn` receives the fallback tool's name.
 */
export async function applyTsd(
  invocation: ToolInvocation,
  tsd: TaskSpecificDefinition | undefined,
  sessionConfig: SessionConfig,
  executeFn: ApplierExecuteFn,
  fallbackFn?: ApplierExecuteFn
): Promise<ToolResult> {
  const toolName = invocation.tool;
  const startTime = Date.now();

  if (!tsd) {
    const result = await executeFn(toolName, invocation.args);
    result.durationMs = Date.now() - startTime;
    return result;
  }

  checkRateLimit(tsd, startTime);
  checkElevation(tsd, sessionConfig);
  checkInput(tsd, invocation.args);

  const args = tsd.preHook
    ? await runPreHook(tsd.preHook, { toolName, args: invocation.args, sessionConfig })
    : invocation.args;

  const retries = tsd.retryPolicy?.maxRetries ?? 0;
  const retryable = new Set(tsd.retryPolicy?.retryableErrors ?? []);

  let result = await attempt(() => executeFn(toolName, args), toolName, tsd.timeoutMs);
  for (let n = 1; n <= retries && !result.success && retryable.has(result.error?.code ?? ''); n++) {
    const delayMs = computeDelay(tsd, n);
    log.debug({ tool: toolName, attempt: n, errorCode: result.error?.code, delayMs }, 'Retrying');
    await sleep(delayMs);
    result = await attempt(() => executeFn(toolName, args), toolName, tsd.timeoutMs);
  }

  if (!result.success && tsd.fallbackTool && fallbackFn) {
    log.info({ tool: toolName, fallback: tsd.fallbackTool, errorCode: result.error?.code }, 'Running fallback tool');
    try {
      result = await fallbackFn(tsd.fallbackTool, args);
    } catch (e) {
      // The primary failure stays the answer
      log.error({ fallback: tsd.fallbackTool, error: errorMessage(e) }, 'Fallback tool failed');
    }
  }

  if (tsd.postHook) {
    result = await runPostHook(tsd.postHook, { toolName, args, result, sessionConfig });
  }

  result.durationMs = Date.now() - startTime;
  return result;
}
