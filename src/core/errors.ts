/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what shows up in ToolError.code and what
 * TSD retryPolicy.retryableErrors matches against.
 */

export class ToolkitError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

/** Extracts the taxonomy code from anything thrown, with a caller-chosen default. */
export function errorCode(e: unknown, fallback: string): string {
  return e instanceof ToolkitError ? e.code : fallback;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ---------------------------------------------------------------------------
// Parse-layer errors
// ---------------------------------------------------------------------------

/** A request body or command output could not be interpreted. */
export class ParseError extends ToolkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PARSE_ERROR', details);
  }
}

// ---------------------------------------------------------------------------
// Validation errors
// ---------------------------------------------------------------------------

/** Arguments failed the tool's own schema or the TSD's stricter schema. */
export class ValidationError extends ToolkitError {
  constructor(toolName: string, violations: unknown[]) {
    super(
      `Validation failed for tool "${toolName}"`,
      'VALIDATION_ERROR',
      { toolName, violations }
    );
  }
}

// ---------------------------------------------------------------------------
// Registry / dispatch errors
// ---------------------------------------------------------------------------

/** The client requested a tool name that doesn't exist in the registry. */
export class UnknownToolError extends ToolkitError {
  constructor(toolName: string) {
    super(
      `Unknown tool: "${toolName}"`,
      'UNKNOWN_TOOL',
      { toolName }
    );
  }
}

// ---------------------------------------------------------------------------
// Execution errors (OS layer)
// ---------------------------------------------------------------------------

/** The underlying OS command or API call failed. */
export class ExecutionError extends ToolkitError {
  constructor(toolName: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { toolName, ...details });
  }
}

/** The requested path is outside the configured cleanup folders. */
export class SandboxViolationError extends ToolkitError {
  constructor(requestedPath: string, allowedPrefixes: string[]) {
    super(
      `Path "${requestedPath}" is outside the allowed cleanup folders`,
      'SANDBOX_VIOLATION',
      { requestedPath, allowedPrefixes }
    );
  }
}

/** The operation only exists on another operating system. */
export class UnsupportedPlatformError extends ToolkitError {
  constructor(toolName: string, platform: string) {
    super(
      `Tool "${toolName}" is not supported on platform "${platform}"`,
      'UNSUPPORTED_PLATFORM',
      { toolName, platform }
    );
  }
}

// ---------------------------------------------------------------------------
// Elevation errors
// ---------------------------------------------------------------------------

/** The tool requires administrator privileges and the process has none. */
export class ElevationError extends ToolkitError {
  constructor(toolName: string) {
    super(
      `Tool "${toolName}" requires administrator privileges; run the server as Administrator`,
      'ELEVATION_DENIED',
      { toolName }
    );
  }
}

// ---------------------------------------------------------------------------
// Timeout errors
// ---------------------------------------------------------------------------

/** TSD timeout was exceeded. */
export class TimeoutError extends ToolkitError {
  constructor(toolName: string, timeoutMs: number) {
    super(
      `Tool "${toolName}" exceeded timeout of ${timeoutMs}ms`,
      'TIMEOUT',
      { toolName, timeoutMs }
    );
  }
}

// ---------------------------------------------------------------------------
// Rate-limit errors
// ---------------------------------------------------------------------------

/** Tool was called more frequently than its TSD allows. */
export class RateLimitError extends ToolkitError {
  constructor(toolName: string) {
    super(
      `Rate limit exceeded for tool "${toolName}"`,
      'RATE_LIMIT_EXCEEDED',
      { toolName }
    );
  }
}

// ---------------------------------------------------------------------------
// Hook errors
// ---------------------------------------------------------------------------

/** A pre- or post-hook threw an error. */
export class HookError extends ToolkitError {
  constructor(hookName: string, phase: 'pre' | 'post', cause: unknown) {
    super(
      `Hook "${hookName}" failed in ${phase} phase: ${errorMessage(cause)}`,
      'HOOK_ERROR',
      { hookName, phase, originalError: errorMessage(cause) }
    );
  }
}

/** A hook name referenced in a TSD could not be found in the hook registry. */
export class HookNotFoundError extends ToolkitError {
  constructor(hookRef: string) {
    super(`Hook not found: "${hookRef}"`, 'HOOK_NOT_FOUND', { hookRef });
  }
}
