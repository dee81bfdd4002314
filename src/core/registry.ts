/**
 * core/registry.ts
 *
 * Central singleton. Responsibilities:
 *   - Holds every registered ToolModule.
 *   - Exposes list() for tools/list responses.
 *   - Validates arguments against the tool's own schema.
 *   - Dispatches invocations through the TSD applier.
 *
 * Tool modules register themselves by calling registry.register().
 * The server imports all tool modules at startup which triggers registration.
 */

import Ajv, { ValidateFunction } from 'ajv';
import {
  ToolModule,
  ToolInvocation,
  ToolResult,
  FunctionSchema,
  SessionConfig
} from './types';
import { ToolkitError, UnknownToolError, ValidationError, errorCode, errorMessage } from './errors';
import { TsdLoader } from './tsd/loader';
import { applyTsd } from './tsd/applier';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');
const ajv = new Ajv({ allErrors: true, useDefaults: false });

interface IndexEntry {
  module: ToolModule;
  schema: FunctionSchema;
  validate: ValidateFunction;
}

interface RegistryState {
  sessionConfig: SessionConfig;
  tsdLoader: TsdLoader;
}

export class ToolRegistry {
  /** The one and only instance. */
  private static instance: ToolRegistry | null = null;

  /** module name → ToolModule */
  private readonly modules = new Map<string, ToolModule>();

  /** tool schema name → { module, schema, validator }, fast lookup for dispatch */
  private readonly toolIndex = new Map<string, IndexEntry>();

  private state: RegistryState | null = null;

  private constructor() {}

  static getInstance(): ToolRegistry {
    if (!ToolRegistry.instance) {
      ToolRegistry.instance = new ToolRegistry();
    }
    return ToolRegistry.instance;
  }

  /** Must be called once after construction, before any dispatch. */
  init(sessionConfig: SessionConfig, tsdLoader: TsdLoader): void {
    if (this.state) {
      log.warn('Registry already initialized, ignoring duplicate init call');
      return;
    }
    this.state = { sessionConfig, tsdLoader };
    log.info('Registry initialized successfully');
  }

  isInitialized(): boolean {
    return this.state !== null;
  }

  get sessionConfig(): SessionConfig {
    return this.ensureInitialized().sessionConfig;
  }

  private ensureInitialized(): RegistryState {
    if (!this.state) {
      throw new Error('ToolRegistry not initialized. Call init() before using the registry.');
    }
    return this.state;
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * Register a tool module. Called by each tool file on import.
   * Indexes every schema the module exposes for fast dispatch.
   */
  register(mod: ToolModule): void {
    if (this.modules.has(mod.name)) {
      log.warn({ module: mod.name }, 'Module already registered, overwriting');
    }

    this.modules.set(mod.name, mod);

    for (const schema of mod.tools) {
      this.toolIndex.set(schema.name, { module: mod, schema, validate: ajv.compile(schema.parameters) });
    }

    log.info({ module: mod.name, tools: mod.tools.map(t => t.name) }, 'Tool module registered');
  }

  // -----------------------------------------------------------------------
  // Listing (for tools/list)
  // -----------------------------------------------------------------------

  list(): FunctionSchema[] {
    const schemas: FunctionSchema[] = [];
    for (const mod of this.modules.values()) {
      schemas.push(...mod.tools);
    }
    return schemas;
  }

  listToolNames(): string[] {
    return Array.from(this.toolIndex.keys());
  }

  /** Resolves a tool name to its module and schema. */
  resolve(toolName: string): { module: ToolModule; schema: FunctionSchema } {
    const entry = this.lookup(toolName);
    return { module: entry.module, schema: entry.schema };
  }

  private lookup(toolName: string): IndexEntry {
    const entry = this.toolIndex.get(toolName);
    if (!entry) throw new UnknownToolError(toolName);
    return entry;
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  /**
   * The main dispatch entry point. Called by the transports.
   *
   * Flow:
   *   1. Resolve the tool module
   *   2. Validate args against the tool's base schema
   *   3. Look up its TSD
   *   4. Hand off to the TSD applier, which wraps execute() with all policies
   */
  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    const { sessionConfig, tsdLoader } = this.ensureInitialized();
    const toolName = invocation.tool;
    const entry = this.lookup(toolName);

    if (!entry.validate(invocation.args)) {
      throw new ValidationError(toolName, entry.validate.errors ?? []);
    }

    const tsd = tsdLoader.get(toolName);

    log.info({ tool: toolName, hasTsd: !!tsd, correlationId: invocation.meta.correlationId }, 'Dispatching tool invocation');

    // The executeFn closure that the applier will call inside its retry loop
    const executeFn = async (_name: string, args: Record<string, unknown>): Promise<ToolResult> => {
      const start = Date.now();
      try {
        const result = await entry.module.execute(toolName, args);
        result.durationMs = Date.now() - start;
        return result;
      } catch (e) {
        log.warn({ tool: toolName, error: errorMessage(e) }, 'Tool execution failed');
        return {
          success: false,
          error: {
            code: errorCode(e, 'EXECUTION_ERROR'),
            message: errorMessage(e),
            details: e instanceof ToolkitError ? e.details : undefined
          },
          durationMs: Date.now() - start
        };
      }
    };

    // Fallback executor, re-invokes through the registry so the fallback
    // tool also gets its own TSD treatment
    const fallbackFn = async (fallbackToolName: string, args: Record<string, unknown>): Promise<ToolResult> => {
      return this.invoke({ tool: fallbackToolName, args, meta: invocation.meta });
    };

    return applyTsd(invocation, tsd, sessionConfig, executeFn, fallbackFn);
  }
}

// Convenience export so tool modules can do:
//     import { registry } from '../core/registry';
//     registry.register(myModule);
export const registry = ToolRegistry.getInstance();
