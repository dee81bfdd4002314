/**
 * core/tsd/loader.ts
 *
 * Reads every .json file from the config/tsds/ directory at startup
 * and builds a lookup map: toolName → TaskSpecificDefinition.
 *
 * Files are checked against TSD_SCHEMA (the TaskSpecificDefinition shape
 * in core/types.ts). Invalid files are logged and skipped.
 */

import * as fs from 'fs';
import * as path from 'path';
import Ajv from 'ajv';
import { TaskSpecificDefinition } from '../types';
import { scopedLogger } from '../logger';
import { errorMessage } from '../errors';
import { configDir } from '../config';

const log = scopedLogger('core/tsd/loader');
const ajv = new Ajv({ allErrors: true });

const TSD_SCHEMA = {
  type: 'object',
  properties: {
    toolName: { type: 'string', minLength: 1 },
    retryPolicy: {
      type: 'object',
      properties: {
        maxRetries: { type: 'integer', minimum: 0 },
        backoff: { type: 'string', enum: ['none', 'linear', 'exponential'] },
        baseDelayMs: { type: 'number', minimum: 0 },
        retryableErrors: { type: 'array', items: { type: 'string' } }
      },
      required: ['maxRetries', 'backoff', 'baseDelayMs', 'retryableErrors']
    },
    timeoutMs: { type: 'number', exclusiveMinimum: 0 },
    inputValidation: { type: 'object', required: [] },
    preHook: { type: 'string' },
    postHook: { type: 'string' },
    fallbackTool: { type: 'string' },
    requiresElevation: { type: 'boolean' },
    rateLimits: {
      type: 'object',
      properties: {
        maxCallsPerSecond: { type: 'number', exclusiveMinimum: 0 },
        burstAllowance: { type: 'number', minimum: 0 }
      },
      required: ['maxCallsPerSecond', 'burstAllowance']
    }
  },
  required: ['toolName'],
  additionalProperties: false
};

const validateTsd = ajv.compile<TaskSpecificDefinition>(TSD_SCHEMA);

export class TsdLoader {
  private readonly tsds = new Map<string, TaskSpecificDefinition>();
  private readonly tsdDir: string;

  constructor(tsdDir?: string) {
    this.tsdDir = tsdDir ?? path.join(configDir(), 'tsds');
  }

  /**
   * Scan the TSD directory and load all .json files.
   * Call once at server startup.
   */
  load(): void {
    if (!fs.existsSync(this.tsdDir)) {
      log.warn({ dir: this.tsdDir }, 'TSD directory does not exist, no TSDs loaded');
      return;
    }

    const files = fs.readdirSync(this.tsdDir).filter(f => f.endsWith('.json')).sort();
    log.info({ dir: this.tsdDir, count: files.length }, 'Loading TSDs');

    for (const file of files) {
      const filePath = path.join(this.tsdDir, file);
      let parsed: unknown;
      try {
        parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      } catch (e) {
        log.error({ file, error: errorMessage(e) }, 'Failed to parse TSD file, skipped');
        continue;
      }

      if (!validateTsd(parsed)) {
        log.warn({ file, violations: validateTsd.errors }, 'TSD file does not match the TSD schema, skipped');
        continue;
      }

      this.set(parsed);
      log.debug({ file, toolName: parsed.toolName }, 'TSD loaded');
    }

    log.info({ total: this.tsds.size }, 'TSDs loaded');
  }

  /** Adds or replaces a TSD programmatically. */
  set(tsd: TaskSpecificDefinition): void {
    this.tsds.set(tsd.toolName, tsd);
  }

  /** Get the TSD for a specific tool. Returns undefined if none configured. */
  get(toolName: string): TaskSpecificDefinition | undefined {
    return this.tsds.get(toolName);
  }
}
