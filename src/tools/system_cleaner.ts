/**
 * tools/system_cleaner.ts
 *
 * Disk and memory cleanup. Everything here modifies state; the matching TSDs
 * require elevation for deletions and rate-limit the memory optimizer.
 *
 * Temp folder paths are sandboxed: a caller may narrow the folder list but
 * never point the cleaner outside the configured folders.
 */

import { spawn } from 'child_process';
import { ToolModule, ToolResult, FolderAnalysis, FolderCleanReport } from '../core/types';
import { registry } from '../core/registry';
import { ExecutionError, UnsupportedPlatformError, errorMessage } from '../core/errors';
import { isElevated } from '../core/elevation';
import { scopedLogger } from '../core/logger';
import { ps } from '../core/powershell';
import { optionalBoolean, optionalNumber, optionalStringArray } from '../core/values';
import { formatBytes } from './hardware/format';
import {
  analyzeFolder,
  cleanFolder,
  defaultCleanupFolders,
  describeFolderReport,
  resolveCleanupFolders
} from './cleanup/temp_cleaner';
import { optimizeMemory } from './cleanup/memory_optimizer';

const log = scopedLogger('tools/system_cleaner');

export type RecycleBinOutcome = 'emptied' | 'failed' | 'skipped' | 'unsupported';

function ok(data: unknown): ToolResult {
  return { success: true, data, durationMs: 0 };
}

function requireWindows(toolName: string): void {
  if (process.platform !== 'win32') {
    throw new UnsupportedPlatformError(toolName, process.platform);
  }
}

function allowedFolders(): string[] {
  const configured = registry.isInitialized() ? registry.sessionConfig.cleanupFolders : undefined;
  return configured && configured.length > 0
    ? configured
    : defaultCleanupFolders(process.platform, process.env);
}

function emptyRecycleBin(): void {
  ps('cleaner.empty_recycle_bin', 'Clear-RecycleBin -Force -ErrorAction Stop;', 60000);
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleCleanTemp(args: Record<string, unknown>): Promise<ToolResult> {
  const requested = optionalStringArray('cleaner.clean_temp', args, 'folders');
  const withRecycleBin = optionalBoolean('cleaner.clean_temp', args, 'emptyRecycleBin') ?? true;
  const folders = await resolveCleanupFolders(requested, allowedFolders());

  const lines: string[] = [];
  const reports: FolderCleanReport[] = [];

  for (const folder of folders) {
    lines.push(`Cleaning: ${folder}`);
    const report = await cleanFolder(folder);
    for (const failure of report.failures) {
      lines.push(`Failed ${failure.item}: ${failure.message}`);
    }
    lines.push(describeFolderReport(report));
    reports.push(report);
  }

  let recycleBin: RecycleBinOutcome = 'skipped';
  if (withRecycleBin) {
    if (process.platform !== 'win32') {
      recycleBin = 'unsupported';
    } else {
      try {
        emptyRecycleBin();
        recycleBin = 'emptied';
        lines.push('Recycle Bin emptied.');
      } catch (e) {
        recycleBin = 'failed';
        lines.push(`Recycle Bin: ${errorMessage(e)}`);
        log.warn({ err: errorMessage(e) }, 'Emptying the recycle bin failed');
      }
    }
  }

  const totalItems = reports.reduce((sum, r) => sum + r.items, 0);
  const totalBytes = reports.reduce((sum, r) => sum + r.bytes, 0);
  const freed = formatBytes(totalBytes);
  lines.push(`Cleanup complete: ${totalItems} items removed, ${freed} freed`);

  log.info({ folders: folders.length, totalItems, totalBytes, recycleBin }, 'Temp cleanup finished');

  return ok({
    folders: reports,
    totalItems,
    totalBytes,
    freed,
    recycleBin,
    log: lines,
    status: `Cleaned: ${freed} (${totalItems} items)`
  });
}

async function handleAnalyze(args: Record<string, unknown>): Promise<ToolResult> {
  const requested = optionalStringArray('cleaner.analyze', args, 'folders');
  const folders = await resolveCleanupFolders(requested, allowedFolders());

  const results: FolderAnalysis[] = [];
  for (const folder of folders) {
    results.push(await analyzeFolder(folder));
  }
  const totalBytes = results.reduce((sum, r) => sum + r.bytes, 0);

  return ok({ folders: results, totalBytes, reclaimable: formatBytes(totalBytes) });
}

async function handleEmptyRecycleBin(): Promise<ToolResult> {
  requireWindows('cleaner.empty_recycle_bin');
  emptyRecycleBin();
  log.info('Recycle Bin emptied');
  return ok({ emptied: true });
}

async function handleDiskCleanup(): Promise<ToolResult> {
  requireWindows('cleaner.disk_cleanup');

  const child = spawn('cleanmgr', ['/sagerun:1337'], { detached: true, stdio: 'ignore' });
  child.on('error', (err) => {
    log.error({ err: err.message }, 'cleanmgr failed to start');
  });
  child.unref();

  log.info({ pid: child.pid }, 'Launched cleanmgr /sagerun:1337');
  return ok({ launched: child.pid !== undefined, pid: child.pid ?? null });
}

async function handleOptimizeMemory(args: Record<string, unknown>): Promise<ToolResult> {
  requireWindows('cleaner.optimize_memory');
  const maxProcesses = optionalNumber('cleaner.optimize_memory', args, 'maxProcesses') ?? 20;

  const elevated = isElevated();
  if (!elevated) {
    log.warn('Not elevated; only this process working set will be trimmed');
  }
  return ok(optimizeMemory({ elevated, maxProcesses }));
}

// ---------------------------------------------------------------------------
// Module definition + registration
// ---------------------------------------------------------------------------

const systemCleaner: ToolModule = {
  name: 'system_cleaner',

  tools: [
    {
      name: 'cleaner.clean_temp',
      description: 'Delete the contents of the temp folders (user and system temp, Prefetch) and empty the Recycle Bin. Reports items and bytes removed per folder.',
      parameters: {
        type: 'object',
        properties: {
          folders: {
            type: 'array',
            items: { type: 'string' },
            description: 'Clean only these folders. Each must be inside one of the configured cleanup folders.'
          },
          emptyRecycleBin: { type: 'boolean', description: 'Also empty the Recycle Bin (Windows only)', default: true }
        },
        additionalProperties: false
      }
    },
    {
      name: 'cleaner.analyze',
      description: 'Measure how much space cleaning the temp folders would reclaim, without deleting anything.',
      parameters: {
        type: 'object',
        properties: {
          folders: {
            type: 'array',
            items: { type: 'string' },
            description: 'Analyze only these folders. Each must be inside one of the configured cleanup folders.'
          }
        },
        additionalProperties: false
      }
    },
    {
      name: 'cleaner.empty_recycle_bin',
      description: 'Empty the Windows Recycle Bin for every drive.',
      parameters: { type: 'object', properties: {}, additionalProperties: false }
    },
    {
      name: 'cleaner.disk_cleanup',
      description: 'Launch Windows Disk Cleanup (cleanmgr /sagerun:1337) in the background.',
      parameters: { type: 'object', properties: {}, additionalProperties: false }
    },
    {
      name: 'cleaner.optimize_memory',
      description: 'Free RAM: trim working sets and, when running as administrator, purge the standby list, flush modified pages and trim the file cache. Reports the measured change in available memory.',
      parameters: {
        type: 'object',
        properties: {
          maxProcesses: { type: 'integer', description: 'How many other processes to trim', minimum: 0, maximum: 500, default: 20 }
        },
        additionalProperties: false
      }
    }
  ],

  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    log.debug({ toolName }, 'Executing');

    switch (toolName) {
      case 'cleaner.clean_temp':        return handleCleanTemp(args);
      case 'cleaner.analyze':           return handleAnalyze(args);
      case 'cleaner.empty_recycle_bin': return handleEmptyRecycleBin();
      case 'cleaner.disk_cleanup':      return handleDiskCleanup();
      case 'cleaner.optimize_memory':   return handleOptimizeMemory(args);
      default:
        throw new ExecutionError('system_cleaner', `Unknown tool: ${toolName}`);
    }
  }
};

registry.register(systemCleaner);
export default systemCleaner;
