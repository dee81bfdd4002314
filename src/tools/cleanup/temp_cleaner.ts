/**
 * tools/cleanup/temp_cleaner.ts
 *
 * Deletes the contents of temp folders, one entry at a time, so a locked
 * file only costs that file. Folders themselves are never removed.
 */

import { Dirent, promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CleanupFailure, FolderAnalysis, FolderCleanReport } from '../../core/types';
import { SandboxViolationError, errorMessage } from '../../core/errors';
import { scopedLogger } from '../../core/logger';
import { formatBytes } from '../hardware/format';

const log = scopedLogger('tools/system_cleaner');

const FAILURE_MESSAGE_LIMIT = 50;

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
  return undefined;
}

// ---------------------------------------------------------------------------
// Folder resolution
// ---------------------------------------------------------------------------

/** The folders cleaned when neither the caller nor the session config names any. */
export function defaultCleanupFolders(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
  if (platform !== 'win32') return [os.tmpdir()];

  const systemRoot = env.SystemRoot ?? 'C:\\Windows';
  const candidates = [
    env.TEMP,
    env.TMP,
    path.win32.join(systemRoot, 'Temp'),
    path.win32.join(systemRoot, 'Prefetch'),
    env.USERPROFILE ? path.win32.join(env.USERPROFILE, 'AppData', 'Local', 'Temp') : undefined
  ];
  return dedupe(candidates);
}

function dedupe(folders: (string | undefined)[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const folder of folders) {
    if (!folder || !folder.trim()) continue;
    const key = folder.trim().toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(folder.trim());
  }
  return result;
}

export function isInside(child: string, parent: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Resolves symlinks in every existing part of `folder`. A missing tail is
 * appended to the real path of its nearest existing ancestor.
 */
export async function realFolder(folder: string): Promise<string> {
  const absolute = path.resolve(folder);
  const missing: string[] = [];
  let current = absolute;
  for (;;) {
    try {
      return path.join(await fs.realpath(current), ...missing.reverse());
    } catch (e) {
      const parent = path.dirname(current);
      if (parent === current) {
        log.debug({ folder, err: errorMessage(e) }, 'No resolvable ancestor, using the path as given');
        return absolute;
      }
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

/**
 * Returns the folders to work on. Requested folders must equal or lie inside
 * one of the allowed folders once symlinks are resolved, and are returned as
 * real paths; with no request the allowed list is used as is.
 */
export async function resolveCleanupFolders(requested: string[] | undefined, allowed: string[]): Promise<string[]> {
  if (!requested || requested.length === 0) return dedupe(allowed);

  const roots = await Promise.all(allowed.map(realFolder));
  const resolved: string[] = [];
  for (const folder of requested) {
    const real = await realFolder(folder);
    if (!roots.some(root => isInside(real, root))) {
      throw new SandboxViolationError(folder, allowed);
    }
    resolved.push(real);
  }
  return dedupe(resolved);
}

// ---------------------------------------------------------------------------
// Measuring
// ---------------------------------------------------------------------------

/** Total size of every file below `dir`. Unreadable subtrees count as 0. */
export async function directorySize(dir: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    log.debug({ dir, err: errorMessage(e) }, 'Skipping unreadable directory while sizing');
    return 0;
  }

  let total = 0;
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(full);
      continue;
    }
    try {
      total += (await fs.lstat(full)).size;
    } catch (e) {
      log.debug({ file: full, err: errorMessage(e) }, 'Skipping unreadable file while sizing');
    }
  }
  return total;
}

export async function analyzeFolder(folder: string): Promise<FolderAnalysis> {
  let names: string[];
  try {
    names = await fs.readdir(folder);
  } catch (e) {
    if (errnoCode(e) !== 'ENOENT') {
      log.warn({ folder, err: errorMessage(e) }, 'Cannot list folder for analysis');
    }
    return { path: folder, exists: errnoCode(e) !== 'ENOENT', entries: 0, bytes: 0, reclaimable: formatBytes(0) };
  }

  const bytes = await directorySize(folder);
  return { path: folder, exists: true, entries: names.length, bytes, reclaimable: formatBytes(bytes) };
}

// ---------------------------------------------------------------------------
// Cleaning
// ---------------------------------------------------------------------------

async function removeEntry(full: string): Promise<number> {
  const stat = await fs.lstat(full);
  if (stat.isDirectory()) {
    const size = await directorySize(full);
    await fs.rm(full, { recursive: true, force: true });
    return size;
  }
  await fs.rm(full, { force: true });
  return stat.size;
}

export async function cleanFolder(folder: string): Promise<FolderCleanReport> {
  let names: string[];
  try {
    names = await fs.readdir(folder);
  } catch (e) {
    const code = errnoCode(e);
    if (code === 'ENOENT') {
      return { path: folder, status: 'missing', items: 0, bytes: 0, failures: [], message: `Directory not found: ${folder}` };
    }
    if (code === 'EACCES' || code === 'EPERM') {
      return { path: folder, status: 'access_denied', items: 0, bytes: 0, failures: [], message: `Access denied: ${folder}` };
    }
    return { path: folder, status: 'error', items: 0, bytes: 0, failures: [], message: `Error accessing ${folder}: ${errorMessage(e)}` };
  }

  let items = 0;
  let bytes = 0;
  const failures: CleanupFailure[] = [];

  for (const name of names) {
    try {
      bytes += await removeEntry(path.join(folder, name));
      items++;
    } catch (e) {
      failures.push({ item: name, message: errorMessage(e).slice(0, FAILURE_MESSAGE_LIMIT) });
    }
  }

  log.debug({ folder, items, bytes, failures: failures.length }, 'Folder cleaned');
  return {
    path: folder,
    status: items > 0 ? 'cleaned' : 'already_clean',
    items,
    bytes,
    failures
  };
}

/** One progress line per folder, as shown in the clean_temp result. */
export function describeFolderReport(report: FolderCleanReport): string {
  switch (report.status) {
    case 'cleaned':
      return `${report.path}: ${report.items} items, ${formatBytes(report.bytes)}`;
    case 'already_clean':
      return `${report.path}: Already clean`;
    default:
      return report.message ?? `${report.path}: ${report.status}`;
  }
}
