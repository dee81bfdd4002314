/**
 * core/powershell.ts
 *
 * Process helpers shared by the tool modules. Every WMI / CIM query goes
 * through ps(): the script is sent Base64 UTF-16LE encoded via
 * -EncodedCommand so quoting inside the script never matters.
 */

import { execSync } from 'child_process';
import { ExecutionError, ParseError, errorMessage } from './errors';
import { UnknownRecord, toRecordArray, isRecord } from './values';

function stderrOf(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'stderr' in e) {
    const stderr = e.stderr;
    if (typeof stderr === 'string') return stderr.trim();
    if (Buffer.isBuffer(stderr)) return stderr.toString().trim();
  }
  return '';
}

/** Builds the exact command line handed to execSync. */
export function encodePowerShell(script: string): string {
  const encoded = Buffer.from(script, 'utf16le').toString('base64');
  return `powershell -NoProfile -ExecutionPolicy Bypass -EncodedCommand ${encoded}`;
}

export function ps(toolName: string, script: string, timeoutMs = 10000): string {
  try {
    return execSync(
      encodePowerShell(script),
      { encoding: 'utf-8', timeout: timeoutMs, stdio: ['pipe', 'pipe', 'pipe'], windowsHide: true }
    ).trim();
  } catch (e) {
    throw new ExecutionError(toolName, stderrOf(e) || errorMessage(e));
  }
}

/** Runs a non-PowerShell command line (nvidia-smi, cleanmgr, …). */
export function run(toolName: string, command: string, timeoutMs = 5000): string {
  try {
    return execSync(
      command,
      { encoding: 'utf-8', timeout: timeoutMs, stdio: ['pipe', 'pipe', 'pipe'], windowsHide: true }
    ).trim();
  } catch (e) {
    throw new ExecutionError(toolName, stderrOf(e) || errorMessage(e));
  }
}

function parseJson(toolName: string, raw: string): unknown {
  if (!raw) return null;
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ParseError(`Failed to parse ${toolName} output: ${errorMessage(e)}`, { toolName });
  }
}

/** Runs a script ending in ConvertTo-Json and returns the single object it printed. */
export function psObject(toolName: string, script: string, timeoutMs?: number): UnknownRecord {
  const parsed = parseJson(toolName, ps(toolName, script, timeoutMs));
  if (!isRecord(parsed)) {
    throw new ExecutionError(toolName, 'PowerShell returned no object');
  }
  return parsed;
}

/** Same as psObject, for queries that may print zero, one or many rows. */
export function psRows(toolName: string, script: string, timeoutMs?: number): UnknownRecord[] {
  return toRecordArray(parseJson(toolName, ps(toolName, script, timeoutMs)));
}
