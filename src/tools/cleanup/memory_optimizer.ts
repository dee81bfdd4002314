/**
 * tools/cleanup/memory_optimizer.ts
 *
 * Frees physical memory through Win32 memory-management calls made from a
 * PowerShell P/Invoke script. The amount reported is the measured change in
 * available memory; it is 0 when nothing was freed.
 *
 * The script runs in a child powershell.exe, so the server's own working set
 * is reached by pid. Without elevation only that working set is emptied. With it the
 * script also purges the standby list, flushes the modified page list,
 * trims other processes and the system file cache.
 */

import * as os from 'os';
import { MemoryOptimizationSteps } from '../../core/types';
import { scopedLogger } from '../../core/logger';
import { psObject } from '../../core/powershell';
import { UnknownRecord, numField } from '../../core/values';
import { formatBytes } from '../hardware/format';

const log = scopedLogger('tools/system_cleaner');

// NtSetSystemInformation(SystemMemoryListInformation = 80, command)
const MEMORY_LIST_COMMANDS = {
  flushModifiedList: 3,
  purgeStandbyList: 4,
  purgeLowPriorityStandbyList: 5
} as const;

// RtlAdjustPrivilege ids: SeIncreaseQuotaPrivilege, SeProfileSingleProcessPrivilege
const SE_INCREASE_QUOTA = 5;
const SE_PROF_SINGLE_PROCESS = 13;

// PROCESS_SET_QUOTA | PROCESS_QUERY_INFORMATION
const PROCESS_ACCESS = 0x0500;

export function buildOptimizerScript(elevated: boolean, maxProcesses: number, serverPid: number): string {
  const max = Math.max(0, Math.floor(maxProcesses));
  const pid = Math.floor(serverPid);
  return `
$native = @"
using System;
using System.Runtime.InteropServices;
public static class PcToolkitMemory {
  [DllImport("ntdll.dll")] public static extern int NtSetSystemInformation(int infoClass, ref int info, int length);
  [DllImport("ntdll.dll")] public static extern int RtlAdjustPrivilege(int privilege, bool enable, bool currentThread, out bool wasEnabled);
  [DllImport("psapi.dll")] public static extern bool EmptyWorkingSet(IntPtr process);
  [DllImport("kernel32.dll")] public static extern IntPtr OpenProcess(int access, bool inherit, int pid);
  [DllImport("kernel32.dll")] public static extern bool CloseHandle(IntPtr handle);
  [DllImport("kernel32.dll")] public static extern bool SetProcessWorkingSetSize(IntPtr process, IntPtr min, IntPtr max);
  [DllImport("kernel32.dll")] public static extern bool SetSystemFileCacheSize(IntPtr min, IntPtr max, int flags);
}
"@
Add-Type -TypeDefinition $native;
$server = [PcToolkitMemory]::OpenProcess(${PROCESS_ACCESS}, $false, ${pid});
$serverTrimmed = $false;
if ($server -ne [IntPtr]::Zero) {
  $serverTrimmed = [PcToolkitMemory]::EmptyWorkingSet($server);
  [void][PcToolkitMemory]::CloseHandle($server)
}
$steps = [ordered]@{
  selfWorkingSetTrimmed = $serverTrimmed;
  standbyListPurged     = $false;
  modifiedListFlushed   = $false;
  processesTrimmed      = 0;
  fileCacheTrimmed      = $false
};
if (${elevated ? '$true' : '$false'}) {
  $was = $false;
  [void][PcToolkitMemory]::RtlAdjustPrivilege(${SE_PROF_SINGLE_PROCESS}, $true, $false, [ref]$was);
  [void][PcToolkitMemory]::RtlAdjustPrivilege(${SE_INCREASE_QUOTA}, $true, $false, [ref]$was);
  $cmd = ${MEMORY_LIST_COMMANDS.purgeStandbyList};
  if ([PcToolkitMemory]::NtSetSystemInformation(80, [ref]$cmd, 4) -eq 0) {
    $steps.standbyListPurged = 'full'
  } else {
    $cmd = ${MEMORY_LIST_COMMANDS.purgeLowPriorityStandbyList};
    if ([PcToolkitMemory]::NtSetSystemInformation(80, [ref]$cmd, 4) -eq 0) { $steps.standbyListPurged = 'low-priority' }
  }
  $cmd = ${MEMORY_LIST_COMMANDS.flushModifiedList};
  $steps.modifiedListFlushed = ([PcToolkitMemory]::NtSetSystemInformation(80, [ref]$cmd, 4) -eq 0);
  $trimmed = 0;
  foreach ($p in (Get-Process | Where-Object { $_.Id -gt 4 -and $_.Id -ne $PID -and $_.Id -ne ${pid} } | Select-Object -First ${max})) {
    $h = [PcToolkitMemory]::OpenProcess(${PROCESS_ACCESS}, $false, $p.Id);
    if ($h -ne [IntPtr]::Zero) {
      if ([PcToolkitMemory]::SetProcessWorkingSetSize($h, [IntPtr](-1), [IntPtr](-1))) { $trimmed++ }
      [void][PcToolkitMemory]::CloseHandle($h)
    }
  }
  $steps.processesTrimmed = $trimmed;
  $steps.fileCacheTrimmed = [PcToolkitMemory]::SetSystemFileCacheSize([IntPtr](-1), [IntPtr](-1), 0)
}
[PSCustomObject]$steps | ConvertTo-Json -Depth 2;
`;
}

export function parseOptimizationSteps(rec: UnknownRecord): MemoryOptimizationSteps {
  const standby = rec.standbyListPurged;
  return {
    selfWorkingSetTrimmed: rec.selfWorkingSetTrimmed === true,
    standbyListPurged: standby === 'full' || standby === 'low-priority' ? standby : false,
    modifiedListFlushed: rec.modifiedListFlushed === true,
    processesTrimmed: numField(rec, 'processesTrimmed') ?? 0,
    fileCacheTrimmed: rec.fileCacheTrimmed === true
  };
}

export interface MemoryOptimizationResult {
  before: number;
  after: number;
  freedBytes: number;
  freed: string;
  elevated: boolean;
  steps: MemoryOptimizationSteps;
  status: string;
}

export interface OptimizeOptions {
  elevated: boolean;
  maxProcesses: number;
  /** Process whose working set is emptied; defaults to this server. */
  serverPid?: number;
  /** Available physical memory in bytes. */
  availableMemory?: () => number;
}

export function optimizeMemory(options: OptimizeOptions): MemoryOptimizationResult {
  const available = options.availableMemory ?? os.freemem;

  const before = available();
  const steps = parseOptimizationSteps(
    psObject('cleaner.optimize_memory', buildOptimizerScript(options.elevated, options.maxProcesses, options.serverPid ?? process.pid), 60000)
  );
  const after = available();

  const freedBytes = Math.max(0, after - before);
  const freed = formatBytes(freedBytes);
  log.info({ before, after, freedBytes, steps }, 'Memory optimization finished');

  return {
    before,
    after,
    freedBytes,
    freed,
    elevated: options.elevated,
    steps,
    status: `Memory Optimized: +${freed}`
  };
}
