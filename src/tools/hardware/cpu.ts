/**
 * tools/hardware/cpu.ts
 */

import { CpuInfo } from '../../core/types';
import { UnknownRecord, field, numField, toRecordArray } from '../../core/values';
import { formatCacheSize, formatFrequency, round1 } from './format';

// Win32_CacheMemory.Level uses CIM codes: 3 = primary, 4 = secondary, 5 = tertiary.
const CACHE_LEVELS: Record<number, 'L1' | 'L2' | 'L3'> = { 3: 'L1', 4: 'L2', 5: 'L3' };

/** "L1 - 512 KB | L2 - 8.0 MB | L3 - 32.0 MB", skipping levels WMI did not report. */
export function describeCpuCache(rows: UnknownRecord[]): string {
  const sizes: Partial<Record<'L1' | 'L2' | 'L3', string>> = {};

  for (const row of rows) {
    const level = numField(row, 'Level');
    const sizeKb = numField(row, 'MaxCacheSize');
    if (level === null || sizeKb === null || sizeKb <= 0) continue;
    const label = CACHE_LEVELS[level];
    if (label) sizes[label] = formatCacheSize(sizeKb);
  }

  const parts = (['L1', 'L2', 'L3'] as const)
    .filter(label => sizes[label] !== undefined)
    .map(label => `${label} - ${sizes[label]}`);

  return parts.length > 0 ? parts.join(' | ') : 'Unknown';
}

export function describeCores(physical: number | null, logical: number | null): string {
  if (physical && logical) return `${physical} cores, ${logical} threads`;
  if (logical) return `${logical} threads`;
  return 'Unknown';
}

export type CpuStaticInfo = Omit<CpuInfo, 'usagePct' | 'currentSpeed'>;

/** What the os module knows about the processor. */
export interface HostCpu {
  model: string;
  logicalCount: number;
  speedMhz: number;
}

/**
 * Static processor description from the Win32_Processor query (null when WMI
 * is unavailable). Name falls back to the registry ProcessorNameString, then
 * to the os module.
 */
export function describeCpu(rec: UnknownRecord | null, host: HostCpu): CpuStaticInfo {
  const name = (field(rec, 'Name') || field(rec, 'ProcessorNameString') || host.model).replace(/\s+/g, ' ').trim();
  const base = host.speedMhz > 0 ? host.speedMhz : null;
  const max = numField(rec, 'MaxClockSpeed');

  return {
    name: name || 'Unknown',
    cores: describeCores(numField(rec, 'NumberOfCores'), numField(rec, 'NumberOfLogicalProcessors') ?? (host.logicalCount || null)),
    frequency: formatFrequency(base, max !== null && max !== base ? max : null),
    cacheDisplay: rec ? describeCpuCache(toRecordArray(rec.Cache)) : 'Unknown',
    sockets: field(rec, 'SocketDesignation') || 'Unknown'
  };
}

// ---------------------------------------------------------------------------
// Usage sampling
// ---------------------------------------------------------------------------

export interface CpuTimes {
  user: number;
  nice: number;
  sys: number;
  idle: number;
  irq: number;
}

export interface CpuSample {
  idle: number;
  total: number;
}

/** Sums the per-core tick counters reported by os.cpus(). */
export function sampleCpuTimes(cores: { times: CpuTimes }[]): CpuSample {
  let idle = 0;
  let total = 0;
  for (const { times } of cores) {
    idle += times.idle;
    total += times.user + times.nice + times.sys + times.idle + times.irq;
  }
  return { idle, total };
}

/** Busy percentage between two samples, 0 when no ticks elapsed. */
export function usageBetween(prev: CpuSample, next: CpuSample): number {
  const total = next.total - prev.total;
  if (total <= 0) return 0;
  const busy = 1 - (next.idle - prev.idle) / total;
  return round1(Math.min(100, Math.max(0, busy * 100)));
}
