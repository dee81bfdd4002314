/**
 * tools/hardware/gpu.ts
 *
 * GPU readings. nvidia-smi gives live usage, memory and temperature;
 * Win32_VideoController only gives adapter names and RAM, which is what
 * AMD and Intel adapters fall back to.
 */

import { GpuDevice, GpuInfo } from '../../core/types';
import { UnknownRecord, field, numField } from '../../core/values';
import { bytesToGb } from './format';

export const NVIDIA_SMI_QUERY =
  'nvidia-smi --query-gpu=name,utilization.gpu,memory.used,memory.total,temperature.gpu --format=csv,noheader,nounits';

/** Parses `name, util, memUsedMiB, memTotalMiB, tempC` lines; malformed lines are skipped. */
export function parseNvidiaSmi(csv: string): GpuDevice[] {
  const devices: GpuDevice[] = [];

  for (const line of csv.split(/\r?\n/)) {
    const parts = line.split(',').map(p => p.trim());
    if (parts.length < 5 || !parts[0]) continue;

    const [usage, memUsed, memTotal, temp] = parts.slice(1, 5).map(Number);
    if (![usage, memUsed, memTotal, temp].every(Number.isFinite)) continue;

    devices.push({
      name: parts[0],
      usagePct: usage,
      memoryUsedGb: memUsed / 1024,
      memoryTotalGb: memTotal / 1024,
      temperatureC: temp,
      source: 'nvidia-smi'
    });
  }

  return devices;
}

export function fromVideoControllers(rows: UnknownRecord[]): GpuDevice[] {
  return rows
    .filter(row => field(row, 'Name') !== '')
    .map(row => {
      const adapterRam = numField(row, 'AdapterRAM');
      return {
        name: field(row, 'Name'),
        usagePct: null,
        memoryUsedGb: null,
        memoryTotalGb: adapterRam && adapterRam > 0 ? bytesToGb(adapterRam) : null,
        temperatureC: null,
        source: 'wmi' as const
      };
    });
}

export function toGpuInfo(devices: GpuDevice[]): GpuInfo {
  if (devices.length === 0) {
    return { available: false, name: 'No GPU detected', devices: [] };
  }
  return { available: true, name: devices[0].name, devices };
}
