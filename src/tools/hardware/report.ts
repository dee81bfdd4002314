/**
 * tools/hardware/report.ts
 *
 * Plain-text system report returned by system.report. Sections appear in a
 * fixed order; a section whose data failed to load prints "Error" values so
 * one broken WMI class never hides the rest of the report.
 */

import { GpuInfo, SystemSnapshot } from '../../core/types';

const RULE = '----------------------';
const ERROR = 'Error';

function gb(n: number): string {
  return `${n.toFixed(1)} GB`;
}

function pct(n: number): string {
  return `${n.toFixed(1)}%`;
}

function section(title: string, lines: string[]): string {
  return [title, RULE, ...lines].join('\n');
}

function gpuMemory(gpu: GpuInfo): string {
  if (!gpu.available) return 'N/A';
  const device = gpu.devices[0];
  if (device.memoryTotalGb === null || device.memoryTotalGb <= 0) return 'Unknown';
  if (device.memoryUsedGb === null) return gb(device.memoryTotalGb);
  return `${gb(device.memoryUsedGb)} / ${gb(device.memoryTotalGb)}`;
}

function gpuTemperature(gpu: GpuInfo): string {
  const temp = gpu.available ? gpu.devices[0].temperatureC : null;
  return temp === null ? 'N/A' : `${temp.toFixed(0)}C`;
}

export function formatSystemReport(s: SystemSnapshot): string {
  const { cpu, disk, memory, storage, gpu, monitors, motherboard: mb, os } = s;
  const drive = disk?.drive ?? 'C:';

  const frequency = cpu
    ? (cpu.currentSpeed !== 'Unknown' ? `${cpu.frequency} (Current: ${cpu.currentSpeed})` : cpu.frequency)
    : ERROR;

  const sections = [
    section('Processor Information:', [
      `Processor: ${cpu?.name ?? ERROR}`,
      `Cores/Threads: ${cpu?.cores ?? ERROR}`,
      `Frequency: ${frequency}`,
      `Cache: ${cpu?.cacheDisplay ?? ERROR}`,
      `Sockets: ${cpu?.sockets ?? ERROR}`
    ]),
    section(`Local Disk (${drive}) Information:`, [
      `Storage Device: ${disk?.storageName ?? ERROR}`,
      `Storage Type: ${disk?.storageType ?? ERROR}`,
      `Local Disk (${drive}) Total: ${disk ? `${gb(disk.usedGb)} / ${gb(disk.totalGb)}` : ERROR}`,
      `Local Disk (${drive}) Free: ${disk ? gb(disk.freeGb) : ERROR}`,
      `Local Disk (${drive}) Usage: ${disk ? pct(disk.usagePct) : ERROR}`
    ]),
    section('Memory Information:', [
      `Ram Total: ${memory ? gb(memory.totalGb) : ERROR}`,
      `Ram Used: ${memory ? gb(memory.usedGb) : ERROR}`,
      `Ram Available: ${memory ? gb(memory.availableGb) : ERROR}`,
      `RAM Name: ${memory?.ramName ?? ERROR}`,
      `RAM Type: ${memory?.ramType ?? ERROR}`,
      `RAM Speed: ${memory?.ramSpeed ?? ERROR}`,
      `RAM Slots: ${memory?.ramSlots ?? ERROR}`
    ]),
    section('Storage Information:', [
      `Total Storage Devices: ${storage ? storage.drives.length : ERROR}`,
      ...(storage?.drives ?? []).map(d => `${d.label}: ${d.name} - ${gb(d.totalGb)}`)
    ]),
    section('Graphics Information:', [
      `GPU: ${gpu?.name ?? ERROR}`,
      `GPU Memory: ${gpu ? gpuMemory(gpu) : ERROR}`,
      `GPU Temperature: ${gpu ? gpuTemperature(gpu) : ERROR}`
    ]),
    section('Monitor Information:', [
      `Monitor Count: ${monitors ? monitors.count : ERROR}`,
      ...(monitors && monitors.count > 0 ? monitors.monitors.map((m, i) => `Monitor ${i + 1}: ${m}`) : [])
    ]),
    section('Motherboard Information:', [
      `Product: ${mb?.product ?? ERROR}`,
      `Manufacturer: ${mb?.manufacturer ?? ERROR}`,
      `Version: ${mb?.version ?? ERROR}`,
      `Chipset: ${mb?.chipset ?? ERROR}`,
      `BIOS Version: ${mb?.biosVersion ?? ERROR}`,
      `BIOS Manufacturer: ${mb?.biosManufacturer ?? ERROR}`,
      `BIOS Date: ${mb?.biosDate ?? ERROR}`,
      `System Model: ${mb?.systemModel ?? ERROR}`,
      `Total Memory Slots: ${mb?.memorySlots ?? ERROR}`,
      `Max Memory Capacity: ${mb?.maxMemoryCapacity ?? ERROR}`,
      `Memory Slots Used: ${mb?.memorySlotsUsed ?? ERROR}`
    ]),
    section('Operating System Information:', [
      `Device Name: ${os?.deviceName ?? ERROR}`,
      `User: ${os?.userName ?? ERROR}`,
      `Operating System: ${os?.edition ?? ERROR}`,
      `OS Version: ${os?.version ?? ERROR}`,
      `OS Build: ${os?.build ?? ERROR}`,
      `OS Experience: ${os?.experience ?? ERROR}`
    ])
  ];

  return sections.join('\n\n');
}
