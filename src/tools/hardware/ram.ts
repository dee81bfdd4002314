/**
 * tools/hardware/ram.ts
 *
 * Turns Win32_PhysicalMemory rows into the RAM description shown by
 * system.memory: module name, speed, DDR generation and slot count.
 */

import { RamDetails, RamModuleRecord } from '../../core/types';

const PLACEHOLDERS = new Set(['', 'UNKNOWN', 'N/A']);

// SMBIOSMemoryType and the legacy MemoryType share these codes.
const MEMORY_TYPE_CODES: Record<number, string> = {
  20: 'DDR',
  21: 'DDR2',
  22: 'DDR2 FB-DIMM',
  24: 'DDR3',
  26: 'DDR4',
  34: 'DDR5'
};

/** Firmware strings are often NUL padded or space padded to a fixed width. */
export function cleanFirmwareString(raw: string | null | undefined): string {
  if (!raw) return '';
  return raw.replace(/\0/g, '').split(/\s+/).filter(Boolean).join(' ');
}

function isPlaceholder(value: string): boolean {
  return PLACEHOLDERS.has(value.toUpperCase());
}

export function ramName(manufacturer: string, partNumber: string): string {
  if (!isPlaceholder(partNumber)) {
    if (isPlaceholder(manufacturer)) return partNumber;
    if (partNumber.toUpperCase().includes(manufacturer.toUpperCase())) return partNumber;
    return `${manufacturer} ${partNumber}`;
  }
  if (!isPlaceholder(manufacturer)) return manufacturer;
  return 'Unknown';
}

export function ramType(smbiosType: number | null | undefined, memoryType: number | null | undefined,
                        partNumber: string, speedMhz: number | null | undefined): string {
  if (smbiosType && MEMORY_TYPE_CODES[smbiosType]) return MEMORY_TYPE_CODES[smbiosType];
  if (memoryType && MEMORY_TYPE_CODES[memoryType]) return MEMORY_TYPE_CODES[memoryType];

  const part = partNumber.toUpperCase();
  for (const gen of ['DDR5', 'DDR4', 'DDR3', 'DDR2']) {
    if (part.includes(gen)) return gen;
  }

  // Rough guess from the rated speed
  if (speedMhz) {
    if (speedMhz >= 4800) return 'DDR5';
    if (speedMhz >= 2133) return 'DDR4';
    if (speedMhz >= 800) return 'DDR3';
    if (speedMhz >= 400) return 'DDR2';
  }
  return 'Unknown';
}

function capacityOf(record: RamModuleRecord): number {
  const raw = record.Capacity;
  const n = typeof raw === 'string' ? Number(raw) : raw ?? 0;
  return Number.isFinite(n) && n > 0 ? n : 0;
}

/** Describes the installed memory from its first module, plus slot count and total capacity. */
export function describeRamModules(modules: RamModuleRecord[]): RamDetails {
  if (modules.length === 0) {
    return { ramName: 'Unknown', ramSpeed: 'Unknown', ramType: 'Unknown', ramSlots: 'Unknown', installedBytes: 0 };
  }

  const first = modules[0];
  const manufacturer = cleanFirmwareString(first.Manufacturer);
  const partNumber = cleanFirmwareString(first.PartNumber);
  const speed = first.Speed ?? null;

  return {
    ramName: ramName(manufacturer, partNumber),
    ramSpeed: speed && speed > 0 ? `${speed} MHz` : 'Unknown',
    ramType: ramType(first.SMBIOSMemoryType, first.MemoryType, partNumber, speed),
    ramSlots: `${modules.length} slot(s) used`,
    installedBytes: modules.reduce((sum, m) => sum + capacityOf(m), 0)
  };
}
