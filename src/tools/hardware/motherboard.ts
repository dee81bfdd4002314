/**
 * tools/hardware/motherboard.ts
 */

import { MotherboardInfo } from '../../core/types';
import { UnknownRecord, field, numField } from '../../core/values';
import { detectChipset } from './chipset';
import { formatUsDate, parseWmiDate } from './format';

function orUnknown(value: string): string {
  return value || 'Unknown';
}

/**
 * Builds the motherboard section from the combined Win32_BaseBoard / BIOS /
 * ComputerSystem / PhysicalMemoryArray query. `CpuName` feeds the chipset
 * estimate when the board name carries no chipset token.
 */
export function describeMotherboard(rec: UnknownRecord): MotherboardInfo {
  const product = field(rec, 'Product');
  const { chipset, source } = detectChipset(product, field(rec, 'CpuName'));

  const biosDate = parseWmiDate(field(rec, 'BiosDate'));
  const slots = numField(rec, 'MemoryDevices');
  const maxCapacityKb = numField(rec, 'MaxCapacityKb');
  const used = numField(rec, 'ModulesInstalled');

  return {
    product: orUnknown(product),
    manufacturer: orUnknown(field(rec, 'Manufacturer')),
    version: orUnknown(field(rec, 'Version')),
    chipset,
    chipsetSource: source,
    biosVersion: orUnknown(field(rec, 'BiosVersion')),
    biosManufacturer: orUnknown(field(rec, 'BiosManufacturer')),
    biosDate: biosDate ? formatUsDate(biosDate) : 'Unknown',
    systemModel: orUnknown(field(rec, 'SystemModel')),
    memorySlots: slots ? String(slots) : 'Unknown',
    // MaxCapacity is reported in KB
    maxMemoryCapacity: maxCapacityKb ? `${Math.round(maxCapacityKb / 1024 / 1024)} GB` : 'Unknown',
    memorySlotsUsed: used !== null ? String(used) : 'Unknown'
  };
}
