/**
 * tools/hardware/storage.ts
 *
 * Disk type classification from Win32_DiskDrive fields, and the
 * partition-to-disk mapping used to find the device behind a drive letter.
 */

import { DiskType, PhysicalDrive } from '../../core/types';
import { UnknownRecord, field, numField, toRecordArray } from '../../core/values';
import { bytesToGb } from './format';

const SOLID_STATE_MODEL_HINTS = ['SSD', 'NVME', 'M.2', 'SOLID STATE'];

export function classifyDisk(model: string, mediaType: string, interfaceType: string): DiskType {
  const upperModel = model.toUpperCase();
  const isScsi = interfaceType.trim().toUpperCase() === 'SCSI';

  if (SOLID_STATE_MODEL_HINTS.some(hint => upperModel.includes(hint))) {
    return upperModel.includes('NVME') || isScsi ? 'NVMe SSD' : 'SSD';
  }
  if (mediaType.toUpperCase().includes('SSD') || mediaType.includes('Solid State')) {
    return 'SSD';
  }
  if (mediaType.includes('Fixed hard disk')) {
    return 'HDD';
  }
  // NVMe drives sit behind the StorNVMe miniport, which WMI reports as SCSI.
  return isScsi ? 'SSD' : 'HDD';
}

/** "Disk #1, Partition #0" → 1 */
export function parseDiskNumber(partition: string): number | null {
  const match = /Disk #(\d+)/.exec(partition);
  return match ? Number(match[1]) : null;
}

export interface BootDisk {
  storageName: string;
  storageType: DiskType | 'Unknown';
}

/**
 * Picks the Disks entry whose Index matches the disk number in Partition
 * ("Disk #0, Partition #2"). Null when there is no partition or no match.
 */
export function findBootDisk(rec: UnknownRecord): BootDisk | null {
  const diskNumber = parseDiskNumber(field(rec, 'Partition'));
  if (diskNumber === null) return null;

  const row = toRecordArray(rec.Disks).find(d => numField(d, 'Index') === diskNumber);
  if (!row) return null;

  const model = field(row, 'Model');
  return {
    storageName: model || 'Unknown',
    storageType: classifyDisk(model, field(row, 'MediaType'), field(row, 'InterfaceType'))
  };
}

export interface DiskDriveRow {
  model: string;
  sizeBytes: number;
  mediaType: string;
  interfaceType: string;
}

export function toPhysicalDrives(rows: DiskDriveRow[]): PhysicalDrive[] {
  return rows.map((row, i) => ({
    label: `Storage ${i + 1}`,
    name: row.model || 'Unknown Disk',
    totalGb: bytesToGb(row.sizeBytes),
    type: classifyDisk(row.model, row.mediaType, row.interfaceType)
  }));
}
