import { classifyDisk, findBootDisk, parseDiskNumber, toPhysicalDrives } from '../tools/hardware/storage';

describe('classifyDisk', () => {
  it('treats solid-state model names on SCSI as NVMe', () => {
    expect(classifyDisk('Samsung SSD 980 PRO 1TB', 'Fixed hard disk media', 'SCSI')).toBe('NVMe SSD');
    expect(classifyDisk('WD_BLACK SN850X NVMe 2TB', 'Fixed hard disk media', 'SCSI')).toBe('NVMe SSD');
  });

  it('treats other solid-state model names as SSD', () => {
    expect(classifyDisk('Samsung SSD 870 EVO 1TB', 'Fixed hard disk media', 'IDE')).toBe('SSD');
  });

  it('uses the media type when the model is not conclusive', () => {
    expect(classifyDisk('ST2000DM008', 'Solid State Drive', 'IDE')).toBe('SSD');
    expect(classifyDisk('WDC WD20EZRZ-00Z5HB0', 'Fixed hard disk media', 'IDE')).toBe('HDD');
  });

  it('falls back to the interface type', () => {
    expect(classifyDisk('Virtual Disk', '', 'SCSI')).toBe('SSD');
    expect(classifyDisk('Generic Flash Disk', '', 'USB')).toBe('HDD');
  });
});

describe('parseDiskNumber', () => {
  it('reads the disk index from a partition id', () => {
    expect(parseDiskNumber('Disk #1, Partition #0')).toBe(1);
    expect(parseDiskNumber('')).toBeNull();
  });
});

describe('toPhysicalDrives', () => {
  it('labels drives in order and converts sizes to GB', () => {
    const drives = toPhysicalDrives([
      { model: 'Samsung SSD 990 PRO 2TB', sizeBytes: 2 * 1024 ** 4, mediaType: 'Fixed hard disk media', interfaceType: 'SCSI' },
      { model: '', sizeBytes: 500 * 1024 ** 3, mediaType: '', interfaceType: 'IDE' }
    ]);

    expect(drives).toEqual([
      { label: 'Storage 1', name: 'Samsung SSD 990 PRO 2TB', totalGb: 2048, type: 'NVMe SSD' },
      { label: 'Storage 2', name: 'Unknown Disk', totalGb: 500, type: 'HDD' }
    ]);
  });
});

describe('findBootDisk', () => {
  const disks = [
    { Index: 0, Model: 'WDC WD10EZEX-08WN4A0', MediaType: 'Fixed hard disk media', InterfaceType: 'IDE' },
    { Index: 1, Model: 'Samsung SSD 990 PRO 2TB', MediaType: 'Fixed hard disk media', InterfaceType: 'SCSI' }
  ];

  it('matches the partition disk number to a disk index', () => {
    expect(findBootDisk({ Partition: 'Disk #1, Partition #2', Disks: disks })).toEqual({
      storageName: 'Samsung SSD 990 PRO 2TB',
      storageType: 'NVMe SSD'
    });
  });

  it('accepts a single disk printed as a bare object', () => {
    expect(findBootDisk({ Partition: 'Disk #0, Partition #1', Disks: disks[0] })).toEqual({
      storageName: 'WDC WD10EZEX-08WN4A0',
      storageType: 'HDD'
    });
  });

  it('returns null without a partition or a matching disk', () => {
    expect(findBootDisk({ Partition: '', Disks: disks })).toBeNull();
    expect(findBootDisk({ Partition: 'Disk #5, Partition #0', Disks: disks })).toBeNull();
  });
});
