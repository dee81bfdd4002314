import { formatSystemReport } from '../tools/hardware/report';
import { SystemSnapshot } from '../core/types';

function fullSnapshot(): SystemSnapshot {
  return {
    uptime: { seconds: 3600, display: '01:00:00' },
    cpu: {
      name: 'AMD Ryzen 7 7700X 8-Core Processor',
      cores: '8 cores, 16 threads',
      frequency: '4.50 GHz (Max: 5.40 GHz)',
      cacheDisplay: 'L1 - 512 KB | L2 - 8.0 MB | L3 - 32.0 MB',
      sockets: 'AM5',
      usagePct: 12.5,
      currentSpeed: '4.80 GHz'
    },
    memory: {
      totalGb: 31.2,
      usedGb: 12.4,
      availableGb: 18.8,
      percent: 39.7,
      ramName: 'Kingston KF556C40-16',
      ramSpeed: '5600 MHz',
      ramType: 'DDR5',
      ramSlots: '2 slot(s) used',
      installedBytes: 34359738368
    },
    disk: {
      drive: 'D:',
      totalGb: 931.5,
      usedGb: 400.25,
      freeGb: 531.25,
      usagePct: 42.97,
      storageName: 'Samsung SSD 990 PRO 1TB',
      storageType: 'NVMe SSD'
    },
    storage: {
      drives: [{ label: 'Storage 1', name: 'Samsung SSD 990 PRO 1TB', totalGb: 931.5, type: 'NVMe SSD' }],
      totalStorageGb: 931.5
    },
    gpu: {
      available: true,
      name: 'NVIDIA GeForce RTX 4070',
      devices: [{
        name: 'NVIDIA GeForce RTX 4070',
        usagePct: 3,
        memoryUsedGb: 1.5,
        memoryTotalGb: 12,
        temperatureC: 41.6,
        source: 'nvidia-smi'
      }]
    },
    monitors: {
      monitors: ['DEL41111 | DELL U2720Q | 3840x2160 @ 60Hz (Primary)'],
      details: [],
      count: 1
    },
    motherboard: {
      product: 'ROG STRIX B650E-F GAMING WIFI',
      manufacturer: 'ASUSTeK COMPUTER INC.',
      version: 'Rev 1.xx',
      chipset: 'AMD B650E',
      chipsetSource: 'board',
      biosVersion: '1813',
      biosManufacturer: 'American Megatrends Inc.',
      biosDate: '09/15/2023',
      systemModel: 'System Product Name',
      memorySlots: '4',
      maxMemoryCapacity: '192 GB',
      memorySlotsUsed: '2'
    },
    os: {
      deviceName: 'DESKTOP-TEST',
      userName: 'tester',
      edition: 'Windows 11 Pro',
      version: '23H2',
      build: '22631.4317',
      installDate: '01/02/2024',
      experience: 'Windows Feature Experience Pack 1000.26100.4317.0',
      arch: '64bit'
    }
  };
}

function sectionOf(report: string, title: string): string[] {
  const block = report.split('\n\n').find(b => b.startsWith(title));
  return block ? block.split('\n') : [];
}

describe('formatSystemReport', () => {
  it('prints the sections in a fixed order', () => {
    const titles = formatSystemReport(fullSnapshot()).split('\n\n').map(b => b.split('\n')[0]);
    expect(titles).toEqual([
      'Processor Information:',
      'Local Disk (D:) Information:',
      'Memory Information:',
      'Storage Information:',
      'Graphics Information:',
      'Monitor Information:',
      'Motherboard Information:',
      'Operating System Information:'
    ]);
  });

  it('formats the processor and disk sections', () => {
    const report = formatSystemReport(fullSnapshot());

    expect(sectionOf(report, 'Processor Information:')).toEqual([
      'Processor Information:',
      '----------------------',
      'Processor: AMD Ryzen 7 7700X 8-Core Processor',
      'Cores/Threads: 8 cores, 16 threads',
      'Frequency: 4.50 GHz (Max: 5.40 GHz) (Current: 4.80 GHz)',
      'Cache: L1 - 512 KB | L2 - 8.0 MB | L3 - 32.0 MB',
      'Sockets: AM5'
    ]);
    expect(sectionOf(report, 'Local Disk (D:)')).toEqual([
      'Local Disk (D:) Information:',
      '----------------------',
      'Storage Device: Samsung SSD 990 PRO 1TB',
      'Storage Type: NVMe SSD',
      'Local Disk (D:) Total: 400.3 GB / 931.5 GB',
      'Local Disk (D:) Free: 531.3 GB',
      'Local Disk (D:) Usage: 43.0%'
    ]);
  });

  it('formats storage, graphics and monitors', () => {
    const report = formatSystemReport(fullSnapshot());

    expect(sectionOf(report, 'Storage Information:').slice(2)).toEqual([
      'Total Storage Devices: 1',
      'Storage 1: Samsung SSD 990 PRO 1TB - 931.5 GB'
    ]);
    expect(sectionOf(report, 'Graphics Information:').slice(2)).toEqual([
      'GPU: NVIDIA GeForce RTX 4070',
      'GPU Memory: 1.5 GB / 12.0 GB',
      'GPU Temperature: 42C'
    ]);
    expect(sectionOf(report, 'Monitor Information:').slice(2)).toEqual([
      'Monitor Count: 1',
      'Monitor 1: DEL41111 | DELL U2720Q | 3840x2160 @ 60Hz (Primary)'
    ]);
  });

  it('prints Error for sections that failed to load', () => {
    const snapshot = { ...fullSnapshot(), cpu: null, disk: null, os: null };
    const report = formatSystemReport(snapshot);

    expect(sectionOf(report, 'Processor Information:')).toContain('Frequency: Error');
    expect(sectionOf(report, 'Local Disk (C:)')).toContain('Local Disk (C:) Usage: Error');
    expect(sectionOf(report, 'Operating System Information:')).toContain('Device Name: Error');
    expect(sectionOf(report, 'Memory Information:')).toContain('RAM Type: DDR5');
  });

  it('describes GPUs without live readings', () => {
    const noGpu = formatSystemReport({ ...fullSnapshot(), gpu: { available: false, name: 'No GPU detected', devices: [] } });
    expect(sectionOf(noGpu, 'Graphics Information:').slice(2)).toEqual([
      'GPU: No GPU detected',
      'GPU Memory: N/A',
      'GPU Temperature: N/A'
    ]);

    const wmiOnly = formatSystemReport({
      ...fullSnapshot(),
      gpu: {
        available: true,
        name: 'AMD Radeon RX 7800 XT',
        devices: [{ name: 'AMD Radeon RX 7800 XT', usagePct: null, memoryUsedGb: null, memoryTotalGb: 4, temperatureC: null, source: 'wmi' }]
      }
    });
    expect(sectionOf(wmiOnly, 'Graphics Information:').slice(3)).toEqual([
      'GPU Memory: 4.0 GB',
      'GPU Temperature: N/A'
    ]);
  });

  it('leaves the current speed out when unknown', () => {
    const base = fullSnapshot();
    const cpu = base.cpu ? { ...base.cpu, currentSpeed: 'Unknown' } : null;
    const report = formatSystemReport({ ...base, cpu });
    expect(sectionOf(report, 'Processor Information:')).toContain('Frequency: 4.50 GHz (Max: 5.40 GHz)');
  });
});
