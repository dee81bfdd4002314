/**
 * tools/hardware/collector.ts
 *
 * Gathers every system info section. Static hardware (processor identity,
 * RAM modules, boot disk, monitors, motherboard, OS) is read once and kept
 * until clear(); GPU readings are kept for gpuCacheTtlMs; usage figures are
 * read fresh on every call.
 *
 * WMI queries only run on Windows. Elsewhere each section is built from the
 * os module, with "Unknown" where it has nothing to offer.
 */

import * as os from 'os';
import { promises as fs } from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import {
  CpuInfo, DiskInfo, GpuInfo, MemoryInfo, MonitorInfo, MotherboardInfo, OsInfo,
  RamDetails, RamModuleRecord, StorageOverview, SystemSnapshot, UptimeInfo
} from '../../core/types';
import { SectionCache } from '../../core/cache';
import { errorMessage } from '../../core/errors';
import { scopedLogger } from '../../core/logger';
import { ps, psObject, psRows, run } from '../../core/powershell';
import { UnknownRecord, field, numField } from '../../core/values';
import { CpuSample, CpuStaticInfo, describeCpu, sampleCpuTimes, usageBetween } from './cpu';
import { bytesToGb, formatGhz, formatUptime, round1 } from './format';
import { NVIDIA_SMI_QUERY, fromVideoControllers, parseNvidiaSmi, toGpuInfo } from './gpu';
import { MONITOR_MARKERS, combineMonitors, parseMonitorOutput } from './monitors';
import { describeMotherboard } from './motherboard';
import { describeArch, describeWindowsOs } from './os_details';
import { describeRamModules } from './ram';
import { BootDisk, DiskDriveRow, findBootDisk, toPhysicalDrives } from './storage';

const log = scopedLogger('tools/system_info');

const TOOL = 'system_info';
const STATIC = Infinity;

// ---------------------------------------------------------------------------
// PowerShell queries
// ---------------------------------------------------------------------------

const CPU_SCRIPT = `
  $cpu = Get-CimInstance -ClassName Win32_Processor | Select-Object -First 1;
  $reg = Get-ItemProperty 'HKLM:\\HARDWARE\\DESCRIPTION\\System\\CentralProcessor\\0' -ErrorAction SilentlyContinue;
  $cache = @(Get-CimInstance -ClassName Win32_CacheMemory | ForEach-Object {
    [PSCustomObject]@{ Level = $_.Level; MaxCacheSize = $_.MaxCacheSize }
  });
  [PSCustomObject]@{
    Name                      = $cpu.Name;
    ProcessorNameString       = $reg.ProcessorNameString;
    NumberOfCores             = $cpu.NumberOfCores;
    NumberOfLogicalProcessors = $cpu.NumberOfLogicalProcessors;
    MaxClockSpeed             = $cpu.MaxClockSpeed;
    SocketDesignation         = $cpu.SocketDesignation;
    Cache                     = $cache
  } | ConvertTo-Json -Depth 3;
`;

const RAM_SCRIPT = `
  @(Get-CimInstance -ClassName Win32_PhysicalMemory |
    Select-Object Manufacturer, PartNumber, Speed, MemoryType, SMBIOSMemoryType, Capacity, DeviceLocator) |
    ConvertTo-Json -Depth 2;
`;

const DISK_DRIVES_SCRIPT = `
  @(Get-CimInstance -ClassName Win32_DiskDrive | Sort-Object Index | ForEach-Object {
    [PSCustomObject]@{ Index = $_.Index; Model = $_.Model; Size = $_.Size; MediaType = $_.MediaType; InterfaceType = $_.InterfaceType }
  }) | ConvertTo-Json -Depth 2;
`;

function bootDiskScript(drive: string): string {
  return `
  $link = Get-CimInstance -ClassName Win32_LogicalDiskToPartition |
    Where-Object { $_.Dependent.DeviceID -eq '${drive}' } | Select-Object -First 1;
  $disks = @(Get-CimInstance -ClassName Win32_DiskDrive | ForEach-Object {
    [PSCustomObject]@{ Index = $_.Index; Model = $_.Model; MediaType = $_.MediaType; InterfaceType = $_.InterfaceType }
  });
  [PSCustomObject]@{
    Partition = if ($link) { $link.Antecedent.DeviceID } else { '' };
    Disks     = $disks
  } | ConvertTo-Json -Depth 3;
`;
}

const VIDEO_CONTROLLER_SCRIPT = `
  @(Get-CimInstance -ClassName Win32_VideoController | Select-Object Name, AdapterRAM) | ConvertTo-Json -Depth 2;
`;

const MONITOR_SCRIPT = `
  Add-Type -AssemblyName System.Windows.Forms;
  function Decode($codes) { ($codes | Where-Object { $_ -ne 0 } | ForEach-Object { [char]$_ }) -join '' }
  Write-Output '${MONITOR_MARKERS.details}';
  Get-CimInstance -Namespace root/wmi -ClassName WmiMonitorID -ErrorAction SilentlyContinue | ForEach-Object {
    Write-Output "$(Decode $_.ManufacturerName)|$(Decode $_.ProductCodeID)|$(Decode $_.UserFriendlyName)"
  };
  Write-Output '${MONITOR_MARKERS.screens}';
  [System.Windows.Forms.Screen]::AllScreens | ForEach-Object {
    $kind = if ($_.Primary) { 'Primary' } else { 'Secondary' };
    Write-Output "$($_.Bounds.Width)x$($_.Bounds.Height)|$kind"
  };
  Write-Output '${MONITOR_MARKERS.refresh}';
  Get-CimInstance -ClassName Win32_VideoController | Where-Object { $_.CurrentRefreshRate -ne $null } |
    ForEach-Object { Write-Output $_.CurrentRefreshRate };
`;

const MOTHERBOARD_SCRIPT = `
  $mb   = Get-CimInstance -ClassName Win32_BaseBoard | Select-Object -First 1;
  $bios = Get-CimInstance -ClassName Win32_BIOS | Select-Object -First 1;
  $cs   = Get-CimInstance -ClassName Win32_ComputerSystem;
  $arr  = Get-CimInstance -ClassName Win32_PhysicalMemoryArray | Select-Object -First 1;
  $mods = @(Get-CimInstance -ClassName Win32_PhysicalMemory);
  $cpu  = Get-CimInstance -ClassName Win32_Processor | Select-Object -First 1;
  [PSCustomObject]@{
    Product          = $mb.Product;
    Manufacturer     = $mb.Manufacturer;
    Version          = $mb.Version;
    BiosVersion      = $bios.SMBIOSBIOSVersion;
    BiosManufacturer = $bios.Manufacturer;
    BiosDate         = if ($bios.ReleaseDate) { $bios.ReleaseDate.ToString('yyyyMMdd') } else { '' };
    SystemModel      = $cs.Model;
    MemoryDevices    = $arr.MemoryDevices;
    MaxCapacityKb    = $arr.MaxCapacity;
    ModulesInstalled = $mods.Count;
    CpuName          = $cpu.Name
  } | ConvertTo-Json -Depth 2;
`;

const OS_SCRIPT = `
  $cv   = Get-ItemProperty 'HKLM:\\SOFTWARE\\Microsoft\\Windows NT\\CurrentVersion';
  $os   = Get-CimInstance -ClassName Win32_OperatingSystem;
  $pack = Get-AppxPackage -Name 'MicrosoftWindows.Client.WebExperience' -ErrorAction SilentlyContinue |
    Select-Object -First 1 -ExpandProperty Version;
  [PSCustomObject]@{
    ProductName    = $cv.ProductName;
    DisplayVersion = $cv.DisplayVersion;
    CurrentBuild   = $cv.CurrentBuild;
    UBR            = $cv.UBR;
    InstallDate    = if ($os.InstallDate) { $os.InstallDate.ToString('yyyyMMdd') } else { '' };
    ExperiencePack = "$pack"
  } | ConvertTo-Json -Depth 2;
`;

// ---------------------------------------------------------------------------
// Collector
// ---------------------------------------------------------------------------

/** Value type stored under each cache key. */
type SectionMap = {
  cpu: CpuStaticInfo;
  ram: RamDetails;
  bootDisk: BootDisk;
  gpu: GpuInfo;
  monitors: MonitorInfo;
  motherboard: MotherboardInfo;
  os: OsInfo;
};

export interface CollectorOptions {
  platform?: NodeJS.Platform;
  gpuCacheTtlMs?: number;
  /** Interval between the two os.cpus() samples of the first usage reading. */
  sampleDelayMs?: number;
  now?: () => number;
}

function toRamRecord(row: UnknownRecord): RamModuleRecord {
  return {
    Manufacturer: field(row, 'Manufacturer'),
    PartNumber: field(row, 'PartNumber'),
    Speed: numField(row, 'Speed'),
    MemoryType: numField(row, 'MemoryType'),
    SMBIOSMemoryType: numField(row, 'SMBIOSMemoryType'),
    Capacity: numField(row, 'Capacity'),
    DeviceLocator: field(row, 'DeviceLocator')
  };
}

function toDiskRow(row: UnknownRecord): DiskDriveRow {
  return {
    model: field(row, 'Model'),
    sizeBytes: numField(row, 'Size') ?? 0,
    mediaType: field(row, 'MediaType'),
    interfaceType: field(row, 'InterfaceType')
  };
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch (e) {
    log.debug({ err: errorMessage(e) }, 'os.userInfo() unavailable, using environment');
    return process.env.USERNAME ?? process.env.USER ?? 'Unknown';
  }
}

export class SystemInfoCollector {
  private readonly cache: SectionCache<SectionMap>;
  private readonly platform: NodeJS.Platform;
  private readonly gpuCacheTtlMs: number;
  private readonly sampleDelayMs: number;
  private lastCpuSample: CpuSample | null = null;

  constructor(options: CollectorOptions = {}) {
    this.platform = options.platform ?? process.platform;
    this.gpuCacheTtlMs = options.gpuCacheTtlMs ?? 10000;
    this.sampleDelayMs = options.sampleDelayMs ?? 100;
    this.cache = new SectionCache<SectionMap>(options.now);
  }

  private get windows(): boolean {
    return this.platform === 'win32';
  }

  /** Drops every cached section; returns the keys that were cached. */
  clear(): string[] {
    const keys = this.cache.keys();
    this.cache.clear();
    log.debug({ keys }, 'System info cache cleared');
    return keys;
  }

  cachedSections(): string[] {
    return this.cache.keys();
  }

  systemDrive(): string {
    const drive = process.env.SystemDrive ?? 'C:';
    return /^[A-Za-z]:$/.test(drive) ? drive.toUpperCase() : 'C:';
  }

  // -------------------------------------------------------------------------

  async uptime(): Promise<UptimeInfo> {
    const seconds = Math.floor(os.uptime());
    return { seconds, display: formatUptime(seconds) };
  }

  async cpu(): Promise<CpuInfo> {
    const info = await this.cache.get('cpu', STATIC, async () => {
      let rec: UnknownRecord | null = null;
      if (this.windows) {
        try {
          rec = psObject(TOOL, CPU_SCRIPT, 15000);
        } catch (e) {
          log.warn({ err: errorMessage(e) }, 'Win32_Processor query failed, using os.cpus()');
        }
      }
      const cores = os.cpus();
      return describeCpu(rec, {
        model: cores[0]?.model ?? '',
        logicalCount: cores.length,
        speedMhz: cores[0]?.speed ?? 0
      });
    });

    const speed = os.cpus()[0]?.speed ?? 0;
    return {
      ...info,
      usagePct: await this.cpuUsage(),
      currentSpeed: speed > 0 ? formatGhz(speed) : 'Unknown'
    };
  }

  private async cpuUsage(): Promise<number> {
    let prev = this.lastCpuSample;
    if (!prev) {
      prev = sampleCpuTimes(os.cpus());
      await sleep(this.sampleDelayMs);
    }
    const next = sampleCpuTimes(os.cpus());
    this.lastCpuSample = next;
    return usageBetween(prev, next);
  }

  async memory(): Promise<MemoryInfo> {
    const ram = await this.cache.get('ram', STATIC, async () => {
      if (!this.windows) return describeRamModules([]);
      try {
        return describeRamModules(psRows(TOOL, RAM_SCRIPT).map(toRamRecord));
      } catch (e) {
        log.warn({ err: errorMessage(e) }, 'Win32_PhysicalMemory query failed');
        return describeRamModules([]);
      }
    });

    const total = os.totalmem();
    const available = os.freemem();
    const used = total - available;
    return {
      ...ram,
      totalGb: round1(bytesToGb(total)),
      usedGb: round1(bytesToGb(used)),
      availableGb: round1(bytesToGb(available)),
      percent: total > 0 ? round1((used / total) * 100) : 0
    };
  }

  async disk(): Promise<DiskInfo> {
    const drive = this.windows ? this.systemDrive() : '/';
    const stats = await fs.statfs(this.windows ? `${drive}\\` : drive);
    const total = stats.blocks * stats.bsize;
    const free = stats.bavail * stats.bsize;
    const used = total - free;

    const device = await this.cache.get('bootDisk', STATIC, async () => this.bootDisk(drive));

    return {
      drive,
      totalGb: round1(bytesToGb(total)),
      usedGb: round1(bytesToGb(used)),
      freeGb: round1(bytesToGb(free)),
      usagePct: total > 0 ? round1((used / total) * 100) : 0,
      ...device
    };
  }

  private async bootDisk(drive: string): Promise<BootDisk> {
    const unknown: BootDisk = { storageName: 'Unknown', storageType: 'Unknown' };
    if (!this.windows) return unknown;

    try {
      const rec = psObject(TOOL, bootDiskScript(drive), 15000);
      const found = findBootDisk(rec);
      if (found) return found;
      log.warn({ drive, partition: field(rec, 'Partition') }, 'No physical disk matched the system drive');
    } catch (e) {
      log.warn({ err: errorMessage(e), drive }, 'Boot disk lookup failed');
    }
    return unknown;
  }

  async storage(): Promise<StorageOverview> {
    if (!this.windows) return { drives: [], totalStorageGb: 0 };

    const drives = toPhysicalDrives(psRows(TOOL, DISK_DRIVES_SCRIPT, 15000).map(toDiskRow));
    const total = drives.reduce((sum, d) => sum + d.totalGb, 0);
    return {
      drives: drives.map(d => ({ ...d, totalGb: round1(d.totalGb) })),
      totalStorageGb: round1(total)
    };
  }

  async gpu(): Promise<GpuInfo> {
    return this.cache.get('gpu', this.gpuCacheTtlMs, async () => {
      try {
        const devices = parseNvidiaSmi(run(TOOL, NVIDIA_SMI_QUERY));
        if (devices.length > 0) return toGpuInfo(devices);
      } catch (e) {
        log.debug({ err: errorMessage(e) }, 'nvidia-smi unavailable');
      }

      if (this.windows) {
        try {
          return toGpuInfo(fromVideoControllers(psRows(TOOL, VIDEO_CONTROLLER_SCRIPT)));
        } catch (e) {
          log.warn({ err: errorMessage(e) }, 'Win32_VideoController query failed');
        }
      }
      return toGpuInfo([]);
    });
  }

  async monitors(): Promise<MonitorInfo> {
    return this.cache.get('monitors', STATIC, async () => {
      if (!this.windows) return combineMonitors({ identities: [], screens: [], refreshRates: [] });
      return combineMonitors(parseMonitorOutput(ps(TOOL, MONITOR_SCRIPT, 15000)));
    });
  }

  async motherboard(): Promise<MotherboardInfo> {
    return this.cache.get('motherboard', STATIC, async () => {
      if (!this.windows) return describeMotherboard({ CpuName: os.cpus()[0]?.model ?? '' });
      return describeMotherboard(psObject(TOOL, MOTHERBOARD_SCRIPT, 15000));
    });
  }

  async os(): Promise<OsInfo> {
    return this.cache.get('os', STATIC, async () => {
      const host = { deviceName: os.hostname(), userName: currentUser(), arch: process.arch };
      if (this.windows) {
        return describeWindowsOs(psObject(TOOL, OS_SCRIPT, 15000), host);
      }
      return {
        deviceName: host.deviceName,
        userName: host.userName,
        edition: os.type(),
        version: os.release(),
        build: 'Unknown',
        installDate: 'Unknown',
        experience: 'Unknown',
        arch: describeArch(host.arch)
      };
    });
  }

  /** Loads every section; one that throws is logged and left null. */
  async snapshot(): Promise<SystemSnapshot> {
    const [uptime, cpu, memory, disk, storage, gpu, monitors, motherboard, osInfo] = await Promise.allSettled([
      this.uptime(), this.cpu(), this.memory(), this.disk(), this.storage(),
      this.gpu(), this.monitors(), this.motherboard(), this.os()
    ]);

    const settle = <T>(section: string, result: PromiseSettledResult<T>): T | null => {
      if (result.status === 'fulfilled') return result.value;
      log.warn({ section, err: errorMessage(result.reason) }, 'Section failed to load');
      return null;
    };

    return {
      uptime: settle('uptime', uptime),
      cpu: settle('cpu', cpu),
      memory: settle('memory', memory),
      disk: settle('disk', disk),
      storage: settle('storage', storage),
      gpu: settle('gpu', gpu),
      monitors: settle('monitors', monitors),
      motherboard: settle('motherboard', motherboard),
      os: settle('os', osInfo)
    };
  }
}
