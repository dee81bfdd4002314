/**
 * tools/hardware/os_details.ts
 */

import { OsInfo } from '../../core/types';
import { UnknownRecord, field, numField } from '../../core/values';
import { formatUsDate, parseWmiDate } from './format';

// Windows 11 still reports "Windows 10 …" as ProductName; the build number tells them apart.
const WINDOWS_11_FIRST_BUILD = 22000;

export function normalizeEdition(productName: string, build: number | null): string {
  if (build !== null && build >= WINDOWS_11_FIRST_BUILD && productName.includes('Windows 10')) {
    return productName.replace('Windows 10', 'Windows 11');
  }
  return productName;
}

export function describeExperiencePack(version: string | null, ubr: string | null): string {
  if (version) return `Windows Feature Experience Pack ${version}`;
  if (ubr) return `Windows Feature Experience Pack 1000.26100.${ubr}.0`;
  return 'Windows Feature Experience Pack';
}

export function describeArch(arch: string): string {
  switch (arch) {
    case 'x64':
    case 'arm64':
    case 'ppc64':
    case 's390x':
    case 'riscv64':
    case 'loong64':
      return '64bit';
    case 'ia32':
    case 'arm':
    case 'x32':
      return '32bit';
    default:
      return arch || 'Unknown';
  }
}

export interface HostIdentity {
  deviceName: string;
  userName: string;
  arch: string;
}

/** Builds the OS section from the CurrentVersion registry key and Win32_OperatingSystem.InstallDate. */
export function describeWindowsOs(rec: UnknownRecord, host: HostIdentity): OsInfo {
  const currentBuild = field(rec, 'CurrentBuild');
  const ubr = field(rec, 'UBR');
  const installDate = parseWmiDate(field(rec, 'InstallDate'));

  return {
    deviceName: host.deviceName,
    userName: host.userName,
    edition: normalizeEdition(field(rec, 'ProductName') || 'Unknown', numField(rec, 'CurrentBuild')),
    version: field(rec, 'DisplayVersion') || 'Unknown',
    build: currentBuild ? (ubr ? `${currentBuild}.${ubr}` : currentBuild) : 'Unknown',
    installDate: installDate ? formatUsDate(installDate) : 'Unknown',
    experience: describeExperiencePack(field(rec, 'ExperiencePack') || null, ubr || null),
    arch: describeArch(host.arch)
  };
}
