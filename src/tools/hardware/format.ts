/**
 * tools/hardware/format.ts
 *
 * Display formatting shared by the system info and cleaner tools.
 */

const BINARY_UNITS = ['KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'];

/** Binary natural size: "0 Bytes", "1 Byte", "512 Bytes", "1.5 GiB". */
export function formatBytes(bytes: number): string {
  const n = Math.max(0, Math.round(bytes));
  if (n === 1) return '1 Byte';
  if (n < 1024) return `${n} Bytes`;

  let value = n;
  let unit = -1;
  while (value >= 1024 && unit < BINARY_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${BINARY_UNITS[unit]}`;
}

export function bytesToGb(bytes: number): number {
  return bytes / 1024 ** 3;
}

/** Rounds to one decimal place for JSON payloads. */
export function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** "3 days, 04:05:06" or "04:05:06". */
export function formatUptime(totalSeconds: number): string {
  const s = Math.max(0, Math.floor(totalSeconds));
  const days = Math.floor(s / 86400);
  const hours = Math.floor((s % 86400) / 3600);
  const minutes = Math.floor((s % 3600) / 60);
  const seconds = s % 60;
  const clock = `${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
  return days > 0 ? `${days} days, ${clock}` : clock;
}

export function formatGhz(mhz: number): string {
  return `${(mhz / 1000).toFixed(2)} GHz`;
}

export function formatFrequency(baseMhz: number | null, maxMhz: number | null): string {
  if (baseMhz && maxMhz) return `${formatGhz(baseMhz)} (Max: ${formatGhz(maxMhz)})`;
  if (baseMhz) return formatGhz(baseMhz);
  if (maxMhz) return `Max: ${formatGhz(maxMhz)}`;
  return 'Unknown';
}

/** WMI cache sizes are reported in KB. */
export function formatCacheSize(kb: number): string {
  return kb >= 1024 ? `${(kb / 1024).toFixed(1)} MB` : `${kb} KB`;
}

/** Formats a Date as MM/DD/YYYY. */
export function formatUsDate(date: Date): string {
  return `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}/${date.getFullYear()}`;
}

/**
 * WMI dates come back either as CIM datetime strings ("20230915000000.000000+000")
 * or, through ConvertTo-Json on Windows PowerShell 5, as "/Date(1694736000000)/".
 */
export function parseWmiDate(raw: string): Date | null {
  const msMatch = /\/Date\((-?\d+)\)\//.exec(raw);
  if (msMatch) return new Date(Number(msMatch[1]));

  const cimMatch = /^(\d{4})(\d{2})(\d{2})/.exec(raw);
  if (cimMatch) {
    return new Date(Number(cimMatch[1]), Number(cimMatch[2]) - 1, Number(cimMatch[3]));
  }
  return null;
}
