/**
 * tools/hardware/monitors.ts
 *
 * The monitor query prints three marker-delimited sections in one
 * PowerShell run (WmiMonitorID, Forms.Screen, Win32_VideoController).
 * This module parses that output and pairs the sections by index.
 */

import { MonitorDetail, MonitorInfo } from '../../core/types';

export const MONITOR_MARKERS = {
  details: 'MONITOR_DETAILS_START',
  screens: 'SCREEN_INFO_START',
  refresh: 'REFRESH_RATES_START'
} as const;

export interface MonitorIdentity {
  manufacturer: string;
  model: string;
  name: string;
}

export interface ScreenEntry {
  resolution: string;
  primary: boolean;
}

export interface ParsedMonitorOutput {
  identities: MonitorIdentity[];
  screens: ScreenEntry[];
  refreshRates: number[];
}

type Section = 'details' | 'screens' | 'refresh' | null;

export function parseMonitorOutput(output: string): ParsedMonitorOutput {
  const parsed: ParsedMonitorOutput = { identities: [], screens: [], refreshRates: [] };
  let section: Section = null;

  for (const rawLine of output.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line === MONITOR_MARKERS.details) { section = 'details'; continue; }
    if (line === MONITOR_MARKERS.screens) { section = 'screens'; continue; }
    if (line === MONITOR_MARKERS.refresh) { section = 'refresh'; continue; }

    if (section === 'details' && line.includes('|')) {
      const parts = line.split('|').map(p => p.trim());
      if (parts.length >= 3) {
        parsed.identities.push({ manufacturer: parts[0], model: parts[1], name: parts[2] });
      }
    } else if (section === 'screens' && line.includes('|')) {
      const parts = line.split('|').map(p => p.trim());
      if (parts.length >= 2) {
        parsed.screens.push({ resolution: parts[0], primary: parts[1] === 'Primary' });
      }
    } else if (section === 'refresh' && /^\d+$/.test(line)) {
      parsed.refreshRates.push(Number(line));
    }
  }

  return parsed;
}

/** Drops the manufacturer when the name repeats it as a whole word ("ACR" + "ACR XV272U"). */
function stripManufacturer(name: string, manufacturer: string): string {
  if (!manufacturer) return name;
  const escaped = manufacturer.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const stripped = name.replace(new RegExp(`(?<![A-Za-z0-9])${escaped}(?![A-Za-z0-9])`, 'gi'), '');
  return stripped.split(/\s+/).filter(Boolean).join(' ') || name;
}

/** "<manufacturer><product> | <name> | <resolution>[ @ <hz>Hz][ (Primary)]" */
export function formatMonitor(detail: MonitorDetail): string {
  const refresh = detail.refreshRateHz !== null ? ` @ ${detail.refreshRateHz}Hz` : '';
  const primary = detail.primary ? ' (Primary)' : '';
  const name = stripManufacturer(detail.name, detail.manufacturer);
  return `${detail.manufacturer}${detail.model} | ${name} | ${detail.resolution}${refresh}${primary}`;
}

export function combineMonitors(parsed: ParsedMonitorOutput): MonitorInfo {
  const count = Math.max(parsed.identities.length, parsed.screens.length);
  const details: MonitorDetail[] = [];

  for (let i = 0; i < count; i++) {
    const identity = parsed.identities[i];
    const screen = parsed.screens[i];
    details.push({
      manufacturer: identity?.manufacturer ?? 'Unknown',
      model: identity?.model ?? 'Unknown',
      name: identity?.name ?? 'Unknown Monitor',
      resolution: screen?.resolution ?? 'Unknown',
      primary: screen?.primary ?? false,
      refreshRateHz: parsed.refreshRates[i] ?? null
    });
  }

  if (details.length === 0) {
    return { monitors: ['No monitors detected'], details: [], count: 0 };
  }
  return { monitors: details.map(formatMonitor), details, count: details.length };
}
