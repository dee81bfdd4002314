/**
 * tools/hardware/chipset.ts
 *
 * Chipset detection. Win32_BaseBoard has no chipset field, so the chipset
 * is read out of the board's product name ("ROG STRIX B650E-F GAMING WIFI").
 * When the product name carries no known token, the CPU generation gives an
 * estimate of the platform's chipset series.
 */

import { ChipsetDetection } from '../../core/types';

interface ChipsetToken {
  token: string;
  vendor: 'AMD' | 'Intel';
}

const AMD_TOKENS = ['X870E', 'X870', 'B850', 'X670E', 'X670', 'B650E', 'B650', 'A620', 'X570', 'B550', 'A520', 'X470', 'B450'];
const INTEL_TOKENS = ['Z890', 'B860', 'Z790', 'B760', 'H770', 'Z690', 'B660', 'H670', 'H610', 'Z590', 'B560'];

// Longest first so "X670E" wins over "X670".
const CHIPSET_TOKENS: ChipsetToken[] = [
  ...AMD_TOKENS.map(token => ({ token, vendor: 'AMD' as const })),
  ...INTEL_TOKENS.map(token => ({ token, vendor: 'Intel' as const }))
].sort((a, b) => b.token.length - a.token.length);

// Ryzen model thousands digit → AM4/AM5 chipset series.
const RYZEN_SERIES: Record<string, string> = {
  '9': 'AMD 800 Series (Estimated)',
  '8': 'AMD 600 Series (Estimated)',
  '7': 'AMD 600 Series (Estimated)',
  '5': 'AMD 500 Series (Estimated)',
  '3': 'AMD 400 Series (Estimated)'
};

function intelSeries(generation: number): string | null {
  if (generation >= 12 && generation <= 14) return 'Intel 600/700 Series (Estimated)';
  if (generation === 10 || generation === 11) return 'Intel 400/500 Series (Estimated)';
  return null;
}

/** Matches a token as its own word, allowing a short form-factor suffix (B650M, Z790I). */
function productHasToken(product: string, token: string): boolean {
  const re = new RegExp(`(?:^|[^A-Z0-9])${token}[A-Z]{0,2}(?=[^A-Z0-9]|$)`);
  return re.test(product);
}

export function chipsetFromBoard(boardProduct: string): string | null {
  const product = boardProduct.toUpperCase();
  for (const { token, vendor } of CHIPSET_TOKENS) {
    if (productHasToken(product, token)) return `${vendor} ${token}`;
  }
  return null;
}

export function estimateChipsetFromCpu(cpuName: string): string | null {
  const cpu = cpuName.toUpperCase();

  if (cpu.includes('AMD') || cpu.includes('RYZEN')) {
    if (cpu.includes('THREADRIPPER')) return 'AMD (Unknown Series)';
    const ryzen = /RYZEN\s+(?:AI\s+)?\d+\s+(?:PRO\s+)?(\d)\d{3}/.exec(cpu);
    return (ryzen && RYZEN_SERIES[ryzen[1]]) || 'AMD (Unknown Series)';
  }

  if (cpu.includes('INTEL')) {
    if (/ULTRA\s+\d\s+2\d{2}/.test(cpu)) return 'Intel 800 Series (Estimated)';
    const core = /I[3579]-(\d{4,5})/.exec(cpu);
    if (core) {
      const digits = core[1];
      const generation = digits.length === 5 ? Number(digits.slice(0, 2)) : Number(digits[0]);
      return intelSeries(generation) ?? 'Intel (Unknown Series)';
    }
    return 'Intel (Unknown Series)';
  }

  return null;
}

export function detectChipset(boardProduct: string, cpuName: string): ChipsetDetection {
  const fromBoard = chipsetFromBoard(boardProduct);
  if (fromBoard) return { chipset: fromBoard, source: 'board' };

  const estimate = estimateChipsetFromCpu(cpuName);
  if (estimate) return { chipset: estimate, source: 'cpu-estimate' };

  return { chipset: 'Unknown', source: 'unknown' };
}
