/**
 * core/elevation.ts
 *
 * Administrator detection. On Windows `net session` only succeeds from an
 * elevated token; on POSIX hosts root is uid 0.
 */

import { execSync } from 'child_process';

export function isElevated(): boolean {
  if (process.platform === 'win32') {
    try {
      execSync('net session', { stdio: 'pipe', windowsHide: true });
      return true;
    } catch {
      return false;
    }
  }
  return typeof process.getuid === 'function' && process.getuid() === 0;
}
