/**
 * tools/system_info.ts
 *
 * Read-only system information queries. Nothing here modifies state.
 * Safe to call frequently for monitoring or decision-making: static hardware
 * data is cached by the collector after its first load.
 *
 * Also registers the refresh_system_info hook, which cleanup TSDs use to
 * drop the cache once they have changed disk or memory usage.
 */

import { ToolModule, ToolResult } from '../core/types';
import { registry } from '../core/registry';
import { registerHook } from '../core/hooks';
import { ExecutionError, UnsupportedPlatformError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { ps } from '../core/powershell';
import { optionalBoolean } from '../core/values';
import { SystemInfoCollector } from './hardware/collector';
import { formatSystemReport } from './hardware/report';

const log = scopedLogger('tools/system_info');

let collector: SystemInfoCollector | null = null;

function getCollector(): SystemInfoCollector {
  if (!collector) {
    const gpuCacheTtlMs = registry.isInitialized() ? registry.sessionConfig.gpuCacheTtlMs : undefined;
    collector = new SystemInfoCollector({ gpuCacheTtlMs });
  }
  return collector;
}

/** Replaces the collector used by every system.* tool. */
export function setCollector(next: SystemInfoCollector | null): void {
  collector = next;
}

function ok(data: unknown): ToolResult {
  return { success: true, data, durationMs: 0 };
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function copyToClipboard(text: string): void {
  if (process.platform !== 'win32') {
    throw new UnsupportedPlatformError('system.report', process.platform);
  }
  // Passed as Base64 so the report text never needs escaping inside the script
  const encoded = Buffer.from(text, 'utf-8').toString('base64');
  ps('system_info', `
    $text = [System.Text.Encoding]::UTF8.GetString([System.Convert]::FromBase64String('${encoded}'));
    Set-Clipboard -Value $text;
  `);
}

async function handleReport(args: Record<string, unknown>): Promise<ToolResult> {
  const copy = optionalBoolean('system.report', args, 'copyToClipboard') ?? false;
  const snapshot = await getCollector().snapshot();
  const report = formatSystemReport(snapshot);

  if (copy) {
    copyToClipboard(report);
    log.info({ chars: report.length }, 'System report copied to clipboard');
  }

  return ok({ report, copied: copy });
}

async function handleCacheClear(): Promise<ToolResult> {
  const cleared = getCollector().clear();
  return ok({ cleared, count: cleared.length });
}

// ---------------------------------------------------------------------------
// Hook
// ---------------------------------------------------------------------------

registerHook('refresh_system_info', {
  post: async (ctx) => {
    if (ctx.result.success && collector) {
      const cleared = collector.clear();
      log.debug({ toolName: ctx.toolName, cleared }, 'System info cache refreshed after tool run');
    }
    return ctx.result;
  }
});

// ---------------------------------------------------------------------------
// Module definition + registration
// ---------------------------------------------------------------------------

const noArgs = { type: 'object' as const, properties: {}, required: [], additionalProperties: false };

const systemInfo: ToolModule = {
  name: 'system_info',

  tools: [
    {
      name: 'system.uptime',
      description: 'Get the time since the last boot, in seconds and as "D days, HH:MM:SS".',
      parameters: noArgs
    },
    {
      name: 'system.cpu',
      description: 'Get processor model, core/thread counts, base and max frequency, L1/L2/L3 cache, socket, live usage percentage and current clock speed.',
      parameters: noArgs
    },
    {
      name: 'system.memory',
      description: 'Get RAM usage (total, used, available in GB and percent) plus installed module name, type, speed and slot count.',
      parameters: noArgs
    },
    {
      name: 'system.disk',
      description: 'Get usage of the system drive (total, used, free in GB and percent) and the model and type (NVMe SSD, SSD, HDD) of the physical disk behind it.',
      parameters: noArgs
    },
    {
      name: 'system.storage',
      description: 'List every physical disk with its model, size in GB and type, plus the combined capacity.',
      parameters: noArgs
    },
    {
      name: 'system.gpu',
      description: 'Get graphics adapters. NVIDIA cards include live usage, memory and temperature; others include name and adapter memory.',
      parameters: noArgs
    },
    {
      name: 'system.monitors',
      description: 'List connected monitors with manufacturer, model, resolution, refresh rate and which one is primary.',
      parameters: noArgs
    },
    {
      name: 'system.motherboard',
      description: 'Get motherboard product, manufacturer, chipset (detected from the board name or estimated from the CPU), BIOS details and memory slot information.',
      parameters: noArgs
    },
    {
      name: 'system.os',
      description: 'Get device name, user, Windows edition, version, build, install date, experience pack and architecture.',
      parameters: noArgs
    },
    {
      name: 'system.report',
      description: 'Build a plain-text report of every section above. Optionally copy it to the Windows clipboard.',
      parameters: {
        type: 'object',
        properties: {
          copyToClipboard: { type: 'boolean', description: 'Also place the report on the clipboard (Windows only)', default: false }
        },
        additionalProperties: false
      }
    },
    {
      name: 'system.cache.clear',
      description: 'Drop all cached hardware information so the next query reads it again.',
      parameters: noArgs
    }
  ],

  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    log.debug({ toolName }, 'Executing');
    const c = getCollector();

    switch (toolName) {
      case 'system.uptime':      return ok(await c.uptime());
      case 'system.cpu':         return ok(await c.cpu());
      case 'system.memory':      return ok(await c.memory());
      case 'system.disk':        return ok(await c.disk());
      case 'system.storage':     return ok(await c.storage());
      case 'system.gpu':         return ok(await c.gpu());
      case 'system.monitors':    return ok(await c.monitors());
      case 'system.motherboard': return ok(await c.motherboard());
      case 'system.os':          return ok(await c.os());
      case 'system.report':      return handleReport(args);
      case 'system.cache.clear': return handleCacheClear();
      default:
        throw new ExecutionError('system_info', `Unknown tool: ${toolName}`);
    }
  }
};

registry.register(systemInfo);
export default systemInfo;
