import { execSync } from 'child_process';
import * as os from 'os';
import * as path from 'path';
import { registry } from '../core/registry';
import { TsdLoader } from '../core/tsd/loader';
import { UnknownToolError, ValidationError } from '../core/errors';
import { SystemInfoCollector } from '../tools/hardware/collector';
import { setCollector } from '../tools/system_info';

jest.mock('child_process');

const mockExecSync = jest.mocked(execSync);

const tsdLoader = new TsdLoader(path.join(os.tmpdir(), 'pc-toolkit-no-tsds'));
registry.init({ transportMode: 'stdio', gpuCacheTtlMs: 10000 }, tsdLoader);

function call(tool: string, args: Record<string, unknown> = {}) {
  return registry.invoke({ tool, args, meta: { source: 'internal', timestamp: Date.now() } });
}

describe('system_info tools', () => {
  let collector: SystemInfoCollector;

  beforeEach(() => {
    mockExecSync.mockReset();
    mockExecSync.mockImplementation(() => {
      throw new Error('command not found');
    });
    collector = new SystemInfoCollector({ platform: 'linux', sampleDelayMs: 0 });
    setCollector(collector);
  });

  it('registers every system query', () => {
    expect(registry.listToolNames().filter(name => name.startsWith('system.')).sort()).toEqual([
      'system.cache.clear',
      'system.cpu',
      'system.disk',
      'system.gpu',
      'system.memory',
      'system.monitors',
      'system.motherboard',
      'system.os',
      'system.report',
      'system.storage',
      'system.uptime'
    ]);
  });

  it('returns section data in the result envelope', async () => {
    const result = await call('system.monitors');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({ monitors: ['No monitors detected'], details: [], count: 0 });
  });

  it('builds the text report without copying it', async () => {
    const result = await call('system.report');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      report: expect.stringContaining('Operating System Information:'),
      copied: false
    });
  });

  it('reports clipboard copy as unsupported off Windows', async () => {
    const result = await call('system.report', { copyToClipboard: true });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('UNSUPPORTED_PLATFORM');
  });

  it('rejects arguments the tool schema does not allow', async () => {
    await expect(call('system.report', { copyToClipboard: 'yes' })).rejects.toThrow(ValidationError);
    await expect(call('system.cpu', { verbose: true })).rejects.toThrow(ValidationError);
  });

  it('rejects unknown tools', async () => {
    await expect(call('system.battery')).rejects.toThrow(UnknownToolError);
    expect(() => registry.resolve('system.battery')).toThrow(UnknownToolError);
  });

  it('resolves a tool name to its module and schema', () => {
    const { module, schema } = registry.resolve('system.report');
    expect(module.name).toBe('system_info');
    expect(schema.name).toBe('system.report');
  });

  it('lists the sections dropped by cache.clear', async () => {
    await call('system.monitors');
    await call('system.os');

    const result = await call('system.cache.clear');
    expect(result.data).toEqual({ cleared: ['monitors', 'os'], count: 2 });
    expect(collector.cachedSections()).toEqual([]);
  });

  it('clears the cache after a tool whose TSD names refresh_system_info', async () => {
    tsdLoader.set({ toolName: 'system.uptime', postHook: 'refresh_system_info' });
    await call('system.monitors');
    expect(collector.cachedSections()).toEqual(['monitors']);

    const result = await call('system.uptime');

    expect(result.success).toBe(true);
    expect(collector.cachedSections()).toEqual([]);
  });

  it('creates a collector on demand', async () => {
    setCollector(null);
    const result = await call('system.cache.clear');
    expect(result.data).toEqual({ cleared: [], count: 0 });
  });
});
