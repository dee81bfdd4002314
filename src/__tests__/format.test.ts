import {
  formatBytes,
  formatUptime,
  formatFrequency,
  formatCacheSize,
  formatUsDate,
  parseWmiDate
} from '../tools/hardware/format';

describe('formatBytes', () => {
  it('uses singular and plural byte units below 1 KiB', () => {
    expect(formatBytes(0)).toBe('0 Bytes');
    expect(formatBytes(1)).toBe('1 Byte');
    expect(formatBytes(1023)).toBe('1023 Bytes');
  });

  it('switches to binary units with one decimal', () => {
    expect(formatBytes(1536)).toBe('1.5 KiB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MiB');
    expect(formatBytes(1.5 * 1024 ** 3)).toBe('1.5 GiB');
  });

  it('clamps negative values to zero', () => {
    expect(formatBytes(-10)).toBe('0 Bytes');
  });
});

describe('formatUptime', () => {
  it('includes days when at least one day has passed', () => {
    expect(formatUptime(3 * 86400 + 4 * 3600 + 5 * 60 + 6)).toBe('3 days, 04:05:06');
  });

  it('prints only the clock below one day', () => {
    expect(formatUptime(59)).toBe('00:00:59');
    expect(formatUptime(86399)).toBe('23:59:59');
  });
});

describe('formatFrequency', () => {
  it('formats base and max clocks in GHz', () => {
    expect(formatFrequency(3800, 5400)).toBe('3.80 GHz (Max: 5.40 GHz)');
    expect(formatFrequency(3800, null)).toBe('3.80 GHz');
    expect(formatFrequency(null, 5400)).toBe('Max: 5.40 GHz');
    expect(formatFrequency(null, null)).toBe('Unknown');
  });
});

describe('formatCacheSize', () => {
  it('prints KB below 1024 and MB above', () => {
    expect(formatCacheSize(512)).toBe('512 KB');
    expect(formatCacheSize(8192)).toBe('8.0 MB');
    expect(formatCacheSize(1536)).toBe('1.5 MB');
  });
});

describe('parseWmiDate', () => {
  it('reads CIM datetime strings as local dates', () => {
    const date = parseWmiDate('20230915000000.000000+000');
    expect(date).not.toBeNull();
    expect(date && formatUsDate(date)).toBe('09/15/2023');
  });

  it('reads the /Date(ms)/ form', () => {
    expect(parseWmiDate('/Date(1694736000000)/')?.getTime()).toBe(1694736000000);
  });

  it('returns null for anything else', () => {
    expect(parseWmiDate('')).toBeNull();
    expect(parseWmiDate('yesterday')).toBeNull();
  });
});
