import { MONITOR_MARKERS, combineMonitors, formatMonitor, parseMonitorOutput } from '../tools/hardware/monitors';

const SAMPLE_OUTPUT = [
  MONITOR_MARKERS.details,
  'DEL|41111|DELL U2720Q',
  'GSM|23400|LG ULTRAGEAR',
  MONITOR_MARKERS.screens,
  '3840x2160|Primary',
  '2560x1440|Secondary',
  MONITOR_MARKERS.refresh,
  '60',
  '144',
  ''
].join('\r\n');

describe('parseMonitorOutput', () => {
  it('splits the three marker sections', () => {
    expect(parseMonitorOutput(SAMPLE_OUTPUT)).toEqual({
      identities: [
        { manufacturer: 'DEL', model: '41111', name: 'DELL U2720Q' },
        { manufacturer: 'GSM', model: '23400', name: 'LG ULTRAGEAR' }
      ],
      screens: [
        { resolution: '3840x2160', primary: true },
        { resolution: '2560x1440', primary: false }
      ],
      refreshRates: [60, 144]
    });
  });

  it('ignores lines before the first marker and malformed rows', () => {
    const parsed = parseMonitorOutput(`noise\n${MONITOR_MARKERS.details}\nonly-one-field\n${MONITOR_MARKERS.refresh}\nn/a\n`);
    expect(parsed).toEqual({ identities: [], screens: [], refreshRates: [] });
  });
});

describe('formatMonitor', () => {
  it('drops the manufacturer code when the name repeats it', () => {
    expect(formatMonitor({
      manufacturer: 'ACR', model: '1234', name: 'ACR XV272U', resolution: '2560x1440', primary: false, refreshRateHz: 170
    })).toBe('ACR1234 | XV272U | 2560x1440 @ 170Hz');
  });

  it('keeps names that only start with the manufacturer code', () => {
    expect(formatMonitor({
      manufacturer: 'DEL', model: '41111', name: 'DELL U2720Q', resolution: '3840x2160', primary: true, refreshRateHz: null
    })).toBe('DEL41111 | DELL U2720Q | 3840x2160 (Primary)');
  });
});

describe('combineMonitors', () => {
  it('pairs identities, screens and refresh rates by index', () => {
    const info = combineMonitors(parseMonitorOutput(SAMPLE_OUTPUT));

    expect(info.count).toBe(2);
    expect(info.monitors).toEqual([
      'DEL41111 | DELL U2720Q | 3840x2160 @ 60Hz (Primary)',
      'GSM23400 | LG ULTRAGEAR | 2560x1440 @ 144Hz'
    ]);
  });

  it('fills in Unknown when the sections have different lengths', () => {
    const info = combineMonitors({
      identities: [],
      screens: [{ resolution: '1920x1080', primary: true }],
      refreshRates: []
    });

    expect(info.details).toEqual([{
      manufacturer: 'Unknown',
      model: 'Unknown',
      name: 'Unknown Monitor',
      resolution: '1920x1080',
      primary: true,
      refreshRateHz: null
    }]);
    expect(info.monitors).toEqual(['UnknownUnknown | Monitor | 1920x1080 (Primary)']);
  });

  it('reports no monitors for empty output', () => {
    expect(combineMonitors(parseMonitorOutput(''))).toEqual({
      monitors: ['No monitors detected'],
      details: [],
      count: 0
    });
  });
});
