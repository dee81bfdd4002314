import { chipsetFromBoard, detectChipset, estimateChipsetFromCpu } from '../tools/hardware/chipset';

describe('chipsetFromBoard', () => {
  it('prefers the longer token', () => {
    expect(chipsetFromBoard('ROG STRIX B650E-F GAMING WIFI')).toBe('AMD B650E');
    expect(chipsetFromBoard('X670E AORUS MASTER')).toBe('AMD X670E');
  });

  it('accepts a form-factor suffix', () => {
    expect(chipsetFromBoard('MAG B650M MORTAR WIFI')).toBe('AMD B650');
    expect(chipsetFromBoard('ROG STRIX Z790-I GAMING WIFI')).toBe('Intel Z790');
  });

  it('matches case-insensitively', () => {
    expect(chipsetFromBoard('prime b760m-a d4')).toBe('Intel B760');
  });

  it('ignores tokens embedded in longer alphanumeric words', () => {
    expect(chipsetFromBoard('XB650 BOARD')).toBeNull();
    expect(chipsetFromBoard('B6500 REV 1.0')).toBeNull();
  });

  it('returns null for boards without a chipset token', () => {
    expect(chipsetFromBoard('Default string')).toBeNull();
  });
});

describe('estimateChipsetFromCpu', () => {
  it('maps Ryzen generations to chipset series', () => {
    expect(estimateChipsetFromCpu('AMD Ryzen 7 7700X 8-Core Processor')).toBe('AMD 600 Series (Estimated)');
    expect(estimateChipsetFromCpu('AMD Ryzen 9 9950X 16-Core Processor')).toBe('AMD 800 Series (Estimated)');
    expect(estimateChipsetFromCpu('AMD Ryzen 5 5600X 6-Core Processor')).toBe('AMD 500 Series (Estimated)');
    expect(estimateChipsetFromCpu('AMD Ryzen 7 3700X 8-Core Processor')).toBe('AMD 400 Series (Estimated)');
  });

  it('reports other AMD parts as an unknown series', () => {
    expect(estimateChipsetFromCpu('AMD Ryzen Threadripper PRO 5995WX')).toBe('AMD (Unknown Series)');
    expect(estimateChipsetFromCpu('AMD FX-8350 Eight-Core Processor')).toBe('AMD (Unknown Series)');
    expect(estimateChipsetFromCpu('AMD Ryzen 7 2700X Eight-Core Processor')).toBe('AMD (Unknown Series)');
    expect(estimateChipsetFromCpu('AMD Ryzen 7 4700G with Radeon Graphics')).toBe('AMD (Unknown Series)');
  });

  it('maps Intel Core generations to chipset series', () => {
    expect(estimateChipsetFromCpu('12th Gen Intel(R) Core(TM) i7-12700K')).toBe('Intel 600/700 Series (Estimated)');
    expect(estimateChipsetFromCpu('Intel(R) Core(TM) i5-10400 CPU @ 2.90GHz')).toBe('Intel 400/500 Series (Estimated)');
    expect(estimateChipsetFromCpu('Intel(R) Core(TM) Ultra 9 285K')).toBe('Intel 800 Series (Estimated)');
  });

  it('reports other Intel parts as an unknown series', () => {
    expect(estimateChipsetFromCpu('Intel(R) Xeon(R) W-2245 CPU')).toBe('Intel (Unknown Series)');
    expect(estimateChipsetFromCpu('Intel(R) Core(TM) i7-4790K CPU')).toBe('Intel (Unknown Series)');
    expect(estimateChipsetFromCpu('Intel(R) Core(TM) i7-9700K CPU @ 3.60GHz')).toBe('Intel (Unknown Series)');
    expect(estimateChipsetFromCpu('Intel(R) Core(TM) i7-8700K CPU @ 3.70GHz')).toBe('Intel (Unknown Series)');
  });

  it('returns null for other vendors', () => {
    expect(estimateChipsetFromCpu('Apple M2')).toBeNull();
  });
});

describe('detectChipset', () => {
  it('uses the board before the CPU', () => {
    expect(detectChipset('X570 AORUS ELITE', 'AMD Ryzen 7 7700X')).toEqual({ chipset: 'AMD X570', source: 'board' });
  });

  it('falls back to a CPU estimate', () => {
    expect(detectChipset('Default string', 'AMD Ryzen 7 7800X3D 8-Core Processor'))
      .toEqual({ chipset: 'AMD 600 Series (Estimated)', source: 'cpu-estimate' });
  });

  it('reports Unknown when neither source helps', () => {
    expect(detectChipset('', 'Apple M2')).toEqual({ chipset: 'Unknown', source: 'unknown' });
  });
});
