import { describeMotherboard } from '../tools/hardware/motherboard';

describe('describeMotherboard', () => {
  it('describes the board, BIOS and memory array', () => {
    expect(describeMotherboard({
      Product: 'ROG STRIX B650E-F GAMING WIFI',
      Manufacturer: 'ASUSTeK COMPUTER INC.',
      Version: 'Rev 1.xx',
      BiosVersion: '1813',
      BiosManufacturer: 'American Megatrends Inc.',
      BiosDate: '20230915000000.000000+000',
      SystemModel: 'System Product Name',
      MemoryDevices: 4,
      MaxCapacityKb: 201326592,
      ModulesInstalled: 2,
      CpuName: 'AMD Ryzen 7 7700X 8-Core Processor'
    })).toEqual({
      product: 'ROG STRIX B650E-F GAMING WIFI',
      manufacturer: 'ASUSTeK COMPUTER INC.',
      version: 'Rev 1.xx',
      chipset: 'AMD B650E',
      chipsetSource: 'board',
      biosVersion: '1813',
      biosManufacturer: 'American Megatrends Inc.',
      biosDate: '09/15/2023',
      systemModel: 'System Product Name',
      memorySlots: '4',
      maxMemoryCapacity: '192 GB',
      memorySlotsUsed: '2'
    });
  });

  it('estimates the chipset from the CPU for generic board names', () => {
    const info = describeMotherboard({ Product: 'Default string', CpuName: '12th Gen Intel(R) Core(TM) i5-12400F' });
    expect(info.chipset).toBe('Intel 600/700 Series (Estimated)');
    expect(info.chipsetSource).toBe('cpu-estimate');
  });

  it('reports Unknown for missing fields', () => {
    const info = describeMotherboard({});
    expect(info.product).toBe('Unknown');
    expect(info.biosDate).toBe('Unknown');
    expect(info.maxMemoryCapacity).toBe('Unknown');
    expect(info.memorySlotsUsed).toBe('Unknown');
    expect(info.chipset).toBe('Unknown');
  });
});
