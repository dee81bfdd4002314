import { describeArch, describeExperiencePack, describeWindowsOs, normalizeEdition } from '../tools/hardware/os_details';

describe('normalizeEdition', () => {
  it('renames Windows 10 to Windows 11 from build 22000', () => {
    expect(normalizeEdition('Windows 10 Pro', 22631)).toBe('Windows 11 Pro');
    expect(normalizeEdition('Windows 10 Pro', 19045)).toBe('Windows 10 Pro');
    expect(normalizeEdition('Windows 10 Home', null)).toBe('Windows 10 Home');
  });
});

describe('describeExperiencePack', () => {
  it('prefers the installed pack version', () => {
    expect(describeExperiencePack('1000.22700.1047.0', '4317')).toBe('Windows Feature Experience Pack 1000.22700.1047.0');
    expect(describeExperiencePack(null, '4317')).toBe('Windows Feature Experience Pack 1000.26100.4317.0');
    expect(describeExperiencePack(null, null)).toBe('Windows Feature Experience Pack');
  });
});

describe('describeArch', () => {
  it('maps Node architectures to bitness', () => {
    expect(describeArch('x64')).toBe('64bit');
    expect(describeArch('arm64')).toBe('64bit');
    expect(describeArch('ia32')).toBe('32bit');
    expect(describeArch('mips')).toBe('mips');
    expect(describeArch('')).toBe('Unknown');
  });
});

describe('describeWindowsOs', () => {
  it('builds the OS section from the registry record', () => {
    expect(describeWindowsOs({
      ProductName: 'Windows 10 Pro',
      CurrentBuild: '22631',
      UBR: 4317,
      DisplayVersion: '23H2',
      InstallDate: '20240102093000.000000+060'
    }, { deviceName: 'DESKTOP-TEST', userName: 'tester', arch: 'x64' })).toEqual({
      deviceName: 'DESKTOP-TEST',
      userName: 'tester',
      edition: 'Windows 11 Pro',
      version: '23H2',
      build: '22631.4317',
      installDate: '01/02/2024',
      experience: 'Windows Feature Experience Pack 1000.26100.4317.0',
      arch: '64bit'
    });
  });

  it('reports Unknown for an empty record', () => {
    const info = describeWindowsOs({}, { deviceName: 'host', userName: 'user', arch: 'x64' });
    expect(info.edition).toBe('Unknown');
    expect(info.build).toBe('Unknown');
    expect(info.installDate).toBe('Unknown');
    expect(info.experience).toBe('Windows Feature Experience Pack');
  });
});
