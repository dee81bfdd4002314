import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  analyzeFolder,
  cleanFolder,
  defaultCleanupFolders,
  describeFolderReport,
  directorySize,
  isInside,
  realFolder,
  resolveCleanupFolders
} from '../tools/cleanup/temp_cleaner';
import { SandboxViolationError } from '../core/errors';

describe('defaultCleanupFolders', () => {
  it('lists the Windows temp folders without duplicates', () => {
    const folders = defaultCleanupFolders('win32', {
      TEMP: 'C:\\Users\\tester\\AppData\\Local\\Temp',
      TMP: 'c:\\users\\tester\\appdata\\local\\temp',
      SystemRoot: 'C:\\Windows',
      USERPROFILE: 'C:\\Users\\tester'
    });

    expect(folders).toEqual([
      'C:\\Users\\tester\\AppData\\Local\\Temp',
      'C:\\Windows\\Temp',
      'C:\\Windows\\Prefetch'
    ]);
  });

  it('uses the OS temp directory elsewhere', () => {
    expect(defaultCleanupFolders('linux', {})).toEqual([os.tmpdir()]);
  });
});

describe('resolveCleanupFolders', () => {
  let root: string;
  let outside: string;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'toolkit-root-')));
    outside = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'toolkit-outside-')));
    await fs.writeFile(path.join(outside, 'keep.txt'), 'keep');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
    await fs.rm(outside, { recursive: true, force: true });
  });

  it('returns the allowed folders when nothing is requested', async () => {
    expect(await resolveCleanupFolders(undefined, [root])).toEqual([root]);
    expect(await resolveCleanupFolders([], [root])).toEqual([root]);
  });

  it('accepts folders inside an allowed folder, existing or not', async () => {
    await fs.mkdir(path.join(root, 'cache'));
    const inner = path.join(root, 'cache');
    const missing = path.join(root, 'gone', 'deeper');

    expect(await resolveCleanupFolders([inner, missing], [root])).toEqual([inner, missing]);
  });

  it('rejects folders outside the allowed folders', async () => {
    await expect(resolveCleanupFolders([outside], [root])).rejects.toThrow(SandboxViolationError);
    await expect(resolveCleanupFolders([`${root}-other`], [root])).rejects.toThrow(SandboxViolationError);
    await expect(resolveCleanupFolders([path.join(root, '..', 'escape')], [root])).rejects.toThrow(SandboxViolationError);
  });

  it('rejects a symlink inside an allowed folder that points outside it', async () => {
    const link = path.join(root, 'link');
    await fs.symlink(outside, link, 'dir');

    await expect(resolveCleanupFolders([link], [root])).rejects.toThrow(SandboxViolationError);
    await expect(resolveCleanupFolders([path.join(link, 'nested')], [root])).rejects.toThrow(SandboxViolationError);
    expect(await fs.readdir(outside)).toEqual(['keep.txt']);
  });

  it('returns the real path of a symlink that stays inside', async () => {
    await fs.mkdir(path.join(root, 'real'));
    await fs.symlink(path.join(root, 'real'), path.join(root, 'alias'), 'dir');

    expect(await resolveCleanupFolders([path.join(root, 'alias')], [root])).toEqual([path.join(root, 'real')]);
  });

  it('compares against the real path of the allowed folder', async () => {
    const rootLink = path.join(outside, 'root-link');
    await fs.symlink(root, rootLink, 'dir');

    expect(await resolveCleanupFolders([root], [rootLink])).toEqual([root]);
  });

  it('treats a folder as inside itself', () => {
    expect(isInside(root, root)).toBe(true);
  });
});

describe('realFolder', () => {
  it('keeps a missing tail below the nearest existing ancestor', async () => {
    const base = await fs.realpath(os.tmpdir());
    expect(await realFolder(path.join(os.tmpdir(), 'toolkit-missing', 'a'))).toBe(path.join(base, 'toolkit-missing', 'a'));
  });
});

describe('cleaning a temp folder', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'toolkit-clean-'));
    await fs.writeFile(path.join(dir, 'a.tmp'), 'x'.repeat(10));
    await fs.mkdir(path.join(dir, 'sub'));
    await fs.writeFile(path.join(dir, 'sub', 'b.tmp'), 'y'.repeat(20));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('measures the folder without deleting anything', async () => {
    expect(await directorySize(dir)).toBe(30);
    expect(await analyzeFolder(dir)).toEqual({
      path: dir,
      exists: true,
      entries: 2,
      bytes: 30,
      reclaimable: '30 Bytes'
    });
    expect(await fs.readdir(dir)).toHaveLength(2);
  });

  it('removes every entry but keeps the folder', async () => {
    const report = await cleanFolder(dir);

    expect(report).toEqual({ path: dir, status: 'cleaned', items: 2, bytes: 30, failures: [] });
    expect(await fs.readdir(dir)).toEqual([]);
    expect(describeFolderReport(report)).toBe(`${dir}: 2 items, 30 Bytes`);
  });

  it('reports an empty folder as already clean', async () => {
    await cleanFolder(dir);
    const report = await cleanFolder(dir);

    expect(report.status).toBe('already_clean');
    expect(describeFolderReport(report)).toBe(`${dir}: Already clean`);
  });

  it('reports a missing folder', async () => {
    const missing = path.join(dir, 'does-not-exist');
    const report = await cleanFolder(missing);

    expect(report.status).toBe('missing');
    expect(describeFolderReport(report)).toBe(`Directory not found: ${missing}`);
    expect(await analyzeFolder(missing)).toEqual({ path: missing, exists: false, entries: 0, bytes: 0, reclaimable: '0 Bytes' });
  });

  it('records a failed entry and carries on with the rest', async () => {
    const realRm = fs.rm.bind(fs);
    jest.spyOn(fs, 'rm').mockImplementation(async (target, options) => {
      if (String(target).endsWith('a.tmp')) {
        throw new Error('EBUSY: resource busy or locked, the file is in use by another process');
      }
      return realRm(target, options);
    });

    const report = await cleanFolder(dir);

    expect(report).toEqual({
      path: dir,
      status: 'cleaned',
      items: 1,
      bytes: 20,
      failures: [{ item: 'a.tmp', message: 'EBUSY: resource busy or locked, the file is in use' }]
    });
    expect(await fs.readdir(dir)).toEqual(['a.tmp']);
  });

  it('reports a folder it may not list as access_denied', async () => {
    jest.spyOn(fs, 'readdir').mockRejectedValueOnce(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

    expect(await cleanFolder(dir)).toEqual({
      path: dir,
      status: 'access_denied',
      items: 0,
      bytes: 0,
      failures: [],
      message: `Access denied: ${dir}`
    });
    expect(await fs.readdir(dir)).toHaveLength(2);
  });

  it('reports other listing errors as error', async () => {
    const file = path.join(dir, 'a.tmp');
    const report = await cleanFolder(file);

    expect(report.status).toBe('error');
    expect(report.items).toBe(0);
    expect(report.message?.startsWith(`Error accessing ${file}: ENOTDIR`)).toBe(true);
  });
});
