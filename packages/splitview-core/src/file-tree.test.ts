import { test, expect, describe, beforeAll, afterAll } from 'vitest';
import { mkdir, mkdtemp, rm, symlink, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { iconFor, loadTree, sortEntries, countNodes } from './file-tree';
import { FileSystemError } from './error-boundary';

let testDir: string;
let assetsDir: string;

beforeAll(async () => {
  testDir = await mkdtemp(path.join(os.tmpdir(), 'splitview-tree-'));
  assetsDir = path.join(testDir, 'assets');

  for (const dir of ['Beta', 'alpha', '.hidden', '__pycache__']) {
    await mkdir(path.join(assetsDir, dir), { recursive: true });
  }
  for (const file of ['zeta.c', 'Apple.txt', 'Makefile', 'rules.mk', 'readme.md', 'image.png', '.dotfile']) {
    await writeFile(path.join(assetsDir, file), file);
  }
  await writeFile(path.join(assetsDir, 'alpha', 'inner.h'), '#define X 1\n');
});

afterAll(async () => {
  await rm(testDir, { recursive: true, force: true });
});

describe('loadTree', () => {
  test('builds a root node labelled Files', async () => {
    const root = await loadTree(assetsDir);

    expect(root.kind).toBe('root');
    expect(root.label).toBe('Files');
    expect(root.name).toBe('assets');
    expect(root.id).toBe(assetsDir);
  });

  test('lists directories first, then files, ignoring case', async () => {
    const root = await loadTree(assetsDir);

    expect(root.children.map(child => child.label)).toEqual([
      '📁 alpha',
      '📁 Beta',
      '📝 Apple.txt',
      '📎 image.png',
      '🔧 Makefile',
      '📝 readme.md',
      '🔧 rules.mk',
      '📄 zeta.c'
    ]);
  });

  test('loads nested directories recursively', async () => {
    const root = await loadTree(assetsDir);
    const alpha = root.children[0];

    expect(alpha?.kind).toBe('directory');
    expect(alpha?.children.map(child => child.label)).toEqual(['📄 inner.h']);
    expect(alpha?.children[0]?.path).toBe(path.join(assetsDir, 'alpha', 'inner.h'));
    expect(root.children[1]?.children).toEqual([]);
    expect(countNodes(root.children)).toBe(9);
  });

  test('skips hidden entries unless asked to show them', async () => {
    const root = await loadTree(assetsDir, { showHidden: true });
    const names = root.children.map(child => child.name);

    expect(names.slice(0, 3)).toEqual(['.hidden', 'alpha', 'Beta']);
    expect(names).toContain('.dotfile');
    expect(names).not.toContain('__pycache__');
  });

  test('honours a custom ignore list', async () => {
    const root = await loadTree(assetsDir, { ignore: ['readme.md'] });
    const names = root.children.map(child => child.name);

    expect(names[0]).toBe('__pycache__');
    expect(names).not.toContain('readme.md');
  });

  test('uses a custom root label', async () => {
    const root = await loadTree(assetsDir, { rootLabel: 'Submissions' });
    expect(root.label).toBe('Submissions');
  });

  test('rejects a missing root directory', async () => {
    const missing = path.join(testDir, 'nope');

    await expect(loadTree(missing)).rejects.toBeInstanceOf(FileSystemError);
    await expect(loadTree(missing)).rejects.toThrow(`Root directory not found: ${missing}`);
  });

  test('rejects a root that is a file', async () => {
    const file = path.join(assetsDir, 'zeta.c');
    await expect(loadTree(file)).rejects.toThrow(`Root path is not a directory: ${file}`);
  });
});

describe('loadTree with symlinks', () => {
  let linkRoot: string;

  beforeAll(async () => {
    linkRoot = path.join(testDir, 'links');
    await mkdir(path.join(linkRoot, 'real'), { recursive: true });
    await mkdir(path.join(linkRoot, 'loop'), { recursive: true });
    await writeFile(path.join(linkRoot, 'real', 'a.c'), 'int a;');
    await symlink(path.join(linkRoot, 'real'), path.join(linkRoot, 'linkdir'));
    await symlink(linkRoot, path.join(linkRoot, 'loop', 'back'));
    await symlink(path.join(linkRoot, 'missing'), path.join(linkRoot, 'dangling'));
  });

  test('follows a symlinked directory', async () => {
    const root = await loadTree(linkRoot);
    const linkdir = root.children.find(child => child.name === 'linkdir');

    expect(root.children.map(child => child.label)).toEqual(['📁 linkdir', '📁 loop', '📁 real', '📎 dangling']);
    expect(linkdir?.kind).toBe('directory');
    expect(linkdir?.children.map(child => child.path)).toEqual([path.join(linkRoot, 'linkdir', 'a.c')]);
  });

  test('shows a link back to an ancestor without children', async () => {
    const root = await loadTree(linkRoot);
    const loop = root.children.find(child => child.name === 'loop');

    expect(loop?.children.map(child => child.label)).toEqual(['📁 back']);
    expect(loop?.children[0]?.kind).toBe('directory');
    expect(loop?.children[0]?.children).toEqual([]);
  });

  test('lists a dangling link as a file', async () => {
    const root = await loadTree(linkRoot);
    const dangling = root.children.find(child => child.name === 'dangling');

    expect(dangling?.kind).toBe('file');
    expect(dangling?.children).toEqual([]);
  });
});

test('iconFor picks an icon by file type', () => {
  expect(iconFor('main.c')).toBe('📄');
  expect(iconFor('defs.h')).toBe('📄');
  expect(iconFor('notes.txt')).toBe('📝');
  expect(iconFor('entry.info')).toBe('📝');
  expect(iconFor('Makefile')).toBe('🔧');
  expect(iconFor('build.mk')).toBe('🔧');
  expect(iconFor('photo.jpg')).toBe('📎');
  expect(iconFor('MAIN.C')).toBe('📎');
  expect(iconFor('notes.TXT')).toBe('📎');
});

test('sortEntries does not mutate its input', () => {
  const entries = [
    { name: 'b', isDirectory: false },
    { name: 'a', isDirectory: true }
  ];

  expect(sortEntries(entries).map(entry => entry.name)).toEqual(['a', 'b']);
  expect(entries[0]?.name).toBe('b');
});
