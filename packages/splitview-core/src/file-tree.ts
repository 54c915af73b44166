/**
 * Directory tree loading for the menu pane
 */

import { readdir, realpath } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import { FileSystemError } from './error-boundary';
import type { Logger } from './logger';
import { statOrNull } from './utils';

export type TreeNodeKind = 'root' | 'directory' | 'file';

export interface TreeNode {
  id: string;
  name: string;
  label: string;
  path: string;
  kind: TreeNodeKind;
  children: TreeNode[];
}

export interface LoadTreeOptions {
  showHidden?: boolean;
  ignore?: readonly string[];
  rootLabel?: string;
  logger?: Logger;
}

interface DirectoryEntry {
  name: string;
  path: string;
  isDirectory: boolean;
}

export const DIRECTORY_ICON = '📁';

export function iconFor(fileName: string): string {
  const extension = extname(fileName);
  if (extension === '.c' || extension === '.h') return '📄';
  if (extension === '.txt' || extension === '.md' || extension === '.info') return '📝';
  if (extension === '.mk' || fileName === 'Makefile') return '🔧';
  return '📎';
}

/**
 * Directories first, then files, each alphabetically ignoring case
 */
export function sortEntries<T extends { name: string; isDirectory: boolean }>(entries: readonly T[]): T[] {
  return [...entries].sort((a, b) => {
    if (a.isDirectory && !b.isDirectory) return -1;
    if (!a.isDirectory && b.isDirectory) return 1;
    const left = a.name.toLowerCase();
    const right = b.name.toLowerCase();
    if (left < right) return -1;
    if (left > right) return 1;
    return 0;
  });
}

async function listDirectory(dirPath: string, options: LoadTreeOptions): Promise<DirectoryEntry[]> {
  const ignore = options.ignore ?? ['__pycache__'];
  const dirents = await readdir(dirPath, { withFileTypes: true });
  const entries: DirectoryEntry[] = [];

  for (const dirent of dirents) {
    if (!options.showHidden && dirent.name.startsWith('.')) continue;
    if (ignore.includes(dirent.name)) continue;

    const fullPath = join(dirPath, dirent.name);
    let isDirectory = dirent.isDirectory();
    if (dirent.isSymbolicLink()) {
      const target = await statOrNull(fullPath);
      isDirectory = target?.isDirectory() ?? false;
    }

    entries.push({ name: dirent.name, path: fullPath, isDirectory });
  }

  return sortEntries(entries);
}

async function buildChildren(dirPath: string, options: LoadTreeOptions, ancestors: ReadonlySet<string>): Promise<TreeNode[]> {
  const children: TreeNode[] = [];

  for (const entry of await listDirectory(dirPath, options)) {
    if (entry.isDirectory) {
      // Symlinked directories can point back up the tree
      const real = await realpath(entry.path);
      const grandchildren = ancestors.has(real)
        ? []
        : await buildChildren(entry.path, options, new Set([...ancestors, real]));

      children.push({
        id: entry.path,
        name: entry.name,
        label: `${DIRECTORY_ICON} ${entry.name}`,
        path: entry.path,
        kind: 'directory',
        children: grandchildren
      });
    } else {
      children.push({
        id: entry.path,
        name: entry.name,
        label: `${iconFor(entry.name)} ${entry.name}`,
        path: entry.path,
        kind: 'file',
        children: []
      });
    }
  }

  return children;
}

/**
 * Recursively load a directory into a menu tree
 */
export async function loadTree(rootPath: string, options: LoadTreeOptions = {}): Promise<TreeNode> {
  const info = await statOrNull(rootPath);
  if (!info) {
    throw new FileSystemError(`Root directory not found: ${rootPath}`, rootPath);
  }
  if (!info.isDirectory()) {
    throw new FileSystemError(`Root path is not a directory: ${rootPath}`, rootPath);
  }

  const children = await buildChildren(rootPath, options, new Set([await realpath(rootPath)]));
  options.logger?.debug(`Loaded tree for ${rootPath} (${countNodes(children)} entries)`);

  return {
    id: rootPath,
    name: basename(resolve(rootPath)),
    label: options.rootLabel ?? 'Files',
    path: rootPath,
    kind: 'root',
    children
  };
}

export function countNodes(nodes: readonly TreeNode[]): number {
  return nodes.reduce((total, node) => total + 1 + countNodes(node.children), 0);
}
