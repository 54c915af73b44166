/**
 * Text shown in the content pane for a highlighted menu entry
 */

import { readFile, readdir } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { TreeNode } from './file-tree';
import { errorMessage, statOrNull } from './utils';

export const WELCOME_TEXT = [
  'Welcome to Split Viewer!',
  '',
  'Navigation:',
  '- j/k or ↑/↓: Move up/down in tree or scroll content',
  '- Enter: Open/close folders in tree, focus viewer for files',
  '- Enter (in viewer): Return to tree',
  '- zo/zc: Expand/collapse directories',
  '- fk: Focus viewer',
  '- fh: Focus sidebar',
  '- Tab: Switch between tree and content',
  '- ~: Toggle sidebar',
  '- q: Quit',
  '',
  'Content View Additional Controls:',
  '- Ctrl+u/Ctrl+d: Page up/down',
  '- gg/G: Jump to top/bottom'
].join('\n');

/**
 * How the content pane renders a text: markdown gets headings, lists and
 * inline styles, text is shown as it is apart from fenced code
 */
export type ContentFormat = 'markdown' | 'text';

const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];

export function contentFormatFor(node: TreeNode): ContentFormat {
  if (node.kind !== 'file') return 'markdown';
  return MARKDOWN_EXTENSIONS.includes(extname(node.path)) ? 'markdown' : 'text';
}

/**
 * Fence language for files shown as code, if any. Suffixes are matched
 * case-sensitively.
 */
export function fenceLanguageFor(filePath: string): string | null {
  const extension = extname(filePath);
  if (extension === '.c' || extension === '.h') return 'c';
  if (extension === '.mk' || filePath.includes('Makefile')) return 'makefile';
  return null;
}

export function noContentText(label: string): string {
  return `No content available for ${label}`;
}

export async function describeFile(node: TreeNode): Promise<string> {
  let text: string;
  try {
    // Buffer decoding swaps invalid UTF-8 for U+FFFD
    text = (await readFile(node.path)).toString('utf8');
  } catch (error) {
    return `Error reading file: ${errorMessage(error)}`;
  }

  const language = fenceLanguageFor(node.path);
  if (language) {
    return `\`\`\`${language}\n${text}\n\`\`\``;
  }
  return text || noContentText(node.label);
}

export async function describeDirectory(node: TreeNode): Promise<string> {
  try {
    const entries = await readdir(node.path, { withFileTypes: true });
    let files = 0;
    let directories = 0;
    for (const entry of entries) {
      let isFile = entry.isFile();
      let isDirectory = entry.isDirectory();
      if (entry.isSymbolicLink()) {
        const target = await statOrNull(join(node.path, entry.name));
        isFile = target?.isFile() ?? false;
        isDirectory = target?.isDirectory() ?? false;
      }

      if (isFile) files++;
      else if (isDirectory) directories++;
    }

    return [
      `# ${basename(node.path)}`,
      '',
      'This directory contains:',
      `- ${files} files`,
      `- ${directories} directories`,
      '',
      'Select a file to view its contents.'
    ].join('\n');
  } catch (error) {
    return `Error reading directory: ${errorMessage(error)}`;
  }
}

/**
 * Content for a menu entry; null leaves the pane as it is
 */
export async function describeNode(node: TreeNode): Promise<string | null> {
  switch (node.kind) {
    case 'root':
      return null;
    case 'directory':
      return describeDirectory(node);
    case 'file':
      return describeFile(node);
  }
}
