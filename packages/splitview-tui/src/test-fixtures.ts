import type { TreeNode } from 'splitview-core';

function file(dir: string, name: string, icon: string): TreeNode {
  const path = `${dir}/${name}`;
  return { id: path, name, label: `${icon} ${name}`, path, kind: 'file', children: [] };
}

/**
 * Files
 * ├── src/ (main.c, util.h)
 * ├── empty/
 * └── notes.txt
 */
export function sampleTree(): TreeNode {
  return {
    id: '/assets',
    name: 'assets',
    label: 'Files',
    path: '/assets',
    kind: 'root',
    children: [
      {
        id: '/assets/src',
        name: 'src',
        label: '📁 src',
        path: '/assets/src',
        kind: 'directory',
        children: [file('/assets/src', 'main.c', '📄'), file('/assets/src', 'util.h', '📄')]
      },
      { id: '/assets/empty', name: 'empty', label: '📁 empty', path: '/assets/empty', kind: 'directory', children: [] },
      file('/assets', 'notes.txt', '📝')
    ]
  };
}
