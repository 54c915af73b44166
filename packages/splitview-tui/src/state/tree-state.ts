/**
 * Menu tree navigation: which nodes are expanded and where the cursor is
 */

import type { TreeNode } from 'splitview-core';

export interface TreeState {
  expanded: ReadonlySet<string>;
  cursor: number;
}

export interface VisibleNode {
  node: TreeNode;
  depth: number;
  expanded: boolean;
}

export interface SelectResult {
  state: TreeState;
  focusContent: boolean;
}

export function createTreeState(root: TreeNode): TreeState {
  return { expanded: new Set([root.id]), cursor: 0 };
}

/**
 * Rows currently shown in the menu, in display order
 */
export function flattenVisible(root: TreeNode, expanded: ReadonlySet<string>): VisibleNode[] {
  const rows: VisibleNode[] = [];

  const visit = (node: TreeNode, depth: number): void => {
    const isExpanded = expanded.has(node.id);
    rows.push({ node, depth, expanded: isExpanded });
    if (isExpanded) {
      for (const child of node.children) {
        visit(child, depth + 1);
      }
    }
  };

  visit(root, 0);
  return rows;
}

export function clampCursor(cursor: number, rowCount: number): number {
  if (rowCount <= 0) return 0;
  return Math.min(Math.max(cursor, 0), rowCount - 1);
}

export function nodeAtCursor(state: TreeState, root: TreeNode): VisibleNode | undefined {
  return flattenVisible(root, state.expanded)[state.cursor];
}

export function moveCursor(state: TreeState, root: TreeNode, delta: number): TreeState {
  const rows = flattenVisible(root, state.expanded);
  const cursor = clampCursor(state.cursor + delta, rows.length);
  return cursor === state.cursor ? state : { ...state, cursor };
}

function withExpanded(state: TreeState, root: TreeNode, id: string, expand: boolean): TreeState {
  const expanded = new Set(state.expanded);
  if (expand) expanded.add(id);
  else expanded.delete(id);

  const rows = flattenVisible(root, expanded);
  return { expanded, cursor: clampCursor(state.cursor, rows.length) };
}

/**
 * Enter on the menu: folders open or close, anything else hands focus to
 * the content pane
 */
export function selectAtCursor(state: TreeState, root: TreeNode): SelectResult {
  const row = nodeAtCursor(state, root);
  if (!row) {
    return { state, focusContent: false };
  }
  if (row.node.children.length === 0) {
    return { state, focusContent: true };
  }
  return { state: withExpanded(state, root, row.node.id, !row.expanded), focusContent: false };
}

export function expandAtCursor(state: TreeState, root: TreeNode): TreeState {
  const row = nodeAtCursor(state, root);
  if (!row || row.node.children.length === 0 || row.expanded) {
    return state;
  }
  return withExpanded(state, root, row.node.id, true);
}

export function collapseAtCursor(state: TreeState, root: TreeNode): TreeState {
  const row = nodeAtCursor(state, root);
  if (!row || row.node.children.length === 0 || !row.expanded) {
    return state;
  }
  return withExpanded(state, root, row.node.id, false);
}

/**
 * Slice of rows to draw so the cursor row stays on screen
 */
export function visibleWindow(count: number, cursor: number, height: number): { start: number; end: number } {
  if (height <= 0) return { start: 0, end: 0 };
  if (count <= height) return { start: 0, end: count };

  const start = Math.min(Math.max(cursor - Math.floor(height / 2), 0), count - height);
  return { start, end: start + height };
}
