/**
 * Viewer state: focus, sidebar, menu tree and content scroll
 */

import type { ContentFormat, TreeNode } from 'splitview-core';
import type { FocusedPane, ViewerCommand } from './keymap';
import { applyScroll } from './scroll';
import type { ScrollMetrics } from './scroll';
import {
  collapseAtCursor,
  createTreeState,
  expandAtCursor,
  moveCursor,
  selectAtCursor
} from './tree-state';
import type { TreeState } from './tree-state';

export interface ViewerState {
  root: TreeNode;
  focusedPane: FocusedPane;
  sidebarVisible: boolean;
  tree: TreeState;
  content: string;
  contentFormat: ContentFormat;
  contentTitle: string;
  scrollOffset: number;
}

export type ViewerAction =
  | { type: 'contentLoaded'; content: string; format: ContentFormat; title: string }
  | { type: 'command'; command: ViewerCommand; metrics: ScrollMetrics };

export function createViewerState(
  root: TreeNode,
  content: string,
  contentTitle: string = '',
  contentFormat: ContentFormat = 'markdown'
): ViewerState {
  return {
    root,
    focusedPane: 'tree',
    sidebarVisible: true,
    tree: createTreeState(root),
    content,
    contentFormat,
    contentTitle,
    scrollOffset: 0
  };
}

function focus(state: ViewerState, pane: FocusedPane): ViewerState {
  if (pane === 'tree' && !state.sidebarVisible) {
    return state;
  }
  return state.focusedPane === pane ? state : { ...state, focusedPane: pane };
}

function withTree(state: ViewerState, tree: TreeState): ViewerState {
  return tree === state.tree ? state : { ...state, tree };
}

function applyTreeCommand(state: ViewerState, command: ViewerCommand): ViewerState {
  switch (command) {
    case 'cursorUp':
      return withTree(state, moveCursor(state.tree, state.root, -1));
    case 'cursorDown':
      return withTree(state, moveCursor(state.tree, state.root, 1));
    case 'expand':
      return withTree(state, expandAtCursor(state.tree, state.root));
    case 'collapse':
      return withTree(state, collapseAtCursor(state.tree, state.root));
    case 'select': {
      const result = selectAtCursor(state.tree, state.root);
      const next = withTree(state, result.state);
      return result.focusContent ? focus(next, 'content') : next;
    }
    default:
      return state;
  }
}

function applyContentCommand(state: ViewerState, command: ViewerCommand, metrics: ScrollMetrics): ViewerState {
  switch (command) {
    case 'scrollUp':
    case 'scrollDown':
    case 'scrollHome':
    case 'scrollEnd':
    case 'pageUp':
    case 'pageDown': {
      const scrollOffset = applyScroll(state.scrollOffset, command, metrics);
      return scrollOffset === state.scrollOffset ? state : { ...state, scrollOffset };
    }
    case 'returnToTree':
      return { ...state, sidebarVisible: true, focusedPane: 'tree' };
    default:
      return state;
  }
}

export function applyCommand(state: ViewerState, command: ViewerCommand, metrics: ScrollMetrics): ViewerState {
  switch (command) {
    case 'quit':
      return state;
    case 'switchFocus':
      return focus(state, state.focusedPane === 'tree' ? 'content' : 'tree');
    case 'toggleSidebar':
      return state.sidebarVisible
        ? { ...state, sidebarVisible: false, focusedPane: 'content' }
        : { ...state, sidebarVisible: true, focusedPane: 'tree' };
    case 'focusContent':
      return focus(state, 'content');
    case 'focusTree':
      return focus(state, 'tree');
  }

  return state.focusedPane === 'tree'
    ? applyTreeCommand(state, command)
    : applyContentCommand(state, command, metrics);
}

export function viewerReducer(state: ViewerState, action: ViewerAction): ViewerState {
  switch (action.type) {
    case 'contentLoaded':
      return {
        ...state,
        content: action.content,
        contentFormat: action.format,
        contentTitle: action.title,
        scrollOffset: 0
      };
    case 'command':
      return applyCommand(state, action.command, action.metrics);
  }
}
