/**
 * Main App Component - Menu and Content Split Layout
 */

import { useEffect, useMemo, useReducer } from 'react';
import { Box, useApp, useStdout } from 'ink';
import { Logger, WELCOME_TEXT, contentFormatFor, describeNode, errorMessage } from 'splitview-core';
import type { TreeNode } from 'splitview-core';
import { FileTree } from './FileTree';
import { ContentView } from './ContentView';
import { Header } from './Header';
import { StatusBar } from './StatusBar';
import { useKeyboard } from '../hooks/useKeyboard';
import { DEFAULT_BINDINGS, shownBindings } from '../state/keymap';
import type { KeyBinding, ViewerCommand } from '../state/keymap';
import { computeLayout } from '../state/layout';
import { flattenVisible } from '../state/tree-state';
import { createViewerState, viewerReducer } from '../state/viewer-state';
import { renderContent, wrapText } from '../utils/markdown';

export interface AppProps {
  tree: TreeNode;
  title?: string;
  sidebarWidth?: number;
  chordTimeoutMs?: number;
  bindings?: readonly KeyBinding[];
  logger?: Logger;
  readContent?: (node: TreeNode) => Promise<string | null>;
}

const silentLogger = Logger.disabled('app');

function describeStatus(node: TreeNode | undefined): string {
  if (!node || node.kind === 'root') return 'Ready';
  return node.kind === 'directory' ? `Folder: ${node.name}` : `File: ${node.name}`;
}

export function App({
  tree,
  title = 'Split Viewer',
  sidebarWidth = 30,
  chordTimeoutMs = 1000,
  bindings = DEFAULT_BINDINGS,
  logger = silentLogger,
  readContent = describeNode
}: AppProps): JSX.Element {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [state, dispatch] = useReducer(viewerReducer, tree, root => createViewerState(root, WELCOME_TEXT, 'Welcome'));

  const layout = computeLayout({
    columns: stdout.columns,
    rows: stdout.rows,
    sidebarPercent: sidebarWidth,
    sidebarVisible: state.sidebarVisible
  });

  const rows = useMemo(() => flattenVisible(state.root, state.tree.expanded), [state.root, state.tree.expanded]);
  const highlighted = rows[state.tree.cursor]?.node;

  const lines = useMemo(
    () => wrapText(renderContent(state.content, state.contentFormat), layout.textWidth),
    [state.content, state.contentFormat, layout.textWidth]
  );

  useEffect(() => {
    logger.debug('Application mounted');
  }, [logger]);

  useEffect(() => {
    logger.debug(`Focus moved to ${state.focusedPane} pane`);
  }, [logger, state.focusedPane]);

  // Highlighting a menu entry shows it; the root leaves the pane as it is
  useEffect(() => {
    if (!highlighted || highlighted.kind === 'root') {
      return;
    }

    const node = highlighted;
    let cancelled = false;
    const loadContent = async () => {
      let content: string | null;
      try {
        content = await readContent(node);
      } catch (error) {
        content = `Error reading file: ${errorMessage(error)}`;
      }

      if (!cancelled && content !== null) {
        logger.debug(`Showing ${node.path}`);
        dispatch({ type: 'contentLoaded', content, format: contentFormatFor(node), title: node.label });
      }
    };

    void loadContent();
    return () => {
      cancelled = true;
    };
  }, [highlighted, readContent, logger]);

  const handleCommand = (command: ViewerCommand) => {
    if (command === 'quit') {
      logger.info('Quit requested');
      exit();
      return;
    }

    dispatch({
      type: 'command',
      command,
      metrics: { lineCount: lines.length, viewportHeight: layout.viewportHeight }
    });
  };

  const { pendingKeys } = useKeyboard({
    focusedPane: state.focusedPane,
    onCommand: handleCommand,
    bindings,
    chordTimeoutMs,
    logger
  });

  return (
    <Box flexDirection="column" height={layout.rows}>
      <Header title={title} />

      <Box height={layout.bodyHeight}>
        {/* Menu Pane */}
        {state.sidebarVisible && (
          <Box
            width={layout.sidebarWidth}
            borderStyle="single"
            borderColor={state.focusedPane === 'tree' ? 'cyan' : 'gray'}
          >
            <FileTree
              rows={rows}
              cursor={state.tree.cursor}
              focused={state.focusedPane === 'tree'}
              height={layout.treeRows}
            />
          </Box>
        )}

        {/* Content Pane */}
        <Box
          width={layout.contentWidth}
          borderStyle="single"
          borderColor={state.focusedPane === 'content' ? 'cyan' : 'gray'}
        >
          <ContentView
            title={state.contentTitle}
            lines={lines}
            offset={state.scrollOffset}
            height={layout.viewportHeight}
            focused={state.focusedPane === 'content'}
          />
        </Box>
      </Box>

      {/* Status Bar */}
      <StatusBar
        focusedPane={state.focusedPane}
        status={describeStatus(highlighted)}
        bindings={shownBindings(bindings)}
        pendingKeys={pendingKeys}
      />
    </Box>
  );
}
