/**
 * splitview TUI - Terminal User Interface
 * Menu on the left, content on the right, rendered with Ink
 */

import React from 'react';
import { render } from 'ink';
import { Logger, TerminalError, loadTree } from 'splitview-core';
import type { ViewerConfig } from 'splitview-core';
import { App } from './components/App';

export interface StartTUIOptions {
  config: ViewerConfig;
  logger?: Logger;
}

const SHOW_CURSOR = '\x1b[?25h';
const HIDE_CURSOR = '\x1b[?25l';
const CLEAR_SCREEN = '\x1b[2J\x1b[0f';

/**
 * Run the viewer until the user quits
 */
export async function startTUI({ config, logger = Logger.disabled() }: StartTUIOptions): Promise<void> {
  if (!process.stdin.isTTY) {
    throw new TerminalError('Raw mode is not supported: stdin is not a TTY');
  }

  const tree = await loadTree(config.rootPath, {
    showHidden: config.showHidden,
    ignore: config.ignore,
    logger: logger.child('tree')
  });
  logger.info(`Starting viewer on ${config.rootPath}`);

  process.stdout.write(CLEAR_SCREEN);
  process.stdout.write(HIDE_CURSOR);

  const restoreCursor = () => {
    process.stdout.write(SHOW_CURSOR);
  };
  process.on('exit', restoreCursor);

  const instance = render(
    React.createElement(App, {
      tree,
      title: config.title,
      sidebarWidth: config.sidebarWidth,
      chordTimeoutMs: config.chordTimeoutMs,
      logger: logger.child('app')
    })
  );

  try {
    await instance.waitUntilExit();
  } finally {
    restoreCursor();
    process.off('exit', restoreCursor);
    logger.info('Viewer closed');
  }
}

export * from './components/App';
export * from './components/ContentView';
export * from './components/FileTree';
export * from './components/Header';
export * from './components/StatusBar';
export * from './hooks/useKeyboard';
export * from './state/keymap';
export * from './state/layout';
export * from './state/scroll';
export * from './state/tree-state';
export * from './state/viewer-state';
export * from './utils/markdown';
