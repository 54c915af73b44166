/**
 * Key bindings and multi-key sequence resolution
 */

import type { ScrollCommand } from './scroll';

export type FocusedPane = 'tree' | 'content';

export type GlobalCommand = 'quit' | 'switchFocus' | 'toggleSidebar' | 'focusContent' | 'focusTree';
export type TreeCommand = 'cursorUp' | 'cursorDown' | 'select' | 'expand' | 'collapse';
export type ContentCommand = ScrollCommand | 'returnToTree';
export type ViewerCommand = GlobalCommand | TreeCommand | ContentCommand;

export interface KeyBinding {
  keys: readonly string[];
  command: ViewerCommand;
  description: string;
  /** Panes the binding applies to; every pane when omitted */
  panes?: readonly FocusedPane[];
  /** Listed in the status bar */
  show?: boolean;
}

/**
 * The subset of Ink's key flags the viewer reads
 */
export interface KeyFlags {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  tab: boolean;
}

const TREE: readonly FocusedPane[] = ['tree'];
const CONTENT: readonly FocusedPane[] = ['content'];

export const DEFAULT_BINDINGS: readonly KeyBinding[] = [
  { keys: ['tab'], command: 'switchFocus', description: 'Switch focus', show: true },
  { keys: ['q'], command: 'quit', description: 'Quit', show: true },
  { keys: ['~'], command: 'toggleSidebar', description: 'Toggle sidebar', show: true },
  { keys: ['f', 'k'], command: 'focusContent', description: 'Focus viewer', show: true },
  { keys: ['f', 'h'], command: 'focusTree', description: 'Focus sidebar', show: true },

  { keys: ['j'], command: 'cursorDown', description: 'Cursor down', panes: TREE },
  { keys: ['down'], command: 'cursorDown', description: 'Cursor down', panes: TREE },
  { keys: ['k'], command: 'cursorUp', description: 'Cursor up', panes: TREE },
  { keys: ['up'], command: 'cursorUp', description: 'Cursor up', panes: TREE },
  { keys: ['enter'], command: 'select', description: 'Open folder / view file', panes: TREE },
  { keys: ['z', 'o'], command: 'expand', description: 'Expand node', panes: TREE },
  { keys: ['z', 'c'], command: 'collapse', description: 'Collapse node', panes: TREE },

  { keys: ['j'], command: 'scrollDown', description: 'Scroll down', panes: CONTENT },
  { keys: ['down'], command: 'scrollDown', description: 'Scroll down', panes: CONTENT },
  { keys: ['k'], command: 'scrollUp', description: 'Scroll up', panes: CONTENT },
  { keys: ['up'], command: 'scrollUp', description: 'Scroll up', panes: CONTENT },
  { keys: ['g', 'g'], command: 'scrollHome', description: 'Scroll to top', panes: CONTENT },
  { keys: ['G'], command: 'scrollEnd', description: 'Scroll to bottom', panes: CONTENT },
  { keys: ['ctrl+d'], command: 'pageDown', description: 'Page down', panes: CONTENT },
  { keys: ['pagedown'], command: 'pageDown', description: 'Page down', panes: CONTENT },
  { keys: ['ctrl+u'], command: 'pageUp', description: 'Page up', panes: CONTENT },
  { keys: ['pageup'], command: 'pageUp', description: 'Page up', panes: CONTENT },
  { keys: ['enter'], command: 'returnToTree', description: 'Return to tree', panes: CONTENT }
];

/**
 * Name a keypress the way bindings spell it, or null for keys the viewer
 * has no name for
 */
export function normalizeKey(input: string, key: KeyFlags): string | null {
  // Ink flags tab as ctrl+i, so tab and enter go first
  if (key.tab) return 'tab';
  if (key.return) return 'enter';
  if (key.escape) return 'escape';
  if (key.upArrow) return 'up';
  if (key.downArrow) return 'down';
  if (key.leftArrow) return 'left';
  if (key.rightArrow) return 'right';
  if (key.pageUp) return 'pageup';
  if (key.pageDown) return 'pagedown';
  if (key.ctrl && input.length === 1) return `ctrl+${input.toLowerCase()}`;
  if (input.length === 1) return input;
  return null;
}

export function formatKeys(keys: readonly string[]): string {
  return keys.join('');
}

export type KeyResolution =
  | { kind: 'command'; command: ViewerCommand }
  | { kind: 'pending'; sequence: readonly string[] }
  | { kind: 'none' };

function startsWith(keys: readonly string[], prefix: readonly string[]): boolean {
  return prefix.every((key, index) => keys[index] === key);
}

export class KeySequenceResolver {
  private pending: string[] = [];
  private pendingSince = 0;

  constructor(
    private readonly bindings: readonly KeyBinding[] = DEFAULT_BINDINGS,
    private readonly timeoutMs: number = 1000
  ) {}

  get pendingKeys(): readonly string[] {
    return this.pending;
  }

  reset(): void {
    this.pending = [];
  }

  resolve(key: string, pane: FocusedPane, now: number = Date.now()): KeyResolution {
    if (this.pending.length > 0 && now - this.pendingSince > this.timeoutMs) {
      this.pending = [];
    }

    const hadPending = this.pending.length > 0;
    const resolution = this.match([...this.pending, key], pane, now);
    if (resolution.kind === 'none' && hadPending) {
      // The key broke the sequence; try it on its own
      return this.match([key], pane, now);
    }
    return resolution;
  }

  private match(sequence: readonly string[], pane: FocusedPane, now: number): KeyResolution {
    const active = this.bindings.filter(binding => !binding.panes || binding.panes.includes(pane));

    const exact = active.find(
      binding => binding.keys.length === sequence.length && startsWith(binding.keys, sequence)
    );
    if (exact) {
      this.pending = [];
      return { kind: 'command', command: exact.command };
    }

    const isPrefix = active.some(
      binding => binding.keys.length > sequence.length && startsWith(binding.keys, sequence)
    );
    if (isPrefix) {
      if (this.pending.length === 0) {
        this.pendingSince = now;
      }
      this.pending = [...sequence];
      return { kind: 'pending', sequence: this.pending };
    }

    this.pending = [];
    return { kind: 'none' };
  }
}

export function shownBindings(bindings: readonly KeyBinding[] = DEFAULT_BINDINGS): KeyBinding[] {
  return bindings.filter(binding => binding.show);
}
