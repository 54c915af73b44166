/**
 * Keyboard Hook
 * Turns keypresses, including vim-style key sequences, into viewer commands
 */

import { useEffect, useMemo, useState } from 'react';
import { useInput } from 'ink';
import type { Logger } from 'splitview-core';
import { DEFAULT_BINDINGS, KeySequenceResolver, normalizeKey } from '../state/keymap';
import type { FocusedPane, KeyBinding, ViewerCommand } from '../state/keymap';

export interface UseKeyboardOptions {
  focusedPane: FocusedPane;
  onCommand: (command: ViewerCommand) => void;
  bindings?: readonly KeyBinding[];
  chordTimeoutMs?: number;
  logger?: Logger;
}

export interface UseKeyboardReturn {
  pendingKeys: readonly string[];
}

export function useKeyboard({
  focusedPane,
  onCommand,
  bindings = DEFAULT_BINDINGS,
  chordTimeoutMs = 1000,
  logger
}: UseKeyboardOptions): UseKeyboardReturn {
  const resolver = useMemo(
    () => new KeySequenceResolver(bindings, chordTimeoutMs),
    [bindings, chordTimeoutMs]
  );
  const [pendingKeys, setPendingKeys] = useState<readonly string[]>([]);

  // An unfinished sequence expires on its own, not only on the next key
  useEffect(() => {
    if (pendingKeys.length === 0) {
      return;
    }

    const timer = setTimeout(() => {
      resolver.reset();
      setPendingKeys([]);
    }, chordTimeoutMs);
    return () => clearTimeout(timer);
  }, [pendingKeys, resolver, chordTimeoutMs]);

  useInput((input, key) => {
    const name = normalizeKey(input, key);
    if (!name) {
      return;
    }

    const resolution = resolver.resolve(name, focusedPane);
    logger?.debug(`Key ${name} in ${focusedPane} pane: ${resolution.kind === 'command' ? resolution.command : resolution.kind}`);
    setPendingKeys(resolution.kind === 'pending' ? resolution.sequence : []);

    if (resolution.kind === 'command') {
      onCommand(resolution.command);
    }
  });

  return { pendingKeys };
}
