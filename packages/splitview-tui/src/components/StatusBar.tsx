/**
 * Status Bar Component
 * Bottom bar showing the focused pane and keyboard shortcuts
 */

import { Box, Text } from 'ink';
import type { FocusedPane, KeyBinding } from '../state/keymap';
import { formatKeys } from '../state/keymap';

export interface StatusBarProps {
  focusedPane: FocusedPane;
  status: string;
  bindings: readonly KeyBinding[];
  pendingKeys: readonly string[];
}

export function StatusBar({
  focusedPane,
  status,
  bindings,
  pendingKeys
}: StatusBarProps): JSX.Element {
  const shortcuts = bindings.map(binding => `${formatKeys(binding.keys)} ${binding.description}`);

  return (
    <Box
      borderStyle="single"
      borderColor="gray"
      paddingX={1}
      justifyContent="space-between"
    >
      {/* Left side - Status */}
      <Box flexShrink={0} marginRight={2}>
        <Text>
          <Text color="cyan">[{focusedPane.toUpperCase()}]</Text>
          {' '}
          <Text>{status}</Text>
          {pendingKeys.length > 0 && <Text color="yellow"> {formatKeys(pendingKeys)}…</Text>}
        </Text>
      </Box>

      {/* Right side - Shortcuts */}
      <Box>
        <Text dimColor wrap="truncate-end">
          {shortcuts.join(' • ')}
        </Text>
      </Box>
    </Box>
  );
}
