/**
 * File Tree Component
 * Left pane: the navigable menu built from the browsed directory
 */

import { Box, Text } from 'ink';
import type { VisibleNode } from '../state/tree-state';
import { visibleWindow } from '../state/tree-state';

export interface FileTreeProps {
  rows: VisibleNode[];
  cursor: number;
  focused: boolean;
  height: number;
}

function expandMarker(row: VisibleNode): string {
  if (row.node.children.length === 0) return '  ';
  return row.expanded ? '▼ ' : '▶ ';
}

export function FileTree({ rows, cursor, focused, height }: FileTreeProps): JSX.Element {
  const { start, end } = visibleWindow(rows.length, cursor, height);

  return (
    <Box flexDirection="column" paddingX={1}>
      {rows.slice(start, end).map((row, index) => {
        const isCursor = start + index === cursor;

        return (
          <Text
            key={row.node.id}
            wrap="truncate-end"
            color={isCursor ? 'black' : row.node.kind === 'directory' ? 'blue' : undefined}
            backgroundColor={isCursor ? (focused ? 'cyan' : 'gray') : undefined}
          >
            {'  '.repeat(row.depth)}{expandMarker(row)}{row.node.label}
          </Text>
        );
      })}
    </Box>
  );
}
