/**
 * Content View Component
 * Right pane: scrollable text for the highlighted menu entry
 */

import { Box, Text } from 'ink';

export interface ContentViewProps {
  title: string;
  lines: string[];
  offset: number;
  height: number;
  focused: boolean;
}

export function ContentView({ title, lines, offset, height, focused }: ContentViewProps): JSX.Element {
  const displayLines = lines.slice(offset, offset + height);

  return (
    <Box flexDirection="column" paddingX={2}>
      <Box justifyContent="space-between">
        <Text color={focused ? 'cyan' : 'gray'} wrap="truncate-end">
          📄 {title}
        </Text>
        {lines.length > height && (
          <Text dimColor>
            lines {offset + 1}-{Math.min(offset + height, lines.length)} of {lines.length}
          </Text>
        )}
      </Box>

      {displayLines.map((line, index) => (
        <Text key={offset + index} wrap="truncate-end">
          {line || ' '}
        </Text>
      ))}
    </Box>
  );
}
