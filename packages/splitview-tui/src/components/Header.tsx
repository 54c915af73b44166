import { Box, Text } from 'ink';

export interface HeaderProps {
  title: string;
}

export function Header({ title }: HeaderProps): JSX.Element {
  return (
    <Box justifyContent="center" height={1}>
      <Text bold color="cyan">
        {title}
      </Text>
    </Box>
  );
}
