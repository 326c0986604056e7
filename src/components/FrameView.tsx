import React, { memo } from 'react';
import { Box, Text } from 'ink';
import { useTheme } from '@hooks/useTheme';
import type { Frame, Line } from '@render/frame';

interface FrameViewProps {
  frame: Frame;
}

const FrameLine: React.FC<{ line: Line }> = memo(({ line }) => {
  const { theme } = useTheme();
  if (line.length === 0) return <Text> </Text>;
  return (
    <Text wrap="truncate">
      {line.map((segment, i) => {
        const style = segment.style;
        return (
          <Text
            key={i}
            color={style?.color ? theme[style.color] : theme.foreground}
            bold={style?.bold}
            dimColor={style?.dim}
            inverse={style?.inverse}
          >
            {segment.text}
          </Text>
        );
      })}
    </Text>
  );
});

/**
 * Paints a rendered frame: one Ink row per frame line, colour roles
 * resolved against the active theme
 */
export const FrameView: React.FC<FrameViewProps> = memo(({ frame }) => {
  return (
    <Box flexDirection="column" width={frame.width}>
      {frame.lines.map((line, i) => (
        <FrameLine key={i} line={line} />
      ))}
    </Box>
  );
});
