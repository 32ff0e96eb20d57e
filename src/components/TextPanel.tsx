import { Box, Text } from "ink";
import React from "react";
import { clipLines } from "../utils/formatters";

interface TextPanelProps {
  title: string;
  text: string;
  width: number;
  maxRows: number;
  color?: string;
}

export const TextPanel: React.FC<TextPanelProps> = ({
  title,
  text,
  width,
  maxRows,
  color,
}) => (
  <Box
    flexDirection="column"
    borderStyle="round"
    borderColor={color ?? "magenta"}
    paddingX={1}
    width={width}
    flexGrow={1}
  >
    <Text bold>{title}</Text>
    {text.length > 0 && (
      <Text wrap="wrap">{clipLines(text, Math.max(1, maxRows))}</Text>
    )}
  </Box>
);
