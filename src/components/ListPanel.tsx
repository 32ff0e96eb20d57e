import { Box, Text } from "ink";
import React from "react";
import type { SelectionList } from "../state/selection-list";
import { truncate } from "../utils/formatters";

interface ListPanelProps {
  title: string;
  list: SelectionList<string>;
  width: number;
  // Rows available for items; longer lists scroll with the cursor
  maxRows: number;
}

const MARKER = "▶";

export function visibleWindow(
  length: number,
  cursor: number | null,
  maxRows: number,
): { start: number; end: number } {
  const rows = Math.max(1, maxRows);
  if (length <= rows) return { start: 0, end: length };
  const pos = cursor ?? 0;
  const start = Math.min(Math.max(0, pos - rows + 1), length - rows);
  return { start, end: start + rows };
}

export const ListPanel: React.FC<ListPanelProps> = ({
  title,
  list,
  width,
  maxRows,
}) => {
  const { start, end } = visibleWindow(list.items.length, list.cursor, maxRows);
  // Border (2) + padding (2) + marker column (2)
  const itemWidth = Math.max(1, width - 6);

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor="cyan"
      paddingX={1}
      width={width}
      flexGrow={1}
    >
      <Text bold>{title}</Text>
      {list.items.length === 0 ? (
        <Text dimColor>(empty)</Text>
      ) : (
        list.items.slice(start, end).map((item, offset) => {
          const index = start + offset;
          const active = index === list.cursor;
          return (
            <Text key={`${index}-${item}`} color={active ? "cyan" : undefined}>
              {active ? MARKER : " "} {truncate(item, itemWidth)}
            </Text>
          );
        })
      )}
    </Box>
  );
};
