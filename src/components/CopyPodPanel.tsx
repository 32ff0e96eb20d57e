import { Box, Text } from "ink";
import React from "react";

interface CopyPodPanelProps {
  sourcePod: string | null;
  inputBuffer: string;
  width: number;
}

export const CopyPodPanel: React.FC<CopyPodPanelProps> = ({
  sourcePod,
  inputBuffer,
  width,
}) => (
  <Box flexDirection="column" width={width} flexGrow={1}>
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor="magenta"
      paddingX={1}
      flexGrow={1}
    >
      <Text>Copying pod: {sourcePod ?? "None"}</Text>
      <Text>Enter new pod name:</Text>
    </Box>
    <Box flexDirection="column" borderStyle="round" borderColor="yellow" paddingX={1}>
      <Text bold>New Pod Name</Text>
      <Text>
        {inputBuffer}
        <Text inverse> </Text>
      </Text>
    </Box>
  </Box>
);
