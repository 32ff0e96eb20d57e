import { Box, Text } from "ink";
import React from "react";
import { assertNever, type Screen } from "../../types/domain";

export function statusHint(screen: Screen): string {
  switch (screen) {
    case "namespace-picker":
    case "context-picker":
    case "exec-pod-picker":
    case "copy-pod-picker":
      return "[↑/↓ or j/k] Navigate  [Enter/Right] Select  [Esc] Back  [q] Quit";
    case "copy-pod-name-input":
      return "[Enter] Submit  [Esc] Back  [q] Quit";
    case "message":
    case "output":
      return "Press any key to return to main menu, or [q] Quit";
    case "main-menu":
      return "[↑/↓ or j/k] Navigate  [Enter/Right] Select  [q] Quit";
    default:
      return assertNever(screen);
  }
}

export const StatusBar: React.FC<{ screen: Screen }> = ({ screen }) => (
  <Box borderStyle="single" borderBottom={false} borderLeft={false} borderRight={false}>
    <Text dimColor>{statusHint(screen)}</Text>
  </Box>
);
