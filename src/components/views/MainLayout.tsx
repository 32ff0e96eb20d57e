import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import { currentNamespace, pickerList } from "../../selectors/session";
import type { SessionState } from "../../state/session";
import { assertNever, PODS_PREVIEW_INDEX } from "../../types/domain";
import { sessionHeader } from "../../utils/formatters";
import { CopyPodPanel } from "../CopyPodPanel";
import { ListPanel } from "../ListPanel";
import { TextPanel } from "../TextPanel";
import { StatusBar } from "./StatusBar";

interface MainLayoutProps {
  state: SessionState;
  cols: number;
  rows: number;
}

interface PanelSize {
  width: number;
  rows: number;
}

const PICKER_TITLES = {
  "namespace-picker": "Select Namespace",
  "context-picker": "Select Context",
  "exec-pod-picker": "Select Pod to Exec",
  "copy-pod-picker": "Select Pod to Copy",
} as const;

function renderPanel(state: SessionState, size: PanelSize): React.ReactNode {
  const { navigation, selections, ui } = state;
  const { screen } = navigation;

  switch (screen) {
    case "main-menu": {
      const showPreview =
        navigation.commands.cursor === PODS_PREVIEW_INDEX && ui.output.length > 0;
      return showPreview ? (
        <TextPanel title="Pods Preview" text={ui.output} width={size.width} maxRows={size.rows} />
      ) : (
        <TextPanel title="Welcome" text="" width={size.width} maxRows={size.rows} />
      );
    }
    case "namespace-picker":
    case "context-picker":
    case "exec-pod-picker":
    case "copy-pod-picker":
      return (
        <ListPanel
          title={PICKER_TITLES[screen]}
          list={pickerList(state, screen)}
          width={size.width}
          maxRows={size.rows}
        />
      );
    case "copy-pod-name-input":
      return (
        <CopyPodPanel
          sourcePod={selections.selectedPod}
          inputBuffer={ui.inputBuffer}
          width={size.width}
        />
      );
    case "message":
      return (
        <TextPanel
          title="Message"
          text={ui.message}
          width={size.width}
          maxRows={size.rows}
          color="red"
        />
      );
    case "output":
      return <TextPanel title="Output" text={ui.output} width={size.width} maxRows={size.rows} />;
    default:
      return assertNever(screen);
  }
}

export const MainLayout: React.FC<MainLayoutProps> = ({ state, cols, rows }) => {
  // Header (2) + status bar (2) + panel border and title (3)
  const panelRows = Math.max(1, rows - 7);
  const innerCols = Math.max(20, cols - 2);
  const commandsWidth = Math.floor(innerCols * 0.3);
  const panelWidth = innerCols - commandsWidth;

  const header = sessionHeader(
    state.selections.selectedContext,
    currentNamespace(state),
  );

  return (
    <Box flexDirection="column" paddingX={1} height={rows}>
      <Box borderStyle="single" borderTop={false} borderLeft={false} borderRight={false}>
        <Text>{chalk.bold(header)}</Text>
      </Box>

      <Box flexDirection="row" flexGrow={1}>
        <ListPanel
          title="Commands"
          list={state.navigation.commands}
          width={commandsWidth}
          maxRows={panelRows}
        />
        {renderPanel(state, { width: panelWidth, rows: panelRows })}
      </Box>

      <StatusBar screen={state.navigation.screen} />
    </Box>
  );
};
