import { Box, Text, useApp, useInput } from "ink";
import React from "react";
import { getLogger, log } from "../services/logger";

interface ErrorBoundaryState {
  error: Error | null;
}

interface ErrorBoundaryProps {
  children: React.ReactNode;
}

export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  constructor(props: ErrorBoundaryProps) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: React.ErrorInfo) {
    log.error("React render error", "error-boundary", {
      message: error.message,
      stack: error.stack,
      componentStack: errorInfo.componentStack,
    });
  }

  render() {
    if (this.state.error) {
      return <ErrorDisplay error={this.state.error} />;
    }
    return this.props.children;
  }
}

function ErrorDisplay({ error }: { error: Error }) {
  const { exit } = useApp();
  const logFile = getLogger()?.getLogFilePath();

  useInput((input, key) => {
    if (input === "q" || key.escape) {
      exit(error);
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="red" paddingX={1}>
      <Text color="red" bold>
        Crash detected
      </Text>
      <Text>{error.message}</Text>
      {logFile && <Text dimColor>Details in {logFile}</Text>}
      <Text dimColor>Press q or Esc to exit</Text>
    </Box>
  );
}
