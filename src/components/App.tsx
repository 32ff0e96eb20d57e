import { useApp, useInput } from "ink";
import React, { useEffect, useState } from "react";
import type { NavigationController } from "../commands/navigation-controller";
import { toKeyEvent } from "../commands/handlers/keyboard";
import { useSession } from "../contexts/SessionContext";
import { errorMessage } from "../services/backend-errors";
import { log } from "../services/logger";
import { MainLayout } from "./views/MainLayout";

interface AppProps {
  controller: NavigationController;
}

function useTerminalSize(): { rows: number; cols: number } {
  const [size, setSize] = useState({
    rows: process.stdout.rows || 24,
    cols: process.stdout.columns || 80,
  });

  useEffect(() => {
    const onResize = () => {
      setSize({
        rows: process.stdout.rows || 24,
        cols: process.stdout.columns || 80,
      });
    };
    process.stdout.on("resize", onResize);
    return () => {
      process.stdout.off("resize", onResize);
    };
  }, []);

  return size;
}

export const App: React.FC<AppProps> = ({ controller }) => {
  const { exit } = useApp();
  const state = useSession();
  const { rows, cols } = useTerminalSize();

  useInput((input, key) => {
    controller
      .handleKey(toKeyEvent(input, key))
      .then((outcome) => {
        if (outcome === "quit") exit();
      })
      .catch((error: unknown) => {
        log.error("Unhandled error while processing key", "app", {
          message: errorMessage(error),
        });
      });
  });

  return <MainLayout state={state} rows={rows - 1} cols={cols} />;
};
