import { render } from "ink";
import React from "react";
import { NavigationController } from "./commands/navigation-controller";
import { App } from "./components/App";
import { ErrorBoundary } from "./components/ErrorBoundary";
import { applyCLIOverrides, parseCLIArgs, USAGE } from "./config/cli-config";
import { readKubenavConfig } from "./config/kubenav-config";
import { SessionProvider } from "./contexts/SessionContext";
import { enterExternal, exitExternal, setupAlternateScreen } from "./ink-control";
import { errorMessage } from "./services/backend-errors";
import { KubectlClient } from "./services/kubectl-client";
import { getLogger, initializeLogger, log } from "./services/logger";
import { createSessionStore } from "./services/session-service";
import { readPackageVersion } from "./utils/version";

async function main(): Promise<number> {
  const parsed = parseCLIArgs(process.argv.slice(2));
  if (parsed.isErr()) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 2;
  }
  const options = parsed.value;

  if (options.version) {
    console.log(await readPackageVersion());
    return 0;
  }
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const loggerResult = await initializeLogger();
  if (loggerResult.isErr()) {
    console.error(`❌ Failed to initialize logger: ${loggerResult.error.message}`);
    return 1;
  }
  const logger = loggerResult.value;
  log.info("kubenav session started", "main", {
    sessionId: logger.getSessionId(),
    logFile: logger.getLogFilePath(),
  });

  const config = applyCLIOverrides(await readKubenavConfig(), options);
  const backend = new KubectlClient({
    ...config,
    onEnterExternal: () => enterExternal(),
    onExitExternal: () => exitExternal(),
  });
  const store = await createSessionStore(backend, config);
  const controller = new NavigationController(store, backend);

  const restoreScreen = setupAlternateScreen();
  try {
    const instance = render(
      <ErrorBoundary>
        <SessionProvider store={store}>
          <App controller={controller} />
        </SessionProvider>
      </ErrorBoundary>,
    );
    await instance.waitUntilExit();
    log.info("kubenav session ended", "main");
    return 0;
  } catch (error) {
    log.error("Application exited with an error", "main", {
      message: errorMessage(error),
    });
    console.error("❌ kubenav crashed:", errorMessage(error));
    return 1;
  } finally {
    restoreScreen();
  }
}

main()
  .then(async (code) => {
    await getLogger()?.close();
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error("❌ Failed to start kubenav:", error);
    process.exit(1);
  });
