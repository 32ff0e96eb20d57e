import { EventEmitter } from "node:events";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  ALT_SCREEN_OFF,
  ALT_SCREEN_ON,
  setupAlternateScreen,
} from "../ink-control";

function fakeStdout(isTTY = true) {
  return { isTTY, write: vi.fn((_chunk: string) => true) };
}

function fakeProcess() {
  return Object.assign(new EventEmitter(), {
    exit: vi.fn((_code: number) => {}),
  });
}

describe("setupAlternateScreen", () => {
  let stdout: ReturnType<typeof fakeStdout>;
  let proc: ReturnType<typeof fakeProcess>;

  beforeEach(() => {
    stdout = fakeStdout();
    proc = fakeProcess();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const written = () => stdout.write.mock.calls.map(([chunk]) => chunk);

  test("should do nothing without a TTY", () => {
    stdout = fakeStdout(false);

    setupAlternateScreen(stdout, proc);

    expect(stdout.write).not.toHaveBeenCalled();
    expect(proc.listenerCount("SIGTERM")).toBe(0);
  });

  test("should enter the alternate screen and leave it once", () => {
    const restore = setupAlternateScreen(stdout, proc);
    restore();
    restore();
    proc.emit("exit");

    expect(written()).toEqual([ALT_SCREEN_ON, ALT_SCREEN_OFF]);
  });

  test.each([
    ["SIGINT", 130],
    ["SIGTERM", 143],
    ["SIGHUP", 129],
  ])("should restore the screen and exit on %s", (signal, code) => {
    setupAlternateScreen(stdout, proc);

    proc.emit(signal);

    expect(written()).toEqual([ALT_SCREEN_ON, ALT_SCREEN_OFF]);
    expect(proc.exit).toHaveBeenCalledWith(code);
  });

  test.each(["uncaughtException", "unhandledRejection"])(
    "should restore the screen and exit 1 on %s",
    (event) => {
      const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
      const crash = new Error("render loop failed");
      setupAlternateScreen(stdout, proc);

      proc.emit(event, crash);

      expect(written()).toEqual([ALT_SCREEN_ON, ALT_SCREEN_OFF]);
      expect(consoleError).toHaveBeenCalledWith(crash);
      expect(proc.exit).toHaveBeenCalledWith(1);
    },
  );
});
