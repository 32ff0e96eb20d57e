import { describe, expect, test } from "vitest";
import { applyCLIOverrides, parseCLIArgs } from "../../config/cli-config";
import { DEFAULT_CONFIG } from "../../config/kubenav-config";

describe("parseCLIArgs", () => {
  test("should default to no flags", () => {
    expect(parseCLIArgs([])._unsafeUnwrap()).toEqual({ help: false, version: false });
  });

  test("should read help and version", () => {
    expect(parseCLIArgs(["-h"])._unsafeUnwrap().help).toBe(true);
    expect(parseCLIArgs(["--version"])._unsafeUnwrap().version).toBe(true);
  });

  test("should read value flags in both forms", () => {
    const options = parseCLIArgs([
      "-n",
      "team-a",
      "--kubectl=/opt/bin/kubectl",
      "--kubeconfig",
      "/tmp/test-kubeconfig",
    ])._unsafeUnwrap();

    expect(options).toEqual({
      help: false,
      version: false,
      namespace: "team-a",
      kubectl: "/opt/bin/kubectl",
      kubeconfig: "/tmp/test-kubeconfig",
    });
  });

  test("should reject unknown options", () => {
    expect(parseCLIArgs(["--watch"])._unsafeUnwrapErr()).toBe("Unknown option: --watch");
  });

  test("should reject a missing value", () => {
    expect(parseCLIArgs(["-n"])._unsafeUnwrapErr()).toBe("Option -n requires a value");
    expect(parseCLIArgs(["--namespace", "--help"])._unsafeUnwrapErr()).toBe(
      "Option --namespace requires a value",
    );
    expect(parseCLIArgs(["--kubeconfig="])._unsafeUnwrapErr()).toBe(
      "Option --kubeconfig requires a value",
    );
  });
});

describe("applyCLIOverrides", () => {
  test("should let flags win over the config file", () => {
    const config = applyCLIOverrides(
      { ...DEFAULT_CONFIG, defaultNamespace: "from-file" },
      { help: false, version: false, namespace: "team-a", kubectl: "/opt/bin/kubectl" },
    );

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      defaultNamespace: "team-a",
      kubectlPath: "/opt/bin/kubectl",
    });
  });

  test("should leave the config alone without flags", () => {
    expect(applyCLIOverrides(DEFAULT_CONFIG, { help: false, version: false })).toEqual(
      DEFAULT_CONFIG,
    );
  });
});
