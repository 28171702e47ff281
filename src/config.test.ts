import { describe, it, expect } from "vitest";
import { getDefaultConfig, loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";

describe("loadConfig", () => {
  it("returns the defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(getDefaultConfig());
  });

  it("reads retry and CLI settings", () => {
    const config = loadConfig({
      RETRY_BASE_DELAY: "5",
      RETRY_MAX_ATTEMPTS: "4",
      AZURE_CLI_PATH: "/opt/az/bin/az",
      AZURE_CLI_TIMEOUT_MS: "60000",
      AZURE_CREDENTIAL_METHOD: "cli",
      AZURE_CI_UTILS_VERBOSE: "true",
    });

    expect(config.retry).toEqual({ maxAttempts: 4, baseDelaySeconds: 5 });
    expect(config.azPath).toBe("/opt/az/bin/az");
    expect(config.cliTimeoutMs).toBe(60000);
    expect(config.credentialMethod).toBe("cli");
    expect(config.diagnostics.verbose).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ RETRY_BASE_DELAY: "  ", AZURE_CLI_PATH: "" }).retry.baseDelaySeconds).toBe(2);
  });

  it("rejects a non-numeric delay", () => {
    let caught: unknown;
    try {
      loadConfig({ RETRY_BASE_DELAY: "soon" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues.some((issue) => issue.startsWith("/retry/baseDelaySeconds"))).toBe(true);
  });

  it("rejects an unknown credential method", () => {
    expect(() => loadConfig({ AZURE_CREDENTIAL_METHOD: "browser" })).toThrow(ConfigError);
  });
});
