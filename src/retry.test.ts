/**
 * Retry Tests
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  classifyFailure,
  failureLabel,
  isRetryableFailure,
  retryAzureOperation,
  withAzureRetry,
  formatErrorMessage,
} from "./retry.js";
import { ValidationError } from "./errors.js";
import type { CommandResult } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function outcome(exitCode: number, output: string): CommandResult {
  return exitCode === 0
    ? { exitCode, stdout: output, stderr: "", output }
    : { exitCode, stdout: "", stderr: output, output };
}

function scriptedRunner(outcomes: CommandResult[]) {
  let call = 0;
  return vi.fn(async (_command: string, _args: string[]): Promise<CommandResult> => {
    const next = outcomes[Math.min(call, outcomes.length - 1)];
    call++;
    if (!next) throw new Error("no scripted outcome");
    return next;
  });
}

function createTestLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function messages(fn: { mock: { calls: unknown[][] } }): unknown[] {
  return fn.mock.calls.map((call) => call[0]);
}

const noSleep = () => vi.fn(async (_ms: number) => {});

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

describe("classifyFailure", () => {
  it.each([
    ["ERROR: (AuthorizationFailed) The client does not have authorization", "Permanent"],
    ["ERROR: (InvalidAuthenticationToken) The access token is invalid", "Permanent"],
    ["Operation returned an invalid status 'Forbidden'", "Permanent"],
    ["ERROR: (InvalidResourceGroupName) Resource group name is invalid", "Permanent"],
    ["ERROR: (ScopeLocked) The scope cannot perform delete operation", "ScopeLocked"],
    ["ERROR: (TooManyRequests) Too many requests", "RateLimited"],
    ["Operation returned status code 429", "RateLimited"],
    ["ERROR: (ServiceUnavailable) try again later", "ServiceUnavailable"],
    ["HTTP 503 from upstream", "ServiceUnavailable"],
    ["ERROR: (GatewayTimeout) no response", "GatewayTimeout"],
    ["status 504", "GatewayTimeout"],
    ["ERROR: (InternalServerError) oops", "InternalError"],
    ["status 500", "InternalError"],
    ["ERROR: (Conflict) Another operation is in progress", "Conflict"],
    ["status 409", "Conflict"],
    ["ERROR: something unexpected happened", "Unknown"],
    ["", "Unknown"],
  ])("classifies %j as %s", (output, expected) => {
    expect(classifyFailure(output)).toBe(expected);
  });

  it("matches patterns case-sensitively", () => {
    expect(classifyFailure("forbidden")).toBe("Unknown");
    expect(classifyFailure("scopelocked")).toBe("Unknown");
  });

  it("gives permanent failures precedence over transient codes in the same text", () => {
    expect(classifyFailure("(AuthorizationFailed) after 429 from gateway")).toBe("Permanent");
    expect(classifyFailure("(ScopeLocked) returned 409")).toBe("ScopeLocked");
  });

  it("labels each class for warnings", () => {
    expect(failureLabel("RateLimited")).toBe("Rate limit (429)");
    expect(failureLabel("ServiceUnavailable")).toBe("Service unavailable (503)");
    expect(failureLabel("GatewayTimeout")).toBe("Gateway timeout (504)");
    expect(failureLabel("InternalError")).toBe("Internal server error (500)");
    expect(failureLabel("Conflict")).toBe("Conflict (409)");
    expect(failureLabel("Unknown")).toBe("Unknown error");
  });

  it("treats only Permanent and ScopeLocked as terminal", () => {
    expect(isRetryableFailure("Permanent")).toBe(false);
    expect(isRetryableFailure("ScopeLocked")).toBe(false);
    expect(isRetryableFailure("RateLimited")).toBe(true);
    expect(isRetryableFailure("Conflict")).toBe(true);
    expect(isRetryableFailure("Unknown")).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// retryAzureOperation
// ---------------------------------------------------------------------------

describe("retryAzureOperation", () => {
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    logger = createTestLogger();
  });

  it("returns the output of a first-attempt success without sleeping", async () => {
    const runner = scriptedRunner([outcome(0, '{"id":"rg-1"}')]);
    const sleep = noSleep();

    const result = await retryAzureOperation("Show group", ["az", "group", "show", "--name", "rg-1"], {
      maxAttempts: 3,
      runner,
      logger,
      sleep,
    });

    expect(result.succeeded).toBe(true);
    expect(result.attempts).toBe(1);
    expect(result.exitCode).toBe(0);
    expect(result.output).toBe('{"id":"rg-1"}');
    expect(result.history).toEqual([{ attempt: 1, delaySeconds: 0, output: '{"id":"rg-1"}', exitCode: 0 }]);
    expect(sleep).not.toHaveBeenCalled();
    expect(runner).toHaveBeenCalledWith("az", ["group", "show", "--name", "rg-1"]);
    expect(messages(logger.info)).toEqual(["Attempt 1/3: Show group"]);
    expect(logger.error).not.toHaveBeenCalled();
  });

  it.each([
    "AuthorizationFailed",
    "Forbidden",
    "InvalidAuthenticationToken",
    "InvalidResourceGroupName",
    "ScopeLocked",
  ])("makes exactly one attempt when the output contains %s", async (marker) => {
    const runner = scriptedRunner([outcome(3, `ERROR: (${marker}) denied`)]);
    const sleep = noSleep();

    const result = await retryAzureOperation("Delete group", ["az", "group", "delete"], {
      maxAttempts: 5,
      runner,
      logger,
      sleep,
    });

    expect(result.succeeded).toBe(false);
    expect(result.attempts).toBe(1);
    expect(result.exitCode).toBe(3);
    expect(runner).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("reports a permanent failure with its output on the diagnostic channel", async () => {
    const runner = scriptedRunner([outcome(1, "ERROR: (AuthorizationFailed) no access")]);

    const result = await retryAzureOperation("List vaults", ["az", "keyvault", "list"], {
      maxAttempts: 3,
      runner,
      logger,
      sleep: noSleep(),
    });

    expect(result.failureClass).toBe("Permanent");
    expect(messages(logger.error)).toEqual([
      "❌ Permanent failure detected: List vaults",
      "ERROR: (AuthorizationFailed) no access",
    ]);
  });

  it("reports a scope lock distinctly", async () => {
    const runner = scriptedRunner([outcome(1, "ERROR: (ScopeLocked) locked")]);

    const result = await retryAzureOperation("Delete group", ["az", "group", "delete"], {
      maxAttempts: 3,
      runner,
      logger,
      sleep: noSleep(),
    });

    expect(result.failureClass).toBe("ScopeLocked");
    expect(messages(logger.error)[0]).toBe("❌ Resource is locked. Cannot delete while lock is in place.");
  });

  it("spends every attempt on retryable failures with doubling delays", async () => {
    const runner = scriptedRunner([outcome(1, "ERROR: (ServiceUnavailable) busy")]);
    const sleep = noSleep();

    const result = await retryAzureOperation("Create group", ["az", "group", "create"], {
      maxAttempts: 4,
      baseDelaySeconds: 3,
      runner,
      logger,
      sleep,
    });

    expect(result.succeeded).toBe(false);
    expect(result.attempts).toBe(4);
    expect(result.exitCode).toBe(1);
    expect(result.failureClass).toBe("ServiceUnavailable");
    expect(runner).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([3000, 6000, 12000]);
    expect(result.history.map((attempt) => attempt.delaySeconds)).toEqual([0, 3, 6, 12]);
    expect(messages(logger.error)).toEqual([
      "❌ Failed after 4 attempts: Create group",
      "ERROR: (ServiceUnavailable) busy",
    ]);
  });

  it("uses a two second base delay by default", async () => {
    const runner = scriptedRunner([outcome(1, "status 504")]);
    const sleep = noSleep();

    await retryAzureOperation("Probe", ["az", "version"], { maxAttempts: 3, runner, logger, sleep });

    expect(sleep.mock.calls.map((call) => call[0])).toEqual([2000, 4000]);
  });

  it("recovers after a rate limit and an outage with two distinct warnings", async () => {
    const runner = scriptedRunner([
      outcome(1, "ERROR: (TooManyRequests) slow down"),
      outcome(1, "ERROR: (ServiceUnavailable) busy"),
      outcome(0, "done"),
    ]);
    const sleep = noSleep();

    const result = await retryAzureOperation("Tag group", ["az", "group", "update"], {
      maxAttempts: 5,
      runner,
      logger,
      sleep,
    });

    expect(result.succeeded).toBe(true);
    expect(result.attempts).toBe(3);
    expect(result.output).toBe("done");
    expect(messages(logger.warn)).toEqual([
      "⚠️ Rate limit (429) - Retrying in 2s...",
      "⚠️ Service unavailable (503) - Retrying in 4s...",
    ]);
    expect(messages(logger.info)).toEqual([
      "Attempt 1/5: Tag group",
      "Attempt 2/5: Tag group",
      "Attempt 3/5: Tag group",
    ]);
  });

  it("echoes the raw output when the failure cannot be classified", async () => {
    const runner = scriptedRunner([outcome(2, "ERROR: mystery"), outcome(0, "ok")]);

    await retryAzureOperation("Mystery", ["az", "thing"], { maxAttempts: 2, runner, logger, sleep: noSleep() });

    expect(messages(logger.warn)).toEqual([
      "⚠️ Unknown error - Retrying in 2s...",
      "Error details:",
      "ERROR: mystery",
    ]);
  });

  it("validates arguments before running anything", async () => {
    const runner = scriptedRunner([outcome(0, "")]);

    await expect(retryAzureOperation("x", ["az"], { maxAttempts: 0, runner })).rejects.toBeInstanceOf(ValidationError);
    await expect(retryAzureOperation("x", ["az"], { maxAttempts: 2, baseDelaySeconds: 0, runner })).rejects.toThrow(
      "baseDelaySeconds must be a positive integer (got 0)",
    );
    await expect(retryAzureOperation("  ", ["az"], { maxAttempts: 2, runner })).rejects.toThrow("description is required");
    await expect(retryAzureOperation("x", [], { maxAttempts: 2, runner })).rejects.toThrow("command is required");
    expect(runner).not.toHaveBeenCalled();
  });
});

// ---------------------------------------------------------------------------
// withAzureRetry
// ---------------------------------------------------------------------------

describe("withAzureRetry", () => {
  it("returns result on success", async () => {
    const fn = vi.fn().mockResolvedValue("ok");
    const result = await withAzureRetry(fn, { sleep: noSleep() });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("retries on retryable error and succeeds", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce({ code: "TooManyRequests", statusCode: 429 })
      .mockResolvedValue("ok");
    const sleep = noSleep();

    const result = await withAzureRetry(fn, { maxAttempts: 3, baseDelaySeconds: 1, sleep });
    expect(result).toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
  });

  it("throws after exhausting retries", async () => {
    const error = { code: "ServiceUnavailable", statusCode: 503, message: "Down" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn, { maxAttempts: 2, sleep: noSleep() })).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent failures", async () => {
    const error = { code: "Forbidden", statusCode: 403, message: "Access denied" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn, { maxAttempts: 3, sleep: noSleep() })).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("does not retry client errors", async () => {
    const error = { code: "VaultNotFound", statusCode: 404, message: "Not found" };
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withAzureRetry(fn, { maxAttempts: 3, sleep: noSleep() })).rejects.toEqual(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

// ---------------------------------------------------------------------------
// formatErrorMessage
// ---------------------------------------------------------------------------

describe("formatErrorMessage", () => {
  it("handles null/undefined", () => {
    expect(formatErrorMessage(null)).toBe("Unknown error");
    expect(formatErrorMessage(undefined)).toBe("Unknown error");
  });

  it("handles string errors", () => {
    expect(formatErrorMessage("boom")).toBe("boom");
  });

  it("formats error with code and status", () => {
    expect(formatErrorMessage({ code: "Forbidden", statusCode: 403, message: "Access denied" })).toBe(
      "[Forbidden] (HTTP 403) Access denied",
    );
  });

  it("formats Error instances", () => {
    expect(formatErrorMessage(new Error("spawn az ENOENT"))).toBe("spawn az ENOENT");
  });
});
