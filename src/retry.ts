/**
 * Retry Utilities
 *
 * Classification-aware retry with pure exponential backoff. The az CLI exits
 * with status 1 for throttling and for authorization failures alike, so the
 * captured output, not the exit status, decides whether another attempt is
 * worth making.
 */

import { createCommandRunner } from "./cli/wrapper.js";
import { ValidationError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { CommandRunner, RetryOptions, Sleep } from "./types.js";

// =============================================================================
// Failure Classification
// =============================================================================

export type FailureClass =
  | "Permanent"
  | "ScopeLocked"
  | "RateLimited"
  | "ServiceUnavailable"
  | "GatewayTimeout"
  | "InternalError"
  | "Conflict"
  | "Unknown";

export type FailureRule = {
  failureClass: Exclude<FailureClass, "Unknown">;
  pattern: RegExp;
  label: string;
};

/**
 * Evaluated in order; the first matching rule wins. Patterns are case-sensitive.
 */
export const FAILURE_RULES: readonly FailureRule[] = [
  {
    failureClass: "Permanent",
    pattern: /AuthorizationFailed|InvalidAuthenticationToken|Forbidden|InvalidResourceGroupName/,
    label: "Permanent failure",
  },
  { failureClass: "ScopeLocked", pattern: /ScopeLocked/, label: "Scope locked" },
  { failureClass: "RateLimited", pattern: /TooManyRequests|429/, label: "Rate limit (429)" },
  { failureClass: "ServiceUnavailable", pattern: /ServiceUnavailable|503/, label: "Service unavailable (503)" },
  { failureClass: "GatewayTimeout", pattern: /GatewayTimeout|504/, label: "Gateway timeout (504)" },
  { failureClass: "InternalError", pattern: /InternalServerError|500/, label: "Internal server error (500)" },
  { failureClass: "Conflict", pattern: /Conflict|409/, label: "Conflict (409)" },
];

const TERMINAL_FAILURES: ReadonlySet<FailureClass> = new Set(["Permanent", "ScopeLocked"]);

export function classifyFailure(output: string): FailureClass {
  for (const rule of FAILURE_RULES) {
    if (rule.pattern.test(output)) return rule.failureClass;
  }
  return "Unknown";
}

export function failureLabel(failureClass: FailureClass): string {
  return FAILURE_RULES.find((rule) => rule.failureClass === failureClass)?.label ?? "Unknown error";
}

export function isRetryableFailure(failureClass: FailureClass): boolean {
  return !TERMINAL_FAILURES.has(failureClass);
}

// =============================================================================
// Command Retry
// =============================================================================

export const DEFAULT_BASE_DELAY_SECONDS = 2;

export type RetryAttempt = {
  /** 1-based. */
  attempt: number;
  /** Seconds slept before this attempt started. */
  delaySeconds: number;
  output: string;
  exitCode: number;
};

export type CommandRetryResult = {
  succeeded: boolean;
  exitCode: number;
  /** Captured output of the last attempt. */
  output: string;
  attempts: number;
  failureClass?: FailureClass;
  history: RetryAttempt[];
};

export type CommandRetryOptions = Omit<RetryOptions, "maxAttempts"> & {
  maxAttempts: number;
  runner?: CommandRunner;
  logger?: Logger;
  sleep?: Sleep;
};

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ValidationError(`${name} must be a positive integer (got ${value})`);
  }
}

function logOutput(write: (message: string) => void, output: string): void {
  if (output) write(output);
}

/**
 * Run `command` until it exits 0, a terminal failure is detected, or
 * `maxAttempts` is spent. Progress and failure diagnostics go to the logger;
 * the command's own output is returned, never logged on success.
 */
export async function retryAzureOperation(
  description: string,
  command: string[],
  options: CommandRetryOptions,
): Promise<CommandRetryResult> {
  const maxAttempts = options.maxAttempts;
  const baseDelaySeconds = options.baseDelaySeconds ?? DEFAULT_BASE_DELAY_SECONDS;

  assertPositiveInteger("maxAttempts", maxAttempts);
  assertPositiveInteger("baseDelaySeconds", baseDelaySeconds);
  if (!description.trim()) throw new ValidationError("description is required");
  const [executable, ...args] = command;
  if (executable === undefined || !executable.trim()) {
    throw new ValidationError("command is required");
  }

  const runner = options.runner ?? createCommandRunner();
  const logger = options.logger ?? silentLogger;
  const wait = options.sleep ?? sleep;

  const history: RetryAttempt[] = [];
  let delaySeconds = baseDelaySeconds;
  let sleptSeconds = 0;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    logger.info(`Attempt ${attempt}/${maxAttempts}: ${description}`);

    const result = await runner(executable, args);
    history.push({ attempt, delaySeconds: sleptSeconds, output: result.output, exitCode: result.exitCode });

    if (result.exitCode === 0) {
      return { succeeded: true, exitCode: 0, output: result.output, attempts: attempt, history };
    }

    const failureClass = classifyFailure(result.output);
    const failed: CommandRetryResult = {
      succeeded: false,
      exitCode: result.exitCode,
      output: result.output,
      attempts: attempt,
      failureClass,
      history,
    };

    if (failureClass === "Permanent") {
      logger.error(`❌ Permanent failure detected: ${description}`);
      logOutput(logger.error, result.output);
      return failed;
    }

    if (failureClass === "ScopeLocked") {
      logger.error("❌ Resource is locked. Cannot delete while lock is in place.");
      logOutput(logger.error, result.output);
      return failed;
    }

    if (attempt === maxAttempts) {
      logger.error(`❌ Failed after ${maxAttempts} attempts: ${description}`);
      logOutput(logger.error, result.output);
      return failed;
    }

    logger.warn(`⚠️ ${failureLabel(failureClass)} - Retrying in ${delaySeconds}s...`);
    if (failureClass === "Unknown") {
      logger.warn("Error details:");
      logOutput(logger.warn, result.output);
    }

    await wait(delaySeconds * 1000);
    sleptSeconds = delaySeconds;
    delaySeconds *= 2;
  }

  // Unreachable once maxAttempts is validated; kept for the type checker.
  return { succeeded: false, exitCode: 1, output: "", attempts: history.length, history };
}

// =============================================================================
// Function Retry (SDK calls)
// =============================================================================

export type FunctionRetryOptions = RetryOptions & {
  logger?: Logger;
  sleep?: Sleep;
};

function readField(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return key in error ? Reflect.get(error, key) : undefined;
}

/** The string `code` an SDK error carries, such as `SecretNotFound`. */
export function readErrorCode(error: unknown): string | undefined {
  const code = readField(error, "code");
  return typeof code === "string" ? code : undefined;
}

function readStatusCode(error: unknown): number | undefined {
  const status = readField(error, "statusCode") ?? readField(error, "status");
  return typeof status === "number" ? status : undefined;
}

/**
 * Client errors other than timeouts, conflicts and throttling will not heal on
 * their own.
 */
function isClientError(error: unknown): boolean {
  const status = readStatusCode(error);
  if (status === undefined) return false;
  return status >= 400 && status < 500 && status !== 408 && status !== 409 && status !== 429;
}

/**
 * Retry a promise-returning function with the same classification and backoff
 * law as {@link retryAzureOperation}. Rethrows the last error.
 */
export async function withAzureRetry<T>(fn: () => Promise<T>, options?: FunctionRetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const wait = options?.sleep ?? sleep;
  let delaySeconds = options?.baseDelaySeconds ?? DEFAULT_BASE_DELAY_SECONDS;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      const failureClass = classifyFailure(formatErrorMessage(error));
      if (attempt >= maxAttempts) break;
      if (!isRetryableFailure(failureClass) || isClientError(error)) break;

      options?.logger?.warn(`⚠️ ${failureLabel(failureClass)} - Retrying in ${delaySeconds}s...`);
      await wait(delaySeconds * 1000);
      delaySeconds *= 2;
    }
  }

  throw lastError;
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Format an error into a human-readable message: `[code] (HTTP status) message`.
 */
export function formatErrorMessage(error: unknown): string {
  if (error === null || error === undefined) return "Unknown error";
  if (typeof error === "string") return error;

  const code = readField(error, "code");
  const message = readField(error, "message");
  const statusCode = readStatusCode(error);

  const parts: string[] = [];
  if (typeof code === "string" && code) parts.push(`[${code}]`);
  if (statusCode) parts.push(`(HTTP ${statusCode})`);
  parts.push(typeof message === "string" && message ? message : "Unknown error");

  return parts.join(" ");
}
