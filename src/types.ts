/**
 * Shared Types
 *
 * Core type definitions used across the CI utility modules.
 */

// =============================================================================
// Command Execution
// =============================================================================

/**
 * Outcome of one external process invocation.
 * `output` is stdout followed by stderr, the text failure classification runs on.
 */
export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  output: string;
};

/** Runs an executable with an argument vector and resolves with its result. */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

// =============================================================================
// Retry Configuration
// =============================================================================

export type RetryOptions = {
  maxAttempts?: number;
  /** Delay before the second attempt; doubles after every retry. */
  baseDelaySeconds?: number;
};

export type Sleep = (ms: number) => Promise<void>;

// =============================================================================
// Common Result Types
// =============================================================================

export type CheckResult = {
  name: string;
  passed: boolean;
  message: string;
};

export type TagFilter = {
  key: string;
  value: string;
};
