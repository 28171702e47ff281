/**
 * Azure CLI Wrapper
 *
 * Runs external commands (the `az` CLI above all) and reports their output and
 * exit status without throwing.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { CommandResult, CommandRunner } from "../types.js";

const execFileAsync = promisify(execFile);

// Policy state listings for a busy resource group run to several megabytes.
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;

// =============================================================================
// Types
// =============================================================================

export type CommandOptions = {
  /** Timeout in ms; 0 waits indefinitely. */
  timeoutMs?: number;
  /** Working directory. */
  cwd?: string;
};

export type AzureOutputFormat = "json" | "tsv" | "none";

export type AzureCLIOptions = {
  /** Path to az CLI binary. */
  azPath?: string;
  /** Timeout in ms; 0 waits indefinitely. */
  timeoutMs?: number;
  /** Replaces process execution, mainly for tests. */
  runner?: CommandRunner;
};

export type AzureCLIResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  parsed?: unknown;
};

// =============================================================================
// Process Execution
// =============================================================================

/** stdout followed by stderr, each without trailing whitespace. */
export function combineOutput(stdout: string, stderr: string): string {
  return [stdout.trimEnd(), stderr.trimEnd()].filter((part) => part.length > 0).join("\n");
}

function readExecFailure(error: unknown): Omit<CommandResult, "output"> {
  if (typeof error !== "object" || error === null) {
    return { exitCode: 1, stdout: "", stderr: String(error ?? "Unknown error") };
  }

  const stdout = "stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
  const message = "message" in error && typeof error.message === "string" ? error.message : "";
  const code = "code" in error ? error.code : undefined;

  let exitCode = 1;
  if (typeof code === "number" && code !== 0) exitCode = code;
  // spawn failures carry an errno string instead of an exit status
  else if (code === "ENOENT") exitCode = 127;

  return {
    exitCode,
    stdout,
    stderr: stderr || (stdout ? "" : message || "Unknown error"),
  };
}

/**
 * Run an executable with an argument vector. Never rejects: a failed process
 * resolves with its exit status and captured output.
 */
export async function runCommand(
  command: string,
  args: string[],
  options?: CommandOptions,
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      encoding: "utf8",
      timeout: options?.timeoutMs ?? 0,
      cwd: options?.cwd,
      env: process.env,
      maxBuffer: MAX_BUFFER_BYTES,
    });
    return { exitCode: 0, stdout, stderr, output: combineOutput(stdout, stderr) };
  } catch (error) {
    const failure = readExecFailure(error);
    return { ...failure, output: combineOutput(failure.stdout, failure.stderr) };
  }
}

export function createCommandRunner(options?: CommandOptions): CommandRunner {
  return (command, args) => runCommand(command, args, options);
}

// =============================================================================
// AzureCLIWrapper
// =============================================================================

export class AzureCLIWrapper {
  readonly azPath: string;
  private runner: CommandRunner;

  constructor(options?: AzureCLIOptions) {
    this.azPath = options?.azPath ?? "az";
    this.runner = options?.runner ?? createCommandRunner({ timeoutMs: options?.timeoutMs ?? 0 });
  }

  /**
   * Execute an az CLI command with the given output format.
   * JSON output is parsed into `parsed` when it is valid JSON.
   */
  async execute(args: string[], output: AzureOutputFormat = "json"): Promise<AzureCLIResult> {
    const result = await this.runner(this.azPath, [...args, "--output", output]);

    if (result.exitCode !== 0) {
      return {
        success: false,
        stdout: result.stdout,
        stderr: result.stderr || result.output || "Unknown error",
        exitCode: result.exitCode,
      };
    }

    let parsed: unknown;
    if (output === "json" && result.stdout.trim()) {
      try {
        parsed = JSON.parse(result.stdout);
      } catch {
        // az printed something that is not JSON; callers treat parsed as absent
        parsed = undefined;
      }
    }

    return { success: true, stdout: result.stdout, stderr: result.stderr, exitCode: 0, parsed };
  }

  /**
   * Execute a command whose single value is printed as TSV and return it trimmed.
   */
  async executeValue(args: string[]): Promise<AzureCLIResult & { value: string }> {
    const result = await this.execute(args, "tsv");
    return { ...result, value: result.success ? result.stdout.trim() : "" };
  }

  /**
   * Check if az CLI is installed and available.
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.execute(["version"]);
    return result.success;
  }

  /**
   * Get the currently logged-in account info.
   */
  async getAccount(): Promise<AzureCLIResult> {
    return this.execute(["account", "show"]);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCLIWrapper(options?: AzureCLIOptions): AzureCLIWrapper {
  return new AzureCLIWrapper(options);
}
