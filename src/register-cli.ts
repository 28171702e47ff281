/**
 * Command line: `azure-ci-utils <group> <command>`.
 *
 * Payload (command output, Markdown, JSON, secret values) goes to `out`;
 * progress and diagnostics go to the logger. Actions never throw: a failure is
 * logged and turned into a non-zero exit code.
 */

import { Command, InvalidArgumentError } from "commander";
import type { AzureCLIWrapper } from "./cli/wrapper.js";
import { createCLIWrapper, createCommandRunner } from "./cli/wrapper.js";
import { createCleanupManager, parseTagFilter, type ResourceCleanupManager } from "./cleanup/manager.js";
import type { AppConfig } from "./config.js";
import { createCredentialsManager } from "./credentials/manager.js";
import { createKeyVaultManager, type AzureKeyVaultManager } from "./keyvault/manager.js";
import type { Logger } from "./logger.js";
import { createPolicyManager, type AzurePolicyManager } from "./policy/manager.js";
import { formatErrorMessage, retryAzureOperation, sleep as defaultSleep } from "./retry.js";
import type { CommandRunner, Sleep } from "./types.js";
import { createDeploymentVerifier, type DeploymentVerifier } from "./verification/manager.js";
import { VERSION } from "./version.js";

// =============================================================================
// Types
// =============================================================================

export type CliServices = {
  /** Runs the command given to `retry`. */
  runner: CommandRunner;
  sleep: Sleep;
  cli: AzureCLIWrapper;
  policy: AzurePolicyManager;
  keyVault: AzureKeyVaultManager;
  verifier: DeploymentVerifier;
  cleanup: ResourceCleanupManager;
};

export type CliContext = {
  program: Command;
  config: AppConfig;
  logger: Logger;
  services: CliServices;
  /** Writes one payload chunk to stdout. */
  out: (text: string) => void;
  setExitCode: (code: number) => void;
};

// =============================================================================
// Wiring
// =============================================================================

export function createCliServices(config: AppConfig, logger: Logger): CliServices {
  const runner = createCommandRunner({ timeoutMs: config.cliTimeoutMs });
  const cli = createCLIWrapper({ azPath: config.azPath, runner });
  const retry = { maxAttempts: config.retry.maxAttempts, baseDelaySeconds: config.retry.baseDelaySeconds };

  return {
    runner,
    sleep: defaultSleep,
    cli,
    policy: createPolicyManager(cli, { logger }),
    keyVault: createKeyVaultManager(createCredentialsManager({ credentialMethod: config.credentialMethod }), {
      retry,
      logger,
    }),
    verifier: createDeploymentVerifier(cli, {
      logger,
      healthCheckPath: config.healthCheck.path,
      healthCheckTimeoutMs: config.healthCheck.timeoutMs,
      urlCheckTimeoutMs: config.urlCheckTimeoutMs,
    }),
    cleanup: createCleanupManager(cli, { logger, retry, runner }),
  };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

// =============================================================================
// Commands
// =============================================================================

export function registerCli(ctx: CliContext): void {
  const { program, config, logger, services, out, setExitCode } = ctx;

  const run = async (label: string, action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (error) {
      logger.error(`❌ ${label}: ${formatErrorMessage(error)}`);
      setExitCode(1);
    }
  };

  // --- retry ---

  program
    .command("retry")
    .description("Run a command, retrying transient Azure failures with exponential backoff")
    .argument("<description>", "What the command does, for progress messages")
    .argument("<command...>", "Executable and arguments")
    .option("--max-attempts <n>", "Attempts before giving up", parsePositiveInt, config.retry.maxAttempts)
    .option("--base-delay <seconds>", "Delay before the second attempt", parsePositiveInt, config.retry.baseDelaySeconds)
    .passThroughOptions()
    .action(async (description: string, command: string[], opts: { maxAttempts: number; baseDelay: number }) => {
      await run("Retry failed", async () => {
        const result = await retryAzureOperation(description, command, {
          maxAttempts: opts.maxAttempts,
          baseDelaySeconds: opts.baseDelay,
          runner: services.runner,
          logger,
          sleep: services.sleep,
        });
        if (result.succeeded && result.output) out(result.output);
        setExitCode(result.exitCode);
      });
    });

  // --- policy ---

  const policy = program.command("policy").description("Azure Policy compliance for a resource group");

  policy
    .command("report <resourceGroup>")
    .description("Markdown policy status report (for CI step summaries)")
    .action(async (resourceGroup: string) => {
      await run("Failed to generate policy report", async () => {
        out(await services.policy.generateReport(resourceGroup));
      });
    });

  policy
    .command("assignments <resourceGroup>")
    .description("Policy assignments with their compliance state, as JSON")
    .action(async (resourceGroup: string) => {
      await run("Failed to list policy assignments", async () => {
        out(toJson(await services.policy.getAssignmentsWithCompliance(resourceGroup)));
      });
    });

  policy
    .command("exemptions <resourceGroup>")
    .description("Policy exemptions, as JSON")
    .action(async (resourceGroup: string) => {
      await run("Failed to list policy exemptions", async () => {
        out(toJson(await services.policy.getExemptions(resourceGroup)));
      });
    });

  policy
    .command("noncompliant <resourceGroup> <assignment>")
    .description("Resources that are non-compliant with one assignment, as JSON")
    .action(async (resourceGroup: string, assignment: string) => {
      await run("Failed to list non-compliant resources", async () => {
        out(toJson(await services.policy.getNonCompliantResources(resourceGroup, assignment)));
      });
    });

  // --- keyvault ---

  const keyvault = program.command("keyvault").description("Key Vault secrets");

  keyvault
    .command("set <vault> <name> <value>")
    .description("Create or update a secret")
    .option("--content-type <type>", "Content type stored with the secret")
    .action(async (vault: string, name: string, value: string, opts: { contentType?: string }) => {
      await run("Failed to set secret", async () => {
        await services.keyVault.setSecret(vault, name, value, opts.contentType);
        logger.info(`✅ Secret ${name} set in ${vault}`);
      });
    });

  keyvault
    .command("get <vault> <name>")
    .description("Print a secret's value")
    .action(async (vault: string, name: string) => {
      await run("Failed to get secret", async () => {
        const secret = await services.keyVault.getSecret(vault, name);
        if (!secret) {
          logger.error(`❌ Secret ${name} not found in ${vault}`);
          setExitCode(1);
          return;
        }
        out(secret.value ?? "");
      });
    });

  keyvault
    .command("verify <vault> <name> <expected>")
    .description("Check that a secret holds the expected value")
    .action(async (vault: string, name: string, expected: string) => {
      await run("Failed to verify secret", async () => {
        const result = await services.keyVault.verifySecret(vault, name, expected);
        if (result.matches) {
          logger.info(`✅ ${result.message}`);
        } else {
          logger.error(`❌ ${result.message}`);
          setExitCode(1);
        }
      });
    });

  keyvault
    .command("update <vault> <name> <value>")
    .description("Set a secret and verify it reads back")
    .action(async (vault: string, name: string, value: string) => {
      await run("Failed to update secret", async () => {
        const result = await services.keyVault.updateAndVerifySecret(vault, name, value);
        if (!result.matches) setExitCode(1);
      });
    });

  // --- verify ---

  const verify = program.command("verify").description("Post-deployment verification");

  verify
    .command("deployment")
    .description("Check a Function App deployment and its dependencies")
    .requiredOption("--function-app <name>", "Function App name")
    .requiredOption("--storage-account <name>", "Storage account name")
    .requiredOption("--app-insights <name>", "Application Insights component name")
    .requiredOption("--resource-group <rg>", "Resource group")
    .requiredOption("--url <url>", "Function App base URL")
    .option("--json", "Print the check results as JSON")
    .action(
      async (opts: {
        functionApp: string;
        storageAccount: string;
        appInsights: string;
        resourceGroup: string;
        url: string;
        json?: boolean;
      }) => {
        await run("Deployment verification failed", async () => {
          const result = await services.verifier.verifyDeployment({
            functionAppName: opts.functionApp,
            storageAccountName: opts.storageAccount,
            appInsightsName: opts.appInsights,
            resourceGroup: opts.resourceGroup,
            functionAppUrl: opts.url,
          });
          if (opts.json) out(toJson(result));
          if (!result.passed) setExitCode(1);
        });
      },
    );

  verify
    .command("url <url>")
    .description("Check that a URL answers with 2xx or 3xx")
    .action(async (url: string) => {
      await run("URL check failed", async () => {
        const result = await services.verifier.testUrlAccessible(url);
        if (result.passed) {
          logger.info(`✅ ${result.message}`);
        } else {
          setExitCode(1);
        }
      });
    });

  // --- cleanup ---

  program
    .command("cleanup")
    .description("Delete every resource group carrying a tag")
    .requiredOption("--tag <key=value>", "Tag filter")
    .option("--dry-run", "List the matching groups without deleting them")
    .action(async (opts: { tag: string; dryRun?: boolean }) => {
      await run("Cleanup failed", async () => {
        const summary = await services.cleanup.destroyTagged(parseTagFilter(opts.tag), { dryRun: opts.dryRun });
        out(toJson(summary));
        if (summary.outcomes.some((o) => o.status === "failed")) setExitCode(1);
      });
    });
}

/**
 * The root program with every command registered.
 */
export function createProgram(ctx: Omit<CliContext, "program">): Command {
  const program = new Command("azure-ci-utils")
    .description("Azure helpers for CI pipelines")
    .version(VERSION)
    .enablePositionalOptions();

  registerCli({ ...ctx, program });
  return program;
}
