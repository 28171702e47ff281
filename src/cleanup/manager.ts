/**
 * Resource Cleanup Manager
 *
 * Tears down ephemeral environments by tag. Deletions run one group at a time
 * through retryAzureOperation so a throttled or conflicting delete is retried
 * and a locked group is reported without holding up the rest.
 */

import type { AzureCLIWrapper } from "../cli/wrapper.js";
import { requireArgs } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { retryAzureOperation, type CommandRetryResult, type FailureClass } from "../retry.js";
import type { CommandRunner, RetryOptions, Sleep, TagFilter } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CleanupManagerOptions = {
  logger?: Logger;
  retry?: RetryOptions;
  /** Runs the delete commands; defaults to spawning processes. */
  runner?: CommandRunner;
  sleep?: Sleep;
};

export type GroupCleanupOutcome = {
  resourceGroup: string;
  status: "deleted" | "failed" | "skipped";
  attempts: number;
  failureClass?: FailureClass;
  output?: string;
};

export type CleanupSummary = {
  tag: TagFilter;
  dryRun: boolean;
  outcomes: GroupCleanupOutcome[];
};

export type DestroyOptions = {
  /** List the matching groups without deleting anything. */
  dryRun?: boolean;
};

/** Parse `key=value`; the value may itself contain `=`. */
export function parseTagFilter(text: string): TagFilter {
  const index = text.indexOf("=");
  if (index < 0) return { key: text.trim(), value: "" };
  return { key: text.slice(0, index).trim(), value: text.slice(index + 1).trim() };
}

// =============================================================================
// ResourceCleanupManager
// =============================================================================

export class ResourceCleanupManager {
  private cli: AzureCLIWrapper;
  private logger: Logger;
  private options: CleanupManagerOptions;

  constructor(cli: AzureCLIWrapper, options: CleanupManagerOptions = {}) {
    this.cli = cli;
    this.logger = options.logger ?? silentLogger;
    this.options = options;
  }

  /**
   * Names of resource groups carrying `key=value`.
   */
  async findTaggedResourceGroups(tag: TagFilter): Promise<string[]> {
    requireArgs({ "tag key": tag.key, "tag value": tag.value });

    const result = await this.cli.execute(["group", "list", "--tag", `${tag.key}=${tag.value}`, "--query", "[].name"]);
    if (!result.success) {
      throw new Error(`Failed to list resource groups tagged ${tag.key}=${tag.value}: ${result.stderr.trim()}`);
    }
    if (!Array.isArray(result.parsed)) return [];
    return result.parsed.filter((name): name is string => typeof name === "string");
  }

  /**
   * Delete a resource group and wait for the deletion to finish.
   */
  async deleteResourceGroup(resourceGroup: string): Promise<CommandRetryResult> {
    requireArgs({ resourceGroup });

    return retryAzureOperation(
      `Delete resource group ${resourceGroup}`,
      [this.cli.azPath, "group", "delete", "--name", resourceGroup, "--yes"],
      {
        maxAttempts: this.options.retry?.maxAttempts ?? 3,
        baseDelaySeconds: this.options.retry?.baseDelaySeconds,
        runner: this.options.runner,
        logger: this.logger,
        sleep: this.options.sleep,
      },
    );
  }

  /**
   * Delete every resource group tagged `key=value`, sequentially. A failed
   * group is recorded and the next one is still attempted.
   */
  async destroyTagged(tag: TagFilter, options?: DestroyOptions): Promise<CleanupSummary> {
    const dryRun = options?.dryRun ?? false;
    const groups = await this.findTaggedResourceGroups(tag);

    if (groups.length === 0) {
      this.logger.info(`ℹ️ No resource groups tagged ${tag.key}=${tag.value}`);
      return { tag, dryRun, outcomes: [] };
    }

    this.logger.info(`Found ${groups.length} resource group(s) tagged ${tag.key}=${tag.value}`);

    const outcomes: GroupCleanupOutcome[] = [];
    for (const resourceGroup of groups) {
      if (dryRun) {
        this.logger.info(`[dry-run] Would delete ${resourceGroup}`);
        outcomes.push({ resourceGroup, status: "skipped", attempts: 0 });
        continue;
      }

      const result = await this.deleteResourceGroup(resourceGroup);
      if (result.succeeded) {
        this.logger.info(`✅ Deleted ${resourceGroup}`);
        outcomes.push({ resourceGroup, status: "deleted", attempts: result.attempts });
      } else {
        outcomes.push({
          resourceGroup,
          status: "failed",
          attempts: result.attempts,
          failureClass: result.failureClass,
          output: result.output,
        });
      }
    }

    return { tag, dryRun, outcomes };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCleanupManager(cli: AzureCLIWrapper, options?: CleanupManagerOptions): ResourceCleanupManager {
  return new ResourceCleanupManager(cli, options);
}
