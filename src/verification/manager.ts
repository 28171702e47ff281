/**
 * Deployment Verifier
 *
 * Post-deployment checks for a Function App stack: the app is running, its
 * storage account answers, Application Insights is wired up, and the health
 * endpoint responds. Each check resolves to a CheckResult; none of them throw
 * on an Azure-side failure.
 */

import type { AzureCLIWrapper } from "../cli/wrapper.js";
import { getDefaultConfig } from "../config.js";
import { requireArgs } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import type { CheckResult } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type DeploymentTarget = {
  functionAppName: string;
  storageAccountName: string;
  appInsightsName: string;
  resourceGroup: string;
  functionAppUrl: string;
};

export type DeploymentVerification = {
  passed: boolean;
  checks: CheckResult[];
};

export type HttpProbeResult = {
  url: string;
  /** null when no response arrived (DNS, TLS, timeout). */
  statusCode: number | null;
  healthy: boolean;
  responseTimeMs: number;
  error?: string;
};

export type DeploymentVerifierOptions = {
  logger?: Logger;
  /** Appended to the Function App URL. */
  healthCheckPath?: string;
  healthCheckTimeoutMs?: number;
  urlCheckTimeoutMs?: number;
};

// =============================================================================
// HTTP Probe
// =============================================================================

/**
 * GET `url`, following redirects. 2xx and 3xx count as healthy.
 */
export async function probeUrl(url: string, timeoutMs: number): Promise<HttpProbeResult> {
  const start = Date.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { signal: controller.signal, redirect: "follow" });
    return {
      url,
      statusCode: response.status,
      healthy: response.status >= 200 && response.status < 400,
      responseTimeMs: Date.now() - start,
    };
  } catch (error) {
    return {
      url,
      statusCode: null,
      healthy: false,
      responseTimeMs: Date.now() - start,
      error: error instanceof Error ? error.message : String(error),
    };
  } finally {
    clearTimeout(timer);
  }
}

// 000 when no response arrived
function statusText(probe: HttpProbeResult): string {
  return probe.statusCode === null ? "000" : String(probe.statusCode);
}

// =============================================================================
// DeploymentVerifier
// =============================================================================

export class DeploymentVerifier {
  private cli: AzureCLIWrapper;
  private logger: Logger;
  private healthCheckPath: string;
  private healthCheckTimeoutMs: number;
  private urlCheckTimeoutMs: number;

  constructor(cli: AzureCLIWrapper, options?: DeploymentVerifierOptions) {
    const defaults = getDefaultConfig();
    this.cli = cli;
    this.logger = options?.logger ?? silentLogger;
    this.healthCheckPath = options?.healthCheckPath ?? defaults.healthCheck.path;
    this.healthCheckTimeoutMs = options?.healthCheckTimeoutMs ?? defaults.healthCheck.timeoutMs;
    this.urlCheckTimeoutMs = options?.urlCheckTimeoutMs ?? defaults.urlCheckTimeoutMs;
  }

  private pass(name: string, message: string): CheckResult {
    this.logger.info(`✅ ${message}`);
    return { name, passed: true, message };
  }

  private fail(name: string, message: string): CheckResult {
    this.logger.error(`❌ ${message}`);
    return { name, passed: false, message };
  }

  async checkFunctionAppRunning(functionAppName: string, resourceGroup: string): Promise<CheckResult> {
    requireArgs({ functionAppName, resourceGroup });
    const check = "function-app-state";

    const result = await this.cli.executeValue([
      "functionapp", "show", "--name", functionAppName, "--resource-group", resourceGroup, "--query", "state",
    ]);
    if (!result.success) {
      return this.fail(check, `Failed to get Function App state: ${result.stderr.trim()}`);
    }

    return result.value === "Running"
      ? this.pass(check, "Function App is running")
      : this.fail(check, `Function App state: ${result.value}`);
  }

  /**
   * Probe `<url>/api/HealthCheck`. The endpoint may sit behind authentication,
   * so a non-2xx/3xx answer is a warning and the check still passes.
   */
  async testFunctionAppHealth(functionAppUrl: string): Promise<CheckResult> {
    requireArgs({ functionAppUrl });
    const check = "function-app-health";

    const healthUrl = `${functionAppUrl.replace(/\/$/, "")}${this.healthCheckPath}`;
    this.logger.info(`Testing health endpoint: ${healthUrl}`);

    const probe = await probeUrl(healthUrl, this.healthCheckTimeoutMs);
    if (probe.healthy) {
      return this.pass(check, `Health check passed (HTTP ${statusText(probe)})`);
    }

    const message = `Health check returned HTTP ${statusText(probe)} (may need authentication)`;
    this.logger.warn(`⚠️ ${message}`);
    if (probe.error) this.logger.debug(probe.error);
    return { name: check, passed: true, message };
  }

  async verifyStorageAccount(storageAccountName: string, resourceGroup: string): Promise<CheckResult> {
    requireArgs({ storageAccountName, resourceGroup });
    const check = "storage-account";

    const key = await this.cli.executeValue([
      "storage", "account", "keys", "list",
      "--account-name", storageAccountName,
      "--resource-group", resourceGroup,
      "--query", "[0].value",
    ]);
    if (!key.success) {
      return this.fail(check, `Failed to get storage account key: ${key.stderr.trim()}`);
    }

    const listing = await this.cli.execute(
      ["storage", "container", "list", "--account-name", storageAccountName, "--account-key", key.value],
      "none",
    );
    return listing.success
      ? this.pass(check, "Storage account accessible")
      : this.fail(check, "Storage account not accessible");
  }

  async verifyAppInsights(appInsightsName: string, resourceGroup: string): Promise<CheckResult> {
    requireArgs({ appInsightsName, resourceGroup });
    const check = "app-insights";

    const result = await this.cli.executeValue([
      "monitor", "app-insights", "component", "show",
      "--app", appInsightsName,
      "--resource-group", resourceGroup,
      "--query", "connectionString",
    ]);
    if (!result.success) {
      return this.fail(check, `Failed to get Application Insights connection string: ${result.stderr.trim()}`);
    }

    return result.value && result.value !== "null"
      ? this.pass(check, "Application Insights configured")
      : this.fail(check, "Application Insights not properly configured");
  }

  /**
   * Run every check in order. The health probe is reported but never fails
   * the verification.
   */
  async verifyDeployment(target: DeploymentTarget): Promise<DeploymentVerification> {
    requireArgs(target);

    this.logger.info("🔍 Running post-deployment verification...");
    this.logger.info("");

    const steps: Array<[string, () => Promise<CheckResult>]> = [
      ["1. Checking Function App state...", () => this.checkFunctionAppRunning(target.functionAppName, target.resourceGroup)],
      ["2. Verifying storage account connectivity...", () => this.verifyStorageAccount(target.storageAccountName, target.resourceGroup)],
      ["3. Verifying Application Insights connection...", () => this.verifyAppInsights(target.appInsightsName, target.resourceGroup)],
      ["4. Testing Function App health endpoint...", () => this.testFunctionAppHealth(target.functionAppUrl)],
    ];

    const checks: CheckResult[] = [];
    for (const [heading, run] of steps) {
      this.logger.info(heading);
      checks.push(await run());
      this.logger.info("");
    }

    const passed = checks.every((c) => c.passed);
    if (passed) {
      this.logger.info("✅ All deployment verification checks passed!");
    } else {
      this.logger.error("❌ Some deployment verification checks failed");
    }
    return { passed, checks };
  }

  async testUrlAccessible(url: string): Promise<CheckResult> {
    requireArgs({ url });

    const probe = await probeUrl(url, this.urlCheckTimeoutMs);
    return probe.healthy
      ? { name: "url", passed: true, message: `URL accessible (HTTP ${statusText(probe)}): ${url}` }
      : this.fail("url", `URL not accessible (HTTP ${statusText(probe)}): ${url}`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createDeploymentVerifier(
  cli: AzureCLIWrapper,
  options?: DeploymentVerifierOptions,
): DeploymentVerifier {
  return new DeploymentVerifier(cli, options);
}
