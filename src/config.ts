/**
 * Configuration schema (TypeBox), defaults, and environment loading.
 *
 * The environment is read once, here; everything downstream receives explicit
 * values.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";

export const credentialMethodSchema = Type.Union([
  Type.Literal("default"),
  Type.Literal("cli"),
  Type.Literal("service-principal"),
  Type.Literal("managed-identity"),
]);

export const configSchema = Type.Object({
  azPath: Type.String({ minLength: 1, description: "Path to the az CLI binary" }),
  cliTimeoutMs: Type.Integer({ minimum: 0, description: "Timeout for az invocations; 0 waits indefinitely" }),
  credentialMethod: credentialMethodSchema,
  retry: Type.Object({
    maxAttempts: Type.Integer({ minimum: 1 }),
    baseDelaySeconds: Type.Integer({ minimum: 1 }),
  }),
  healthCheck: Type.Object({
    path: Type.String({ description: "Path appended to the Function App URL" }),
    timeoutMs: Type.Integer({ minimum: 1 }),
  }),
  urlCheckTimeoutMs: Type.Integer({ minimum: 1 }),
  diagnostics: Type.Object({
    verbose: Type.Boolean(),
  }),
});

export type AppConfig = Static<typeof configSchema>;

export function getDefaultConfig(): AppConfig {
  return {
    azPath: "az",
    cliTimeoutMs: 0,
    credentialMethod: "default",
    retry: { maxAttempts: 3, baseDelaySeconds: 2 },
    healthCheck: { path: "/api/HealthCheck", timeoutMs: 30_000 },
    urlCheckTimeoutMs: 10_000,
    diagnostics: { verbose: false },
  };
}

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key]?.trim();
  return raw ? Number(raw) : undefined;
}

function readFlag(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return undefined;
  return raw === "1" || raw === "true" || raw === "yes";
}

/**
 * Build the configuration from environment variables layered over defaults.
 *
 * Recognized: RETRY_BASE_DELAY, RETRY_MAX_ATTEMPTS, AZURE_CLI_PATH,
 * AZURE_CLI_TIMEOUT_MS, AZURE_CREDENTIAL_METHOD, AZURE_CI_UTILS_VERBOSE.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const defaults = getDefaultConfig();

  const candidate = {
    ...defaults,
    azPath: env.AZURE_CLI_PATH?.trim() || defaults.azPath,
    cliTimeoutMs: readNumber(env, "AZURE_CLI_TIMEOUT_MS") ?? defaults.cliTimeoutMs,
    credentialMethod: env.AZURE_CREDENTIAL_METHOD?.trim() || defaults.credentialMethod,
    retry: {
      maxAttempts: readNumber(env, "RETRY_MAX_ATTEMPTS") ?? defaults.retry.maxAttempts,
      baseDelaySeconds: readNumber(env, "RETRY_BASE_DELAY") ?? defaults.retry.baseDelaySeconds,
    },
    diagnostics: {
      verbose: readFlag(env, "AZURE_CI_UTILS_VERBOSE") ?? defaults.diagnostics.verbose,
    },
  };

  if (!Value.Check(configSchema, candidate)) {
    const issues = [...Value.Errors(configSchema, candidate)].map(
      (error) => `${error.path || "/"} ${error.message}`,
    );
    throw new ConfigError("Invalid configuration", issues);
  }

  return candidate;
}
