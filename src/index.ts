/**
 * azure-ci-utils
 *
 * Retry, policy reporting, Key Vault and deployment verification helpers for
 * Azure CI/CD pipelines.
 */

export * from "./types.js";
export { ValidationError, ConfigError, requireArgs } from "./errors.js";
export { createLogger, silentLogger, theme } from "./logger.js";
export type { Logger, LoggerOptions, LogStream } from "./logger.js";
export { configSchema, getDefaultConfig, loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export {
  FAILURE_RULES,
  DEFAULT_BASE_DELAY_SECONDS,
  classifyFailure,
  failureLabel,
  isRetryableFailure,
  retryAzureOperation,
  withAzureRetry,
  formatErrorMessage,
} from "./retry.js";
export type {
  FailureClass,
  FailureRule,
  RetryAttempt,
  CommandRetryResult,
  CommandRetryOptions,
  FunctionRetryOptions,
} from "./retry.js";
export * from "./cli/index.js";
export * from "./policy/index.js";
export * from "./credentials/index.js";
export * from "./keyvault/index.js";
export * from "./verification/index.js";
export * from "./cleanup/index.js";
export { createCliServices, createProgram, registerCli } from "./register-cli.js";
export type { CliContext, CliServices } from "./register-cli.js";
export { VERSION } from "./version.js";
