/**
 * Error types shared by the library and the command line.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Throw a ValidationError naming every argument that is missing or blank.
 */
export function requireArgs(args: Record<string, string | undefined | null>): void {
  const missing = Object.entries(args)
    .filter(([, value]) => value === undefined || value === null || value.trim() === "")
    .map(([name]) => name);

  if (missing.length === 1) {
    throw new ValidationError(`${missing[0]} is required`);
  }
  if (missing.length > 1) {
    throw new ValidationError(`${missing.join(", ")} are required`);
  }
}
