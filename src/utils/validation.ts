/**
 * Validation utilities for configuration and inputs
 */

/**
 * Validates repository URL format (http, https, ssh or git transports)
 */
export function isValidRepoUrl(url: string): boolean {
  if (/^[\w.-]+@[\w.-]+:[\w./-]+$/.test(url)) {
    // scp-like syntax, e.g. git@github.com:owner/repo.git
    return true;
  }

  try {
    const parsed = new URL(url);
    return (
      ["http:", "https:", "ssh:", "git:", "file:"].includes(parsed.protocol) &&
      (parsed.protocol === "file:" || parsed.hostname.length > 0)
    );
  } catch {
    return false;
  }
}

/**
 * Validates that a string is not empty after trimming
 */
export function isNonEmptyString(value: string): boolean {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * Parses a positive integer setting or throws a descriptive error
 */
export function parsePositiveInt(
  name: string,
  value: string,
  defaultValue: number
): number {
  const parsed = Number(value);

  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(
      `Invalid ${name}: ${value}\n` +
        `Expected a positive integer (default: ${defaultValue})`
    );
  }

  return parsed;
}

/**
 * Gets optional environment variable with default value
 */
export function getOptional(
  value: string | undefined,
  defaultValue: string
): string {
  return value && isNonEmptyString(value) ? value : defaultValue;
}
