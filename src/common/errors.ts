/**
 * Base class for errors the CLI reports to the user as-is.
 * Anything else is printed as an unexpected error.
 */
export class MiqatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network failure, HTTP error status or malformed payload from a prayer time API.
 * Recoverable through the cache fallback.
 */
export class PrayerApiError extends MiqatError {}

/**
 * No settings file exists yet.
 */
export class SettingsNotFoundError extends MiqatError {
  constructor(public readonly filePath: string) {
    super(`No configuration found at ${filePath}. Run "miqat config" to set your location.`);
  }
}

/**
 * Settings file exists but cannot be parsed or fails validation.
 */
export class SettingsError extends MiqatError {}

/**
 * Invalid flag value or flag combination.
 */
export class CliUsageError extends MiqatError {}

/**
 * Format zod issues the same way for every schema we validate.
 */
export function formatIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues.map((e) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`).join('\n');
}
