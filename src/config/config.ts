import { AppConfig, getAppConfig } from "./app.config";
import { SourceConfig, getSourceConfig } from "./source.config";

/**
 * Complete application configuration
 */
export interface Config {
  app: AppConfig;
  source: SourceConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { AppConfig, SourceConfig };

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig(): Config {
  return {
    app: getAppConfig(),
    source: getSourceConfig(),
  };
}

/**
 * Validates that all configuration overrides are well-formed
 * Throws descriptive errors if a value is invalid
 */
export function validateConfig(): void {
  try {
    getConfig();
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file. See .env.example for reference.`
      );
    }
    throw error;
  }
}
