/**
 * Configuration service for loading the optional config file.
 *
 * This is a pure service (not a boundary abstraction) that uses FileSystemLayer
 * for I/O. The file is never written.
 */

import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { ConfigError, getErrorMessage, isFileSystemErrorWithCode } from "../errors";
import { ConfigFileSchema, DEFAULT_CONFIG, type FontListerConfig } from "./types";

/**
 * Dependencies for ConfigService.
 */
export interface ConfigServiceDeps {
  readonly fileSystem: FileSystemLayer;
  readonly logger: Logger;
}

/**
 * Service for loading the font lister configuration.
 */
export class ConfigService {
  private readonly fileSystem: FileSystemLayer;
  private readonly logger: Logger;

  constructor(deps: ConfigServiceDeps) {
    this.fileSystem = deps.fileSystem;
    this.logger = deps.logger;
  }

  /**
   * Load configuration from disk.
   * Returns defaults if no path is given or the file doesn't exist.
   *
   * @throws ConfigError with code INVALID_JSON if the file is not JSON
   * @throws ConfigError with code INVALID_CONFIG if the file doesn't match the schema
   * @throws FileSystemError if the file exists but cannot be read
   */
  async load(configPath: string | undefined): Promise<FontListerConfig> {
    if (!configPath) {
      this.logger.debug("No config file, using defaults");
      return DEFAULT_CONFIG;
    }

    let content: string;
    try {
      content = await this.fileSystem.readFile(configPath);
    } catch (error) {
      if (isFileSystemErrorWithCode(error, "ENOENT")) {
        this.logger.debug("Config not found, using defaults", { path: configPath });
        return DEFAULT_CONFIG;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in config file ${configPath}: ${getErrorMessage(error)}`,
        "INVALID_JSON"
      );
    }

    const result = ConfigFileSchema.safeParse(parsed);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
        .join("; ");
      this.logger.warn("Config validation failed", { path: configPath, error: details });
      throw new ConfigError(`Invalid config file ${configPath}: ${details}`, "INVALID_CONFIG");
    }

    const config: FontListerConfig = {
      names: result.data.names ?? DEFAULT_CONFIG.names,
      scopes: result.data.scopes ?? DEFAULT_CONFIG.scopes,
      format: result.data.format ?? DEFAULT_CONFIG.format,
    };
    this.logger.debug("Config loaded", { path: configPath, format: config.format });
    return config;
  }
}

/**
 * Create a ConfigService instance.
 */
export function createConfigService(deps: ConfigServiceDeps): ConfigService {
  return new ConfigService(deps);
}
