/**
 * Platform information provider.
 * Abstracts process.platform, os.homedir() and process.env for testability.
 */

import os from "node:os";

/**
 * Read-only view of environment variables.
 */
export type EnvironmentVariables = Readonly<Record<string, string | undefined>>;

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32', ... */
  readonly platform: NodeJS.Platform;

  /** User's home directory */
  readonly homeDir: string;

  /** Environment variables (LOCALAPPDATA, WINDIR, ...) */
  readonly env: EnvironmentVariables;
}

/**
 * PlatformInfo implementation using Node.js APIs.
 *
 * Values are cached at construction time for consistency.
 */
export class NodePlatformInfo implements PlatformInfo {
  readonly platform: NodeJS.Platform;
  readonly homeDir: string;
  readonly env: EnvironmentVariables;

  constructor() {
    this.platform = process.platform;
    this.homeDir = os.homedir();
    this.env = { ...process.env };
  }
}
