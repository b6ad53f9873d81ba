/**
 * Platform detection and the per-platform font directory map.
 */

import { posix, win32 } from "node:path";
import { FontListError } from "../errors";
import type { EnvironmentVariables, PlatformInfo } from "../platform/platform-info";
import type { FontScope, Platform } from "./types";

type DirectoryResolver = (platformInfo: PlatformInfo) => string;

/**
 * Map Node.js platform identifiers to font platforms.
 */
const NODE_PLATFORMS: Partial<Record<NodeJS.Platform, Platform>> = {
  win32: "Windows",
  linux: "Linux",
  darwin: "MacOS",
};

/**
 * Look up an environment variable case-insensitively (Windows spells WINDIR as "windir").
 */
function getEnv(env: EnvironmentVariables, name: string): string | undefined {
  const direct = env[name];
  if (direct) return direct;
  const key = Object.keys(env).find((candidate) => candidate.toUpperCase() === name);
  const value = key === undefined ? undefined : env[key];
  return value ? value : undefined;
}

function localAppData(platformInfo: PlatformInfo): string {
  return (
    getEnv(platformInfo.env, "LOCALAPPDATA") ?? win32.join(platformInfo.homeDir, "AppData", "Local")
  );
}

function windowsDir(platformInfo: PlatformInfo): string {
  return getEnv(platformInfo.env, "WINDIR") ?? getEnv(platformInfo.env, "SYSTEMROOT") ?? "C:\\Windows";
}

/**
 * Font directory per platform and scope.
 */
export const FONT_DIRECTORY_MAP: Readonly<Record<Platform, Readonly<Record<FontScope, DirectoryResolver>>>> = {
  Windows: {
    CurrentUser: (info) => win32.join(localAppData(info), "Microsoft", "Windows", "Fonts"),
    AllUsers: (info) => win32.join(windowsDir(info), "Fonts"),
  },
  Linux: {
    CurrentUser: (info) => posix.join(info.homeDir, ".local", "share", "fonts"),
    AllUsers: () => "/usr/share/fonts",
  },
  MacOS: {
    CurrentUser: (info) => posix.join(info.homeDir, "Library", "Fonts"),
    AllUsers: () => "/Library/Fonts",
  },
};

/**
 * Determine the font platform of the host.
 *
 * @throws FontListError with code UNSUPPORTED_PLATFORM for any other OS
 */
export function resolvePlatform(platformInfo: PlatformInfo): Platform {
  const platform = NODE_PLATFORMS[platformInfo.platform];
  if (platform === undefined) {
    throw new FontListError(
      `Unsupported platform: ${platformInfo.platform}. Fonts can be listed on Windows, Linux and macOS.`,
      "UNSUPPORTED_PLATFORM"
    );
  }
  return platform;
}

/**
 * Resolve the font directory for a scope on the given platform.
 */
export function resolveFontDirectory(
  platform: Platform,
  scope: FontScope,
  platformInfo: PlatformInfo
): string {
  return FONT_DIRECTORY_MAP[platform][scope](platformInfo);
}

/**
 * Join a font directory and a file name with the platform's separator.
 */
export function joinFontPath(platform: Platform, directory: string, fileName: string): string {
  return platform === "Windows" ? win32.join(directory, fileName) : posix.join(directory, fileName);
}
