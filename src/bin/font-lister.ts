#!/usr/bin/env node
/**
 * font-lister command line entry point.
 *
 * Builds the Node.js implementations of the injected layers and hands them to
 * runCli. Environment variables configure logging (FONTLISTER_LOGLEVEL,
 * FONTLISTER_PRINT_LOGS, FONTLISTER_LOGGER, FONTLISTER_LOG_DIR) and the
 * config file (FONTLISTER_CONFIG).
 */

import { runCli, EXIT_FAILURE } from "../cli/main";
import { NodePlatformInfo } from "../services/platform/platform-info";
import { DefaultFileSystemLayer } from "../services/platform/filesystem";
import { ElectronLogService } from "../services/logging";
import { getErrorMessage } from "../shared/error-utils";

async function main(): Promise<number> {
  const platformInfo = new NodePlatformInfo();
  const loggingService = new ElectronLogService(platformInfo.env);
  try {
    return await runCli(process.argv.slice(2), {
      platformInfo,
      fileSystem: new DefaultFileSystemLayer(loggingService.createLogger("fs")),
      loggingService,
      stdin: process.stdin,
      stdout: process.stdout,
      stderr: process.stderr,
    });
  } finally {
    loggingService.dispose();
  }
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  main().then(
    (code) => {
      // exitCode instead of exit() so piped stdout is flushed
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal error:", getErrorMessage(error));
      process.exitCode = EXIT_FAILURE;
    }
  );
}
