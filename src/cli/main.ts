/**
 * Command line runner.
 *
 * Wires config, FontLister and output formatting together. All I/O goes through
 * the injected deps so the runner can be tested without a terminal.
 */

import type { FileSystemLayer } from "../services/platform/filesystem";
import type { PlatformInfo } from "../services/platform/platform-info";
import type { LoggingService } from "../services/logging";
import { ConfigError, getErrorMessage, isServiceError } from "../services/errors";
import { ConfigService } from "../services/config/config-service";
import { FontLister } from "../services/fonts/font-lister";
import { parseCliArgs, ValidationError, USAGE } from "./args";
import { formatRecords } from "./output";
import { expandNameArgs } from "./stdin";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Minimal writable text sink (process.stdout, process.stderr).
 */
export interface TextOutput {
  write(text: string): unknown;
}

/**
 * Dependencies for runCli.
 */
export interface CliDeps {
  readonly platformInfo: PlatformInfo;
  readonly fileSystem: FileSystemLayer;
  readonly loggingService: LoggingService;
  readonly stdin: NodeJS.ReadableStream;
  readonly stdout: TextOutput;
  readonly stderr: TextOutput;
}

/**
 * Run the command line with the given arguments (without node and script path).
 *
 * @returns the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  const logger = deps.loggingService.createLogger("cli");

  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      deps.stdout.write(USAGE);
      return EXIT_SUCCESS;
    }

    const configService = new ConfigService({
      fileSystem: deps.fileSystem,
      logger: deps.loggingService.createLogger("config"),
    });
    const config = await configService.load(
      options.configPath ?? deps.platformInfo.env.FONTLISTER_CONFIG
    );

    const lister = new FontLister({
      platformInfo: deps.platformInfo,
      fileSystem: deps.fileSystem,
      logger: deps.loggingService.createLogger("fonts"),
    });
    const records = await lister.list({
      names: options.names.length > 0 ? expandNameArgs(options.names, deps.stdin) : config.names,
      scopes: options.scopes.length > 0 ? options.scopes : config.scopes,
    });

    deps.stdout.write(formatRecords(records, options.json ? "json" : config.format));
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof ValidationError) {
      deps.stderr.write(`font-lister: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ConfigError) {
      deps.stderr.write(`font-lister: ${error.message}\n`);
      return EXIT_USAGE;
    }

    logger.error(
      "Listing failed",
      isServiceError(error) ? { type: error.type, code: error.code ?? null } : undefined,
      error instanceof Error ? error : undefined
    );
    deps.stderr.write(`font-lister: ${getErrorMessage(error)}\n`);
    return EXIT_FAILURE;
  }
}
