/**
 * Command line argument parsing and validation using Zod schemas.
 */

import { parseArgs } from "node:util";
import { z } from "zod";
import { getErrorMessage } from "../shared/error-utils";
import { FONT_SCOPES, parseFontScope, type FontScope } from "../services/fonts/types";

/**
 * Marker for the `-` positional: read patterns from stdin at this position.
 */
export const STDIN_MARKER = Symbol("stdin");

export type NameArg = string | typeof STDIN_MARKER;

/**
 * Issue from argument validation.
 */
interface ValidationIssue {
  readonly path: readonly PropertyKey[];
  readonly message: string;
}

/**
 * Validation error for command line arguments.
 */
export class ValidationError extends Error {
  readonly type = "validation" as const;
  readonly issues: readonly ValidationIssue[];

  constructor(issues: readonly ValidationIssue[]) {
    const message = issues
      .map((i) => (i.path.length > 0 ? `${i.path.map(String).join(".")}: ${i.message}` : i.message))
      .join("; ");
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/**
 * Parsed command line options.
 */
export interface CliOptions {
  /** Patterns in command line order; STDIN_MARKER where `-` was given */
  readonly names: readonly NameArg[];
  readonly scopes: readonly FontScope[];
  readonly json: boolean;
  readonly configPath: string | undefined;
  readonly help: boolean;
}

export const USAGE = `Usage: font-lister [pattern...] [options]

List font files installed for the current user or for all users.

Arguments:
  pattern               Wildcard file name pattern (default: *). Use - to read
                        patterns from stdin, one per line.

Options:
  -n, --name <pattern>  Add a pattern (repeatable)
  -s, --scope <scope>   ${FONT_SCOPES.join(" or ")} (repeatable, default: CurrentUser)
      --json            Print records as a JSON array
  -c, --config <file>   Config file (default: $FONTLISTER_CONFIG)
  -h, --help            Show this help
`;

const ScopeArgSchema = z.string().transform((value, ctx): FontScope => {
  const scope = parseFontScope(value);
  if (scope === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown scope "${value}" (expected ${FONT_SCOPES.join(" or ")})`,
    });
    return z.NEVER;
  }
  return scope;
});

const RawArgsSchema = z.object({
  scope: z.array(ScopeArgSchema),
  config: z.string().min(1, "Config path must not be empty").optional(),
  json: z.boolean(),
  help: z.boolean(),
});

/**
 * Parse and validate command line arguments (without node and script path).
 *
 * @throws ValidationError for unknown options, missing option values or unknown scopes
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  let parsed: ReturnType<typeof runParseArgs>;
  try {
    parsed = runParseArgs(argv);
  } catch (error) {
    throw new ValidationError([{ path: [], message: getErrorMessage(error) }]);
  }

  const names: NameArg[] = [];
  for (const token of parsed.tokens) {
    if (token.kind === "positional") {
      names.push(token.value === "-" ? STDIN_MARKER : token.value);
    } else if (token.kind === "option" && token.name === "name" && token.value !== undefined) {
      names.push(token.value);
    }
  }

  const result = RawArgsSchema.safeParse({
    scope: parsed.values.scope ?? [],
    config: parsed.values.config,
    json: parsed.values.json ?? false,
    help: parsed.values.help ?? false,
  });
  if (!result.success) {
    throw new ValidationError(result.error.issues);
  }

  return {
    names,
    scopes: result.data.scope,
    json: result.data.json,
    configPath: result.data.config,
    help: result.data.help,
  };
}

function runParseArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    tokens: true,
    options: {
      name: { type: "string", short: "n", multiple: true },
      scope: { type: "string", short: "s", multiple: true },
      json: { type: "boolean" },
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h" },
    },
  });
}
