/**
 * Streaming pattern input for the command line.
 */

import { createInterface } from "node:readline";
import { STDIN_MARKER, type NameArg } from "./args";

/**
 * Yield trimmed, non-empty lines from a stream as they arrive.
 */
export async function* readLines(input: NodeJS.ReadableStream): AsyncGenerator<string> {
  const rl = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        yield trimmed;
      }
    }
  } finally {
    rl.close();
  }
}

/**
 * Expand command line patterns in order, reading stdin where `-` was given.
 * stdin is drained once; a second `-` adds nothing.
 */
export async function* expandNameArgs(
  names: readonly NameArg[],
  stdin: NodeJS.ReadableStream
): AsyncGenerator<string> {
  let stdinRead = false;
  for (const name of names) {
    if (name !== STDIN_MARKER) {
      yield name;
      continue;
    }
    if (stdinRead) continue;
    stdinRead = true;
    yield* readLines(stdin);
  }
}
