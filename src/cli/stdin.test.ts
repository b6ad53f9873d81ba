/**
 * Tests for streaming pattern input.
 */

import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import { STDIN_MARKER } from "./args";
import { expandNameArgs, readLines } from "./stdin";

function stream(...chunks: string[]): Readable {
  return Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
}

async function drain(source: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe("readLines", () => {
  it("yields trimmed lines and skips blank ones", async () => {
    const lines = await drain(readLines(stream("Arial*\n  \n  Cal", "ibri*\r\n\n")));

    expect(lines).toEqual(["Arial*", "Calibri*"]);
  });

  it("yields the last line without a trailing newline", async () => {
    expect(await drain(readLines(stream("Noto*")))).toEqual(["Noto*"]);
  });
});

describe("expandNameArgs", () => {
  it("inserts stdin lines at the dash position", async () => {
    const names = await drain(
      expandNameArgs(["Arial*", STDIN_MARKER, "Calibri"], stream("Noto*\nDejaVu*\n"))
    );

    expect(names).toEqual(["Arial*", "Noto*", "DejaVu*", "Calibri"]);
  });

  it("reads stdin only once", async () => {
    const names = await drain(
      expandNameArgs([STDIN_MARKER, "Arial*", STDIN_MARKER], stream("Noto*\n"))
    );

    expect(names).toEqual(["Noto*", "Arial*"]);
  });
});
