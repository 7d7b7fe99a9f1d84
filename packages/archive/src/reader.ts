import * as fs from "node:fs";
import { once } from "node:events";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { requireTable } from "./specifier.js";
import type { LatticeEntry, TextParseOptions } from "./text-format.js";
import { LatticeTextParser } from "./text-format.js";

export interface ReadArchiveOptions extends Omit<TextParseOptions, "permissive"> {
  /** Stream to read when the specifier's path is `-` (default: process.stdin). */
  readonly stdin?: Readable;
}

async function openInput(path: string, stdin: Readable | undefined): Promise<Readable> {
  if (path === "-") return stdin ?? process.stdin;
  const stream = fs.createReadStream(path, { encoding: "utf8" });
  await once(stream, "open");
  return stream;
}

/**
 * Read the lattices of a text archive one entry at a time, in file order.
 * The `p` option of the specifier turns on permissive parsing.
 *
 * @example
 * ```ts
 * for await (const { key, lattice } of readLatticeArchive("ark:lat.txt")) {
 *   // ...
 * }
 * ```
 */
export async function* readLatticeArchive(
  specifier: string,
  options: ReadArchiveOptions = {}
): AsyncGenerator<LatticeEntry> {
  const table = requireTable(specifier, "input");
  const input = await openInput(table.path, options.stdin);
  const parser = new LatticeTextParser({ ...options, permissive: table.options.permissive });
  const lines = createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      const entry = parser.push(line);
      if (entry) yield entry;
    }
    const last = parser.end();
    if (last) yield last;
  } finally {
    lines.close();
    if (input !== process.stdin && input !== options.stdin) input.destroy();
  }
}
