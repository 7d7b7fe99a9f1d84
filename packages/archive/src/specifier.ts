/**
 * Table specifiers
 *
 * Lattices are read from and written to keyed tables named by specifiers of
 * the form `type[,option...]:path`, e.g. `ark:lat.txt`, `ark,t:-`.
 *
 *   ark       an archive: entries stored one after another in `path`
 *   scp       a script file listing `key location` pairs
 *   t / b     text / binary archive
 *   p         permissive: skip entries that fail to parse
 *   f, nf, o, s, cs
 *             flush and ordering hints; accepted, no effect here
 *
 * `path` of `-` is standard input (reading) or standard output (writing).
 */

import type { TableRole } from "./errors.js";
import { UnsupportedSpecifierError } from "./errors.js";

export type TableKind = "ark" | "scp" | "ark,scp";

export interface TableOptions {
  readonly text: boolean;
  readonly binary: boolean;
  readonly permissive: boolean;
}

export interface TableSpecifier {
  readonly kind: TableKind;
  readonly path: string;
  readonly options: TableOptions;
}

const OPTION_FLAGS = new Set(["t", "b", "f", "nf", "p", "o", "s", "cs"]);

/** Parse a table specifier, or return null if `spec` does not name a table. */
export function parseSpecifier(spec: string): TableSpecifier | null {
  const colon = spec.indexOf(":");
  if (colon <= 0) return null;
  const path = spec.slice(colon + 1).trim();
  if (path === "") return null;

  let ark = false;
  let scp = false;
  const flags = new Set<string>();
  for (const raw of spec.slice(0, colon).split(",")) {
    const token = raw.trim();
    if (token === "ark") ark = true;
    else if (token === "scp") scp = true;
    else if (OPTION_FLAGS.has(token)) flags.add(token);
    else return null;
  }
  if (!ark && !scp) return null;

  return {
    kind: ark && scp ? "ark,scp" : ark ? "ark" : "scp",
    path,
    options: {
      text: flags.has("t"),
      binary: flags.has("b"),
      permissive: flags.has("p"),
    },
  };
}

/** True if `spec` names a table (supported or not). */
export function isTableSpecifier(spec: string): boolean {
  return parseSpecifier(spec) !== null;
}

/**
 * Parse `spec` and make sure it is a table this toolkit handles: a text
 * archive. Throws `UnsupportedSpecifierError` otherwise.
 */
export function requireTable(spec: string, role: TableRole): TableSpecifier {
  const parsed = parseSpecifier(spec);
  if (!parsed) {
    throw new UnsupportedSpecifierError(spec, role, "is not a table; both input and output lattices must be tables");
  }
  if (parsed.kind !== "ark") {
    throw new UnsupportedSpecifierError(spec, role, "uses a script file; only archives are supported");
  }
  if (parsed.options.binary) {
    throw new UnsupportedSpecifierError(spec, role, "is a binary archive; only text archives are supported");
  }
  return parsed;
}
