export type { TableRole, ArchiveErrorCode } from "./errors.js";
export { UnsupportedSpecifierError, ArchiveFormatError } from "./errors.js";

export type { TableKind, TableOptions, TableSpecifier } from "./specifier.js";
export { parseSpecifier, isTableSpecifier, requireTable } from "./specifier.js";

export type { LatticeEntry, TextParseOptions } from "./text-format.js";
export { LatticeTextParser, parseLatticeArchive, formatLattice, MAX_STATE_GAP } from "./text-format.js";

export type { ReadArchiveOptions } from "./reader.js";
export { readLatticeArchive } from "./reader.js";

export type { WriteArchiveOptions } from "./writer.js";
export { LatticeArchiveWriter } from "./writer.js";
