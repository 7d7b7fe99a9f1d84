import { LatticeError } from "@ctc-lattice/ctc";

export type TableRole = "input" | "output";

/** Codes of the errors raised while reading and writing archives. */
export type ArchiveErrorCode = "unsupported_specifier" | "archive_format";

/** A specifier that does not name a table this toolkit can read or write. */
export class UnsupportedSpecifierError extends LatticeError<"unsupported_specifier"> {
  constructor(
    readonly specifier: string,
    readonly role: TableRole,
    reason: string
  ) {
    super("unsupported_specifier", `Not implemented: ${role} "${specifier}" ${reason}`);
    this.name = "UnsupportedSpecifierError";
  }
}

/** A malformed line in a text archive. */
export class ArchiveFormatError extends LatticeError<"archive_format"> {
  constructor(
    readonly line: number,
    readonly key: string | undefined,
    detail: string
  ) {
    super(
      "archive_format",
      key === undefined
        ? `Archive line ${line}: ${detail}`
        : `Archive line ${line} (lattice ${key}): ${detail}`
    );
    this.name = "ArchiveFormatError";
  }
}
