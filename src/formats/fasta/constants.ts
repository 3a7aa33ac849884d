/**
 * Constants for FASTA reading and writing
 */

/** Bytes requested from the underlying stream per chunk */
export const FASTA_CHUNK_SIZE = 4096;

/** Output column at which sequence lines wrap */
export const LINE_WIDTH = 80;

/** Longest description that still fits on an 80-column header line with its '>' */
export const MAX_DESCRIPTION_LENGTH = LINE_WIDTH - 1;

export const CharCode = {
  TAB: 0x09,
  NEWLINE: 0x0a,
  CARRIAGE_RETURN: 0x0d,
  SPACE: 0x20,
  MARKER: 0x3e, // '>'
  ASCII_MAX: 0x7f,
} as const;

export const WARNINGS = {
  DESCRIPTION_TOO_LONG: "description line longer than 80 characters",
} as const;
