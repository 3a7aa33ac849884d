/**
 * Type definitions for the FASTA reader and writer
 */

/**
 * Reader lifecycle
 *
 * fresh → in-record on the first line fetched, in-record → in-record per
 * record, in-record → exhausted once no further line exists. `rewind`
 * returns to fresh.
 */
export type ReaderState = "fresh" | "in-record" | "exhausted";

/**
 * Writer lifecycle, derived from the writer's flags
 *
 * at-start → in-description on the first '>', in-description →
 * in-sequence at the end of the description line, in-sequence →
 * in-description on a '>' that follows a completed line.
 */
export type WriterState = "at-start" | "in-description" | "in-sequence";

/**
 * Sequence input accepted by `writeEntry` and `writeFasta`: text, byte
 * codes, or any iterable of one-character strings or byte codes
 */
export type SequenceData = string | Uint8Array | Iterable<string | number>;

/**
 * Input accepted by `FastaWriter.writeToken`
 *
 * A string is a whole line (a newline follows it), a number is a single
 * byte code, a Uint8Array is a run of byte codes, and any other iterable
 * is a collection of tokens written in order.
 */
export type FastaToken = string | number | Uint8Array | Iterable<FastaToken>;
