/**
 * FASTA Format Module
 *
 * Incremental FASTA reading and writing: one record in memory at a time,
 * gzip handled transparently, sequence output wrapped at 80 columns.
 *
 * @module fasta
 *
 * @example Copy a file, re-wrapping its sequences
 * ```typescript
 * import { withFastaReader, withFastaWriter } from "./formats/fasta";
 *
 * withFastaReader("in.fasta.gz", (reader) =>
 *   withFastaWriter("out.fasta", (writer) => {
 *     for (const { description, sequence } of reader) {
 *       writer.writeEntry(description, sequence);
 *     }
 *   })
 * );
 * ```
 */

export { FASTA_CHUNK_SIZE, LINE_WIDTH, MAX_DESCRIPTION_LENGTH } from "./constants";
export { readFasta, writeFasta } from "./bulk";
export { LineAssembler } from "./line-assembler";
export { FastaReader } from "./reader";
export {
  resolveRepresentation,
  SequenceRepresentations,
  type SequenceConverter,
  type SequenceKind,
  type SequenceKindMap,
  type SequenceOutput,
  type SequenceRepresentation,
} from "./representations";
export {
  acquireFastaReader,
  acquireFastaWriter,
  acquireResource,
  withFastaReader,
  withFastaWriter,
  withResource,
  type Closeable,
} from "./scoped";
export type { FastaToken, ReaderState, SequenceData, WriterState } from "./types";
export { defaultWarningHandler, FastaWriter } from "./writer";
