/**
 * Whole-collection FASTA reading and writing
 */

import { ValidationError } from "../../errors";
import { openSink } from "../../io/open";
import { OutputBuffer } from "../../io/output-buffer";
import type {
  FastaEntry,
  FastaInput,
  FastaOutput,
  FastaReaderOptions,
  FastaWriterOptions,
} from "../../types";
import { CharCode, MAX_DESCRIPTION_LENGTH, WARNINGS } from "./constants";
import { normalizeDescription, reflowSequence } from "./primitives";
import { FastaReader } from "./reader";
import {
  resolveRepresentation,
  type SequenceConverter,
  type SequenceKind,
  type SequenceKindMap,
  type SequenceOutput,
  type SequenceRepresentation,
} from "./representations";
import { withResource } from "./scoped";
import type { SequenceData } from "./types";
import { assertWriterOptions, defaultWarningHandler } from "./writer";

/**
 * Read every record of a FASTA file or stream into memory
 */
function readFasta(input: FastaInput): FastaEntry<string>[];
function readFasta<K extends SequenceKind>(
  input: FastaInput,
  output: K,
  options?: FastaReaderOptions
): FastaEntry<SequenceKindMap[K]>[];
function readFasta<U>(
  input: FastaInput,
  output: SequenceConverter<U> | SequenceRepresentation<U>,
  options?: FastaReaderOptions
): FastaEntry<U>[];
function readFasta(
  input: FastaInput,
  output: SequenceOutput<unknown> = "string",
  options: FastaReaderOptions = {}
): FastaEntry<unknown>[] {
  return withResource(
    () => FastaReader.create(input, resolveRepresentation(output), options),
    (reader) => Array.from(reader)
  );
}

/**
 * Write records to a FASTA file or stream, sequences wrapped at 80 columns
 *
 * Each description is checked before any of its record is written, so a
 * bad description leaves the output ending at the previous record.
 * Sequence errors surface mid-record, after the header line went out.
 *
 * @throws {ValidationError} For descriptions, sequence characters, or an empty sequence (EMPTY_SEQUENCE_DATA)
 */
function writeFasta(
  output: FastaOutput,
  entries: Iterable<FastaEntry<SequenceData>>,
  options: FastaWriterOptions = {}
): void {
  assertWriterOptions(options);
  const onWarning = options.onWarning ?? defaultWarningHandler;

  const owned = typeof output === "string";
  const sink = typeof output === "string" ? openSink(output, options) : output;
  const out = new OutputBuffer(sink);

  try {
    let entry = 0;
    for (const { description, sequence } of entries) {
      entry++;
      const desc = normalizeDescription(description, entry);
      if (desc.length > MAX_DESCRIPTION_LENGTH) {
        onWarning(WARNINGS.DESCRIPTION_TOO_LONG, entry);
      }
      out.writeByte(CharCode.MARKER);
      out.writeAscii(desc);
      out.writeByte(CharCode.NEWLINE);
      const written = reflowSequence(sequence, out, entry);
      out.writeByte(CharCode.NEWLINE);
      if (written === 0) {
        throw new ValidationError("empty sequence data", "EMPTY_SEQUENCE_DATA", entry);
      }
    }
  } finally {
    try {
      out.flush();
    } finally {
      if (owned) sink.close();
    }
  }
}

export { readFasta, writeFasta };
