/**
 * Streaming FASTA reader
 *
 * Holds at most one record in memory. Input goes bytes → chunks →
 * logical lines → records; each record's sequence lines are concatenated
 * as-is and converted to the requested representation.
 *
 * @example Record at a time
 * ```typescript
 * const reader = FastaReader.open("proteins.fasta.gz");
 * try {
 *   while (!reader.eof()) {
 *     const { description, sequence } = reader.readEntry();
 *     console.log(`${reader.numParsed}: ${description} (${sequence.length})`);
 *   }
 * } finally {
 *   reader.close();
 * }
 * ```
 *
 * @example Whole-file iteration, raw bytes
 * ```typescript
 * for (const entry of FastaReader.open(source, "bytes")) {
 *   handle(entry.sequence); // Uint8Array
 * }
 * ```
 */

import { type } from "arktype";
import { EndOfFileError, ParseError, StreamError, ValidationError } from "../../errors";
import { ChunkedByteSource } from "../../io/chunked-source";
import { openSource } from "../../io/open";
import type { ByteSource } from "../../io/streams";
import { FastaReaderOptionsSchema, type FastaEntry, type FastaInput, type FastaReaderOptions } from "../../types";
import { CharCode, FASTA_CHUNK_SIZE } from "./constants";
import { LineAssembler } from "./line-assembler";
import { isAsciiSpace } from "./primitives";
import {
  resolveRepresentation,
  type SequenceConverter,
  type SequenceKind,
  type SequenceKindMap,
  type SequenceOutput,
  type SequenceRepresentation,
} from "./representations";
import type { ReaderState } from "./types";

const latin1 = new TextDecoder("latin1");
const CONTEXT_PREVIEW_LENGTH = 40;

export class FastaReader<T = string> implements Iterable<FastaEntry<T>> {
  private readonly chunks: ChunkedByteSource;
  private readonly lines: LineAssembler;
  private record = new Uint8Array(FASTA_CHUNK_SIZE);
  private recordSize = 0;
  private state: ReaderState = "fresh";
  private parsed = 0;
  private closed = false;

  /**
   * @param stream - Byte stream to parse
   * @param representation - Conversion applied to each record's sequence bytes
   * @param options - Reader options; `compression` only matters to `open`
   * @param ownsStream - Whether `close()` also closes `stream`
   */
  constructor(
    private readonly stream: ByteSource,
    private readonly representation: SequenceRepresentation<T>,
    options: FastaReaderOptions = {},
    private readonly ownsStream = false
  ) {
    const validationResult = FastaReaderOptionsSchema(options);
    if (validationResult instanceof type.errors) {
      throw new ValidationError(
        `Invalid FASTA reader options: ${validationResult.summary}`,
        "INVALID_OPTIONS"
      );
    }
    this.chunks = new ChunkedByteSource(stream, options.chunkSize ?? FASTA_CHUNK_SIZE);
    this.lines = new LineAssembler(this.chunks);
  }

  /**
   * Open a reader over a path (owned, gzip detected) or a stream (not owned)
   */
  static open(input: FastaInput): FastaReader<string>;
  static open<K extends SequenceKind>(
    input: FastaInput,
    output: K,
    options?: FastaReaderOptions
  ): FastaReader<SequenceKindMap[K]>;
  static open<U>(
    input: FastaInput,
    output: SequenceConverter<U> | SequenceRepresentation<U>,
    options?: FastaReaderOptions
  ): FastaReader<U>;
  static open(
    input: FastaInput,
    output: SequenceOutput<unknown> = "string",
    options: FastaReaderOptions = {}
  ): FastaReader<unknown> {
    return FastaReader.create(input, resolveRepresentation(output), options);
  }

  /**
   * Non-overloaded form of `open` for an already-resolved representation
   */
  static create<U>(
    input: FastaInput,
    representation: SequenceRepresentation<U>,
    options: FastaReaderOptions = {}
  ): FastaReader<U> {
    if (typeof input !== "string") {
      return new FastaReader(input, representation, options, false);
    }
    const stream = openSource(input, options.compression ?? "auto");
    try {
      return new FastaReader(stream, representation, options, true);
    } catch (error) {
      stream.close();
      throw error;
    }
  }

  /** Records returned since construction or the last rewind */
  get numParsed(): number {
    return this.parsed;
  }

  /** Physical line number (1-based) of the most recently fetched line */
  get lineNumber(): number {
    return this.lines.lineNumber;
  }

  /**
   * True once the stream is exhausted and no further record can be read
   */
  eof(): boolean {
    return this.state === "exhausted";
  }

  /**
   * Seek the stream back to its start and reset all counters
   * @throws {FileError} NOT_SEEKABLE when the stream cannot seek
   */
  rewind(): void {
    this.ensureOpen();
    this.chunks.rewind();
    this.reset();
  }

  /**
   * Read the next record, continuing from wherever the reader stands
   * @throws {EndOfFileError} When the reader is already exhausted
   * @throws {ParseError} EMPTY_FILE on the first read of an empty stream, or a format error
   */
  readEntry(): FastaEntry<T> {
    this.ensureOpen();
    if (this.state === "exhausted") {
      throw new EndOfFileError(`no more FASTA entries in ${this.stream.name}`);
    }
    if (this.state === "fresh") {
      this.prime();
    }
    return this.nextRecord();
  }

  /**
   * Iterate every record from the beginning of the stream
   *
   * Always starts over from offset 0, unlike repeated `readEntry` calls
   * which carry on in place. A stream without seek support is read from
   * where it stands, once.
   */
  *[Symbol.iterator](): Generator<FastaEntry<T>, void, undefined> {
    this.ensureOpen();
    if (this.chunks.seekable || this.chunks.bytesRead > 0) {
      this.chunks.rewind();
    }
    this.reset();
    this.prime();
    while (this.state !== "exhausted") {
      yield this.nextRecord();
    }
  }

  /**
   * Release the stream if this reader owns it; later calls are no-ops
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.state = "exhausted";
    if (this.ownsStream) {
      this.stream.close();
    }
  }

  toString(): string {
    return (
      `FastaReader(input="${this.stream.name}", output=${this.representation.name}, ` +
      `numParsed=${this.parsed}, eof=${this.eof()})`
    );
  }

  private reset(): void {
    this.lines.reset();
    this.recordSize = 0;
    this.parsed = 0;
    this.state = "fresh";
  }

  private prime(): void {
    if (!this.lines.nextLine()) {
      this.state = "exhausted";
      throw new ParseError(`empty FASTA file: ${this.stream.name}`, "EMPTY_FILE");
    }
    this.state = "in-record";
  }

  /**
   * Parse the record whose description line the assembler currently holds,
   * leaving the next description line (if any) in place
   */
  private nextRecord(): FastaEntry<T> {
    const description = this.parseDescription();

    this.recordSize = 0;
    for (;;) {
      if (!this.lines.nextLine()) {
        this.state = "exhausted";
        break;
      }
      if (this.lines.firstByte === CharCode.MARKER) break;
      this.appendToRecord(this.lines.line);
    }

    const sequence = this.representation.convert(this.record.subarray(0, this.recordSize));
    this.parsed++;
    return { description, sequence };
  }

  private parseDescription(): string {
    const line = this.lines.line;
    const lineNumber = this.lines.lineNumber;

    if (this.lines.firstByte !== CharCode.MARKER) {
      throw new ParseError(
        "invalid FASTA file: description does not start with '>'",
        "MALFORMED_RECORD",
        lineNumber,
        preview(line)
      );
    }

    let start = 1;
    let end = line.length;
    while (start < end && isAsciiSpace(line[start] ?? 0)) start++;
    while (end > start && isAsciiSpace(line[end - 1] ?? 0)) end--;

    if (start === end) {
      throw new ParseError(
        "invalid FASTA file: empty description",
        "EMPTY_DESCRIPTION",
        lineNumber,
        preview(line)
      );
    }
    const body = line.subarray(start, end);
    if (body.some((byte) => byte > CharCode.ASCII_MAX)) {
      throw new ParseError(
        "invalid FASTA file: non-ASCII description",
        "NON_ASCII_DESCRIPTION",
        lineNumber,
        preview(line)
      );
    }
    return latin1.decode(body);
  }

  private appendToRecord(bytes: Uint8Array): void {
    const needed = this.recordSize + bytes.length;
    if (needed > this.record.length) {
      const grown = new Uint8Array(Math.max(needed, this.record.length * 2));
      grown.set(this.record.subarray(0, this.recordSize));
      this.record = grown;
    }
    this.record.set(bytes, this.recordSize);
    this.recordSize = needed;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StreamError(`FASTA reader for ${this.stream.name} is closed`, "read");
    }
  }
}

function preview(line: Uint8Array): string {
  return latin1.decode(line.subarray(0, CONTEXT_PREVIEW_LENGTH));
}
