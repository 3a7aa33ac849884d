/**
 * Streaming FASTA writer
 *
 * A character sink that rebuilds record boundaries from the '>' marker
 * with no lookahead: input may arrive one character at a time, one line
 * at a time, or one whole entry at a time, in any mix. Sequence data is
 * re-wrapped to 80 columns.
 *
 * @example Entry at a time
 * ```typescript
 * const writer = FastaWriter.open("out.fasta.gz");
 * try {
 *   writer.writeEntry("seq1 chromosome 1", "ACGT...");
 *   writer.writeEntry("seq2", "GGCC...");
 * } finally {
 *   writer.close();
 * }
 * ```
 *
 * @example Line at a time
 * ```typescript
 * writer.writeToken([">seq1", "ACGT", "ACGT", ">seq2", "TTTT"]);
 * ```
 */

import { type } from "arktype";
import { EndOfFileError, StreamError, ValidationError } from "../../errors";
import { FileByteSink } from "../../io/file-stream";
import { openSink } from "../../io/open";
import { OutputBuffer } from "../../io/output-buffer";
import type { ByteSink } from "../../io/streams";
import {
  FastaWriterOptionsSchema,
  type FastaOutput,
  type FastaWriterOptions,
  type WarningHandler,
} from "../../types";
import { CharCode, LINE_WIDTH, WARNINGS } from "./constants";
import {
  describeCode,
  isAsciiSpace,
  lastLineWidth,
  normalizeDescription,
  reflowSequence,
} from "./primitives";
import type { FastaToken, SequenceData, WriterState } from "./types";

const STDOUT_FD = 1;

export const defaultWarningHandler: WarningHandler = (warning, entry) => {
  console.warn(`FASTA Warning (entry ${entry}): ${warning}`);
};

/**
 * @throws {ValidationError} INVALID_OPTIONS with the schema's summary
 */
export function assertWriterOptions(options: FastaWriterOptions): void {
  const validationResult = FastaWriterOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(
      `Invalid FASTA writer options: ${validationResult.summary}`,
      "INVALID_OPTIONS"
    );
  }
}

export class FastaWriter {
  private readonly out: OutputBuffer;
  private readonly onWarning: WarningHandler;
  private inSeq = false;
  private entryChars = 0;
  private descChars = 0;
  private parsedNl = false;
  private pos = 0;
  private entryNumber = 1;
  private atStart = true;
  private closed = false;

  /**
   * @param sink - Destination stream
   * @param options - Writer options; `mode` and compression only matter to `open`
   * @param ownsSink - Whether `close()` also closes `sink`
   */
  constructor(
    private readonly sink: ByteSink,
    options: FastaWriterOptions = {},
    private readonly ownsSink = false
  ) {
    assertWriterOptions(options);
    this.out = new OutputBuffer(sink);
    this.onWarning = options.onWarning ?? defaultWarningHandler;
  }

  /**
   * Open a writer over a path (owned, gzip by extension) or a stream (not owned)
   */
  static open(output: FastaOutput, options: FastaWriterOptions = {}): FastaWriter {
    if (typeof output !== "string") {
      return new FastaWriter(output, options, false);
    }
    assertWriterOptions(options);
    return new FastaWriter(openSink(output, options), options, true);
  }

  /**
   * Writer on standard output; closing it leaves stdout open
   */
  static stdout(options: FastaWriterOptions = {}): FastaWriter {
    return new FastaWriter(FileByteSink.fromDescriptor(STDOUT_FD, "<stdout>"), options, false);
  }

  /** 1-based number of the record currently being written */
  get entry(): number {
    return this.entryNumber;
  }

  get state(): WriterState {
    if (this.atStart) return "at-start";
    return this.inSeq ? "in-sequence" : "in-description";
  }

  /**
   * Write one character, given as a one-character string or a byte code
   *
   * Leading whitespace of a description and all whitespace in sequence
   * data is dropped. A newline ends the description line; sequence
   * newlines only mark where a following '>' may start the next record.
   */
  writeChar(c: string | number): void {
    this.ensureOpen();
    const code = this.toCharCode(c);
    if (code > CharCode.ASCII_MAX) {
      throw new ValidationError(
        `invalid (non-ASCII) character: ${describeCode(code)}`,
        "NON_ASCII_CHARACTER",
        this.entryNumber
      );
    }

    if (code === CharCode.NEWLINE && !this.atStart) {
      this.parsedNl = true;
      if (!this.inSeq) {
        if (this.descChars === 1) {
          throw new ValidationError("empty description", "EMPTY_DESCRIPTION", this.entryNumber);
        }
        this.out.writeByte(CharCode.NEWLINE);
        this.pos = 0;
        this.inSeq = true;
      }
    }

    // descChars <= 1 covers leading whitespace only; once the description has content,
    // whitespace before its newline is written as-is
    if (isAsciiSpace(code) && (this.atStart || this.inSeq || this.descChars <= 1)) return;

    if (this.atStart && code !== CharCode.MARKER) {
      throw new ValidationError(
        "no description given",
        "MISSING_DESCRIPTION_MARKER",
        this.entryNumber
      );
    }
    this.atStart = false;

    if (this.parsedNl) {
      if (code === CharCode.MARKER) {
        if (this.entryChars === 0) {
          throw new ValidationError(
            "description must span a single line",
            "SINGLE_LINE_DESCRIPTION",
            this.entryNumber
          );
        }
        this.out.writeByte(CharCode.NEWLINE);
        this.inSeq = false;
        this.pos = 0;
        this.entryNumber++;
        this.entryChars = 0;
        this.descChars = 0;
      }
    } else if (this.inSeq && code === CharCode.MARKER) {
      throw new ValidationError(
        "character '>' not allowed in sequence data",
        "STRAY_MARKER_IN_SEQUENCE",
        this.entryNumber
      );
    }

    if (this.pos === LINE_WIDTH) {
      if (!this.inSeq) {
        this.onWarning(WARNINGS.DESCRIPTION_TOO_LONG, this.entryNumber);
      } else {
        this.out.writeByte(CharCode.NEWLINE);
        this.pos = 0;
      }
    }

    this.out.writeByte(code);
    this.pos++;
    if (this.inSeq) {
      this.entryChars++;
    } else {
      this.descChars++;
    }
    this.parsedNl = false;
  }

  /**
   * Write a line, a byte code, a run of bytes, or a collection of those
   * @see FastaToken
   */
  writeToken(item: FastaToken): void {
    if (typeof item === "string") {
      for (const c of item) this.writeChar(c);
      this.writeChar(CharCode.NEWLINE);
    } else if (typeof item === "number") {
      this.writeChar(item);
    } else if (item instanceof Uint8Array) {
      for (const code of item) this.writeChar(code);
    } else {
      for (const token of item) this.writeToken(token);
    }
  }

  /**
   * Write a complete record: the description on one line, then the
   * sequence wrapped at 80 columns
   */
  writeEntry(description: string, sequence: SequenceData): void {
    this.ensureOpen();
    const desc = normalizeDescription(
      description,
      this.atStart ? this.entryNumber : this.entryNumber + 1
    );

    if (!this.atStart) this.writeChar(CharCode.NEWLINE);
    this.writeChar(CharCode.MARKER);
    for (let i = 0; i < desc.length; i++) this.writeChar(desc.charCodeAt(i));
    this.writeChar(CharCode.NEWLINE);

    this.entryChars = reflowSequence(sequence, this.out, this.entryNumber);
    this.inSeq = true;
    this.parsedNl = false;
    this.pos = lastLineWidth(this.entryChars);
    if (this.entryChars === 0) {
      throw new ValidationError("empty sequence data", "EMPTY_SEQUENCE", this.entryNumber);
    }
  }

  /**
   * Push staged bytes through to the sink
   */
  flush(): void {
    this.ensureOpen();
    this.out.flush();
  }

  /**
   * Terminate the last line, flush, and close the sink if this writer owns it
   *
   * A sink reporting end of stream on that final write is tolerated;
   * any other failure propagates. Later calls are no-ops.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      try {
        this.out.writeByte(CharCode.NEWLINE);
        this.out.flush();
      } catch (error) {
        if (!(error instanceof EndOfFileError)) throw error;
      }
    } finally {
      if (this.ownsSink) this.sink.close();
    }
  }

  toString(): string {
    return `FastaWriter(output="${this.sink.name}", entry=${this.entryNumber})`;
  }

  private toCharCode(c: string | number): number {
    if (typeof c === "number") {
      if (!Number.isInteger(c) || c < 0 || c > 0xff) {
        throw new ValidationError(`invalid byte value ${c}`, "INVALID_CHARACTER", this.entryNumber);
      }
      return c;
    }
    const code = c.codePointAt(0);
    if (code === undefined || String.fromCodePoint(code) !== c) {
      throw new ValidationError(
        `expected a single character, got ${JSON.stringify(c)}`,
        "INVALID_CHARACTER",
        this.entryNumber
      );
    }
    return code;
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new StreamError(`FASTA writer for ${this.sink.name} is closed`, "write");
    }
  }
}
