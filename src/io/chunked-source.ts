/**
 * Fixed-size chunk reader over a ByteSource
 *
 * Owns one read buffer that is refilled in place; consumers scan the
 * unconsumed window and advance the cursor with `consume`.
 */

import { FileError, toFastaError } from "../errors";
import { isSeekable, type ByteSource } from "./streams";

export class ChunkedByteSource {
  readonly buffer: Uint8Array;
  private size = 0;
  private cursor = 0;
  private exhausted = false;
  private totalRead = 0;

  constructor(
    readonly stream: ByteSource,
    chunkSize: number
  ) {
    this.buffer = new Uint8Array(chunkSize);
  }

  /**
   * Refill the buffer from the stream, discarding anything unconsumed
   * @returns Bytes now available; 0 means the stream is exhausted
   * @throws {FileError} READ_FAILURE when the stream errors
   */
  fill(): number {
    if (this.exhausted) return 0;
    let count: number;
    try {
      count = this.stream.read(this.buffer);
    } catch (error) {
      throw toFastaError(error, "read", this.stream.name);
    }
    this.size = count;
    this.cursor = 0;
    this.totalRead += count;
    if (count === 0) {
      this.exhausted = true;
    }
    return count;
  }

  /** Unconsumed bytes of the current chunk */
  get window(): Uint8Array {
    return this.buffer.subarray(this.cursor, this.size);
  }

  get available(): number {
    return this.size - this.cursor;
  }

  get isExhausted(): boolean {
    return this.exhausted;
  }

  /** Bytes pulled from the stream since construction or the last rewind */
  get bytesRead(): number {
    return this.totalRead;
  }

  get seekable(): boolean {
    return isSeekable(this.stream);
  }

  consume(count: number): void {
    this.cursor = Math.min(this.cursor + count, this.size);
  }

  /**
   * Seek the stream back to offset 0 and drop buffered bytes
   * @throws {FileError} NOT_SEEKABLE when the stream has no seek support
   */
  rewind(): void {
    if (!isSeekable(this.stream)) {
      throw FileError.notSeekable(this.stream.name);
    }
    try {
      this.stream.seek(0);
    } catch (error) {
      throw toFastaError(error, "seek", this.stream.name);
    }
    this.size = 0;
    this.cursor = 0;
    this.exhausted = false;
    this.totalRead = 0;
  }
}
