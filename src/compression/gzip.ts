/**
 * Incremental gzip streams on fflate
 *
 * fflate's streaming Gunzip/Gzip run synchronously inside `push`, which
 * lets a compressed file sit behind the same blocking ByteSource/ByteSink
 * contract as a plain one. Only one chunk of compressed input and the
 * output it inflates to are held at any time.
 */

import { Gunzip, Gzip, type DeflateOptions } from "fflate";
import { CompressionError, FastaStreamError } from "../errors";
import { isSeekable, type ByteSink, type ByteSource } from "../io/streams";

const COMPRESSED_CHUNK_SIZE = 65536;
const DEFAULT_LEVEL = 6;

const DEFLATE_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const;

function toDeflateLevel(level: number): DeflateOptions["level"] {
  const match = DEFLATE_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(`gzip level must be an integer 0-9, got ${level}`, "compress");
  }
  return match;
}

/**
 * Decompressing view over a gzip-compressed source
 *
 * Seeking restarts decompression from the beginning of the inner source
 * and discards output up to the requested offset; over a source that
 * cannot seek, `seek` is left undefined. Closing it closes the inner
 * source.
 */
export class GzipByteSource implements ByteSource {
  private gunzip: Gunzip;
  private readonly pending: Uint8Array[] = [];
  private pendingOffset = 0;
  private readonly input: Uint8Array;
  private inputDone = false;
  private compressedBytes = 0;
  readonly seek?: (offset: number) => void;

  constructor(
    private readonly inner: ByteSource,
    chunkSize = COMPRESSED_CHUNK_SIZE
  ) {
    this.input = new Uint8Array(chunkSize);
    this.gunzip = this.createGunzip();
    if (isSeekable(inner)) {
      this.seek = (offset: number): void => this.restart(inner, offset);
    }
  }

  get name(): string {
    return this.inner.name;
  }

  read(buffer: Uint8Array): number {
    while (this.pending.length === 0 && !this.inputDone) {
      this.pump();
    }

    let copied = 0;
    while (copied < buffer.length && this.pending.length > 0) {
      const head = this.pending[0];
      if (head === undefined) break;
      const count = Math.min(buffer.length - copied, head.length - this.pendingOffset);
      buffer.set(head.subarray(this.pendingOffset, this.pendingOffset + count), copied);
      copied += count;
      this.pendingOffset += count;
      if (this.pendingOffset === head.length) {
        this.pending.shift();
        this.pendingOffset = 0;
      }
    }
    return copied;
  }

  private restart(inner: ByteSource & { seek(offset: number): void }, offset: number): void {
    inner.seek(0);
    this.pending.length = 0;
    this.pendingOffset = 0;
    this.inputDone = false;
    this.compressedBytes = 0;
    this.gunzip = this.createGunzip();

    const scratch = new Uint8Array(Math.min(offset, COMPRESSED_CHUNK_SIZE));
    let remaining = offset;
    while (remaining > 0) {
      const count = this.read(scratch.subarray(0, Math.min(remaining, scratch.length)));
      if (count === 0) break;
      remaining -= count;
    }
  }

  close(): void {
    this.inner.close();
  }

  private createGunzip(): Gunzip {
    const gunzip = new Gunzip();
    gunzip.ondata = (chunk: Uint8Array): void => {
      if (chunk.length > 0) {
        this.pending.push(chunk);
      }
    };
    return gunzip;
  }

  private pump(): void {
    const count = this.inner.read(this.input);
    try {
      if (count === 0) {
        this.inputDone = true;
        // an empty file is an empty stream, not a truncated member
        if (this.compressedBytes > 0) {
          this.gunzip.push(new Uint8Array(0), true);
        }
        return;
      }
      this.compressedBytes += count;
      this.gunzip.push(this.input.slice(0, count));
    } catch (error) {
      throw CompressionError.fromSystemError("decompress", error, this.compressedBytes);
    }
  }
}

/**
 * Compressing sink in front of another sink
 *
 * The gzip trailer is written by `close()`, which also closes the inner sink.
 */
export class GzipByteSink implements ByteSink {
  private readonly gzip: Gzip;
  private closed = false;

  constructor(
    private readonly inner: ByteSink,
    level = DEFAULT_LEVEL
  ) {
    this.gzip = new Gzip({ level: toDeflateLevel(level) });
    this.gzip.ondata = (chunk: Uint8Array): void => {
      this.inner.write(chunk);
    };
  }

  get name(): string {
    return this.inner.name;
  }

  write(bytes: Uint8Array): void {
    this.push(bytes, false);
  }

  flush(): void {
    this.inner.flush();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.push(new Uint8Array(0), true);
      this.inner.flush();
    } finally {
      this.inner.close();
    }
  }

  private push(bytes: Uint8Array, final: boolean): void {
    try {
      this.gzip.push(bytes, final);
    } catch (error) {
      if (error instanceof FastaStreamError) throw error;
      throw CompressionError.fromSystemError("compress", error);
    }
  }
}
