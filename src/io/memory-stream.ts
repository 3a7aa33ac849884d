/**
 * In-memory byte streams
 *
 * Let FASTA text held in a string or buffer go through exactly the same
 * reader and writer paths as files do.
 */

import { EndOfFileError } from "../errors";
import type { ByteSink, ByteSource } from "./streams";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Seekable source over a fixed buffer
 */
export class MemoryByteSource implements ByteSource {
  private readonly data: Uint8Array;
  private position = 0;

  constructor(
    data: Uint8Array | string,
    readonly name = "<memory>"
  ) {
    this.data = typeof data === "string" ? encoder.encode(data) : data;
  }

  read(buffer: Uint8Array): number {
    const count = Math.min(buffer.length, this.data.length - this.position);
    buffer.set(this.data.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  seek(offset: number): void {
    this.position = Math.min(Math.max(offset, 0), this.data.length);
  }

  close(): void {}
}

/**
 * Sink that keeps everything written to it
 *
 * With a `capacity`, writes that would overflow it store what fits and
 * then throw EndOfFileError, the way a full device reports end of stream.
 */
export class MemoryByteSink implements ByteSink {
  private readonly chunks: Uint8Array[] = [];
  private size = 0;
  private closed = false;

  constructor(
    readonly name = "<memory>",
    private readonly capacity = Number.POSITIVE_INFINITY
  ) {}

  write(bytes: Uint8Array): void {
    if (this.closed) {
      throw new EndOfFileError(`write to closed sink ${this.name}`);
    }
    const room = this.capacity - this.size;
    const accepted = bytes.length <= room ? bytes : bytes.subarray(0, room);
    if (accepted.length > 0) {
      this.chunks.push(accepted.slice());
      this.size += accepted.length;
    }
    if (accepted.length < bytes.length) {
      throw new EndOfFileError(`sink ${this.name} is full (${this.capacity} bytes)`);
    }
  }

  flush(): void {}

  close(): void {
    this.closed = true;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Everything written so far, as one buffer
   */
  bytes(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }

  text(): string {
    return decoder.decode(this.bytes());
  }
}
