/**
 * File-descriptor backed byte streams
 *
 * Uses the synchronous `node:fs` calls so that a FASTA reader or writer
 * can be driven one record at a time without awaiting anything. Regular
 * files are read by position and can seek; pipes, terminals and other
 * special files are read sequentially and cannot.
 */

import { closeSync, fstatSync, openSync, readSync, writeSync } from "node:fs";
import { FileError } from "../errors";
import type { ByteSink, ByteSource } from "./streams";

/**
 * Seekable reader over a regular file
 */
export class FileByteSource implements ByteSource {
  private position = 0;
  private closed = false;

  constructor(
    private readonly fd: number,
    readonly name: string,
    private readonly owned: boolean
  ) {}

  read(buffer: Uint8Array): number {
    try {
      const count = readSync(this.fd, buffer, 0, buffer.length, this.position);
      this.position += count;
      return count;
    } catch (error) {
      throw FileError.fromSystemError("read", this.name, error);
    }
  }

  /**
   * Read the first bytes of the file without moving the cursor
   */
  peek(length: number): Uint8Array {
    const head = new Uint8Array(length);
    try {
      const count = readSync(this.fd, head, 0, length, 0);
      return head.subarray(0, count);
    } catch (error) {
      throw FileError.fromSystemError("read", this.name, error);
    }
  }

  seek(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new FileError(`invalid seek offset ${offset}`, this.name, "seek", new RangeError());
    }
    this.position = offset;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.owned) return;
    try {
      closeSync(this.fd);
    } catch (error) {
      throw FileError.fromSystemError("close", this.name, error);
    }
  }
}

/**
 * Sequential reader over a pipe, FIFO or terminal
 *
 * Has no `seek`, so a reader over it fails with NOT_SEEKABLE on rewind.
 * Bytes taken by `peek` are replayed by the following reads.
 */
export class PipeByteSource implements ByteSource {
  private replay: Uint8Array = new Uint8Array(0);
  private closed = false;

  constructor(
    private readonly fd: number,
    readonly name: string,
    private readonly owned: boolean
  ) {}

  read(buffer: Uint8Array): number {
    if (this.replay.length > 0) {
      const count = Math.min(buffer.length, this.replay.length);
      buffer.set(this.replay.subarray(0, count));
      this.replay = this.replay.subarray(count);
      return count;
    }
    return this.readNext(buffer);
  }

  /**
   * Look at the next `length` bytes without consuming them
   *
   * Returns fewer bytes only when the stream ends first.
   */
  peek(length: number): Uint8Array {
    while (this.replay.length < length) {
      const chunk = new Uint8Array(length - this.replay.length);
      const count = this.readNext(chunk);
      if (count === 0) break;
      const joined = new Uint8Array(this.replay.length + count);
      joined.set(this.replay);
      joined.set(chunk.subarray(0, count), this.replay.length);
      this.replay = joined;
    }
    return this.replay.slice(0, length);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.owned) return;
    try {
      closeSync(this.fd);
    } catch (error) {
      throw FileError.fromSystemError("close", this.name, error);
    }
  }

  private readNext(buffer: Uint8Array): number {
    try {
      return readSync(this.fd, buffer, 0, buffer.length, null);
    } catch (error) {
      throw FileError.fromSystemError("read", this.name, error);
    }
  }
}

export type DescriptorByteSource = FileByteSource | PipeByteSource;

function sourceFor(fd: number, name: string, owned: boolean): DescriptorByteSource {
  const regular = fstatSync(fd).isFile();
  return regular ? new FileByteSource(fd, name, owned) : new PipeByteSource(fd, name, owned);
}

/**
 * Open `path` for reading; the returned source owns the descriptor
 *
 * Regular files come back seekable, anything else (a FIFO, `/dev/stdin`)
 * as a sequential PipeByteSource.
 * @throws {FileError} If the file cannot be opened
 */
export function openFileSource(path: string): DescriptorByteSource {
  let fd: number;
  try {
    fd = openSync(path, "r");
  } catch (error) {
    throw FileError.fromSystemError("open", path, error);
  }
  try {
    return sourceFor(fd, path, true);
  } catch (error) {
    closeSync(fd);
    throw FileError.fromSystemError("open", path, error);
  }
}

/**
 * Wrap an already-open descriptor such as standard input; `close()` leaves it open
 * @throws {FileError} If the descriptor cannot be inspected
 */
export function sourceFromDescriptor(fd: number, name = `fd:${fd}`): DescriptorByteSource {
  try {
    return sourceFor(fd, name, false);
  } catch (error) {
    throw FileError.fromSystemError("open", name, error);
  }
}

/**
 * Writer over a file descriptor
 */
export class FileByteSink implements ByteSink {
  private closed = false;

  private constructor(
    private readonly fd: number,
    readonly name: string,
    private readonly owned: boolean
  ) {}

  /**
   * Open `path` for writing, truncating (`"w"`) or appending (`"a"`)
   * @throws {FileError} If the file cannot be opened
   */
  static open(path: string, mode: "w" | "a" = "w"): FileByteSink {
    try {
      return new FileByteSink(openSync(path, mode), path, true);
    } catch (error) {
      throw FileError.fromSystemError("open", path, error);
    }
  }

  /**
   * Wrap an already-open descriptor such as standard output
   */
  static fromDescriptor(fd: number, name = `fd:${fd}`): FileByteSink {
    return new FileByteSink(fd, name, false);
  }

  write(bytes: Uint8Array): void {
    let offset = 0;
    try {
      while (offset < bytes.length) {
        offset += writeSync(this.fd, bytes, offset, bytes.length - offset);
      }
    } catch (error) {
      throw FileError.fromSystemError("write", this.name, error);
    }
  }

  // writeSync hands bytes straight to the kernel, nothing is held here
  flush(): void {}

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.owned) return;
    try {
      closeSync(this.fd);
    } catch (error) {
      throw FileError.fromSystemError("close", this.name, error);
    }
  }
}
