/**
 * Byte stream contracts shared by the FASTA reader and writer
 *
 * Both sides are synchronous: every call performs its I/O and returns (or
 * throws) before the next call is issued. Plain files, gzip members and
 * in-memory buffers all sit behind these two interfaces, so the parsing
 * code never knows which one it is talking to.
 */

/**
 * Readable byte stream
 */
export interface ByteSource {
  /** Human-readable origin, used in messages and `toString()` */
  readonly name: string;

  /**
   * Copy up to `buffer.length` bytes into `buffer`
   * @returns Number of bytes copied; 0 only at end of stream
   */
  read(buffer: Uint8Array): number;

  /**
   * Reposition to an absolute byte offset. Sources that cannot seek
   * (pipes, terminals) leave this undefined.
   */
  seek?(offset: number): void;

  close(): void;
}

/**
 * Writable byte stream
 */
export interface ByteSink {
  readonly name: string;
  write(bytes: Uint8Array): void;
  flush(): void;
  close(): void;
}

/**
 * Whether a source supports repositioning
 */
export function isSeekable(
  source: ByteSource
): source is ByteSource & { seek(offset: number): void } {
  return typeof source.seek === "function";
}
