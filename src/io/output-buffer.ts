/**
 * Byte-at-a-time output staging for sinks
 *
 * The FASTA writer emits single characters; this collects them into
 * fixed-size blocks so the sink sees a few large writes instead.
 */

import type { ByteSink } from "./streams";

const DEFAULT_BLOCK_SIZE = 65536;

export class OutputBuffer {
  private readonly block: Uint8Array;
  private used = 0;

  constructor(
    readonly sink: ByteSink,
    blockSize = DEFAULT_BLOCK_SIZE
  ) {
    this.block = new Uint8Array(blockSize);
  }

  writeByte(code: number): void {
    if (this.used === this.block.length) {
      this.drain();
    }
    this.block[this.used++] = code;
  }

  /**
   * Stage ASCII text; callers have already checked every code is < 0x80
   */
  writeAscii(text: string): void {
    for (let i = 0; i < text.length; i++) {
      this.writeByte(text.charCodeAt(i));
    }
  }

  /**
   * Hand staged bytes to the sink without flushing the sink itself
   */
  drain(): void {
    if (this.used === 0) return;
    const pending = this.block.slice(0, this.used);
    this.used = 0;
    this.sink.write(pending);
  }

  flush(): void {
    this.drain();
    this.sink.flush();
  }
}
