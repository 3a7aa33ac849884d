/**
 * Logical line assembly over a chunked byte source
 *
 * A logical line is the bytes up to (not including) '\n', with one
 * trailing '\r' removed. Lines may span any number of chunks. Zero-length
 * lines are skipped; a line holding only whitespace is not zero-length
 * and is returned like any other. A final line without '\n' counts as a
 * complete line.
 */

import type { ChunkedByteSource } from "../../io/chunked-source";
import { CharCode, FASTA_CHUNK_SIZE } from "./constants";

export class LineAssembler {
  private buffer = new Uint8Array(FASTA_CHUNK_SIZE);
  private size = 0;
  private physicalLines = 0;

  constructor(private readonly source: ChunkedByteSource) {}

  /**
   * Advance to the next non-empty line
   * @returns false once the source holds no further line
   */
  nextLine(): boolean {
    for (;;) {
      this.size = 0;
      let terminated = false;
      let sawBytes = false;

      while (!terminated) {
        if (this.source.available === 0 && this.source.fill() === 0) break;
        const window = this.source.window;
        const newline = window.indexOf(CharCode.NEWLINE);
        const end = newline === -1 ? window.length : newline;
        this.append(window, end);
        this.source.consume(newline === -1 ? end : end + 1);
        sawBytes = true;
        terminated = newline !== -1;
      }

      if (!sawBytes) return false;
      this.physicalLines++;
      if (this.size > 0 && this.buffer[this.size - 1] === CharCode.CARRIAGE_RETURN) {
        this.size--;
      }
      if (this.size > 0) return true;
      if (!terminated) return false;
    }
  }

  /** Current line; a view that the next `nextLine` call overwrites */
  get line(): Uint8Array {
    return this.buffer.subarray(0, this.size);
  }

  get length(): number {
    return this.size;
  }

  /** First byte of the current line, or -1 when it is empty */
  get firstByte(): number {
    return this.size > 0 ? (this.buffer[0] ?? -1) : -1;
  }

  /** 1-based physical line number of the current line, blank lines included */
  get lineNumber(): number {
    return this.physicalLines;
  }

  reset(): void {
    this.size = 0;
    this.physicalLines = 0;
  }

  private append(bytes: Uint8Array, count: number): void {
    const needed = this.size + count;
    if (needed > this.buffer.length) {
      const grown = new Uint8Array(Math.max(needed, this.buffer.length * 2));
      grown.set(this.buffer.subarray(0, this.size));
      this.buffer = grown;
    }
    this.buffer.set(bytes.subarray(0, count), this.size);
    this.size = needed;
  }
}
