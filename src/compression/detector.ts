/**
 * Compression format detection
 *
 * Gzip is recognised either by file extension or by the two-byte magic
 * number at the start of the member.
 */

import type { CompressionFormat } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_EXTENSIONS = [".gz", ".gzip"] as const;

/**
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("/data/genome.fasta.gz"); // "gzip"
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // "gzip"
 * ```
 */
export class CompressionDetector {
  static fromExtension(filePath: string): CompressionFormat {
    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    return bytes.length >= 2 &&
      bytes[0] === GZIP_MAGIC_FIRST_BYTE &&
      bytes[1] === GZIP_MAGIC_SECOND_BYTE
      ? "gzip"
      : "none";
  }
}
