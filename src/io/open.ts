/**
 * Path → stream resolution
 *
 * Picks the plain or gzip stream for a path. Streams returned here are
 * owned by whoever opened them and must be closed by that caller.
 */

import { CompressionDetector } from "../compression/detector";
import { GzipByteSink, GzipByteSource } from "../compression/gzip";
import type { CompressionChoice } from "../types";
import { FileByteSink, openFileSource } from "./file-stream";
import type { ByteSink, ByteSource } from "./streams";

const GZIP_MAGIC_LENGTH = 2;

/**
 * Open a FASTA file for reading, decompressing gzip transparently
 *
 * With `"auto"` the magic bytes decide, so a plain file named .gz still
 * reads as plain text. On a pipe the sniffed bytes are replayed to the
 * first read.
 */
export function openSource(path: string, compression: CompressionChoice = "auto"): ByteSource {
  const file = openFileSource(path);
  try {
    const gzip =
      compression === "gzip" ||
      (compression === "auto" &&
        CompressionDetector.fromMagicBytes(file.peek(GZIP_MAGIC_LENGTH)) === "gzip");
    return gzip ? new GzipByteSource(file) : file;
  } catch (error) {
    file.close();
    throw error;
  }
}

/**
 * Open a FASTA file for writing; `"auto"` compresses when the path ends in .gz
 */
export function openSink(
  path: string,
  options: { mode?: "w" | "a"; compression?: CompressionChoice; compressionLevel?: number } = {}
): ByteSink {
  const compression = options.compression ?? "auto";
  const file = FileByteSink.open(path, options.mode ?? "w");
  try {
    const gzip =
      compression === "gzip" ||
      (compression === "auto" && CompressionDetector.fromExtension(path) === "gzip");
    return gzip ? new GzipByteSink(file, options.compressionLevel) : file;
  } catch (error) {
    file.close();
    throw error;
  }
}
