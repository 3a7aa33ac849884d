/**
 * Shared types and option schemas
 */

import { type } from "arktype";
import type { ByteSink, ByteSource } from "./io/streams";

/**
 * One FASTA record
 */
export interface FastaEntry<T = string> {
  /** Header text without the leading '>', trimmed */
  readonly description: string;
  readonly sequence: T;
}

/**
 * Where a reader takes its bytes from: a file path, or a stream the caller keeps owning
 */
export type FastaInput = string | ByteSource;

/**
 * Where a writer puts its bytes: a file path, or a stream the caller keeps owning
 */
export type FastaOutput = string | ByteSink;

export type CompressionFormat = "gzip" | "none";

/**
 * `auto` decides from the magic bytes when reading and the file extension when writing
 */
export type CompressionChoice = CompressionFormat | "auto";

/**
 * Warning sink; `entry` is the 1-based record number the warning refers to
 */
export type WarningHandler = (warning: string, entry?: number) => void;

export interface FastaReaderOptions {
  /** Bytes requested from the stream per read (default: 4096) */
  readonly chunkSize?: number;
  /** Compression of a file opened by path (default: "auto") */
  readonly compression?: CompressionChoice;
}

export interface FastaWriterOptions {
  /** Truncate or append when opening a path (default: "w") */
  readonly mode?: "w" | "a";
  /** Compression of a file opened by path (default: "auto", by extension) */
  readonly compression?: CompressionChoice;
  /** Gzip level 0-9 (default: 6) */
  readonly compressionLevel?: number;
  /** Receives non-fatal warnings (default: console.warn) */
  readonly onWarning?: WarningHandler;
}

export const CompressionChoiceSchema = type("'auto'|'gzip'|'none'");

export const FastaReaderOptionsSchema = type({
  "chunkSize?": "number.integer>0",
  "compression?": CompressionChoiceSchema,
});

export const FastaWriterOptionsSchema = type({
  "mode?": "'w'|'a'",
  "compression?": CompressionChoiceSchema,
  "compressionLevel?": "0<=number.integer<=9",
});
