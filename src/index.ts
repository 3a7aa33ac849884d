/**
 * fasta-stream - incremental FASTA reading and writing
 *
 * Readers hold one record at a time and accept plain or gzip input;
 * writers rebuild record structure from characters, lines or whole
 * entries and wrap sequence data at 80 columns.
 */

// Compression
export { CompressionDetector } from "./compression/detector";
export { GzipByteSink, GzipByteSource } from "./compression/gzip";
// Error types
export {
  CompressionError,
  EndOfFileError,
  FastaStreamError,
  FileError,
  ParseError,
  StreamError,
  toFastaError,
  ValidationError,
  type FastaErrorCode,
} from "./errors";
// FASTA format
export {
  acquireFastaReader,
  acquireFastaWriter,
  acquireResource,
  defaultWarningHandler,
  FASTA_CHUNK_SIZE,
  FastaReader,
  FastaWriter,
  LINE_WIDTH,
  MAX_DESCRIPTION_LENGTH,
  readFasta,
  resolveRepresentation,
  SequenceRepresentations,
  withFastaReader,
  withFastaWriter,
  withResource,
  writeFasta,
  type Closeable,
  type FastaToken,
  type SequenceConverter,
  type SequenceData,
  type SequenceKind,
  type SequenceKindMap,
  type SequenceOutput,
  type SequenceRepresentation,
} from "./formats/fasta";
// Byte streams
export { ChunkedByteSource } from "./io/chunked-source";
export {
  FileByteSink,
  FileByteSource,
  openFileSource,
  PipeByteSource,
  sourceFromDescriptor,
  type DescriptorByteSource,
} from "./io/file-stream";
export { MemoryByteSink, MemoryByteSource } from "./io/memory-stream";
export { openSink, openSource } from "./io/open";
export { isSeekable, type ByteSink, type ByteSource } from "./io/streams";
// Shared types
export type {
  CompressionChoice,
  CompressionFormat,
  FastaEntry,
  FastaInput,
  FastaOutput,
  FastaReaderOptions,
  FastaWriterOptions,
  WarningHandler,
} from "./types";
