/**
 * Error handling for FASTA reading and writing
 *
 * Every failure raised by this package is a FastaStreamError carrying a
 * machine-readable code, so callers can branch on `error.code` instead of
 * matching message text.
 */

/**
 * Machine-readable failure codes
 */
export type FastaErrorCode =
  | "READ_FAILURE"
  | "WRITE_FAILURE"
  | "NOT_SEEKABLE"
  | "FILE_ERROR"
  | "COMPRESSION_ERROR"
  | "END_OF_FILE"
  | "EMPTY_FILE"
  | "MALFORMED_RECORD"
  | "EMPTY_DESCRIPTION"
  | "NON_ASCII_DESCRIPTION"
  | "NON_ASCII_CHARACTER"
  | "EMBEDDED_NEWLINE"
  | "MISSING_DESCRIPTION_MARKER"
  | "SINGLE_LINE_DESCRIPTION"
  | "STRAY_MARKER_IN_SEQUENCE"
  | "STRAY_MARKER_IN_SEQUENCE_DATA"
  | "EMPTY_SEQUENCE"
  | "EMPTY_SEQUENCE_DATA"
  | "INVALID_CHARACTER"
  | "INVALID_OPTIONS"
  | "STREAM_CLOSED";

/**
 * Base error class for all fasta-stream errors
 */
export class FastaStreamError extends Error {
  constructor(
    message: string,
    public readonly code: FastaErrorCode,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "FastaStreamError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Format errors raised while reading FASTA input
 */
export class ParseError extends FastaStreamError {
  constructor(
    message: string,
    code: Extract<
      FastaErrorCode,
      "EMPTY_FILE" | "MALFORMED_RECORD" | "EMPTY_DESCRIPTION" | "NON_ASCII_DESCRIPTION"
    >,
    lineNumber?: number,
    context?: string
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * Constraint violations raised while writing FASTA output, or for bad options
 */
export class ValidationError extends FastaStreamError {
  constructor(
    message: string,
    code: FastaErrorCode,
    public readonly entry?: number,
    context?: string
  ) {
    super(entry === undefined ? message : `${message} (entry ${entry})`, code, undefined, context);
    this.name = "ValidationError";
  }
}

/**
 * Raised when reading past the last record, or by a sink that cannot take more data
 */
export class EndOfFileError extends FastaStreamError {
  constructor(message = "end of file reached") {
    super(message, "END_OF_FILE");
    this.name = "EndOfFileError";
  }
}

/**
 * Use of a reader or writer after it was closed
 */
export class StreamError extends FastaStreamError {
  constructor(
    message: string,
    public readonly streamType: "read" | "write"
  ) {
    super(message, "STREAM_CLOSED");
    this.name = "StreamError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends FastaStreamError {
  constructor(
    message: string,
    public readonly operation: "detect" | "decompress" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from a codec error
   */
  static fromSystemError(
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(errorMessage);

    return new CompressionError(
      `gzip ${operation} failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("header") || msg.includes("magic")) {
      return "File may be corrupted or not actually gzip compressed";
    }
    if (msg.includes("unexpected eof") || msg.includes("truncated")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("invalid")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors carrying the underlying system error
 */
export class FileError extends FastaStreamError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "open" | "read" | "write" | "seek" | "flush" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, FileError.codeFor(operation), undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  /**
   * Error for rewinding a stream that has no seek support
   */
  static notSeekable(filePath: string): FileError {
    return new FileError(`stream is not seekable: ${filePath}`, filePath, "seek");
  }

  private static codeFor(operation: FileError["operation"]): FastaErrorCode {
    switch (operation) {
      case "read":
        return "READ_FAILURE";
      case "write":
      case "flush":
        return "WRITE_FAILURE";
      case "seek":
        return "NOT_SEEKABLE";
      default:
        return "FILE_ERROR";
    }
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("espipe") || msg.includes("illegal seek")) {
      return "Pipes and terminals cannot be rewound";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Coerce anything thrown into a FastaStreamError, keeping ours untouched
 */
export function toFastaError(
  error: unknown,
  operation: FileError["operation"],
  filePath: string
): FastaStreamError {
  if (error instanceof FastaStreamError) {
    return error;
  }
  return FileError.fromSystemError(operation, filePath, error);
}
