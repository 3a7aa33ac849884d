/**
 * Tests for the error taxonomy
 */

import { describe, expect, test } from "vitest";
import {
  CompressionError,
  EndOfFileError,
  FastaStreamError,
  FileError,
  ParseError,
  StreamError,
  toFastaError,
  ValidationError,
} from "../src/errors";

describe("FastaStreamError", () => {
  test("toString includes line and context", () => {
    const error = new ParseError("invalid FASTA file: empty description", "EMPTY_DESCRIPTION", 7, ">");

    expect(error.toString()).toBe(
      "ParseError: invalid FASTA file: empty description (line 7)\nContext: >"
    );
    expect(error).toBeInstanceOf(FastaStreamError);
  });

  test("validation errors name the entry in their message", () => {
    const error = new ValidationError("empty sequence data", "EMPTY_SEQUENCE", 3);

    expect(error.message).toBe("empty sequence data (entry 3)");
    expect(error.entry).toBe(3);
    expect(error.toString()).toBe("ValidationError: empty sequence data (entry 3)");
  });

  test("end of file and closed streams carry their codes", () => {
    expect(new EndOfFileError().code).toBe("END_OF_FILE");
    expect(new EndOfFileError().message).toBe("end of file reached");
    expect(new StreamError("closed", "write")).toMatchObject({
      code: "STREAM_CLOSED",
      streamType: "write",
    });
  });
});

describe("FileError", () => {
  test("maps operations to codes", () => {
    expect(new FileError("x", "f", "read").code).toBe("READ_FAILURE");
    expect(new FileError("x", "f", "write").code).toBe("WRITE_FAILURE");
    expect(new FileError("x", "f", "flush").code).toBe("WRITE_FAILURE");
    expect(new FileError("x", "f", "seek").code).toBe("NOT_SEEKABLE");
    expect(new FileError("x", "f", "open").code).toBe("FILE_ERROR");
    expect(new FileError("x", "f", "close").code).toBe("FILE_ERROR");
  });

  test("fromSystemError adds a suggestion and keeps the cause", () => {
    const cause = new Error("ENOENT: no such file or directory, open 'x.fa'");

    const error = FileError.fromSystemError("open", "x.fa", cause);

    expect(error.message).toBe(
      "open operation failed: ENOENT: no such file or directory, open 'x.fa'. " +
        "Check that the file path is correct and the file exists"
    );
    expect(error.systemError).toBe(cause);
    expect(error.toString()).toContain("\nSystem Error: Error: ENOENT");
  });

  test("notSeekable names the stream", () => {
    const error = FileError.notSeekable("<stdin>");

    expect(error.message).toBe("stream is not seekable: <stdin>");
    expect(error.code).toBe("NOT_SEEKABLE");
  });
});

describe("CompressionError", () => {
  test("fromSystemError records the operation and bytes processed", () => {
    const error = CompressionError.fromSystemError("decompress", new Error("invalid gzip data"), 42);

    expect(error.message).toBe(
      "gzip decompress failed: invalid gzip data. Data integrity check failed - file may be corrupted"
    );
    expect(error.toString()).toContain("\nBytes processed: 42");
    expect(error.code).toBe("COMPRESSION_ERROR");
  });
});

describe("toFastaError", () => {
  test("passes our errors through and wraps the rest", () => {
    const ours = new EndOfFileError();
    expect(toFastaError(ours, "read", "f")).toBe(ours);

    const wrapped = toFastaError("boom", "write", "out.fa");
    expect(wrapped).toBeInstanceOf(FileError);
    expect(wrapped.message).toBe("write operation failed: boom");
    expect(wrapped.code).toBe("WRITE_FAILURE");
  });
});
