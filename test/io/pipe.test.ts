/**
 * Tests for reading FASTA input from named pipes
 *
 * Each test feeds a FIFO from a `cat` child process; opening the read end
 * blocks until that child has opened the write end.
 */

import { execFileSync, spawn } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "fflate";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { GzipByteSource } from "../../src/compression/gzip";
import { FileError } from "../../src/errors";
import { readFasta } from "../../src/formats/fasta/bulk";
import { FastaReader } from "../../src/formats/fasta/reader";
import { openFileSource, PipeByteSource } from "../../src/io/file-stream";
import { openSource } from "../../src/io/open";
import { isSeekable } from "../../src/io/streams";

const TEXT = ">G1\nACGT\n>G2\nTT\n";
const RECORDS = [
  { description: "G1", sequence: "ACGT" },
  { description: "G2", sequence: "TT" },
];

let workDir: string;
let fifo: string;

function feed(contents: string | Uint8Array): Promise<void> {
  const source = join(workDir, "contents");
  writeFileSync(source, contents);
  const child = spawn("sh", ["-c", 'cat "$1" > "$0"', fifo, source], { stdio: "ignore" });
  return new Promise((resolve, reject) => {
    child.on("error", reject);
    child.on("close", () => resolve());
  });
}

describe.skipIf(process.platform === "win32")("named pipes", () => {
  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), "fasta-stream-pipe-"));
    fifo = join(workDir, "input.fifo");
    execFileSync("mkfifo", [fifo]);
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  test("a FIFO opens as a sequential source without seek", async () => {
    const done = feed("ABCD");
    const source = openFileSource(fifo);

    try {
      expect(source).toBeInstanceOf(PipeByteSource);
      expect(isSeekable(source)).toBe(false);
      expect(new TextDecoder().decode(source.peek(2))).toBe("AB");

      const buffer = new Uint8Array(8);
      let text = "";
      for (let count = source.read(buffer); count > 0; count = source.read(buffer)) {
        text += new TextDecoder().decode(buffer.subarray(0, count));
      }
      expect(text).toBe("ABCD");
    } finally {
      source.close();
    }
    await done;
  });

  test("readFasta reads every record from a FIFO", async () => {
    const done = feed(TEXT);

    expect(readFasta(fifo)).toEqual(RECORDS);
    await done;
  });

  test("gzip input through a FIFO is detected and inflated", async () => {
    const done = feed(gzipSync(new TextEncoder().encode(TEXT)));
    const source = openSource(fifo);

    try {
      expect(source).toBeInstanceOf(GzipByteSource);
      expect(Array.from(FastaReader.open(source))).toEqual(RECORDS);
    } finally {
      source.close();
    }
    await done;
  });

  test("rewinding a reader over a FIFO fails with NOT_SEEKABLE", async () => {
    const done = feed(TEXT);
    const reader = FastaReader.open(fifo);

    try {
      expect(reader.readEntry()).toEqual(RECORDS[0]);
      expect(() => reader.rewind()).toThrow(FileError);
      expect(() => reader.rewind()).toThrow(`stream is not seekable: ${fifo}`);
      try {
        reader.rewind();
      } catch (error) {
        expect(error).toMatchObject({ code: "NOT_SEEKABLE" });
      }
    } finally {
      reader.close();
    }
    await done;
  });
});
