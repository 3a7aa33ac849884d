/**
 * Tests for path-based stream selection
 */

import { gzipSync } from "fflate";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { GzipByteSink, GzipByteSource } from "../../src/compression/gzip";
import { FileByteSink, FileByteSource } from "../../src/io/file-stream";
import { openSink, openSource } from "../../src/io/open";
import type { ByteSource } from "../../src/io/streams";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function readAll(source: ByteSource): string {
  const buffer = new Uint8Array(32);
  let text = "";
  for (let count = source.read(buffer); count > 0; count = source.read(buffer)) {
    text += decoder.decode(buffer.subarray(0, count));
  }
  return text;
}

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "fasta-stream-open-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("openSource", () => {
  test("plain files come back as file sources", () => {
    const path = join(workDir, "plain.fasta");
    writeFileSync(path, ">a\nAC\n");

    const source = openSource(path);

    expect(source).toBeInstanceOf(FileByteSource);
    expect(readAll(source)).toBe(">a\nAC\n");
    source.close();
  });

  test("gzip is detected by magic bytes whatever the extension", () => {
    const path = join(workDir, "reads.dat");
    writeFileSync(path, gzipSync(encoder.encode(">a\nAC\n")));

    const source = openSource(path);

    expect(source).toBeInstanceOf(GzipByteSource);
    expect(readAll(source)).toBe(">a\nAC\n");
    source.close();
  });

  test("compression none reads the raw bytes", () => {
    const path = join(workDir, "reads.fasta.gz");
    writeFileSync(path, gzipSync(encoder.encode(">a\nAC\n")));

    const source = openSource(path, "none");
    const head = new Uint8Array(2);
    source.read(head);

    expect(Array.from(head)).toEqual([0x1f, 0x8b]);
    source.close();
  });
});

describe("openSink", () => {
  test("compresses by extension", () => {
    const path = join(workDir, "out.fasta.gz");

    const sink = openSink(path);
    expect(sink).toBeInstanceOf(GzipByteSink);
    sink.write(encoder.encode(">a\nAC\n"));
    sink.close();

    const bytes = readFileSync(path);
    expect(bytes[0]).toBe(0x1f);
    expect(bytes[1]).toBe(0x8b);
  });

  test("compression none writes plain text to a .gz path", () => {
    const path = join(workDir, "out.fasta.gz");

    const sink = openSink(path, { compression: "none" });
    expect(sink).toBeInstanceOf(FileByteSink);
    sink.write(encoder.encode(">a\n"));
    sink.close();

    expect(readFileSync(path, "utf8")).toBe(">a\n");
  });
});
