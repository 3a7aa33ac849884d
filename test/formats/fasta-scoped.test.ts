/**
 * Tests for scoped reader/writer acquisition
 */

import { Cause, Effect, Exit } from "effect";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { FileError, StreamError } from "../../src/errors";
import { FastaReader } from "../../src/formats/fasta/reader";
import {
  acquireFastaReader,
  acquireFastaWriter,
  withFastaReader,
  withFastaWriter,
  withResource,
} from "../../src/formats/fasta/scoped";
import type { FastaWriter } from "../../src/formats/fasta/writer";
import { MemoryByteSink, MemoryByteSource } from "../../src/io/memory-stream";

const TEXT = ">G1\nACGT\nAC\n>G2\nTTTT\n";

let workDir: string;

beforeEach(() => {
  workDir = mkdtempSync(join(tmpdir(), "fasta-stream-scoped-"));
});

afterEach(() => {
  rmSync(workDir, { recursive: true, force: true });
});

describe("withResource", () => {
  test("closes after use and returns its result", () => {
    let closed = 0;

    const result = withResource(
      () => ({ close: () => closed++ }),
      () => "done"
    );

    expect(result).toBe("done");
    expect(closed).toBe(1);
  });

  test("closes when use throws and rethrows the same error", () => {
    let closed = 0;
    const failure = new Error("use failed");

    expect(() =>
      withResource(
        () => ({ close: () => closed++ }),
        () => {
          throw failure;
        }
      )
    ).toThrow(failure);
    expect(closed).toBe(1);
  });

  test("an error from use wins over an error from close", () => {
    expect(() =>
      withResource(
        () => ({
          close: () => {
            throw new Error("close failed");
          },
        }),
        () => {
          throw new Error("use failed");
        }
      )
    ).toThrow("use failed");
  });

  test("a close failure after a successful use is reported", () => {
    expect(() =>
      withResource(
        () => ({
          close: () => {
            throw new Error("close failed");
          },
        }),
        () => 1
      )
    ).toThrow("close failed");
  });

  test("a failed acquire never runs use", () => {
    let used = false;

    expect(() =>
      withResource(
        (): { close(): void } => {
          throw new Error("cannot open");
        },
        () => {
          used = true;
        }
      )
    ).toThrow("cannot open");
    expect(used).toBe(false);
  });
});

describe("withFastaReader / withFastaWriter", () => {
  test("reads every record and closes the reader", () => {
    const opened: FastaReader[] = [];

    const records = withFastaReader(new MemoryByteSource(TEXT), (reader) => {
      opened.push(reader);
      return Array.from(reader);
    });

    expect(records.map((entry) => entry.description)).toEqual(["G1", "G2"]);
    expect(opened).toHaveLength(1);
    expect(() => opened[0]?.readEntry()).toThrow(StreamError);
  });

  test("writes, then terminates the last line on close", () => {
    const sink = new MemoryByteSink();

    withFastaWriter(sink, (writer) => {
      writer.writeEntry("a", "ACGT");
      writer.writeToken([">b", "TT"]);
    });

    expect(sink.text()).toBe(">a\nACGT\n>b\nTT\n");
  });

  test("the writer is closed even when the body fails", () => {
    const path = join(workDir, "partial.fa");
    const opened: FastaWriter[] = [];

    expect(() =>
      withFastaWriter(path, (writer) => {
        opened.push(writer);
        writer.writeEntry("a", "AC");
        writer.writeEntry("b", "");
      })
    ).toThrow("empty sequence data (entry 2)");

    expect(readFileSync(path, "utf8")).toBe(">a\nAC\n>b\n\n");
    expect(opened).toHaveLength(1);
    expect(() => opened[0]?.writeChar("A")).toThrow(StreamError);
  });

  test("other representations go through withResource", () => {
    const lengths = withResource(
      () => FastaReader.open(new MemoryByteSource(TEXT), (bytes) => bytes.length),
      (reader) => Array.from(reader, (entry) => entry.sequence)
    );

    expect(lengths).toEqual([6, 4]);
  });
});

describe("acquireFastaReader / acquireFastaWriter", () => {
  test("release the reader when the scope closes", () => {
    const opened: FastaReader[] = [];
    const program = Effect.scoped(
      Effect.gen(function* () {
        const reader = yield* acquireFastaReader(new MemoryByteSource(TEXT));
        opened.push(reader);
        return Array.from(reader).length;
      })
    );

    expect(Effect.runSync(program)).toBe(2);
    expect(opened).toHaveLength(1);
    expect(() => opened[0]?.readEntry()).toThrow(StreamError);
  });

  test("copy records between a scoped reader and writer", () => {
    const sink = new MemoryByteSink();
    const program = Effect.scoped(
      Effect.gen(function* () {
        const reader = yield* acquireFastaReader(new MemoryByteSource(TEXT));
        const writer = yield* acquireFastaWriter(sink);
        for (const { description, sequence } of reader) {
          writer.writeEntry(description, sequence);
        }
      })
    );

    Effect.runSync(program);

    expect(sink.text()).toBe(">G1\nACGTAC\n>G2\nTTTT\n");
  });

  test("an open failure surfaces as a typed failure", () => {
    const missing = join(workDir, "missing.fa");

    const exit = Effect.runSyncExit(Effect.scoped(acquireFastaReader(missing)));

    expect(Exit.isFailure(exit)).toBe(true);
    if (Exit.isFailure(exit)) {
      expect(Cause.squash(exit.cause)).toBeInstanceOf(FileError);
    }
  });
});
