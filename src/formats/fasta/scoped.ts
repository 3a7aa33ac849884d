/**
 * Scoped acquisition for readers and writers
 *
 * Every helper here closes what it opened on every exit path. The
 * `with*` functions run a synchronous body; the `acquire*` functions
 * hand the same resources to Effect programs as scoped resources.
 *
 * @example
 * ```typescript
 * const total = withFastaReader("reads.fasta", (reader) => {
 *   let bases = 0;
 *   for (const { sequence } of reader) bases += sequence.length;
 *   return bases;
 * });
 *
 * const records = withResource(
 *   () => FastaReader.open("reads.fasta", "bytes"),
 *   (reader) => Array.from(reader)
 * );
 * ```
 *
 * @example Effect
 * ```typescript
 * const program = Effect.scoped(
 *   Effect.gen(function* () {
 *     const reader = yield* acquireFastaReader("in.fasta");
 *     const writer = yield* acquireFastaWriter("out.fasta.gz");
 *     for (const { description, sequence } of reader) {
 *       writer.writeEntry(description, sequence);
 *     }
 *   })
 * );
 * Effect.runSync(program);
 * ```
 */

import { Cause, Effect, Exit, type Scope } from "effect";
import { toFastaError, type FastaStreamError } from "../../errors";
import type {
  FastaInput,
  FastaOutput,
  FastaReaderOptions,
  FastaWriterOptions,
} from "../../types";
import { FastaReader } from "./reader";
import { FastaWriter } from "./writer";

export interface Closeable {
  close(): void;
}

const release = (resource: Closeable): Effect.Effect<void> =>
  Effect.sync(() => resource.close());

/**
 * Acquire a resource, run `use` on it, and close it however `use` exits
 *
 * A failure inside `use` wins over a failure while closing.
 */
export function withResource<R extends Closeable, A>(acquire: () => R, use: (resource: R) => A): A {
  const exit = Effect.runSyncExit(
    Effect.acquireUseRelease(
      Effect.try({ try: acquire, catch: (error) => error }),
      (resource) => Effect.try({ try: () => use(resource), catch: (error) => error }),
      release
    )
  );
  if (Exit.isSuccess(exit)) {
    return exit.value;
  }
  throw Cause.squash(exit.cause);
}

/**
 * Open a reader over `input` (string sequences), run `use`, close the reader
 */
export function withFastaReader<A>(
  input: FastaInput,
  use: (reader: FastaReader) => A,
  options: FastaReaderOptions = {}
): A {
  return withResource(() => FastaReader.open(input, "string", options), use);
}

/**
 * Open a writer over `output`, run `use`, close the writer
 */
export function withFastaWriter<A>(
  output: FastaOutput,
  use: (writer: FastaWriter) => A,
  options: FastaWriterOptions = {}
): A {
  return withResource(() => FastaWriter.open(output, options), use);
}

/**
 * Scoped resource around any closeable; released when the enclosing scope closes
 */
export function acquireResource<R extends Closeable>(
  acquire: () => R,
  name: string
): Effect.Effect<R, FastaStreamError, Scope.Scope> {
  return Effect.acquireRelease(
    Effect.try({ try: acquire, catch: (error) => toFastaError(error, "open", name) }),
    release
  );
}

export const acquireFastaReader = (
  input: FastaInput,
  options: FastaReaderOptions = {}
): Effect.Effect<FastaReader, FastaStreamError, Scope.Scope> =>
  acquireResource(() => FastaReader.open(input, "string", options), nameOf(input));

export const acquireFastaWriter = (
  output: FastaOutput,
  options: FastaWriterOptions = {}
): Effect.Effect<FastaWriter, FastaStreamError, Scope.Scope> =>
  acquireResource(() => FastaWriter.open(output, options), nameOf(output));

function nameOf(target: string | { readonly name: string }): string {
  return typeof target === "string" ? target : target.name;
}
