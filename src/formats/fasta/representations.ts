/**
 * Output representations for sequence data
 *
 * The reader accumulates raw bytes and hands them to a representation
 * once per record. The slice it passes is reused for the next record, so
 * a representation must copy whatever it keeps.
 */

export type SequenceConverter<T> = (bytes: Uint8Array) => T;

export interface SequenceRepresentation<T> {
  /** Shown by `FastaReader.toString()` */
  readonly name: string;
  readonly convert: SequenceConverter<T>;
}

export interface SequenceKindMap {
  string: string;
  bytes: Uint8Array;
  chars: string[];
}

export type SequenceKind = keyof SequenceKindMap;

export type SequenceOutput<T> = SequenceKind | SequenceConverter<T> | SequenceRepresentation<T>;

// one char per byte, whatever the byte
const latin1 = new TextDecoder("latin1");

export const SequenceRepresentations: {
  readonly [K in SequenceKind]: SequenceRepresentation<SequenceKindMap[K]>;
} = {
  string: { name: "string", convert: (bytes) => latin1.decode(bytes) },
  bytes: { name: "bytes", convert: (bytes) => bytes.slice() },
  chars: { name: "chars", convert: (bytes) => Array.from(latin1.decode(bytes)) },
};

/**
 * Resolve a kind name, a bare converter or a representation to a representation
 */
export function resolveRepresentation(output: SequenceOutput<unknown>): SequenceRepresentation<unknown> {
  if (typeof output === "string") {
    return SequenceRepresentations[output];
  }
  if (typeof output === "function") {
    return { name: output.name === "" ? "custom" : output.name, convert: output };
  }
  return output;
}
