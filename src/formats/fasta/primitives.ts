/**
 * Character-level helpers shared by the FASTA writer and `writeFasta`
 */

import { ValidationError } from "../../errors";
import type { OutputBuffer } from "../../io/output-buffer";
import { CharCode, LINE_WIDTH } from "./constants";
import type { SequenceData } from "./types";

/**
 * ASCII whitespace: tab, newline, vertical tab, form feed, carriage return, space
 */
export function isAsciiSpace(code: number): boolean {
  return code === CharCode.SPACE || (code >= CharCode.TAB && code <= CharCode.CARRIAGE_RETURN);
}

export function isAsciiText(text: string): boolean {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > CharCode.ASCII_MAX) return false;
  }
  return true;
}

/**
 * Trim a description and check it can be written as one header line
 * @throws {ValidationError} NON_ASCII_DESCRIPTION, EMPTY_DESCRIPTION or EMBEDDED_NEWLINE
 */
export function normalizeDescription(description: string, entry: number): string {
  const trimmed = description.trim();
  if (!isAsciiText(trimmed)) {
    throw new ValidationError("invalid (non-ASCII) description", "NON_ASCII_DESCRIPTION", entry);
  }
  if (trimmed.length === 0) {
    throw new ValidationError("empty description", "EMPTY_DESCRIPTION", entry);
  }
  if (trimmed.includes("\n")) {
    throw new ValidationError(
      "newlines are not allowed within description",
      "EMBEDDED_NEWLINE",
      entry
    );
  }
  return trimmed;
}

/**
 * Stream sequence data into fixed-width lines
 *
 * Whitespace is dropped, and a newline goes out before every character
 * that would start column 81. No newline is written after the last line.
 *
 * @returns Number of sequence characters written
 * @throws {ValidationError} NON_ASCII_CHARACTER, INVALID_CHARACTER or STRAY_MARKER_IN_SEQUENCE_DATA
 */
export function reflowSequence(sequence: SequenceData, out: OutputBuffer, entry: number): number {
  let column = 0;
  let written = 0;

  const put = (code: number): void => {
    if (!Number.isInteger(code) || code < 0) {
      throw new ValidationError(`invalid character code ${code}`, "INVALID_CHARACTER", entry);
    }
    if (code > CharCode.ASCII_MAX) {
      throw new ValidationError(
        `invalid (non-ASCII) character: ${describeCode(code)}`,
        "NON_ASCII_CHARACTER",
        entry
      );
    }
    if (isAsciiSpace(code)) return;
    if (code === CharCode.MARKER) {
      throw new ValidationError(
        "character '>' not allowed in sequence data",
        "STRAY_MARKER_IN_SEQUENCE_DATA",
        entry
      );
    }
    if (column === LINE_WIDTH) {
      out.writeByte(CharCode.NEWLINE);
      column = 0;
    }
    out.writeByte(code);
    column++;
    written++;
  };

  if (typeof sequence === "string") {
    for (let i = 0; i < sequence.length; i++) put(sequence.charCodeAt(i));
  } else if (sequence instanceof Uint8Array) {
    for (const code of sequence) put(code);
  } else {
    for (const element of sequence) {
      if (typeof element === "number") {
        put(element);
      } else {
        for (let i = 0; i < element.length; i++) put(element.charCodeAt(i));
      }
    }
  }

  return written;
}

/**
 * Width of the last line `reflowSequence` left open after writing `written` characters
 */
export function lastLineWidth(written: number): number {
  return written === 0 ? 0 : ((written - 1) % LINE_WIDTH) + 1;
}

export function describeCode(code: number): string {
  return code <= 0xffff ? `'${String.fromCharCode(code)}' (0x${code.toString(16)})` : `0x${code.toString(16)}`;
}
