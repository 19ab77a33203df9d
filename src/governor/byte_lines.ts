import type { Readable } from "node:stream";

const LF = 0x0a;
const CR = 0x0d;

/**
 * UTF-8 encodings of every Unicode White_Space code point. U+FEFF is not one
 * of them, U+0085 is.
 */
const WHITESPACE_SEQUENCES: readonly (readonly number[])[] = [
  [0x09], [0x0a], [0x0b], [0x0c], [0x0d], [0x20],
  [0xc2, 0x85], // NEL
  [0xc2, 0xa0], // NBSP
  [0xe1, 0x9a, 0x80], // OGHAM SPACE MARK
  ...Array.from({ length: 0x0b }, (_, i) => [0xe2, 0x80, 0x80 + i]), // U+2000..U+200A
  [0xe2, 0x80, 0xa8],
  [0xe2, 0x80, 0xa9],
  [0xe2, 0x80, 0xaf],
  [0xe2, 0x81, 0x9f],
  [0xe3, 0x80, 0x80],
];

function matchesAt(bytes: Uint8Array, at: number, seq: readonly number[]): boolean {
  if (at < 0 || at + seq.length > bytes.length) return false;
  return seq.every((b, k) => bytes[at + k] === b);
}

/**
 * Strips leading and trailing Unicode whitespace without decoding the rest, so
 * bytes that are not valid UTF-8 come through untouched.
 */
export function trimWhitespaceBytes(bytes: Uint8Array): Uint8Array {
  let start = 0;
  let end = bytes.length;

  outer: while (start < end) {
    for (const seq of WHITESPACE_SEQUENCES) {
      if (start + seq.length <= end && matchesAt(bytes, start, seq)) {
        start += seq.length;
        continue outer;
      }
    }
    break;
  }

  outer: while (end > start) {
    for (const seq of WHITESPACE_SEQUENCES) {
      if (end - seq.length >= start && matchesAt(bytes, end - seq.length, seq)) {
        end -= seq.length;
        continue outer;
      }
    }
    break;
  }

  return bytes.subarray(start, end);
}

/**
 * Yields each line of `input` as raw bytes, without the `\n` or `\r\n` that
 * ends it. A final line with no terminator is still yielded.
 */
export async function* readByteLines(input: Readable): AsyncGenerator<Buffer> {
  let pending: Buffer = Buffer.alloc(0);

  for await (const chunk of input) {
    const bytes: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), "utf8");
    pending = pending.length === 0 ? bytes : Buffer.concat([pending, bytes]);

    let newline = pending.indexOf(LF);
    while (newline !== -1) {
      const end = newline > 0 && pending[newline - 1] === CR ? newline - 1 : newline;
      yield pending.subarray(0, end);
      pending = pending.subarray(newline + 1);
      newline = pending.indexOf(LF);
    }
  }

  if (pending.length > 0) {
    yield pending;
  }
}
