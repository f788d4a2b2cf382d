// ============================================================================
// @jsonjet/core — JSON String Escaping
// ============================================================================
//
// Safe bytes (0x20-0x7F except `"` and `\`) are copied as-is. Unsafe
// bytes use a named escape where JSON has one (\" \\ \b \f \n \r \t) and a
// pre-rendered \u00xx form otherwise. Bytes >= 0x80 pass through: UTF-8
// input is assumed valid and is not re-checked.
// ============================================================================

import { EncoderStream } from './stream.js';

const QUOTE = 0x22;
const BACKSLASH = 0x5c;

/** 1 where the ASCII byte may appear unescaped inside a JSON string. */
export const SAFE_SET: Uint8Array = buildSafeSet();

function buildSafeSet(): Uint8Array {
  const set = new Uint8Array(128);
  for (let c = 0x20; c <= 0x7f; c++) set[c] = 1;
  set[QUOTE] = 0;
  set[BACKSLASH] = 0;
  return set;
}

/** Second byte of the named escape for a control/special byte, 0 if none. */
const NAMED_ESCAPES: Uint8Array = (() => {
  const table = new Uint8Array(128);
  table[QUOTE] = QUOTE;
  table[BACKSLASH] = BACKSLASH;
  table[0x08] = 0x62; // b
  table[0x0c] = 0x66; // f
  table[0x0a] = 0x6e; // n
  table[0x0d] = 0x72; // r
  table[0x09] = 0x74; // t
  return table;
})();

/** `\u0000`..`\u001f`, six bytes each. */
export const UNICODE_ESCAPES: readonly Uint8Array[] = Array.from({ length: 32 }, (_, c) => {
  const hex = c.toString(16).padStart(2, '0');
  return Uint8Array.from(`\\u00${hex}`, (ch) => ch.charCodeAt(0));
});

/** Write the escape sequence for one unsafe ASCII byte. */
function appendEscape(stream: EncoderStream, c: number): void {
  const named = NAMED_ESCAPES[c];
  if (named !== 0) {
    stream.writeBytePair(BACKSLASH, named);
  } else {
    stream.writeBytes(UNICODE_ESCAPES[c]);
  }
}

/**
 * Write a byte sequence as a quoted JSON string. Runs of bytes that need
 * no escaping are copied in one block.
 */
export function appendQuotedBytes(stream: EncoderStream, bytes: Uint8Array): void {
  if (bytes.length === 0) {
    stream.writeBytePair(QUOTE, QUOTE);
    return;
  }

  stream.writeByte(QUOTE);
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    const c = bytes[i];
    if (c >= 0x80 || SAFE_SET[c] === 1) continue;
    if (start < i) stream.writeBytes(bytes.subarray(start, i));
    appendEscape(stream, c);
    start = i + 1;
  }
  if (start < bytes.length) stream.writeBytes(bytes.subarray(start));
  stream.writeByte(QUOTE);
}

/**
 * Write a JavaScript string as a quoted JSON string, encoding it to UTF-8
 * on the way. Lone surrogates become U+FFFD, as with `TextEncoder`.
 *
 * The worst case for non-escaped text (3 bytes per UTF-16 unit) is
 * reserved once; an escape re-reserves for the rest of the string.
 */
export function appendQuotedString(stream: EncoderStream, text: string): void {
  const len = text.length;
  if (len === 0) {
    stream.writeBytePair(QUOTE, QUOTE);
    return;
  }

  stream.reserve(len * 3 + 2);
  stream.pushUnchecked(QUOTE);

  for (let i = 0; i < len; i++) {
    let c = text.charCodeAt(i);

    if (c < 0x80) {
      if (SAFE_SET[c] === 1) {
        stream.pushUnchecked(c);
      } else {
        stream.reserve(6 + 3 * (len - i) + 1);
        appendEscape(stream, c);
      }
      continue;
    }

    if (c < 0x800) {
      stream.pushUnchecked(0xc0 | (c >> 6));
      stream.pushUnchecked(0x80 | (c & 0x3f));
      continue;
    }

    if (c >= 0xd800 && c <= 0xdbff && i + 1 < len) {
      const lo = text.charCodeAt(i + 1);
      if (lo >= 0xdc00 && lo <= 0xdfff) {
        const cp = ((c - 0xd800) << 10) + (lo - 0xdc00) + 0x10000;
        stream.pushUnchecked(0xf0 | (cp >> 18));
        stream.pushUnchecked(0x80 | ((cp >> 12) & 0x3f));
        stream.pushUnchecked(0x80 | ((cp >> 6) & 0x3f));
        stream.pushUnchecked(0x80 | (cp & 0x3f));
        i++;
        continue;
      }
    }
    if (c >= 0xd800 && c <= 0xdfff) c = 0xfffd;

    stream.pushUnchecked(0xe0 | (c >> 12));
    stream.pushUnchecked(0x80 | ((c >> 6) & 0x3f));
    stream.pushUnchecked(0x80 | (c & 0x3f));
  }

  stream.pushUnchecked(QUOTE);
}

/**
 * Quoted UTF-8 bytes of `text`, optionally followed by `:`. Used to
 * pre-render struct field names once per type.
 */
export function quote(text: string, withColon = false): Uint8Array {
  const scratch = new EncoderStream(text.length * 3 + 8);
  appendQuotedString(scratch, text);
  if (withColon) scratch.writeByte(0x3a);
  return scratch.toBytes();
}
