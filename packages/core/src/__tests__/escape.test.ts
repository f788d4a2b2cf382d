import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { SAFE_SET, UNICODE_ESCAPES, appendQuotedBytes, appendQuotedString, quote } from '../escape.js';
import { EncoderStream } from '../stream.js';

const utf8 = new TextEncoder();
const decoder = new TextDecoder();

function quoteString(text: string): string {
  const stream = new EncoderStream(4);
  appendQuotedString(stream, text);
  return decoder.decode(stream.toBytes());
}

function quoteBytes(bytes: Uint8Array): string {
  const stream = new EncoderStream(4);
  appendQuotedBytes(stream, bytes);
  return decoder.decode(stream.toBytes());
}

describe('escape tables', () => {
  it('marks quote, backslash and controls unsafe', () => {
    expect(SAFE_SET[0x22]).toBe(0);
    expect(SAFE_SET[0x5c]).toBe(0);
    expect(SAFE_SET[0x0a]).toBe(0);
    expect(SAFE_SET[0x1f]).toBe(0);
    expect(SAFE_SET[0x20]).toBe(1);
    expect(SAFE_SET[0x41]).toBe(1);
    expect(SAFE_SET[0x7f]).toBe(1);
  });

  it('pre-renders lowercase \\u00xx forms', () => {
    expect(UNICODE_ESCAPES).toHaveLength(32);
    expect(decoder.decode(UNICODE_ESCAPES[0])).toBe('\\u0000');
    expect(decoder.decode(UNICODE_ESCAPES[0x1f])).toBe('\\u001f');
  });
});

describe('appendQuotedString', () => {
  it('renders the empty string', () => {
    expect(quoteString('')).toBe('""');
  });

  it('copies safe text unchanged', () => {
    expect(quoteString('hello world')).toBe('"hello world"');
  });

  it('uses named escapes', () => {
    expect(quoteString('a"b\\c')).toBe('"a\\"b\\\\c"');
    expect(quoteString('\n\t\r\b\f')).toBe('"\\n\\t\\r\\b\\f"');
  });

  it('uses \\u00xx for other controls', () => {
    expect(quoteString('\u0001x')).toBe('"\\u0001x"');
    expect(quoteString('\u001f')).toBe('"\\u001f"');
  });

  it('writes non-ASCII text as UTF-8', () => {
    expect(quoteString('café')).toBe('"café"');
    expect(quoteString('日本語')).toBe('"日本語"');
    expect(quoteString('🚀')).toBe('"🚀"');
  });

  it('replaces lone surrogates with U+FFFD', () => {
    expect(quoteString('a\ud800b')).toBe('"a�b"');
    expect(quoteString('\udc00')).toBe('"�"');
  });

  it('grows the stream across many escapes', () => {
    const text = '\n'.repeat(1000);
    expect(quoteString(text)).toBe(`"${'\\n'.repeat(1000)}"`);
  });

  it('agrees with JSON.stringify on well-formed text', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString({ maxLength: 64 }), (text) => {
        expect(quoteString(text)).toBe(JSON.stringify(text));
      }),
    );
  });
});

describe('appendQuotedBytes', () => {
  it('renders empty bytes as ""', () => {
    expect(quoteBytes(new Uint8Array(0))).toBe('""');
  });

  it('escapes unsafe bytes between safe runs', () => {
    expect(quoteBytes(utf8.encode('ab\ncd"'))).toBe('"ab\\ncd\\""');
  });

  it('passes bytes >= 0x80 through', () => {
    expect(quoteBytes(utf8.encode('naïve'))).toBe('"naïve"');
  });

  it('matches the string path for the same text', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString({ maxLength: 64 }), (text) => {
        expect(quoteBytes(utf8.encode(text))).toBe(quoteString(text));
      }),
    );
  });
});

describe('quote', () => {
  it('returns quoted bytes with an optional colon', () => {
    expect(decoder.decode(quote('id'))).toBe('"id"');
    expect(decoder.decode(quote('created_at', true))).toBe('"created_at":');
  });
});
