import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { FrameDecoder, FrameError, encodeFrame } from '../src/transport/framing.js';

function frame(text: string): Buffer {
  return encodeFrame(Buffer.from(text, 'utf8'));
}

function splitAt(buffer: Buffer, cuts: number[]): Buffer[] {
  const points = [...new Set(cuts.map((cut) => cut % (buffer.length + 1)))].sort(
    (a, b) => a - b,
  );
  const chunks: Buffer[] = [];
  let start = 0;
  for (const point of points) {
    chunks.push(buffer.subarray(start, point));
    start = point;
  }
  chunks.push(buffer.subarray(start));
  return chunks;
}

describe('encodeFrame', () => {
  it('prefixes the payload with its byte length', () => {
    expect(frame('{"a":1}').toString('utf8')).toBe('Content-Length: 7\r\n\r\n{"a":1}');
  });

  it('counts bytes, not characters', () => {
    const encoded = frame('"é✓"');
    expect(encoded.toString('utf8')).toBe('Content-Length: 7\r\n\r\n"é✓"');
  });
});

describe('FrameDecoder', () => {
  it('decodes a single frame', () => {
    const decoder = new FrameDecoder();

    const frames = decoder.feed(frame('{"id":1}'));

    expect(frames.map((f) => f.toString('utf8'))).toEqual(['{"id":1}']);
    expect(decoder.hasPartialFrame).toBe(false);
  });

  it('decodes several frames from one chunk', () => {
    const decoder = new FrameDecoder();

    const frames = decoder.feed(Buffer.concat([frame('[1]'), frame('[2]'), frame('[3]')]));

    expect(frames.map((f) => f.toString('utf8'))).toEqual(['[1]', '[2]', '[3]']);
  });

  it('waits for the rest of a frame split inside the header', () => {
    const decoder = new FrameDecoder();
    const bytes = frame('{"ok":true}');

    expect(decoder.feed(bytes.subarray(0, 10))).toEqual([]);
    expect(decoder.hasPartialFrame).toBe(true);
    expect(decoder.feed(bytes.subarray(10)).map((f) => f.toString('utf8'))).toEqual([
      '{"ok":true}',
    ]);
  });

  it('keeps multi-byte characters intact across chunk boundaries', () => {
    const decoder = new FrameDecoder();
    const bytes = frame('"✓✓"');
    const decoded: Buffer[] = [];

    for (const byte of bytes) {
      decoded.push(...decoder.feed(Uint8Array.of(byte)));
    }

    expect(decoded.map((f) => f.toString('utf8'))).toEqual(['"✓✓"']);
  });

  it('accepts other headers and any header-name casing', () => {
    const decoder = new FrameDecoder();
    const header =
      'content-type: application/vscode-jsonrpc; charset=utf-8\r\nCONTENT-LENGTH: 2\r\n\r\n';

    const frames = decoder.feed(Buffer.from(`${header}{}`, 'ascii'));

    expect(frames.map((f) => f.toString('utf8'))).toEqual(['{}']);
  });

  it('accepts a zero-length payload', () => {
    const decoder = new FrameDecoder();

    expect(decoder.feed(Buffer.from('Content-Length: 0\r\n\r\n', 'ascii'))).toEqual([
      Buffer.alloc(0),
    ]);
  });

  it('rejects a header block without Content-Length', () => {
    const decoder = new FrameDecoder();

    expect(() => decoder.feed(Buffer.from('Content-Type: text\r\n\r\n{}', 'ascii'))).toThrow(
      FrameError,
    );
  });

  it('forgets buffered bytes on reset', () => {
    const decoder = new FrameDecoder();
    decoder.feed(Buffer.from('Content-Length: 10\r\n\r\n{"a"', 'ascii'));

    decoder.reset();

    expect(decoder.hasPartialFrame).toBe(false);
    expect(decoder.feed(frame('{}')).map((f) => f.toString('utf8'))).toEqual(['{}']);
  });

  it('yields the same payloads however the stream is chunked', () => {
    fc.assert(
      fc.property(
        fc.array(fc.string({ unit: 'binary' }), { minLength: 1, maxLength: 8 }),
        fc.array(fc.nat(), { maxLength: 12 }),
        (payloads, cuts) => {
          const stream = Buffer.concat(payloads.map((payload) => frame(JSON.stringify(payload))));
          const decoder = new FrameDecoder();

          const decoded = splitAt(stream, cuts).flatMap((chunk) => decoder.feed(chunk));

          expect(decoded.map((f) => JSON.parse(f.toString('utf8')))).toEqual(payloads);
          expect(decoder.hasPartialFrame).toBe(false);
        },
      ),
    );
  });
});
