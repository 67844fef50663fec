/**
 * LSP base protocol framing: an ASCII header block terminated by an empty
 * line, of which only `Content-Length` is required, followed by exactly that
 * many payload bytes.
 */

// ─── Constants ───────────────────────────────────────────────────────────────

export const HEADER_DELIMITER = '\r\n\r\n';
const HEADER_DELIMITER_BYTES = Buffer.from(HEADER_DELIMITER, 'ascii');
const CONTENT_LENGTH_PATTERN = /^content-length:\s*(\d+)\s*$/i;

// ─── Errors ──────────────────────────────────────────────────────────────────

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

// ─── Functions ───────────────────────────────────────────────────────────────

export function encodeFrame(payload: Uint8Array): Buffer {
  const header = Buffer.from(
    `Content-Length: ${payload.byteLength}${HEADER_DELIMITER}`,
    'ascii',
  );
  return Buffer.concat([header, payload]);
}

function parseContentLength(header: string): number {
  for (const line of header.split('\r\n')) {
    const match = CONTENT_LENGTH_PATTERN.exec(line);
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }
  }
  throw new FrameError(`Missing Content-Length in header: ${JSON.stringify(header)}`);
}

// ─── FrameDecoder Class ──────────────────────────────────────────────────────

/**
 * Incremental decoder. Chunks may split a frame anywhere, including inside
 * the header or a multi-byte character; bytes are kept until complete.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private pendingLength: number | null = null;

  feed(chunk: Uint8Array): Buffer[] {
    this.buffer =
      this.buffer.length === 0
        ? Buffer.from(chunk)
        : Buffer.concat([this.buffer, chunk]);
    const frames: Buffer[] = [];

    for (;;) {
      if (this.pendingLength === null) {
        const headerEnd = this.buffer.indexOf(HEADER_DELIMITER_BYTES);
        if (headerEnd < 0) {
          break;
        }
        const header = this.buffer.subarray(0, headerEnd).toString('ascii');
        this.buffer = this.buffer.subarray(headerEnd + HEADER_DELIMITER_BYTES.length);
        this.pendingLength = parseContentLength(header);
      }

      if (this.buffer.length < this.pendingLength) {
        break;
      }

      frames.push(Buffer.from(this.buffer.subarray(0, this.pendingLength)));
      this.buffer = this.buffer.subarray(this.pendingLength);
      this.pendingLength = null;
    }

    return frames;
  }

  /** True while part of a frame (header or payload) is buffered. */
  get hasPartialFrame(): boolean {
    return this.buffer.length > 0 || this.pendingLength !== null;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.pendingLength = null;
  }
}
