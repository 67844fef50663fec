import type { Readable, Writable } from 'node:stream';

import { DebugLogger } from '../debug/DebugLogger.js';
import { TransportClosedError, describeError } from '../errors.js';
import { FrameDecoder, encodeFrame } from './framing.js';

type FrameWaiter = {
  resolve: (frame: Buffer) => void;
  reject: (error: Error) => void;
};

const logger = DebugLogger.getLogger('lsp:transport');

/**
 * Content-Length framed duplex channel over a pair of byte streams (the
 * server's stdout and stdin). Frames are read one at a time in arrival
 * order; writes are queued so two frames never interleave.
 */
export class FramedTransport {
  private readonly decoder = new FrameDecoder();
  private readonly frames: Buffer[] = [];
  private waiter: FrameWaiter | null = null;
  private closedError: TransportClosedError | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
  ) {
    input.on('data', (chunk: Buffer | string) => {
      this.onData(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    });
    input.once('end', () => {
      this.close(
        this.decoder.hasPartialFrame
          ? 'input stream ended mid-frame'
          : 'input stream ended',
      );
    });
    input.once('close', () => {
      this.close('input stream closed');
    });
    input.on('error', (error: Error) => {
      this.close(`input stream failed: ${error.message}`);
    });
    output.on('error', (error: Error) => {
      this.close(`output stream failed: ${error.message}`);
    });
  }

  get isClosed(): boolean {
    return this.closedError !== null;
  }

  /**
   * Resolves with the next complete payload, or rejects with
   * `TransportClosedError` once the input has ended and nothing is queued.
   */
  readFrame(): Promise<Buffer> {
    const queued = this.frames.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closedError !== null) {
      return Promise.reject(this.closedError);
    }
    if (this.waiter !== null) {
      return Promise.reject(new Error('readFrame is already pending'));
    }
    return new Promise<Buffer>((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  /**
   * Queues one frame. The returned promise settles once the bytes were
   * handed to the stream (or failed to be).
   */
  writeFrame(payload: Uint8Array): Promise<void> {
    const frame = encodeFrame(payload);
    const next = this.writeChain.then(() => this.writeToOutput(frame));
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  /** Stops reading; pending and future reads reject with `reason`. */
  close(reason = 'transport closed'): void {
    if (this.closedError !== null) {
      return;
    }
    logger.debug(() => `closing: ${reason}`);
    this.closedError = new TransportClosedError(`Transport closed: ${reason}`);
    this.decoder.reset();

    const waiter = this.waiter;
    this.waiter = null;
    if (waiter !== null && this.frames.length === 0) {
      waiter.reject(this.closedError);
    }
  }

  private writeToOutput(frame: Buffer): Promise<void> {
    if (this.closedError !== null) {
      return Promise.reject(this.closedError);
    }
    if (this.output.destroyed || this.output.writableEnded) {
      return Promise.reject(new TransportClosedError('Transport closed: output stream is not writable'));
    }

    return new Promise<void>((resolve, reject) => {
      this.output.write(frame, (error?: Error | null) => {
        if (error) {
          reject(new TransportClosedError(`Transport write failed: ${describeError(error)}`));
          return;
        }
        resolve();
      });
    });
  }

  private onData(chunk: Buffer): void {
    if (this.closedError !== null) {
      return;
    }

    let decoded: Buffer[];
    try {
      decoded = this.decoder.feed(chunk);
    } catch (error) {
      this.close(describeError(error));
      return;
    }

    for (const frame of decoded) {
      const waiter = this.waiter;
      if (waiter !== null) {
        this.waiter = null;
        waiter.resolve(frame);
      } else {
        this.frames.push(frame);
      }
    }
  }
}
