import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import { TransportClosedError } from '../src/errors.js';
import { FramedTransport } from '../src/transport/framed-transport.js';
import { encodeFrame } from '../src/transport/framing.js';

function createTransport(): {
  transport: FramedTransport;
  input: PassThrough;
  written: () => string;
} {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: Buffer[] = [];
  output.on('data', (chunk: Buffer) => {
    chunks.push(chunk);
  });
  return {
    transport: new FramedTransport(input, output),
    input,
    written: () => Buffer.concat(chunks).toString('utf8'),
  };
}

function payload(text: string): Buffer {
  return Buffer.from(text, 'utf8');
}

describe('FramedTransport', () => {
  it('reads frames in arrival order', async () => {
    const { transport, input } = createTransport();

    input.write(Buffer.concat([encodeFrame(payload('[1]')), encodeFrame(payload('[2]'))]));

    expect((await transport.readFrame()).toString('utf8')).toBe('[1]');
    expect((await transport.readFrame()).toString('utf8')).toBe('[2]');
  });

  it('resolves a waiting reader when the frame arrives', async () => {
    const { transport, input } = createTransport();

    const pending = transport.readFrame();
    input.write(encodeFrame(payload('{"late":true}')));

    expect((await pending).toString('utf8')).toBe('{"late":true}');
  });

  it('refuses a second concurrent reader', async () => {
    const { transport, input } = createTransport();

    const first = transport.readFrame();
    await expect(transport.readFrame()).rejects.toThrow('readFrame is already pending');

    input.write(encodeFrame(payload('[]')));
    expect((await first).toString('utf8')).toBe('[]');
  });

  it('writes whole frames in call order', async () => {
    const { transport, written } = createTransport();

    await Promise.all([
      transport.writeFrame(payload('{"n":1}')),
      transport.writeFrame(payload('{"n":2}')),
    ]);

    expect(written()).toBe(
      'Content-Length: 7\r\n\r\n{"n":1}Content-Length: 7\r\n\r\n{"n":2}',
    );
  });

  it('closes when the input ends', async () => {
    const { transport, input } = createTransport();

    const pending = transport.readFrame();
    input.end();

    await expect(pending).rejects.toThrow('Transport closed: input stream ended');
    expect(transport.isClosed).toBe(true);
  });

  it('reports input that ends inside a frame', async () => {
    const { transport, input } = createTransport();

    input.end(Buffer.from('Content-Length: 20\r\n\r\n{"trunc', 'ascii'));

    const error: unknown = await transport.readFrame().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportClosedError);
    expect(error).toHaveProperty('message', 'Transport closed: input stream ended mid-frame');
  });

  it('still delivers frames queued before the input ended', async () => {
    const { transport, input } = createTransport();

    input.end(encodeFrame(payload('[9]')));
    await new Promise((resolve) => setImmediate(resolve));

    expect((await transport.readFrame()).toString('utf8')).toBe('[9]');
    await expect(transport.readFrame()).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('treats a header without Content-Length as fatal', async () => {
    const { transport, input } = createTransport();

    input.write(Buffer.from('X-Foo: 1\r\n\r\n{}', 'ascii'));

    await expect(transport.readFrame()).rejects.toThrow(
      'Transport closed: Missing Content-Length in header: "X-Foo: 1"',
    );
  });

  it('rejects writes after close', async () => {
    const { transport } = createTransport();

    transport.close('test over');

    await expect(transport.writeFrame(payload('{}'))).rejects.toThrow(
      'Transport closed: test over',
    );
  });
});
