import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  RpcError,
  SessionFailedError,
  SpawnFailedError,
  describeError,
  isLspError,
} from '../src/errors.js';

describe('isLspError', () => {
  it('recognizes client errors and narrows by kind', () => {
    const error = new RpcError(-32601, 'Unhandled method');

    expect(isLspError(error)).toBe(true);
    expect(isLspError(error, 'RpcError')).toBe(true);
    expect(isLspError(error, 'RequestTimeout')).toBe(false);
  });

  it('rejects anything that is not a client error', () => {
    expect(isLspError(new Error('plain'))).toBe(false);
    expect(isLspError({ kind: 'RpcError', message: 'lookalike' })).toBe(false);
    expect(isLspError(undefined)).toBe(false);
  });
});

describe('error messages', () => {
  it('keeps the spawn failure cause', () => {
    const cause = new Error('spawn lsp ENOENT');
    const error = new SpawnFailedError('lsp', cause);

    expect(error.cause).toBe(cause);
    expect(error.message).toBe("Failed to start 'lsp': spawn lsp ENOENT");
    expect(error.kind).toBe('SpawnFailed');
  });

  it('joins config issues into the message', () => {
    expect(new ConfigError('Invalid server config', ['id: Required', 'command: Required']).message).toBe(
      'Invalid server config: id: Required; command: Required',
    );
  });

  it('describes unknown thrown values', () => {
    expect(describeError(new SessionFailedError('pipe closed'))).toBe(
      'Session failed: pipe closed',
    );
    expect(describeError('text')).toBe('text');
  });
});
