import { describe, expect, it } from 'vitest';

import {
  DEFAULT_REQUEST_TIMEOUT_MS,
  loadBootstrapFromEnv,
  parseServerConfig,
  parseSessionOptions,
} from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('parseServerConfig', () => {
  it('defaults args to an empty list', () => {
    expect(parseServerConfig({ id: 'ts', command: 'typescript-language-server' })).toEqual({
      id: 'ts',
      command: 'typescript-language-server',
      args: [],
    });
  });

  it('keeps env, cwd and languageId', () => {
    expect(
      parseServerConfig({
        id: 'py',
        command: 'pylsp',
        args: ['-v'],
        env: { PYTHONPATH: '/opt/lib' },
        cwd: '/workspace',
        languageId: 'python',
      }),
    ).toEqual({
      id: 'py',
      command: 'pylsp',
      args: ['-v'],
      env: { PYTHONPATH: '/opt/lib' },
      cwd: '/workspace',
      languageId: 'python',
    });
  });

  it('lists every invalid field', () => {
    const error: unknown = (() => {
      try {
        parseServerConfig({ id: '', args: 'nope' });
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('issues', [
      'id: String must contain at least 1 character(s)',
      'command: Required',
      'args: Expected array, received string',
    ]);
  });

  it('labels problems with the whole value as (root)', () => {
    expect(() => parseServerConfig('gopls')).toThrow(
      'Invalid server config: (root): Expected object, received string',
    );
  });
});

describe('parseSessionOptions', () => {
  it('applies timeout and client defaults', () => {
    const options = parseSessionOptions({ workspaceRoot: '/workspace' });

    expect(options).toEqual({
      workspaceRoot: '/workspace',
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      initializeTimeoutMs: 60_000,
      shutdownTimeoutMs: 3_000,
      terminateGraceMs: 2_000,
      diagnosticsDebounceMs: 120,
      clientInfo: { name: 'lsp-session', version: '0.1.0' },
    });
  });

  it('rejects non-positive timeouts', () => {
    expect(() => parseSessionOptions({ workspaceRoot: '/w', requestTimeoutMs: 0 })).toThrow(
      ConfigError,
    );
  });
});

describe('loadBootstrapFromEnv', () => {
  it('parses server and session from LSP_SESSION_BOOTSTRAP', () => {
    const bootstrap = loadBootstrapFromEnv({
      LSP_SESSION_BOOTSTRAP: JSON.stringify({
        server: { id: 'ts', command: 'tsserver' },
        session: { workspaceRoot: '/workspace', requestTimeoutMs: 500 },
      }),
    });

    expect(bootstrap.server).toEqual({ id: 'ts', command: 'tsserver', args: [] });
    expect(bootstrap.session.requestTimeoutMs).toBe(500);
  });

  it('requires the variable', () => {
    expect(() => loadBootstrapFromEnv({})).toThrow(
      'LSP_SESSION_BOOTSTRAP environment variable is required',
    );
  });

  it('rejects malformed JSON', () => {
    expect(() => loadBootstrapFromEnv({ LSP_SESSION_BOOTSTRAP: '{' })).toThrow(
      'LSP_SESSION_BOOTSTRAP must be valid JSON',
    );
  });

  it('reports nested issues with their path', () => {
    expect(() =>
      loadBootstrapFromEnv({
        LSP_SESSION_BOOTSTRAP: JSON.stringify({ server: { id: 'ts' }, session: {} }),
      }),
    ).toThrow(
      'Invalid LSP_SESSION_BOOTSTRAP: server.command: Required; session.workspaceRoot: Required',
    );
  });
});
