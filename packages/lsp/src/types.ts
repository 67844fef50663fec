import type { Readable, Writable } from 'node:stream';

export type { Disposable } from 'vscode-jsonrpc';

export type LspServerId = string;

export type SessionState =
  | 'unstarted'
  | 'initializing'
  | 'ready'
  | 'shuttingDown'
  | 'closed'
  | 'failed';

export interface ServerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * What a session needs from the process hosting the language server. The
 * process supervisor implements it for real subprocesses; tests provide an
 * in-process stand-in.
 */
export interface ServerProcess {
  readonly stdout: Readable;
  readonly stdin: Writable;
  isAlive(): boolean;
  /** Graceful stop, escalating to a forced kill after `graceMs`. */
  terminate(graceMs?: number): Promise<ServerExit>;
  /** Called exactly once, also when registered after the exit happened. */
  onExit(listener: (exit: ServerExit) => void): { dispose(): void };
}

export interface CallOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}
