export type LspErrorKind =
  | 'TransportClosed'
  | 'ProtocolViolation'
  | 'RpcError'
  | 'RequestTimeout'
  | 'RequestCancelled'
  | 'SessionNotReady'
  | 'InvalidSessionState'
  | 'DocumentNotOpen'
  | 'UnsupportedByServer'
  | 'SpawnFailed'
  | 'SessionClosed'
  | 'SessionFailed'
  | 'Config';

/**
 * Base class for every failure raised by the client. `kind` is stable and
 * is what callers should branch on; messages are for humans.
 */
export abstract class LspError extends Error {
  abstract readonly kind: LspErrorKind;
}

export class TransportClosedError extends LspError {
  readonly kind = 'TransportClosed';

  constructor(message = 'Transport closed') {
    super(message);
    this.name = 'TransportClosedError';
  }
}

export class ProtocolViolationError extends LspError {
  readonly kind = 'ProtocolViolation';

  constructor(
    message: string,
    readonly payload?: unknown,
  ) {
    super(message);
    this.name = 'ProtocolViolationError';
  }
}

/**
 * A JSON-RPC error object, either received from the server for one of our
 * requests or thrown by a local handler to shape the reply it sends.
 */
export class RpcError extends LspError {
  readonly kind = 'RpcError';

  constructor(
    readonly code: number,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export class RequestTimeoutError extends LspError {
  readonly kind = 'RequestTimeout';

  constructor(
    readonly method: string,
    readonly id: number | string,
    readonly timeoutMs: number,
  ) {
    super(`Request '${method}' (id ${String(id)}) timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class RequestCancelledError extends LspError {
  readonly kind = 'RequestCancelled';

  constructor(
    readonly method: string,
    readonly id: number | string,
  ) {
    super(`Request '${method}' (id ${String(id)}) was cancelled`);
    this.name = 'RequestCancelledError';
  }
}

export class SessionNotReadyError extends LspError {
  readonly kind = 'SessionNotReady';

  constructor(
    readonly operation: string,
    readonly state: string,
  ) {
    super(`Cannot run '${operation}' while the session is ${state}`);
    this.name = 'SessionNotReadyError';
  }
}

export class InvalidSessionStateError extends LspError {
  readonly kind = 'InvalidSessionState';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidSessionStateError';
  }
}

export class DocumentNotOpenError extends LspError {
  readonly kind = 'DocumentNotOpen';

  constructor(readonly uri: string) {
    super(`Document is not open: ${uri}`);
    this.name = 'DocumentNotOpenError';
  }
}

export class UnsupportedByServerError extends LspError {
  readonly kind = 'UnsupportedByServer';

  constructor(
    readonly method: string,
    readonly capability: string,
  ) {
    super(`Server does not advertise '${capability}' required by '${method}'`);
    this.name = 'UnsupportedByServerError';
  }
}

export class SpawnFailedError extends LspError {
  readonly kind = 'SpawnFailed';

  constructor(
    readonly command: string,
    override readonly cause: unknown,
  ) {
    super(
      `Failed to start '${command}': ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'SpawnFailedError';
  }
}

export class SessionClosedError extends LspError {
  readonly kind = 'SessionClosed';

  constructor(message = 'Session is closed') {
    super(message);
    this.name = 'SessionClosedError';
  }
}

export class SessionFailedError extends LspError {
  readonly kind = 'SessionFailed';

  constructor(readonly reason: string) {
    super(`Session failed: ${reason}`);
    this.name = 'SessionFailedError';
  }
}

export class ConfigError extends LspError {
  readonly kind = 'Config';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export function isLspError(value: unknown, kind?: LspErrorKind): value is LspError {
  if (!(value instanceof LspError)) {
    return false;
  }
  return kind === undefined || value.kind === kind;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
