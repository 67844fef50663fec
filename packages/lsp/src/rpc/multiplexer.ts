import { DebugLogger } from '../debug/DebugLogger.js';
import {
  RequestCancelledError,
  RequestTimeoutError,
  RpcError,
  describeError,
} from '../errors.js';
import {
  notification,
  request,
  type JsonRpcId,
  type Message,
  type ResponseMessage,
} from '../transport/codec.js';
import type { CallOptions } from '../types.js';

export const CANCEL_REQUEST_METHOD = '$/cancelRequest';

type PendingCall = {
  id: JsonRpcId;
  method: string;
  createdAt: number;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  dispose: () => void;
};

export interface PendingCallInfo {
  id: JsonRpcId;
  method: string;
  createdAt: number;
}

export interface RequestMultiplexerOptions {
  send: (message: Message) => Promise<void>;
  defaultTimeoutMs: number;
}

const logger = DebugLogger.getLogger('lsp:rpc');

/**
 * Correlates outgoing requests with their responses. Every pending call is
 * settled exactly once: by its response, its deadline, its abort signal,
 * a failed write, or a terminal `rejectAll`.
 */
export class RequestMultiplexer {
  private readonly pending = new Map<JsonRpcId, PendingCall>();
  private nextRequestId = 1;
  private terminalError: Error | null = null;

  constructor(private readonly options: RequestMultiplexerOptions) {}

  get pendingCount(): number {
    return this.pending.size;
  }

  listPending(): PendingCallInfo[] {
    return [...this.pending.values()].map(({ id, method, createdAt }) => ({
      id,
      method,
      createdAt,
    }));
  }

  hasPending(id: JsonRpcId): boolean {
    return this.pending.has(id);
  }

  call(method: string, params?: unknown, options: CallOptions = {}): Promise<unknown> {
    if (this.terminalError !== null) {
      return Promise.reject(this.terminalError);
    }

    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs;
    const id = this.mintId();

    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(method, id));
    }

    const result = new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.abandon(id, new RequestTimeoutError(method, id, timeoutMs));
      }, timeoutMs);
      const onAbort = (): void => {
        this.abandon(id, new RequestCancelledError(method, id));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        id,
        method,
        createdAt: Date.now(),
        resolve,
        reject,
        dispose: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      });
    });

    logger.debug(() => `--> ${method} (${String(id)})`);
    this.options.send(request(id, method, params)).catch((error: unknown) => {
      this.settle(id, (call) => {
        call.reject(error instanceof Error ? error : new Error(describeError(error)));
      });
    });

    return result;
  }

  /** Fire-and-forget; write failures are logged, never thrown. */
  notify(method: string, params?: unknown): void {
    logger.debug(() => `--> ${method}`);
    this.options.send(notification(method, params)).catch((error: unknown) => {
      logger.warn(() => `failed to send '${method}': ${describeError(error)}`);
    });
  }

  /**
   * Settles the pending call `response` answers. Returns false when nothing
   * is waiting for that id (e.g. the call already timed out).
   */
  handleResponse(response: ResponseMessage): boolean {
    if (response.id === null) {
      return false;
    }

    return this.settle(response.id, (call) => {
      const elapsed = Date.now() - call.createdAt;
      if (response.error !== undefined) {
        logger.debug(
          () => `<-- ${call.method} (${String(call.id)}) error ${response.error?.code} in ${elapsed}ms`,
        );
        call.reject(
          new RpcError(response.error.code, response.error.message, response.error.data),
        );
        return;
      }
      logger.debug(() => `<-- ${call.method} (${String(call.id)}) in ${elapsed}ms`);
      call.resolve(response.result ?? null);
    });
  }

  /** Fails every pending and every future call with `error`. */
  rejectAll(error: Error): void {
    if (this.terminalError === null) {
      this.terminalError = error;
    }
    for (const id of [...this.pending.keys()]) {
      this.settle(id, (call) => {
        call.reject(error);
      });
    }
  }

  private mintId(): JsonRpcId {
    let id = this.nextRequestId;
    while (this.pending.has(id)) {
      id += 1;
    }
    this.nextRequestId = id + 1;
    return id;
  }

  private abandon(id: JsonRpcId, error: Error): void {
    const settled = this.settle(id, (call) => {
      call.reject(error);
    });
    if (settled) {
      logger.debug(() => `abandoning ${String(id)}: ${error.message}`);
      this.notify(CANCEL_REQUEST_METHOD, { id });
    }
  }

  private settle(id: JsonRpcId, apply: (call: PendingCall) => void): boolean {
    const call = this.pending.get(id);
    if (call === undefined) {
      return false;
    }
    this.pending.delete(id);
    call.dispose();
    apply(call);
    return true;
  }
}
