import { ErrorCodes } from 'vscode-jsonrpc';

import { DebugLogger } from '../debug/DebugLogger.js';
import { ProtocolViolationError, RpcError, describeError } from '../errors.js';
import {
  errorResponse,
  successResponse,
  type JsonRpcId,
  type Message,
  type NotificationMessage,
  type RequestMessage,
  type ResponseMessage,
} from '../transport/codec.js';
import type { Disposable } from '../types.js';
import type { RequestMultiplexer } from './multiplexer.js';

export const PUBLISH_DIAGNOSTICS_METHOD = 'textDocument/publishDiagnostics';

export interface RequestContext {
  id: JsonRpcId;
  method: string;
}

export type RequestHandler = (
  params: unknown,
  context: RequestContext,
) => unknown;

export type NotificationListener = (
  params: unknown,
  method: string,
) => void | Promise<void>;

export interface InboundDispatcherOptions {
  multiplexer: Pick<RequestMultiplexer, 'handleResponse'>;
  respond: (response: ResponseMessage) => void;
  onProtocolViolation: (error: ProtocolViolationError) => void;
}

const logger = DebugLogger.getLogger('lsp:dispatch');

/**
 * Notifications that must reach listeners in arrival order share a key;
 * everything else is keyed by method. Diagnostics are ordered per document.
 */
function orderingKey(message: NotificationMessage): string {
  if (message.method === PUBLISH_DIAGNOSTICS_METHOD) {
    const params = message.params;
    if (typeof params === 'object' && params !== null && 'uri' in params) {
      return `${message.method}|${String(params.uri)}`;
    }
  }
  return message.method;
}

/**
 * Routes decoded inbound messages: responses to the multiplexer, server
 * requests to a per-method handler table, notifications to listeners.
 */
export class InboundDispatcher {
  private readonly requestHandlers = new Map<string, RequestHandler>();
  private readonly listeners = new Map<string, Set<NotificationListener>>();
  private readonly chains = new Map<string, Promise<void>>();

  constructor(private readonly options: InboundDispatcherOptions) {}

  /** Installs the handler for `method`, replacing any previous one. */
  onRequest(method: string, handler: RequestHandler): Disposable {
    this.requestHandlers.set(method, handler);
    return {
      dispose: () => {
        if (this.requestHandlers.get(method) === handler) {
          this.requestHandlers.delete(method);
        }
      },
    };
  }

  onNotification(method: string, listener: NotificationListener): Disposable {
    let set = this.listeners.get(method);
    if (set === undefined) {
      set = new Set();
      this.listeners.set(method, set);
    }
    set.add(listener);
    return {
      dispose: () => {
        const current = this.listeners.get(method);
        current?.delete(listener);
        if (current?.size === 0) {
          this.listeners.delete(method);
        }
      },
    };
  }

  dispatch(message: Message): void {
    switch (message.kind) {
      case 'response':
        this.dispatchResponse(message);
        return;
      case 'request':
        this.dispatchRequest(message);
        return;
      case 'notification':
        this.dispatchNotification(message);
        return;
    }
  }

  /** Resolves once every queued listener invocation has run. */
  async idle(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all([...this.chains.values()]);
    }
  }

  private dispatchResponse(message: ResponseMessage): void {
    if (this.options.multiplexer.handleResponse(message)) {
      return;
    }
    this.options.onProtocolViolation(
      new ProtocolViolationError(
        `No pending call for response id ${String(message.id)}`,
        message,
      ),
    );
  }

  private dispatchRequest(message: RequestMessage): void {
    const handler = this.requestHandlers.get(message.method);
    logger.debug(() => `<-- request ${message.method} (${String(message.id)})`);

    if (handler === undefined) {
      this.options.respond(successResponse(message.id, null));
      return;
    }

    const context: RequestContext = { id: message.id, method: message.method };
    Promise.resolve()
      .then(() => handler(message.params, context))
      .then(
        (result) => {
          this.options.respond(successResponse(message.id, result ?? null));
        },
        (error: unknown) => {
          logger.warn(
            () => `handler for '${message.method}' failed: ${describeError(error)}`,
          );
          if (error instanceof RpcError) {
            this.options.respond(
              errorResponse(message.id, error.code, error.message, error.data),
            );
            return;
          }
          this.options.respond(
            errorResponse(message.id, ErrorCodes.InternalError, describeError(error)),
          );
        },
      );
  }

  private dispatchNotification(message: NotificationMessage): void {
    const set = this.listeners.get(message.method);
    if (set === undefined || set.size === 0) {
      logger.debug(() => `dropping unrouted notification ${message.method}`);
      return;
    }

    const listeners = [...set];
    const key = orderingKey(message);
    const previous = this.chains.get(key) ?? Promise.resolve();
    const next = previous.then(async () => {
      for (const listener of listeners) {
        try {
          await listener(message.params, message.method);
        } catch (error) {
          logger.warn(
            () => `listener for '${message.method}' failed: ${describeError(error)}`,
          );
        }
      }
    });

    this.chains.set(key, next);
    void next.then(() => {
      if (this.chains.get(key) === next) {
        this.chains.delete(key);
      }
    });
  }
}
