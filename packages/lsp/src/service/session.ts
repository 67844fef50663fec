import { EventEmitter } from 'node:events';
import { basename } from 'node:path';

import type {
  CompletionContext,
  CompletionItem,
  CompletionList,
  Definition,
  DefinitionLink,
  Diagnostic,
  DocumentSymbol,
  Hover,
  Location,
  Position,
  ServerCapabilities,
  SymbolInformation,
  TextDocumentContentChangeEvent,
  WorkspaceSymbol,
} from 'vscode-languageserver-protocol';

import {
  parseSessionOptions,
  type LspSessionOptions,
  type LspSessionOptionsInput,
} from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  InvalidSessionStateError,
  ProtocolViolationError,
  SessionClosedError,
  SessionFailedError,
  SessionNotReadyError,
  describeError,
} from '../errors.js';
import {
  InboundDispatcher,
  PUBLISH_DIAGNOSTICS_METHOD,
  type NotificationListener,
  type RequestHandler,
} from '../rpc/dispatcher.js';
import { RequestMultiplexer, type PendingCallInfo } from '../rpc/multiplexer.js';
import { decodeMessage, encodeMessage, type Message } from '../transport/codec.js';
import { FramedTransport } from '../transport/framed-transport.js';
import type {
  CallOptions,
  Disposable,
  ServerExit,
  ServerProcess,
  SessionState,
} from '../types.js';
import {
  assertFeatureSupported,
  snapshotCapabilities,
  type FeatureMethod,
} from './capabilities.js';
import {
  DiagnosticsStore,
  isPublishDiagnosticsParams,
  type DiagnosticsListener,
  type WaitForDiagnosticsOptions,
} from './diagnostics.js';
import { DocumentStore } from './documents.js';
import {
  buildInitializeParams,
  fromFileUri,
  loadInitializeTemplate,
  toFileUri,
} from './initialize-params.js';
import { WorkDoneProgressTracker, type ActiveProgress } from './progress.js';

/** Result types of the capability-gated feature requests. */
export interface FeatureResults {
  'textDocument/definition': Definition | DefinitionLink[] | null;
  'textDocument/typeDefinition': Definition | DefinitionLink[] | null;
  'textDocument/implementation': Definition | DefinitionLink[] | null;
  'textDocument/references': Location[] | null;
  'textDocument/hover': Hover | null;
  'textDocument/documentSymbol': DocumentSymbol[] | SymbolInformation[] | null;
  'workspace/symbol': SymbolInformation[] | WorkspaceSymbol[] | null;
  'textDocument/completion': CompletionItem[] | CompletionList | null;
}

export interface ServerInfo {
  name: string;
  version?: string;
}

export type StateChangeListener = (state: SessionState, previous: SessionState) => void;

const TERMINAL_STATES: ReadonlySet<SessionState> = new Set(['closed', 'failed']);

const MESSAGE_TYPE_LEVELS = ['error', 'warn', 'log', 'debug'] as const;

const logger = DebugLogger.getLogger('lsp:session');
const serverLogger = DebugLogger.getLogger('lsp:server');

function readServerInfo(result: unknown): ServerInfo | undefined {
  if (typeof result !== 'object' || result === null || !('serverInfo' in result)) {
    return undefined;
  }
  const info = result.serverInfo;
  if (typeof info !== 'object' || info === null || !('name' in info)) {
    return undefined;
  }
  if (typeof info.name !== 'string') {
    return undefined;
  }
  const version = 'version' in info && typeof info.version === 'string' ? info.version : undefined;
  return version === undefined ? { name: info.name } : { name: info.name, version };
}

function logWindowMessage(params: unknown): void {
  if (typeof params !== 'object' || params === null || !('message' in params)) {
    return;
  }
  const type = 'type' in params && typeof params.type === 'number' ? params.type : 4;
  const level = MESSAGE_TYPE_LEVELS[type - 1] ?? 'debug';
  const message = String(params.message);
  serverLogger[level](() => message);
}

async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const elapsed = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => {
      resolve(false);
    }, ms);
  });
  try {
    return await Promise.race([promise.then(() => true), elapsed]);
  } finally {
    clearTimeout(timer);
  }
}

function configurationItemCount(params: unknown): number {
  if (
    typeof params === 'object' &&
    params !== null &&
    'items' in params &&
    Array.isArray(params.items)
  ) {
    return params.items.length;
  }
  return 0;
}

/**
 * One LSP session against one server process: handshake, document
 * synchronization, capability-gated feature requests and shutdown.
 *
 * State machine: unstarted → initializing → ready → shuttingDown → closed,
 * with `failed` reachable from any state that is not closed. Calls that
 * need the handshake reject with `SessionNotReadyError` before it, and with
 * `SessionClosedError` / `SessionFailedError` once terminal.
 */
export class LspSession {
  private _state: SessionState = 'unstarted';
  private _capabilities: Readonly<ServerCapabilities> | undefined;
  private _serverInfo: ServerInfo | undefined;
  private terminalError: SessionClosedError | SessionFailedError | null = null;
  private reader: Promise<void> | null = null;
  private readonly options: LspSessionOptions;
  private readonly transport: FramedTransport;
  private readonly multiplexer: RequestMultiplexer;
  private readonly dispatcher: InboundDispatcher;
  private readonly documents = new DocumentStore();
  private readonly diagnostics: DiagnosticsStore;
  private readonly progress = new WorkDoneProgressTracker();
  private readonly eventBus = new EventEmitter();
  private readonly exitSubscription: Disposable;
  private readonly closedPromise: Promise<SessionState>;

  constructor(
    private readonly server: ServerProcess,
    options: LspSessionOptionsInput,
  ) {
    this.options = parseSessionOptions(options);
    this.eventBus.setMaxListeners(0);
    this.diagnostics = new DiagnosticsStore(this.options.diagnosticsDebounceMs);
    this.transport = new FramedTransport(server.stdout, server.stdin);
    this.multiplexer = new RequestMultiplexer({
      send: (message) => this.send(message),
      defaultTimeoutMs: this.options.requestTimeoutMs,
    });
    this.dispatcher = new InboundDispatcher({
      multiplexer: this.multiplexer,
      respond: (response) => {
        this.send(response).catch((error: unknown) => {
          logger.warn(() => `failed to answer server request: ${describeError(error)}`);
        });
      },
      onProtocolViolation: (error) => {
        this.reportProtocolViolation(error);
      },
    });
    this.closedPromise = new Promise<SessionState>((resolve) => {
      const onState = (state: SessionState): void => {
        if (TERMINAL_STATES.has(state)) {
          this.eventBus.off('state', onState);
          resolve(state);
        }
      };
      this.eventBus.on('state', onState);
    });

    this.installDefaultHandlers();
    this.exitSubscription = server.onExit((exit) => {
      this.handleServerExit(exit);
    });
  }

  get state(): SessionState {
    return this._state;
  }

  /** Frozen server capabilities, available once the session is ready. */
  get capabilities(): Readonly<ServerCapabilities> | undefined {
    return this._capabilities;
  }

  get serverInfo(): ServerInfo | undefined {
    return this._serverInfo;
  }

  get workspaceRoot(): string {
    return this.options.workspaceRoot;
  }

  /** Resolves with `closed` or `failed` once the session is terminal. */
  whenTerminated(): Promise<SessionState> {
    return this.closedPromise;
  }

  onStateChange(listener: StateChangeListener): Disposable {
    this.eventBus.on('state', listener);
    return {
      dispose: () => {
        this.eventBus.off('state', listener);
      },
    };
  }

  onProtocolViolation(listener: (error: ProtocolViolationError) => void): Disposable {
    this.eventBus.on('protocolViolation', listener);
    return {
      dispose: () => {
        this.eventBus.off('protocolViolation', listener);
      },
    };
  }

  onNotification(method: string, listener: NotificationListener): Disposable {
    return this.dispatcher.onNotification(method, listener);
  }

  /** Answers server-to-client requests for `method`; replaces any default. */
  onRequest(method: string, handler: RequestHandler): Disposable {
    return this.dispatcher.onRequest(method, handler);
  }

  onDiagnostics(listener: DiagnosticsListener): Disposable {
    return this.diagnostics.onDiagnostics(listener);
  }

  listPendingCalls(): PendingCallInfo[] {
    return this.multiplexer.listPending();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────────────

  /**
   * Runs the handshake: `initialize` with the merged params, then
   * `initialized`. Resolves with the server capabilities.
   */
  async initialize(): Promise<Readonly<ServerCapabilities>> {
    this.assertNotTerminal('initialize');
    if (this._state !== 'unstarted') {
      throw new InvalidSessionStateError(
        `initialize can only be sent once (session is ${this._state})`,
      );
    }

    this.transition('initializing');
    this.reader = this.runReader().catch((error: unknown) => {
      this.fail(`reader stopped: ${describeError(error)}`);
    });

    let result: unknown;
    try {
      const template = this.options.initializeParams ?? (await loadInitializeTemplate());
      this.assertStillInitializing();
      const params = buildInitializeParams(this.options, template);
      result = await this.multiplexer.call('initialize', params, {
        timeoutMs: this.options.initializeTimeoutMs,
      });
    } catch (error) {
      if (this.terminalError !== null) {
        throw this.terminalError;
      }
      if (this.state !== 'initializing') {
        throw error;
      }
      this.fail(`initialize failed: ${describeError(error)}`);
      throw error;
    }

    this.assertStillInitializing();
    this._capabilities = snapshotCapabilities(result);
    this._serverInfo = readServerInfo(result);
    this.multiplexer.notify('initialized', {});
    this.transition('ready');
    logger.debug(
      () => `ready (${this._serverInfo?.name ?? 'unnamed server'})`,
    );
    return this._capabilities;
  }

  /**
   * `shutdown` request, `exit` notification, then waits for the process to
   * go away (forcing it after the grace period). Idempotent.
   */
  async shutdown(): Promise<void> {
    if (TERMINAL_STATES.has(this._state)) {
      return;
    }
    if (this._state === 'shuttingDown') {
      await this.closedPromise;
      return;
    }

    const handshakeDone = this._state === 'ready';
    this.transition('shuttingDown');

    if (handshakeDone) {
      try {
        await this.multiplexer.call('shutdown', undefined, {
          timeoutMs: this.options.shutdownTimeoutMs,
        });
      } catch (error) {
        logger.warn(() => `shutdown request failed: ${describeError(error)}`);
      }
      this.multiplexer.notify('exit');
    }

    const exitedOnItsOwn =
      handshakeDone &&
      (await settlesWithin(this.closedPromise, this.options.terminateGraceMs));
    if (!exitedOnItsOwn) {
      try {
        const exit = await this.server.terminate(this.options.terminateGraceMs);
        this.handleServerExit(exit);
      } catch (error) {
        this.fail(`terminating the server failed: ${describeError(error)}`);
      }
    }

    await this.closedPromise;
    await this.reader;
  }

  // ─── Raw requests ──────────────────────────────────────────────────────────

  /** Sends any request once ready; no capability check. */
  sendRequest(method: string, params?: unknown, options?: CallOptions): Promise<unknown> {
    try {
      this.assertReady(method);
    } catch (error) {
      return Promise.reject(error);
    }
    return this.multiplexer.call(method, params, options);
  }

  sendNotification(method: string, params?: unknown): void {
    this.assertReady(method);
    this.multiplexer.notify(method, params);
  }

  // ─── Document synchronization ──────────────────────────────────────────────

  /**
   * Opens `uri` at version 0. Opening an already open document only takes
   * another reference; nothing is sent.
   */
  openDocument(uri: string, text: string, languageId: string): void {
    this.assertReady('textDocument/didOpen');
    const documentUri = toFileUri(uri);
    const outcome = this.documents.open(documentUri, languageId);
    if (outcome.kind === 'retained') {
      return;
    }
    this.multiplexer.notify('textDocument/didOpen', {
      textDocument: {
        uri: documentUri,
        languageId,
        version: outcome.handle.version,
        text,
      },
    });
  }

  /**
   * Sends `didChange` with the next version. A string replaces the whole
   * document; an array is sent as-is.
   */
  changeDocument(
    uri: string,
    change: string | TextDocumentContentChangeEvent[],
  ): number {
    this.assertReady('textDocument/didChange');
    const documentUri = toFileUri(uri);
    const version = this.documents.nextVersion(documentUri);
    const contentChanges = typeof change === 'string' ? [{ text: change }] : change;
    this.multiplexer.notify('textDocument/didChange', {
      textDocument: { uri: documentUri, version },
      contentChanges,
    });
    return version;
  }

  /** Drops one reference; `didClose` goes out with the last one. */
  closeDocument(uri: string): void {
    this.assertReady('textDocument/didClose');
    const documentUri = toFileUri(uri);
    const outcome = this.documents.close(documentUri);
    if (outcome.kind === 'released') {
      return;
    }
    this.multiplexer.notify('textDocument/didClose', {
      textDocument: { uri: documentUri },
    });
  }

  isDocumentOpen(uri: string): boolean {
    return this.documents.isOpen(toFileUri(uri));
  }

  getDocumentVersion(uri: string): number | undefined {
    return this.documents.version(toFileUri(uri));
  }

  openDocuments(): string[] {
    return this.documents.openUris();
  }

  // ─── Feature requests ──────────────────────────────────────────────────────

  definition(
    uri: string,
    position: Position,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/definition']> {
    return this.feature('textDocument/definition', this.positionParams(uri, position), options);
  }

  typeDefinition(
    uri: string,
    position: Position,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/typeDefinition']> {
    return this.feature(
      'textDocument/typeDefinition',
      this.positionParams(uri, position),
      options,
    );
  }

  implementation(
    uri: string,
    position: Position,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/implementation']> {
    return this.feature(
      'textDocument/implementation',
      this.positionParams(uri, position),
      options,
    );
  }

  references(
    uri: string,
    position: Position,
    includeDeclaration = true,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/references']> {
    return this.feature(
      'textDocument/references',
      { ...this.positionParams(uri, position), context: { includeDeclaration } },
      options,
    );
  }

  hover(
    uri: string,
    position: Position,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/hover']> {
    return this.feature('textDocument/hover', this.positionParams(uri, position), options);
  }

  documentSymbols(
    uri: string,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/documentSymbol']> {
    return this.feature(
      'textDocument/documentSymbol',
      { textDocument: { uri: toFileUri(uri) } },
      options,
    );
  }

  workspaceSymbols(
    query: string,
    options?: CallOptions,
  ): Promise<FeatureResults['workspace/symbol']> {
    return this.feature('workspace/symbol', { query }, options);
  }

  completion(
    uri: string,
    position: Position,
    context?: CompletionContext,
    options?: CallOptions,
  ): Promise<FeatureResults['textDocument/completion']> {
    return this.feature(
      'textDocument/completion',
      context === undefined
        ? this.positionParams(uri, position)
        : { ...this.positionParams(uri, position), context },
      options,
    );
  }

  // ─── Diagnostics and progress ──────────────────────────────────────────────

  getDiagnostics(uri: string): readonly Diagnostic[] {
    return this.diagnostics.get(toFileUri(uri));
  }

  getAllDiagnostics(): Record<string, readonly Diagnostic[]> {
    return this.diagnostics.getAll();
  }

  waitForDiagnostics(
    uri: string,
    options: WaitForDiagnosticsOptions,
  ): Promise<readonly Diagnostic[]> {
    const documentUri = toFileUri(uri);
    if (TERMINAL_STATES.has(this._state)) {
      return Promise.resolve(this.diagnostics.get(documentUri));
    }
    return this.diagnostics.waitForDiagnostics(documentUri, options);
  }

  getActiveProgress(): ActiveProgress[] {
    return this.progress.list();
  }

  waitForProgressIdle({ timeoutMs }: { timeoutMs: number }): Promise<boolean> {
    return this.progress.waitForIdle(timeoutMs);
  }

  // ─── Internals ─────────────────────────────────────────────────────────────

  private async feature<M extends FeatureMethod>(
    method: M,
    params: unknown,
    options?: CallOptions,
  ): Promise<FeatureResults[M]> {
    const capabilities = this.assertReady(method);
    assertFeatureSupported(capabilities, method);
    const result = await this.multiplexer.call(method, params, options);
    return result as FeatureResults[M];
  }

  private positionParams(uri: string, position: Position): {
    textDocument: { uri: string };
    position: Position;
  } {
    return {
      textDocument: { uri: toFileUri(uri) },
      position: { line: position.line, character: position.character },
    };
  }

  private async runReader(): Promise<void> {
    for (;;) {
      let frame: Buffer;
      try {
        frame = await this.transport.readFrame();
      } catch (error) {
        this.handleTransportClosed(error);
        return;
      }

      let message: Message;
      try {
        message = decodeMessage(frame);
      } catch (error) {
        if (error instanceof ProtocolViolationError) {
          this.reportProtocolViolation(error);
          continue;
        }
        throw error;
      }
      this.dispatcher.dispatch(message);
    }
  }

  private async send(message: Message): Promise<void> {
    await this.transport.writeFrame(encodeMessage(message));
  }

  private installDefaultHandlers(): void {
    this.dispatcher.onNotification(PUBLISH_DIAGNOSTICS_METHOD, (params) => {
      if (isPublishDiagnosticsParams(params)) {
        this.diagnostics.publish(params);
        return;
      }
      this.reportProtocolViolation(
        new ProtocolViolationError('Malformed publishDiagnostics params', params),
      );
    });
    this.dispatcher.onNotification('$/progress', (params) => {
      this.progress.update(params);
    });
    this.dispatcher.onNotification('window/logMessage', logWindowMessage);
    this.dispatcher.onNotification('window/showMessage', logWindowMessage);

    this.dispatcher.onRequest('window/workDoneProgress/create', (params) => {
      this.progress.create(params);
      return null;
    });
    this.dispatcher.onRequest('workspace/configuration', (params) =>
      Array.from({ length: configurationItemCount(params) }, () => null),
    );
    this.dispatcher.onRequest('workspace/workspaceFolders', () => {
      const rootPath = fromFileUri(this.options.workspaceRoot);
      return [{ uri: toFileUri(rootPath), name: basename(rootPath) }];
    });
    this.dispatcher.onRequest('window/showMessageRequest', (params) => {
      logWindowMessage(params);
      return null;
    });
    this.dispatcher.onRequest('client/registerCapability', () => null);
    this.dispatcher.onRequest('client/unregisterCapability', () => null);
  }

  private reportProtocolViolation(error: ProtocolViolationError): void {
    logger.debug(() => `protocol violation: ${error.message}`);
    this.eventBus.emit('protocolViolation', error);
  }

  private assertNotTerminal(operation: string): void {
    if (this.terminalError !== null) {
      throw this.terminalError;
    }
    if (TERMINAL_STATES.has(this._state)) {
      throw new SessionClosedError(`Cannot run '${operation}' on a closed session`);
    }
  }

  /** A shutdown that started mid-handshake wins over a late response. */
  private assertStillInitializing(): void {
    if (this.terminalError !== null) {
      throw this.terminalError;
    }
    if (this._state !== 'initializing') {
      throw new SessionClosedError(
        `Session was shut down during initialize (session is ${this._state})`,
      );
    }
  }

  private assertReady(operation: string): Readonly<ServerCapabilities> {
    this.assertNotTerminal(operation);
    if (this._state !== 'ready' || this._capabilities === undefined) {
      throw new SessionNotReadyError(operation, this._state);
    }
    return this._capabilities;
  }

  private transition(next: SessionState): void {
    const previous = this._state;
    if (previous === next) {
      return;
    }
    this._state = next;
    logger.debug(() => `${previous} -> ${next}`);
    this.eventBus.emit('state', next, previous);
  }

  private handleTransportClosed(error: unknown): void {
    if (this._state === 'shuttingDown' || TERMINAL_STATES.has(this._state)) {
      logger.debug(() => `transport closed: ${describeError(error)}`);
      return;
    }
    this.fail(describeError(error));
  }

  private handleServerExit(exit: ServerExit): void {
    if (TERMINAL_STATES.has(this._state)) {
      return;
    }
    const detail = `code=${String(exit.code)}, signal=${String(exit.signal)}`;
    if (this._state === 'shuttingDown') {
      this.finish('closed', new SessionClosedError(`Server exited (${detail})`));
      return;
    }
    this.fail(`server exited unexpectedly (${detail})`);
  }

  private fail(reason: string): void {
    if (TERMINAL_STATES.has(this._state)) {
      return;
    }
    logger.warn(() => `session failed: ${reason}`);
    this.finish('failed', new SessionFailedError(reason));
    if (this.server.isAlive()) {
      this.server.terminate(this.options.terminateGraceMs).catch((error: unknown) => {
        logger.warn(() => `failed to terminate server: ${describeError(error)}`);
      });
    }
  }

  private finish(
    state: 'closed' | 'failed',
    error: SessionClosedError | SessionFailedError,
  ): void {
    this.terminalError = error;
    this.multiplexer.rejectAll(error);
    this.transport.close(state === 'closed' ? 'session closed' : 'session failed');
    this.exitSubscription.dispose();
    this.documents.clear();
    this.progress.clear();
    this.diagnostics.flushWaiters();
    this.transition(state);
  }
}
