import { EventEmitter } from 'node:events';

import type { Diagnostic, PublishDiagnosticsParams } from 'vscode-languageserver-protocol';

import { DEFAULT_DIAGNOSTICS_DEBOUNCE_MS } from '../config.js';

export interface DiagnosticsSnapshot {
  uri: string;
  version?: number;
  diagnostics: readonly Diagnostic[];
}

export interface WaitForDiagnosticsOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type DiagnosticsListener = (snapshot: DiagnosticsSnapshot) => void;

const EMPTY_DIAGNOSTICS: readonly Diagnostic[] = [];

export function isPublishDiagnosticsParams(
  value: unknown,
): value is PublishDiagnosticsParams {
  return (
    typeof value === 'object' &&
    value !== null &&
    'uri' in value &&
    typeof value.uri === 'string' &&
    'diagnostics' in value &&
    Array.isArray(value.diagnostics)
  );
}

/**
 * Latest published diagnostics per document. Publishing replaces the whole
 * set for a uri; an empty list clears it.
 */
export class DiagnosticsStore {
  private readonly byUri = new Map<string, DiagnosticsSnapshot>();
  private readonly eventBus = new EventEmitter();

  constructor(private readonly debounceMs = DEFAULT_DIAGNOSTICS_DEBOUNCE_MS) {
    this.eventBus.setMaxListeners(0);
  }

  publish(params: PublishDiagnosticsParams): DiagnosticsSnapshot {
    const snapshot: DiagnosticsSnapshot = {
      uri: params.uri,
      ...(params.version !== undefined ? { version: params.version } : {}),
      diagnostics: [...params.diagnostics],
    };
    this.byUri.set(params.uri, snapshot);
    this.eventBus.emit(`diagnostics:${params.uri}`);
    this.eventBus.emit('diagnostics', snapshot);
    return snapshot;
  }

  get(uri: string): readonly Diagnostic[] {
    return this.byUri.get(uri)?.diagnostics ?? EMPTY_DIAGNOSTICS;
  }

  getSnapshot(uri: string): DiagnosticsSnapshot | undefined {
    return this.byUri.get(uri);
  }

  getAll(): Record<string, readonly Diagnostic[]> {
    const sortedEntries = [...this.byUri.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([uri, snapshot]) => [uri, snapshot.diagnostics] as const);
    return Object.fromEntries(sortedEntries);
  }

  onDiagnostics(listener: DiagnosticsListener): { dispose(): void } {
    this.eventBus.on('diagnostics', listener);
    return {
      dispose: () => {
        this.eventBus.off('diagnostics', listener);
      },
    };
  }

  /**
   * Wakes every waiter so it settles with what it has. Used when the
   * session ends.
   */
  flushWaiters(): void {
    for (const uri of this.byUri.keys()) {
      this.eventBus.emit(`diagnostics:${uri}`);
    }
    this.eventBus.emit('flush');
  }

  /**
   * Resolves with the diagnostics of `uri` once publishing has been quiet for
   * the debounce window, or with the current set at the deadline. Never
   * rejects; an aborted wait resolves with an empty list.
   */
  waitForDiagnostics(
    uri: string,
    { timeoutMs, signal }: WaitForDiagnosticsOptions,
  ): Promise<readonly Diagnostic[]> {
    if (timeoutMs <= 0 || signal?.aborted) {
      return Promise.resolve(signal?.aborted ? EMPTY_DIAGNOSTICS : this.get(uri));
    }

    const eventKey = `diagnostics:${uri}`;
    const deadline = Date.now() + timeoutMs;

    return new Promise<readonly Diagnostic[]>((resolve) => {
      let settled = false;
      let debounceTimer: ReturnType<typeof setTimeout> | null = null;
      let timeoutTimer: ReturnType<typeof setTimeout> | null = null;

      const cleanup = (): void => {
        if (debounceTimer !== null) {
          clearTimeout(debounceTimer);
          debounceTimer = null;
        }
        if (timeoutTimer !== null) {
          clearTimeout(timeoutTimer);
          timeoutTimer = null;
        }
        this.eventBus.off(eventKey, onDiagnosticEvent);
        this.eventBus.off('flush', flushCurrent);
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = (value: readonly Diagnostic[]): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        resolve(value);
      };

      const flushCurrent = (): void => {
        finish(this.get(uri));
      };

      const onDiagnosticEvent = (): void => {
        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          flushCurrent();
          return;
        }
        if (debounceTimer !== null) {
          clearTimeout(debounceTimer);
        }
        debounceTimer = setTimeout(flushCurrent, Math.min(this.debounceMs, remaining));
      };

      const onAbort = (): void => {
        finish(EMPTY_DIAGNOSTICS);
      };

      this.eventBus.on(eventKey, onDiagnosticEvent);
      this.eventBus.once('flush', flushCurrent);
      signal?.addEventListener('abort', onAbort, { once: true });
      timeoutTimer = setTimeout(flushCurrent, timeoutMs);

      if (this.byUri.has(uri)) {
        onDiagnosticEvent();
      }
    });
  }
}
