import { EventEmitter } from 'node:events';

import type { ProgressToken } from 'vscode-languageserver-protocol';

export interface ActiveProgress {
  token: ProgressToken;
  title?: string;
  message?: string;
  percentage?: number;
  begun: boolean;
}

type ProgressValue =
  | { kind: 'begin'; title?: string; message?: string; percentage?: number }
  | { kind: 'report'; message?: string; percentage?: number }
  | { kind: 'end'; message?: string };

function readValue(value: unknown): ProgressValue | null {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return null;
  }
  const text = (key: string): string | undefined => {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
  };
  const percentageField: unknown = Reflect.get(value, 'percentage');
  const percentage = typeof percentageField === 'number' ? percentageField : undefined;

  switch (value.kind) {
    case 'begin':
      return { kind: 'begin', title: text('title'), message: text('message'), percentage };
    case 'report':
      return { kind: 'report', message: text('message'), percentage };
    case 'end':
      return { kind: 'end', message: text('message') };
    default:
      return null;
  }
}

function isProgressToken(value: unknown): value is ProgressToken {
  return typeof value === 'string' || typeof value === 'number';
}

/**
 * Tracks server work-done progress (`window/workDoneProgress/create` and
 * `$/progress`). Non work-done `$/progress` payloads are ignored.
 */
export class WorkDoneProgressTracker {
  private readonly active = new Map<ProgressToken, ActiveProgress>();
  private readonly eventBus = new EventEmitter();

  constructor() {
    this.eventBus.setMaxListeners(0);
  }

  create(params: unknown): void {
    if (typeof params !== 'object' || params === null || !('token' in params)) {
      return;
    }
    const token = params.token;
    if (isProgressToken(token) && !this.active.has(token)) {
      this.active.set(token, { token, begun: false });
    }
  }

  update(params: unknown): void {
    if (
      typeof params !== 'object' ||
      params === null ||
      !('token' in params) ||
      !('value' in params)
    ) {
      return;
    }
    const token = params.token;
    const value = readValue(params.value);
    if (!isProgressToken(token) || value === null) {
      return;
    }

    switch (value.kind) {
      case 'begin':
        this.active.set(token, {
          token,
          title: value.title,
          message: value.message,
          percentage: value.percentage,
          begun: true,
        });
        break;
      case 'report': {
        const current = this.active.get(token);
        if (current !== undefined) {
          this.active.set(token, {
            ...current,
            message: value.message ?? current.message,
            percentage: value.percentage ?? current.percentage,
          });
        }
        break;
      }
      case 'end':
        this.active.delete(token);
        break;
    }

    this.eventBus.emit('change');
  }

  list(): ActiveProgress[] {
    return [...this.active.values()].map((entry) => ({ ...entry }));
  }

  get isIdle(): boolean {
    return this.active.size === 0;
  }

  clear(): void {
    this.active.clear();
    this.eventBus.emit('change');
  }

  /** Resolves true once nothing is in progress, false at the deadline. */
  waitForIdle(timeoutMs: number): Promise<boolean> {
    if (this.isIdle) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const onChange = (): void => {
        if (this.isIdle) {
          clearTimeout(timer);
          this.eventBus.off('change', onChange);
          resolve(true);
        }
      };
      const timer = setTimeout(() => {
        this.eventBus.off('change', onChange);
        resolve(this.isIdle);
      }, timeoutMs);
      this.eventBus.on('change', onChange);
    });
  }
}
