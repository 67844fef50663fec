import createDebug from 'debug';
import type { Debugger } from 'debug';

import {
  levelRank,
  matchesNamespace,
  resolveDebugSettings,
} from './settings.js';
import type { DebugSettings, LogLevel } from './types.js';

type Message = string | (() => string);

/**
 * Namespaced logger on top of `debug`. Output goes to stderr: a client
 * embedded in a stdio-speaking process must never write to stdout.
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private _enabled: boolean;
  private _level: LogLevel;

  /**
   * Returns the cached logger for `namespace`, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string, settings: DebugSettings = resolveDebugSettings()) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._level = settings.level;
    this._enabled =
      settings.enabled &&
      settings.namespaces.some((pattern) => matchesNamespace(namespace, pattern));
    this.debugInstance.enabled = this._enabled;
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
    this.debugInstance.enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  /** Whether a message at `level` would be written. */
  isLevelEnabled(level: LogLevel): boolean {
    return this._enabled && levelRank(level) >= levelRank(this._level);
  }

  debug(message: Message, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  log(message: Message, ...args: unknown[]): void {
    this.write('log', message, args);
  }

  warn(message: Message, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: Message, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, messageOrFn: Message, args: unknown[]): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const prefix = level === 'debug' || level === 'log' ? '' : `[${level}] `;
    this.debugInstance(`${prefix}${message}`, ...args);
  }
}
