import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { DEFAULT_TERMINATE_GRACE_MS, type LspServerConfig } from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { SpawnFailedError, describeError } from '../errors.js';
import type { ServerExit, ServerProcess } from '../types.js';

type ExitListener = (exit: ServerExit) => void;

const logger = DebugLogger.getLogger('lsp:process');
const serverLogger = DebugLogger.getLogger('lsp:server');

/**
 * Owns one language server subprocess: spawn, liveness, graceful then
 * forced termination, and a single exit report.
 */
export class ProcessSupervisor implements ServerProcess {
  private exit: ServerExit | null = null;
  private readonly exitListeners = new Set<ExitListener>();
  private readonly exited: Promise<ServerExit>;

  /**
   * Spawns `config.command` with piped stdio. Rejects with
   * `SpawnFailedError` when the executable cannot be launched.
   */
  static async start(config: LspServerConfig): Promise<ProcessSupervisor> {
    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(config.command, config.args, {
        cwd: config.cwd,
        env: config.env ? { ...process.env, ...config.env } : process.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new SpawnFailedError(config.command, error);
    }

    try {
      await once(child, 'spawn');
    } catch (error) {
      throw new SpawnFailedError(config.command, error);
    }

    logger.debug(() => `started '${config.id}' (pid ${String(child.pid)})`);
    return new ProcessSupervisor(child, config);
  }

  private constructor(
    private readonly child: ChildProcessWithoutNullStreams,
    private readonly config: LspServerConfig,
  ) {
    this.exited = new Promise<ServerExit>((resolve) => {
      child.once('exit', (code, signal) => {
        const exit: ServerExit = { code, signal };
        this.exit = exit;
        logger.debug(
          () =>
            `'${config.id}' exited (code=${String(code)}, signal=${String(signal)})`,
        );
        resolve(exit);
        const listeners = [...this.exitListeners];
        this.exitListeners.clear();
        for (const listener of listeners) {
          listener(exit);
        }
      });
    });

    child.on('error', (error: Error) => {
      logger.warn(() => `'${config.id}' process error: ${error.message}`);
    });

    const stderrLines = createInterface({ input: child.stderr, crlfDelay: Infinity });
    stderrLines.on('line', (line) => {
      serverLogger.debug(() => `[${config.id}] ${line}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get id(): string {
    return this.config.id;
  }

  get stdout(): Readable {
    return this.child.stdout;
  }

  get stdin(): Writable {
    return this.child.stdin;
  }

  get exitInfo(): ServerExit | null {
    return this.exit;
  }

  isAlive(): boolean {
    return (
      this.exit === null &&
      this.child.exitCode === null &&
      this.child.signalCode === null
    );
  }

  onExit(listener: ExitListener): { dispose(): void } {
    const exit = this.exit;
    if (exit !== null) {
      queueMicrotask(() => {
        listener(exit);
      });
      return { dispose: () => undefined };
    }

    this.exitListeners.add(listener);
    return {
      dispose: () => {
        this.exitListeners.delete(listener);
      },
    };
  }

  /** Resolves with the exit that was observed, forced or not. */
  waitForExit(): Promise<ServerExit> {
    return this.exited;
  }

  /**
   * SIGTERM, then SIGKILL if the process is still running after `graceMs`.
   */
  async terminate(graceMs: number = DEFAULT_TERMINATE_GRACE_MS): Promise<ServerExit> {
    if (this.exit !== null) {
      return this.exit;
    }

    this.signal('SIGTERM');

    let graceTimer: ReturnType<typeof setTimeout> | undefined;
    const graceElapsed = new Promise<null>((resolve) => {
      graceTimer = setTimeout(() => {
        resolve(null);
      }, graceMs);
    });

    const exit = await Promise.race([this.exited, graceElapsed]);
    clearTimeout(graceTimer);
    if (exit !== null) {
      return exit;
    }

    logger.warn(() => `'${this.config.id}' ignored SIGTERM for ${graceMs}ms, killing`);
    this.signal('SIGKILL');
    return this.exited;
  }

  private signal(signal: NodeJS.Signals): void {
    try {
      this.child.kill(signal);
    } catch (error) {
      logger.warn(() => `failed to send ${signal} to '${this.config.id}': ${describeError(error)}`);
    }
  }
}
