import { existsSync } from 'node:fs';

import {
  parseServerConfig,
  type LspServerConfigInput,
  type LspSessionOptionsInput,
} from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { describeError } from '../errors.js';
import { fromFileUri } from './initialize-params.js';
import { ProcessSupervisor } from './process-supervisor.js';
import { LspSession } from './session.js';

const logger = DebugLogger.getLogger('lsp:session');

/**
 * Spawns the server described by `server`, wires a session to it and runs
 * the handshake. If the handshake fails the process is stopped before the
 * error is rethrown.
 */
export async function launchSession(
  server: LspServerConfigInput,
  options: LspSessionOptionsInput,
): Promise<LspSession> {
  const config = parseServerConfig(server);
  if (config.cwd === undefined) {
    const rootPath = fromFileUri(options.workspaceRoot);
    config.cwd = existsSync(rootPath) ? rootPath : process.cwd();
  }

  const supervisor = await ProcessSupervisor.start(config);
  const session = new LspSession(supervisor, options);

  try {
    await session.initialize();
  } catch (error) {
    logger.warn(() => `handshake with '${config.id}' failed: ${describeError(error)}`);
    await supervisor.terminate(options.terminateGraceMs);
    throw error;
  }

  return session;
}
