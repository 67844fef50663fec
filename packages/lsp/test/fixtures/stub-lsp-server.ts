/**
 * Minimal language server for subprocess tests. Speaks Content-Length
 * framed JSON-RPC over stdio.
 *
 *   --capabilities <json>  initialize result capabilities
 *   --hang <method>        accept requests for <method> and never answer
 *   --ignore-exit          stay alive after the `exit` notification
 *   --stderr <text>        write <text> to stderr once started
 */

import {
  createMessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
} from 'vscode-jsonrpc/node.js';

type StubMode = {
  capabilities: Record<string, unknown>;
  hang: Set<string>;
  ignoreExit: boolean;
  stderr?: string;
};

const CANNED_RANGE = {
  start: { line: 3, character: 4 },
  end: { line: 3, character: 11 },
};

function parseMode(args: string[]): StubMode {
  const mode: StubMode = {
    capabilities: { definitionProvider: true },
    hang: new Set(),
    ignoreExit: false,
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const value = args[i + 1];

    if (arg === '--capabilities' && value !== undefined) {
      const parsed: unknown = JSON.parse(value);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        mode.capabilities = Object.fromEntries(Object.entries(parsed));
      }
      i += 1;
      continue;
    }

    if (arg === '--hang' && value !== undefined) {
      mode.hang.add(value);
      i += 1;
      continue;
    }

    if (arg === '--stderr' && value !== undefined) {
      mode.stderr = value;
      i += 1;
      continue;
    }

    if (arg === '--ignore-exit') {
      mode.ignoreExit = true;
    }
  }

  return mode;
}

function documentUri(params: unknown): string {
  if (
    typeof params === 'object' &&
    params !== null &&
    'textDocument' in params &&
    typeof params.textDocument === 'object' &&
    params.textDocument !== null &&
    'uri' in params.textDocument &&
    typeof params.textDocument.uri === 'string'
  ) {
    return params.textDocument.uri;
  }
  return 'file:///unknown';
}

const mode = parseMode(process.argv.slice(2));
const received = new Map<string, number>();

function count(method: string): void {
  received.set(method, (received.get(method) ?? 0) + 1);
}

const connection = createMessageConnection(
  new StreamMessageReader(process.stdin),
  new StreamMessageWriter(process.stdout),
);

connection.onRequest((method, params) => {
  count(method);

  if (mode.hang.has(method)) {
    return new Promise<never>(() => undefined);
  }

  switch (method) {
    case 'initialize':
      return {
        capabilities: mode.capabilities,
        serverInfo: { name: 'stub-lsp-server', version: '0.0.1' },
      };
    case 'shutdown':
      return null;
    case 'textDocument/definition':
      return [{ uri: documentUri(params), range: CANNED_RANGE }];
    case 'stub/stats':
      return Object.fromEntries(received);
    default:
      return null;
  }
});

connection.onNotification((method) => {
  count(method);
  if (method === 'exit' && !mode.ignoreExit) {
    process.exit(0);
  }
});

if (mode.stderr !== undefined) {
  process.stderr.write(`${mode.stderr}\n`);
}

connection.listen();
