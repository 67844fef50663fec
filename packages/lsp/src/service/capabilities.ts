import type { ServerCapabilities } from 'vscode-languageserver-protocol';

import { UnsupportedByServerError } from '../errors.js';

/** Feature requests and the provider flag each one is gated on. */
export const FEATURE_CAPABILITIES = {
  'textDocument/definition': 'definitionProvider',
  'textDocument/typeDefinition': 'typeDefinitionProvider',
  'textDocument/implementation': 'implementationProvider',
  'textDocument/references': 'referencesProvider',
  'textDocument/hover': 'hoverProvider',
  'textDocument/documentSymbol': 'documentSymbolProvider',
  'workspace/symbol': 'workspaceSymbolProvider',
  'textDocument/completion': 'completionProvider',
} as const satisfies Record<string, keyof ServerCapabilities>;

export type FeatureMethod = keyof typeof FEATURE_CAPABILITIES;

/**
 * A capability counts as advertised unless it is absent, `null` or `false`;
 * option objects such as `{ resolveProvider: true }` count.
 */
export function supportsFeature(
  capabilities: ServerCapabilities,
  method: FeatureMethod,
): boolean {
  const value: unknown = capabilities[FEATURE_CAPABILITIES[method]];
  return value !== undefined && value !== null && value !== false;
}

export function assertFeatureSupported(
  capabilities: ServerCapabilities,
  method: FeatureMethod,
): void {
  if (!supportsFeature(capabilities, method)) {
    throw new UnsupportedByServerError(method, FEATURE_CAPABILITIES[method]);
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Snapshot of the `capabilities` member of an initialize result. A
 * missing or non-object member yields an empty (but valid) snapshot.
 */
export function snapshotCapabilities(initializeResult: unknown): Readonly<ServerCapabilities> {
  if (
    typeof initializeResult !== 'object' ||
    initializeResult === null ||
    !('capabilities' in initializeResult)
  ) {
    return deepFreeze({});
  }

  const capabilities = initializeResult.capabilities;
  if (typeof capabilities !== 'object' || capabilities === null) {
    return deepFreeze({});
  }

  const copy: ServerCapabilities = structuredClone(capabilities);
  return deepFreeze(copy);
}
