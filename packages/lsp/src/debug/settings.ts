import type { DebugSettings, LogLevel } from './types.js';

const LEVELS: readonly LogLevel[] = ['debug', 'log', 'warn', 'error'];

export const defaultDebugSettings: DebugSettings = {
  enabled: false,
  namespaces: [],
  level: 'debug',
};

function parseNamespaces(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Resolves logger settings from the environment. `LSP_DEBUG` wins over
 * `DEBUG`; from `DEBUG` only the `lsp*` (or `*`) entries are honoured.
 */
export function resolveDebugSettings(
  env: NodeJS.ProcessEnv = process.env,
): DebugSettings {
  let settings: DebugSettings = { ...defaultDebugSettings };

  if (env.DEBUG) {
    const namespaces = parseNamespaces(env.DEBUG).filter(
      (ns) => ns.startsWith('lsp') || ns === '*',
    );
    if (namespaces.length > 0) {
      settings = { ...settings, enabled: true, namespaces };
    }
  }

  if (env.LSP_DEBUG) {
    settings = {
      ...settings,
      enabled: true,
      namespaces: parseNamespaces(env.LSP_DEBUG),
    };
  }

  const level = env.LSP_DEBUG_LEVEL;
  if (level !== undefined && isLogLevel(level)) {
    settings = { ...settings, level };
  }

  return settings;
}

export function levelRank(level: LogLevel): number {
  return LEVELS.indexOf(level);
}

export function matchesNamespace(namespace: string, pattern: string): boolean {
  if (pattern === namespace) {
    return true;
  }

  if (pattern.includes('*')) {
    const regexPattern = pattern
      .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*');
    return new RegExp(`^${regexPattern}$`).test(namespace);
  }

  return false;
}
