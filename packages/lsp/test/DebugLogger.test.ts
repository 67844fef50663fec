import createDebug from 'debug';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { DebugLogger } from '../src/debug/DebugLogger.js';
import { matchesNamespace, resolveDebugSettings } from '../src/debug/settings.js';

afterEach(() => {
  vi.restoreAllMocks();
  DebugLogger.resetForTesting();
});

function captureOutput(): () => string {
  const spy = vi.spyOn(createDebug, 'log').mockImplementation(() => undefined);
  return () => spy.mock.calls.map((call: unknown[]) => String(call[0])).join('\n');
}

describe('resolveDebugSettings', () => {
  it('is disabled without any variable', () => {
    expect(resolveDebugSettings({})).toEqual({ enabled: false, namespaces: [], level: 'debug' });
  });

  it('takes only lsp namespaces from DEBUG', () => {
    expect(resolveDebugSettings({ DEBUG: 'express:*, lsp:rpc,lsp:session' })).toEqual({
      enabled: true,
      namespaces: ['lsp:rpc', 'lsp:session'],
      level: 'debug',
    });
    expect(resolveDebugSettings({ DEBUG: 'express:*' }).enabled).toBe(false);
  });

  it('prefers LSP_DEBUG and honours LSP_DEBUG_LEVEL', () => {
    expect(
      resolveDebugSettings({ DEBUG: 'lsp:rpc', LSP_DEBUG: 'lsp:*', LSP_DEBUG_LEVEL: 'warn' }),
    ).toEqual({ enabled: true, namespaces: ['lsp:*'], level: 'warn' });
  });

  it('ignores unknown levels', () => {
    expect(resolveDebugSettings({ LSP_DEBUG_LEVEL: 'verbose' }).level).toBe('debug');
  });
});

describe('matchesNamespace', () => {
  it('supports exact names and wildcards', () => {
    expect(matchesNamespace('lsp:rpc', 'lsp:rpc')).toBe(true);
    expect(matchesNamespace('lsp:rpc', 'lsp:*')).toBe(true);
    expect(matchesNamespace('lsp:rpc', '*')).toBe(true);
    expect(matchesNamespace('lsp:rpc', 'lsp:session')).toBe(false);
    expect(matchesNamespace('lsp.rpc', 'lsp:*')).toBe(false);
  });
});

describe('DebugLogger', () => {
  it('is enabled only for matching namespaces', () => {
    const settings = { enabled: true, namespaces: ['lsp:rpc'], level: 'debug' as const };

    expect(new DebugLogger('lsp:rpc', settings).enabled).toBe(true);
    expect(new DebugLogger('lsp:session', settings).enabled).toBe(false);
  });

  it('filters by level', () => {
    const logger = new DebugLogger('lsp:rpc', {
      enabled: true,
      namespaces: ['lsp:*'],
      level: 'warn',
    });

    expect(logger.isLevelEnabled('debug')).toBe(false);
    expect(logger.isLevelEnabled('warn')).toBe(true);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('writes warnings with a level prefix', () => {
    const output = captureOutput();
    const logger = new DebugLogger('lsp:process', {
      enabled: true,
      namespaces: ['lsp:*'],
      level: 'debug',
    });

    logger.warn('server ignored SIGTERM');

    expect(output()).toContain('[warn] server ignored SIGTERM');
  });

  it('does not evaluate lazy messages when disabled', () => {
    const logger = new DebugLogger('lsp:rpc', {
      enabled: false,
      namespaces: [],
      level: 'debug',
    });
    const build = vi.fn(() => 'expensive');

    logger.debug(build);

    expect(build).not.toHaveBeenCalled();
  });

  it('survives a lazy message that throws', () => {
    const output = captureOutput();
    const logger = new DebugLogger('lsp:rpc', {
      enabled: true,
      namespaces: ['lsp:rpc'],
      level: 'debug',
    });

    logger.log(() => {
      throw new Error('bad');
    });

    expect(output()).toContain('[Error evaluating log function]');
  });

  it('caches loggers per namespace', () => {
    expect(DebugLogger.getLogger('lsp:dispatch')).toBe(DebugLogger.getLogger('lsp:dispatch'));
  });
});
