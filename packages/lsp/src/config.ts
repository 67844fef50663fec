import { z } from 'zod';

import { ConfigError } from './errors.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_INITIALIZE_TIMEOUT_MS = 60_000;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 3_000;
export const DEFAULT_TERMINATE_GRACE_MS = 2_000;
export const DEFAULT_DIAGNOSTICS_DEBOUNCE_MS = 120;

const positiveMs = z.number().int().positive();

export const lspServerConfigSchema = z.object({
  id: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string(), z.string()).optional(),
  cwd: z.string().min(1).optional(),
  languageId: z.string().min(1).optional(),
});

export const lspSessionOptionsSchema = z.object({
  workspaceRoot: z.string().min(1),
  requestTimeoutMs: positiveMs.default(DEFAULT_REQUEST_TIMEOUT_MS),
  initializeTimeoutMs: positiveMs.default(DEFAULT_INITIALIZE_TIMEOUT_MS),
  shutdownTimeoutMs: positiveMs.default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
  terminateGraceMs: positiveMs.default(DEFAULT_TERMINATE_GRACE_MS),
  diagnosticsDebounceMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_DIAGNOSTICS_DEBOUNCE_MS),
  clientInfo: z
    .object({ name: z.string().min(1), version: z.string().optional() })
    .default({ name: 'lsp-session', version: '0.1.0' }),
  capabilities: z.record(z.string(), z.unknown()).optional(),
  initializationOptions: z.unknown().optional(),
  initializeParams: z.record(z.string(), z.unknown()).optional(),
});

const bootstrapSchema = z.object({
  server: lspServerConfigSchema,
  session: lspSessionOptionsSchema,
});

/** Server Launch Config: the four fields the core needs plus an id. */
export type LspServerConfig = z.output<typeof lspServerConfigSchema>;
export type LspServerConfigInput = z.input<typeof lspServerConfigSchema>;

export type LspSessionOptions = z.output<typeof lspSessionOptionsSchema>;
export type LspSessionOptionsInput = z.input<typeof lspSessionOptionsSchema>;

export interface LspBootstrap {
  server: LspServerConfig;
  session: LspSessionOptions;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${label}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseServerConfig(input: unknown): LspServerConfig {
  return parseWith(lspServerConfigSchema, input, 'server config');
}

export function parseSessionOptions(input: unknown): LspSessionOptions {
  return parseWith(lspSessionOptionsSchema, input, 'session options');
}

/**
 * Reads `LSP_SESSION_BOOTSTRAP`, a JSON object `{ server, session }`, for
 * embedders that hand the client its configuration through the environment.
 */
export function loadBootstrapFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LspBootstrap {
  const raw = env.LSP_SESSION_BOOTSTRAP;
  if (typeof raw !== 'string' || raw.length === 0) {
    throw new ConfigError('LSP_SESSION_BOOTSTRAP environment variable is required');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigError('LSP_SESSION_BOOTSTRAP must be valid JSON');
  }

  return parseWith(bootstrapSchema, parsed, 'LSP_SESSION_BOOTSTRAP');
}
