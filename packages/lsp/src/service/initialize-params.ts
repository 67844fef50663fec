import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import { z } from 'zod';

import type { LspSessionOptions } from '../config.js';
import { ConfigError, describeError } from '../errors.js';

export type InitializeTemplate = Record<string, unknown>;

export const DEFAULT_TEMPLATE_URL = new URL(
  '../../templates/initialize-params.json',
  import.meta.url,
);

const templateSchema = z.record(z.string(), z.unknown());

export interface TemplateContext {
  workspaceRoot: string;
  processId: number;
}

export function toFileUri(filePath: string): string {
  if (filePath.startsWith('file://')) {
    return filePath;
  }
  return pathToFileURL(filePath).toString();
}

export function fromFileUri(fileUriOrPath: string): string {
  if (fileUriOrPath.startsWith('file://')) {
    return fileURLToPath(fileUriOrPath);
  }
  return fileUriOrPath;
}

/**
 * Reads a per-server initialize template. The `_description` key is
 * documentation only and is dropped.
 */
export async function loadInitializeTemplate(
  location: string | URL = DEFAULT_TEMPLATE_URL,
): Promise<InitializeTemplate> {
  let content: string;
  try {
    content = await readFile(location, 'utf8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read initialize template ${String(location)}: ${describeError(error)}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Initialize template ${String(location)} is not valid JSON: ${describeError(error)}`,
    );
  }

  const parsed = templateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Initialize template ${String(location)} must be a JSON object`);
  }

  const { _description: _ignored, ...template } = parsed.data;
  return template;
}

function substitute(value: unknown, replacements: ReadonlyMap<string, unknown>): unknown {
  if (typeof value === 'string') {
    return replacements.has(value) ? replacements.get(value) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => substitute(item, replacements));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substitute(item, replacements)]),
    );
  }
  return value;
}

/**
 * Replaces whole-string placeholders anywhere in the template. Nothing
 * else in the template is looked at.
 */
export function renderInitializeParams(
  template: InitializeTemplate,
  { workspaceRoot, processId }: TemplateContext,
): InitializeTemplate {
  const rootPath = fromFileUri(workspaceRoot);
  const rootUri = toFileUri(rootPath);
  const replacements = new Map<string, unknown>([
    ['$processId', processId],
    ['$rootPath', rootPath],
    ['$rootUri', rootUri],
    ['$uri', rootUri],
    ['$name', basename(rootPath)],
  ]);

  const { _description: _ignored, ...rest } = template;
  const rendered = substitute(rest, replacements);
  return templateSchema.parse(rendered);
}

/**
 * Final `initialize` params: built-in defaults, then the rendered template,
 * then explicit `capabilities` / `initializationOptions` from the options.
 */
export function buildInitializeParams(
  options: Pick<
    LspSessionOptions,
    'workspaceRoot' | 'clientInfo' | 'capabilities' | 'initializationOptions'
  >,
  template: InitializeTemplate,
  processId: number = process.pid,
): InitializeTemplate {
  const rootPath = fromFileUri(options.workspaceRoot);
  const rootUri = toFileUri(rootPath);
  const defaults: InitializeTemplate = {
    processId,
    clientInfo: options.clientInfo,
    rootPath,
    rootUri,
    workspaceFolders: [{ uri: rootUri, name: basename(rootPath) }],
    capabilities: {},
  };

  const params: InitializeTemplate = {
    ...defaults,
    ...renderInitializeParams(template, { workspaceRoot: rootPath, processId }),
  };
  if (options.capabilities !== undefined) {
    params.capabilities = options.capabilities;
  }
  if (options.initializationOptions !== undefined) {
    params.initializationOptions = options.initializationOptions;
  }
  return params;
}
