/**
 * Desired-state file loading
 *
 * The file is YAML (JSON is valid YAML too):
 *
 * ```yaml
 * state: attached
 * token_file: /etc/pro-sync/token
 * enabled:
 *   - esm-apps
 *   - esm-infra
 * disabled:
 *   - livepatch
 * ```
 *
 * The orchestration-layer names `pro_token`, `pro_services_enable` and
 * `pro_services_disable` are accepted as aliases.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AttachmentState } from '../reconcilers/pro/types.js';
import { ConfigError } from './errors.js';

/**
 * Validated contents of a desired-state file
 */
export interface DesiredStateFile {
  /** Absolute path the file was read from */
  path: string;
  attachment?: AttachmentState;
  token?: string;
  /** Absolute path (relative paths resolve against the file's directory) */
  tokenFile?: string;
  enable?: string[];
  disable?: string[];
}

const KNOWN_KEYS = new Set([
  'state',
  'token',
  'token_file',
  'enabled',
  'disabled',
  'pro_token',
  'pro_services_enable',
  'pro_services_disable',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Narrow an arbitrary value to an attachment state
 */
export function parseAttachmentState(value: unknown): AttachmentState | undefined {
  return value === 'attached' || value === 'detached' ? value : undefined;
}

function readString(doc: Record<string, unknown>, key: string, issues: string[]): string | undefined {
  const value = doc[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    issues.push(`${key} must be a string`);
    return undefined;
  }
  return value;
}

function readList(doc: Record<string, unknown>, key: string, issues: string[]): string[] | undefined {
  const value = doc[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    issues.push(`${key} must be a list of service names`);
    return undefined;
  }

  const names: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === 'string') {
      names.push(item);
    } else {
      issues.push(`${key}[${index}] must be a string`);
    }
  });
  return names;
}

function pickAlias<T>(
  primary: T | undefined,
  alias: T | undefined,
  names: [string, string],
  issues: string[]
): T | undefined {
  if (primary !== undefined && alias !== undefined) {
    issues.push(`${names[0]} and ${names[1]} are aliases; set only one`);
  }
  return primary ?? alias;
}

/**
 * Validate a parsed document and convert it to a DesiredStateFile
 *
 * @throws ConfigError with every problem found
 */
export function validateDesiredStateDocument(doc: unknown, path: string): DesiredStateFile {
  if (doc === null || doc === undefined) {
    return { path };
  }

  if (!isRecord(doc)) {
    throw new ConfigError(`Desired-state file must contain a mapping: ${path}`, 'CONFIG_INVALID', path);
  }

  const issues: string[] = [];

  for (const key of Object.keys(doc)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push(`unknown key: ${key}`);
    }
  }

  let attachment: AttachmentState | undefined;
  const rawState = doc.state;
  if (rawState !== undefined && rawState !== null) {
    attachment = parseAttachmentState(rawState);
    if (!attachment) {
      issues.push(`state must be "attached" or "detached" (got ${JSON.stringify(rawState)})`);
    }
  }

  const token = pickAlias(
    readString(doc, 'token', issues),
    readString(doc, 'pro_token', issues),
    ['token', 'pro_token'],
    issues
  );
  const tokenFile = readString(doc, 'token_file', issues);
  const enable = pickAlias(
    readList(doc, 'enabled', issues),
    readList(doc, 'pro_services_enable', issues),
    ['enabled', 'pro_services_enable'],
    issues
  );
  const disable = pickAlias(
    readList(doc, 'disabled', issues),
    readList(doc, 'pro_services_disable', issues),
    ['disabled', 'pro_services_disable'],
    issues
  );

  if (issues.length > 0) {
    throw new ConfigError(`Invalid desired-state file: ${path}`, 'CONFIG_INVALID', path, issues);
  }

  return {
    path,
    attachment,
    token,
    tokenFile: tokenFile === undefined ? undefined : resolve(dirname(path), tokenFile),
    enable,
    disable,
  };
}

/**
 * Load and validate a desired-state YAML file
 *
 * @param filePath - Path to the file (relative paths resolve against basePath)
 * @throws ConfigError if the file is missing, unparsable or invalid
 */
export async function loadDesiredStateFile(
  filePath: string,
  basePath: string = process.cwd()
): Promise<DesiredStateFile> {
  const absolutePath = isAbsolute(filePath) ? filePath : resolve(basePath, filePath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Desired-state file not found: ${absolutePath}`, 'CONFIG_NOT_FOUND', absolutePath);
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Failed to read desired-state file: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_NOT_FOUND',
      absolutePath
    );
  }

  let doc: unknown;
  try {
    doc = parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      `Failed to parse desired-state YAML: ${err instanceof Error ? err.message : String(err)}`,
      'CONFIG_PARSE_ERROR',
      absolutePath
    );
  }

  return validateDesiredStateDocument(doc, absolutePath);
}
