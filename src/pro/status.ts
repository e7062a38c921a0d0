/**
 * Interpretation of `pro status --format=json` payloads
 */

import type { ProServiceEntry, ProStatus, ServiceStatus } from './types.js';
import { ProOutputError } from './errors.js';
import { createRecord } from '../utils/records.js';

/** Status words the CLI uses for a running service ("warning" = enabled with a notice) */
const ENABLED_WORDS = new Set(['enabled', 'active', 'on', 'warning']);
const NOT_APPLICABLE_WORDS = new Set(['n/a', 'not applicable', 'not-applicable']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse one entry of the `services` array, dropping entries without a name
 */
function parseServiceEntry(value: unknown): ProServiceEntry | null {
  if (!isRecord(value)) return null;
  const name = optionalString(value.name);
  if (!name) return null;

  return {
    name,
    entitled: optionalString(value.entitled),
    available: optionalString(value.available),
    status: optionalString(value.status),
    state: optionalString(value.state),
    enabled: typeof value.enabled === 'boolean' ? value.enabled : undefined,
    description: optionalString(value.description),
  };
}

/**
 * Parse the JSON payload printed by `pro status --wait --format=json`
 *
 * @throws ProOutputError if the payload is not a JSON object
 */
export function parseProStatus(payload: unknown): ProStatus {
  if (!isRecord(payload)) {
    throw new ProOutputError('pro status did not return a JSON object', payload);
  }

  const entries = Array.isArray(payload.services) ? payload.services : [];
  const services: ProServiceEntry[] = [];
  for (const entry of entries) {
    const parsed = parseServiceEntry(entry);
    if (parsed) services.push(parsed);
  }

  return {
    attached: payload.attached === true,
    services,
    raw: payload,
  };
}

/**
 * Classify a service entry into a ServiceStatus
 */
export function classifyService(entry: ProServiceEntry): ServiceStatus {
  if (entry.entitled?.toLowerCase() === 'no') {
    return 'not-entitled';
  }

  if (entry.enabled !== undefined) {
    return entry.enabled ? 'enabled' : 'disabled';
  }

  const word = (entry.status ?? entry.state)?.toLowerCase();
  if (word !== undefined) {
    if (ENABLED_WORDS.has(word)) return 'enabled';
    if (NOT_APPLICABLE_WORDS.has(word)) return 'not-applicable';
    return 'disabled';
  }

  if (entry.available?.toLowerCase() === 'no') {
    return 'not-applicable';
  }

  return 'disabled';
}

/**
 * Map every named service in a status payload to its ServiceStatus
 */
export function serviceStatuses(status: ProStatus): Record<string, ServiceStatus> {
  const result = createRecord<ServiceStatus>();
  for (const entry of status.services) {
    result[entry.name] = classifyService(entry);
  }
  return result;
}
