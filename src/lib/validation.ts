// Path: src/lib/validation.ts
// Configuration validation for pulsar-ws-supervisor

import type { ClientConfig, RoleArgs } from '../services/supervisor/types.js';
import { toRoleSection } from '../services/supervisor/plan.js';
import { ConfigError, InvalidHostFormatError } from '../utils/error.js';
import { configLogger as log } from './logger.js';
import { buildConnectionSettings, formatHost } from './websocket/connection.js';
import type { RawTransportOptions, Role } from './websocket/types.js';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export interface ValidationError {
  field: string;
  message: string;
  value?: unknown;
}

export interface ValidationWarning {
  field: string;
  message: string;
  suggestion?: string;
}

const SUPPORTED_TRANSPORT_OPTIONS = new Set([
  'authToken',
  'cacerts',
  'insecure',
  'socketConnectTimeout',
  'socketRecvTimeout',
  'extraHeaders',
]);

interface SectionEntry {
  field: string;
  role: Role;
  args: RoleArgs & { subscription?: string };
}

/**
 * Flatten role sections into one entry per connection
 */
function sectionEntries(config: ClientConfig, errors: ValidationError[]): SectionEntry[] {
  const entries: SectionEntry[] = [];

  const producers = toRoleSection(config.producer);
  if (producers?.kind === 'one') {
    entries.push({ field: 'producer', role: 'producer', args: producers.args });
  } else if (producers?.kind === 'many') {
    producers.args.forEach((args, index) => {
      entries.push({ field: `producer[${index}]`, role: 'producer', args });
    });
  }

  for (const role of ['consumer', 'reader'] as const) {
    const section = toRoleSection<RoleArgs & { subscription?: string }>(config[role]);
    if (section?.kind === 'many') {
      errors.push({ field: role, message: 'Only producers accept a list of connections' });
    } else if (section) {
      entries.push({ field: role, role, args: section.args });
    }
  }

  return entries;
}

function transportSources(config: ClientConfig, entries: SectionEntry[]): Array<[string, RawTransportOptions]> {
  const sources: Array<[string, RawTransportOptions]> = [];
  if (config.transportOptions) {
    sources.push(['transportOptions', config.transportOptions]);
  }
  for (const entry of entries) {
    if (entry.args.transportOptions) {
      sources.push([`${entry.field}.transportOptions`, entry.args.transportOptions]);
    }
  }
  return sources;
}

/**
 * Validate a client configuration without starting anything.
 * Unlike planning, collects every problem instead of stopping at the first.
 */
export function validateClientConfig(config: ClientConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  let hostValid = false;
  const rawHost: unknown = config.host;
  if (rawHost === undefined || rawHost === null || rawHost === '') {
    errors.push({ field: 'host', message: 'Host is required' });
  } else {
    try {
      formatHost(rawHost);
      hostValid = true;
    } catch (err) {
      if (!(err instanceof InvalidHostFormatError)) throw err;
      errors.push({ field: 'host', message: err.message, value: rawHost });
    }
  }

  const protocol: unknown = config.protocol ?? 'ws';
  if (protocol !== 'ws' && protocol !== 'wss') {
    errors.push({ field: 'protocol', message: 'Protocol must be "ws" or "wss"', value: protocol });
  }

  const entries = sectionEntries(config, errors);
  if (entries.length === 0 && errors.length === 0) {
    warnings.push({
      field: 'config',
      message: 'No producer, consumer or reader configured',
      suggestion: 'Only the registry will be started',
    });
  }

  if (hostValid) {
    for (const entry of entries) {
      try {
        buildConnectionSettings({ ...entry.args, host: config.host, protocol: config.protocol }, entry.role);
      } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        errors.push({ field: `${entry.field}.${err.field}`, message: err.message });
      }
    }
  }

  const seenTopics = new Map<string, string>();
  for (const entry of entries.filter(e => e.role === 'producer')) {
    const key = `${entry.args.persistence ?? 'persistent'}/${entry.args.tenant}/${entry.args.namespace}/${entry.args.topic}`;
    const first = seenTopics.get(key);
    if (first !== undefined) {
      warnings.push({
        field: `${entry.field}.topic`,
        message: `Publishes to the same topic as ${first}`,
      });
    } else {
      seenTopics.set(key, entry.field);
    }
  }

  const sources = transportSources(config, entries);
  let hasToken = false;
  for (const [field, options] of sources) {
    if (options.authToken !== undefined) hasToken = true;

    if (options.insecure === true) {
      warnings.push({
        field: `${field}.insecure`,
        message: 'TLS certificate verification is disabled',
        suggestion: 'Provide cacerts instead',
      });
    }

    for (const key of Object.keys(options)) {
      if (!SUPPORTED_TRANSPORT_OPTIONS.has(key)) {
        warnings.push({ field: `${field}.${key}`, message: 'Unsupported transport option is ignored' });
      }
    }
  }

  if (hasToken && protocol === 'ws') {
    warnings.push({
      field: 'protocol',
      message: 'Auth token is sent over an unencrypted connection',
      suggestion: 'Use "wss"',
    });
  }

  const valid = errors.length === 0;
  log.debug({ valid, errors: errors.length, warnings: warnings.length }, 'Configuration validated');

  return { valid, errors, warnings };
}

/**
 * Format validation result for display
 */
export function formatValidationResult(result: ValidationResult): string {
  const lines: string[] = [];

  if (result.errors.length > 0) {
    lines.push('Errors:');
    for (const error of result.errors) {
      lines.push(`  ✗ ${error.field}: ${error.message}`);
      if (error.value !== undefined) {
        lines.push(`    Value: ${JSON.stringify(error.value)}`);
      }
    }
  }

  if (result.warnings.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push('Warnings:');
    for (const warning of result.warnings) {
      lines.push(`  ⚠ ${warning.field}: ${warning.message}`);
      if (warning.suggestion) {
        lines.push(`    Suggestion: ${warning.suggestion}`);
      }
    }
  }

  if (result.valid && result.warnings.length === 0) {
    lines.push('✓ Configuration is valid');
  } else if (result.valid) {
    lines.push('');
    lines.push('✓ Configuration is valid (with warnings)');
  }

  return lines.join('\n');
}
