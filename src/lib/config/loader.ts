// Path: src/lib/config/loader.ts
// Configuration loading with environment variable overrides

import fs from 'node:fs';
import path from 'node:path';
import { configLogger as log } from '../logger.js';
import { ConfigError, extractErrorMessage } from '../../utils/error.js';
import { isRecord } from '../../utils/guards.js';
import type { ClientConfig } from '../../services/supervisor/types.js';
import { parseClientConfig } from './parser.js';

export const DEFAULT_CONFIG_FILE = 'pulsar-ws.json';

/**
 * Resolve the config file: explicit path, then PULSAR_WS_CONFIG,
 * then pulsar-ws.json in the working directory.
 */
export function resolveConfigPath(configPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(configPath ?? env.PULSAR_WS_CONFIG ?? DEFAULT_CONFIG_FILE);
}

/**
 * Apply environment variable overrides to a raw config document.
 *
 * Environment variables:
 * - PULSAR_WS_HOST: Override host ("host:port")
 * - PULSAR_WS_PROTOCOL: Override protocol ("ws" or "wss")
 * - PULSAR_WS_AUTH_TOKEN: Override the shared auth token
 * - PULSAR_WS_INSECURE: Set to "true" to skip TLS verification
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = { ...raw };

  if (env.PULSAR_WS_HOST) {
    config.host = env.PULSAR_WS_HOST;
  }
  if (env.PULSAR_WS_PROTOCOL) {
    config.protocol = env.PULSAR_WS_PROTOCOL;
  }

  const authToken = env.PULSAR_WS_AUTH_TOKEN;
  const hasToken = authToken !== undefined && authToken !== '';
  const insecure = env.PULSAR_WS_INSECURE === 'true';
  if (hasToken || insecure) {
    config.transportOptions = {
      ...(isRecord(raw.transportOptions) ? raw.transportOptions : {}),
      ...(hasToken && { authToken }),
      ...(insecure && { insecure: true }),
    };
  }

  return config;
}

/**
 * Load a client configuration from a JSON file.
 *
 * @throws {ConfigError} when the file is missing, unreadable or invalid
 * @throws {InvalidHostFormatError} when the host has an unsupported shape
 */
export function loadClientConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const file = resolveConfigPath(configPath, env);

  if (!fs.existsSync(file)) {
    throw new ConfigError('config', `Config file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    log.error({ err, path: file }, 'Failed to read config file');
    throw new ConfigError('config', `Failed to parse ${file}: ${extractErrorMessage(err)}`);
  }

  if (!isRecord(raw)) {
    throw new ConfigError('config', `${file} must contain a JSON object`);
  }

  const config = parseClientConfig(applyEnvOverrides(raw, env));
  log.debug({ path: file, name: config.name }, 'Loaded client config');
  return config;
}
