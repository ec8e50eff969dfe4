// Path: src/lib/config/loader.test.ts

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  applyEnvOverrides,
  loadClientConfig,
  resolveConfigPath,
} from './loader.js';
import { ConfigError } from '../../utils/error.js';

describe('resolveConfigPath', () => {
  it('should prefer the explicit path', () => {
    expect(resolveConfigPath('custom.json', { PULSAR_WS_CONFIG: 'env.json' })).toBe(path.resolve('custom.json'));
  });

  it('should fall back to PULSAR_WS_CONFIG, then the default file', () => {
    expect(resolveConfigPath(undefined, { PULSAR_WS_CONFIG: 'env.json' })).toBe(path.resolve('env.json'));
    expect(resolveConfigPath(undefined, {})).toBe(path.resolve('pulsar-ws.json'));
  });
});

describe('applyEnvOverrides', () => {
  it('should override host, protocol and transport options', () => {
    const raw = { host: 'a:1', protocol: 'ws', transportOptions: { cacerts: 'ca-pem' } };

    expect(applyEnvOverrides(raw, {
      PULSAR_WS_HOST: 'b:2',
      PULSAR_WS_PROTOCOL: 'wss',
      PULSAR_WS_AUTH_TOKEN: 'test-secret',
      PULSAR_WS_INSECURE: 'true',
    })).toEqual({
      host: 'b:2',
      protocol: 'wss',
      transportOptions: { cacerts: 'ca-pem', authToken: 'test-secret', insecure: true },
    });
  });

  it('should leave the document alone without overrides', () => {
    const raw = { host: 'a:1' };
    const result = applyEnvOverrides(raw, { PULSAR_WS_INSECURE: '1' });

    expect(result).toEqual({ host: 'a:1' });
    expect(result).not.toBe(raw);
  });
});

describe('loadClientConfig', () => {
  let dir: string;

  function writeConfig(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pulsar-ws-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should load and parse a config file', () => {
    const file = writeConfig('client.json', JSON.stringify({
      host: 'broker:8080',
      producer: { tenant: 't', namespace: 'n', topic: 'top' },
    }));

    expect(loadClientConfig(file, {})).toEqual({
      host: 'broker:8080',
      producer: { tenant: 't', namespace: 'n', topic: 'top' },
    });
  });

  it('should read the file named by PULSAR_WS_CONFIG', () => {
    const file = writeConfig('env.json', JSON.stringify({ host: 'broker:8080' }));
    expect(loadClientConfig(undefined, { PULSAR_WS_CONFIG: file })).toEqual({ host: 'broker:8080' });
  });

  it('should apply environment overrides before parsing', () => {
    const file = writeConfig('client.json', JSON.stringify({
      reader: { tenant: 't', namespace: 'n', topic: 'top' },
    }));

    expect(loadClientConfig(file, { PULSAR_WS_HOST: 'broker:6650', PULSAR_WS_AUTH_TOKEN: 'test-secret' })).toEqual({
      host: 'broker:6650',
      transportOptions: { authToken: 'test-secret' },
      reader: { tenant: 't', namespace: 'n', topic: 'top' },
    });
  });

  it('should fail when the file does not exist', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadClientConfig(file, {})).toThrow(`Config file not found: ${file}`);
  });

  it('should fail on malformed JSON', () => {
    const file = writeConfig('broken.json', '{ "host": ');
    expect(() => loadClientConfig(file, {})).toThrow(ConfigError);
    expect(() => loadClientConfig(file, {})).toThrow(`Failed to parse ${file}`);
  });

  it('should fail when the document is not an object', () => {
    const file = writeConfig('list.json', '["broker:8080"]');
    expect(() => loadClientConfig(file, {})).toThrow(`${file} must contain a JSON object`);
  });
});
