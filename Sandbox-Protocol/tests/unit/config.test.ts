import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@fathom/shared/Types/errors.js';
import { expandHome, getConfig, getStrippedEnv, resetConfig } from '../../src/config.js';

const savedEnv = { ...process.env };

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (key.startsWith('FATHOM_')) delete process.env[key];
  }
  resetConfig();
});

afterEach(() => {
  process.env = { ...savedEnv };
  resetConfig();
});

describe('getConfig', () => {
  it('should apply defaults when nothing is set', () => {
    const config = getConfig();
    expect(config.transport).toBe('stdio');
    expect(config.port).toBe(8790);
    expect(config.supportedVersions).toEqual([1]);
    expect(config.languages).toEqual(['python', 'node', 'bash']);
    expect(config.maxConcurrentExecutions).toBe(4);
    expect(config.maxQueueDepth).toBe(16);
    expect(config.timeoutGraceMs).toBe(5_000);
    expect(config.sandboxDir).toBe(join(homedir(), '.fathom/sandbox'));
  });

  it('should parse comma-separated lists', () => {
    process.env.FATHOM_SUPPORTED_VERSIONS = '1, 2';
    process.env.FATHOM_LANGUAGES = 'python, bash ,';
    const config = getConfig();
    expect(config.supportedVersions).toEqual([1, 2]);
    expect(config.languages).toEqual(['python', 'bash']);
  });

  it('should coerce numeric settings', () => {
    process.env.FATHOM_TRANSPORT = 'ws';
    process.env.FATHOM_PORT = '9001';
    process.env.FATHOM_MAX_QUEUE_DEPTH = '0';
    const config = getConfig();
    expect(config.transport).toBe('ws');
    expect(config.port).toBe(9001);
    expect(config.maxQueueDepth).toBe(0);
  });

  it('should cache until reset', () => {
    const first = getConfig();
    process.env.FATHOM_PORT = '9100';
    expect(getConfig()).toBe(first);
    resetConfig();
    expect(getConfig().port).toBe(9100);
  });

  it('should reject a non-numeric port', () => {
    process.env.FATHOM_PORT = 'eighty';
    expect(() => getConfig()).toThrow(ConfigurationError);
  });

  it('should reject an empty language list', () => {
    process.env.FATHOM_LANGUAGES = ' , ';
    expect(() => getConfig()).toThrow(ConfigurationError);
  });

  it('should reject a reconnect base delay above the cap', () => {
    process.env.FATHOM_RECONNECT_BASE_MS = '5000';
    process.env.FATHOM_RECONNECT_MAX_MS = '1000';
    expect(() => getConfig()).toThrow(/FATHOM_RECONNECT_BASE_MS must not exceed FATHOM_RECONNECT_MAX_MS/);
  });
});

describe('expandHome', () => {
  it('should expand a leading tilde only', () => {
    expect(expandHome('~/logs')).toBe(`${homedir()}/logs`);
    expect(expandHome('/var/~/logs')).toBe('/var/~/logs');
  });
});

describe('getStrippedEnv', () => {
  it('should pass only allowlisted variables, then the overlay', () => {
    process.env.PATH = '/usr/bin';
    process.env.API_TOKEN = 'test-secret';
    const env = getStrippedEnv({ GREETING: 'hello' });
    expect(env.PATH).toBe('/usr/bin');
    expect(env.API_TOKEN).toBeUndefined();
    expect(env.GREETING).toBe('hello');
  });

  it('should let the overlay replace an allowlisted value', () => {
    process.env.LANG = 'C';
    expect(getStrippedEnv({ LANG: 'en_US.UTF-8' }).LANG).toBe('en_US.UTF-8');
  });
});
