import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { defaultConfig, loadConfig, mergeConfig } from '../src/config/default-config.js';
import { validateConfig, validateConfigFile } from '../src/config/schema.js';
import { createLogger, isLogLevel } from '../src/core/logger.js';

describe('validateConfig', () => {
  it('accepts the default configuration', () => {
    const result = validateConfig(defaultConfig);
    expect(result.success).toBe(true);
    expect(result.data).toEqual(defaultConfig);
  });

  it('rejects a non-positive tick interval', () => {
    const result = validateConfig({ ...defaultConfig, tickIntervalMs: 0 });
    expect(result.success).toBe(false);
    expect(result.errors).toEqual(['tickIntervalMs: Number must be greater than 0']);
  });

  it('rejects an unknown log level', () => {
    const result = validateConfig({ ...defaultConfig, logLevel: 'verbose' });
    expect(result.success).toBe(false);
    expect(result.errors?.[0]).toMatch(/^logLevel: /);
  });
});

describe('validateConfigFile', () => {
  it('accepts a partial file', () => {
    const result = validateConfigFile({ tasksRoot: '/srv/tasks', eventLog: { enabled: false } });
    expect(result.success).toBe(true);
  });

  it('reports nested paths', () => {
    const result = validateConfigFile({ eventLog: { logPath: '' } });
    expect(result.errors).toEqual(['eventLog.logPath: String must contain at least 1 character(s)']);
  });
});

describe('mergeConfig', () => {
  it('returns the defaults for an empty object', () => {
    expect(mergeConfig({})).toEqual(defaultConfig);
  });

  it('lays overrides over the defaults, including nested event log settings', () => {
    const config = mergeConfig({ tasksRoot: '/srv/tasks', gracePeriodMs: 2000, eventLog: { enabled: false } });
    expect(config.tasksRoot).toBe('/srv/tasks');
    expect(config.gracePeriodMs).toBe(2000);
    expect(config.tickIntervalMs).toBe(1000);
    expect(config.eventLog).toEqual({ enabled: false, logPath: '.tasklane/logs/events.jsonl' });
  });

  it('throws with every problem listed', () => {
    expect(() => mergeConfig({ tickIntervalMs: -1, gracePeriodMs: 'soon' })).toThrow(
      'Invalid configuration:\n  - tickIntervalMs: Number must be greater than 0\n  - gracePeriodMs: Expected number, received string',
    );
  });
});

describe('loadConfig', () => {
  const testDir = join(tmpdir(), 'tasklane-config-test-' + Date.now());

  beforeEach(() => {
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('returns the defaults without a path', () => {
    expect(loadConfig()).toEqual(defaultConfig);
  });

  it('reads and merges a JSON file', () => {
    const path = join(testDir, 'tasklane.json');
    writeFileSync(path, JSON.stringify({ tasksRoot: 'routines', markerDir: '/run/tasklane', logLevel: 'debug' }));
    const config = loadConfig(path);
    expect(config.tasksRoot).toBe('routines');
    expect(config.markerDir).toBe('/run/tasklane');
    expect(config.logLevel).toBe('debug');
  });

  it('names the file when it cannot be parsed', () => {
    const path = join(testDir, 'broken.json');
    writeFileSync(path, '{ tasksRoot: ');
    expect(() => loadConfig(path)).toThrow(`Failed to load config ${path}:`);
  });

  it('names the file when it does not exist', () => {
    const path = join(testDir, 'missing.json');
    expect(() => loadConfig(path)).toThrow(`Failed to load config ${path}:`);
  });
});

describe('logger', () => {
  it('recognises log levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });

  it('prefixes messages with the component name', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('Scheduler', 'info');
    logger.info('tick');
    logger.child('task:radio').info('beat 1');
    logger.debug('hidden');
    expect(log.mock.calls).toEqual([['[Scheduler] tick'], ['[task:radio] beat 1']]);
    log.mockRestore();
  });

  it('writes nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    createLogger('Scheduler', 'silent').error('boom');
    expect(error).not.toHaveBeenCalled();
    error.mockRestore();
  });
});
