import { readFileSync } from 'node:fs';
import type { TasklaneConfig } from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { validateConfig, validateConfigFile } from './schema.js';

export const defaultConfig: TasklaneConfig = {
  tasksRoot: 'tasks',
  tickIntervalMs: 1_000,
  gracePeriodMs: 5_000,
  logLevel: 'info',
  eventLog: {
    enabled: true,
    logPath: '.tasklane/logs/events.jsonl',
  },
};

/** Partial settings laid over the defaults, then checked as a whole. */
export function mergeConfig(overrides: unknown): TasklaneConfig {
  const file = validateConfigFile(overrides);
  if (!file.success || !file.data) {
    throw new Error(`Invalid configuration:\n  - ${(file.errors ?? []).join('\n  - ')}`);
  }
  const { eventLog, ...rest } = file.data;
  const merged = {
    ...defaultConfig,
    ...rest,
    eventLog: { ...defaultConfig.eventLog, ...eventLog },
  };
  const full = validateConfig(merged);
  if (!full.success || !full.data) {
    throw new Error(`Invalid configuration:\n  - ${(full.errors ?? []).join('\n  - ')}`);
  }
  return full.data;
}

export function loadConfig(path?: string): TasklaneConfig {
  if (!path) return mergeConfig({});

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new Error(`Failed to load config ${path}: ${errorMessage(err)}`);
  }
  return mergeConfig(raw);
}
