// Tasklane Task Discovery - one task per subdirectory of the tasks root

import { readFile, readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, DiscoveryError, errorMessage } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { parseScheduleDescriptor } from '../schedule/schema.js';
import type { EntryPointCatalog } from '../tasks/catalog.js';
import type { TaskConfig } from '../tasks/types.js';
import type { DiscoveryResult, TaskDefinition } from './types.js';

export const TRIGGER_FILE = 'trigger.json';
export const BINDING_FILE = 'task.json';
export const CONFIG_FILE = 'config.json';

const bindingSchema = z.object({
  entryPoint: z.string().min(1),
});

const taskConfigSchema = z.record(z.unknown());

type JsonRead = { found: false } | { found: true; data: unknown };

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function readJson(taskName: string, filePath: string): Promise<JsonRead> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return { found: false };
    throw new ConfigurationError(`cannot read ${filePath}: ${errorMessage(err)}`, taskName, filePath);
  }
  try {
    return { found: true, data: JSON.parse(raw) };
  } catch (err) {
    throw new ConfigurationError(`invalid JSON in ${filePath}: ${errorMessage(err)}`, taskName, filePath);
  }
}

async function loadTask(
  taskName: string,
  directory: string,
  catalog: EntryPointCatalog,
): Promise<TaskDefinition> {
  const triggerPath = join(directory, TRIGGER_FILE);
  const trigger = await readJson(taskName, triggerPath);
  if (!trigger.found) {
    throw new ConfigurationError(`missing ${TRIGGER_FILE}`, taskName, triggerPath);
  }
  const parsed = parseScheduleDescriptor(trigger.data);
  if (!parsed.success || !parsed.data) {
    throw new ConfigurationError(
      `invalid ${TRIGGER_FILE}: ${(parsed.errors ?? []).join('; ')}`,
      taskName,
      triggerPath,
    );
  }

  let entryPointName = taskName;
  const bindingPath = join(directory, BINDING_FILE);
  const binding = await readJson(taskName, bindingPath);
  if (binding.found) {
    const result = bindingSchema.safeParse(binding.data);
    if (!result.success) {
      throw new ConfigurationError(`invalid ${BINDING_FILE}: entryPoint must be a non-empty string`, taskName, bindingPath);
    }
    entryPointName = result.data.entryPoint;
  }

  const entryPoint = catalog.get(entryPointName);
  if (!entryPoint) {
    throw new ConfigurationError(
      `no entry point registered as "${entryPointName}"`,
      taskName,
      binding.found ? bindingPath : directory,
    );
  }

  let taskConfig: TaskConfig = {};
  const configPath = join(directory, CONFIG_FILE);
  const config = await readJson(taskName, configPath);
  if (config.found) {
    const result = taskConfigSchema.safeParse(config.data);
    if (!result.success) {
      throw new ConfigurationError(`invalid ${CONFIG_FILE}: expected a JSON object`, taskName, configPath);
    }
    taskConfig = result.data;
  }

  return {
    name: taskName,
    directory,
    entryPointName,
    entryPoint,
    schedule: parsed.data,
    taskConfig,
  };
}

/**
 * Build the task set once at startup. A bad task directory is skipped with
 * a warning; an unreadable root is fatal.
 */
export async function discoverTasks(
  root: string,
  catalog: EntryPointCatalog,
  logger: Logger = createLogger('Discovery'),
): Promise<DiscoveryResult> {
  try {
    const info = await stat(root);
    if (!info.isDirectory()) {
      throw new DiscoveryError(`Tasks root is not a directory: ${root}`, root);
    }
  } catch (err) {
    if (err instanceof DiscoveryError) throw err;
    throw new DiscoveryError(`Tasks root is not accessible: ${root} (${errorMessage(err)})`, root);
  }

  const entries = await readdir(root, { withFileTypes: true });
  const directories = entries
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort();

  const result: DiscoveryResult = { tasks: [], skipped: [] };

  for (const name of directories) {
    try {
      const task = await loadTask(name, join(root, name), catalog);
      result.tasks.push(task);
      logger.info(`Discovered task "${name}" (entry point: ${task.entryPointName})`);
    } catch (err) {
      const configError =
        err instanceof ConfigurationError ? err : new ConfigurationError(errorMessage(err), name);
      result.skipped.push(configError);
      logger.warn(`Skipping task "${name}": ${configError.message}`);
    }
  }

  return result;
}
