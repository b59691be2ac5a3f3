// Tasklane Entry Point Catalog - static registration of task code

import type { TaskEntryPoint } from './types.js';
import { helloWorldTask } from './builtin/hello-world.js';
import { heartbeatTask } from './builtin/heartbeat.js';
import { commandTask } from './builtin/command.js';

export class EntryPointCatalog {
  private entries: Map<string, TaskEntryPoint> = new Map();

  register(entry: TaskEntryPoint): void {
    if (this.entries.has(entry.name)) {
      throw new Error(`Entry point "${entry.name}" is already registered`);
    }
    this.entries.set(entry.name, entry);
  }

  get(name: string): TaskEntryPoint | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): TaskEntryPoint[] {
    return [...this.entries.values()];
  }
}

export const builtinEntryPoints: TaskEntryPoint[] = [helloWorldTask, heartbeatTask, commandTask];

export function createDefaultCatalog(extra: TaskEntryPoint[] = []): EntryPointCatalog {
  const catalog = new EntryPointCatalog();
  for (const entry of [...builtinEntryPoints, ...extra]) {
    catalog.register(entry);
  }
  return catalog;
}
