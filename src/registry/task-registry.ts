// Tasklane Task Registry - owns the runner of every discovered task

import { TaskRunner } from '../runtime/task-runner.js';
import type { TaskRunnerOptions } from '../runtime/task-runner.js';
import type { TaskDefinition } from './types.js';

export class TaskRegistry {
  private runners: Map<string, TaskRunner> = new Map();

  static fromDefinitions(definitions: TaskDefinition[], options: TaskRunnerOptions = {}): TaskRegistry {
    const registry = new TaskRegistry();
    for (const definition of definitions) {
      registry.add(new TaskRunner(definition, options));
    }
    return registry;
  }

  add(runner: TaskRunner): void {
    if (this.runners.has(runner.name)) {
      throw new Error(`Task "${runner.name}" is already registered`);
    }
    this.runners.set(runner.name, runner);
  }

  get(name: string): TaskRunner | undefined {
    return this.runners.get(name);
  }

  /** Runners in registration order. */
  list(): TaskRunner[] {
    return [...this.runners.values()];
  }

  names(): string[] {
    return [...this.runners.keys()];
  }

  get size(): number {
    return this.runners.size;
  }
}
