import type { ScheduleDescriptor } from '../schedule/types.js';
import type { TaskConfig, TaskEntryPoint } from '../tasks/types.js';
import type { ConfigurationError } from '../core/errors.js';

export interface TaskDefinition {
  readonly name: string;
  readonly directory: string;
  readonly entryPointName: string;
  readonly entryPoint: TaskEntryPoint;
  readonly schedule: ScheduleDescriptor;
  /** Contents of config.json, handed to the entry point as-is. */
  readonly taskConfig: TaskConfig;
}

export interface DiscoveryResult {
  tasks: TaskDefinition[];
  skipped: ConfigurationError[];
}
