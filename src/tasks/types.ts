// Tasklane Task Entry Point contract

import type { Logger } from '../core/logger.js';
import type { RunOutcome } from '../core/types.js';

export type TaskConfig = Record<string, unknown>;

export interface TaskRunContext {
  taskName: string;
  runId: string;
  taskDir: string;
  logger: Logger;
}

/**
 * One unit of long-running work. `run` must watch `signal` at least once a
 * second, clean up after itself, and settle. Resolving with nothing counts
 * as completed, or cancelled if the signal had already fired.
 */
export interface TaskEntryPoint {
  name: string;
  description: string;
  run(signal: AbortSignal, taskConfig: TaskConfig, context: TaskRunContext): Promise<RunOutcome | void>;
}
