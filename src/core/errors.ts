export type TasklaneErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'DISCOVERY_ERROR';

/**
 * Base class for errors raised by the orchestrator itself.
 */
export class TasklaneError extends Error {
  constructor(message: string, public readonly code: TasklaneErrorCode) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A task directory with a missing or malformed descriptor. Discovery skips
 * the task and keeps going.
 */
export class ConfigurationError extends TasklaneError {
  constructor(
    message: string,
    public readonly taskName: string,
    public readonly filePath?: string,
  ) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

/**
 * Unrecoverable startup condition, e.g. the tasks root cannot be read.
 */
export class DiscoveryError extends TasklaneError {
  constructor(message: string, public readonly root: string) {
    super(message, 'DISCOVERY_ERROR');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
