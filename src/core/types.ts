// Tasklane Core Type System

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type TaskPhase = 'idle' | 'running' | 'cancel_requested' | 'stopped';

export type CancelReason = 'terminate_marker' | 'max_duration' | 'shutdown';

export type RunOutcome =
  | { kind: 'completed' }
  | { kind: 'cancelled' }
  | { kind: 'failed'; reason: string };

export interface EventLogConfig {
  enabled: boolean;
  logPath: string;
}

export interface TasklaneConfig {
  tasksRoot: string;
  /** Directory scanned for `<task>.terminate` and `all.terminate`. Defaults to tasksRoot. */
  markerDir?: string;
  tickIntervalMs: number;
  gracePeriodMs: number;
  logLevel: LogLevel;
  eventLog: EventLogConfig;
}

export interface TaskRuntimeState {
  phase: TaskPhase;
  runId: string | null;
  /** Local calendar date (YYYY-MM-DD) of the last start. */
  lastFiredDate: string | null;
  /** Epoch ms at which the last run left the running phases. */
  lastRunEndedAt: number | null;
  runStartedAt: number | null;
  cancelRequestedAt: number | null;
  cancelReason: CancelReason | null;
  runCount: number;
  lastOutcome: RunOutcome | null;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
