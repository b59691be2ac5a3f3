// Tasklane Task Runner - lifecycle of one task: start, monitor, cancel, confirm stop

import { v4 as uuidv4 } from 'uuid';
import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import type { CancelReason, RunOutcome, TaskPhase, TaskRuntimeState } from '../core/types.js';
import { TaskEventBus } from '../events/task-events.js';
import type { TaskEvent } from '../events/task-events.js';
import type { TaskDefinition } from '../registry/types.js';
import { localDateKey } from '../schedule/trigger.js';
import type { TerminationSource } from './termination.js';

export const DEFAULT_GRACE_PERIOD_MS = 5_000;

export interface TaskRunnerOptions {
  gracePeriodMs?: number;
  events?: TaskEventBus;
  logger?: Logger;
}

interface ActiveRun {
  runId: string;
  controller: AbortController;
  settled: RunOutcome | null;
  done: Promise<void>;
}

export class TaskRunner {
  readonly definition: TaskDefinition;
  private gracePeriodMs: number;
  private events: TaskEventBus;
  private logger: Logger;
  private state: TaskRuntimeState;
  private active: ActiveRun | null = null;

  constructor(definition: TaskDefinition, options: TaskRunnerOptions = {}) {
    this.definition = definition;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.events = options.events ?? new TaskEventBus();
    this.logger = options.logger ?? createLogger('Runner');
    this.state = {
      phase: 'idle',
      runId: null,
      lastFiredDate: null,
      lastRunEndedAt: null,
      runStartedAt: null,
      cancelRequestedAt: null,
      cancelReason: null,
      runCount: 0,
      lastOutcome: null,
    };
  }

  get name(): string {
    return this.definition.name;
  }

  get phase(): TaskPhase {
    return this.state.phase;
  }

  isActive(): boolean {
    return this.state.phase === 'running' || this.state.phase === 'cancel_requested';
  }

  snapshot(): TaskRuntimeState {
    return { ...this.state };
  }

  /**
   * Idle -> running. Launches the entry point and returns without waiting
   * for it. The entry point body starts on the next microtask.
   */
  start(now: Date): string {
    if (this.state.phase !== 'idle') {
      throw new Error(`Task "${this.name}" cannot start from phase ${this.state.phase}`);
    }

    const runId = uuidv4();
    const controller = new AbortController();
    const run: ActiveRun = { runId, controller, settled: null, done: Promise.resolve() };

    this.state.phase = 'running';
    this.state.runId = runId;
    this.state.runStartedAt = now.getTime();
    this.state.lastFiredDate = localDateKey(now);
    this.state.cancelRequestedAt = null;
    this.state.cancelReason = null;
    this.active = run;

    const { entryPoint, taskConfig, directory } = this.definition;
    const context = {
      taskName: this.name,
      runId,
      taskDir: directory,
      logger: this.logger.child(`task:${this.name}`),
    };

    run.done = Promise.resolve()
      .then(() => entryPoint.run(controller.signal, taskConfig, context))
      .then(
        (result) => {
          // A plain JS entry point may resolve null
          if (result) {
            run.settled = result;
          } else {
            run.settled = controller.signal.aborted ? { kind: 'cancelled' } : { kind: 'completed' };
          }
        },
        (err: unknown) => {
          run.settled = { kind: 'failed', reason: errorMessage(err) };
        },
      );

    this.logger.info(`Task "${this.name}" started (run ${runId})`);
    this.publish({ timestamp: now.getTime(), taskName: this.name, runId, type: 'started' });

    return runId;
  }

  /**
   * One non-blocking monitoring step. Checks completion, then termination
   * markers, then the duration budget; in cancel_requested it checks
   * completion and the grace period.
   */
  monitor(now: Date, termination: TerminationSource): void {
    const run = this.active;
    if (!run) return;

    if (this.state.phase === 'running') {
      if (run.settled) {
        this.finish(now, run.settled);
        return;
      }
      if (termination.isRequested(this.name)) {
        this.requestCancel(now, 'terminate_marker');
        return;
      }
      const maxSeconds = this.definition.schedule.maxDurationSeconds;
      const startedAt = this.state.runStartedAt;
      if (maxSeconds !== null && startedAt !== null && now.getTime() - startedAt > maxSeconds * 1000) {
        this.requestCancel(now, 'max_duration');
      }
      return;
    }

    if (this.state.phase === 'cancel_requested') {
      if (run.settled) {
        this.finish(now, run.settled);
        return;
      }
      const requestedAt = this.state.cancelRequestedAt ?? now.getTime();
      if (now.getTime() - requestedAt >= this.gracePeriodMs) {
        this.release(now);
      }
    }
  }

  /** Sets the cancellation signal. Only acts while running. */
  requestCancel(now: Date, reason: CancelReason): boolean {
    const run = this.active;
    if (!run || this.state.phase !== 'running') return false;

    run.controller.abort();
    this.state.phase = 'cancel_requested';
    this.state.cancelRequestedAt = now.getTime();
    this.state.cancelReason = reason;

    this.logger.info(`Task "${this.name}" cancel requested (${reason})`);
    this.publish({
      timestamp: now.getTime(),
      taskName: this.name,
      runId: run.runId,
      type: 'cancel_requested',
      reason,
    });
    return true;
  }

  /**
   * Resolves true once the current unit settles, false after timeoutMs.
   */
  async waitForStop(timeoutMs: number): Promise<boolean> {
    const run = this.active;
    if (!run || run.settled) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([run.done.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Leave the running phases now: with the unit's outcome if it settled,
   * otherwise as an ungraceful stop that leaves the unit orphaned.
   */
  release(now: Date): void {
    const run = this.active;
    if (!run) return;

    if (run.settled) {
      this.finish(now, run.settled);
      return;
    }

    const requestedAt = this.state.cancelRequestedAt ?? now.getTime();
    this.logger.warn(
      `Task "${this.name}" did not stop within ${this.gracePeriodMs}ms; continuing without it`,
    );
    this.publish({
      timestamp: now.getTime(),
      taskName: this.name,
      runId: run.runId,
      type: 'ungraceful_stop',
      durationMs: now.getTime() - requestedAt,
    });
    this.finish(now, { kind: 'cancelled' });
  }

  private finish(now: Date, outcome: RunOutcome): void {
    const run = this.active;
    if (!run) return;

    const startedAt = this.state.runStartedAt ?? now.getTime();
    const durationMs = now.getTime() - startedAt;
    const { schedule } = this.definition;

    this.active = null;
    this.state.lastRunEndedAt = now.getTime();
    this.state.lastOutcome = outcome;
    this.state.runCount++;
    this.state.runId = null;
    this.state.runStartedAt = null;
    this.state.cancelRequestedAt = null;
    this.state.cancelReason = null;
    // Continuous without repeat runs once per process
    this.state.phase = !schedule.scheduleEnabled && !schedule.repeatEnabled ? 'stopped' : 'idle';

    if (outcome.kind === 'failed') {
      this.logger.error(`Task "${this.name}" failed: ${outcome.reason}`);
      this.publish({
        timestamp: now.getTime(),
        taskName: this.name,
        runId: run.runId,
        type: 'failed',
        error: outcome.reason,
        durationMs,
      });
    }

    this.logger.info(`Task "${this.name}" stopped (${outcome.kind}) after ${durationMs}ms`);
    this.publish({
      timestamp: now.getTime(),
      taskName: this.name,
      runId: run.runId,
      type: 'stopped',
      outcome,
      durationMs,
    });
  }

  /** Listener errors are logged; they never interrupt a phase change. */
  private publish(event: TaskEvent): void {
    try {
      this.events.publish(event);
    } catch (err) {
      this.logger.error(`Event listener failed on ${event.type} for task "${this.name}": ${errorMessage(err)}`);
    }
  }
}
