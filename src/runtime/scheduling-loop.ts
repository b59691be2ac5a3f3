// Tasklane Scheduling Loop - one dispatcher driving every task runner per tick

import { createLogger } from '../core/logger.js';
import type { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { systemClock } from '../core/types.js';
import type { Clock } from '../core/types.js';
import type { TaskRegistry } from '../registry/task-registry.js';
import { shouldFire } from '../schedule/trigger.js';
import { DEFAULT_GRACE_PERIOD_MS } from './task-runner.js';
import type { TerminationSource } from './termination.js';

export const DEFAULT_TICK_INTERVAL_MS = 1_000;

export interface SchedulingLoopOptions {
  termination: TerminationSource;
  tickIntervalMs?: number;
  /** How long stop() waits for each cancelled unit. */
  gracePeriodMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export class SchedulingLoop {
  private registry: TaskRegistry;
  private termination: TerminationSource;
  private tickIntervalMs: number;
  private gracePeriodMs: number;
  private clock: Clock;
  private logger: Logger;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(registry: TaskRegistry, options: SchedulingLoopOptions) {
    this.registry = registry;
    this.termination = options.termination;
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('Scheduler');
  }

  /**
   * Evaluate every task once, in registry order. Idle tasks consult their
   * trigger; active tasks get one monitoring step. Nothing here waits.
   */
  tick(now: Date = this.clock()): void {
    for (const runner of this.registry.list()) {
      try {
        if (runner.phase === 'idle') {
          if (shouldFire(runner.definition.schedule, now, runner.snapshot())) {
            runner.start(now);
          }
        } else if (runner.isActive()) {
          runner.monitor(now, this.termination);
        }
      } catch (err) {
        this.logger.error(`Tick failed for task "${runner.name}": ${errorMessage(err)}`);
      }
    }
  }

  start(): void {
    if (this.interval !== null) return;
    this.logger.info(
      `Scheduling ${this.registry.size} task(s) every ${this.tickIntervalMs}ms`,
    );
    this.tick();
    this.interval = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  isRunning(): boolean {
    return this.interval !== null;
  }

  /**
   * Stop ticking, cancel every active task and give each one the grace
   * period to settle. Units that do not settle are left behind.
   */
  async stop(): Promise<void> {
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }

    const active = this.registry.list().filter((runner) => runner.isActive());
    if (active.length === 0) return;

    this.logger.info(`Stopping ${active.length} active task(s)`);
    const requestedAt = this.clock();
    for (const runner of active) {
      runner.requestCancel(requestedAt, 'shutdown');
    }

    await Promise.all(
      active.map(async (runner) => {
        await runner.waitForStop(this.gracePeriodMs);
        runner.release(this.clock());
      }),
    );
  }
}
