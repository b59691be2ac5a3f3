import type { TasklaneConfig, TaskRuntimeState, Clock } from './types.js';
import { systemClock } from './types.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { TaskEventBus } from '../events/task-events.js';
import type { TaskEvent } from '../events/task-events.js';
import { TaskEventLog } from '../events/event-log.js';
import { discoverTasks } from '../registry/discovery.js';
import { TaskRegistry } from '../registry/task-registry.js';
import type { DiscoveryResult, TaskDefinition } from '../registry/types.js';
import { SchedulingLoop } from '../runtime/scheduling-loop.js';
import { FileTerminationMarkers } from '../runtime/termination.js';
import type { TerminationSource } from '../runtime/termination.js';
import { continuousSchedule } from '../schedule/schema.js';
import { nextScheduledRun } from '../schedule/next-run.js';
import type { EntryPointCatalog } from '../tasks/catalog.js';

/** Re-run interval used when a single task is run for debugging. */
export const DEBUG_RERUN_INTERVAL_SECONDS = 1;

export interface OrchestratorOptions {
  catalog: EntryPointCatalog;
  termination?: TerminationSource;
  clock?: Clock;
  events?: TaskEventBus;
}

export interface TaskStatus {
  name: string;
  entryPoint: string;
  state: TaskRuntimeState;
  nextRun: Date | null;
}

/**
 * Wires discovery, the registry and the scheduling loop together for one
 * process. Nothing here is global: every collaborator is owned by the
 * instance.
 */
export class Orchestrator {
  private config: TasklaneConfig;
  private catalog: EntryPointCatalog;
  private termination: TerminationSource;
  private clock: Clock;
  private logger: Logger;
  private events: TaskEventBus;
  private eventLog: TaskEventLog;
  private registry: TaskRegistry | null = null;
  private loop: SchedulingLoop | null = null;
  private discovery: DiscoveryResult | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(config: TasklaneConfig, options: OrchestratorOptions) {
    this.config = config;
    this.catalog = options.catalog;
    this.termination =
      options.termination ?? new FileTerminationMarkers(config.markerDir ?? config.tasksRoot);
    this.clock = options.clock ?? systemClock;
    this.events = options.events ?? new TaskEventBus();
    this.logger = createLogger('Orchestrator', config.logLevel);
    this.eventLog = new TaskEventLog(config.eventLog);
  }

  getEventLog(): TaskEventLog {
    return this.eventLog;
  }

  getDiscovery(): DiscoveryResult | null {
    return this.discovery;
  }

  /** Discover tasks and build the registry. Throws only on fatal startup errors. */
  async init(): Promise<DiscoveryResult> {
    if (this.discovery) return this.discovery;

    const discovery = await discoverTasks(
      this.config.tasksRoot,
      this.catalog,
      createLogger('Discovery', this.config.logLevel),
    );
    this.discovery = discovery;
    this.buildRegistry(discovery.tasks);
    this.logger.info(
      `Loaded ${discovery.tasks.length} task(s), skipped ${discovery.skipped.length}`,
    );
    return discovery;
  }

  async start(): Promise<void> {
    await this.init();
    this.requireLoop().start();
  }

  /**
   * Run one task on its own, immediately and again every second after it
   * ends, keeping its duration budget. Other tasks are not scheduled.
   */
  async runSingle(taskName: string): Promise<void> {
    if (this.loop?.isRunning()) {
      throw new Error('Orchestrator is already running');
    }
    const discovery = await this.init();
    const definition = discovery.tasks.find((task) => task.name === taskName);
    if (!definition) {
      throw new Error(`Task "${taskName}" not found`);
    }

    this.buildRegistry([
      {
        ...definition,
        schedule: continuousSchedule(definition.schedule, DEBUG_RERUN_INTERVAL_SECONDS),
      },
    ]);
    this.logger.info(`Running task "${taskName}" in debug mode`);
    this.requireLoop().start();
  }

  async stop(): Promise<void> {
    if (this.loop) {
      await this.loop.stop();
    }
    if (this.unsubscribe) {
      this.unsubscribe();
      this.unsubscribe = null;
    }
  }

  /** Tick once by hand. Used by tests and tools that drive their own clock. */
  tick(now?: Date): void {
    this.requireLoop().tick(now);
  }

  status(): TaskStatus[] {
    if (!this.registry) return [];
    const now = this.clock();
    return this.registry.list().map((runner) => {
      const state = runner.snapshot();
      return {
        name: runner.name,
        entryPoint: runner.definition.entryPointName,
        state,
        nextRun:
          state.phase === 'idle'
            ? nextScheduledRun(runner.definition.schedule, now, state.lastRunEndedAt)
            : null,
      };
    });
  }

  private buildRegistry(tasks: TaskDefinition[]): void {
    const runnerLogger = createLogger('Runner', this.config.logLevel);
    this.registry = TaskRegistry.fromDefinitions(tasks, {
      gracePeriodMs: this.config.gracePeriodMs,
      events: this.events,
      logger: runnerLogger,
    });
    this.loop = new SchedulingLoop(this.registry, {
      termination: this.termination,
      tickIntervalMs: this.config.tickIntervalMs,
      gracePeriodMs: this.config.gracePeriodMs,
      clock: this.clock,
      logger: createLogger('Scheduler', this.config.logLevel),
    });

    if (!this.unsubscribe) {
      this.unsubscribe = this.events.subscribe((event: TaskEvent) => {
        try {
          this.eventLog.append(event);
        } catch (err) {
          this.logger.error('Failed to write event log:', err);
        }
      });
    }
  }

  private requireLoop(): SchedulingLoop {
    if (!this.loop) {
      throw new Error('Orchestrator not initialized. Call init() first.');
    }
    return this.loop;
  }
}
