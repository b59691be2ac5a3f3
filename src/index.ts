#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { Orchestrator } from './core/orchestrator.js';
import { errorMessage } from './core/errors.js';
import type { TasklaneConfig } from './core/types.js';
import { defaultConfig, loadConfig } from './config/default-config.js';
import { validateConfigFile } from './config/schema.js';
import { TaskEventLog, formatEventSummary } from './events/event-log.js';
import type { TaskEventType } from './events/task-events.js';
import { createDefaultCatalog } from './tasks/catalog.js';
import { ALL_TASKS_MARKER, clearMarker, createMarker, listMarkers } from './runtime/termination.js';

interface CommonOptions {
  config?: string;
  root?: string;
}

const EVENT_TYPES: TaskEventType[] = ['started', 'cancel_requested', 'stopped', 'failed', 'ungraceful_stop'];

function resolveConfig(options: CommonOptions): TasklaneConfig {
  try {
    const config = loadConfig(options.config);
    return options.root ? { ...config, tasksRoot: options.root } : config;
  } catch (err) {
    console.error(errorMessage(err));
    process.exit(1);
  }
}

function markerDirOf(config: TasklaneConfig): string {
  return config.markerDir ?? config.tasksRoot;
}

function installShutdown(orchestrator: Orchestrator): void {
  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log('\nShutting down Tasklane...');
    try {
      await orchestrator.stop();
      process.exit(0);
    } catch (err) {
      console.error(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

const program = new Command();

program
  .name('tasklane')
  .description('Run long-lived background tasks on a schedule, with cooperative cancellation')
  .version('1.0.0');

program
  .command('start')
  .description('Discover tasks and run the scheduling loop until interrupted')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-r, --root <dir>', 'Tasks root directory')
  .action(async (options: CommonOptions) => {
    const config = resolveConfig(options);
    const orchestrator = new Orchestrator(config, { catalog: createDefaultCatalog() });

    try {
      await orchestrator.start();
    } catch (err) {
      console.error(`Failed to start: ${errorMessage(err)}`);
      process.exit(1);
    }

    console.log('Tasklane started.');
    console.log(`Tasks root: ${config.tasksRoot}`);
    console.log(`To stop a task: tasklane terminate <task>  (or: tasklane terminate ${ALL_TASKS_MARKER})`);
    installShutdown(orchestrator);
  });

program
  .command('run <task>')
  .description('Run a single task immediately and keep re-running it (debug mode)')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-r, --root <dir>', 'Tasks root directory')
  .action(async (task: string, options: CommonOptions) => {
    const config = resolveConfig(options);
    const orchestrator = new Orchestrator(config, { catalog: createDefaultCatalog() });

    try {
      await orchestrator.runSingle(task);
    } catch (err) {
      console.error(`Error running task: ${errorMessage(err)}`);
      process.exit(1);
    }

    console.log(`Debug mode for task: ${task}`);
    console.log(`To terminate: tasklane terminate ${task}`);
    installShutdown(orchestrator);
  });

program
  .command('list')
  .description('List discovered tasks and when they next become eligible')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-r, --root <dir>', 'Tasks root directory')
  .action(async (options: CommonOptions) => {
    const config = resolveConfig(options);
    const orchestrator = new Orchestrator(
      { ...config, logLevel: 'silent', eventLog: { ...config.eventLog, enabled: false } },
      { catalog: createDefaultCatalog() },
    );

    try {
      const discovery = await orchestrator.init();
      for (const status of orchestrator.status()) {
        const next = status.nextRun ? status.nextRun.toISOString() : 'never';
        console.log(`${status.name}  entry=${status.entryPoint}  next=${next}`);
      }
      for (const skipped of discovery.skipped) {
        console.log(`${skipped.taskName}  SKIPPED: ${skipped.message}`);
      }
      const markers = listMarkers(markerDirOf(config));
      if (markers.length > 0) {
        console.log(`Pending termination markers: ${markers.join(', ')}`);
      }
    } catch (err) {
      console.error(errorMessage(err));
      process.exit(1);
    }
  });

program
  .command('terminate <task>')
  .description(`Ask a running task to stop ("${ALL_TASKS_MARKER}" targets every task)`)
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-r, --root <dir>', 'Tasks root directory')
  .action((task: string, options: CommonOptions) => {
    const config = resolveConfig(options);
    const path = createMarker(markerDirOf(config), task);
    console.log(`Created ${path}`);
    console.log(`Remove it with: tasklane clear ${task}  (otherwise the next run is cancelled too)`);
  });

program
  .command('clear <task>')
  .description('Remove a termination marker')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-r, --root <dir>', 'Tasks root directory')
  .action((task: string, options: CommonOptions) => {
    const config = resolveConfig(options);
    if (clearMarker(markerDirOf(config), task)) {
      console.log(`Cleared termination marker for ${task}`);
    } else {
      console.log(`No termination marker for ${task}`);
    }
  });

program
  .command('logs')
  .description('View task lifecycle events')
  .option('-c, --config <path>', 'Path to configuration file')
  .option('-n, --lines <number>', 'Number of recent entries to show', '20')
  .option('-t, --task <name>', 'Filter by task')
  .option('-e, --event <type>', `Filter by event type (${EVENT_TYPES.join(', ')})`)
  .option('-s, --summary', 'Show event counts instead of entries')
  .action((options: { config?: string; lines: string; task?: string; event?: string; summary?: boolean }) => {
    const config = resolveConfig(options);
    if (options.summary) {
      const log = new TaskEventLog({ ...config.eventLog, enabled: false });
      for (const line of formatEventSummary(log.getSummary())) {
        console.log(line);
      }
      return;
    }
    const eventType = EVENT_TYPES.find((type) => type === options.event);
    if (options.event && !eventType) {
      console.error(`Unknown event type: ${options.event}`);
      process.exit(1);
    }

    const log = new TaskEventLog({ ...config.eventLog, enabled: false });
    const limit = parseInt(options.lines, 10) || 20;
    const entries = log.recent(limit, { taskName: options.task, type: eventType });

    if (entries.length === 0) {
      console.log('No events found.');
      return;
    }

    for (const entry of entries) {
      const ts = new Date(entry.timestamp).toISOString();
      const detail = entry.reason ?? entry.outcome?.kind ?? entry.error ?? '';
      console.log(`[${ts}] ${entry.taskName} ${entry.type}${detail ? ` (${detail})` : ''} run=${entry.runId}`);
    }
  });

program
  .command('config')
  .description('Show or validate configuration')
  .option('-v, --validate <path>', 'Validate a configuration file')
  .option('-s, --show', 'Show current default configuration')
  .action((options: { validate?: string; show?: boolean }) => {
    if (options.validate) {
      try {
        const raw: unknown = JSON.parse(readFileSync(options.validate, 'utf-8'));
        const result = validateConfigFile(raw);
        if (result.success) {
          console.log('Configuration is valid.');
        } else {
          console.error('Configuration validation failed:');
          for (const err of result.errors ?? []) {
            console.error(`  - ${err}`);
          }
          process.exit(1);
        }
      } catch (err) {
        console.error(`Failed to read config: ${errorMessage(err)}`);
        process.exit(1);
      }
    } else if (options.show) {
      console.log(JSON.stringify(defaultConfig, null, 2));
    } else {
      console.log('Use --show to display default config or --validate <path> to validate a config file.');
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
