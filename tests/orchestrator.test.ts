import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Orchestrator } from '../src/core/orchestrator.js';
import { DiscoveryError } from '../src/core/errors.js';
import type { TasklaneConfig } from '../src/core/types.js';
import { createDefaultCatalog } from '../src/tasks/catalog.js';
import { createMarker } from '../src/runtime/termination.js';
import { TaskEventBus } from '../src/events/task-events.js';
import type { TaskEvent } from '../src/events/task-events.js';

// 2024-01-01 is a Monday
const MONDAY_0700 = new Date(2024, 0, 1, 7, 0, 0);
const MONDAY_0800 = new Date(2024, 0, 1, 8, 0, 0);

function at(base: Date, seconds: number): Date {
  return new Date(base.getTime() + seconds * 1000);
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Orchestrator', () => {
  let testDir: string;
  let tasksRoot: string;
  let config: TasklaneConfig;
  let now: Date;
  let orchestrator: Orchestrator;

  function writeTask(name: string, files: Record<string, unknown>): void {
    const dir = join(tasksRoot, name);
    mkdirSync(dir, { recursive: true });
    for (const [file, body] of Object.entries(files)) {
      writeFileSync(join(dir, file), JSON.stringify(body));
    }
  }

  beforeEach(() => {
    testDir = join(tmpdir(), 'tasklane-orchestrator-test-' + Date.now() + '-' + Math.random().toString(36).slice(2));
    tasksRoot = join(testDir, 'tasks');
    mkdirSync(tasksRoot, { recursive: true });

    writeTask('hello-world', {
      'trigger.json': { schedule_on: false, timeout_on: false },
    });
    writeTask('radio', {
      'trigger.json': { schedule_on: true, timeout_on: false, days_of_week: ['Monday'], time_of_day: '08:00', max_duration: 60 },
      'task.json': { entryPoint: 'heartbeat' },
      'config.json': { intervalMs: 60_000 },
    });
    writeTask('broken', {
      'trigger.json': { schedule_on: true, timeout_on: false },
    });

    config = {
      tasksRoot,
      markerDir: tasksRoot,
      tickIntervalMs: 60_000,
      gracePeriodMs: 1_000,
      logLevel: 'silent',
      eventLog: { enabled: true, logPath: join(testDir, 'logs', 'events.jsonl') },
    };
    now = MONDAY_0700;
    orchestrator = new Orchestrator(config, { catalog: createDefaultCatalog(), clock: () => now });
  });

  afterEach(async () => {
    await orchestrator.stop();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('discovers valid tasks and reports the broken ones', async () => {
    const discovery = await orchestrator.init();

    expect(discovery.tasks.map((task) => task.name)).toEqual(['hello-world', 'radio']);
    expect(discovery.skipped.map((error) => error.taskName)).toEqual(['broken']);
    expect(orchestrator.getDiscovery()).toBe(discovery);
  });

  it('discovers only once', async () => {
    const first = await orchestrator.init();
    writeTask('late', { 'trigger.json': { schedule_on: false, timeout_on: false } });
    expect(await orchestrator.init()).toBe(first);
  });

  it('shows when each idle task is next eligible', async () => {
    await orchestrator.init();
    const status = orchestrator.status();

    expect(status.map((s) => [s.name, s.entryPoint])).toEqual([
      ['hello-world', 'hello-world'],
      ['radio', 'heartbeat'],
    ]);
    expect(status[0].nextRun?.getTime()).toBe(MONDAY_0700.getTime());
    expect(status[1].nextRun?.getTime()).toBe(MONDAY_0800.getTime());
  });

  it('runs a one-shot task once and records its events', async () => {
    await orchestrator.init();

    orchestrator.tick(MONDAY_0700);
    await flush();
    orchestrator.tick(at(MONDAY_0700, 1));

    const hello = orchestrator.status().find((s) => s.name === 'hello-world');
    expect(hello?.state.phase).toBe('stopped');
    expect(hello?.state.lastOutcome).toEqual({ kind: 'completed' });
    expect(hello?.nextRun).toBeNull();

    const logged = orchestrator.getEventLog().query({ taskName: 'hello-world' });
    expect(logged.map((e) => e.type)).toEqual(['started', 'stopped']);
  });

  it('cancels a running task when its termination marker appears', async () => {
    await orchestrator.init();

    orchestrator.tick(MONDAY_0800);
    await flush();
    const radio = () => orchestrator.status().find((s) => s.name === 'radio');
    expect(radio()?.state.phase).toBe('running');

    createMarker(tasksRoot, 'radio');
    orchestrator.tick(at(MONDAY_0800, 1));
    expect(radio()?.state.phase).toBe('cancel_requested');

    await flush();
    orchestrator.tick(at(MONDAY_0800, 2));
    expect(radio()?.state.phase).toBe('idle');
    expect(radio()?.state.lastOutcome).toEqual({ kind: 'cancelled' });

    const cancel = orchestrator.getEventLog().query({ taskName: 'radio', type: 'cancel_requested' });
    expect(cancel).toHaveLength(1);
    expect(cancel[0].reason).toBe('terminate_marker');
  });

  it('does not start a scheduled task again in the same window', async () => {
    await orchestrator.init();

    orchestrator.tick(MONDAY_0800);
    await flush();
    createMarker(tasksRoot, 'radio');
    orchestrator.tick(at(MONDAY_0800, 1));
    await flush();
    orchestrator.tick(at(MONDAY_0800, 2));
    orchestrator.tick(at(MONDAY_0800, 3));

    expect(orchestrator.getEventLog().query({ taskName: 'radio', type: 'started' })).toHaveLength(1);
  });

  it('publishes task events on an injected bus', async () => {
    const bus = new TaskEventBus();
    const seen: TaskEvent[] = [];
    bus.subscribe((event) => seen.push(event));
    const withBus = new Orchestrator(config, { catalog: createDefaultCatalog(), clock: () => now, events: bus });
    await withBus.init();

    withBus.tick(MONDAY_0700);
    await flush();
    withBus.tick(at(MONDAY_0700, 1));
    await withBus.stop();

    expect(seen.map((e) => [e.taskName, e.type])).toEqual([
      ['hello-world', 'started'],
      ['hello-world', 'stopped'],
    ]);
  });

  it('requires init before ticking', () => {
    expect(() => orchestrator.tick(MONDAY_0700)).toThrow('Orchestrator not initialized. Call init() first.');
  });

  it('fails to start when the tasks root is missing', async () => {
    const missing = new Orchestrator(
      { ...config, tasksRoot: join(testDir, 'nope') },
      { catalog: createDefaultCatalog() },
    );
    await expect(missing.start()).rejects.toBeInstanceOf(DiscoveryError);
  });

  describe('runSingle', () => {
    it('rejects an unknown task', async () => {
      await expect(orchestrator.runSingle('nope')).rejects.toThrow('Task "nope" not found');
    });

    it('rejects a task that was skipped during discovery', async () => {
      await expect(orchestrator.runSingle('broken')).rejects.toThrow('Task "broken" not found');
    });

    it('runs the task at once regardless of its schedule, and only that task', async () => {
      await orchestrator.runSingle('radio');
      await flush();

      const status = orchestrator.status();
      expect(status.map((s) => s.name)).toEqual(['radio']);
      expect(status[0].state.phase).toBe('running');

      await expect(orchestrator.runSingle('radio')).rejects.toThrow('Orchestrator is already running');

      await orchestrator.stop();
      const [stopped] = orchestrator.status();
      expect(stopped.state.phase).toBe('idle');
      expect(stopped.state.lastOutcome).toEqual({ kind: 'cancelled' });
      expect(orchestrator.getEventLog().query({ type: 'cancel_requested' })[0].reason).toBe('shutdown');
    });
  });
});
