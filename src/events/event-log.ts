// Tasklane Event Log - append-only JSONL record of task phase transitions

import { appendFileSync, readFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { EventLogConfig } from '../core/types.js';
import type { TaskEvent, TaskEventType } from './task-events.js';

export interface EventQueryFilter {
  taskName?: string;
  type?: TaskEventType;
  from?: number;
  to?: number;
}

export interface EventSummary {
  total: number;
  byTask: Record<string, number>;
  byType: Record<string, number>;
  failures: number;
  ungracefulStops: number;
}

export class TaskEventLog {
  private logPath: string;
  private config: EventLogConfig;

  constructor(config: EventLogConfig) {
    this.config = config;
    this.logPath = config.logPath;

    if (config.enabled) {
      mkdirSync(dirname(this.logPath), { recursive: true });
    }
  }

  append(event: TaskEvent): void {
    if (!this.config.enabled) return;

    const line = JSON.stringify(event) + '\n';
    appendFileSync(this.logPath, line, 'utf-8');
  }

  query(filter: EventQueryFilter = {}): TaskEvent[] {
    return this.readEntries().filter((event) => {
      if (filter.taskName && event.taskName !== filter.taskName) return false;
      if (filter.type && event.type !== filter.type) return false;
      if (filter.from && event.timestamp < filter.from) return false;
      if (filter.to && event.timestamp > filter.to) return false;
      return true;
    });
  }

  recent(limit = 20, filter: EventQueryFilter = {}): TaskEvent[] {
    return this.query(filter).slice(-limit);
  }

  getSummary(): EventSummary {
    const summary: EventSummary = {
      total: 0,
      byTask: {},
      byType: {},
      failures: 0,
      ungracefulStops: 0,
    };

    for (const event of this.readEntries()) {
      summary.total++;
      summary.byTask[event.taskName] = (summary.byTask[event.taskName] ?? 0) + 1;
      summary.byType[event.type] = (summary.byType[event.type] ?? 0) + 1;
      if (event.type === 'failed') summary.failures++;
      if (event.type === 'ungraceful_stop') summary.ungracefulStops++;
    }

    return summary;
  }

  private readEntries(): TaskEvent[] {
    let content: string;
    try {
      content = readFileSync(this.logPath, 'utf-8');
    } catch {
      return [];
    }

    return content
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => {
        try {
          return JSON.parse(line) as TaskEvent;
        } catch {
          return null;
        }
      })
      .filter((entry): entry is TaskEvent => entry !== null);
  }
}

/** Human-readable lines for the CLI `logs --summary` view. */
export function formatEventSummary(summary: EventSummary): string[] {
  const lines = [
    `Total events: ${summary.total}`,
    `Failures: ${summary.failures}`,
    `Ungraceful stops: ${summary.ungracefulStops}`,
  ];
  const tasks = Object.keys(summary.byTask).sort();
  if (tasks.length > 0) {
    lines.push('By task:');
    for (const task of tasks) {
      lines.push(`  ${task}: ${summary.byTask[task]}`);
    }
  }
  const types = Object.keys(summary.byType).sort();
  if (types.length > 0) {
    lines.push('By event:');
    for (const type of types) {
      lines.push(`  ${type}: ${summary.byType[type]}`);
    }
  }
  return lines;
}
