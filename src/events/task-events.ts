// Tasklane Task Events - phase transitions published by task runners

import { EventEmitter } from 'node:events';
import type { CancelReason, RunOutcome } from '../core/types.js';

export type TaskEventType =
  | 'started'
  | 'cancel_requested'
  | 'stopped'
  | 'failed'
  | 'ungraceful_stop';

export interface TaskEvent {
  timestamp: number;
  taskName: string;
  runId: string;
  type: TaskEventType;
  reason?: CancelReason;
  outcome?: RunOutcome;
  durationMs?: number;
  error?: string;
}

export type TaskEventListener = (event: TaskEvent) => void;

export class TaskEventBus extends EventEmitter {
  publish(event: TaskEvent): void {
    this.emit(`task:${event.type}`, event);
    this.emit('task:event', event);
  }

  subscribe(listener: TaskEventListener): () => void {
    this.on('task:event', listener);
    return () => {
      this.off('task:event', listener);
    };
  }
}
