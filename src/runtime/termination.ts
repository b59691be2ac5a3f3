// Tasklane Termination Markers - out-of-band stop requests as marker files

import { existsSync, readdirSync, rmSync, writeFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

export const ALL_TASKS_MARKER = 'all';
export const MARKER_SUFFIX = '.terminate';

export interface TerminationSource {
  /** True when a marker targets this task or all tasks. */
  isRequested(taskName: string): boolean;
}

export function markerPath(dir: string, target: string): string {
  return join(dir, `${target}${MARKER_SUFFIX}`);
}

/**
 * Read-only view used by the scheduling loop. The orchestrator never
 * creates or removes markers: whoever writes one must also clear it,
 * or the task is cancelled again on its next run.
 */
export class FileTerminationMarkers implements TerminationSource {
  constructor(private dir: string) {}

  isRequested(taskName: string): boolean {
    return (
      existsSync(markerPath(this.dir, taskName)) ||
      existsSync(markerPath(this.dir, ALL_TASKS_MARKER))
    );
  }
}

// Collaborator side, used by the CLI.

export function createMarker(dir: string, target: string): string {
  mkdirSync(dir, { recursive: true });
  const path = markerPath(dir, target);
  writeFileSync(path, `${new Date().toISOString()}\n`, 'utf-8');
  return path;
}

export function clearMarker(dir: string, target: string): boolean {
  const path = markerPath(dir, target);
  if (!existsSync(path)) return false;
  rmSync(path);
  return true;
}

export function listMarkers(dir: string): string[] {
  let names: string[];
  try {
    names = readdirSync(dir);
  } catch {
    return [];
  }
  return names
    .filter((name) => name.endsWith(MARKER_SUFFIX))
    .map((name) => name.slice(0, -MARKER_SUFFIX.length))
    .sort();
}
