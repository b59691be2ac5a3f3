import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  ALL_TASKS_MARKER,
  FileTerminationMarkers,
  clearMarker,
  createMarker,
  listMarkers,
  markerPath,
} from '../src/runtime/termination.js';

describe('termination markers', () => {
  let dir: string;

  beforeEach(() => {
    dir = join(tmpdir(), 'tasklane-markers-test-' + Date.now() + '-' + Math.random().toString(36).slice(2));
    mkdirSync(dir, { recursive: true });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('names marker files after their target', () => {
    expect(markerPath('/srv/tasks', 'radio')).toBe(join('/srv/tasks', 'radio.terminate'));
  });

  it('reports nothing when no marker exists', () => {
    expect(new FileTerminationMarkers(dir).isRequested('radio')).toBe(false);
  });

  it('sees a marker for the task itself', () => {
    createMarker(dir, 'radio');
    const markers = new FileTerminationMarkers(dir);
    expect(markers.isRequested('radio')).toBe(true);
    expect(markers.isRequested('heartbeat')).toBe(false);
  });

  it('treats the all marker as targeting every task', () => {
    createMarker(dir, ALL_TASKS_MARKER);
    const markers = new FileTerminationMarkers(dir);
    expect(markers.isRequested('radio')).toBe(true);
    expect(markers.isRequested('heartbeat')).toBe(true);
  });

  it('leaves markers in place after reading them', () => {
    createMarker(dir, 'radio');
    const markers = new FileTerminationMarkers(dir);
    markers.isRequested('radio');
    expect(markers.isRequested('radio')).toBe(true);
    expect(existsSync(markerPath(dir, 'radio'))).toBe(true);
  });

  it('tolerates a marker directory that does not exist', () => {
    expect(new FileTerminationMarkers(join(dir, 'missing')).isRequested('radio')).toBe(false);
  });

  it('creates the directory and writes a timestamp', () => {
    const nested = join(dir, 'markers');
    const path = createMarker(nested, 'radio');
    expect(path).toBe(join(nested, 'radio.terminate'));
    expect(Number.isNaN(Date.parse(readFileSync(path, 'utf-8').trim()))).toBe(false);
  });

  it('clears a marker and reports whether one existed', () => {
    createMarker(dir, 'radio');
    expect(clearMarker(dir, 'radio')).toBe(true);
    expect(clearMarker(dir, 'radio')).toBe(false);
    expect(new FileTerminationMarkers(dir).isRequested('radio')).toBe(false);
  });

  it('lists pending markers sorted by target', () => {
    createMarker(dir, 'radio');
    createMarker(dir, ALL_TASKS_MARKER);
    expect(listMarkers(dir)).toEqual(['all', 'radio']);
    expect(listMarkers(join(dir, 'missing'))).toEqual([]);
  });
});
