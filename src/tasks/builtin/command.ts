// Tasklane Command Task - runs an external program as the task body

import { spawn } from 'node:child_process';
import { z } from 'zod';
import type { RunOutcome } from '../../core/types.js';
import type { TaskEntryPoint } from '../types.js';

const commandConfigSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  env: z.record(z.string()).optional(),
  killSignal: z.enum(['SIGTERM', 'SIGINT', 'SIGHUP', 'SIGKILL']).default('SIGTERM'),
});

function forwardLines(chunk: Buffer, log: (line: string) => void): void {
  for (const line of chunk.toString('utf-8').split('\n')) {
    if (line.trim().length > 0) log(line);
  }
}

/**
 * The child process is the task's own resource, so stopping it on cancel
 * is the task's cleanup, not a forced kill by the orchestrator.
 */
export const commandTask: TaskEntryPoint = {
  name: 'command',
  description: 'Spawns taskConfig.command and stops it when cancelled',
  run(signal, taskConfig, context) {
    const parsed = commandConfigSchema.safeParse(taskConfig);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      return Promise.resolve<RunOutcome>({ kind: 'failed', reason: `invalid command config: ${reason}` });
    }
    const config = parsed.data;

    return new Promise<RunOutcome>((resolve) => {
      let settled = false;
      const finish = (outcome: RunOutcome): void => {
        if (settled) return;
        settled = true;
        resolve(outcome);
      };

      const child = spawn(config.command, config.args, {
        cwd: config.cwd ?? context.taskDir,
        env: { ...process.env, ...config.env },
        stdio: ['ignore', 'pipe', 'pipe'],
        signal,
        killSignal: config.killSignal,
      });

      child.stdout?.on('data', (chunk: Buffer) => forwardLines(chunk, (line) => context.logger.info(line)));
      child.stderr?.on('data', (chunk: Buffer) => forwardLines(chunk, (line) => context.logger.warn(line)));

      child.on('error', (err) => {
        // Abort is reported here first; the exit arrives on 'close'
        if (err.name === 'AbortError') return;
        finish({ kind: 'failed', reason: err.message });
      });

      child.on('close', (code, exitSignal) => {
        if (signal.aborted) {
          finish({ kind: 'cancelled' });
        } else if (code === 0) {
          finish({ kind: 'completed' });
        } else if (code !== null) {
          finish({ kind: 'failed', reason: `exited with code ${code}` });
        } else {
          finish({ kind: 'failed', reason: `killed by ${exitSignal ?? 'unknown signal'}` });
        }
      });
    });
  },
};
