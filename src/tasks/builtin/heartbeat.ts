// Tasklane Heartbeat Task - logs a counter until told to stop

import { z } from 'zod';
import type { TaskEntryPoint } from '../types.js';
import { waitOrAbort } from './wait.js';

const heartbeatConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(1000),
  /** Complete on its own after this many beats. Runs until cancelled when omitted. */
  maxBeats: z.number().int().positive().optional(),
});

export const heartbeatTask: TaskEntryPoint = {
  name: 'heartbeat',
  description: 'Logs a counter every interval until cancelled; used to check termination',
  async run(signal, taskConfig, context) {
    const parsed = heartbeatConfigSchema.safeParse(taskConfig);
    if (!parsed.success) {
      return { kind: 'failed', reason: parsed.error.issues.map((i) => i.message).join('; ') };
    }
    const { intervalMs, maxBeats } = parsed.data;

    let beats = 0;
    while (!signal.aborted) {
      beats++;
      context.logger.info(`beat ${beats}`);
      if (maxBeats !== undefined && beats >= maxBeats) {
        return { kind: 'completed' };
      }
      await waitOrAbort(intervalMs, signal);
    }

    context.logger.info(`stop requested after ${beats} beats`);
    return { kind: 'cancelled' };
  },
};
