import type { TaskEntryPoint } from '../types.js';

export const helloWorldTask: TaskEntryPoint = {
  name: 'hello-world',
  description: 'Logs a greeting and completes',
  async run(_signal, taskConfig, context) {
    const message =
      typeof taskConfig['message'] === 'string'
        ? taskConfig['message']
        : 'Hello world, this is a test routine!';
    context.logger.info(message);
    return { kind: 'completed' };
  },
};
