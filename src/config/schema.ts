import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const eventLogConfigSchema = z.object({
  enabled: z.boolean(),
  logPath: z.string().min(1),
});

export const tasklaneConfigSchema = z.object({
  tasksRoot: z.string().min(1),
  markerDir: z.string().min(1).optional(),
  tickIntervalMs: z.number().int().positive(),
  gracePeriodMs: z.number().int().min(0),
  logLevel: logLevelSchema,
  eventLog: eventLogConfigSchema,
});

/** Shape accepted in a config file: any subset of the full config. */
export const tasklaneConfigFileSchema = tasklaneConfigSchema
  .extend({ eventLog: eventLogConfigSchema.partial() })
  .partial();

export type ValidatedConfig = z.infer<typeof tasklaneConfigSchema>;
export type ConfigFileContents = z.infer<typeof tasklaneConfigFileSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

export function validateConfig(data: unknown): {
  success: boolean;
  data?: ValidatedConfig;
  errors?: string[];
} {
  const result = tasklaneConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

export function validateConfigFile(data: unknown): {
  success: boolean;
  data?: ConfigFileContents;
  errors?: string[];
} {
  const result = tasklaneConfigFileSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}
