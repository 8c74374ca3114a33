import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export const logLevelSchema = z.enum(LOG_LEVELS);

export type LogLevel = z.infer<typeof logLevelSchema>;

// Define environment schema
export const loggerEnvSchema = z.object({
  LOGGER_CONSOLE_ENABLED: z
    .string()
    .default('true')
    .transform((val: string) => val === 'true'),
  LOGGER_LOG_LEVEL: z.string().trim().toLowerCase().default('info').pipe(logLevelSchema),
  LOGGER_SERVICE_NAME: z.string().default('tapeval'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

// Infer TypeScript type from schema
export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

// Function to validate environment variables
export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  return loggerEnvSchema.parse(env);
}
