export { getLogger, getLogLevel, setLogLevel, formatLabel, type Logger } from './logger.js';
export {
  LOG_LEVELS,
  logLevelSchema,
  loggerEnvSchema,
  validateLoggerEnv,
  type LogLevel,
  type LoggerEnvConfig,
} from './env.schema.js';
