export { formatLabel, getLogger, getLoggerTransports, setLoggerTransports, type Logger } from './pino-logger.js';
export { logLevels, loggerEnvSchema, validateLoggerEnv, type LogLevel, type LoggerEnvConfig } from './env.schema.js';
