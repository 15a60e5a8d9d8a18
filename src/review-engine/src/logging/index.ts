export { Logger, LogLevel, LOG_LEVELS, createConsoleLogger, silentLogger, isLogLevel } from './Logger';
