export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export { setComponentLevel, resetDebugRegistry } from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport } from './transports.js';
export type { LogTransport } from './transports.js';
