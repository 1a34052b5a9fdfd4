/**
 * Logging Module
 *
 * All library output goes through this module.
 */

export { default as logger } from './logger.js';
export { createLogger, parseDebugMode, type Logger, type LogLevel } from './configLogger.js';
export { logRequest, logResponse, maskHeaders } from './requestLogger.js';
