/**
 * Logging utilities for the game engine
 * @module utils/logging
 */

export { Logger, logger, type LogContext, type LogLevel } from './logger.js';
