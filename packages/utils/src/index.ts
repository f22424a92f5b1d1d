/**
 * @remuxer/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export { ensureDir, safeWriteFile, writeJsonFile } from './file.js';

// Path utilities
export { getBasename } from './path.js';

// Logger
export { logger, createLogger, createRootLogger, type Logger, type LoggerSettings } from './logger.js';
