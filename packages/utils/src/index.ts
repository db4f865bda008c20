/**
 * @debslice/utils
 * 
 * Shared utilities package containing:
 * - File operations (gzip indices, copy, symlink, search)
 * - Logger
 */

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  pathExists,
  readGzipFile,
  writeGzipFile,
  copyFile,
  symlinkRelative,
  findFiles,
} from './file.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
