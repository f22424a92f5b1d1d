/**
 * @remuxer/core
 * 
 * Shared foundation package containing:
 * - Error taxonomy
 * - External tool binary resolution
 */

// Errors
export {
  RemuxerError,
  ProbeUnavailableError,
  ProbeFailedError,
  ParseError,
  MissingScanlineCountError,
  UnsupportedQualityError,
  TranscodeFailedError,
  ConfigurationError,
  isRemuxerError,
} from './errors/index.js';

// Binary Configuration
export {
  resolveBinaryPath,
  getBinaryFolders,
  type BinaryName,
  type BinarySource,
  type BinaryConfig,
} from './config/binaries.js';
