/**
 * Custom Error Classes
 */

/**
 * Base error class for all remuxer errors
 */
export class RemuxerError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RemuxerError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Input file could not be read before ffprobe was invoked
 */
export class ProbeUnavailableError extends RemuxerError {
  constructor(filePath: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : 'unknown error';
    super(
      `Cannot read input file ${filePath}: ${reason}`,
      'PROBE_UNAVAILABLE',
      66,
      { filePath },
      { cause }
    );
    this.name = 'ProbeUnavailableError';
  }
}

/**
 * ffprobe exited with a non-zero status
 */
export class ProbeFailedError extends RemuxerError {
  constructor(filePath: string, exitCode: number, stderr: string) {
    super(
      `ffprobe failed on ${filePath} with exit code ${exitCode}`,
      'PROBE_FAILED',
      65,
      { filePath, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'ProbeFailedError';
  }
}

/**
 * ffprobe output is missing a mandatory field or carries an unparsable value
 */
export class ParseError extends RemuxerError {
  constructor(field: string, line: string, message?: string) {
    super(
      message ?? `Missing ${field} in probe line: ${line}`,
      'PARSE_ERROR',
      65,
      { field, line }
    );
    this.name = 'ParseError';
  }
}

/**
 * A video track reports no coded height, so it cannot be given a quality
 */
export class MissingScanlineCountError extends RemuxerError {
  constructor(trackIndex: number) {
    super(
      `Video track ${trackIndex} has no coded height`,
      'MISSING_SCANLINE_COUNT',
      65,
      { trackIndex }
    );
    this.name = 'MissingScanlineCountError';
  }
}

/**
 * Coded height is not one of the accepted quality tiers (strict mode)
 */
export class UnsupportedQualityError extends RemuxerError {
  constructor(trackIndex: number, height: number, accepted: readonly number[]) {
    super(
      `Video track ${trackIndex} has height ${height}, expected one of ${accepted.join(', ')}`,
      'UNSUPPORTED_QUALITY',
      65,
      { trackIndex, height, accepted: [...accepted] }
    );
    this.name = 'UnsupportedQualityError';
  }
}

/**
 * ffmpeg exited with a non-zero status or timed out
 */
export class TranscodeFailedError extends RemuxerError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string,
    timedOut: boolean = false
  ) {
    super(
      timedOut
        ? 'ffmpeg timed out'
        : `ffmpeg failed with exit code ${exitCode}`,
      'TRANSCODE_FAILED',
      70,
      { command, exitCode, timedOut, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'TranscodeFailedError';
  }
}

/**
 * Invalid environment or command-line configuration
 */
export class ConfigurationError extends RemuxerError {
  constructor(field: string, message: string) {
    super(
      `Invalid configuration for ${field}: ${message}`,
      'CONFIGURATION_ERROR',
      78,
      { field, message }
    );
    this.name = 'ConfigurationError';
  }
}

export function isRemuxerError(error: unknown): error is RemuxerError {
  return error instanceof RemuxerError;
}
