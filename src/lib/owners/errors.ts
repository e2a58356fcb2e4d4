/**
 * Error taxonomy for OWNERS processing
 *
 * Missing and malformed data are recoverable and end up as warnings;
 * consistency errors abort the run.
 */

export const OwnersErrorCode = {
  OWNERS_MISSING_DATA: 'OWNERS_MISSING_DATA',
  OWNERS_MALFORMED_DATA: 'OWNERS_MALFORMED_DATA',
  OWNERS_CONSISTENCY: 'OWNERS_CONSISTENCY',
  OWNERS_MISSING_ALL: 'OWNERS_MISSING_ALL',
  OWNERS_NO_CONSENSUS: 'OWNERS_NO_CONSENSUS',
  OWNERS_NO_SUBPROJECTS: 'OWNERS_NO_SUBPROJECTS',
  OWNERS_CONFIG: 'OWNERS_CONFIG',
  OWNERS_WALK_ERROR: 'OWNERS_WALK_ERROR',
  OWNERS_WRITE_ERROR: 'OWNERS_WRITE_ERROR',
} as const;

export type OwnersErrorCode = (typeof OwnersErrorCode)[keyof typeof OwnersErrorCode];

/**
 * Base class for every error raised by the library
 */
export class OwnersReportError extends Error {
  readonly code: OwnersErrorCode;
  readonly path?: string;

  constructor(code: OwnersErrorCode, message: string, path?: string) {
    super(message);
    this.name = 'OwnersReportError';
    this.code = code;
    this.path = path;
  }
}

/**
 * A referenced OWNERS or OWNERS_ALIASES file could not be read or fetched
 */
export class MissingDataError extends OwnersReportError {
  constructor(path: string, detail?: string) {
    super(OwnersErrorCode.OWNERS_MISSING_DATA, detail ? `${path} is missing: ${detail}` : `${path} is missing`, path);
    this.name = 'MissingDataError';
  }
}

/**
 * A file parsed but does not have the expected shape
 */
export class MalformedDataError extends OwnersReportError {
  constructor(path: string, detail: string) {
    super(OwnersErrorCode.OWNERS_MALFORMED_DATA, `${path} is malformed: ${detail}`, path);
    this.name = 'MalformedDataError';
  }
}

/**
 * The declared ownership graph contradicts itself
 */
export class ConsistencyError extends OwnersReportError {
  constructor(message: string, path?: string) {
    super(OwnersErrorCode.OWNERS_CONSISTENCY, message, path);
    this.name = 'ConsistencyError';
  }
}

/**
 * Invalid configuration file
 */
export class ConfigError extends OwnersReportError {
  constructor(message: string, path?: string) {
    super(OwnersErrorCode.OWNERS_CONFIG, message, path);
    this.name = 'ConfigError';
  }
}

/**
 * Turn any thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
