export enum ProcessingErrorCode {
  UNREADABLE_INPUT = 'UNREADABLE_INPUT',
  INVALID_CONFIG = 'INVALID_CONFIG',
  PROCESSING_FAILED = 'PROCESSING_FAILED'
}

export type ErrorMessage = {
  code: ProcessingErrorCode;
  message: string;
  field?: string;
};

export class ProcessingError extends Error {
  public readonly code: ProcessingErrorCode;
  public readonly recoverable: boolean;

  constructor(message: string, code: ProcessingErrorCode, recoverable = false) {
    super(message);
    this.name = 'ProcessingError';
    this.code = code;
    this.recoverable = recoverable;
  }
}

export class ConfigValidationError extends ProcessingError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid configuration value for "${field}": ${message}`, ProcessingErrorCode.INVALID_CONFIG);
    this.name = 'ConfigValidationError';
    this.field = field;
  }
}

const DEFAULT_MESSAGES: Record<ProcessingErrorCode, string> = {
  [ProcessingErrorCode.UNREADABLE_INPUT]: 'The image could not be decoded.',
  [ProcessingErrorCode.INVALID_CONFIG]: 'The processing configuration is invalid.',
  [ProcessingErrorCode.PROCESSING_FAILED]: 'Failed to process the image.'
};

export function formatErrorMessage(error: unknown): ErrorMessage {
  if (error instanceof ConfigValidationError) {
    return { code: error.code, message: error.message, field: error.field };
  }

  if (error instanceof ProcessingError) {
    return { code: error.code, message: error.message || DEFAULT_MESSAGES[error.code] };
  }

  if (error instanceof Error) {
    return {
      code: ProcessingErrorCode.PROCESSING_FAILED,
      message: error.message || DEFAULT_MESSAGES[ProcessingErrorCode.PROCESSING_FAILED]
    };
  }

  return {
    code: ProcessingErrorCode.PROCESSING_FAILED,
    message: DEFAULT_MESSAGES[ProcessingErrorCode.PROCESSING_FAILED]
  };
}

export function httpStatusFor(error: unknown) {
  if (error instanceof ProcessingError && error.code !== ProcessingErrorCode.PROCESSING_FAILED) {
    return 400;
  }
  return 500;
}
