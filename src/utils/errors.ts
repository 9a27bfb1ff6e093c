export enum MtkResetErrorCode {
  UNSUPPORTED_OS = 'UNSUPPORTED_OS',
  NO_INTERNET = 'NO_INTERNET',
  SUDO_REQUIRED = 'SUDO_REQUIRED',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  COMMAND_FAILED = 'COMMAND_FAILED',
  SETUP_FAILED = 'SETUP_FAILED',
  VERIFY_FAILED = 'VERIFY_FAILED',
  ERASE_FAILED = 'ERASE_FAILED',
  INVALID_CONFIRMATION = 'INVALID_CONFIRMATION',
  TIMEOUT = 'TIMEOUT',
}

export class MtkResetError extends Error {
  readonly code: MtkResetErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: MtkResetErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'MtkResetError';
    this.code = code;
    this.context = context;
  }
}
