import { isAddressConversionError } from '@addrbridge/address-converter';

import { ExitCodes, type ExitCode } from './exit-codes.js';

/**
 * Batch size violations are argument errors; every other converter failure is a validation error.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (!isAddressConversionError(error)) {
    return ExitCodes.GENERAL_ERROR;
  }

  switch (error.code) {
    case 'EMPTY_BATCH':
    case 'INVALID_BATCH_LIMIT':
    case 'BATCH_TOO_LARGE':
      return ExitCodes.INVALID_ARGS;
    default:
      return ExitCodes.VALIDATION_ERROR;
  }
}
