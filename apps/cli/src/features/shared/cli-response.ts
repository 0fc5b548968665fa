import { isAddressConversionError } from '@addrbridge/address-converter';
import { isDevelopment } from '@addrbridge/env';

/**
 * JSON envelope written to stdout in --json mode.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  data?: T | undefined;
  error?:
    | {
        /** Exit-level code, e.g. VALIDATION_ERROR */
        code: string;
        /** Converter error kind, e.g. PREFIX_MISMATCH */
        reason?: string | undefined;
        details?: unknown;
        message: string;
        stack?: string | undefined;
      }
    | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: Record<string, unknown>): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(command: string, error: Error, code: string): CLIResponse<never> {
  const errorObj: NonNullable<CLIResponse['error']> = {
    code,
    message: error.message,
  };

  if (isAddressConversionError(error)) {
    errorObj.reason = error.code;
    errorObj.details = error.details;
  }

  if (isDevelopment() && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}
