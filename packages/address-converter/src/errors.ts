export type AddressErrorCode =
  | 'INVALID_EVM_ADDRESS'
  | 'UNRECOGNIZED_FORMAT'
  | 'INVALID_BECH32_FORMAT'
  | 'INVALID_BECH32_CHARSET'
  | 'INVALID_BECH32_CHECKSUM'
  | 'BECH32_LENGTH_EXCEEDED'
  | 'INVALID_BIT_GROUPS'
  | 'PREFIX_MISMATCH'
  | 'INVALID_ADDRESS_LENGTH'
  | 'INVALID_PREFIX'
  | 'EMPTY_BATCH'
  | 'INVALID_BATCH_LIMIT'
  | 'BATCH_TOO_LARGE';

export interface AddressErrorDetails {
  /** Offending value as the caller passed it */
  input?: string | undefined;
  expected?: string | number | undefined;
  actual?: string | number | undefined;
}

/**
 * Every failure of the converter. Callers branch on `code`; `message` is for humans.
 */
export class AddressConversionError extends Error {
  constructor(
    message: string,
    public readonly code: AddressErrorCode,
    public readonly details: AddressErrorDetails = {}
  ) {
    super(message);
    this.name = 'AddressConversionError';
  }

  toJSON(): { code: AddressErrorCode; details: AddressErrorDetails; message: string } {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
    };
  }
}

export function isAddressConversionError(error: unknown): error is AddressConversionError {
  return error instanceof AddressConversionError;
}
