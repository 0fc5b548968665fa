import { bech32 } from 'bech32';
import { err, ok, type Result } from 'neverthrow';

import { AddressConversionError } from '../errors.js';

import { convertBits } from './convert-bits.js';

export const BECH32_CHARSET = 'qpzry9x8gf2tvdw0s3jn54khce6mua7l';
export const BECH32_MAX_LENGTH = 90;
const BECH32_MIN_LENGTH = 8;
const CHECKSUM_LENGTH = 6;
const SEPARATOR = '1';

const PREFIX_PATTERN = /^[a-z]+$/;

export interface DecodedBech32 {
  prefix: string;
  /** 5-bit groups, checksum removed */
  words: number[];
}

/**
 * Prefixes this codec will encode with: one or more lowercase ASCII letters.
 */
export function isValidBech32Prefix(prefix: string): boolean {
  return PREFIX_PATTERN.test(prefix);
}

/**
 * Encode raw bytes under a human-readable prefix.
 *
 * @example
 * encodeBech32('inj', new Uint8Array(20)) // ok('inj1qqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqqe2hm49')
 */
export function encodeBech32(prefix: string, payload: Uint8Array): Result<string, AddressConversionError> {
  if (!isValidBech32Prefix(prefix)) {
    return err(
      new AddressConversionError(
        prefix.length === 0
          ? 'Bech32 prefix must not be empty'
          : `Invalid bech32 prefix '${prefix}': only lowercase letters a-z are allowed`,
        'INVALID_PREFIX',
        { input: prefix }
      )
    );
  }

  return convertBits(payload, 8, 5, true).andThen((words) => {
    const length = prefix.length + SEPARATOR.length + words.length + CHECKSUM_LENGTH;
    if (length > BECH32_MAX_LENGTH) {
      return err(
        new AddressConversionError(
          `Encoded address would be ${String(length)} characters, limit is ${String(BECH32_MAX_LENGTH)}`,
          'BECH32_LENGTH_EXCEEDED',
          { expected: BECH32_MAX_LENGTH, actual: length }
        )
      );
    }
    return ok(bech32.encode(prefix, words, BECH32_MAX_LENGTH));
  });
}

/**
 * Decode a bech32 string into its prefix and 5-bit data groups.
 * Structural problems are reported before the checksum is verified.
 */
export function decodeBech32(
  address: string,
  limit: number = BECH32_MAX_LENGTH
): Result<DecodedBech32, AddressConversionError> {
  if (address.length < BECH32_MIN_LENGTH || address.length > limit) {
    return err(
      new AddressConversionError(
        `Invalid bech32 length ${String(address.length)} for '${address}': expected ${String(BECH32_MIN_LENGTH)} to ${String(limit)} characters`,
        'INVALID_BECH32_FORMAT',
        { input: address, actual: address.length }
      )
    );
  }

  for (const char of address) {
    const code = char.charCodeAt(0);
    if (code < 33 || code > 126) {
      return err(
        new AddressConversionError(
          `Invalid character ${JSON.stringify(char)} in bech32 address '${address}'`,
          'INVALID_BECH32_CHARSET',
          { input: address, actual: char }
        )
      );
    }
  }

  const lowered = address.toLowerCase();
  if (address !== lowered && address !== address.toUpperCase()) {
    return err(
      new AddressConversionError(`Mixed-case bech32 address '${address}'`, 'INVALID_BECH32_FORMAT', {
        input: address,
      })
    );
  }

  const separatorIndex = lowered.lastIndexOf(SEPARATOR);
  if (separatorIndex === -1) {
    return err(
      new AddressConversionError(`No separator '1' in bech32 address '${address}'`, 'INVALID_BECH32_FORMAT', {
        input: address,
      })
    );
  }
  if (separatorIndex === 0) {
    return err(
      new AddressConversionError(`Missing prefix in bech32 address '${address}'`, 'INVALID_BECH32_FORMAT', {
        input: address,
      })
    );
  }

  const dataPart = lowered.slice(separatorIndex + 1);
  if (dataPart.length < CHECKSUM_LENGTH) {
    return err(
      new AddressConversionError(`Data part too short in bech32 address '${address}'`, 'INVALID_BECH32_FORMAT', {
        input: address,
      })
    );
  }

  for (const char of dataPart) {
    if (!BECH32_CHARSET.includes(char)) {
      return err(
        new AddressConversionError(
          `Invalid bech32 character '${char}' in address '${address}'`,
          'INVALID_BECH32_CHARSET',
          { input: address, actual: char }
        )
      );
    }
  }

  // Everything but the checksum has been checked, so a failed decode is a checksum failure.
  const decoded = bech32.decodeUnsafe(lowered, limit);
  if (!decoded) {
    return err(
      new AddressConversionError(`Invalid bech32 checksum for '${address}'`, 'INVALID_BECH32_CHECKSUM', {
        input: address,
      })
    );
  }

  return ok({ prefix: decoded.prefix, words: decoded.words });
}
