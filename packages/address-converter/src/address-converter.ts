import { err, ok, type Result } from 'neverthrow';

import { detectAddressType, EVM_ADDRESS_PATTERN } from './address-detection.js';
import { convertBits } from './bech32/convert-bits.js';
import { decodeBech32, encodeBech32, isValidBech32Prefix } from './bech32/codec.js';
import { AddressConversionError } from './errors.js';
import {
  ADDRESS_BYTE_LENGTH,
  DEFAULT_TARGET_PREFIX,
  type CanonicalAddress,
  type ConversionResult,
  type ConverterOptions,
} from './types.js';

function resolveTargetPrefix(options: ConverterOptions): string {
  return options.targetPrefix ?? DEFAULT_TARGET_PREFIX;
}

function invalidEvmAddress(address: string): AddressConversionError {
  return new AddressConversionError(
    `Invalid EVM address: '${address}'. Must be 0x followed by 40 hex characters.`,
    'INVALID_EVM_ADDRESS',
    { input: address }
  );
}

/**
 * Parse an EVM hex address (any case) into its 20 bytes.
 */
export function parseEvmAddress(address: string): Result<CanonicalAddress, AddressConversionError> {
  if (!EVM_ADDRESS_PATTERN.test(address)) {
    return err(invalidEvmAddress(address));
  }
  return ok(new Uint8Array(Buffer.from(address.slice(2), 'hex')));
}

export function formatEvmAddress(bytes: CanonicalAddress): string {
  return `0x${Buffer.from(bytes).toString('hex')}`;
}

/**
 * Decode a bech32 address to its 20 raw bytes.
 * The prefix is compared only after the checksum has been verified.
 */
export function decodeBech32Address(
  address: string,
  expectedPrefix?: string
): Result<CanonicalAddress, AddressConversionError> {
  return decodeBech32(address).andThen(({ prefix, words }) => {
    if (expectedPrefix !== undefined && prefix !== expectedPrefix) {
      return err(
        new AddressConversionError(
          `Expected prefix '${expectedPrefix}', got '${prefix}' in address '${address}'`,
          'PREFIX_MISMATCH',
          { input: address, expected: expectedPrefix, actual: prefix }
        )
      );
    }

    return convertBits(words, 5, 8, false)
      .mapErr(
        (error) =>
          new AddressConversionError(`Failed to decode bech32 data for address '${address}': ${error.message}`, error.code, {
            input: address,
          })
      )
      .andThen((bytes) => {
        if (bytes.length !== ADDRESS_BYTE_LENGTH) {
          return err(
            new AddressConversionError(
              `Invalid address length: expected ${String(ADDRESS_BYTE_LENGTH)} bytes, got ${String(bytes.length)} for '${address}'`,
              'INVALID_ADDRESS_LENGTH',
              { input: address, expected: ADDRESS_BYTE_LENGTH, actual: bytes.length }
            )
          );
        }
        return ok(new Uint8Array(bytes));
      });
  });
}

/**
 * Reduce an EVM or bech32 address (any prefix) to its 20 raw bytes.
 */
export function toCanonicalAddress(
  address: string,
  expectedPrefix?: string
): Result<CanonicalAddress, AddressConversionError> {
  if (address.startsWith('0x') || address.startsWith('0X')) {
    return parseEvmAddress(address);
  }
  return decodeBech32Address(address, expectedPrefix);
}

/**
 * EVM hex (0x...) → target bech32 (inj1...).
 */
export function evmToTarget(hexAddress: string, options: ConverterOptions = {}): Result<string, AddressConversionError> {
  return parseEvmAddress(hexAddress).andThen((bytes) => encodeBech32(resolveTargetPrefix(options), bytes));
}

/**
 * Target bech32 (inj1...) → lowercase EVM hex (0x...).
 */
export function targetToEvm(address: string, options: ConverterOptions = {}): Result<string, AddressConversionError> {
  return decodeBech32Address(address, resolveTargetPrefix(options)).map(formatEvmAddress);
}

/**
 * Any bech32 address (cosmos1..., osmo1..., ...) → the same account under the target prefix.
 */
export function foreignToTarget(
  address: string,
  options: ConverterOptions = {}
): Result<string, AddressConversionError> {
  return decodeBech32Address(address).andThen((bytes) => encodeBech32(resolveTargetPrefix(options), bytes));
}

/**
 * Target bech32 address → the same account under another chain's prefix.
 */
export function targetToForeign(
  address: string,
  foreignPrefix: string,
  options: ConverterOptions = {}
): Result<string, AddressConversionError> {
  if (!isValidBech32Prefix(foreignPrefix)) {
    return err(
      new AddressConversionError(
        `Failed to encode with prefix '${foreignPrefix}': prefix must be one or more lowercase letters`,
        'INVALID_PREFIX',
        { input: foreignPrefix }
      )
    );
  }

  return decodeBech32Address(address, resolveTargetPrefix(options)).andThen((bytes) =>
    encodeBech32(foreignPrefix, bytes)
  );
}

/**
 * Auto-detect the input format and produce both the target and EVM forms.
 *
 * Foreign bech32 input is decoded once; both outputs come from the same bytes.
 */
export function convertAddress(
  address: string,
  options: ConverterOptions = {}
): Result<ConversionResult, AddressConversionError> {
  const targetPrefix = resolveTargetPrefix(options);

  return detectAddressType(address, { targetPrefix }).andThen((detected) => {
    switch (detected.sourceType) {
      case 'evm':
        return convertFromEvm(address, { targetPrefix });
      case 'injective':
        return convertFromTarget(address, { targetPrefix });
      case 'cosmos':
        return decodeBech32Address(address).andThen((bytes) =>
          encodeBech32(targetPrefix, bytes).map(
            (injectiveAddress): ConversionResult => ({
              input: address,
              injectiveAddress,
              evmAddress: formatEvmAddress(bytes),
              sourceType: 'cosmos',
              sourceChainPrefix: detected.chainPrefix,
            })
          )
        );
    }
  });
}

/**
 * Convert an address the caller asserts is EVM hex.
 * Fails with INVALID_EVM_ADDRESS rather than UNRECOGNIZED_FORMAT.
 */
export function convertFromEvm(
  address: string,
  options: ConverterOptions = {}
): Result<ConversionResult, AddressConversionError> {
  return evmToTarget(address, options).map(
    (injectiveAddress): ConversionResult => ({
      input: address,
      injectiveAddress,
      evmAddress: address.toLowerCase(),
      sourceType: 'evm',
      sourceChainPrefix: undefined,
    })
  );
}

/**
 * Convert an address the caller asserts uses the target prefix.
 */
export function convertFromTarget(
  address: string,
  options: ConverterOptions = {}
): Result<ConversionResult, AddressConversionError> {
  const targetPrefix = resolveTargetPrefix(options);

  return decodeBech32Address(address, targetPrefix).andThen((bytes) =>
    encodeBech32(targetPrefix, bytes).map(
      (injectiveAddress): ConversionResult => ({
        input: address,
        injectiveAddress,
        evmAddress: formatEvmAddress(bytes),
        sourceType: 'injective',
        sourceChainPrefix: targetPrefix,
      })
    )
  );
}
