import { err, ok, type Result } from 'neverthrow';

import { AddressConversionError } from './errors.js';
import { DEFAULT_TARGET_PREFIX, type AddressFormat, type ConverterOptions, type DetectedAddress } from './types.js';

export const EVM_ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

// Loose shape check only. A 20-byte payload under a short prefix is 38 data
// characters plus checksum; exact validation happens when the address is decoded.
export const BECH32_ADDRESS_PATTERN = /^[a-z]+1[a-z0-9]{38,}$/;

export function isEvmAddress(address: string): boolean {
  return EVM_ADDRESS_PATTERN.test(address);
}

/**
 * Classify an address string by shape. EVM is tested first.
 */
export function detectAddressFormat(address: string): Result<AddressFormat, AddressConversionError> {
  if (EVM_ADDRESS_PATTERN.test(address)) {
    return ok({ type: 'evm' });
  }

  if (BECH32_ADDRESS_PATTERN.test(address)) {
    return ok({ type: 'bech32', prefix: address.slice(0, address.indexOf('1')) });
  }

  return err(
    new AddressConversionError(
      `Unrecognised address format: '${address}'. Expected a 0x hex address or a bech32 address (e.g. inj1..., cosmos1..., osmo1...).`,
      'UNRECOGNIZED_FORMAT',
      { input: address }
    )
  );
}

/**
 * Detect the source of an address: EVM, the target chain, or another Cosmos chain.
 *
 * @example
 * detectAddressType('0xAF79152AC5dF276D9A8e1E2E22822f9713474902') // ok({ sourceType: 'evm', chainPrefix: undefined })
 * detectAddressType('osmo14au322k9munkmx5wrchz9q30juf5wjgzg2d5jk') // ok({ sourceType: 'cosmos', chainPrefix: 'osmo' })
 */
export function detectAddressType(
  address: string,
  options: ConverterOptions = {}
): Result<DetectedAddress, AddressConversionError> {
  const targetPrefix = options.targetPrefix ?? DEFAULT_TARGET_PREFIX;

  return detectAddressFormat(address).map((format): DetectedAddress => {
    switch (format.type) {
      case 'evm':
        return { sourceType: 'evm', chainPrefix: undefined };
      case 'bech32':
        return format.prefix === targetPrefix
          ? { sourceType: 'injective', chainPrefix: format.prefix }
          : { sourceType: 'cosmos', chainPrefix: format.prefix };
    }
  });
}
