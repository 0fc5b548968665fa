// Imperative shell for the to-prefix and variants commands

import {
  deriveAddressVariants,
  getCommonCosmosPrefixes,
  targetToForeign,
  type AddressConversionError,
} from '@addrbridge/address-converter';
import type { Result } from 'neverthrow';

export interface ToPrefixResult {
  input: string;
  prefix: string;
  address: string;
}

export interface VariantsResult {
  input: string;
  variants: string[];
}

export class VariantsHandler {
  constructor(private readonly targetPrefix: string) {}

  /**
   * Re-encode a target-prefixed address under another chain's prefix.
   */
  toPrefix(address: string, prefix: string): Result<ToPrefixResult, AddressConversionError> {
    return targetToForeign(address, prefix, { targetPrefix: this.targetPrefix }).map((encoded) => ({
      input: address,
      prefix,
      address: encoded,
    }));
  }

  /**
   * Without explicit prefixes, the target prefix and every registered chain are used.
   */
  variants(address: string, prefixes?: string[]): Result<VariantsResult, AddressConversionError> {
    const selected = prefixes ?? [this.targetPrefix, ...getCommonCosmosPrefixes()];
    return deriveAddressVariants(address, selected).map((variants) => ({ input: address, variants }));
  }
}
