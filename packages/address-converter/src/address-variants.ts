import { err, ok, type Result } from 'neverthrow';

import { formatEvmAddress, toCanonicalAddress } from './address-converter.js';
import { encodeBech32 } from './bech32/codec.js';
import type { AddressConversionError } from './errors.js';

/**
 * The same account under several bech32 prefixes.
 *
 * The input comes first (as given), followed by one entry per prefix;
 * duplicates are removed, ignoring case. EVM input is accepted and kept as-is in first place.
 *
 * @example
 * deriveAddressVariants('inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqku', ['inj', 'osmo'])
 * // ok(['inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqku', 'osmo14au322k9munkmx5wrchz9q30juf5wjgzg2d5jk'])
 */
export function deriveAddressVariants(
  address: string,
  prefixes: readonly string[]
): Result<string[], AddressConversionError> {
  return toCanonicalAddress(address).andThen((bytes) => {
    const variants: string[] = [address];
    for (const prefix of prefixes) {
      const encoded = encodeBech32(prefix, bytes);
      if (encoded.isErr()) {
        return err(encoded.error);
      }
      // Encoded variants are lowercase; an all-uppercase bech32 input is the same string.
      if (!variants.some((variant) => variant.toLowerCase() === encoded.value)) {
        variants.push(encoded.value);
      }
    }
    return ok(variants);
  });
}

/**
 * Whether two addresses (EVM hex or bech32 under any prefix) identify the same account.
 * Invalid input on either side compares unequal.
 *
 * @example
 * isSameAccount('inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqku', '0xaf79152ac5df276d9a8e1e2e22822f9713474902') // true
 */
export function isSameAccount(first: string, second: string): boolean {
  const a = toCanonicalAddress(first);
  const b = toCanonicalAddress(second);
  if (a.isErr() || b.isErr()) {
    return false;
  }
  return formatEvmAddress(a.value) === formatEvmAddress(b.value);
}
