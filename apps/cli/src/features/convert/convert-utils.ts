// Pure formatting helpers for the convert commands

import { getCosmosChainByPrefix, type ConversionResult } from '@addrbridge/address-converter';

export type ConvertMode = 'auto' | 'evm' | 'injective';

/**
 * Human-readable label for where an address came from.
 *
 * @example
 * describeSource({ sourceType: 'cosmos', sourceChainPrefix: 'osmo', ... }) // 'Osmosis (osmo)'
 * describeSource({ sourceType: 'cosmos', sourceChainPrefix: 'foo', ... })  // 'Cosmos chain (foo)'
 */
export function describeSource(result: Pick<ConversionResult, 'sourceChainPrefix' | 'sourceType'>): string {
  if (result.sourceType === 'evm') {
    return 'EVM';
  }

  const prefix = result.sourceChainPrefix ?? '';
  const chain = getCosmosChainByPrefix(prefix);
  if (chain) {
    return `${chain.displayName} (${prefix})`;
  }
  return result.sourceType === 'injective' ? `Injective (${prefix})` : `Cosmos chain (${prefix})`;
}

export function formatConversionLines(result: ConversionResult): string[] {
  return [
    `Source:    ${describeSource(result)}`,
    `Injective: ${result.injectiveAddress}`,
    `EVM:       ${result.evmAddress}`,
  ];
}
