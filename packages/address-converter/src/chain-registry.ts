import { z } from 'zod';

import { isValidBech32Prefix } from './bech32/codec.js';
import cosmosChainsData from './cosmos-chains.json' with { type: 'json' };

const CosmosChainEntrySchema = z.object({
  bech32Prefix: z.string().refine(isValidBech32Prefix, { message: 'bech32Prefix must be lowercase letters' }),
  displayName: z.string().min(1),
});

const CosmosChainsSchema = z.record(z.string(), CosmosChainEntrySchema);

export interface CosmosChainInfo {
  chainName: string;
  displayName: string;
  bech32Prefix: string;
}

/**
 * Well-known Cosmos SDK chains, loaded from cosmos-chains.json.
 * Frozen after load.
 */
const COSMOS_CHAINS: readonly CosmosChainInfo[] = Object.freeze(
  Object.entries(CosmosChainsSchema.parse(cosmosChainsData)).map(([chainName, entry]) =>
    Object.freeze({ chainName, displayName: entry.displayName, bech32Prefix: entry.bech32Prefix })
  )
);

export function getAllCosmosChains(): readonly CosmosChainInfo[] {
  return COSMOS_CHAINS;
}

/**
 * Look up a chain by its bech32 prefix (e.g. 'osmo' → Osmosis).
 */
export function getCosmosChainByPrefix(prefix: string): CosmosChainInfo | undefined {
  return COSMOS_CHAINS.find((chain) => chain.bech32Prefix === prefix);
}

/**
 * Prefixes of every registered chain, in registry order. Used for variant derivation.
 */
export function getCommonCosmosPrefixes(): string[] {
  return COSMOS_CHAINS.map((chain) => chain.bech32Prefix);
}
