// Pure functions for list-chains

import { encodeBech32, type CosmosChainInfo } from '@addrbridge/address-converter';

export interface ChainListEntry extends CosmosChainInfo {
  /** Zero account under this prefix */
  exampleAddress: string;
  isTarget: boolean;
}

const ZERO_ACCOUNT = new Uint8Array(20);

export function buildChainEntries(chains: readonly CosmosChainInfo[], targetPrefix: string): ChainListEntry[] {
  return chains.map((chain) => ({
    ...chain,
    exampleAddress: encodeBech32(chain.bech32Prefix, ZERO_ACCOUNT).unwrapOr(''),
    isTarget: chain.bech32Prefix === targetPrefix,
  }));
}

export function sortChains(entries: ChainListEntry[]): ChainListEntry[] {
  return [...entries].sort((a, b) => a.displayName.localeCompare(b.displayName));
}
