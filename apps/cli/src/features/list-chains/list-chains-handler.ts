// Imperative shell for list-chains

import { getAllCosmosChains } from '@addrbridge/address-converter';
import { ok, type Result } from 'neverthrow';

import { buildChainEntries, sortChains, type ChainListEntry } from './list-chains-utils.js';

export interface ListChainsResult {
  chains: ChainListEntry[];
  total: number;
}

export class ListChainsHandler {
  constructor(private readonly targetPrefix: string) {}

  execute(): Result<ListChainsResult, Error> {
    const chains = sortChains(buildChainEntries(getAllCosmosChains(), this.targetPrefix));
    return ok({ chains, total: chains.length });
  }
}
