import type { AddressErrorCode } from './errors.js';

/** Number of bytes in every account identifier this package handles. */
export const ADDRESS_BYTE_LENGTH = 20;

export const DEFAULT_TARGET_PREFIX = 'inj';
export const DEFAULT_MAX_BATCH_SIZE = 50;

/**
 * The 20 raw bytes shared by every string form of one account.
 * Only produced by a successful decode.
 */
export type CanonicalAddress = Uint8Array;

export type AddressFormat = { type: 'evm' } | { prefix: string; type: 'bech32' };

export type AddressSourceType = 'evm' | 'injective' | 'cosmos';

export type DetectedAddress =
  | { chainPrefix: undefined; sourceType: 'evm' }
  | { chainPrefix: string; sourceType: 'injective' | 'cosmos' };

export interface ConversionResult {
  input: string;
  injectiveAddress: string;
  /** Always lowercase */
  evmAddress: string;
  sourceType: AddressSourceType;
  sourceChainPrefix: string | undefined;
}

export interface BatchFailure {
  address: string;
  code: AddressErrorCode;
  error: string;
}

export interface BatchReport {
  conversions: ConversionResult[];
  errors: BatchFailure[];
  /** Number of successful conversions */
  total: number;
}

export interface ConverterOptions {
  /** Prefix treated as the target (Injective) chain. Defaults to 'inj'. */
  targetPrefix?: string | undefined;
}

export interface BatchOptions extends ConverterOptions {
  /** Defaults to 50. */
  maxBatchSize?: number | undefined;
}
