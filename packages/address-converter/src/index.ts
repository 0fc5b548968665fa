export {
  convertAddress,
  convertFromEvm,
  convertFromTarget,
  decodeBech32Address,
  evmToTarget,
  foreignToTarget,
  formatEvmAddress,
  parseEvmAddress,
  targetToEvm,
  targetToForeign,
  toCanonicalAddress,
} from './address-converter.js';
export {
  BECH32_ADDRESS_PATTERN,
  detectAddressFormat,
  detectAddressType,
  EVM_ADDRESS_PATTERN,
  isEvmAddress,
} from './address-detection.js';
export { deriveAddressVariants, isSameAccount } from './address-variants.js';
export { convertBatch } from './batch.js';
export {
  BECH32_CHARSET,
  BECH32_MAX_LENGTH,
  decodeBech32,
  encodeBech32,
  isValidBech32Prefix,
  type DecodedBech32,
} from './bech32/codec.js';
export { convertBits } from './bech32/convert-bits.js';
export {
  getAllCosmosChains,
  getCommonCosmosPrefixes,
  getCosmosChainByPrefix,
  type CosmosChainInfo,
} from './chain-registry.js';
export {
  AddressConversionError,
  isAddressConversionError,
  type AddressErrorCode,
  type AddressErrorDetails,
} from './errors.js';
export {
  ADDRESS_BYTE_LENGTH,
  DEFAULT_MAX_BATCH_SIZE,
  DEFAULT_TARGET_PREFIX,
  type AddressFormat,
  type AddressSourceType,
  type BatchFailure,
  type BatchOptions,
  type BatchReport,
  type CanonicalAddress,
  type ConversionResult,
  type ConverterOptions,
  type DetectedAddress,
} from './types.js';
