// Imperative shell for the convert commands

import {
  convertAddress,
  convertFromEvm,
  convertFromTarget,
  type AddressConversionError,
  type ConversionResult,
} from '@addrbridge/address-converter';
import { getLogger } from '@addrbridge/logger';
import type { Result } from 'neverthrow';

import type { ConvertMode } from './convert-utils.js';

const logger = getLogger('ConvertHandler');

export interface ConvertHandlerParams {
  address: string;
  mode: ConvertMode;
}

/**
 * Runs a single-address conversion, auto-detected or with an asserted source format.
 */
export class ConvertHandler {
  constructor(private readonly targetPrefix: string) {}

  execute(params: ConvertHandlerParams): Result<ConversionResult, AddressConversionError> {
    const options = { targetPrefix: this.targetPrefix };

    const result =
      params.mode === 'evm'
        ? convertFromEvm(params.address, options)
        : params.mode === 'injective'
          ? convertFromTarget(params.address, options)
          : convertAddress(params.address, options);

    if (result.isErr()) {
      logger.debug({ address: params.address, mode: params.mode, code: result.error.code }, 'Conversion failed');
    }

    return result;
  }
}
