import { getLogger } from '@addrbridge/logger';
import { err, ok, type Result } from 'neverthrow';

import { convertAddress } from './address-converter.js';
import { AddressConversionError } from './errors.js';
import { DEFAULT_MAX_BATCH_SIZE, type BatchOptions, type BatchReport } from './types.js';

const logger = getLogger('AddressBatch');

/**
 * Convert many addresses independently.
 *
 * The batch itself fails only on size limits. A bad entry lands in `errors`
 * and never stops the others; both lists keep input order.
 */
export function convertBatch(
  addresses: readonly string[],
  options: BatchOptions = {}
): Result<BatchReport, AddressConversionError> {
  const maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE;

  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1) {
    return err(
      new AddressConversionError(
        `Maximum batch size must be a positive integer, got ${String(maxBatchSize)}`,
        'INVALID_BATCH_LIMIT',
        { actual: maxBatchSize }
      )
    );
  }

  if (addresses.length === 0) {
    return err(new AddressConversionError('Batch must contain at least one address', 'EMPTY_BATCH', { actual: 0 }));
  }

  if (addresses.length > maxBatchSize) {
    return err(
      new AddressConversionError(
        `Batch contains ${String(addresses.length)} addresses, maximum is ${String(maxBatchSize)}`,
        'BATCH_TOO_LARGE',
        { expected: maxBatchSize, actual: addresses.length }
      )
    );
  }

  const report: BatchReport = { conversions: [], errors: [], total: 0 };

  for (const address of addresses) {
    const result = convertAddress(address, { targetPrefix: options.targetPrefix });
    if (result.isOk()) {
      report.conversions.push(result.value);
    } else {
      logger.debug({ address, code: result.error.code }, 'Address conversion failed');
      report.errors.push({ address, code: result.error.code, error: result.error.message });
    }
  }

  report.total = report.conversions.length;

  logger.info(
    { requested: addresses.length, converted: report.total, failed: report.errors.length },
    'Batch conversion finished'
  );

  return ok(report);
}
