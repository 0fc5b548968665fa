// Imperative shell for the batch command
// Collects addresses from arguments and an optional file, then converts them

import { readFileSync } from 'node:fs';

import { convertBatch, type BatchReport } from '@addrbridge/address-converter';
import { getLogger } from '@addrbridge/logger';
import { err, type Result } from 'neverthrow';

import { parseAddressList } from './batch-utils.js';

const logger = getLogger('BatchHandler');

export interface BatchHandlerConfig {
  maxBatchSize: number;
  targetPrefix: string;
}

export interface BatchHandlerParams {
  addresses: string[];
  file?: string | undefined;
}

export class BatchHandler {
  constructor(private readonly config: BatchHandlerConfig) {}

  execute(params: BatchHandlerParams): Result<BatchReport, Error> {
    const addresses = [...params.addresses];

    if (params.file !== undefined) {
      let content: string;
      try {
        content = readFileSync(params.file, 'utf8');
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        return err(new Error(`Failed to read address file '${params.file}': ${reason}`));
      }
      const fromFile = parseAddressList(content);
      logger.debug({ file: params.file, count: fromFile.length }, 'Loaded addresses from file');
      addresses.push(...fromFile);
    }

    return convertBatch(addresses, {
      maxBatchSize: this.config.maxBatchSize,
      targetPrefix: this.config.targetPrefix,
    });
  }
}
