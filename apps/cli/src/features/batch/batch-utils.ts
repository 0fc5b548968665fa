// Pure helpers for the batch command

import type { BatchFailure, ConversionResult } from '@addrbridge/address-converter';

/**
 * One address per line. Blank lines and lines starting with '#' are skipped.
 */
export function parseAddressList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}

export function formatConversionLine(result: ConversionResult): string {
  return `${result.input} → ${result.injectiveAddress} / ${result.evmAddress}`;
}

export function formatFailureLine(failure: BatchFailure): string {
  return `${failure.address}: [${failure.code}] ${failure.error}`;
}
