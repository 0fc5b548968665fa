import { AddressConversionError } from '@addrbridge/address-converter';
import { describe, expect, it } from 'vitest';

import { createErrorResponse, createSuccessResponse } from './cli-response.js';

describe('createSuccessResponse', () => {
  it('should wrap data with command and metadata', () => {
    const response = createSuccessResponse('convert', { ok: 1 }, { duration_ms: 3 });

    expect(response.success).toBe(true);
    expect(response.command).toBe('convert');
    expect(response.data).toEqual({ ok: 1 });
    expect(response.metadata).toEqual({ duration_ms: 3 });
    expect(Number.isNaN(Date.parse(response.timestamp))).toBe(false);
  });

  it('should omit metadata when none is given', () => {
    expect(createSuccessResponse('list-chains', []).metadata).toBeUndefined();
  });
});

describe('createErrorResponse', () => {
  it('should carry the converter reason and details', () => {
    const error = new AddressConversionError("Expected prefix 'inj', got 'osmo'", 'PREFIX_MISMATCH', {
      expected: 'inj',
      actual: 'osmo',
    });

    const response = createErrorResponse('inj-to-evm', error, 'VALIDATION_ERROR');

    expect(response.success).toBe(false);
    expect(response.error).toMatchObject({
      code: 'VALIDATION_ERROR',
      reason: 'PREFIX_MISMATCH',
      details: { expected: 'inj', actual: 'osmo' },
      message: "Expected prefix 'inj', got 'osmo'",
    });
  });

  it('should leave reason unset for other errors', () => {
    const response = createErrorResponse('batch', new Error('Failed to read address file'), 'GENERAL_ERROR');

    expect(response.error?.code).toBe('GENERAL_ERROR');
    expect(response.error?.reason).toBeUndefined();
  });
});
