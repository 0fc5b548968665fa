import { err, ok, type Result } from 'neverthrow';

import { AddressConversionError } from '../errors.js';

/**
 * Regroup a sequence of `fromBits`-wide values into `toBits`-wide values,
 * most significant bit first.
 *
 * With `pad` the final group is filled with zero bits (8 → 5 when encoding).
 * Without it, leftover bits must be fewer than `fromBits` and all zero (5 → 8 when decoding).
 */
export function convertBits(
  data: ArrayLike<number>,
  fromBits: number,
  toBits: number,
  pad: boolean
): Result<number[], AddressConversionError> {
  if (!isGroupWidth(fromBits) || !isGroupWidth(toBits)) {
    return err(
      new AddressConversionError(
        `Bit group widths must be integers between 1 and 8, got ${String(fromBits)} and ${String(toBits)}`,
        'INVALID_BIT_GROUPS'
      )
    );
  }

  const maxInput = (1 << fromBits) - 1;
  const maxValue = (1 << toBits) - 1;
  const maxAccumulator = (1 << (fromBits + toBits - 1)) - 1;
  const result: number[] = [];
  let accumulator = 0;
  let bits = 0;

  for (let i = 0; i < data.length; i++) {
    const value = data[i] ?? 0;
    if (!Number.isInteger(value) || value < 0 || value > maxInput) {
      return err(
        new AddressConversionError(
          `Value ${String(value)} at index ${String(i)} does not fit in ${String(fromBits)} bits`,
          'INVALID_BIT_GROUPS',
          { actual: value, expected: maxInput }
        )
      );
    }

    accumulator = ((accumulator << fromBits) | value) & maxAccumulator;
    bits += fromBits;
    while (bits >= toBits) {
      bits -= toBits;
      result.push((accumulator >> bits) & maxValue);
    }
  }

  if (pad) {
    if (bits > 0) {
      result.push((accumulator << (toBits - bits)) & maxValue);
    }
  } else if (bits >= fromBits) {
    return err(new AddressConversionError('Excess padding in bit groups', 'INVALID_BIT_GROUPS'));
  } else if (((accumulator << (toBits - bits)) & maxValue) !== 0) {
    return err(new AddressConversionError('Non-zero padding in bit groups', 'INVALID_BIT_GROUPS'));
  }

  return ok(result);
}

function isGroupWidth(bits: number): boolean {
  return Number.isInteger(bits) && bits >= 1 && bits <= 8;
}
