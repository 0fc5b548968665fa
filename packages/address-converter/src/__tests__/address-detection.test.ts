import { describe, expect, it } from 'vitest';

import { detectAddressFormat, detectAddressType, isEvmAddress } from '../address-detection.js';

const EVM_ADDRESS = '0xAF79152AC5dF276D9A8e1E2E22822f9713474902';
const INJ_ADDRESS = 'inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqku';
const COSMOS_ADDRESS = 'cosmos14au322k9munkmx5wrchz9q30juf5wjgzq37yyy';

describe('detectAddressFormat', () => {
  it('should classify 0x + 40 hex digits as EVM regardless of case', () => {
    expect(detectAddressFormat(EVM_ADDRESS)._unsafeUnwrap()).toEqual({ type: 'evm' });
    expect(detectAddressFormat(EVM_ADDRESS.toLowerCase())._unsafeUnwrap()).toEqual({ type: 'evm' });
  });

  it('should classify bech32-shaped strings and split the prefix at the first separator', () => {
    expect(detectAddressFormat(COSMOS_ADDRESS)._unsafeUnwrap()).toEqual({ type: 'bech32', prefix: 'cosmos' });
  });

  it('should only check shape, not the checksum', () => {
    expect(detectAddressFormat('inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqkq')._unsafeUnwrap()).toEqual({
      type: 'bech32',
      prefix: 'inj',
    });
  });

  it('should reject strings of neither shape', () => {
    for (const input of ['not_an_address', '', '0x1234', 'inj1invalid', INJ_ADDRESS.toUpperCase(), `${EVM_ADDRESS}0`]) {
      const result = detectAddressFormat(input);
      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().code).toBe('UNRECOGNIZED_FORMAT');
      expect(result._unsafeUnwrapErr().details.input).toBe(input);
    }
  });

  it('should explain the accepted formats', () => {
    expect(detectAddressFormat('not_an_address')._unsafeUnwrapErr().message).toBe(
      "Unrecognised address format: 'not_an_address'. Expected a 0x hex address or a bech32 address (e.g. inj1..., cosmos1..., osmo1...)."
    );
  });
});

describe('detectAddressType', () => {
  it('should report EVM with no chain prefix', () => {
    expect(detectAddressType(EVM_ADDRESS)._unsafeUnwrap()).toEqual({ sourceType: 'evm', chainPrefix: undefined });
  });

  it('should report the target prefix as injective', () => {
    expect(detectAddressType(INJ_ADDRESS)._unsafeUnwrap()).toEqual({ sourceType: 'injective', chainPrefix: 'inj' });
  });

  it('should report other prefixes as cosmos', () => {
    expect(detectAddressType(COSMOS_ADDRESS)._unsafeUnwrap()).toEqual({ sourceType: 'cosmos', chainPrefix: 'cosmos' });
  });

  it('should follow a configured target prefix', () => {
    expect(detectAddressType(COSMOS_ADDRESS, { targetPrefix: 'cosmos' })._unsafeUnwrap()).toEqual({
      sourceType: 'injective',
      chainPrefix: 'cosmos',
    });
    expect(detectAddressType(INJ_ADDRESS, { targetPrefix: 'cosmos' })._unsafeUnwrap()).toEqual({
      sourceType: 'cosmos',
      chainPrefix: 'inj',
    });
  });

  it('should give the same answer on repeated calls', () => {
    for (const input of [EVM_ADDRESS, INJ_ADDRESS, COSMOS_ADDRESS, 'garbage']) {
      expect(detectAddressType(input)).toEqual(detectAddressType(input));
    }
  });
});

describe('isEvmAddress', () => {
  it('should require the 0x prefix and exactly 40 hex digits', () => {
    expect(isEvmAddress(EVM_ADDRESS)).toBe(true);
    expect(isEvmAddress(EVM_ADDRESS.slice(2))).toBe(false);
    expect(isEvmAddress('0xINVALID')).toBe(false);
    expect(isEvmAddress(`0X${EVM_ADDRESS.slice(2)}`)).toBe(false);
  });
});
