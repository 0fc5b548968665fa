import { getCommonCosmosPrefixes } from '@addrbridge/address-converter';
import { describe, expect, it } from 'vitest';

import { VariantsHandler } from './variants-handler.js';

const INJ = 'inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqku';
const COSMOS = 'cosmos14au322k9munkmx5wrchz9q30juf5wjgzq37yyy';
const OSMO = 'osmo14au322k9munkmx5wrchz9q30juf5wjgzg2d5jk';
const TERRA = 'terra14au322k9munkmx5wrchz9q30juf5wjgzx4yyxy';

describe('VariantsHandler', () => {
  const handler = new VariantsHandler('inj');

  describe('toPrefix', () => {
    it('should re-encode a target address under another prefix', () => {
      expect(handler.toPrefix(INJ, 'terra')._unsafeUnwrap()).toEqual({ input: INJ, prefix: 'terra', address: TERRA });
    });

    it('should require the input to carry the target prefix', () => {
      const error = handler.toPrefix(COSMOS, 'osmo')._unsafeUnwrapErr();

      expect(error.code).toBe('PREFIX_MISMATCH');
    });

    it('should reject an invalid prefix before decoding', () => {
      const error = handler.toPrefix(INJ, 'Osmo')._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_PREFIX');
    });
  });

  describe('variants', () => {
    it('should use the given prefixes in order after the input', () => {
      const result = handler.variants(COSMOS, ['inj', 'osmo', 'cosmos'])._unsafeUnwrap();

      expect(result).toEqual({ input: COSMOS, variants: [COSMOS, INJ, OSMO] });
    });

    it('should default to the target prefix and every registered chain', () => {
      const result = handler.variants(INJ)._unsafeUnwrap();

      expect(result.variants[0]).toBe(INJ);
      expect(result.variants).toContain(OSMO);
      expect(result.variants).toHaveLength(getCommonCosmosPrefixes().length);
    });

    it('should accept EVM input', () => {
      const result = handler.variants('0xAF79152AC5dF276D9A8e1E2E22822f9713474902', ['inj'])._unsafeUnwrap();

      expect(result.variants).toEqual(['0xAF79152AC5dF276D9A8e1E2E22822f9713474902', INJ]);
    });

    it('should fail on an undecodable address', () => {
      const error = handler.variants('inj14au322k9munkmx5wrchz9q30juf5wjgz2cfqkq')._unsafeUnwrapErr();

      expect(error.code).toBe('INVALID_BECH32_CHECKSUM');
    });
  });
});
