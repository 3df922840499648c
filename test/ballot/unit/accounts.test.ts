import { isValidAccount, normalizeAccount, sameAccount } from '../../../src/ballot';

describe('accounts', () => {
  describe('normalizeAccount', () => {
    it('should checksum lowercase addresses', () => {
      expect(normalizeAccount('0x52908400098527886e0f7030069857d2e4169ee7')).toBe(
        '0x52908400098527886E0F7030069857D2E4169EE7'
      );
    });

    it('should keep other identifiers and trim whitespace', () => {
      expect(normalizeAccount('  alice ')).toBe('alice');
      expect(normalizeAccount('Alice')).toBe('Alice');
    });
  });

  describe('isValidAccount', () => {
    it('should reject empty and non-string values', () => {
      expect(isValidAccount('')).toBe(false);
      expect(isValidAccount('   ')).toBe(false);
      expect(isValidAccount(42)).toBe(false);
      expect(isValidAccount('alice')).toBe(true);
    });
  });

  describe('sameAccount', () => {
    it('should compare addresses regardless of casing', () => {
      expect(
        sameAccount(
          '0x52908400098527886e0f7030069857d2e4169ee7',
          '0x52908400098527886E0F7030069857D2E4169EE7'
        )
      ).toBe(true);
      expect(sameAccount('alice', 'Alice')).toBe(false);
    });
  });
});
