import { maskSensitiveData, redactEmail, runWithContext, getConnectionContext } from '../../src/server/utils/logger';

describe('logger helpers', () => {
  describe('redactEmail', () => {
    it('should keep the first three characters of the local part', () => {
      expect(redactEmail('john.doe@example.com')).toBe('joh***@example.com');
      expect(redactEmail('al@example.com')).toBe('al***@example.com');
    });

    it('should hide malformed addresses entirely', () => {
      expect(redactEmail('not-an-email')).toBe('[REDACTED_EMAIL]');
      expect(redactEmail('@example.com')).toBe('[REDACTED_EMAIL]');
      expect(redactEmail(undefined)).toBeUndefined();
    });
  });

  describe('maskSensitiveData', () => {
    it('should redact tokens and secrets by key name', () => {
      expect(
        maskSensitiveData({
          token: 'placeholder-token-value',
          jwtSecret: 'short',
          apiKey: 12345,
          gameId: 'game-1',
        })
      ).toEqual({
        token: 'plac...[REDACTED]',
        jwtSecret: '[REDACTED]',
        apiKey: '[REDACTED]',
        gameId: 'game-1',
      });
    });

    it('should recurse into nested objects and arrays', () => {
      expect(
        maskSensitiveData({
          user: { email: 'alice@example.com', displayName: 'alice' },
          headers: [{ authorization: 'Bearer abcdefghijkl' }],
        })
      ).toEqual({
        user: { email: 'ali***@example.com', displayName: 'alice' },
        headers: [{ authorization: 'Bear...[REDACTED]' }],
      });
    });

    it('should stop at the depth limit', () => {
      expect(maskSensitiveData({ a: { b: 1 } }, 1)).toEqual({ a: '[MAX_DEPTH_EXCEEDED]' });
    });
  });

  describe('connection context', () => {
    it('should expose the context only inside runWithContext', () => {
      expect(getConnectionContext()).toBeUndefined();

      const seen = runWithContext({ connectionId: 'conn-1', userId: 'user-1' }, () => getConnectionContext());

      expect(seen).toEqual({ connectionId: 'conn-1', userId: 'user-1' });
      expect(getConnectionContext()).toBeUndefined();
    });
  });
});
