import { getEventContext, maskSensitiveData, runWithEventContext } from '../../src/server/utils/logger';

describe('logger utilities', () => {
  describe('maskSensitiveData', () => {
    it('redacts sensitive keys and keeps the rest', () => {
      expect(
        maskSensitiveData({
          sessionId: 'chan',
          token: 'test-secret-value',
          password: 'short',
          nested: { apiKey: 12345, text: 'hello' },
        })
      ).toEqual({
        sessionId: 'chan',
        token: 'test...[REDACTED]',
        password: '[REDACTED]',
        nested: { apiKey: '[REDACTED]', text: 'hello' },
      });
    });

    it('replaces binary payloads with their size', () => {
      expect(maskSensitiveData({ data: Buffer.from('meow'), list: [new Uint8Array(2)] })).toEqual({
        data: '[binary 4 bytes]',
        list: ['[binary 2 bytes]'],
      });
    });

    it('stops at the depth limit', () => {
      expect(maskSensitiveData({ a: { b: 1 } }, 1)).toEqual({ a: '[MAX_DEPTH_EXCEEDED]' });
    });
  });

  describe('event context', () => {
    it('is visible inside the callback and across awaits only', async () => {
      expect(getEventContext()).toBeUndefined();

      const seen = await runWithEventContext({ eventId: 'm1', sessionId: 'chan', replayed: true }, async () => {
        await Promise.resolve();
        return getEventContext();
      });

      expect(seen).toEqual({ eventId: 'm1', sessionId: 'chan', replayed: true });
      expect(getEventContext()).toBeUndefined();
    });
  });
});
