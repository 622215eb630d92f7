import { describe, it, expect } from 'vitest';
import { canonicalQuery, Signer } from './Signer';

describe('Signer', () => {
  it('produces lowercase hex HMAC-SHA256', () => {
    const signer = new Signer('key');
    expect(signer.sign('')).toBe('5d5d139563c95b5967b9bd9a8c9b233a9dedb45072794cd232dc1b74832607d0');
    expect(signer.sign('The quick brown fox jumps over the lazy dog')).toBe('f7bc83f430538424b13298e6aa6fb143ef4d59a14946175997479dbc2d1a3cd8');
  });

  it('depends on the secret', () => {
    expect(new Signer('test-secret').sign('')).not.toBe(new Signer('other-secret').sign(''));
  });
});

describe('canonicalQuery', () => {
  it('sorts and encodes parameters', () => {
    expect(canonicalQuery({ pair: 'BINANCE:BTCUSDT', bot_id: 42 })).toBe('bot_id=42&pair=BINANCE%3ABTCUSDT');
  });

  it('is empty with no parameters', () => {
    expect(canonicalQuery({})).toBe('');
  });
});
