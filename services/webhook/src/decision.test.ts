import { describe, it, expect } from 'vitest';
import { alignmentGate, confidenceGate, decide, derivePair } from './decision';

describe('derivePair', () => {
  it('qualifies a bare symbol with the exchange', () => {
    expect(derivePair('BINANCE', 'BTCUSDT')).toBe('BINANCE:BTCUSDT');
  });

  it('keeps an already qualified symbol', () => {
    expect(derivePair('BINANCE', 'BINANCE:BTCUSDT')).toBe('BINANCE:BTCUSDT');
    expect(derivePair('BINANCE', 'KUCOIN:ETHUSDT')).toBe('KUCOIN:ETHUSDT');
  });
});

describe('alignmentGate', () => {
  it('allows a buy only strictly above 0.2', () => {
    expect(alignmentGate('buy', 0.21)).toEqual({ shouldTrade: true, reason: 'BUY allowed (sentiment 0.21)' });
    expect(alignmentGate('buy', 0.2)).toEqual({ shouldTrade: false, reason: 'Blocked by sentiment 0.20' });
  });

  it('allows a sell only strictly below -0.2', () => {
    expect(alignmentGate('sell', -0.21)).toEqual({ shouldTrade: true, reason: 'SELL allowed (sentiment -0.21)' });
    expect(alignmentGate('sell', -0.2)).toEqual({ shouldTrade: false, reason: 'Blocked by sentiment -0.20' });
  });

  it('blocks when side and sentiment disagree', () => {
    expect(alignmentGate('buy', -0.7).shouldTrade).toBe(false);
    expect(alignmentGate('sell', 0.9).shouldTrade).toBe(false);
  });

  it('rounds exact ties in the reason to even', () => {
    expect(alignmentGate('buy', 0.125).reason).toBe('Blocked by sentiment 0.12');
    expect(alignmentGate('buy', 0.375).reason).toBe('BUY allowed (sentiment 0.38)');
  });

  it('blocks unknown sides', () => {
    expect(alignmentGate('close', 0.9)).toEqual({ shouldTrade: false, reason: 'Blocked by sentiment 0.90' });
    expect(alignmentGate('', -0.9).shouldTrade).toBe(false);
  });

  it('uses configured thresholds', () => {
    const gates = { buyThreshold: 0.5, sellThreshold: -0.5, minConfidence: 60 };
    expect(alignmentGate('buy', 0.4, gates).shouldTrade).toBe(false);
    expect(alignmentGate('sell', -0.6, gates).shouldTrade).toBe(true);
  });
});

describe('confidenceGate', () => {
  const allowed = { shouldTrade: true, reason: 'BUY allowed (sentiment 0.90)' };

  it('overrides an allowed trade below 60', () => {
    expect(confidenceGate(allowed, 59)).toEqual({ shouldTrade: false, reason: 'BUY allowed (sentiment 0.90) | low TV confidence 59.0%' });
  });

  it('passes at exactly 60', () => {
    expect(confidenceGate(allowed, 60)).toBe(allowed);
  });

  it('treats 0 and absent as not supplied', () => {
    expect(confidenceGate(allowed, 0)).toBe(allowed);
    expect(confidenceGate(allowed, undefined)).toBe(allowed);
  });

  it('still annotates an already blocked decision', () => {
    const blocked = { shouldTrade: false, reason: 'Blocked by sentiment 0.10' };
    expect(confidenceGate(blocked, 12.5).reason).toBe('Blocked by sentiment 0.10 | low TV confidence 12.5%');
  });
});

describe('decide', () => {
  it('combines both gates', () => {
    expect(decide('buy', 0.9, 59).shouldTrade).toBe(false);
    expect(decide('buy', 0.9, 60).shouldTrade).toBe(true);
    expect(decide('buy', 0.9, 0).shouldTrade).toBe(true);
    expect(decide('buy', -0.7, 75)).toEqual({ shouldTrade: false, reason: 'Blocked by sentiment -0.70' });
  });
});
