import { describe, expect, it } from 'vitest';
import { isValidSymbolId, normalizeSymbolId } from './symbol-id';

describe('normalizeSymbolId', () => {
  it('trims and upper-cases', () => {
    expect(normalizeSymbolId(' 2330.tw ')).toBe('2330.TW');
    expect(normalizeSymbolId('brk-b')).toBe('BRK-B');
  });
});

describe('isValidSymbolId', () => {
  it('accepts exchange qualified ids', () => {
    expect(isValidSymbolId('2330.TW')).toBe(true);
    expect(isValidSymbolId('6488.TWO')).toBe(true);
    expect(isValidSymbolId('0700.HK')).toBe(true);
    expect(isValidSymbolId('AAPL')).toBe(true);
  });

  it('rejects empty or lower-case ids', () => {
    expect(isValidSymbolId('')).toBe(false);
    expect(isValidSymbolId('aapl')).toBe(false);
    expect(isValidSymbolId('2330 TW')).toBe(false);
  });
});
