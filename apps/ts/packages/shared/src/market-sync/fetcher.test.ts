import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '../errors';
import { JsonFileSymbolSource } from './fetcher';

describe('JsonFileSymbolSource', () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'symbols-'));
    filePath = path.join(dir, 'symbols.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns the normalized listing for a market', async () => {
    writeFileSync(
      filePath,
      JSON.stringify({
        TW: [
          { symbolId: ' 2330.tw ', name: 'TSMC' },
          { symbolId: '2317.TW', name: 'Hon Hai' },
        ],
        US: [{ symbolId: 'AAPL', name: 'Apple' }],
      })
    );

    const source = new JsonFileSymbolSource(filePath);

    await expect(source.listSymbols('TW')).resolves.toEqual([
      { symbolId: '2330.TW', name: 'TSMC' },
      { symbolId: '2317.TW', name: 'Hon Hai' },
    ]);
    await expect(source.listSymbols('HK')).resolves.toEqual([]);
  });

  it('drops duplicate symbol ids after normalization', async () => {
    writeFileSync(
      filePath,
      JSON.stringify({
        US: [
          { symbolId: 'msft', name: 'Microsoft' },
          { symbolId: 'MSFT', name: 'Microsoft Corp' },
        ],
      })
    );

    await expect(new JsonFileSymbolSource(filePath).listSymbols('US')).resolves.toEqual([
      { symbolId: 'MSFT', name: 'Microsoft' },
    ]);
  });

  it('rejects invalid symbol ids', async () => {
    writeFileSync(filePath, JSON.stringify({ HK: [{ symbolId: '07 00', name: 'Bad' }] }));

    await expect(new JsonFileSymbolSource(filePath).listSymbols('HK')).rejects.toThrow(
      `Invalid symbols file ${filePath}: HK.0.symbolId Invalid symbol id "07 00"`
    );
  });

  it('raises ConfigError for a missing file', async () => {
    const source = new JsonFileSymbolSource(path.join(dir, 'missing.json'));

    await expect(source.listSymbols('TW')).rejects.toBeInstanceOf(ConfigError);
  });
});
