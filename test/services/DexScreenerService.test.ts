import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';

import { DexScreenerService } from '../../services/DexScreenerService';

const API_URL = 'https://dex.example.invalid/latest/dex';
const BOOSTS_URL = 'https://dex.example.invalid/token-boosts/latest/v1';
const ADDRESS = '0x' + 'ab'.repeat(20);

function respondWith(data: unknown, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
    return async (config) => {
        seen.push(config);
        return { data, status: 200, statusText: 'OK', headers: {}, config };
    };
}

function serviceWith(adapter: AxiosAdapter): DexScreenerService {
    return new DexScreenerService({
        apiUrl: API_URL,
        boostsUrl: BOOSTS_URL,
        http: axios.create({ adapter })
    });
}

describe('DexScreenerService.getTokenPairs', () => {
    it('requests the token endpoint and normalizes every pair', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const service = serviceWith(respondWith({
            pairs: [
                {
                    chainId: 'ethereum',
                    dexId: 'uniswap',
                    priceUsd: '0.0015',
                    liquidity: { usd: 12000, base: 10, quote: 4 },
                    marketCap: 90000,
                    fdv: 95000,
                    priceChange: { h1: 2, h24: 12.5 },
                    url: 'https://dexscreener.com/ethereum/0xpair'
                },
                { dexId: 'sushiswap' }
            ]
        }, seen));

        const pairs = await service.getTokenPairs(ADDRESS);

        expect(seen[0].url).toBe(`${API_URL}/tokens/${ADDRESS}`);
        expect(pairs).toHaveLength(2);
        expect(pairs[0]).toEqual({
            dexId: 'uniswap',
            priceUsd: '0.0015',
            liquidityUsd: 12000,
            marketCapUsd: 90000,
            fdvUsd: 95000,
            priceChangePercent24h: 12.5,
            priceChangeH24: 12.5,
            url: 'https://dexscreener.com/ethereum/0xpair'
        });
        expect(pairs[1]).toEqual({ dexId: 'sushiswap' });
        expect(Object.isFrozen(pairs[0])).toBe(true);
    });

    it('prefers priceChange.percent over h24 for the risk input', async () => {
        const service = serviceWith(respondWith({
            pairs: [{ priceChange: { h24: 10, percent: 40 } }]
        }));

        const [pair] = await service.getTokenPairs(ADDRESS);

        expect(pair.priceChangePercent24h).toBe(40);
        expect(pair.priceChangeH24).toBe(10);
    });

    it('keeps the price as the decimal text DexScreener sent', async () => {
        const service = serviceWith(respondWith({
            pairs: [{ priceUsd: '0.0000001234' }, { priceUsd: 1.234e-7 }, { priceUsd: ' ' }]
        }));

        const pairs = await service.getTokenPairs(ADDRESS);

        expect(pairs.map(p => p.priceUsd)).toEqual(['0.0000001234', '0.0000001234', undefined]);
    });

    it('drops only the pairs that fail validation', async () => {
        const service = serviceWith(respondWith({
            pairs: [
                { dexId: 'broken', fdv: 'lots', liquidity: { usd: 90000 } },
                { dexId: 'uniswap', liquidity: { usd: 12000 } }
            ]
        }));

        const pairs = await service.getTokenPairs(ADDRESS);

        expect(pairs).toEqual([{ dexId: 'uniswap', liquidityUsd: 12000 }]);
    });

    it('returns an empty collection when DexScreener knows no pairs', async () => {
        const service = serviceWith(respondWith({ schemaVersion: '1.0.0', pairs: null }));

        expect(await service.getTokenPairs(ADDRESS)).toEqual([]);
    });

    it('returns an empty collection on an unexpected response shape', async () => {
        const service = serviceWith(respondWith({ pairs: 'not-a-list' }));

        expect(await service.getTokenPairs(ADDRESS)).toEqual([]);
    });

    it('returns an empty collection when the request fails', async () => {
        const service = serviceWith(async () => {
            throw new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED');
        });

        expect(await service.getTokenPairs(ADDRESS)).toEqual([]);
    });
});

describe('DexScreenerService.getBoostedTokens', () => {
    it('maps the boosts feed up to the limit', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const service = serviceWith(respondWith([
            { chainId: 'solana', tokenAddress: 'TokenA', url: 'https://dexscreener.com/solana/tokena', totalAmount: 500, amount: 100 },
            { chainId: 'base', tokenAddress: '0xTokenB' },
            { chainId: 'ethereum', tokenAddress: '0xTokenC', totalAmount: 10 }
        ], seen));

        const tokens = await service.getBoostedTokens(2);

        expect(seen[0].url).toBe(BOOSTS_URL);
        expect(tokens).toEqual([
            { chainId: 'solana', tokenAddress: 'TokenA', url: 'https://dexscreener.com/solana/tokena', totalAmount: 500 },
            { chainId: 'base', tokenAddress: '0xTokenB' }
        ]);
    });

    it('returns an empty list when the feed is not an array', async () => {
        const service = serviceWith(respondWith({ error: 'rate limited' }));

        expect(await service.getBoostedTokens(10)).toEqual([]);
    });
});
