import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config/env';
import { logger } from '../utils/Logger';
import { toServiceError } from '../utils/errors';
import type { BoostedToken, PairCollection, TradingPair } from '../models/types';

// Every field is optional upstream; missing ones stay undefined on the pair.
const numeric = z.number().nullish();

const PairSchema = z.object({
    dexId: z.string().nullish(),
    priceUsd: z.union([z.string(), z.number()]).nullish(),
    liquidity: z.object({ usd: numeric }).nullish(),
    marketCap: numeric,
    fdv: numeric,
    priceChange: z.object({ h24: numeric, percent: numeric }).nullish(),
    url: z.string().nullish()
});

// Entries are validated one by one in getTokenPairs; a malformed pair is skipped
const TokenPairsResponseSchema = z.object({
    pairs: z.array(z.unknown()).nullish()
});

const BoostedTokenSchema = z.object({
    chainId: z.string(),
    tokenAddress: z.string(),
    url: z.string().nullish(),
    totalAmount: numeric
});

const BoostedTokensResponseSchema = z.array(BoostedTokenSchema);

type RawPair = z.infer<typeof PairSchema>;

export interface DexScreenerServiceOptions {
    apiUrl?: string;
    boostsUrl?: string;
    timeoutMs?: number;
    http?: AxiosInstance;
}

export class DexScreenerService {
    private apiUrl: string;
    private boostsUrl: string;
    private http: AxiosInstance;

    constructor(options: DexScreenerServiceOptions = {}) {
        this.apiUrl = options.apiUrl ?? config.DEXSCREENER_API_URL;
        this.boostsUrl = options.boostsUrl ?? config.DEXSCREENER_BOOSTS_URL;
        this.http = options.http ?? axios.create({
            timeout: options.timeoutMs ?? config.HTTP_TIMEOUT_MS,
            headers: { Accept: 'application/json' }
        });
    }

    /**
     * All pairs DexScreener knows for a token address.
     * Any failure (network, timeout, non-2xx, unexpected JSON) yields an empty collection.
     */
    async getTokenPairs(address: string): Promise<PairCollection> {
        try {
            const response = await this.http.get<unknown>(`${this.apiUrl}/tokens/${encodeURIComponent(address)}`);
            const parsed = TokenPairsResponseSchema.parse(response.data);
            const pairs: TradingPair[] = [];

            for (const [index, raw] of (parsed.pairs ?? []).entries()) {
                const result = PairSchema.safeParse(raw);
                if (!result.success) {
                    const err = toServiceError('dexscreener', result.error);
                    logger.warn({ code: err.code }, `[DexScreener] Skipping pair #${index} for ${address}: ${err.message}`);
                    continue;
                }
                pairs.push(this.normalizePair(result.data));
            }

            logger.debug(`[DexScreener] ${pairs.length} pairs for ${address}`);
            return pairs;
        } catch (error) {
            const err = toServiceError('dexscreener', error);
            logger.error({ err, code: err.code }, `[DexScreener] Pair lookup failed for ${address}`);
            return [];
        }
    }

    async getBoostedTokens(limit: number = config.BOOSTED_TOKENS_LIMIT): Promise<BoostedToken[]> {
        try {
            const response = await this.http.get<unknown>(this.boostsUrl);
            const parsed = BoostedTokensResponseSchema.parse(response.data);
            return parsed.slice(0, limit).map(t => ({
                chainId: t.chainId,
                tokenAddress: t.tokenAddress,
                url: t.url ?? undefined,
                totalAmount: t.totalAmount ?? undefined
            }));
        } catch (error) {
            const err = toServiceError('dexscreener', error);
            logger.error({ err, code: err.code }, '[DexScreener] Boosted tokens fetch failed');
            return [];
        }
    }

    private normalizePair(pair: RawPair): TradingPair {
        const h24 = pair.priceChange?.h24 ?? undefined;
        const percent = pair.priceChange?.percent ?? undefined;

        return Object.freeze({
            dexId: pair.dexId ?? undefined,
            priceUsd: toDecimalText(pair.priceUsd),
            liquidityUsd: pair.liquidity?.usd ?? undefined,
            marketCapUsd: pair.marketCap ?? undefined,
            fdvUsd: pair.fdv ?? undefined,
            priceChangePercent24h: percent ?? h24,
            priceChangeH24: h24,
            url: pair.url ?? undefined
        });
    }
}

// Strings pass through untouched; numbers are written out in plain decimal notation.
function toDecimalText(value: string | number | null | undefined): string | undefined {
    if (value === null || value === undefined) return undefined;
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed === '' ? undefined : trimmed;
    }
    if (!Number.isFinite(value)) return undefined;
    return value.toLocaleString('en-US', { useGrouping: false, maximumFractionDigits: 20 });
}
