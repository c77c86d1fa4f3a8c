import type {
    FdvRelation,
    LiquidityLevel,
    MarketCapLevel,
    PriceChangeLevel,
    RiskFactors,
    RiskTier,
    RiskVerdict,
    TradingPair
} from '../models/types';

export function liquidityLevelOf(liquidityUsd: number): LiquidityLevel {
    if (liquidityUsd > 25000) return 'High';
    if (liquidityUsd >= 10000) return 'Medium';
    return 'Low';
}

export function marketCapLevelOf(marketCapUsd: number): MarketCapLevel {
    if (marketCapUsd > 250000) return 'High';
    if (marketCapUsd >= 100000) return 'Medium';
    return 'Low';
}

export function priceChangeLevelOf(priceChangePercent: number): PriceChangeLevel {
    if (priceChangePercent > 500) return 'Volatile';
    if (priceChangePercent <= 0) return 'Negative';
    return 'Stable';
}

export function fdvRelationOf(fdvUsd: number, marketCapUsd: number): FdvRelation {
    if (fdvUsd < marketCapUsd) return 'FDV Lower Than Market Cap';
    if (fdvUsd > marketCapUsd) return 'FDV Higher Than Market Cap';
    return 'Balanced';
}

/**
 * Rug pull risk tiers, evaluated top to bottom (first match wins):
 * 1. LOW: Liq > $25k AND MC > $250k AND 24h <= 50%
 * 2. MODERATE: $10k <= Liq <= $20k AND (24h > 50% OR MC < $100k)
 * 3. HIGH: Liq < $10k OR 24h <= 0%
 * 4. CRITICAL: Liq < $5k OR FDV < MC
 * 5. EXTREME: 24h > 1000% OR FDV > 2x MC
 * 6. LOW_TO_MODERATE: nothing above matched
 *
 * Rule 3 shadows the liquidity half of rule 4, and the fallback needs
 * liquidity >= $10k, positive change and MC <= FDV <= 2x MC.
 * Reordering changes verdicts.
 */
function tierOf(f: RiskFactors): RiskTier {
    const liq = f.liquidityUsd;
    const mc = f.marketCapUsd;
    const fdv = f.fdvUsd;
    const change = f.priceChangePercent24h;

    if (liq > 25000 && mc > 250000 && change <= 50) return 'LOW';
    if (liq >= 10000 && liq <= 20000 && (change > 50 || mc < 100000)) return 'MODERATE';
    if (liq < 10000 || change <= 0) return 'HIGH';
    if (liq < 5000 || fdv < mc) return 'CRITICAL';
    if (change > 1000 || fdv > mc * 2) return 'EXTREME';
    return 'LOW_TO_MODERATE';
}

export function riskFactorsOf(pair: TradingPair): RiskFactors {
    const liquidityUsd = pair.liquidityUsd ?? 0;
    const marketCapUsd = pair.marketCapUsd ?? 0;
    const fdvUsd = pair.fdvUsd ?? 0;
    const priceChangePercent24h = pair.priceChangePercent24h ?? 0;

    return {
        liquidityUsd,
        marketCapUsd,
        fdvUsd,
        priceChangePercent24h,
        liquidityLevel: liquidityLevelOf(liquidityUsd),
        marketCapLevel: marketCapLevelOf(marketCapUsd),
        priceChangeLevel: priceChangeLevelOf(priceChangePercent24h),
        fdvRelation: fdvRelationOf(fdvUsd, marketCapUsd)
    };
}

export function classify(pair: TradingPair): RiskVerdict {
    const factors = riskFactorsOf(pair);
    return { tier: tierOf(factors), factors };
}
