import type { PairCollection, TradingPair } from '../models/types';

// Highest liquidity wins; on equal liquidity the earlier pair is kept.
export function selectPreferredPair(pairs: PairCollection): TradingPair | null {
    let best: TradingPair | null = null;

    for (const pair of pairs) {
        if (best === null || (pair.liquidityUsd ?? 0) > (best.liquidityUsd ?? 0)) {
            best = pair;
        }
    }

    return best;
}
