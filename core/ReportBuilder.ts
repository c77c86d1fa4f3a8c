import { logger } from '../utils/Logger';
import { detectChain } from './AddressClassifier';
import { selectPreferredPair } from './PairSelector';
import { classify } from './RiskClassifier';
import type { MentionCount, PairCollection, TokenReport } from '../models/types';

export interface PairSource {
    getTokenPairs(address: string): Promise<PairCollection>;
}

export interface MentionCounter {
    countMentions(address: string): Promise<MentionCount>;
}

/**
 * Token report pipeline:
 * 1. DexScreener pairs and social mentions, fetched in parallel
 * 2. Preferred pair = deepest liquidity
 * 3. Risk verdict (only when a pair exists)
 *
 * Never rejects: a failed source becomes empty pairs / zero mentions.
 */
export class ReportBuilder {
    constructor(
        private pairs: PairSource,
        private mentions: MentionCounter
    ) { }

    async buildReport(address: string): Promise<TokenReport> {
        const tokenAddress = address.trim();

        const [pairs, mentions] = await Promise.all([
            this.pairs.getTokenPairs(tokenAddress).catch((err: unknown): PairCollection => {
                logger.error({ err }, `[Report] Pair source failed for ${tokenAddress}`);
                return [];
            }),
            this.mentions.countMentions(tokenAddress).catch((err: unknown): MentionCount => {
                logger.error({ err }, `[Report] Mention counter failed for ${tokenAddress}`);
                return { Twitter: 0, Reddit: 0 };
            })
        ]);

        const pair = selectPreferredPair(pairs);
        const verdict = pair ? classify(pair) : null;

        logger.info({
            address: tokenAddress,
            pairs: pairs.length,
            tier: verdict?.tier ?? null,
            mentions
        }, '[Report] Built token report');

        return {
            address: tokenAddress,
            chain: detectChain(tokenAddress),
            pair,
            verdict,
            mentions
        };
    }
}
