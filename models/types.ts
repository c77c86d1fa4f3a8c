
// Market Data (DexScreener pair snapshot, read-only once fetched)
export interface TradingPair {
    readonly dexId?: string;
    readonly priceUsd?: string; // decimal text as DexScreener sends it
    readonly liquidityUsd?: number;
    readonly marketCapUsd?: number;
    readonly fdvUsd?: number;
    readonly priceChangePercent24h?: number; // priceChange.percent, else priceChange.h24
    readonly priceChangeH24?: number; // raw h24 value, shown in the full report
    readonly url?: string;
}

export type PairCollection = readonly TradingPair[];

export interface BoostedToken {
    chainId: string;
    tokenAddress: string;
    url?: string;
    totalAmount?: number;
}

// Chains
export type ChainTag = 'Ethereum' | 'Solana' | 'Binance' | 'Polygon' | 'Unknown';

// Social
export type MentionPlatform = 'Twitter' | 'Reddit';
export type MentionCount = Record<MentionPlatform, number>;

export interface MentionSource {
    readonly platform: MentionPlatform;
    countMentions(query: string, limit: number): Promise<number>;
}

// Risk
export type RiskTier = 'LOW' | 'LOW_TO_MODERATE' | 'MODERATE' | 'HIGH' | 'CRITICAL' | 'EXTREME';

export type LiquidityLevel = 'High' | 'Medium' | 'Low';
export type MarketCapLevel = 'High' | 'Medium' | 'Low';
export type PriceChangeLevel = 'Volatile' | 'Negative' | 'Stable';
export type FdvRelation = 'FDV Lower Than Market Cap' | 'FDV Higher Than Market Cap' | 'Balanced';

export interface RiskFactors {
    liquidityUsd: number;
    marketCapUsd: number;
    fdvUsd: number;
    priceChangePercent24h: number;
    liquidityLevel: LiquidityLevel;
    marketCapLevel: MarketCapLevel;
    priceChangeLevel: PriceChangeLevel;
    fdvRelation: FdvRelation;
}

export interface RiskVerdict {
    tier: RiskTier;
    factors: RiskFactors;
}

// Report
export interface TokenReport {
    address: string;
    chain: ChainTag;
    pair: TradingPair | null; // null = no market found, rendered with placeholders
    verdict: RiskVerdict | null;
    mentions: MentionCount;
}

// Conversation
export type SelectedOption = 'analyze_token' | 'rug_pull_scan' | 'none';

export interface ConversationState {
    selectedOption: SelectedOption;
    lastTokenAddress?: string;
    lastSeenAt: number;
}

export const CALLBACK_IDS = [
    'analyze_token',
    'rug_pull_scan',
    'full_analysis',
    'top_tokens',
    'go_back_to_menu',
    'start',
    'exit'
] as const;

export type CallbackId = typeof CALLBACK_IDS[number];

export interface MenuButton {
    text: string;
    callbackData: CallbackId;
}

export type Keyboard = MenuButton[][];

export interface BotReply {
    text: string;
    keyboard?: Keyboard;
}
