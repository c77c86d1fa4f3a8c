import type { BoostedToken, Keyboard, MentionCount, RiskTier, RiskVerdict, TokenReport, TradingPair } from '../models/types';

// All messages go out with parse_mode HTML
export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;');
}

export const NOT_AVAILABLE = 'Not Available';
export const NO_VALUE = 'N/A';

export const MESSAGES = {
    welcome: 'Welcome to the Token Safety Bot! Choose an option from the menu below:',
    welcomeBack: 'Welcome back! Choose an option from the menu below:',
    askAddress: 'Please provide the token address:',
    askRugPullAddress: 'Please provide the token address for Rug Pull Risk check:',
    chooseOption: 'Choose an option first, then send the token address:',
    invalidAddress: '❌ Invalid address format. Please provide a valid wallet address or token name.',
    fetchingFullAnalysis: '🔍 Fetching Full Token Analysis...',
    noStoredAddress: '❌ No token address found. Please enter a valid token address first.',
    noPairData: '⚠️ No valid data found for the given token address.',
    fetchingTopTokens: '📈 Fetching Top Boosted Tokens...',
    noTopTokens: 'No top tokens available at the moment.',
    goodbye: '👋 Goodbye! Send /start whenever you want to check another token.',
    analyzing: (address: string) => `🔍 Analyzing token address: <code>${escapeHtml(address)}</code>`,
    checkingRugPull: (address: string) => `🛡 Checking Rug Pull Risk for token address: <code>${escapeHtml(address)}</code>`
};

// --- Keyboards ---

export const MAIN_MENU: Keyboard = [
    [{ text: '🔍 Analyze Token', callbackData: 'analyze_token' }],
    [{ text: '🛡 Rug Pull Scanner', callbackData: 'rug_pull_scan' }],
    [{ text: '📈 Top Boosted Tokens', callbackData: 'top_tokens' }],
    [{ text: '🚪 Exit', callbackData: 'exit' }]
];

export const ANALYSIS_FOLLOW_UP: Keyboard = [
    [{ text: 'Rug Pull Check 🔎', callbackData: 'rug_pull_scan' }],
    [{ text: 'Go Back to Main Menu 🏠', callbackData: 'go_back_to_menu' }]
];

export const RUG_PULL_FOLLOW_UP: Keyboard = [
    [{ text: 'Full Token Analysis 📊', callbackData: 'full_analysis' }],
    [{ text: 'Go Back to Main Menu 🏠', callbackData: 'go_back_to_menu' }]
];

export const BACK_TO_MENU: Keyboard = [
    [{ text: 'Go Back to Main Menu 🏠', callbackData: 'go_back_to_menu' }]
];

export const START_OVER: Keyboard = [
    [{ text: 'Start Over 🔄', callbackData: 'start' }]
];

// --- Risk verdict ---

interface TierCopy {
    marker: string;
    label: string;
    summary: string;
    closing: string;
    liquidityNote: string;
    marketCapNote: string;
    priceChangeNote: string;
    fdvNote: string;
}

const TIER_COPY: Record<RiskTier, TierCopy> = {
    LOW: {
        marker: '✅',
        label: 'Low Risk',
        summary: 'Based on the key factors below, this token has strong liquidity, a healthy market cap, and a stable price change, suggesting stability and minimal risk of a rug pull. Monitor the price and transaction volume.',
        closing: '🟢',
        liquidityNote: 'Liquidity is the available amount of capital that can be easily traded or moved in/out of the market. High liquidity reduces the chance of sudden price manipulation.',
        marketCapNote: 'A high market cap typically signifies a token with solid backing and less vulnerability to drastic fluctuations.',
        priceChangeNote: 'Stable price changes indicate lower volatility, which is generally a sign of stability.',
        fdvNote: 'If FDV is significantly higher than market cap, it could indicate a potentially overvalued token.'
    },
    MODERATE: {
        marker: '⚠️',
        label: 'Moderate Risk',
        summary: 'Liquidity is decent, but there are concerns with the price change or market cap. While not in immediate danger, signs point to potential instability. Monitor closely.',
        closing: '🟡',
        liquidityNote: 'Medium liquidity means there\'s some flexibility, but not enough to avoid larger market manipulations.',
        marketCapNote: 'A lower market cap makes the token more susceptible to manipulation and higher volatility.',
        priceChangeNote: 'A significant price change can indicate speculation or manipulation in the market.',
        fdvNote: 'If FDV is lower than market cap, the market could be undervaluing the token, but it could also signify a false sense of stability.'
    },
    HIGH: {
        marker: '⚠️',
        label: 'High Risk',
        summary: 'This token has low liquidity or negative price movement, which increases the likelihood of a rug pull. A lack of liquidity can make the price more vulnerable to manipulation.',
        closing: '🚨',
        liquidityNote: 'Low liquidity means the token is more easily manipulated and price spikes can occur more frequently.',
        marketCapNote: 'A low market cap typically reflects a token with fewer investors and higher risk of price manipulation.',
        priceChangeNote: 'A negative price change can be an indication of declining interest or manipulation.',
        fdvNote: 'If FDV is significantly higher than market cap, this imbalance could be a red flag, indicating potential manipulation.'
    },
    CRITICAL: {
        marker: '🚨',
        label: 'Critical Risk',
        summary: 'This token has dangerously low liquidity or FDV that is lower than its market cap, suggesting high risk. The low liquidity makes it easy for malicious actors to manipulate the price. Avoid investing if you value your funds.',
        closing: '🔴',
        liquidityNote: 'Extremely low liquidity is a huge risk for manipulation, making it easy for bad actors to control the price.',
        marketCapNote: 'A low market cap means fewer resources to keep the price stable, which increases risk.',
        priceChangeNote: 'Price instability makes the token more vulnerable to sudden drops.',
        fdvNote: 'If FDV is lower than market cap, it may suggest an overinflated value that is unsustainable.'
    },
    EXTREME: {
        marker: '🔥',
        label: 'Extreme Risk',
        summary: 'This token has shown a massive price change, or there is extreme centralization. This can indicate manipulative schemes and pump-and-dump behavior. Proceed with extreme caution!',
        closing: '🚩',
        liquidityNote: 'High liquidity is good, but massive volatility or centralization suggests a high risk of market manipulation.',
        marketCapNote: 'The market cap is high, but extreme volatility or centralization can create a false sense of security.',
        priceChangeNote: 'A large price change within 24 hours is often associated with pump-and-dump schemes.',
        fdvNote: 'If FDV is much higher than market cap, the token could be highly inflated and could crash once the market stabilizes.'
    },
    LOW_TO_MODERATE: {
        marker: '✅',
        label: 'Low to Moderate Risk',
        summary: 'The token has decent liquidity and market cap, but there are concerns such as price volatility or social media mentions. Monitor closely for any sudden changes.',
        closing: '🟢',
        liquidityNote: 'Decent liquidity means there\'s enough trading volume to prevent sudden price swings, but still monitor for sudden changes.',
        marketCapNote: 'A reasonable market cap is a good sign, but it can still be vulnerable if price volatility or external factors come into play.',
        priceChangeNote: 'Price volatility could indicate potential price manipulation or speculative trading.',
        fdvNote: 'A balanced FDV vs market cap ratio indicates the market is valuing the token appropriately, but monitor for any shifts in the future.'
    }
};

export function formatVerdict(verdict: RiskVerdict): string {
    const copy = TIER_COPY[verdict.tier];
    const f = verdict.factors;

    return [
        `${copy.marker} <b>${copy.label}</b>: ${copy.summary} ${copy.closing}`,
        '',
        '<b>Key Factors:</b>',
        `Liquidity: ${f.liquidityUsd} USD (${f.liquidityLevel}) - ${copy.liquidityNote}`,
        `Market Cap: ${f.marketCapUsd} USD (${f.marketCapLevel}) - ${copy.marketCapNote}`,
        `24H Price Change: ${f.priceChangePercent24h}% (${f.priceChangeLevel}) - ${copy.priceChangeNote}`,
        `FDV vs Market Cap: ${f.fdvRelation} - ${copy.fdvNote}`
    ].join('\n');
}

// --- Report sections ---

function usd(value: number | undefined): string {
    return value === undefined ? NOT_AVAILABLE : `${value} USD`;
}

function plain(value: number | undefined): string {
    return value === undefined ? NOT_AVAILABLE : String(value);
}

function price(value: string | undefined, unit = ''): string {
    return value === undefined ? NOT_AVAILABLE : `${escapeHtml(value)}${unit}`;
}

function text(value: string | undefined): string {
    return value === undefined || value === '' ? NO_VALUE : escapeHtml(value);
}

export function formatMentions(mentions: MentionCount): string {
    return [
        `Twitter Mentions: ${mentions.Twitter} 🐦`,
        `Reddit Mentions: ${mentions.Reddit} 💬`
    ].join('\n');
}

function riskSection(report: TokenReport): string {
    return report.verdict ? formatVerdict(report.verdict) : NOT_AVAILABLE;
}

export function formatFullAnalysis(report: TokenReport): string {
    const pair: TradingPair = report.pair ?? {};
    const change = pair.priceChangeH24 === undefined ? NOT_AVAILABLE : `${pair.priceChangeH24}%`;

    return [
        `Token Address: <code>${escapeHtml(report.address)}</code> 🏷️`,
        `Chain: ${report.chain} ⛓️`,
        '',
        'Dexscreener Data 📊:',
        `- DEX: ${text(pair.dexId)} 🔑`,
        `- Price: ${price(pair.priceUsd, ' USD')} 💵`,
        `- Liquidity: ${usd(pair.liquidityUsd)} 💧`,
        `- Market Cap: ${usd(pair.marketCapUsd)} 💼`,
        `- FDV: ${usd(pair.fdvUsd)} 📈`,
        `- 24H Price Change: ${change} 🔄`,
        `- URL: ${text(pair.url)} 🌐`,
        '',
        `Rug Pull Risk ⚠️: ${riskSection(report)}`,
        '',
        'Social Media Mentions 📱:',
        formatMentions(report.mentions)
    ].join('\n');
}

export function formatRugPullScan(report: TokenReport): string {
    const pair: TradingPair = report.pair ?? {};

    return [
        `Token Address: <code>${escapeHtml(report.address)}</code>`,
        '',
        `Rug Pull Risk: ${riskSection(report)}`,
        '',
        'Dexscreener Data:',
        `- DEX: ${text(pair.dexId)}`,
        `- Price: ${price(pair.priceUsd)}`,
        `- Liquidity: ${plain(pair.liquidityUsd)}`,
        `- Market Cap: ${plain(pair.marketCapUsd)}`,
        '',
        'Social Media Mentions:',
        formatMentions(report.mentions)
    ].join('\n');
}

export function formatBoostedTokens(tokens: BoostedToken[]): string {
    if (tokens.length === 0) return MESSAGES.noTopTokens;

    const lines = tokens.map((token, idx) => {
        const address = escapeHtml(token.tokenAddress);
        const link = token.url ? `<a href="${escapeHtml(token.url)}">${address}</a>` : `<code>${address}</code>`;
        const boosts = token.totalAmount === undefined ? '' : `, boosts: ${token.totalAmount}`;
        return `${idx + 1}. ${link} (${escapeHtml(token.chainId)}${boosts})`;
    });

    return ['📈 <b>Top Boosted Tokens</b>', '', ...lines].join('\n');
}
