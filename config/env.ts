import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';
dotenv.config();

export const config = {
    // Telegram
    TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || '',

    // Twitter (user context, same four keys the developer portal hands out)
    TWITTER_API_KEY: process.env.TWITTER_API_KEY || '',
    TWITTER_API_SECRET: process.env.TWITTER_API_SECRET || '',
    TWITTER_ACCESS_TOKEN: process.env.TWITTER_ACCESS_TOKEN || '',
    TWITTER_ACCESS_SECRET: process.env.TWITTER_ACCESS_SECRET || '',

    // Reddit
    REDDIT_CLIENT_ID: process.env.REDDIT_CLIENT_ID || '',
    REDDIT_SECRET: process.env.REDDIT_SECRET || '',
    REDDIT_USER_AGENT: process.env.REDDIT_USER_AGENT || '',

    // DexScreener (public, no key)
    DEXSCREENER_API_URL: process.env.DEXSCREENER_API_URL || 'https://api.dexscreener.com/latest/dex',
    DEXSCREENER_BOOSTS_URL: process.env.DEXSCREENER_BOOSTS_URL || 'https://api.dexscreener.com/token-boosts/latest/v1',

    // Lookups
    HTTP_TIMEOUT_MS: Number(process.env.HTTP_TIMEOUT_MS) || 10000,
    MENTION_RESULT_LIMIT: Number(process.env.MENTION_RESULT_LIMIT) || 5,
    BOOSTED_TOKENS_LIMIT: Number(process.env.BOOSTED_TOKENS_LIMIT) || 10,

    // Sessions
    SESSION_TTL_MINUTES: Number(process.env.SESSION_TTL_MINUTES) || 60,
    MAX_SESSIONS: Number(process.env.MAX_SESSIONS) || 10000,
    SESSION_SWEEP_CRON: process.env.SESSION_SWEEP_CRON || '*/10 * * * *',

    LOG_LEVEL: process.env.LOG_LEVEL || 'info'
};

export type AppConfig = typeof config;

const REQUIRED_KEYS = [
    'TELEGRAM_BOT_TOKEN',
    'TWITTER_API_KEY',
    'TWITTER_API_SECRET',
    'TWITTER_ACCESS_TOKEN',
    'TWITTER_ACCESS_SECRET',
    'REDDIT_CLIENT_ID',
    'REDDIT_SECRET',
    'REDDIT_USER_AGENT'
] as const satisfies readonly (keyof AppConfig)[];

/**
 * Credentials are checked once at boot. A missing key stops the process
 * instead of surfacing later as a failed lookup.
 */
export function validateConfig(cfg: AppConfig = config): void {
    const missingKeys = REQUIRED_KEYS.filter(key => !cfg[key]);

    if (missingKeys.length > 0) {
        throw new ConfigError(missingKeys);
    }
}
