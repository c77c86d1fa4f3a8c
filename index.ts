import { config, validateConfig } from './config/env';
import { logger } from './utils/Logger';
import { ConfigError } from './utils/errors';
import { DexScreenerService } from './services/DexScreenerService';
import { RedditMentionSource } from './services/RedditMentionSource';
import { SocialMentionService } from './services/SocialMentionService';
import { TwitterMentionSource } from './twitter/TwitterMentionSource';
import { ReportBuilder } from './core/ReportBuilder';
import { SessionStore } from './core/SessionStore';
import { SessionSweepJob } from './jobs/SessionSweepJob';
import { ConversationController } from './telegram/ConversationController';
import { TokenSafetyBot } from './telegram/TelegramBot';

// Error handling
process.on('uncaughtException', (err) => {
    logger.error({ err }, `Uncaught Exception: ${err.message}`);
});
process.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, 'Unhandled Rejection');
});

async function main() {
    logger.info('🛡 Token Safety Bot Initializing...');

    try {
        validateConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.fatal({ missing: err.missing }, `[Config] ${err.message}`);
            process.exit(1);
        }
        throw err;
    }

    // 1. Services
    const dexScreener = new DexScreenerService();
    const mentions = new SocialMentionService([
        new TwitterMentionSource(),
        new RedditMentionSource()
    ]);

    // 2. Core & State
    const reportBuilder = new ReportBuilder(dexScreener, mentions);
    const sessions = new SessionStore({
        ttlMinutes: config.SESSION_TTL_MINUTES,
        maxSessions: config.MAX_SESSIONS
    });
    const sweepJob = new SessionSweepJob(sessions, config.SESSION_SWEEP_CRON);

    // 3. Chat
    const controller = new ConversationController(sessions, reportBuilder, dexScreener);
    const bot = new TokenSafetyBot(config.TELEGRAM_BOT_TOKEN, controller);

    sweepJob.start();
    await bot.start();
    logger.info('✅ Token Safety Bot Operational.');

    // Graceful Shutdown
    const shutdown = async () => {
        logger.info('🛑 Shutting down...');
        sweepJob.stop();
        await bot.stop();
        process.exit(0);
    };

    const onSignal = () => {
        shutdown().catch((err: unknown) => {
            logger.error({ err }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.once('SIGINT', onSignal);
    process.once('SIGTERM', onSignal);
}

main().catch((err: unknown) => {
    logger.fatal({ err }, 'Startup failed');
    process.exit(1);
});
