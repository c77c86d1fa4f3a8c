import { config } from '../config/env';
import { logger } from '../utils/Logger';
import { toServiceError } from '../utils/errors';
import { withTimeout } from '../utils/withTimeout';
import type { MentionCount, MentionSource } from '../models/types';

export interface SocialMentionServiceOptions {
    limit?: number;
    timeoutMs?: number;
}

export class SocialMentionService {
    private limit: number;
    private timeoutMs: number;

    constructor(private sources: MentionSource[], options: SocialMentionServiceOptions = {}) {
        this.limit = options.limit ?? config.MENTION_RESULT_LIMIT;
        this.timeoutMs = options.timeoutMs ?? config.HTTP_TIMEOUT_MS;
    }

    /**
     * Query every platform in parallel. A platform that fails or times out
     * counts as 0 and does not affect the others.
     */
    async countMentions(address: string): Promise<MentionCount> {
        const counts: MentionCount = { Twitter: 0, Reddit: 0 };

        await Promise.all(this.sources.map(async (source) => {
            try {
                const count = await withTimeout(
                    source.countMentions(address, this.limit),
                    this.timeoutMs,
                    source.platform
                );
                counts[source.platform] = Math.max(0, Math.floor(count));
            } catch (error) {
                const err = toServiceError(source.platform, error);
                logger.warn({ err, code: err.code }, `[Social] ${source.platform} mentions unavailable`);
            }
        }));

        return counts;
    }
}
