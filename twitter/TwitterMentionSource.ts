import { TwitterApi } from 'twitter-api-v2';
import { config } from '../config/env';
import type { MentionSource } from '../models/types';

// Recent search rejects max_results below 10
const MIN_SEARCH_RESULTS = 10;

/**
 * The slice of the v2 read-only client this source uses.
 */
export interface TweetSearcher {
    search(query: string, options: { max_results: number }): Promise<{ tweets: readonly unknown[] }>;
}

export class TwitterMentionSource implements MentionSource {
    readonly platform = 'Twitter' as const;
    private searcher: TweetSearcher;

    constructor(searcher?: TweetSearcher) {
        this.searcher = searcher ?? new TwitterApi({
            appKey: config.TWITTER_API_KEY,
            appSecret: config.TWITTER_API_SECRET,
            accessToken: config.TWITTER_ACCESS_TOKEN,
            accessSecret: config.TWITTER_ACCESS_SECRET,
        }).readOnly.v2;
    }

    async countMentions(query: string, limit: number): Promise<number> {
        const result = await this.searcher.search(query, {
            max_results: Math.max(MIN_SEARCH_RESULTS, limit)
        });
        return Math.min(result.tweets.length, limit);
    }
}
