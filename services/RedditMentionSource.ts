import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { config } from '../config/env';
import { logger } from '../utils/Logger';
import type { MentionSource } from '../models/types';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const SEARCH_URL = 'https://oauth.reddit.com/r/all/search';

// Refresh this long before Reddit says the token expires
const TOKEN_EXPIRY_MARGIN_MS = 60000;

const AccessTokenSchema = z.object({
    access_token: z.string(),
    expires_in: z.number()
});

const SearchListingSchema = z.object({
    data: z.object({
        children: z.array(z.unknown())
    })
});

export interface RedditCredentials {
    clientId: string;
    clientSecret: string;
    userAgent: string;
}

export class RedditMentionSource implements MentionSource {
    readonly platform = 'Reddit' as const;

    private http: AxiosInstance;
    private accessToken: string | null = null;
    private tokenExpiresAt = 0;

    constructor(
        private credentials: RedditCredentials = {
            clientId: config.REDDIT_CLIENT_ID,
            clientSecret: config.REDDIT_SECRET,
            userAgent: config.REDDIT_USER_AGENT
        },
        http?: AxiosInstance,
        private now: () => number = Date.now
    ) {
        this.http = http ?? axios.create({ timeout: config.HTTP_TIMEOUT_MS });
    }

    /**
     * Number of r/all search results for the query, at most `limit`.
     */
    async countMentions(query: string, limit: number): Promise<number> {
        const token = await this.getAccessToken();

        const response = await this.http.get<unknown>(SEARCH_URL, {
            params: { q: query, limit, sort: 'new', type: 'link' },
            headers: {
                Authorization: `Bearer ${token}`,
                'User-Agent': this.credentials.userAgent
            }
        });

        const listing = SearchListingSchema.parse(response.data);
        return Math.min(listing.data.children.length, limit);
    }

    private async getAccessToken(): Promise<string> {
        if (this.accessToken && this.now() < this.tokenExpiresAt) {
            return this.accessToken;
        }

        const response = await this.http.post<unknown>(
            TOKEN_URL,
            new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
            {
                auth: { username: this.credentials.clientId, password: this.credentials.clientSecret },
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    'User-Agent': this.credentials.userAgent
                }
            }
        );

        const body = AccessTokenSchema.parse(response.data);
        this.accessToken = body.access_token;
        this.tokenExpiresAt = this.now() + body.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS;
        logger.debug('[Reddit] Access token refreshed');
        return body.access_token;
    }
}
