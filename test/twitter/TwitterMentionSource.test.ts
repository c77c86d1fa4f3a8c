import { describe, expect, it, vi } from 'vitest';

import { TwitterMentionSource, type TweetSearcher } from '../../twitter/TwitterMentionSource';

function searcherReturning(count: number): TweetSearcher {
    return {
        search: vi.fn(async () => ({ tweets: Array.from({ length: count }, (_, i) => ({ id: String(i) })) }))
    };
}

describe('TwitterMentionSource', () => {
    it('asks for at least the minimum page size the API accepts', async () => {
        const searcher = searcherReturning(2);
        const source = new TwitterMentionSource(searcher);

        expect(await source.countMentions('0xabc', 5)).toBe(2);
        expect(searcher.search).toHaveBeenCalledWith('0xabc', { max_results: 10 });
    });

    it('caps the count at the requested limit', async () => {
        const source = new TwitterMentionSource(searcherReturning(10));

        expect(await source.countMentions('0xabc', 5)).toBe(5);
    });

    it('propagates search failures to the aggregator', async () => {
        const source = new TwitterMentionSource({
            search: async () => { throw new Error('429 Too Many Requests'); }
        });

        await expect(source.countMentions('0xabc', 5)).rejects.toThrow('429 Too Many Requests');
    });
});
