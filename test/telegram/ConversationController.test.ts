import { beforeEach, describe, expect, it, vi } from 'vitest';

import { SessionStore } from '../../core/SessionStore';
import { ConversationController, type ChatResponder } from '../../telegram/ConversationController';
import {
    ANALYSIS_FOLLOW_UP,
    BACK_TO_MENU,
    MAIN_MENU,
    MESSAGES,
    RUG_PULL_FOLLOW_UP,
    START_OVER,
    formatBoostedTokens,
    formatFullAnalysis,
    formatRugPullScan
} from '../../telegram/ReportFormatter';
import type { BoostedToken, BotReply, TokenReport } from '../../models/types';

const ADDRESS = '7xKXtg2CW87d97TXJSDpbD5jBkheTqA83TZRuJosgAsU';

class RecordingChat implements ChatResponder {
    sent: BotReply[] = [];
    edited: BotReply[] = [];

    async send(reply: BotReply) {
        this.sent.push(reply);
    }

    async edit(reply: BotReply) {
        this.edited.push(reply);
    }
}

function reportFor(address: string, withPair = true): TokenReport {
    return {
        address,
        chain: 'Solana',
        pair: withPair ? { dexId: 'raydium', liquidityUsd: 15000, marketCapUsd: 80000, priceChangePercent24h: 60, priceChangeH24: 60 } : null,
        verdict: withPair
            ? {
                tier: 'MODERATE',
                factors: {
                    liquidityUsd: 15000,
                    marketCapUsd: 80000,
                    fdvUsd: 0,
                    priceChangePercent24h: 60,
                    liquidityLevel: 'Medium',
                    marketCapLevel: 'Low',
                    priceChangeLevel: 'Stable',
                    fdvRelation: 'FDV Lower Than Market Cap'
                }
            }
            : null,
        mentions: { Twitter: 2, Reddit: 0 }
    };
}

describe('ConversationController', () => {
    let sessions: SessionStore;
    let buildReport: ReturnType<typeof vi.fn<(address: string) => Promise<TokenReport>>>;
    let getBoostedTokens: ReturnType<typeof vi.fn<() => Promise<BoostedToken[]>>>;
    let controller: ConversationController;
    let chat: RecordingChat;

    beforeEach(() => {
        sessions = new SessionStore({ ttlMinutes: 60, maxSessions: 100 });
        buildReport = vi.fn(async (address: string) => reportFor(address));
        getBoostedTokens = vi.fn(async () => []);
        controller = new ConversationController(sessions, { buildReport }, { getBoostedTokens });
        chat = new RecordingChat();
    });

    it('greets with the main menu on /start', async () => {
        await controller.handleStart('1', chat);

        expect(chat.sent).toEqual([{ text: MESSAGES.welcome, keyboard: MAIN_MENU }]);
        expect(sessions.get('1').selectedOption).toBe('none');
    });

    it('runs the full analysis after "Analyze Token"', async () => {
        await controller.handleCallback('1', 'analyze_token', chat);
        await controller.handleText('1', `  ${ADDRESS} `, chat);

        expect(chat.edited).toEqual([{ text: MESSAGES.askAddress }]);
        expect(buildReport).toHaveBeenCalledWith(ADDRESS);
        expect(chat.sent).toEqual([
            { text: MESSAGES.analyzing(ADDRESS) },
            { text: formatFullAnalysis(reportFor(ADDRESS)), keyboard: ANALYSIS_FOLLOW_UP }
        ]);
        expect(sessions.get('1').lastTokenAddress).toBe(ADDRESS);
    });

    it('runs the rug pull scan after "Rug Pull Scanner"', async () => {
        await controller.handleCallback('1', 'rug_pull_scan', chat);
        await controller.handleText('1', ADDRESS, chat);

        expect(chat.edited).toEqual([{ text: MESSAGES.askRugPullAddress }]);
        expect(chat.sent).toEqual([
            { text: MESSAGES.checkingRugPull(ADDRESS) },
            { text: formatRugPullScan(reportFor(ADDRESS)), keyboard: RUG_PULL_FOLLOW_UP }
        ]);
    });

    it('rejects a malformed address without touching the pipeline', async () => {
        await controller.handleCallback('1', 'analyze_token', chat);
        await controller.handleText('1', 'not-an-address', chat);

        expect(chat.sent).toEqual([{ text: MESSAGES.invalidAddress, keyboard: START_OVER }]);
        expect(buildReport).not.toHaveBeenCalled();
        expect(sessions.get('1').lastTokenAddress).toBeUndefined();
    });

    it('asks for an option when an address arrives first, and remembers it', async () => {
        await controller.handleText('1', ADDRESS, chat);

        expect(chat.sent).toEqual([{ text: MESSAGES.chooseOption, keyboard: MAIN_MENU }]);
        expect(buildReport).not.toHaveBeenCalled();
        expect(sessions.get('1').lastTokenAddress).toBe(ADDRESS);
    });

    it('builds the full analysis for the last address from the rug pull follow-up', async () => {
        await controller.handleCallback('1', 'rug_pull_scan', chat);
        await controller.handleText('1', ADDRESS, chat);
        chat = new RecordingChat();

        await controller.handleCallback('1', 'full_analysis', chat);

        expect(chat.edited).toEqual([
            { text: MESSAGES.fetchingFullAnalysis },
            { text: formatFullAnalysis(reportFor(ADDRESS)), keyboard: ANALYSIS_FOLLOW_UP }
        ]);
    });

    it('explains when full analysis has no address to work with', async () => {
        await controller.handleCallback('1', 'full_analysis', chat);

        expect(chat.edited).toEqual([
            { text: MESSAGES.fetchingFullAnalysis },
            { text: MESSAGES.noStoredAddress, keyboard: BACK_TO_MENU }
        ]);
        expect(buildReport).not.toHaveBeenCalled();
    });

    it('explains when full analysis finds no market', async () => {
        buildReport.mockImplementation(async (address: string) => reportFor(address, false));
        await controller.handleText('1', ADDRESS, chat);

        await controller.handleCallback('1', 'full_analysis', chat);

        expect(chat.edited).toEqual([
            { text: MESSAGES.fetchingFullAnalysis },
            { text: MESSAGES.noPairData, keyboard: BACK_TO_MENU }
        ]);
    });

    it('lists boosted tokens', async () => {
        const tokens: BoostedToken[] = [{ chainId: 'solana', tokenAddress: ADDRESS, totalAmount: 100 }];
        getBoostedTokens.mockResolvedValue(tokens);

        await controller.handleCallback('1', 'top_tokens', chat);

        expect(chat.edited).toEqual([
            { text: MESSAGES.fetchingTopTokens },
            { text: formatBoostedTokens(tokens), keyboard: BACK_TO_MENU }
        ]);
    });

    it('returns to the main menu from "Go Back" and "Start Over"', async () => {
        await controller.handleCallback('1', 'go_back_to_menu', chat);
        await controller.handleCallback('1', 'start', chat);

        expect(chat.edited).toEqual([
            { text: MESSAGES.welcomeBack, keyboard: MAIN_MENU },
            { text: MESSAGES.welcomeBack, keyboard: MAIN_MENU }
        ]);
    });

    it('clears the session on exit', async () => {
        await controller.handleCallback('1', 'analyze_token', chat);
        await controller.handleCallback('1', 'exit', chat);

        expect(chat.edited[1]).toEqual({ text: MESSAGES.goodbye });

        await controller.handleText('1', ADDRESS, chat);
        expect(chat.sent).toEqual([{ text: MESSAGES.chooseOption, keyboard: MAIN_MENU }]);
    });

    it('ignores unknown callbacks', async () => {
        await controller.handleCallback('1', 'launch_rocket', chat);

        expect(chat.sent).toEqual([]);
        expect(chat.edited).toEqual([]);
    });

    it('keeps each user\'s selection separate', async () => {
        await controller.handleCallback('alice', 'analyze_token', chat);
        const bobChat = new RecordingChat();

        await controller.handleText('bob', ADDRESS, bobChat);

        expect(bobChat.sent).toEqual([{ text: MESSAGES.chooseOption, keyboard: MAIN_MENU }]);
        expect(sessions.get('alice').selectedOption).toBe('analyze_token');
        expect(sessions.get('alice').lastTokenAddress).toBeUndefined();
    });
});
