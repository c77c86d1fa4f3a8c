import { logger } from '../utils/Logger';
import { isValidTokenAddress } from '../core/AddressClassifier';
import { SessionStore } from '../core/SessionStore';
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
} from './ReportFormatter';
import { CALLBACK_IDS } from '../models/types';
import type { BoostedToken, BotReply, CallbackId, TokenReport } from '../models/types';

/**
 * Where replies go. `edit` rewrites the message that carried the pressed
 * button; transports without one fall back to sending.
 */
export interface ChatResponder {
    send(reply: BotReply): Promise<void>;
    edit(reply: BotReply): Promise<void>;
}

export interface ReportSource {
    buildReport(address: string): Promise<TokenReport>;
}

export interface BoostedTokenSource {
    getBoostedTokens(): Promise<BoostedToken[]>;
}

function isCallbackId(value: string): value is CallbackId {
    return CALLBACK_IDS.some(id => id === value);
}

/**
 * Menu-and-prompt dialogue, independent of the chat transport.
 * One entry point per callback id, plus /start and free-text addresses.
 */
export class ConversationController {
    constructor(
        private sessions: SessionStore,
        private reports: ReportSource,
        private boosted: BoostedTokenSource
    ) { }

    async handleStart(sessionId: string, chat: ChatResponder): Promise<void> {
        this.sessions.update(sessionId, { selectedOption: 'none' });
        logger.info(`[Bot] Session ${sessionId} started`);
        await chat.send({ text: MESSAGES.welcome, keyboard: MAIN_MENU });
    }

    async handleCallback(sessionId: string, data: string, chat: ChatResponder): Promise<void> {
        if (!isCallbackId(data)) {
            logger.warn(`[Bot] Ignoring unknown callback "${data}" from ${sessionId}`);
            return;
        }

        switch (data) {
            case 'analyze_token':
                return this.analyzeToken(sessionId, chat);
            case 'rug_pull_scan':
                return this.rugPullScan(sessionId, chat);
            case 'full_analysis':
                return this.fullAnalysis(sessionId, chat);
            case 'top_tokens':
                return this.topTokens(chat);
            case 'go_back_to_menu':
            case 'start':
                return this.goBackToMenu(chat);
            case 'exit':
                return this.exit(sessionId, chat);
        }
    }

    async analyzeToken(sessionId: string, chat: ChatResponder): Promise<void> {
        this.sessions.update(sessionId, { selectedOption: 'analyze_token' });
        await chat.edit({ text: MESSAGES.askAddress });
    }

    async rugPullScan(sessionId: string, chat: ChatResponder): Promise<void> {
        this.sessions.update(sessionId, { selectedOption: 'rug_pull_scan' });
        await chat.edit({ text: MESSAGES.askRugPullAddress });
    }

    async fullAnalysis(sessionId: string, chat: ChatResponder): Promise<void> {
        await chat.edit({ text: MESSAGES.fetchingFullAnalysis });

        const address = this.sessions.get(sessionId).lastTokenAddress;
        if (!address) {
            await chat.edit({ text: MESSAGES.noStoredAddress, keyboard: BACK_TO_MENU });
            return;
        }

        const report = await this.reports.buildReport(address);
        if (!report.pair) {
            await chat.edit({ text: MESSAGES.noPairData, keyboard: BACK_TO_MENU });
            return;
        }

        await chat.edit({ text: formatFullAnalysis(report), keyboard: ANALYSIS_FOLLOW_UP });
    }

    async topTokens(chat: ChatResponder): Promise<void> {
        await chat.edit({ text: MESSAGES.fetchingTopTokens });
        const tokens = await this.boosted.getBoostedTokens();
        await chat.edit({ text: formatBoostedTokens(tokens), keyboard: BACK_TO_MENU });
    }

    async goBackToMenu(chat: ChatResponder): Promise<void> {
        await chat.edit({ text: MESSAGES.welcomeBack, keyboard: MAIN_MENU });
    }

    async exit(sessionId: string, chat: ChatResponder): Promise<void> {
        this.sessions.reset(sessionId);
        logger.info(`[Bot] Session ${sessionId} exited`);
        await chat.edit({ text: MESSAGES.goodbye });
    }

    /**
     * Free-text input. Only well-formed addresses reach the report pipeline;
     * what runs next depends on the option chosen from the menu.
     */
    async handleText(sessionId: string, input: string, chat: ChatResponder): Promise<void> {
        const address = input.trim();

        if (!isValidTokenAddress(address)) {
            await chat.send({ text: MESSAGES.invalidAddress, keyboard: START_OVER });
            return;
        }

        const state = this.sessions.update(sessionId, { lastTokenAddress: address });

        switch (state.selectedOption) {
            case 'analyze_token': {
                await chat.send({ text: MESSAGES.analyzing(address) });
                const report = await this.reports.buildReport(address);
                await chat.send({ text: formatFullAnalysis(report), keyboard: ANALYSIS_FOLLOW_UP });
                return;
            }
            case 'rug_pull_scan': {
                await chat.send({ text: MESSAGES.checkingRugPull(address) });
                const report = await this.reports.buildReport(address);
                await chat.send({ text: formatRugPullScan(report), keyboard: RUG_PULL_FOLLOW_UP });
                return;
            }
            case 'none':
                await chat.send({ text: MESSAGES.chooseOption, keyboard: MAIN_MENU });
                return;
        }
    }
}
