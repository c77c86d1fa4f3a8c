import TelegramBot from 'node-telegram-bot-api';
import { logger } from '../utils/Logger';
import type { BotReply, Keyboard } from '../models/types';
import { ConversationController, type ChatResponder } from './ConversationController';

function toInlineKeyboard(keyboard?: Keyboard): TelegramBot.InlineKeyboardMarkup | undefined {
    if (!keyboard) return undefined;
    return {
        inline_keyboard: keyboard.map(row => row.map(button => ({
            text: button.text,
            callback_data: button.callbackData
        })))
    };
}

// `/start`, `/start@BotName` and deep links such as `/start <payload>`
export const START_COMMAND = /^\/start(?:@\w+)?(?:\s+\S+)?$/;

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class TokenSafetyBot {
    private bot: TelegramBot;

    constructor(token: string, private controller: ConversationController) {
        this.bot = new TelegramBot(token, { polling: false });
        this.initHandlers();
    }

    async start() {
        // Polling is started by hand so a 409 (another instance polling) gets its own log line
        try {
            await this.bot.startPolling();
            logger.info('[Telegram] Polling started');
        } catch (err) {
            const message = describeError(err);
            if (message.includes('409')) {
                logger.error('[Telegram] 🚨 409 CONFLICT: another bot instance is already polling with this token.');
            } else {
                logger.error({ err }, `[Telegram] Polling error: ${message}`);
            }
            throw err;
        }
    }

    async stop() {
        logger.info('[Telegram] Stopping bot polling...');
        await this.bot.stopPolling();
    }

    private initHandlers() {
        this.bot.on('polling_error', (err) => {
            logger.error({ err }, `[Telegram] Polling error: ${err.message}`);
        });

        this.bot.onText(START_COMMAND, (msg) => {
            const chat = this.messageResponder(msg.chat.id);
            this.run('start', this.controller.handleStart(this.sessionIdOf(msg), chat));
        });

        this.bot.on('message', (msg) => {
            const text = msg.text;
            if (!text || text.startsWith('/')) return;
            const chat = this.messageResponder(msg.chat.id);
            this.run('text', this.controller.handleText(this.sessionIdOf(msg), text, chat));
        });

        this.bot.on('callback_query', (query) => {
            const data = query.data;
            const message = query.message;
            if (!data || !message) return;

            const sessionId = String(query.from.id);
            const chat = this.callbackResponder(message.chat.id, message.message_id);

            this.run(`callback:${data}`, (async () => {
                await this.bot.answerCallbackQuery(query.id);
                await this.controller.handleCallback(sessionId, data, chat);
            })());
        });
    }

    // Telegram user id keys the session; chat id covers channel posts without a sender.
    private sessionIdOf(msg: TelegramBot.Message): string {
        return String(msg.from?.id ?? msg.chat.id);
    }

    private messageResponder(chatId: number): ChatResponder {
        const send = async (reply: BotReply) => {
            await this.bot.sendMessage(chatId, reply.text, {
                parse_mode: 'HTML',
                disable_web_page_preview: true,
                reply_markup: toInlineKeyboard(reply.keyboard)
            });
        };
        return { send, edit: send };
    }

    private callbackResponder(chatId: number, messageId: number): ChatResponder {
        return {
            send: async (reply) => {
                await this.bot.sendMessage(chatId, reply.text, {
                    parse_mode: 'HTML',
                    disable_web_page_preview: true,
                    reply_markup: toInlineKeyboard(reply.keyboard)
                });
            },
            edit: async (reply) => {
                await this.bot.editMessageText(reply.text, {
                    chat_id: chatId,
                    message_id: messageId,
                    parse_mode: 'HTML',
                    disable_web_page_preview: true,
                    reply_markup: toInlineKeyboard(reply.keyboard)
                });
            }
        };
    }

    private run(label: string, task: Promise<void>) {
        task.catch((err: unknown) => {
            logger.error({ err }, `[Telegram] Handler ${label} failed: ${describeError(err)}`);
        });
    }
}
