import { Markup, Telegram } from 'telegraf';
import { Reply } from '../types/InboundEvent';
import { MessageSender } from '../managers/NotificationDelivery';

export const CONTACT_BUTTON_TEXT = '📱 Share phone number';

/**
 * Sends replies and notifications through the Bot API, turning keyboard descriptions
 * into telegraf markup.
 */
export class TelegramSender implements MessageSender {
    private telegram: Telegram;

    constructor(telegram: Telegram) {
        this.telegram = telegram;
    }

    async sendMessage(chatId: number, text: string): Promise<void> {
        await this.telegram.sendMessage(chatId, text);
    }

    async sendReply(chatId: number, reply: Reply): Promise<void> {
        const keyboard = reply.keyboard;
        if (!keyboard) {
            await this.telegram.sendMessage(chatId, reply.text);
            return;
        }

        switch (keyboard.kind) {
            case 'request_contact':
                await this.telegram.sendMessage(
                    chatId,
                    reply.text,
                    Markup.keyboard([[Markup.button.contactRequest(CONTACT_BUTTON_TEXT)]]).resize().oneTime()
                );
                return;
            case 'remove':
                await this.telegram.sendMessage(chatId, reply.text, Markup.removeKeyboard());
                return;
            case 'inline':
                await this.telegram.sendMessage(
                    chatId,
                    reply.text,
                    Markup.inlineKeyboard(
                        keyboard.buttons.map(row => row.map(button => Markup.button.callback(button.text, button.data)))
                    )
                );
                return;
        }
    }
}
