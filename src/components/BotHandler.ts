import { Telegraf, Context } from 'telegraf';
import Redis from 'ioredis';
import { AppConfig } from '../config/Config';
import {
    DatabaseManager,
    MongoApplicationStore,
    MongoAuditLogStore,
    MongoFacilityCatalog,
    MongoNotificationFailureStore,
    MongoUserStore
} from '../database';
import { ConversationStore } from '../cache/ConversationStore';
import { connectRedis, createRedisClient } from '../cache/RedisConnection';
import { RedisSharedCache } from '../cache/RedisSharedCache';
import { BullNotificationQueue, connectionFromUrl } from '../queue/BullNotificationQueue';
import { NotificationWorker } from '../queue/NotificationWorker';
import {
    AdminAuthorization,
    ApplicationLifecycleManager,
    AuditLogManager,
    ConversationManager,
    NotificationDelivery,
    NotificationDispatcher,
    OutboxRelay,
    RateLimiter,
    UserManager
} from '../managers';
import { InboundEvent } from '../types/InboundEvent';
import { MESSAGES } from '../texts/messages';
import { EventRouter } from './EventRouter';
import { TelegramSender } from './TelegramSender';
import { createLogger, errorMeta, logger } from '../utils/logger';

const log = createLogger('bot');

export interface SenderProfile {
    id: number;
    first_name: string;
    last_name?: string;
    username?: string;
}

export interface ParsedCommand {
    command: string;
    args: string[];
}

/**
 * Splits "/cmd@botname arg1 arg2" into its parts. Returns null for plain text.
 */
export const parseCommand = (text: string): ParsedCommand | null => {
    const trimmed = text.trim();
    if (!trimmed.startsWith('/')) {
        return null;
    }
    const [head, ...args] = trimmed.split(/\s+/);
    const command = head.slice(1).split('@')[0].toLowerCase();
    if (!command) {
        return null;
    }
    return { command, args };
};

// Users are keyed by their private chat; group and channel updates are not served
export const isPrivateChat = (chat: { type: string } | undefined): boolean => chat?.type === 'private';

export const displayNameOf = (from: SenderProfile): string => {
    const fullName = [from.first_name, from.last_name].filter(Boolean).join(' ').trim();
    return fullName || from.username || `user${from.id}`;
};

export const textEvent = (from: SenderProfile, chatId: number, text: string, timestamp: Date): InboundEvent => {
    const base = { userId: from.id.toString(), chatId, displayName: displayNameOf(from), timestamp };
    const parsed = parseCommand(text);
    if (parsed) {
        return { ...base, type: 'command', text, command: parsed.command, args: parsed.args };
    }
    return { ...base, type: 'text', text };
};

/**
 * Only a contact that belongs to the sender carries a phone; forwarded contacts of
 * other people arrive without one and fail phone validation.
 */
export const contactEvent = (
    from: SenderProfile,
    chatId: number,
    contact: { phone_number: string; user_id?: number },
    timestamp: Date
): InboundEvent => ({
    userId: from.id.toString(),
    chatId,
    displayName: displayNameOf(from),
    type: 'contact',
    timestamp,
    ...(contact.user_id === from.id ? { phone: contact.phone_number } : {})
});

// Bot Handler Component - wires storage, queue and managers to Telegram updates
export class BotHandler {
    private config: AppConfig;
    private bot: Telegraf<Context> | null = null;
    private dbManager: DatabaseManager | null = null;
    private redis: Redis | null = null;
    private queue: BullNotificationQueue | null = null;
    private worker: NotificationWorker | null = null;
    private relay: OutboxRelay | null = null;
    private router: EventRouter | null = null;
    private sender: TelegramSender | null = null;

    constructor(config: AppConfig) {
        this.config = config;
    }

    async initialize(): Promise<void> {
        logger.setLevel(this.config.logLevel);

        this.dbManager = new DatabaseManager(this.config.mongodbUri, this.config.mongodbDbName);
        const collections = await this.dbManager.initialize();

        this.redis = createRedisClient(this.config.redisUrl);
        await connectRedis(this.redis);
        const cache = new RedisSharedCache(this.redis);

        const queueConnection = connectionFromUrl(this.config.redisUrl);
        this.queue = new BullNotificationQueue(queueConnection, this.config.notificationMaxAttempts);

        const userStore = new MongoUserStore(collections);
        const applicationStore = new MongoApplicationStore(collections);
        const facilities = new MongoFacilityCatalog(collections);

        const audit = new AuditLogManager(new MongoAuditLogStore(collections));
        const authorization = new AdminAuthorization(userStore, audit, this.config.superAdminIds);
        const lifecycle = new ApplicationLifecycleManager(
            {
                applications: applicationStore,
                users: userStore,
                facilities,
                authorization,
                dispatcher: new NotificationDispatcher(this.queue),
                audit
            },
            { maxTransitionAttempts: this.config.transitionMaxAttempts, pageSize: this.config.maxItemsPerPage }
        );

        this.router = new EventRouter({
            rateLimiter: new RateLimiter(cache, {
                limit: this.config.rateLimitRequests,
                windowSeconds: this.config.rateLimitWindowSeconds
            }),
            users: new UserManager(userStore, authorization, audit),
            conversations: new ConversationManager(
                new ConversationStore(cache),
                userStore,
                facilities,
                lifecycle,
                { ttlMinutes: this.config.conversationTtlMinutes }
            ),
            lifecycle,
            authorization,
            audit
        });

        this.bot = new Telegraf(this.config.botToken);
        const sender = new TelegramSender(this.bot.telegram);
        this.sender = sender;

        const delivery = new NotificationDelivery(
            sender,
            authorization,
            new MongoNotificationFailureStore(collections),
            this.config.adminChatId
        );
        this.worker = new NotificationWorker(queueConnection, delivery);
        this.worker.start();

        this.relay = new OutboxRelay(applicationStore, lifecycle);
        this.relay.start(this.config.outboxRelayIntervalSeconds);

        this.bot.catch(async (error: unknown, ctx) => {
            log.error('Telegram bot error', { updateId: ctx.update.update_id, ...errorMeta(error) });
            if (!ctx.chat) {
                return;
            }
            try {
                await ctx.reply(MESSAGES.genericError);
            } catch (replyError) {
                log.warn('Failed to send error reply', errorMeta(replyError));
            }
        });

        this.registerHandlers();

        this.bot
            .launch(() => log.info('Bot launched'))
            .catch(error => log.error('Bot polling stopped with an error', errorMeta(error)));
    }

    async shutdown(): Promise<void> {
        if (this.bot) {
            this.bot.stop();
            this.bot = null;
        }

        if (this.relay) {
            this.relay.stop();
            this.relay = null;
        }

        if (this.worker) {
            await this.worker.stop();
            this.worker = null;
        }

        if (this.queue) {
            await this.queue.close();
            this.queue = null;
        }

        if (this.redis) {
            await this.redis.quit();
            this.redis = null;
        }

        if (this.dbManager) {
            await this.dbManager.disconnect();
            this.dbManager = null;
        }
    }

    private registerHandlers(): void {
        if (!this.bot) {
            throw new Error('BotHandler not initialized.');
        }

        this.bot.use(async (ctx, next) => {
            if (!isPrivateChat(ctx.chat)) {
                log.debug('Ignoring update outside a private chat', { chatId: ctx.chat?.id, type: ctx.chat?.type });
                return;
            }
            await next();
        });

        this.bot.on('text', async ctx => {
            await this.dispatch(ctx.chat.id, textEvent(ctx.from, ctx.chat.id, ctx.message.text, new Date()));
        });

        this.bot.on('contact', async ctx => {
            await this.dispatch(ctx.chat.id, contactEvent(ctx.from, ctx.chat.id, ctx.message.contact, new Date()));
        });

        this.bot.on('callback_query', async ctx => {
            const query = ctx.callbackQuery;
            await ctx.answerCbQuery();
            if (!('data' in query) || !ctx.chat) {
                return;
            }
            await this.dispatch(ctx.chat.id, {
                userId: query.from.id.toString(),
                chatId: ctx.chat.id,
                displayName: displayNameOf(query.from),
                type: 'callback',
                data: query.data,
                timestamp: new Date()
            });
        });

        this.bot.on('message', async ctx => {
            await this.dispatch(ctx.chat.id, {
                userId: ctx.from.id.toString(),
                chatId: ctx.chat.id,
                displayName: displayNameOf(ctx.from),
                type: 'other',
                timestamp: new Date()
            });
        });
    }

    private async dispatch(chatId: number, event: InboundEvent): Promise<void> {
        if (!this.router || !this.sender) {
            throw new Error('BotHandler not initialized.');
        }

        const replies = await this.router.handle(event);
        for (const reply of replies) {
            await this.sender.sendReply(chatId, reply);
        }
    }
}
