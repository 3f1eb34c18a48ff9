import { ConversationStore } from '../cache/ConversationStore';
import { EventRouter } from '../components/EventRouter';
import {
    AdminAuthorization,
    ApplicationLifecycleManager,
    AuditLogManager,
    ConversationManager,
    NotificationDispatcher,
    OutboxRelay,
    RateLimiter,
    UserManager
} from '../managers';
import { Facility } from '../types/Facility';
import { User, UserRole } from '../types/User';
import {
    InMemoryApplicationStore,
    InMemoryAuditLogStore,
    InMemoryFacilityCatalog,
    InMemoryUserStore
} from './InMemoryStores';
import { InMemoryNotificationQueue } from './InMemoryNotificationQueue';
import { InMemorySharedCache } from './InMemorySharedCache';

export const TEST_FACILITY: Facility = {
    id: 'fok-north',
    name: 'North District Sports Complex',
    district: 'North',
    address: '1 Stadium Road',
    sports: ['Swimming', 'Volleyball', 'Table tennis'],
    isActive: true
};

export const CLOSED_FACILITY: Facility = {
    id: 'fok-closed',
    name: 'Old Arena',
    district: 'South',
    address: '9 Quiet Lane',
    sports: ['Boxing'],
    isActive: false
};

export const buildUser = (id: string, overrides: Partial<User> = {}): User => ({
    id,
    telegramChatId: parseInt(id, 10),
    displayName: `User ${id}`,
    phone: '+79001234567',
    role: 'none',
    registrationState: 'completed',
    blocked: false,
    totalApplications: 0,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    lastActive: new Date('2024-01-01T00:00:00Z'),
    ...overrides
});

export interface HarnessOptions {
    superAdminIds?: number[];
    maxTransitionAttempts?: number;
    rateLimit?: number;
    rateWindowSeconds?: number;
    pageSize?: number;
}

/**
 * Wires every manager against in-process stores with a controllable clock.
 */
export const createHarness = (options: HarnessOptions = {}) => {
    let now = new Date('2024-03-01T10:00:00.000Z');
    const clock = () => now;

    const users = new InMemoryUserStore();
    const applications = new InMemoryApplicationStore();
    const facilities = new InMemoryFacilityCatalog([TEST_FACILITY, CLOSED_FACILITY]);
    const auditStore = new InMemoryAuditLogStore();
    const queue = new InMemoryNotificationQueue();
    const cache = new InMemorySharedCache(() => now.getTime());

    const audit = new AuditLogManager(auditStore);
    const authorization = new AdminAuthorization(users, audit, options.superAdminIds ?? []);
    const dispatcher = new NotificationDispatcher(queue);
    const lifecycle = new ApplicationLifecycleManager(
        { applications, users, facilities, authorization, dispatcher, audit },
        { maxTransitionAttempts: options.maxTransitionAttempts ?? 3, pageSize: options.pageSize ?? 10, clock }
    );
    const conversations = new ConversationManager(
        new ConversationStore(cache),
        users,
        facilities,
        lifecycle,
        { ttlMinutes: 30 }
    );
    const rateLimiter = new RateLimiter(cache, {
        limit: options.rateLimit ?? 30,
        windowSeconds: options.rateWindowSeconds ?? 60
    });
    const userManager = new UserManager(users, authorization, audit);
    const router = new EventRouter({ rateLimiter, users: userManager, conversations, lifecycle, authorization, audit });
    const relay = new OutboxRelay(applications, lifecycle);

    return {
        users,
        applications,
        facilities,
        auditStore,
        queue,
        cache,
        audit,
        authorization,
        lifecycle,
        conversations,
        rateLimiter,
        userManager,
        router,
        relay,
        now: () => now,
        advance: (ms: number) => {
            now = new Date(now.getTime() + ms);
        },
        seedUser: (id: string, role: UserRole = 'none', overrides: Partial<User> = {}): User => {
            const user = buildUser(id, { role, ...overrides });
            users.put(user);
            return user;
        }
    };
};

export type Harness = ReturnType<typeof createHarness>;
