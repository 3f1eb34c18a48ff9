import { Collection, Db } from 'mongodb';
import { User } from '../types/User';
import { Facility } from '../types/Facility';
import { Application } from '../types/Application';
import { AuditLog } from '../types/AuditLog';
import { NotificationFailure } from '../types/Notification';
import { COLLECTIONS } from '../models/utils';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('collections');

export class Collections {
    private db: Db;

    public users: Collection<User>;
    public facilities: Collection<Facility>;
    public applications: Collection<Application>;
    public auditLogs: Collection<AuditLog>;
    public notificationFailures: Collection<NotificationFailure>;

    constructor(db: Db) {
        this.db = db;

        this.users = db.collection<User>(COLLECTIONS.USERS);
        this.facilities = db.collection<Facility>(COLLECTIONS.FACILITIES);
        this.applications = db.collection<Application>(COLLECTIONS.APPLICATIONS);
        this.auditLogs = db.collection<AuditLog>(COLLECTIONS.AUDIT_LOGS);
        this.notificationFailures = db.collection<NotificationFailure>(COLLECTIONS.NOTIFICATION_FAILURES);
    }

    async initializeCollections(): Promise<void> {
        log.info('Initializing MongoDB collections and indexes...');

        try {
            await this.users.createIndex({ id: 1 }, { unique: true });
            await this.users.createIndex({ telegramChatId: 1 });
            await this.users.createIndex({ role: 1 });

            await this.facilities.createIndex({ id: 1 }, { unique: true });

            await this.applications.createIndex({ id: 1 }, { unique: true });
            await this.applications.createIndex({ userId: 1, createdAt: -1 });
            await this.applications.createIndex({ status: 1, createdAt: -1 });
            // Idempotency key: at most one pending application per (user, facility, sport)
            await this.applications.createIndex(
                { userId: 1, facilityId: 1, sport: 1 },
                { unique: true, partialFilterExpression: { status: 'pending' }, name: 'pending_application_key' }
            );
            await this.applications.createIndex({ 'outbox.id': 1 }, { sparse: true });

            await this.auditLogs.createIndex({ logId: 1 }, { unique: true });
            await this.auditLogs.createIndex({ adminId: 1 });
            await this.auditLogs.createIndex({ timestamp: -1 });

            await this.notificationFailures.createIndex({ notificationId: 1 });
            await this.notificationFailures.createIndex({ failedAt: -1 });

            log.info('Successfully initialized all collections and indexes');
        } catch (error) {
            log.error('Error initializing collections', errorMeta(error));
            throw error;
        }
    }

    async ensureCollectionsExist(): Promise<void> {
        const existingCollections = await this.db.listCollections().toArray();
        const existingNames = existingCollections.map(col => col.name);

        for (const collectionName of Object.values(COLLECTIONS)) {
            if (!existingNames.includes(collectionName)) {
                await this.db.createCollection(collectionName);
                log.info(`Created collection: ${collectionName}`);
            }
        }
    }
}
