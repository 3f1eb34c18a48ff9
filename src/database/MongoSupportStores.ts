import { Collections } from './Collections';
import { AuditLogStore, FacilityCatalog, NotificationFailureStore } from './Stores';
import { withStorage } from './storageErrors';
import { AuditLog } from '../types/AuditLog';
import { Facility } from '../types/Facility';
import { NotificationFailure } from '../types/Notification';

// Facilities are maintained by the catalog admin tooling; the engine only reads them
export class MongoFacilityCatalog implements FacilityCatalog {
    constructor(private collections: Collections) {}

    async findById(facilityId: string): Promise<Facility | null> {
        return withStorage('facility read', () =>
            this.collections.facilities.findOne({ id: facilityId, isActive: true })
        );
    }
}

export class MongoAuditLogStore implements AuditLogStore {
    constructor(private collections: Collections) {}

    async insert(log: AuditLog): Promise<void> {
        await withStorage('audit log insert', () => this.collections.auditLogs.insertOne({ ...log }));
    }

    async recent(limit: number): Promise<AuditLog[]> {
        return withStorage('audit log read', () =>
            this.collections.auditLogs.find({}).sort({ timestamp: -1 }).limit(limit).toArray()
        );
    }
}

export class MongoNotificationFailureStore implements NotificationFailureStore {
    constructor(private collections: Collections) {}

    async record(failure: NotificationFailure): Promise<void> {
        await withStorage('notification failure insert', () =>
            this.collections.notificationFailures.insertOne({ ...failure })
        );
    }
}
