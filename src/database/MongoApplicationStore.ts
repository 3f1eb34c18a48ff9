import { Collection } from 'mongodb';
import { Collections } from './Collections';
import { ApplicationStore, ApplicationTransitionWrite, InsertApplicationResult, PageRequest } from './Stores';
import { isDuplicateKeyError, withStorage } from './storageErrors';
import { Application, ApplicationStatus, Page } from '../types/Application';
import { emptyStatusCounts } from '../models/validation';

export class MongoApplicationStore implements ApplicationStore {
    private applications: Collection<Application>;

    constructor(collections: Collections) {
        this.applications = collections.applications;
    }

    async findById(applicationId: string): Promise<Application | null> {
        return withStorage('application read', () => this.applications.findOne({ id: applicationId }));
    }

    async findPending(userId: string, facilityId: string, sport: string): Promise<Application | null> {
        return withStorage('application read', () =>
            this.applications.findOne({ userId, facilityId, sport, status: 'pending' })
        );
    }

    async insert(application: Application): Promise<InsertApplicationResult> {
        return withStorage('application insert', async () => {
            try {
                await this.applications.insertOne({ ...application });
                return { inserted: true, application };
            } catch (error) {
                if (!isDuplicateKeyError(error)) {
                    throw error;
                }
                // The pending_application_key index rejected a concurrent duplicate
                const existing = await this.findPending(application.userId, application.facilityId, application.sport);
                if (!existing) {
                    throw error;
                }
                return { inserted: false, application: existing };
            }
        });
    }

    async compareAndSwap(
        applicationId: string,
        expectedVersion: number,
        write: ApplicationTransitionWrite
    ): Promise<Application | null> {
        return withStorage('application transition', () =>
            this.applications.findOneAndUpdate(
                { id: applicationId, version: expectedVersion },
                {
                    $set: { status: write.status, updatedAt: write.updatedAt },
                    $inc: { version: 1 },
                    $push: {
                        statusHistory: write.historyEntry,
                        outbox: { $each: write.notifications }
                    }
                },
                { returnDocument: 'after' }
            )
        );
    }

    async removeFromOutbox(applicationId: string, notificationIds: string[]): Promise<void> {
        if (notificationIds.length === 0) {
            return;
        }
        await withStorage('application outbox', () =>
            this.applications.updateOne(
                { id: applicationId },
                { $pull: { outbox: { id: { $in: notificationIds } } } }
            )
        );
    }

    async findWithPendingOutbox(limit: number): Promise<Application[]> {
        return withStorage('application outbox scan', () =>
            this.applications
                .find({ outbox: { $exists: true, $ne: [] } })
                .sort({ updatedAt: 1 })
                .limit(limit)
                .toArray()
        );
    }

    async countByUser(userId: string): Promise<number> {
        return withStorage('application count', () => this.applications.countDocuments({ userId }));
    }

    async listByUser(userId: string, page: PageRequest): Promise<Omit<Page<Application>, 'page' | 'pageSize'>> {
        return withStorage('application list', async () => {
            const [total, items] = await Promise.all([
                this.applications.countDocuments({ userId }),
                this.applications.find({ userId }).sort({ createdAt: -1 }).skip(page.skip).limit(page.limit).toArray()
            ]);
            return { items, total };
        });
    }

    async listByStatus(status: ApplicationStatus, page: PageRequest): Promise<Omit<Page<Application>, 'page' | 'pageSize'>> {
        return withStorage('application list', async () => {
            const [total, items] = await Promise.all([
                this.applications.countDocuments({ status }),
                this.applications.find({ status }).sort({ createdAt: -1 }).skip(page.skip).limit(page.limit).toArray()
            ]);
            return { items, total };
        });
    }

    async countByStatus(): Promise<Record<ApplicationStatus, number>> {
        const rows = await withStorage('application stats', () =>
            this.applications
                .aggregate<{ _id: ApplicationStatus; count: number }>([
                    { $group: { _id: '$status', count: { $sum: 1 } } }
                ])
                .toArray()
        );

        const counts = emptyStatusCounts();
        for (const row of rows) {
            counts[row._id] = row.count;
        }
        return counts;
    }
}
