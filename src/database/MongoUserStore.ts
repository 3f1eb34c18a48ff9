import { Collection } from 'mongodb';
import { Collections } from './Collections';
import { UserStore } from './Stores';
import { isDuplicateKeyError, withStorage } from './storageErrors';
import { StorageUnavailableError } from '../models/errors';
import { RegistrationState, User, UserProfile, UserRole } from '../types/User';

export class MongoUserStore implements UserStore {
    private users: Collection<User>;

    constructor(collections: Collections) {
        this.users = collections.users;
    }

    async getOrCreate(profile: UserProfile, now: Date): Promise<User> {
        return withStorage('user upsert', async () => {
            try {
                return await this.upsert(profile, now);
            } catch (error) {
                // Two replicas upserting the same new identity: the loser re-reads the winner's record
                if (isDuplicateKeyError(error)) {
                    return this.upsert(profile, now);
                }
                throw error;
            }
        });
    }

    async findById(userId: string): Promise<User | null> {
        return withStorage('user read', () => this.users.findOne({ id: userId }));
    }

    async setRegistrationState(userId: string, state: RegistrationState): Promise<void> {
        await withStorage('user registration state', () =>
            this.users.updateOne({ id: userId }, { $set: { registrationState: state } })
        );
    }

    async completeRegistration(userId: string, displayName: string, phone: string): Promise<User | null> {
        return withStorage('user registration', () =>
            this.users.findOneAndUpdate(
                { id: userId, registrationState: { $ne: 'completed' } },
                { $set: { displayName, phone, registrationState: 'completed' } },
                { returnDocument: 'after' }
            )
        );
    }

    async setApplicationCount(userId: string, total: number): Promise<void> {
        await withStorage('user application counter', () =>
            this.users.updateOne({ id: userId }, { $set: { totalApplications: total } })
        );
    }

    async setRole(userId: string, role: UserRole): Promise<User | null> {
        const filter = role === 'none'
            ? { id: userId }
            : { id: userId, registrationState: 'completed' as const };

        return withStorage('user role', () =>
            this.users.findOneAndUpdate(filter, { $set: { role } }, { returnDocument: 'after' })
        );
    }

    async setBlocked(userId: string, blocked: boolean): Promise<User | null> {
        return withStorage('user block', () =>
            this.users.findOneAndUpdate({ id: userId }, { $set: { blocked } }, { returnDocument: 'after' })
        );
    }

    async findByRoles(roles: UserRole[]): Promise<User[]> {
        return withStorage('user role lookup', () => this.users.find({ role: { $in: roles } }).toArray());
    }

    private async upsert(profile: UserProfile, now: Date): Promise<User> {
        const user = await this.users.findOneAndUpdate(
            { id: profile.id },
            {
                $setOnInsert: {
                    id: profile.id,
                    telegramChatId: profile.telegramChatId,
                    displayName: profile.displayName,
                    role: 'none',
                    registrationState: 'started',
                    blocked: false,
                    totalApplications: 0,
                    createdAt: now
                },
                $set: { lastActive: now }
            },
            { upsert: true, returnDocument: 'after' }
        );

        if (!user) {
            throw new StorageUnavailableError('user upsert');
        }
        return user;
    }
}
