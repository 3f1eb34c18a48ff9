import { Application, ApplicationStatus, Page, StatusHistoryEntry } from '../types/Application';
import { AuditLog } from '../types/AuditLog';
import { Facility } from '../types/Facility';
import { Notification, NotificationFailure } from '../types/Notification';
import { RegistrationState, User, UserProfile, UserRole } from '../types/User';

export interface PageRequest {
    skip: number;
    limit: number;
}

export interface UserStore {
    /** Atomic get-or-create keyed by user id; refreshes lastActive. */
    getOrCreate(profile: UserProfile, now: Date): Promise<User>;
    findById(userId: string): Promise<User | null>;
    setRegistrationState(userId: string, state: RegistrationState): Promise<void>;
    /** Returns null when the user is unknown or already completed registration. */
    completeRegistration(userId: string, displayName: string, phone: string): Promise<User | null>;
    setApplicationCount(userId: string, total: number): Promise<void>;
    /** Granting a role other than none only matches users with completed registration. */
    setRole(userId: string, role: UserRole): Promise<User | null>;
    setBlocked(userId: string, blocked: boolean): Promise<User | null>;
    findByRoles(roles: UserRole[]): Promise<User[]>;
}

export type InsertApplicationResult =
    | { inserted: true; application: Application }
    | { inserted: false; application: Application };

export interface ApplicationTransitionWrite {
    status: ApplicationStatus;
    historyEntry: StatusHistoryEntry;
    notifications: Notification[];
    updatedAt: Date;
}

export interface ApplicationStore {
    findById(applicationId: string): Promise<Application | null>;
    findPending(userId: string, facilityId: string, sport: string): Promise<Application | null>;
    /** Inserts unless a pending duplicate exists, in which case the existing record is returned. */
    insert(application: Application): Promise<InsertApplicationResult>;
    /**
     * Single-document conditional write: applies the transition only when the stored
     * version equals expectedVersion. Returns the updated document, or null on mismatch.
     */
    compareAndSwap(applicationId: string, expectedVersion: number, write: ApplicationTransitionWrite): Promise<Application | null>;
    removeFromOutbox(applicationId: string, notificationIds: string[]): Promise<void>;
    findWithPendingOutbox(limit: number): Promise<Application[]>;
    countByUser(userId: string): Promise<number>;
    listByUser(userId: string, page: PageRequest): Promise<Omit<Page<Application>, 'page' | 'pageSize'>>;
    listByStatus(status: ApplicationStatus, page: PageRequest): Promise<Omit<Page<Application>, 'page' | 'pageSize'>>;
    countByStatus(): Promise<Record<ApplicationStatus, number>>;
}

export interface FacilityCatalog {
    findById(facilityId: string): Promise<Facility | null>;
}

export interface AuditLogStore {
    insert(log: AuditLog): Promise<void>;
    recent(limit: number): Promise<AuditLog[]>;
}

export interface NotificationFailureStore {
    record(failure: NotificationFailure): Promise<void>;
}
