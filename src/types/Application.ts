import { Notification } from './Notification';

export type ApplicationStatus = 'pending' | 'accepted' | 'transferred' | 'completed' | 'cancelled';

export interface StatusHistoryEntry {
    status: ApplicationStatus;
    actor: string;
    timestamp: Date;
}

export interface Application {
    id: string;
    userId: string;
    facilityId: string;
    sport: string;
    status: ApplicationStatus;
    createdAt: Date;
    updatedAt: Date;
    statusHistory: StatusHistoryEntry[];
    version: number; // optimistic concurrency token
    outbox: Notification[]; // notifications written with the state change, not yet queued
    applicantName: string;
    applicantChatId: number;
    applicantPhone: string;
    facilityName: string;
    facilityDistrict: string;
}

export interface Page<T> {
    items: T[];
    total: number;
    page: number;
    pageSize: number;
}
