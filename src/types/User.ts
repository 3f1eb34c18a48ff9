export type UserRole = 'none' | 'admin' | 'super_admin';

export type RegistrationState = 'started' | 'awaiting_name' | 'awaiting_phone' | 'completed';

export interface User {
    id: string;
    telegramChatId: number;
    displayName: string;
    phone?: string;
    role: UserRole;
    registrationState: RegistrationState;
    blocked: boolean;
    totalApplications: number;
    createdAt: Date;
    lastActive: Date;
}

// Profile data carried by an inbound event from an identity we may not know yet
export interface UserProfile {
    id: string;
    telegramChatId: number;
    displayName: string;
}
