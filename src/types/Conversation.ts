export type ConversationFlow = 'registration' | 'submit_application' | 'none';

export type RegistrationStep = 'started' | 'awaiting_phone';
export type SubmitApplicationStep = 'awaiting_sport' | 'awaiting_confirmation';
export type ConversationStep = RegistrationStep | SubmitApplicationStep | 'idle';

export interface ConversationSession {
    userId: string;
    flow: ConversationFlow;
    step: ConversationStep;
    scratch: Record<string, string>;
    expiresAt: Date;
}
