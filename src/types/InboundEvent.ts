export type InboundEventType = 'text' | 'contact' | 'command' | 'callback' | 'other';

export interface InboundEvent {
    userId: string;
    chatId: number;
    displayName: string;
    type: InboundEventType;
    timestamp: Date;
    text?: string;
    phone?: string;
    command?: string;
    args?: string[];
    data?: string;
}

export type ReplyKeyboard =
    | { kind: 'request_contact' }
    | { kind: 'remove' }
    | { kind: 'inline'; buttons: Array<Array<{ text: string; data: string }>> };

export interface Reply {
    text: string;
    keyboard?: ReplyKeyboard;
}
