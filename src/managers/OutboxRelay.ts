import { ApplicationStore } from '../database/Stores';
import { ApplicationLifecycleManager } from './ApplicationLifecycleManager';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('outbox-relay');

export interface RelayResult {
    applicationsScanned: number;
    notificationsRelayed: number;
    notificationsRemaining: number;
}

export class OutboxRelay {
    private applications: ApplicationStore;
    private lifecycle: ApplicationLifecycleManager;
    private batchSize: number;
    private interval: NodeJS.Timeout | null = null;
    private running = false;

    constructor(applications: ApplicationStore, lifecycle: ApplicationLifecycleManager, batchSize = 100) {
        this.applications = applications;
        this.lifecycle = lifecycle;
        this.batchSize = batchSize;
    }

    /**
     * Re-enqueue notifications still sitting in application outboxes.
     * Safe to run on every replica at once: the queue de-duplicates on notification id.
     */
    async relayOnce(): Promise<RelayResult> {
        const pending = await this.applications.findWithPendingOutbox(this.batchSize);
        let relayed = 0;
        let remaining = 0;

        for (const application of pending) {
            const flushed = await this.lifecycle.flushOutbox(application);
            relayed += application.outbox.length - flushed.outbox.length;
            remaining += flushed.outbox.length;
        }

        if (pending.length > 0) {
            log.info('Outbox relay pass finished', {
                applicationsScanned: pending.length,
                notificationsRelayed: relayed,
                notificationsRemaining: remaining
            });
        }

        return { applicationsScanned: pending.length, notificationsRelayed: relayed, notificationsRemaining: remaining };
    }

    start(intervalSeconds: number): void {
        if (this.interval) {
            return;
        }

        const runRelay = async () => {
            if (this.running) {
                return;
            }
            this.running = true;
            try {
                await this.relayOnce();
            } catch (error) {
                log.error('Outbox relay pass failed', errorMeta(error));
            } finally {
                this.running = false;
            }
        };

        this.interval = setInterval(() => {
            void runRelay();
        }, intervalSeconds * 1000);
        log.info('Outbox relay started', { intervalSeconds });
    }

    stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }
}
