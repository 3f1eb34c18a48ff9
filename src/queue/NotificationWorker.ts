import { ConnectionOptions, Job, Worker } from 'bullmq';
import { NOTIFICATION_QUEUE_NAME, NotificationJobData, fromJobData } from './NotificationQueue';
import { NotificationDelivery } from '../managers/NotificationDelivery';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('notification-worker');

/**
 * Consumes the notification queue. A thrown delivery error makes BullMQ retry with
 * backoff; once attempts run out the failure is recorded for operators.
 */
export class NotificationWorker {
    private worker: Worker<NotificationJobData> | null = null;
    private connection: ConnectionOptions;
    private delivery: NotificationDelivery;
    private concurrency: number;

    constructor(connection: ConnectionOptions, delivery: NotificationDelivery, concurrency = 5) {
        this.connection = connection;
        this.delivery = delivery;
        this.concurrency = concurrency;
    }

    start(): void {
        if (this.worker) {
            return;
        }

        this.worker = new Worker<NotificationJobData>(
            NOTIFICATION_QUEUE_NAME,
            async (job: Job<NotificationJobData>) => {
                await this.delivery.deliver(fromJobData(job.data));
            },
            { connection: this.connection, concurrency: this.concurrency }
        );

        this.worker.on('failed', (job: Job<NotificationJobData> | undefined, error: Error) => {
            void this.handleFailure(job, error);
        });

        this.worker.on('error', error => {
            log.error('Notification worker error', errorMeta(error));
        });

        log.info('Notification worker started', { concurrency: this.concurrency });
    }

    async stop(): Promise<void> {
        if (this.worker) {
            await this.worker.close();
            this.worker = null;
        }
    }

    private async handleFailure(job: Job<NotificationJobData> | undefined, error: Error): Promise<void> {
        if (!job) {
            log.error('Notification job failed without job context', errorMeta(error));
            return;
        }

        const maxAttempts = job.opts.attempts ?? 1;
        if (job.attemptsMade < maxAttempts) {
            log.warn('Notification delivery failed, will retry', {
                notificationId: job.data.id,
                attempt: job.attemptsMade,
                maxAttempts,
                error: error.message
            });
            return;
        }

        try {
            await this.delivery.recordFailure(fromJobData(job.data), error, job.attemptsMade);
        } catch (recordError) {
            log.error('Failed to record notification failure', { notificationId: job.data.id, ...errorMeta(recordError) });
        }
    }
}
