import { MongoClient, Db, MongoClientOptions } from 'mongodb';
import { createLogger, errorMeta } from '../utils/logger';

const log = createLogger('mongodb');

export interface ConnectionRetryOptions {
    attempts: number;
    delayMs: number;
}

const DEFAULT_RETRY: ConnectionRetryOptions = { attempts: 5, delayMs: 2000 };

// Version-conditioned updates are only safe when acknowledged by a majority
const CLIENT_OPTIONS: MongoClientOptions = {
    serverSelectionTimeoutMS: 5000,
    connectTimeoutMS: 10000,
    socketTimeoutMS: 45000,
    retryWrites: true,
    writeConcern: { w: 'majority' },
    readConcern: { level: 'majority' }
};

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Owns the single MongoClient of a replica. connect() retries startup failures,
 * then gives up so the process can exit.
 */
export class DatabaseConnection {
    private client: MongoClient | null = null;
    private db: Db | null = null;
    private uri: string;
    private databaseName: string;
    private retry: ConnectionRetryOptions;

    constructor(uri: string, databaseName: string, retry: ConnectionRetryOptions = DEFAULT_RETRY) {
        if (retry.attempts < 1) {
            throw new Error('Connection attempts must be at least 1');
        }
        this.uri = uri;
        this.databaseName = databaseName;
        this.retry = retry;
    }

    async connect(): Promise<void> {
        let lastError = 'unknown error';

        for (let attempt = 1; attempt <= this.retry.attempts; attempt++) {
            const client = new MongoClient(this.uri, CLIENT_OPTIONS);
            try {
                await client.connect();
                const db = client.db(this.databaseName);
                await db.command({ ping: 1 });

                this.client = client;
                this.db = db;
                log.info('Connected', { database: this.databaseName, attempt });
                return;
            } catch (error) {
                lastError = error instanceof Error ? error.message : String(error);
                log.error('Connection attempt failed', { attempt, of: this.retry.attempts, ...errorMeta(error) });
                await client.close().catch(closeError => log.warn('Failed to close client', errorMeta(closeError)));

                if (attempt < this.retry.attempts) {
                    await sleep(this.retry.delayMs);
                }
            }
        }

        throw new Error(`MongoDB unreachable after ${this.retry.attempts} attempts: ${lastError}`);
    }

    async disconnect(): Promise<void> {
        if (!this.client) {
            return;
        }
        await this.client.close();
        this.client = null;
        this.db = null;
        log.info('Disconnected', { database: this.databaseName });
    }

    getDatabase(): Db {
        if (!this.db) {
            throw new Error('Database connection not established. Call connect() first.');
        }
        return this.db;
    }

    isConnected(): boolean {
        return this.db !== null;
    }
}
