import { MongoClient, MongoNetworkError } from 'mongodb';
import { DatabaseConnection } from './DatabaseConnection';

describe('DatabaseConnection', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('gives up after the configured attempts and closes each failed client', async () => {
        const connect = jest.spyOn(MongoClient.prototype, 'connect').mockRejectedValue(new MongoNetworkError('connection refused'));
        const close = jest.spyOn(MongoClient.prototype, 'close').mockResolvedValue(undefined);
        const connection = new DatabaseConnection('mongodb://localhost:27017', 'facility-bot-test', { attempts: 2, delayMs: 0 });

        await expect(connection.connect()).rejects.toThrow('MongoDB unreachable after 2 attempts: connection refused');

        expect(connect).toHaveBeenCalledTimes(2);
        expect(close).toHaveBeenCalledTimes(2);
        expect(connection.isConnected()).toBe(false);
        expect(() => connection.getDatabase()).toThrow('Call connect() first');
    });

    test('rejects a retry policy without attempts', () => {
        expect(() => new DatabaseConnection('mongodb://localhost:27017', 'facility-bot-test', { attempts: 0, delayMs: 0 }))
            .toThrow('Connection attempts must be at least 1');
    });
});
