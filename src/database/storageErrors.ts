import { MongoNetworkError, MongoServerError, MongoServerSelectionError } from 'mongodb';
import { StorageUnavailableError } from '../models/errors';

export const DUPLICATE_KEY_ERROR_CODE = 11000;

export const isDuplicateKeyError = (error: unknown): boolean => {
    return error instanceof MongoServerError && error.code === DUPLICATE_KEY_ERROR_CODE;
};

const isUnavailable = (error: unknown): boolean => {
    return error instanceof MongoNetworkError || error instanceof MongoServerSelectionError;
};

/**
 * Runs a store operation, surfacing connectivity failures as retryable StorageUnavailableError.
 */
export async function withStorage<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
        return await run();
    } catch (error) {
        if (isUnavailable(error)) {
            throw new StorageUnavailableError(operation, error);
        }
        throw error;
    }
}
