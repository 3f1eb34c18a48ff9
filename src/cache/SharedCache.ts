/**
 * Cluster-wide key-value cache. Every operation is atomic at the storage layer;
 * callers hold no in-process locks.
 */
export interface SharedCache {
    /** Increments the counter at key and (re)sets its expiry; returns the new value. */
    incrementWithExpiry(key: string, ttlSeconds: number): Promise<number>;
    /** Sets key only when absent; returns true when this call created it. */
    setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
    get(key: string): Promise<string | null>;
    set(key: string, value: string, ttlMs: number): Promise<void>;
    delete(key: string): Promise<void>;
}
