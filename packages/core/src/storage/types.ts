/**
 * Object store contract used by the object-storage span sink.
 *
 * Follows the storage module conventions:
 * - Interface name: ObjectStore
 * - Implementation names: InMemoryObjectStore, LocalObjectStore, ...
 * - Lifecycle methods: connect(), disconnect(), isConnected()
 * - Type identifier: getStoreType()
 */

export interface PutObjectOptions {
    contentType?: string | undefined;
}

export interface ObjectStore {
    connect(): Promise<void>;
    disconnect(): Promise<void>;
    isConnected(): boolean;
    getStoreType(): string;

    /**
     * Writes body under key, replacing any existing object
     */
    put(key: string, body: string, options?: PutObjectOptions): Promise<void>;

    /**
     * @returns undefined when no object exists under key
     */
    get(key: string): Promise<string | undefined>;

    /**
     * Keys starting with prefix, sorted
     */
    list(prefix?: string): Promise<string[]>;

    /**
     * @returns false when there was nothing to delete
     */
    delete(key: string): Promise<boolean>;
}
