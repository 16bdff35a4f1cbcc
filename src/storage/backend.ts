/**
 * Abstract storage backend interface for persisted state documents.
 */

export interface StorageBackend {
  /** Write data to the given key; the write is durable once the promise resolves. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;
}
