export type StorageReadOptions = {
  /** Persist the fallback when the file does not exist yet. */
  writeIfMissing?: boolean;
};

/**
 * Small JSON documents addressed by path. Unreadable or invalid documents
 * read as the fallback.
 */
export interface StoragePort {
  readJson<T>(path: string, fallback: T, options?: StorageReadOptions): Promise<T>;
  writeJson(path: string, data: unknown): Promise<void>;
}
