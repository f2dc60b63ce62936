/**
 * Shared cache tier seen by every engine instance. Implementations throw
 * CacheUnavailableError on failure or timeout; callers treat that as a miss.
 */
export interface IDistributedCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(keys: string[]): Promise<void>;
}
