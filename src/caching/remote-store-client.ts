/**
 * Remote Store Client
 *
 * The capability RemoteStoreAdapter needs from a connected remote key-value
 * store. Depending on this interface instead of a concrete client keeps the
 * adapter testable with an in-process fake; RedisStoreClient implements it
 * over node-redis.
 *
 * Values cross this boundary already decoded: the client's serializer encodes
 * and decodes them, the adapter never does.
 */

/** How the client encodes values on the wire */
export type RemoteSerializer = 'none' | 'json';

export interface RemoteStoreClient {
  /** True once the underlying connection is established and usable */
  isConnected(): boolean;

  getSerializer(): RemoteSerializer;

  setSerializer(serializer: RemoteSerializer): void;

  /** Fetch one value; `undefined` means the key is missing */
  get(key: string): Promise<unknown>;

  /** Unconditional write */
  set(key: string, value: unknown): Promise<boolean>;

  /** Write that expires after `seconds` */
  setWithExpiry(key: string, seconds: number, value: unknown): Promise<boolean>;

  /** Fetch many values in one round trip, positionally; `undefined` marks a miss */
  multiGet(keys: readonly string[]): Promise<unknown[]>;

  /** Write many values in one round trip */
  multiSet(entries: ReadonlyArray<readonly [string, unknown]>): Promise<boolean>;

  /** Remove keys in one round trip; resolves to the number removed */
  delete(keys: readonly string[]): Promise<number>;

  /** Resolves to the number of the given keys that exist */
  exists(key: string): Promise<number>;

  /** List keys matching a glob-style pattern (`*`, `?`) */
  listByPattern(pattern: string): Promise<string[]>;
}
