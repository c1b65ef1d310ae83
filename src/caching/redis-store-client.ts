/**
 * Redis Store Client
 *
 * Implements RemoteStoreClient over a node-redis v4 client. node-redis only
 * speaks strings, so values are encoded here according to the serializer:
 * - 'none': values are stored as their string form and read back as strings
 * - 'json': values are JSON encoded and decoded (RemoteStoreAdapter switches to this)
 *
 * Commands used: GET, SET, SETEX, MGET, MSET, DEL, EXISTS, KEYS.
 */

import type { RemoteSerializer, RemoteStoreClient } from './remote-store-client.js';

/**
 * Minimal interface matching the node-redis client API surface we need.
 * This avoids a hard type dependency on node-redis command generics; replies
 * are narrowed at runtime.
 */
export interface RedisCommandClient {
  readonly isReady: boolean;
  get(key: string): Promise<unknown>;
  set(key: string, value: string): Promise<unknown>;
  setEx(key: string, seconds: number, value: string): Promise<unknown>;
  mGet(keys: string[]): Promise<unknown>;
  mSet(entries: Record<string, string>): Promise<unknown>;
  del(keys: string[]): Promise<unknown>;
  exists(key: string): Promise<unknown>;
  keys(pattern: string): Promise<unknown>;
}

export class RedisStoreClient implements RemoteStoreClient {
  private serializer: RemoteSerializer;

  constructor(
    private readonly redis: RedisCommandClient,
    serializer: RemoteSerializer = 'none'
  ) {
    this.serializer = serializer;
  }

  isConnected(): boolean {
    return this.redis.isReady;
  }

  getSerializer(): RemoteSerializer {
    return this.serializer;
  }

  setSerializer(serializer: RemoteSerializer): void {
    this.serializer = serializer;
  }

  async get(key: string): Promise<unknown> {
    return this.decode(await this.redis.get(key));
  }

  async set(key: string, value: unknown): Promise<boolean> {
    return (await this.redis.set(key, this.encode(value))) === 'OK';
  }

  async setWithExpiry(key: string, seconds: number, value: unknown): Promise<boolean> {
    return (await this.redis.setEx(key, seconds, this.encode(value))) === 'OK';
  }

  async multiGet(keys: readonly string[]): Promise<unknown[]> {
    const replies = await this.redis.mGet([...keys]);
    if (!Array.isArray(replies)) {
      throw new Error(`Unexpected MGET reply: ${typeof replies}`);
    }
    return replies.map((reply: unknown) => this.decode(reply));
  }

  async multiSet(entries: ReadonlyArray<readonly [string, unknown]>): Promise<boolean> {
    const encoded = Object.fromEntries(entries.map(([key, value]) => [key, this.encode(value)]));
    return (await this.redis.mSet(encoded)) === 'OK';
  }

  async delete(keys: readonly string[]): Promise<number> {
    return this.toCount(await this.redis.del([...keys]), 'DEL');
  }

  async exists(key: string): Promise<number> {
    return this.toCount(await this.redis.exists(key), 'EXISTS');
  }

  async listByPattern(pattern: string): Promise<string[]> {
    const replies = await this.redis.keys(pattern);
    if (!Array.isArray(replies)) {
      throw new Error(`Unexpected KEYS reply: ${typeof replies}`);
    }
    return replies.map((reply: unknown) => String(reply));
  }

  private encode(value: unknown): string {
    if (this.serializer === 'none') {
      return String(value);
    }

    const encoded = JSON.stringify(value);
    if (encoded === undefined) {
      throw new TypeError(`Value of type ${typeof value} cannot be JSON encoded`);
    }
    return encoded;
  }

  /**
   * A nil reply, or a stored value that no longer decodes, is a miss
   */
  private decode(reply: unknown): unknown {
    if (reply === null || reply === undefined) {
      return undefined;
    }

    const raw = String(reply);
    if (this.serializer === 'none') {
      return raw;
    }

    try {
      return JSON.parse(raw);
    } catch {
      console.warn('[RedisStoreClient] Stored value is not valid JSON, treating as a miss');
      return undefined;
    }
  }

  private toCount(reply: unknown, command: string): number {
    if (typeof reply !== 'number') {
      throw new Error(`Unexpected ${command} reply: ${typeof reply}`);
    }
    return reply;
  }
}
