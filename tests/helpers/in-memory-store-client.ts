/**
 * In-memory RemoteStoreClient for tests
 *
 * Behaves like a Redis server reached through a client:
 * - values pass through the configured serializer ('none' stringifies, 'json' round-trips)
 * - keys with an expiry disappear once the clock passes it
 * - every call is counted so tests can assert round trips
 * - failWith() makes every subsequent call reject, simulating a transport fault
 */

import type { RemoteSerializer, RemoteStoreClient } from '../../src/caching/remote-store-client.js';

interface StoredValue {
  raw: string;
  expiresAtMs: number | null;
}

export type StoreCommand =
  | 'get'
  | 'set'
  | 'setWithExpiry'
  | 'multiGet'
  | 'multiSet'
  | 'delete'
  | 'exists'
  | 'listByPattern';

export class InMemoryStoreClient implements RemoteStoreClient {
  readonly calls: Record<StoreCommand, number> = {
    get: 0,
    set: 0,
    setWithExpiry: 0,
    multiGet: 0,
    multiSet: 0,
    delete: 0,
    exists: 0,
    listByPattern: 0,
  };

  private readonly data = new Map<string, StoredValue>();
  private serializer: RemoteSerializer = 'none';
  private fault: Error | null = null;
  connected = true;

  constructor(private readonly now: () => number = () => Date.now()) {}

  failWith(error: Error | null): void {
    this.fault = error;
  }

  /** Raw stored string for a (prefixed) key, bypassing expiry */
  rawValue(key: string): string | undefined {
    return this.data.get(key)?.raw;
  }

  storedKeys(): string[] {
    return [...this.data.keys()].filter(key => this.live(key) !== undefined);
  }

  isConnected(): boolean {
    return this.connected;
  }

  getSerializer(): RemoteSerializer {
    return this.serializer;
  }

  setSerializer(serializer: RemoteSerializer): void {
    this.serializer = serializer;
  }

  async get(key: string): Promise<unknown> {
    this.record('get');
    const stored = this.live(key);
    return stored === undefined ? undefined : this.decode(stored.raw);
  }

  async set(key: string, value: unknown): Promise<boolean> {
    this.record('set');
    this.data.set(key, { raw: this.encode(value), expiresAtMs: null });
    return true;
  }

  async setWithExpiry(key: string, seconds: number, value: unknown): Promise<boolean> {
    this.record('setWithExpiry');
    this.data.set(key, { raw: this.encode(value), expiresAtMs: this.now() + seconds * 1000 });
    return true;
  }

  async multiGet(keys: readonly string[]): Promise<unknown[]> {
    this.record('multiGet');
    return keys.map(key => {
      const stored = this.live(key);
      return stored === undefined ? undefined : this.decode(stored.raw);
    });
  }

  async multiSet(entries: ReadonlyArray<readonly [string, unknown]>): Promise<boolean> {
    this.record('multiSet');
    for (const [key, value] of entries) {
      this.data.set(key, { raw: this.encode(value), expiresAtMs: null });
    }
    return true;
  }

  async delete(keys: readonly string[]): Promise<number> {
    this.record('delete');
    let removed = 0;
    for (const key of keys) {
      if (this.live(key) !== undefined) {
        removed++;
      }
      this.data.delete(key);
    }
    return removed;
  }

  async exists(key: string): Promise<number> {
    this.record('exists');
    return this.live(key) === undefined ? 0 : 1;
  }

  async listByPattern(pattern: string): Promise<string[]> {
    this.record('listByPattern');
    const escaped = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    const regex = new RegExp(`^${escaped.replace(/\*/g, '.*').replace(/\?/g, '.')}$`);
    return this.storedKeys().filter(key => regex.test(key));
  }

  private record(command: StoreCommand): void {
    if (!this.connected) {
      throw new Error('The client is closed');
    }
    if (this.fault) {
      throw this.fault;
    }
    this.calls[command]++;
  }

  private live(key: string): StoredValue | undefined {
    const stored = this.data.get(key);
    if (stored && stored.expiresAtMs !== null && stored.expiresAtMs <= this.now()) {
      this.data.delete(key);
      return undefined;
    }
    return stored;
  }

  private encode(value: unknown): string {
    return this.serializer === 'json' ? JSON.stringify(value) : String(value);
  }

  private decode(raw: string): unknown {
    return this.serializer === 'json' ? JSON.parse(raw) : raw;
  }
}
