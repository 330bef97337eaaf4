/**
 * =============================================================================
 * REDIS SERVICE - Shared Key/Value, Set, Geo and Pub/Sub Layer
 * =============================================================================
 *
 * WHAT THIS DOES:
 * - Provides a unified Redis interface for dispatch state
 * - Falls back to in-memory when Redis is disabled (dev mode, tests)
 *
 * FEATURES:
 * 1. BASIC OPERATIONS     - get, set, del, exists (with TTL)
 * 2. COMPARE-AND-SWAP     - setIfAbsent (SET NX EX), deleteIfEquals
 * 3. SETS                 - sAdd, sIsMember, sMembers (exclusion sets)
 * 4. LISTS                - lPush, lRange (dead-letter lists)
 * 5. GEOSPATIAL           - geoAdd, geoRemove, geoRadius (driver locations)
 * 6. PUB/SUB              - publish, subscribe (event broker)
 *
 * LIFECYCLE:
 * The process entry point constructs one RedisService, calls initialize()
 * once and shutdown() on exit. Nothing reaches it through module globals.
 *
 * USAGE:
 * ```typescript
 * const redis = new RedisService(config.redis);
 * await redis.initialize();
 *
 * // Atomic slot claim
 * const claimed = await redis.setIfAbsent('offer:driver:d1', offerId, 60);
 *
 * // Geospatial
 * await redis.geoAdd('drivers:locations', lng, lat, 'driver-1');
 * const nearby = await redis.geoRadius('drivers:locations', lng, lat, 5, 'km', 10);
 * ```
 * =============================================================================
 */

import Redis from 'ioredis';
import { logger } from './logger.service';

// =============================================================================
// TYPES
// =============================================================================

export interface RedisOptions {
  enabled: boolean;
  url: string;
  maxRetries: number;
  retryDelayMs: number;
  connectionTimeoutMs: number;
}

export interface GeoMember {
  member: string;
  distance: number;
}

export type GeoUnit = 'km' | 'm';

// =============================================================================
// REDIS CLIENT INTERFACE (allows swapping implementations)
// =============================================================================

export interface IRedisClient {
  // Connection
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;

  // Basic operations
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<boolean>;
  exists(key: string): Promise<boolean>;
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  // Compare-and-swap
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;
  deleteIfEquals(key: string, expected: string): Promise<boolean>;

  // Sets
  sAdd(key: string, ...members: string[]): Promise<number>;
  sMembers(key: string): Promise<string[]>;
  sIsMember(key: string, member: string): Promise<boolean>;

  // Lists
  lPush(key: string, value: string): Promise<number>;
  lRange(key: string, start: number, stop: number): Promise<string[]>;

  // Geospatial
  geoAdd(key: string, longitude: number, latitude: number, member: string): Promise<number>;
  geoRemove(key: string, member: string): Promise<number>;
  geoRadius(key: string, longitude: number, latitude: number, radius: number, unit: GeoUnit, count?: number): Promise<GeoMember[]>;

  // Pub/Sub
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, callback: (message: string) => void): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION (Development / Tests)
// =============================================================================

type MemoryEntry =
  | { type: 'string'; value: string; expiresAt?: number }
  | { type: 'set'; value: Set<string>; expiresAt?: number }
  | { type: 'list'; value: string[]; expiresAt?: number }
  | { type: 'geo'; value: Map<string, { lng: number; lat: number }>; expiresAt?: number };

/**
 * Every method body runs without an await before its mutation, so each call
 * is atomic with respect to other callers on the event loop - the same
 * guarantee a single Redis command gives.
 */
export class InMemoryRedisClient implements IRedisClient {
  private store = new Map<string, MemoryEntry>();
  private subscribers = new Map<string, Set<(message: string) => void>>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor() {
    // Cleanup expired keys every 10 seconds
    this.cleanupInterval = setInterval(() => this.cleanup(), 10000);
    this.cleanupInterval.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt && now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`[Redis] Cleanup: removed ${cleaned} expired keys`);
    }
  }

  private live(key: string): MemoryEntry | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiry(ttlSeconds?: number): number | undefined {
    return ttlSeconds && ttlSeconds > 0 ? Date.now() + ttlSeconds * 1000 : undefined;
  }

  async connect(): Promise<void> {
    logger.info('📦 [Redis] In-memory mode - no connection needed');
  }

  async disconnect(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
    this.subscribers.clear();
  }

  isConnected(): boolean {
    return true;
  }

  // =========== Basic Operations ===========

  async get(key: string): Promise<string | null> {
    const entry = this.live(key);
    return entry?.type === 'string' ? entry.value : null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.store.set(key, { type: 'string', value, expiresAt: this.expiry(ttlSeconds) });
  }

  async del(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.expiry(ttlSeconds);
    return true;
  }

  // =========== Compare-and-swap ===========

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) return false;
    this.store.set(key, { type: 'string', value, expiresAt: this.expiry(ttlSeconds) });
    return true;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (entry?.type !== 'string' || entry.value !== expected) return false;
    this.store.delete(key);
    return true;
  }

  // =========== Sets ===========

  async sAdd(key: string, ...members: string[]): Promise<number> {
    let entry = this.live(key);
    if (entry?.type !== 'set') {
      entry = { type: 'set', value: new Set<string>() };
      this.store.set(key, entry);
    }
    let added = 0;
    for (const member of members) {
      if (!entry.value.has(member)) {
        entry.value.add(member);
        added++;
      }
    }
    return added;
  }

  async sMembers(key: string): Promise<string[]> {
    const entry = this.live(key);
    return entry?.type === 'set' ? Array.from(entry.value) : [];
  }

  async sIsMember(key: string, member: string): Promise<boolean> {
    const entry = this.live(key);
    return entry?.type === 'set' ? entry.value.has(member) : false;
  }

  // =========== Lists ===========

  async lPush(key: string, value: string): Promise<number> {
    let entry = this.live(key);
    if (entry?.type !== 'list') {
      entry = { type: 'list', value: [] };
      this.store.set(key, entry);
    }
    entry.value.unshift(value);
    return entry.value.length;
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    const entry = this.live(key);
    if (entry?.type !== 'list') return [];
    const end = stop < 0 ? entry.value.length + stop + 1 : stop + 1;
    return entry.value.slice(start, end);
  }

  // =========== Geospatial ===========

  async geoAdd(key: string, longitude: number, latitude: number, member: string): Promise<number> {
    let entry = this.live(key);
    if (entry?.type !== 'geo') {
      entry = { type: 'geo', value: new Map() };
      this.store.set(key, entry);
    }
    const isNew = !entry.value.has(member);
    entry.value.set(member, { lng: longitude, lat: latitude });
    return isNew ? 1 : 0;
  }

  async geoRemove(key: string, member: string): Promise<number> {
    const entry = this.live(key);
    if (entry?.type !== 'geo') return 0;
    return entry.value.delete(member) ? 1 : 0;
  }

  async geoRadius(
    key: string,
    longitude: number,
    latitude: number,
    radius: number,
    unit: GeoUnit,
    count?: number
  ): Promise<GeoMember[]> {
    const entry = this.live(key);
    if (entry?.type !== 'geo') return [];

    const radiusMeters = unit === 'km' ? radius * 1000 : radius;
    const results: GeoMember[] = [];

    for (const [member, pos] of entry.value.entries()) {
      const distance = haversineMeters(latitude, longitude, pos.lat, pos.lng);
      if (distance <= radiusMeters) {
        results.push({ member, distance: unit === 'km' ? distance / 1000 : distance });
      }
    }

    results.sort((a, b) => a.distance - b.distance);
    return count !== undefined ? results.slice(0, count) : results;
  }

  // =========== Pub/Sub ===========

  async publish(channel: string, message: string): Promise<number> {
    const subs = this.subscribers.get(channel);
    if (!subs || subs.size === 0) return 0;

    for (const callback of subs) {
      try {
        callback(message);
      } catch (e) {
        logger.error(`[Redis] Pub/Sub callback error: ${e}`);
      }
    }

    return subs.size;
  }

  async subscribe(channel: string, callback: (message: string) => void): Promise<void> {
    let subs = this.subscribers.get(channel);
    if (!subs) {
      subs = new Set();
      this.subscribers.set(channel, subs);
    }
    subs.add(callback);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.subscribers.delete(channel);
  }
}

/**
 * Haversine formula, metres
 */
export function haversineMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const R = 6371000; // Earth's radius in meters
  const toRad = (deg: number) => deg * (Math.PI / 180);
  const dLat = toRad(lat2 - lat1);
  const dLon = toRad(lon2 - lon1);

  const a = Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) *
    Math.sin(dLon / 2) * Math.sin(dLon / 2);

  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

// =============================================================================
// REAL REDIS IMPLEMENTATION (Production)
// =============================================================================

const DELETE_IF_EQUALS_SCRIPT = `
if redis.call('get', KEYS[1]) == ARGV[1] then
  return redis.call('del', KEYS[1])
else
  return 0
end
`;

export class RealRedisClient implements IRedisClient {
  private client: Redis | null = null;
  private subscriber: Redis | null = null;
  private connected = false;
  private subscriptions = new Map<string, (message: string) => void>();

  constructor(private options: RedisOptions) { }

  private command(): Redis {
    if (!this.client) {
      throw new Error('Redis client used before connect()');
    }
    return this.client;
  }

  async connect(): Promise<void> {
    const useTls = this.options.url.startsWith('rediss://');

    this.client = new Redis(this.options.url, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > this.options.maxRetries) {
          logger.error(`[Redis] Max retries (${this.options.maxRetries}) exceeded`);
          return null;
        }
        const delay = Math.min(times * this.options.retryDelayMs, 10000);
        logger.warn(`[Redis] Retry ${times}/${this.options.maxRetries} in ${delay}ms`);
        return delay;
      },
      connectTimeout: this.options.connectionTimeoutMs,
      // Reject commands immediately while disconnected instead of queueing them
      enableOfflineQueue: false,
      enableReadyCheck: true,
      tls: useTls ? {} : undefined,
    });

    // Subscriber connection (a subscribed connection cannot run commands)
    this.subscriber = new Redis(this.options.url, {
      maxRetriesPerRequest: this.options.maxRetries,
      connectTimeout: this.options.connectionTimeoutMs,
      tls: useTls ? {} : undefined,
    });

    const client = this.client;

    client.on('error', (err: Error) => {
      logger.error(`[Redis] Error: ${err.message}`);
    });

    client.on('close', () => {
      logger.warn('[Redis] Connection closed');
      this.connected = false;
    });

    client.on('ready', () => {
      this.connected = true;
    });

    this.subscriber.on('error', (err: Error) => {
      logger.error(`[Redis] Subscriber error: ${err.message}`);
    });

    this.subscriber.on('message', (channel: string, message: string) => {
      const callback = this.subscriptions.get(channel);
      if (callback) {
        try {
          callback(message);
        } catch (e) {
          logger.error(`[Redis] Subscriber callback error: ${e}`);
        }
      }
    });

    // Wait for connection
    await new Promise<void>((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(new Error('Redis connection timeout'));
      }, this.options.connectionTimeoutMs);

      client.once('ready', () => {
        clearTimeout(timeout);
        resolve();
      });

      client.once('error', (err: Error) => {
        clearTimeout(timeout);
        reject(err);
      });
    });

    this.connected = true;
    logger.info('🔴 [Redis] Successfully connected to Redis');
  }

  async disconnect(): Promise<void> {
    if (this.subscriber) {
      await this.subscriber.quit();
      this.subscriber = null;
    }
    if (this.client) {
      await this.client.quit();
      this.client = null;
    }
    this.connected = false;
    logger.info('[Redis] Disconnected');
  }

  /**
   * Drops both connections without waiting for pending replies and stops
   * ioredis from reconnecting. Used when connect() fails.
   */
  abort(): void {
    this.subscriber?.disconnect();
    this.client?.disconnect();
    this.subscriber = null;
    this.client = null;
    this.connected = false;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // =========== Basic Operations ===========

  async get(key: string): Promise<string | null> {
    return this.command().get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.command().setex(key, ttlSeconds, value);
    } else {
      await this.command().set(key, value);
    }
  }

  async del(key: string): Promise<boolean> {
    return (await this.command().del(key)) > 0;
  }

  async exists(key: string): Promise<boolean> {
    return (await this.command().exists(key)) > 0;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return (await this.command().expire(key, ttlSeconds)) === 1;
  }

  // =========== Compare-and-swap ===========

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.command().set(key, value, 'EX', ttlSeconds, 'NX');
    return result === 'OK';
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const result = await this.command().eval(DELETE_IF_EQUALS_SCRIPT, 1, key, expected);
    return result === 1;
  }

  // =========== Sets ===========

  async sAdd(key: string, ...members: string[]): Promise<number> {
    return this.command().sadd(key, ...members);
  }

  async sMembers(key: string): Promise<string[]> {
    return this.command().smembers(key);
  }

  async sIsMember(key: string, member: string): Promise<boolean> {
    return (await this.command().sismember(key, member)) === 1;
  }

  // =========== Lists ===========

  async lPush(key: string, value: string): Promise<number> {
    return this.command().lpush(key, value);
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.command().lrange(key, start, stop);
  }

  // =========== Geospatial ===========

  async geoAdd(key: string, longitude: number, latitude: number, member: string): Promise<number> {
    return this.command().geoadd(key, longitude, latitude, member);
  }

  async geoRemove(key: string, member: string): Promise<number> {
    // GEO sets are sorted sets underneath
    return this.command().zrem(key, member);
  }

  async geoRadius(
    key: string,
    longitude: number,
    latitude: number,
    radius: number,
    unit: GeoUnit,
    count?: number
  ): Promise<GeoMember[]> {
    const args: Array<string | number> = [key, longitude, latitude, radius, unit, 'WITHDIST', 'ASC'];
    if (count !== undefined) {
      args.push('COUNT', count);
    }
    const raw = await this.command().call('GEORADIUS', ...args);
    return parseGeoReply(raw);
  }

  // =========== Pub/Sub ===========

  async publish(channel: string, message: string): Promise<number> {
    return this.command().publish(channel, message);
  }

  async subscribe(channel: string, callback: (message: string) => void): Promise<void> {
    if (!this.subscriber) {
      throw new Error('Redis subscriber used before connect()');
    }
    this.subscriptions.set(channel, callback);
    await this.subscriber.subscribe(channel);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.subscriptions.delete(channel);
    if (this.subscriber) {
      await this.subscriber.unsubscribe(channel);
    }
  }
}

/**
 * GEORADIUS ... WITHDIST replies with [[member, "distance"], ...]
 */
function parseGeoReply(raw: unknown): GeoMember[] {
  if (!Array.isArray(raw)) return [];
  const members: GeoMember[] = [];
  for (const item of raw) {
    if (Array.isArray(item) && typeof item[0] === 'string') {
      const distance = parseFloat(String(item[1]));
      if (!isNaN(distance)) {
        members.push({ member: item[0], distance });
      }
    }
  }
  return members;
}

// =============================================================================
// REDIS SERVICE
// =============================================================================

/**
 * Main Redis Service - one instance per process
 *
 * Automatically uses:
 * - Real Redis when enabled (REDIS_ENABLED=true)
 * - In-memory fallback otherwise
 */
export class RedisService {
  private client: IRedisClient;
  private initialized = false;
  private useRedis = false;

  constructor(private options: RedisOptions, client?: IRedisClient) {
    this.client = client ?? new InMemoryRedisClient();
  }

  /**
   * Initialize Redis connection
   * Call this at process startup
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.options.enabled) {
      const realClient = new RealRedisClient(this.options);
      try {
        logger.info(`[Redis] Initializing connection (timeout: ${this.options.connectionTimeoutMs}ms, retries: ${this.options.maxRetries})`);

        await realClient.connect();

        await this.client.disconnect();
        this.client = realClient;
        this.useRedis = true;
      } catch (error) {
        logger.error(`[Redis] Failed to connect to Redis: ${error instanceof Error ? error.message : String(error)}`);
        realClient.abort();
        await this.client.connect();
        logger.warn('⚠️  [Redis] Connection failed, falling back to in-memory mode');
        logger.warn('⚠️  [Redis] Offer slots and exclusion sets will not survive restarts');
      }
    } else {
      await this.client.connect();
      logger.info('📦 [Redis] Using in-memory storage (set REDIS_ENABLED=true for production)');
    }

    this.initialized = true;
  }

  isRedisEnabled(): boolean {
    return this.useRedis;
  }

  isConnected(): boolean {
    return this.client.isConnected();
  }

  // ===========================================================================
  // BASIC OPERATIONS
  // ===========================================================================

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    return this.client.set(key, value, ttlSeconds);
  }

  async del(key: string): Promise<boolean> {
    return this.client.del(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.client.exists(key);
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    return this.client.expire(key, ttlSeconds);
  }

  /**
   * Read a JSON value; a corrupt payload is logged and treated as missing
   */
  async getJSON<T>(key: string): Promise<T | null> {
    const value = await this.client.get(key);
    if (value === null) return null;
    try {
      return JSON.parse(value) as T;
    } catch (e) {
      logger.error(`[Redis] Failed to parse JSON at ${key}: ${e}`);
      return null;
    }
  }

  async setJSON<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    return this.client.set(key, JSON.stringify(value), ttlSeconds);
  }

  // ===========================================================================
  // COMPARE-AND-SWAP
  // ===========================================================================

  /**
   * SET key value NX EX ttl
   *
   * First caller wins; everyone else gets false until the key is deleted
   * or expires.
   */
  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    return this.client.setIfAbsent(key, value, ttlSeconds);
  }

  /**
   * Delete only if the key still holds `expected` (holder-verified release)
   */
  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    return this.client.deleteIfEquals(key, expected);
  }

  // ===========================================================================
  // SETS
  // ===========================================================================

  async sAdd(key: string, ...members: string[]): Promise<number> {
    return this.client.sAdd(key, ...members);
  }

  async sMembers(key: string): Promise<string[]> {
    return this.client.sMembers(key);
  }

  async sIsMember(key: string, member: string): Promise<boolean> {
    return this.client.sIsMember(key, member);
  }

  // ===========================================================================
  // LISTS
  // ===========================================================================

  async lPush(key: string, value: string): Promise<number> {
    return this.client.lPush(key, value);
  }

  async lRange(key: string, start: number, stop: number): Promise<string[]> {
    return this.client.lRange(key, start, stop);
  }

  // ===========================================================================
  // GEOSPATIAL
  // ===========================================================================

  async geoAdd(key: string, longitude: number, latitude: number, member: string): Promise<number> {
    return this.client.geoAdd(key, longitude, latitude, member);
  }

  async geoRemove(key: string, member: string): Promise<number> {
    return this.client.geoRemove(key, member);
  }

  async geoRadius(
    key: string,
    longitude: number,
    latitude: number,
    radius: number,
    unit: GeoUnit = 'km',
    count?: number
  ): Promise<GeoMember[]> {
    return this.client.geoRadius(key, longitude, latitude, radius, unit, count);
  }

  // ===========================================================================
  // PUB/SUB
  // ===========================================================================

  async publish(channel: string, message: string): Promise<number> {
    return this.client.publish(channel, message);
  }

  async subscribe(channel: string, callback: (message: string) => void): Promise<void> {
    return this.client.subscribe(channel, callback);
  }

  async unsubscribe(channel: string): Promise<void> {
    return this.client.unsubscribe(channel);
  }

  // ===========================================================================
  // HEALTH CHECK
  // ===========================================================================

  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; mode: string; latencyMs?: number }> {
    const start = Date.now();
    const mode = this.useRedis ? 'redis' : 'memory';

    try {
      await this.client.set('health:check', 'ok', 10);
      const value = await this.client.get('health:check');

      if (value !== 'ok') {
        return { status: 'unhealthy', mode };
      }

      return { status: 'healthy', mode, latencyMs: Date.now() - start };
    } catch (e) {
      logger.warn(`[Redis] Health check failed: ${e}`);
      return { status: 'unhealthy', mode };
    }
  }

  // ===========================================================================
  // SHUTDOWN
  // ===========================================================================

  async shutdown(): Promise<void> {
    logger.info('[Redis] Shutting down...');
    await this.client.disconnect();
    this.initialized = false;
  }
}
