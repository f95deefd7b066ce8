import Redis from 'ioredis';
import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { StoreError, toErrorMessage } from '../infra/errors';
import type { FieldMap, FieldStore } from './FieldStore';

export interface RedisConnectionConfig {
    host: string;
    port: number;
    password?: string;
    db: number;
    connectTimeoutMs?: number;
}

const SCAN_COUNT = 200;

export function createRedisClient(config: RedisConnectionConfig): Redis {
    const client = new Redis({
        host: config.host,
        port: config.port,
        password: config.password,
        db: config.db,
        connectTimeout: config.connectTimeoutMs ?? 5_000,
        retryStrategy: (times) => {
            const delay = Math.min(times * 50, 2_000);
            if (times % 20 === 1) {
                logger.warn(m('warn', `[RedisStore] reconnect attempt ${times}, delay ${delay}ms`));
            }
            return delay;
        },
        maxRetriesPerRequest: 3,
        lazyConnect: true,
    });

    client.on('error', (err: Error) => {
        logger.error(m('error', `[RedisStore] client error: ${err.message}`));
    });

    return client;
}

/**
 * Redis-backed FieldStore. Each record is a hash; a merge is
 * MULTI { HSET key fields; EXPIRE key ttl } so the field set and its TTL land
 * together.
 */
export class RedisFieldStore implements FieldStore {
    readonly kind = 'redis' as const;

    constructor(private readonly client: Redis) {}

    async mergeFields(key: string, fields: FieldMap, ttlSec: number): Promise<void> {
        if (Object.keys(fields).length === 0) return;
        let results: Array<[error: Error | null, result: unknown]> | null;
        try {
            results = await this.client.multi().hset(key, fields).expire(key, Math.max(1, Math.floor(ttlSec))).exec();
        } catch (err) {
            throw new StoreError('Redis merge failed', { key, op: 'multi' }, err);
        }
        if (!results) {
            throw new StoreError('Redis transaction aborted', { key });
        }
        const failed = results.find(([error]) => error !== null);
        if (failed) {
            throw new StoreError('Redis merge failed', { key, reason: toErrorMessage(failed[0]) }, failed[0]);
        }
    }

    async read(key: string): Promise<FieldMap | undefined> {
        let fields: Record<string, string>;
        try {
            fields = await this.client.hgetall(key);
        } catch (err) {
            throw new StoreError('Redis read failed', { key }, err);
        }
        // HGETALL на отсутствующий (или истёкший) ключ возвращает пустой объект
        return Object.keys(fields).length > 0 ? fields : undefined;
    }

    async listKeys(prefix: string): Promise<Set<string>> {
        const pattern = `${escapeGlob(prefix)}*`;
        const keys = new Set<string>();
        let cursor = '0';
        try {
            do {
                const [next, batch] = await this.client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT);
                for (const key of batch) keys.add(key);
                cursor = next;
            } while (cursor !== '0');
        } catch (err) {
            throw new StoreError('Redis scan failed', { prefix }, err);
        }
        return keys;
    }

    async ping(): Promise<void> {
        try {
            await this.client.ping();
        } catch (err) {
            throw new StoreError('Redis ping failed', undefined, err);
        }
    }

    async close(): Promise<void> {
        try {
            await this.client.quit();
        } catch (err) {
            logger.warn(m('warn', `[RedisStore] quit failed, disconnecting: ${toErrorMessage(err)}`));
            this.client.disconnect();
        }
    }
}

function escapeGlob(value: string): string {
    return value.replace(/[*?[\]\\]/g, (ch) => `\\${ch}`);
}
