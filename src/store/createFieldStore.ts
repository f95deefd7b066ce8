import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { toErrorMessage } from '../infra/errors';
import type { StoreConfig } from '../infra/config';
import type { FieldStore } from './FieldStore';
import { MemoryFieldStore } from './MemoryFieldStore';
import { createRedisClient, RedisFieldStore } from './RedisFieldStore';

export function createFieldStore(config: StoreConfig): FieldStore {
    if (config.driver === 'memory') return new MemoryFieldStore();
    return new RedisFieldStore(createRedisClient(config.redis));
}

/**
 * One ping at start-up. An unreachable store is not fatal: the client keeps
 * reconnecting and workers count failed writes until it is back.
 */
export async function checkFieldStore(store: FieldStore): Promise<boolean> {
    try {
        await store.ping();
    } catch (err) {
        logger.warn(m('warn', `[monitor] field store unreachable at start-up, continuing: ${toErrorMessage(err)}`));
        return false;
    }
    logger.info(m('ok', `[monitor] field store connected (${store.kind})`));
    return true;
}
