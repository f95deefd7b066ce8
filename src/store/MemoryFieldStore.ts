import type { FieldMap, FieldStore } from './FieldStore';

interface StoredRecord {
    fields: FieldMap;
    expiresAt: number;
}

export interface MemoryFieldStoreOptions {
    now?: () => number;
}

/**
 * In-process FieldStore. A merge runs synchronously inside one event-loop turn,
 * which makes it atomic per key. Expired records are dropped lazily.
 */
export class MemoryFieldStore implements FieldStore {
    readonly kind = 'memory' as const;
    private readonly records = new Map<string, StoredRecord>();
    private readonly now: () => number;

    constructor(options: MemoryFieldStoreOptions = {}) {
        this.now = options.now ?? (() => Date.now());
    }

    async mergeFields(key: string, fields: FieldMap, ttlSec: number): Promise<void> {
        const now = this.now();
        const existing = this.liveRecord(key, now);
        this.records.set(key, {
            fields: { ...(existing?.fields ?? {}), ...fields },
            expiresAt: now + Math.max(0, ttlSec) * 1000,
        });
    }

    async read(key: string): Promise<FieldMap | undefined> {
        const record = this.liveRecord(key, this.now());
        return record ? { ...record.fields } : undefined;
    }

    async listKeys(prefix: string): Promise<Set<string>> {
        const now = this.now();
        const keys = new Set<string>();
        for (const key of Array.from(this.records.keys())) {
            if (!key.startsWith(prefix)) continue;
            if (this.liveRecord(key, now)) keys.add(key);
        }
        return keys;
    }

    async ping(): Promise<void> {
        return;
    }

    async close(): Promise<void> {
        this.records.clear();
    }

    size(): number {
        return this.records.size;
    }

    private liveRecord(key: string, now: number): StoredRecord | undefined {
        const record = this.records.get(key);
        if (!record) return undefined;
        if (record.expiresAt <= now) {
            this.records.delete(key);
            return undefined;
        }
        return record;
    }
}
