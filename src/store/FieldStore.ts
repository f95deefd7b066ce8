export type FieldMap = Record<string, string>;

/**
 * Key/value store of per-instrument field maps with per-key expiration.
 *
 * Writers (streaming and polling workers) merge disjoint field subsets into the
 * same key concurrently; each mergeFields() call is applied atomically as a
 * unit, last write wins per field, and the TTL is reset on every write.
 */
export interface FieldStore {
    readonly kind: 'memory' | 'redis';
    mergeFields(key: string, fields: FieldMap, ttlSec: number): Promise<void>;
    read(key: string): Promise<FieldMap | undefined>;
    listKeys(prefix: string): Promise<Set<string>>;
    ping(): Promise<void>;
    close(): Promise<void>;
}

export const DEFAULT_RECORD_TTL_SEC = 3600;

export const FIELD = {
    lastPrice: 'last_price',
    priceTimestamp: 'price_timestamp',
    currentFundingRate: 'current_funding_rate',
    estimatedFundingRate: 'estimated_funding_rate',
    nextFundingTime: 'next_funding_time',
    fundingTimestamp: 'funding_timestamp',
    sourceSymbol: 'source_symbol',
} as const;

export interface InstrumentFieldRecord {
    key: string;
    source: string;
    instrumentId: string;
    lastPrice?: string;
    priceTimestamp?: string;
    currentFundingRate?: string;
    estimatedFundingRate?: string;
    nextFundingTime?: string;
    fundingTimestamp?: string;
    sourceSymbol?: string;
}

export const buildFieldKey = (source: string, instrumentId: string): string => `${source}:${instrumentId}`;

export function splitFieldKey(key: string): { source: string; instrumentId: string } | undefined {
    const idx = key.lastIndexOf(':');
    if (idx <= 0 || idx === key.length - 1) return undefined;
    return { source: key.slice(0, idx), instrumentId: key.slice(idx + 1) };
}

export function parseInstrumentRecord(key: string, fields: FieldMap): InstrumentFieldRecord | undefined {
    const parts = splitFieldKey(key);
    if (!parts) return undefined;
    return {
        key,
        source: parts.source,
        instrumentId: parts.instrumentId,
        lastPrice: fields[FIELD.lastPrice],
        priceTimestamp: fields[FIELD.priceTimestamp],
        currentFundingRate: fields[FIELD.currentFundingRate],
        estimatedFundingRate: fields[FIELD.estimatedFundingRate],
        nextFundingTime: fields[FIELD.nextFundingTime],
        fundingTimestamp: fields[FIELD.fundingTimestamp],
        sourceSymbol: fields[FIELD.sourceSymbol],
    };
}
