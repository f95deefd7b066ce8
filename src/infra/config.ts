import fs from 'node:fs';
import path from 'node:path';
import { ConfigError } from './errors';
import { parseLogLevel, type LogLevel } from './logger';
import { normalizeSymbolList } from '../core/market/symbols';
import { DEFAULT_RECORD_TTL_SEC } from '../store/FieldStore';
import { BYBIT_SPOT_WS_URL } from '../exchange/bybit/tickerCodec';
import { COINDCX_FUNDING_RT_URL } from '../exchange/coindcx/restClient';
import { COINDCX_STREAM_URL } from '../exchange/coindcx/tradeCodec';

// ============================================================================
// AppConfig
// ----------------------------------------------------------------------------
// Собирается один раз при старте: defaults -> JSON-файл -> env.
// Дальше объект передаётся в конструкторы; глобального config-синглтона нет.
// ============================================================================

export type StoreDriver = 'redis' | 'memory';

/** Wire protocol of a stream: Bybit v5 over ws, CoinDCX over socket.io. */
export type StreamVenue = 'bybit' | 'coindcx';

export interface RedisSettings {
    host: string;
    port: number;
    password?: string;
    db: number;
}

export interface StoreConfig {
    driver: StoreDriver;
    ttlSec: number;
    redis: RedisSettings;
}

export interface StreamServiceConfig {
    id: string;
    enabled: boolean;
    venue: StreamVenue;
    /** Key prefix in the field store. */
    source: string;
    url: string;
    symbols: string[];
    connectTimeoutMs: number;
    reconnectDelayMs: number;
    watchdogIntervalMs: number;
    messageTimeoutMs: number;
    pingIntervalMs: number;
    stalenessThresholdMs: number;
}

export interface FundingServiceConfig {
    id: string;
    enabled: boolean;
    source: string;
    url: string;
    symbols: string[];
    fetchIntervalMs: number;
    retryAttempts: number;
    retryBaseMs: number;
    requestTimeoutMs: number;
    /** Unset = twice the fetch interval. */
    stalenessThresholdMs?: number;
}

export interface MonitoringConfig {
    healthCheckIntervalMs: number;
    statusLogIntervalMs: number;
    startStaggerMs: number;
    restartDelayMs: number;
    unhealthyGraceMs: number;
    stopTimeoutMs: number;
    shutdownTimeoutMs: number;
    maxRestarts?: number;
    autoRestart: boolean;
}

export interface LoggingConfig {
    level: LogLevel;
    dir: string;
    fileSinks: boolean;
    maxBytes: number;
    maxFiles: number;
    healthReportIntervalMs: number;
}

export interface AppConfig {
    configPath?: string;
    store: StoreConfig;
    streams: StreamServiceConfig[];
    funding: FundingServiceConfig[];
    monitoring: MonitoringConfig;
    logging: LoggingConfig;
}

export interface LoadConfigOptions {
    env?: NodeJS.ProcessEnv;
    argv?: readonly string[];
    cwd?: string;
}

export const DEFAULT_CONFIG_PATH = path.join('config', 'monitor.json');

const STREAM_DEFAULTS: Omit<StreamServiceConfig, 'id' | 'source' | 'symbols'> = {
    enabled: true,
    venue: 'bybit',
    url: BYBIT_SPOT_WS_URL,
    connectTimeoutMs: 15_000,
    reconnectDelayMs: 5_000,
    watchdogIntervalMs: 30_000,
    messageTimeoutMs: 60_000,
    pingIntervalMs: 20_000,
    stalenessThresholdMs: 60_000,
};

const FUNDING_DEFAULTS: Omit<FundingServiceConfig, 'id' | 'source' | 'symbols'> = {
    enabled: true,
    url: COINDCX_FUNDING_RT_URL,
    fetchIntervalMs: 60_000,
    retryAttempts: 3,
    retryBaseMs: 1_000,
    requestTimeoutMs: 10_000,
};

export function defaultConfig(): AppConfig {
    return {
        store: {
            driver: 'redis',
            ttlSec: DEFAULT_RECORD_TTL_SEC,
            redis: { host: 'localhost', port: 6379, db: 0 },
        },
        streams: [
            {
                ...STREAM_DEFAULTS,
                id: 'bybit_spot',
                source: 'bybit_spot',
                symbols: ['BTCUSDT', 'ETHUSDT', 'SOLUSDT'],
            },
        ],
        funding: [
            {
                ...FUNDING_DEFAULTS,
                id: 'coindcx_funding',
                source: 'coindcx_futures',
                symbols: ['B-BTC_USDT', 'B-ETH_USDT', 'B-SOL_USDT'],
            },
        ],
        monitoring: {
            healthCheckIntervalMs: 30_000,
            statusLogIntervalMs: 60_000,
            startStaggerMs: 1_000,
            restartDelayMs: 10_000,
            unhealthyGraceMs: 120_000,
            stopTimeoutMs: 10_000,
            shutdownTimeoutMs: 15_000,
            autoRestart: true,
        },
        logging: {
            level: 'info',
            dir: 'logs',
            fileSinks: true,
            maxBytes: 10 * 1024 * 1024,
            maxFiles: 5,
            healthReportIntervalMs: 60_000,
        },
    };
}

export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
    const env = opts.env ?? process.env;
    const argv = opts.argv ?? process.argv.slice(2);
    const cwd = opts.cwd ?? process.cwd();

    let config = defaultConfig();

    const explicitPath = readConfigArg(argv) ?? nonEmpty(env.MONITOR_CONFIG);
    const filePath = explicitPath ? path.resolve(cwd, explicitPath) : path.resolve(cwd, DEFAULT_CONFIG_PATH);
    if (fs.existsSync(filePath)) {
        config = applyFile(config, readJsonFile(filePath));
        config.configPath = filePath;
    } else if (explicitPath) {
        throw new ConfigError('Config file not found', { path: filePath });
    }

    config = normalizeSymbols(applyEnv(config, env));
    validateConfig(config);
    return config;
}

export function readConfigArg(argv: readonly string[]): string | undefined {
    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (arg === '--config') {
            const next = argv[i + 1];
            if (!next || next.startsWith('--')) throw new ConfigError('--config requires a path');
            return next;
        }
        if (arg.startsWith('--config=')) {
            const value = arg.slice('--config='.length);
            if (!value) throw new ConfigError('--config requires a path');
            return value;
        }
    }
    return undefined;
}

function readJsonFile(filePath: string): unknown {
    let text: string;
    try {
        text = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
        throw new ConfigError('Config file is not readable', { path: filePath }, err);
    }
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new ConfigError('Config file is not valid JSON', { path: filePath }, err);
    }
}

// ---------------------------------------------------------------------------
// JSON file layer
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: JsonObject, key: string, where: string): JsonObject | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (!isObject(value)) throw new ConfigError('Config section must be an object', { path: `${where}${key}` });
    return value;
}

function num(raw: JsonObject, key: string, fallback: number, where: string): number {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigError('Config value must be a number', { path: `${where}${key}` });
    }
    return value;
}

function optNum(raw: JsonObject, key: string, fallback: number | undefined, where: string): number | undefined {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (value === null) return undefined;
    return num(raw, key, 0, where);
}

function str(raw: JsonObject, key: string, fallback: string, where: string): string {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'string') throw new ConfigError('Config value must be a string', { path: `${where}${key}` });
    return value;
}

function bool(raw: JsonObject, key: string, fallback: boolean, where: string): boolean {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') throw new ConfigError('Config value must be a boolean', { path: `${where}${key}` });
    return value;
}

function strList(raw: JsonObject, key: string, fallback: string[], where: string): string[] {
    const value = raw[key];
    if (value === undefined) return fallback;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new ConfigError('Config value must be a list of strings', { path: `${where}${key}` });
    }
    return value;
}

function list(raw: JsonObject, key: string): JsonObject[] | undefined {
    const value = raw[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every(isObject)) {
        throw new ConfigError('Config value must be a list of objects', { path: key });
    }
    return value;
}

function parseDriver(value: string, where: string): StoreDriver {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'redis' || normalized === 'memory') return normalized;
    throw new ConfigError('Unknown store driver', { path: where, value });
}

// 0 снимает ограничение, и в файле, и в MAX_RESTARTS
function restartLimit(value: number | undefined): number | undefined {
    return value === 0 ? undefined : value;
}

function parseVenue(value: string, where: string): StreamVenue {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'bybit' || normalized === 'coindcx') return normalized;
    throw new ConfigError('Unknown stream venue', { path: where, value });
}

const DEFAULT_STREAM_URL: Record<StreamVenue, string> = {
    bybit: BYBIT_SPOT_WS_URL,
    coindcx: COINDCX_STREAM_URL,
};

function applyFile(base: AppConfig, raw: unknown): AppConfig {
    if (!isObject(raw)) throw new ConfigError('Config file must contain a JSON object');

    const store = section(raw, 'store', '') ?? {};
    const redis = section(store, 'redis', 'store.') ?? {};
    const monitoring = section(raw, 'monitoring', '') ?? {};
    const logging = section(raw, 'logging', '') ?? {};

    const streams = list(raw, 'streams')?.map((entry, i) => {
        const where = `streams[${i}].`;
        const id = str(entry, 'id', '', where);
        const venue = parseVenue(str(entry, 'venue', STREAM_DEFAULTS.venue, where), `${where}venue`);
        return {
            id,
            enabled: bool(entry, 'enabled', STREAM_DEFAULTS.enabled, where),
            venue,
            source: str(entry, 'source', id, where),
            url: str(entry, 'url', DEFAULT_STREAM_URL[venue], where),
            symbols: strList(entry, 'symbols', [], where),
            connectTimeoutMs: num(entry, 'connectTimeoutMs', STREAM_DEFAULTS.connectTimeoutMs, where),
            reconnectDelayMs: num(entry, 'reconnectDelayMs', STREAM_DEFAULTS.reconnectDelayMs, where),
            watchdogIntervalMs: num(entry, 'watchdogIntervalMs', STREAM_DEFAULTS.watchdogIntervalMs, where),
            messageTimeoutMs: num(entry, 'messageTimeoutMs', STREAM_DEFAULTS.messageTimeoutMs, where),
            pingIntervalMs: num(entry, 'pingIntervalMs', STREAM_DEFAULTS.pingIntervalMs, where),
            stalenessThresholdMs: num(entry, 'stalenessThresholdMs', STREAM_DEFAULTS.stalenessThresholdMs, where),
        };
    });

    const funding = list(raw, 'funding')?.map((entry, i) => {
        const where = `funding[${i}].`;
        const id = str(entry, 'id', '', where);
        return {
            id,
            enabled: bool(entry, 'enabled', FUNDING_DEFAULTS.enabled, where),
            source: str(entry, 'source', id, where),
            url: str(entry, 'url', FUNDING_DEFAULTS.url, where),
            symbols: strList(entry, 'symbols', [], where),
            fetchIntervalMs: num(entry, 'fetchIntervalMs', FUNDING_DEFAULTS.fetchIntervalMs, where),
            retryAttempts: num(entry, 'retryAttempts', FUNDING_DEFAULTS.retryAttempts, where),
            retryBaseMs: num(entry, 'retryBaseMs', FUNDING_DEFAULTS.retryBaseMs, where),
            requestTimeoutMs: num(entry, 'requestTimeoutMs', FUNDING_DEFAULTS.requestTimeoutMs, where),
            stalenessThresholdMs: optNum(entry, 'stalenessThresholdMs', undefined, where),
        };
    });

    const password = redis.password === undefined ? base.store.redis.password : str(redis, 'password', '', 'store.redis.');

    return {
        configPath: base.configPath,
        store: {
            driver: parseDriver(str(store, 'driver', base.store.driver, 'store.'), 'store.driver'),
            ttlSec: num(store, 'ttlSec', base.store.ttlSec, 'store.'),
            redis: {
                host: str(redis, 'host', base.store.redis.host, 'store.redis.'),
                port: num(redis, 'port', base.store.redis.port, 'store.redis.'),
                password: nonEmpty(password),
                db: num(redis, 'db', base.store.redis.db, 'store.redis.'),
            },
        },
        streams: streams ?? base.streams,
        funding: funding ?? base.funding,
        monitoring: {
            healthCheckIntervalMs: num(monitoring, 'healthCheckIntervalMs', base.monitoring.healthCheckIntervalMs, 'monitoring.'),
            statusLogIntervalMs: num(monitoring, 'statusLogIntervalMs', base.monitoring.statusLogIntervalMs, 'monitoring.'),
            startStaggerMs: num(monitoring, 'startStaggerMs', base.monitoring.startStaggerMs, 'monitoring.'),
            restartDelayMs: num(monitoring, 'restartDelayMs', base.monitoring.restartDelayMs, 'monitoring.'),
            unhealthyGraceMs: num(monitoring, 'unhealthyGraceMs', base.monitoring.unhealthyGraceMs, 'monitoring.'),
            stopTimeoutMs: num(monitoring, 'stopTimeoutMs', base.monitoring.stopTimeoutMs, 'monitoring.'),
            shutdownTimeoutMs: num(monitoring, 'shutdownTimeoutMs', base.monitoring.shutdownTimeoutMs, 'monitoring.'),
            maxRestarts: restartLimit(optNum(monitoring, 'maxRestarts', base.monitoring.maxRestarts, 'monitoring.')),
            autoRestart: bool(monitoring, 'autoRestart', base.monitoring.autoRestart, 'monitoring.'),
        },
        logging: {
            level: parseLogLevel(str(logging, 'level', base.logging.level, 'logging.'), base.logging.level),
            dir: str(logging, 'dir', base.logging.dir, 'logging.'),
            fileSinks: bool(logging, 'fileSinks', base.logging.fileSinks, 'logging.'),
            maxBytes: num(logging, 'maxBytes', base.logging.maxBytes, 'logging.'),
            maxFiles: num(logging, 'maxFiles', base.logging.maxFiles, 'logging.'),
            healthReportIntervalMs: num(logging, 'healthReportIntervalMs', base.logging.healthReportIntervalMs, 'logging.'),
        },
    };
}

// ---------------------------------------------------------------------------
// Environment layer
// ---------------------------------------------------------------------------

function nonEmpty(raw: string | undefined): string | undefined {
    const trimmed = raw?.trim();
    return trimmed ? trimmed : undefined;
}

function envInt(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = nonEmpty(env[name]);
    if (raw === undefined) return undefined;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed)) throw new ConfigError('Environment value must be an integer', { name, value: raw });
    return parsed;
}

function envList(env: NodeJS.ProcessEnv, name: string): string[] | undefined {
    const raw = nonEmpty(env[name]);
    if (raw === undefined) return undefined;
    return raw
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean);
}

export function readFlag(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (raw === undefined) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (normalized === '0' || normalized === 'false' || normalized === 'off') return false;
    if (normalized === '1' || normalized === 'true' || normalized === 'on') return true;
    return fallback;
}

function applyEnv(base: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
    const spotSymbols = envList(env, 'BYBIT_SPOT_SYMBOLS');
    const fundingSymbols = envList(env, 'COINDCX_FUNDING_SYMBOLS');
    const fetchIntervalMs = envInt(env, 'FUNDING_FETCH_INTERVAL_MS');
    const driver = nonEmpty(env.STORE_DRIVER);
    const maxRestarts = envInt(env, 'MAX_RESTARTS');
    const ltpSymbols = envList(env, 'COINDCX_LTP_SYMBOLS');

    return {
        ...base,
        store: {
            driver: driver ? parseDriver(driver, 'STORE_DRIVER') : base.store.driver,
            ttlSec: envInt(env, 'STORE_TTL_SEC') ?? base.store.ttlSec,
            redis: {
                host: nonEmpty(env.REDIS_HOST) ?? base.store.redis.host,
                port: envInt(env, 'REDIS_PORT') ?? base.store.redis.port,
                password: nonEmpty(env.REDIS_PASSWORD) ?? base.store.redis.password,
                db: envInt(env, 'REDIS_DB') ?? base.store.redis.db,
            },
        },
        streams: base.streams.map((stream) => {
            if (stream.id === 'bybit_spot' && spotSymbols) return { ...stream, symbols: spotSymbols };
            if (stream.id === 'coindcx_ltp' && ltpSymbols) return { ...stream, symbols: ltpSymbols };
            return stream;
        }),
        funding: base.funding.map((service) => ({
            ...service,
            symbols: service.id === 'coindcx_funding' && fundingSymbols ? fundingSymbols : service.symbols,
            fetchIntervalMs: fetchIntervalMs ?? service.fetchIntervalMs,
        })),
        monitoring: {
            ...base.monitoring,
            healthCheckIntervalMs: envInt(env, 'HEALTH_CHECK_INTERVAL_MS') ?? base.monitoring.healthCheckIntervalMs,
            restartDelayMs: envInt(env, 'RESTART_DELAY_MS') ?? base.monitoring.restartDelayMs,
            maxRestarts: maxRestarts === undefined ? base.monitoring.maxRestarts : restartLimit(maxRestarts),
            autoRestart: readFlag(env, 'AUTO_RESTART', base.monitoring.autoRestart),
        },
        logging: {
            ...base.logging,
            level: parseLogLevel(env.LOG_LEVEL, base.logging.level),
            dir: nonEmpty(env.LOG_DIR) ?? base.logging.dir,
        },
    };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function normalizeSymbols(config: AppConfig): AppConfig {
    return {
        ...config,
        streams: config.streams.map((stream) => ({ ...stream, symbols: normalizeSymbolList(stream.symbols) })),
        funding: config.funding.map((service) => ({ ...service, symbols: normalizeSymbolList(service.symbols) })),
    };
}

function requirePositive(value: number, name: string): void {
    if (!Number.isFinite(value) || value <= 0) throw new ConfigError('Value must be positive', { name, value });
}

export function validateConfig(config: AppConfig): void {
    requirePositive(config.store.ttlSec, 'store.ttlSec');
    requirePositive(config.store.redis.port, 'store.redis.port');
    if (config.store.redis.db < 0) throw new ConfigError('Redis db must be >= 0', { value: config.store.redis.db });

    const ids = new Set<string>();
    const claim = (id: string, where: string) => {
        if (!id) throw new ConfigError('Service id is required', { path: where });
        if (ids.has(id)) throw new ConfigError('Duplicate service id', { id });
        ids.add(id);
    };

    config.streams.forEach((stream, i) => {
        const where = `streams[${i}]`;
        claim(stream.id, where);
        if (stream.enabled && stream.symbols.length === 0) throw new ConfigError('Stream has no symbols', { id: stream.id });
        if (!/^wss?:\/\//.test(stream.url)) throw new ConfigError('Stream url must be ws:// or wss://', { id: stream.id, url: stream.url });
        requirePositive(stream.connectTimeoutMs, `${where}.connectTimeoutMs`);
        requirePositive(stream.reconnectDelayMs, `${where}.reconnectDelayMs`);
        requirePositive(stream.watchdogIntervalMs, `${where}.watchdogIntervalMs`);
        requirePositive(stream.messageTimeoutMs, `${where}.messageTimeoutMs`);
        requirePositive(stream.stalenessThresholdMs, `${where}.stalenessThresholdMs`);
        if (stream.pingIntervalMs < 0) throw new ConfigError('pingIntervalMs must be >= 0', { id: stream.id });
    });

    config.funding.forEach((service, i) => {
        const where = `funding[${i}]`;
        claim(service.id, where);
        if (service.enabled && service.symbols.length === 0) throw new ConfigError('Funding service has no symbols', { id: service.id });
        if (!/^https?:\/\//.test(service.url)) throw new ConfigError('Funding url must be http(s)', { id: service.id, url: service.url });
        requirePositive(service.fetchIntervalMs, `${where}.fetchIntervalMs`);
        if (!Number.isInteger(service.retryAttempts) || service.retryAttempts <= 0) {
            throw new ConfigError('retryAttempts must be a positive integer', { id: service.id, value: service.retryAttempts });
        }
        requirePositive(service.retryBaseMs, `${where}.retryBaseMs`);
        requirePositive(service.requestTimeoutMs, `${where}.requestTimeoutMs`);
        if (service.stalenessThresholdMs !== undefined) requirePositive(service.stalenessThresholdMs, `${where}.stalenessThresholdMs`);
    });

    const enabled = config.streams.filter((s) => s.enabled).length + config.funding.filter((s) => s.enabled).length;
    if (enabled === 0) throw new ConfigError('No services enabled');

    const monitoring = config.monitoring;
    requirePositive(monitoring.healthCheckIntervalMs, 'monitoring.healthCheckIntervalMs');
    requirePositive(monitoring.statusLogIntervalMs, 'monitoring.statusLogIntervalMs');
    requirePositive(monitoring.restartDelayMs, 'monitoring.restartDelayMs');
    requirePositive(monitoring.unhealthyGraceMs, 'monitoring.unhealthyGraceMs');
    requirePositive(monitoring.stopTimeoutMs, 'monitoring.stopTimeoutMs');
    requirePositive(monitoring.shutdownTimeoutMs, 'monitoring.shutdownTimeoutMs');
    if (monitoring.startStaggerMs < 0) throw new ConfigError('startStaggerMs must be >= 0', { value: monitoring.startStaggerMs });
    if (monitoring.maxRestarts !== undefined && (!Number.isInteger(monitoring.maxRestarts) || monitoring.maxRestarts <= 0)) {
        throw new ConfigError('maxRestarts must be a positive integer', { value: monitoring.maxRestarts });
    }

    requirePositive(config.logging.maxBytes, 'logging.maxBytes');
    requirePositive(config.logging.maxFiles, 'logging.maxFiles');
    requirePositive(config.logging.healthReportIntervalMs, 'logging.healthReportIntervalMs');
}
