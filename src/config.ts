/**
 * Shared Configuration
 *
 * Tunable constants (overridable via SLOTWATCH_* environment variables) and the
 * JSON config file loader.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SchemaValidator, JsonSchema, describeErrors, isRecord } from './schema_validator';
import { MonitorError, ERRORS } from './structured_error';

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const v = parseFloat(raw);
    return Number.isFinite(v) ? v : fallback;
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return fallback;
    const v = parseInt(raw, 10);
    return Number.isFinite(v) ? v : fallback;
}

// Provider endpoint listing the host's machines
export const DEFAULT_API_URL = process.env.SLOTWATCH_API_URL || 'https://console.vast.ai/api/v0/machines/';

// Reconciliation heuristics
export const RECONCILE = {
    DISK_TOLERANCE_GB: envFloat('SLOTWATCH_DISK_TOLERANCE_GB', 1.0),
    DISK_DROP_EPSILON_GB: 0.1,
};

// Billing
export const HOURS_PER_MONTH = 730;

// Poll loop
export const MIN_CHECK_FREQUENCY_S = 60;

// Upstream fetch (milliseconds)
export const FETCH = {
    TIMEOUT_MS: envInt('SLOTWATCH_FETCH_TIMEOUT_MS', 30_000),
    MAX_ATTEMPTS: 3,
    BACKOFF_MIN_MS: 2_000,
    BACKOFF_MAX_MS: 30_000,
};

// Notification delivery (milliseconds)
export const DELIVERY = {
    TIMEOUT_MS: envInt('SLOTWATCH_DELIVERY_TIMEOUT_MS', 15_000),
    MAX_ATTEMPTS: 3,
    BACKOFF_MIN_MS: 2_000,
    BACKOFF_MAX_MS: 10_000,
    MAX_WORKERS: 8,
};

// Single-writer lock on the state directory
export const LOCK = {
    FILE_NAME: 'slotwatch.lock',
    TIMEOUT_MS: 5_000,
    STALE_TTL_MS: 24 * 60 * 60 * 1000,
};

export const STORE = {
    DB_FILE_NAME: 'slotwatch.db',
    ARCHIVE_DIR_NAME: 'rental_logs',
    ARCHIVE_CACHE_MAX_ENTRIES: 500,
};

/* -------------------------------------------------------------------------- */
/* Config file                                                                */
/* -------------------------------------------------------------------------- */

export interface TargetConfig {
    url: string;
    name: string | null;
    enabled: boolean;
    service: string | null;
    mention: string | null;
    events: string[] | null;
}

export interface NotifyConfig {
    on_startup_existing: boolean;
    on_start: boolean;
    on_shutdown: boolean;
    error_ping_interval_minutes: number;
}

export interface AppConfig {
    api_key: string;
    api_url: string;
    machine_ids: number[];
    log_file: string;
    check_frequency: number;
    state_dir: string;
    disk_tolerance_gb: number;
    notify: NotifyConfig;
    targets: TargetConfig[];
    error_mention: string | null;
    debug: boolean;
}

const TARGET_SCHEMA: JsonSchema = {
    type: ['string', 'object'],
    properties: {
        url: { type: 'string' },
        name: { type: ['string', 'null'] },
        enabled: { type: 'boolean' },
        service: { type: ['string', 'null'] },
        mention: { type: ['string', 'null'] },
        events: { type: ['array', 'string', 'null'], items: { type: 'string' } },
    },
    required: ['url'],
};

const CONFIG_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        api_key: { type: 'string' },
        api_url: { type: 'string', pattern: '^https?://' },
        machine_ids: { type: 'array', items: { type: 'integer', minimum: 0 }, minItems: 1 },
        log_file: { type: 'string', pattern: '\\.log$' },
        check_frequency: { type: 'integer', minimum: MIN_CHECK_FREQUENCY_S },
        state_dir: { type: 'string' },
        disk_tolerance_gb: { type: 'number', minimum: 0 },
        notify: {
            type: 'object',
            properties: {
                on_startup_existing: { type: 'boolean' },
                on_start: { type: 'boolean' },
                on_shutdown: { type: 'boolean' },
                error_ping_interval_minutes: { type: 'integer', minimum: 1 },
            },
        },
        targets: { type: 'array', items: TARGET_SCHEMA },
        error_mention: { type: ['string', 'null'] },
        debug: { type: 'boolean' },
    },
    required: ['machine_ids', 'log_file', 'check_frequency'],
};

const validator = new SchemaValidator();
validator.registerSchema('app_config', CONFIG_SCHEMA);

function str(v: unknown, fallback: string): string {
    return typeof v === 'string' ? v : fallback;
}

function strOrNull(v: unknown): string | null {
    return typeof v === 'string' && v.length > 0 ? v : null;
}

function bool(v: unknown, fallback: boolean): boolean {
    return typeof v === 'boolean' ? v : fallback;
}

function num(v: unknown, fallback: number): number {
    return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function normalizeTarget(raw: unknown): TargetConfig {
    if (typeof raw === 'string') {
        return { url: raw, name: null, enabled: true, service: null, mention: null, events: null };
    }
    const t = isRecord(raw) ? raw : {};
    let events: string[] | null = null;
    if (typeof t.events === 'string') events = [t.events];
    else if (Array.isArray(t.events)) events = t.events.filter((e): e is string => typeof e === 'string');
    return {
        url: str(t.url, ''),
        name: strOrNull(t.name),
        enabled: bool(t.enabled, true),
        service: strOrNull(t.service),
        mention: strOrNull(t.mention),
        events,
    };
}

/**
 * Validate a parsed config object and fill defaults. `baseDir` anchors the
 * relative state_dir and log_file paths.
 */
export function parseConfig(raw: unknown, baseDir: string): AppConfig {
    const result = validator.validate(raw, 'app_config');
    if (!result.valid || !isRecord(raw)) {
        throw new MonitorError(`Invalid config: ${describeErrors(result).join('; ')}`, ERRORS.INVALID_CONFIG);
    }

    const apiKey = process.env.SLOTWATCH_API_KEY || str(raw.api_key, '');
    if (!apiKey) {
        throw new MonitorError('Invalid config: api_key missing (set it in the file or SLOTWATCH_API_KEY)', ERRORS.INVALID_CONFIG);
    }

    const stateDir = path.resolve(baseDir, str(raw.state_dir, '.'));
    const logFile = str(raw.log_file, 'slotwatch.log');
    const notify = isRecord(raw.notify) ? raw.notify : {};
    const machineIds = Array.isArray(raw.machine_ids)
        ? raw.machine_ids.filter((m): m is number => typeof m === 'number')
        : [];

    return {
        api_key: apiKey,
        api_url: str(raw.api_url, DEFAULT_API_URL),
        machine_ids: machineIds,
        log_file: path.isAbsolute(logFile) ? logFile : path.join(stateDir, logFile),
        check_frequency: num(raw.check_frequency, MIN_CHECK_FREQUENCY_S),
        state_dir: stateDir,
        disk_tolerance_gb: num(raw.disk_tolerance_gb, RECONCILE.DISK_TOLERANCE_GB),
        notify: {
            on_startup_existing: bool(notify.on_startup_existing, false),
            on_start: bool(notify.on_start, true),
            on_shutdown: bool(notify.on_shutdown, true),
            error_ping_interval_minutes: num(notify.error_ping_interval_minutes, 60),
        },
        targets: Array.isArray(raw.targets) ? raw.targets.map(normalizeTarget) : [],
        error_mention: strOrNull(raw.error_mention),
        debug: bool(raw.debug, false),
    };
}

/** Read and validate the JSON config file. */
export function loadConfig(configPath: string): AppConfig {
    const resolved = path.resolve(configPath);
    if (!fs.existsSync(resolved)) {
        throw new MonitorError(`Config file not found: ${resolved}`, ERRORS.INVALID_CONFIG);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (e) {
        throw new MonitorError(`Config file is not valid JSON: ${resolved}`, ERRORS.INVALID_CONFIG, e);
    }

    return parseConfig(raw, path.dirname(resolved));
}
