/**
 * Machine Client — polls the provider's host machine list.
 *
 * One GET per cycle with bearer auth, a hard request timeout and bounded
 * exponential retry. Each raw machine is schema-checked and normalized into
 * a MachineState; a malformed entry is reported and skipped so the rest of
 * the list still reconciles.
 */

import { FETCH } from './config';
import { FetchFn, isRetryable, requestText, sanitizeErrorSnippet } from './http';
import { withRetry, RetryExhaustedError, RetryPolicy } from './retry';
import { JsonSchema, SchemaValidator, describeErrors, isRecord } from './schema_validator';
import { ERRORS, ErrorFactory, MonitorError, StructuredError, toLogData } from './structured_error';
import { parseOccupancy, padOccupancy } from './occupancy';
import { createLogger, errorMessage, Logger } from './logger';
import { ClientHint, MachineState } from './types';

export interface MachineClientOptions {
    apiUrl: string;
    apiKey: string;
    fetchFn?: FetchFn;
    timeoutMs?: number;
    /** Overrides for attempts/backoff; tests inject sleepFn. */
    retry?: Partial<RetryPolicy>;
    logger?: Logger;
}

export interface FetchReport {
    machines: MachineState[];
    errors: StructuredError[];
}

export type NormalizeResult =
    | { ok: true; state: MachineState }
    | { ok: false; machineId: number | null; problems: string[] };

/* -------------------------------------------------------------------------- */
/* Raw record schema                                                          */
/* -------------------------------------------------------------------------- */

const NUM_OR_NULL: JsonSchema = { type: ['number', 'null'] };
const COUNT_OR_NULL: JsonSchema = { type: ['integer', 'null'], minimum: 0 };

const MACHINE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        machine_id: { type: 'integer', minimum: 0 },
        gpu_name: { type: ['string', 'null'] },
        num_gpus: { type: 'integer', minimum: 0 },
        gpu_occupancy: { type: 'string' },
        listed: { type: ['boolean', 'null'] },
        listed_gpu_cost: NUM_OR_NULL,
        min_bid_price: NUM_OR_NULL,
        bid_gpu_cost: NUM_OR_NULL,
        listed_storage_cost: NUM_OR_NULL,
        alloc_disk_space: NUM_OR_NULL,
        current_rentals_running: COUNT_OR_NULL,
        current_rentals_running_on_demand: COUNT_OR_NULL,
        current_rentals_resident: COUNT_OR_NULL,
        current_rentals_on_demand: COUNT_OR_NULL,
        error_description: { type: ['string', 'null'] },
        timeout: NUM_OR_NULL,
        clients: { type: ['array', 'null'] },
        client_end_date: { type: ['number', 'string', 'null'] },
    },
    required: ['machine_id', 'num_gpus', 'gpu_occupancy'],
};

const validator = new SchemaValidator();
validator.registerSchema('machine', MACHINE_SCHEMA);

/* -------------------------------------------------------------------------- */
/* Normalization                                                              */
/* -------------------------------------------------------------------------- */

function num(v: unknown): number {
    return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

/** Epoch seconds or an ISO string to ISO; anything else is null. */
export function toIsoDate(v: unknown): string | null {
    if (typeof v === 'number' && Number.isFinite(v) && v > 0) return new Date(v * 1000).toISOString();
    if (typeof v === 'string' && v.length > 0) {
        const ms = Date.parse(v);
        return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
    }
    return null;
}

function slotArray(v: unknown): number[] | null {
    if (!Array.isArray(v)) return null;
    const out = v.filter((x): x is number => typeof x === 'number' && Number.isInteger(x) && x >= 0);
    return out.length === v.length ? out : null;
}

/** Per-client storage/contract hints; entries without a GPU list are ignored. */
export function parseClientHints(raw: unknown): ClientHint[] {
    if (!Array.isArray(raw)) return [];
    const hints: ClientHint[] = [];
    for (const c of raw) {
        if (!isRecord(c)) continue;
        const gpus = slotArray(c.gpus) ?? slotArray(c.gpu_ids);
        if (!gpus || gpus.length === 0) continue;
        const storage = typeof c.storage_gb === 'number' ? c.storage_gb : typeof c.disk_space === 'number' ? c.disk_space : null;
        hints.push({ gpus, storage_gb: storage, end_date: toIsoDate(c.end_date ?? c.client_end_date) });
    }
    return hints;
}

export function normalizeMachine(raw: unknown): NormalizeResult {
    const machineId = isRecord(raw) && typeof raw.machine_id === 'number' ? raw.machine_id : null;
    const result = validator.validate(raw, 'machine');
    if (!result.valid || !isRecord(raw)) {
        return { ok: false, machineId, problems: describeErrors(result) };
    }

    const numGpus = num(raw.num_gpus);
    const occupancy = typeof raw.gpu_occupancy === 'string' ? raw.gpu_occupancy : '';
    const parsed = parseOccupancy(occupancy);
    if (!parsed.ok) {
        return { ok: false, machineId, problems: [`.gpu_occupancy: unknown slot codes ${parsed.invalid.join(',')}`] };
    }
    if (parsed.codes.length > numGpus) {
        return {
            ok: false,
            machineId,
            problems: [`.gpu_occupancy: ${parsed.codes.length} slots on a ${numGpus}-GPU machine`],
        };
    }

    return {
        ok: true,
        state: {
            machine_id: num(raw.machine_id),
            gpu_name: typeof raw.gpu_name === 'string' ? raw.gpu_name : '',
            num_gpus: numGpus,
            gpu_occupancy: occupancy,
            slot_codes: padOccupancy(parsed.codes, numGpus),
            counters: {
                resident: num(raw.current_rentals_resident),
                resident_on_demand: num(raw.current_rentals_on_demand),
                running: num(raw.current_rentals_running),
                running_on_demand: num(raw.current_rentals_running_on_demand),
            },
            alloc_disk_space: num(raw.alloc_disk_space),
            rates: {
                on_demand: num(raw.listed_gpu_cost),
                interruptible: num(raw.min_bid_price),
                reserved: num(raw.bid_gpu_cost),
                storage_per_gb_month: num(raw.listed_storage_cost),
            },
            client_hints: parseClientHints(raw.clients),
            client_end_date: toIsoDate(raw.client_end_date),
            error_description: typeof raw.error_description === 'string' && raw.error_description.length > 0
                ? raw.error_description
                : null,
            timeout: num(raw.timeout),
            listed: raw.listed === true,
        },
    };
}

/* -------------------------------------------------------------------------- */
/* Client                                                                     */
/* -------------------------------------------------------------------------- */

export class MachineClient {
    private readonly fetchFn: FetchFn;
    private readonly timeoutMs: number;
    private readonly policy: RetryPolicy;
    private readonly log: Logger;

    constructor(private readonly opts: MachineClientOptions) {
        this.fetchFn = opts.fetchFn ?? fetch;
        this.timeoutMs = opts.timeoutMs ?? FETCH.TIMEOUT_MS;
        this.log = opts.logger ?? createLogger('machine_client');
        this.policy = {
            maxAttempts: FETCH.MAX_ATTEMPTS,
            minMs: FETCH.BACKOFF_MIN_MS,
            maxMs: FETCH.BACKOFF_MAX_MS,
            retryable: isRetryable,
            onRetry: (attempt, waitMs, err) =>
                this.log.warn('Machine list fetch failed, retrying', { attempt, wait_ms: waitMs, error: errorMessage(err) }),
            ...opts.retry,
        };
    }

    private async fetchOnce(): Promise<unknown[]> {
        const body = await requestText(this.fetchFn, this.opts.apiUrl, {
            method: 'GET',
            headers: {
                'Accept': 'application/json',
                'Authorization': `Bearer ${this.opts.apiKey}`,
            },
        }, this.timeoutMs);

        let data: unknown;
        try {
            data = JSON.parse(body);
        } catch {
            throw new MonitorError(`provider_response_not_json: ${sanitizeErrorSnippet(body.slice(0, 200))}`, ERRORS.FETCH_FAILED);
        }
        if (!isRecord(data) || !Array.isArray(data.machines)) {
            throw new MonitorError('provider response has no machines array', ERRORS.FETCH_FAILED);
        }
        return data.machines;
    }

    /**
     * Fetch and normalize the machine list, keeping only `machineIds` when
     * given. Throws MonitorError(FETCH_EXHAUSTED) once retries run out.
     */
    async fetchMachines(machineIds?: readonly number[]): Promise<FetchReport> {
        let raw: unknown[];
        try {
            raw = await withRetry(() => this.fetchOnce(), this.policy);
        } catch (e) {
            if (e instanceof RetryExhaustedError) {
                const err = ErrorFactory.fetchExhausted(e.attempts, errorMessage(e.lastError));
                this.log.error(err.message, toLogData(err));
                throw new MonitorError(err.message, ERRORS.FETCH_EXHAUSTED, e);
            }
            throw e;
        }

        const wanted = machineIds ? new Set(machineIds) : null;
        const machines: MachineState[] = [];
        const errors: StructuredError[] = [];

        for (const entry of raw) {
            const id = isRecord(entry) && typeof entry.machine_id === 'number' ? entry.machine_id : null;
            if (wanted && (id === null || !wanted.has(id))) continue;

            const n = normalizeMachine(entry);
            if (n.ok) {
                machines.push(n.state);
            } else {
                const err = ErrorFactory.malformedSnapshot(n.machineId, n.problems);
                errors.push(err);
                this.log.warn(err.message, toLogData(err));
            }
        }

        this.log.debug('Fetched machines', { total: raw.length, kept: machines.length, malformed: errors.length });
        return { machines, errors };
    }
}
