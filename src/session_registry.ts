/**
 * Session Registry — per-machine slot→session and session-id→session maps.
 *
 * A SessionRegistry is a private working copy built from a persisted
 * MachineRegistry at the start of a reconciliation pass; the pass mutates it
 * freely and hands back `toSnapshot()` for a single commit.
 *
 * Loading is tolerant: missing keys get defaults, unknown statuses or
 * malformed sessions are dropped (and reported), never guessed at.
 */

import { RentalSession, sortedSlots } from './rental_session';
import { stableStringify } from './state_io';
import { MonitorError, ERRORS } from './structured_error';
import { isRecord } from './schema_validator';
import { ZERO_COUNTERS } from './pause_budget';
import {
    GpuSegment,
    MachineRegistry,
    RentalCategory,
    RentalCounters,
    SessionRecord,
    SessionStatus,
    SessionTotals,
    StorageSegment,
} from './types';

export type RegistryMeta = Omit<MachineRegistry, 'machine_id' | 'gpus' | 'sessions' | 'next_session_seq' | 'updated_at'>;

export function formatSessionId(machineId: number, seq: number): string {
    return `m${machineId}-${String(seq).padStart(4, '0')}`;
}

/** Sequence number encoded in a session id, or null for foreign ids. */
export function sessionSeq(sessionId: string): number | null {
    const m = /-(\d+)$/.exec(sessionId);
    return m ? parseInt(m[1], 10) : null;
}

export function emptyRegistry(machineId: number, at: string): MachineRegistry {
    return {
        machine_id: machineId,
        gpus: {},
        sessions: {},
        next_session_seq: 1,
        counters: { ...ZERO_COUNTERS },
        alloc_disk_space: 0,
        gpu_occupancy: '',
        gpu_name: '',
        num_gpus: 0,
        observed_fingerprint: '',
        last_error_description: null,
        last_error_notified_at: null,
        last_timeout: 0,
        last_timeout_notified_at: null,
        updated_at: at,
    };
}

/* -------------------------------------------------------------------------- */
/* Coercion from stored JSON                                                  */
/* -------------------------------------------------------------------------- */

function num(v: unknown, fallback = 0): number {
    const n = typeof v === 'string' ? Number(v) : v;
    return typeof n === 'number' && Number.isFinite(n) ? n : fallback;
}

function strOrNull(v: unknown): string | null {
    return typeof v === 'string' && v.length > 0 ? v : null;
}

function category(v: unknown): RentalCategory {
    return v === 'D' || v === 'I' || v === 'R' ? v : 'D';
}

function status(v: unknown): SessionStatus | null {
    return v === 'running' || v === 'stored' || v === 'ended' ? v : null;
}

function slotList(v: unknown): number[] {
    if (!Array.isArray(v)) return [];
    return sortedSlots(v.map(x => num(x, -1)).filter(x => Number.isInteger(x) && x >= 0));
}

function coerceGpuSegments(v: unknown): GpuSegment[] {
    if (!Array.isArray(v)) return [];
    const out: GpuSegment[] = [];
    for (const s of v) {
        if (!isRecord(s) || typeof s.start !== 'string') continue;
        out.push({ start: s.start, end: strOrNull(s.end), rate: num(s.rate), gpu_count: num(s.gpu_count) });
    }
    return out;
}

function coerceStorageSegments(v: unknown): StorageSegment[] {
    if (!Array.isArray(v)) return [];
    const out: StorageSegment[] = [];
    for (const s of v) {
        if (!isRecord(s) || typeof s.start !== 'string') continue;
        out.push({ start: s.start, end: strOrNull(s.end), rate_per_gb_month: num(s.rate_per_gb_month) });
    }
    return out;
}

function coerceTotals(v: unknown): SessionTotals | null {
    if (!isRecord(v)) return null;
    return {
        duration_seconds: num(v.duration_seconds),
        earned_gpu: num(v.earned_gpu),
        earned_storage: num(v.earned_storage),
        earned_total: num(v.earned_total),
    };
}

export function coerceCounters(v: unknown): RentalCounters {
    const c = isRecord(v) ? v : {};
    return {
        resident: num(c.resident),
        resident_on_demand: num(c.resident_on_demand),
        running: num(c.running),
        running_on_demand: num(c.running_on_demand),
    };
}

/** Normalize one stored session; null when it cannot be trusted. */
export function coerceSession(raw: unknown, machineId: number, fallbackId?: string): SessionRecord | null {
    if (!isRecord(raw)) return null;
    const id = strOrNull(raw.session_id) ?? fallbackId ?? null;
    const st = status(raw.status ?? 'running');
    if (!id || !st) return null;
    const start = strOrNull(raw.start_time);
    if (!start) return null;

    return {
        session_id: id,
        machine_id: num(raw.machine_id, machineId),
        status: st,
        gpus: slotList(raw.gpus),
        rental_type: category(raw.rental_type),
        gpu_contracted_rate: num(raw.gpu_contracted_rate),
        storage_contracted_rate: num(raw.storage_contracted_rate),
        storage_gb: num(raw.storage_gb),
        gpu_segments: coerceGpuSegments(raw.gpu_segments),
        storage_segments: coerceStorageSegments(raw.storage_segments),
        start_time: start,
        last_state_change: strOrNull(raw.last_state_change) ?? start,
        client_end_date: strOrNull(raw.client_end_date),
        end_time: strOrNull(raw.end_time),
        totals: coerceTotals(raw.totals),
    };
}

export interface CoercedRegistry {
    registry: MachineRegistry;
    dropped: string[];
}

export function coerceRegistry(raw: unknown, machineId: number): CoercedRegistry {
    if (!isRecord(raw)) {
        throw new MonitorError(`Stored registry for machine ${machineId} is not an object`, ERRORS.CORRUPT_REGISTRY);
    }
    const dropped: string[] = [];
    const base = emptyRegistry(machineId, strOrNull(raw.updated_at) ?? new Date(0).toISOString());

    const sessions: Record<string, SessionRecord> = {};
    if (isRecord(raw.sessions)) {
        for (const [key, value] of Object.entries(raw.sessions)) {
            const s = coerceSession(value, machineId, key);
            if (s && s.status !== 'ended') sessions[s.session_id] = s;
            else dropped.push(key);
        }
    }

    const gpus: Record<string, string> = {};
    if (isRecord(raw.gpus)) {
        for (const [slot, sid] of Object.entries(raw.gpus)) {
            if (typeof sid === 'string' && sessions[sid] && /^\d+$/.test(slot)) gpus[slot] = sid;
        }
    }

    return {
        registry: {
            ...base,
            gpus,
            sessions,
            next_session_seq: Math.max(1, Math.floor(num(raw.next_session_seq, 1))),
            counters: coerceCounters(raw.counters),
            alloc_disk_space: num(raw.alloc_disk_space),
            gpu_occupancy: typeof raw.gpu_occupancy === 'string' ? raw.gpu_occupancy : '',
            gpu_name: typeof raw.gpu_name === 'string' ? raw.gpu_name : '',
            num_gpus: num(raw.num_gpus),
            observed_fingerprint: typeof raw.observed_fingerprint === 'string' ? raw.observed_fingerprint : '',
            last_error_description: strOrNull(raw.last_error_description),
            last_error_notified_at: strOrNull(raw.last_error_notified_at),
            last_timeout: num(raw.last_timeout),
            last_timeout_notified_at: strOrNull(raw.last_timeout_notified_at),
        },
        dropped,
    };
}

export function serializeRegistry(reg: MachineRegistry): string {
    return stableStringify(reg);
}

export function deserializeRegistry(payload: string, machineId: number): CoercedRegistry {
    let raw: unknown;
    try {
        raw = JSON.parse(payload);
    } catch (e) {
        throw new MonitorError(`Stored registry for machine ${machineId} is not valid JSON`, ERRORS.CORRUPT_REGISTRY, e);
    }
    return coerceRegistry(raw, machineId);
}

/* -------------------------------------------------------------------------- */
/* Working copy                                                               */
/* -------------------------------------------------------------------------- */

export class SessionRegistry {
    readonly machineId: number;
    meta: RegistryMeta;
    private readonly slots = new Map<number, string>();
    private readonly sessions = new Map<string, RentalSession>();
    private nextSeq: number;

    private constructor(machineId: number, meta: RegistryMeta, nextSeq: number) {
        this.machineId = machineId;
        this.meta = meta;
        this.nextSeq = nextSeq;
    }

    static fromSnapshot(reg: MachineRegistry): SessionRegistry {
        const { machine_id, gpus, sessions, next_session_seq, updated_at: _updated, ...meta } = reg;
        const r = new SessionRegistry(machine_id, {
            ...meta,
            counters: { ...meta.counters },
        }, next_session_seq);
        for (const [sid, rec] of Object.entries(sessions)) {
            r.sessions.set(sid, RentalSession.fromRecord(rec));
        }
        for (const [slot, sid] of Object.entries(gpus)) {
            r.slots.set(Number(slot), sid);
        }
        return r;
    }

    toSnapshot(at: string): MachineRegistry {
        const gpus: Record<string, string> = {};
        for (const slot of [...this.slots.keys()].sort((a, b) => a - b)) {
            const sid = this.slots.get(slot);
            if (sid !== undefined) gpus[String(slot)] = sid;
        }
        const sessions: Record<string, SessionRecord> = {};
        for (const [sid, s] of this.sessions) sessions[sid] = s.toRecord();
        return {
            machine_id: this.machineId,
            gpus,
            sessions,
            next_session_seq: this.nextSeq,
            ...this.meta,
            counters: { ...this.meta.counters },
            updated_at: at,
        };
    }

    get nextSequence(): number {
        return this.nextSeq;
    }

    /** Next id; never reuses a sequence number seen in this registry. */
    allocateId(): string {
        let seq = this.nextSeq;
        for (const sid of this.sessions.keys()) {
            const s = sessionSeq(sid);
            if (s !== null && s >= seq) seq = s + 1;
        }
        this.nextSeq = seq + 1;
        return formatSessionId(this.machineId, seq);
    }

    get(sid: string): RentalSession | undefined {
        return this.sessions.get(sid);
    }

    all(): RentalSession[] {
        return [...this.sessions.values()];
    }

    running(): RentalSession[] {
        return this.all().filter(s => s.status === 'running');
    }

    stored(): RentalSession[] {
        return this.all().filter(s => s.status === 'stored');
    }

    add(session: RentalSession): void {
        this.sessions.set(session.id, session);
    }

    /** Drop a session and any slot still pointing at it. */
    remove(sid: string): RentalSession | undefined {
        const s = this.sessions.get(sid);
        this.sessions.delete(sid);
        for (const [slot, owner] of this.slots) {
            if (owner === sid) this.slots.delete(slot);
        }
        return s;
    }

    ownerOf(slot: number): string | undefined {
        return this.slots.get(slot);
    }

    slotsOf(sid: string): number[] {
        const out: number[] = [];
        for (const [slot, owner] of this.slots) if (owner === sid) out.push(slot);
        return sortedSlots(out);
    }

    assign(slots: readonly number[], sid: string): void {
        for (const slot of slots) this.slots.set(slot, sid);
    }

    release(slot: number): string | undefined {
        const sid = this.slots.get(slot);
        this.slots.delete(slot);
        return sid;
    }

    get size(): number {
        return this.sessions.size;
    }

    /**
     * Structural invariants. Ownership lives in the slot map: every mapped
     * slot points at a running session, and every running session's GPU set
     * is exactly the slots mapped to it. Stored sessions keep their last GPU
     * set for matching but own no slots.
     */
    checkInvariants(): string[] {
        const problems: string[] = [];
        for (const [slot, sid] of this.slots) {
            const s = this.sessions.get(sid);
            if (!s) problems.push(`slot ${slot} points at unknown session ${sid}`);
            else if (s.status !== 'running') problems.push(`slot ${slot} points at ${s.status} session ${sid}`);
        }
        let maxSeq = 0;
        for (const s of this.sessions.values()) {
            if (s.status === 'running') {
                const mapped = this.slotsOf(s.id);
                if (!s.ownsExactly(mapped)) {
                    problems.push(`session ${s.id} gpus [${s.gpus.join(',')}] != mapped slots [${mapped.join(',')}]`);
                }
            }
            if (s.status === 'ended') problems.push(`ended session ${s.id} still active`);
            const seq = sessionSeq(s.id);
            if (seq !== null) maxSeq = Math.max(maxSeq, seq);
            problems.push(...s.timelineProblems());
        }
        if (maxSeq >= this.nextSeq) problems.push(`next_session_seq ${this.nextSeq} not above highest id ${maxSeq}`);
        return problems;
    }
}
