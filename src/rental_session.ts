/**
 * RentalSession — one inferred rental and its billing ledger.
 *
 * The ledger keeps two independent segment timelines:
 *   GPU      rate ($/GPU/hour) × gpu_count × hours
 *   storage  rate ($/GB/month) × storage_gb × hours / 730
 *
 * INVARIANTS:
 * - at most one open segment per timeline, always the last one
 * - a new segment starts exactly where the previous one was closed
 * - storage cost never rises during a session (price drops open a new
 *   segment, rises are ignored)
 *
 * Arithmetic is full precision. Rounding belongs to reports and formatters.
 */

import { HOURS_PER_MONTH } from './config';
import {
    GpuSegment,
    RentalCategory,
    SessionRecord,
    SessionStatus,
    SessionTotals,
    StorageSegment,
} from './types';

const MS_PER_HOUR = 3_600_000;

export interface NewSessionParams {
    session_id: string;
    machine_id: number;
    gpus: number[];
    rental_type: RentalCategory;
    gpu_contracted_rate: number;
    storage_contracted_rate: number;
    storage_gb: number;
    client_end_date?: string | null;
    at: string;
}

export interface HourlyEstimate {
    gpu: number;
    storage: number;
    total: number;
}

/** Elapsed hours between two ISO timestamps, clamped at zero. */
export function elapsedHours(startIso: string, endIso: string): number {
    const start = Date.parse(startIso);
    const end = Date.parse(endIso);
    if (!Number.isFinite(start) || !Number.isFinite(end)) return 0;
    return Math.max(0, end - start) / MS_PER_HOUR;
}

/**
 * Billed rate given an observed market rate and the contracted ceiling.
 * A ceiling of zero means "never recorded" and bills the observed rate.
 */
export function cappedRate(observed: number, ceiling: number): number {
    return ceiling > 0 ? Math.min(observed, ceiling) : observed;
}

function copyRecord(rec: SessionRecord): SessionRecord {
    return {
        ...rec,
        gpus: [...rec.gpus],
        gpu_segments: rec.gpu_segments.map(s => ({ ...s })),
        storage_segments: rec.storage_segments.map(s => ({ ...s })),
        totals: rec.totals ? { ...rec.totals } : null,
    };
}

export class RentalSession {
    private readonly rec: SessionRecord;

    private constructor(rec: SessionRecord) {
        this.rec = rec;
    }

    static create(p: NewSessionParams): RentalSession {
        return new RentalSession({
            session_id: p.session_id,
            machine_id: p.machine_id,
            status: 'running',
            gpus: sortedSlots(p.gpus),
            rental_type: p.rental_type,
            gpu_contracted_rate: p.gpu_contracted_rate,
            storage_contracted_rate: p.storage_contracted_rate,
            storage_gb: p.storage_gb,
            gpu_segments: [],
            storage_segments: [],
            start_time: p.at,
            last_state_change: p.at,
            client_end_date: p.client_end_date ?? null,
            end_time: null,
            totals: null,
        });
    }

    /** Wrap a copy of a stored record; the caller's object is never mutated. */
    static fromRecord(rec: SessionRecord): RentalSession {
        return new RentalSession(copyRecord(rec));
    }

    toRecord(): SessionRecord {
        return copyRecord(this.rec);
    }

    /* ---------------------------------------------------------------------- */
    /* Accessors                                                              */
    /* ---------------------------------------------------------------------- */

    get id(): string { return this.rec.session_id; }
    get status(): SessionStatus { return this.rec.status; }
    get gpus(): readonly number[] { return this.rec.gpus; }
    get rentalType(): RentalCategory { return this.rec.rental_type; }
    get storageGb(): number { return this.rec.storage_gb; }
    get gpuCeiling(): number { return this.rec.gpu_contracted_rate; }
    get storageCeiling(): number { return this.rec.storage_contracted_rate; }
    get gpuSegments(): readonly GpuSegment[] { return this.rec.gpu_segments; }
    get storageSegments(): readonly StorageSegment[] { return this.rec.storage_segments; }
    get endTime(): string | null { return this.rec.end_time; }

    setGpus(gpus: number[]): void {
        this.rec.gpus = sortedSlots(gpus);
    }

    setRentalType(category: RentalCategory): void {
        this.rec.rental_type = category;
    }

    /** Same slot set, ignoring order. */
    ownsExactly(slots: readonly number[]): boolean {
        const mine = this.rec.gpus;
        const theirs = sortedSlots(slots);
        return mine.length === theirs.length && mine.every((v, i) => v === theirs[i]);
    }

    openGpu(): GpuSegment | null {
        const last = this.rec.gpu_segments[this.rec.gpu_segments.length - 1];
        return last && last.end === null ? last : null;
    }

    openStorage(): StorageSegment | null {
        const last = this.rec.storage_segments[this.rec.storage_segments.length - 1];
        return last && last.end === null ? last : null;
    }

    /* ---------------------------------------------------------------------- */
    /* Ledger                                                                 */
    /* ---------------------------------------------------------------------- */

    /** Close any open GPU segment at `ts` and start a new one. */
    openGpuSegment(ratePerGpuHour: number, gpuCount: number, ts: string): void {
        this.closeGpuSegment(ts);
        this.rec.gpu_segments.push({ start: ts, end: null, rate: ratePerGpuHour, gpu_count: gpuCount });
        this.rec.last_state_change = ts;
        this.rec.status = 'running';
    }

    closeGpuSegment(ts: string): void {
        const open = this.openGpu();
        if (open) {
            open.end = ts;
            this.rec.last_state_change = ts;
        }
    }

    /**
     * Offer a storage rate. Returns true when a new segment was opened: either
     * none was open, or the offered rate is strictly lower than the open one.
     */
    openStorageSegment(ratePerGbMonth: number, ts: string): boolean {
        const open = this.openStorage();
        if (open) {
            if (ratePerGbMonth >= open.rate_per_gb_month) return false;
            open.end = ts;
        }
        this.rec.storage_segments.push({ start: ts, end: null, rate_per_gb_month: ratePerGbMonth });
        return true;
    }

    closeStorageSegment(ts: string): void {
        const open = this.openStorage();
        if (open) open.end = ts;
    }

    /** GPU released but disk kept: bill storage only. */
    pause(ts: string): void {
        this.closeGpuSegment(ts);
        this.rec.status = 'stored';
        this.rec.last_state_change = ts;
    }

    totals(asOf: string): SessionTotals {
        const until = this.rec.end_time ?? asOf;

        let gpu = 0;
        for (const seg of this.rec.gpu_segments) {
            gpu += seg.rate * seg.gpu_count * elapsedHours(seg.start, seg.end ?? until);
        }

        let storage = 0;
        for (const seg of this.rec.storage_segments) {
            storage += seg.rate_per_gb_month * this.rec.storage_gb * (elapsedHours(seg.start, seg.end ?? until) / HOURS_PER_MONTH);
        }

        return {
            duration_seconds: elapsedHours(this.rec.start_time, until) * 3600,
            earned_gpu: gpu,
            earned_storage: storage,
            earned_total: gpu + storage,
        };
    }

    /** Close everything at `ts`, freeze totals, mark ended. Idempotent. */
    finalize(ts: string): SessionTotals {
        if (this.rec.status === 'ended' && this.rec.totals) return { ...this.rec.totals };
        this.closeGpuSegment(ts);
        this.closeStorageSegment(ts);
        this.rec.end_time = ts;
        this.rec.status = 'ended';
        this.rec.last_state_change = ts;
        const t = this.totals(ts);
        this.rec.totals = t;
        return { ...t };
    }

    /** Current burn rate from the open segments. */
    hourlyEstimate(): HourlyEstimate {
        const g = this.openGpu();
        const s = this.openStorage();
        const gpu = g ? g.rate * g.gpu_count : 0;
        const storage = s ? (s.rate_per_gb_month * this.rec.storage_gb) / HOURS_PER_MONTH : 0;
        return { gpu, storage, total: gpu + storage };
    }

    /** Ledger invariant check; empty when the timelines are well-formed. */
    timelineProblems(): string[] {
        const problems: string[] = [];
        const check = (name: string, segs: ReadonlyArray<{ start: string; end: string | null }>) => {
            for (let i = 0; i < segs.length; i++) {
                const seg = segs[i];
                const isLast = i === segs.length - 1;
                if (seg.end === null && !isLast) problems.push(`${this.id}: ${name} segment ${i} open but not last`);
                if (seg.end !== null && Date.parse(seg.end) < Date.parse(seg.start)) {
                    problems.push(`${this.id}: ${name} segment ${i} ends before it starts`);
                }
                if (i > 0) {
                    const prevEnd = segs[i - 1].end;
                    if (prevEnd !== null && Date.parse(seg.start) < Date.parse(prevEnd)) {
                        problems.push(`${this.id}: ${name} segment ${i} overlaps segment ${i - 1}`);
                    }
                }
            }
        };
        check('gpu', this.rec.gpu_segments);
        check('storage', this.rec.storage_segments);

        for (const [i, seg] of this.rec.gpu_segments.entries()) {
            if (this.rec.gpu_contracted_rate > 0 && seg.rate > this.rec.gpu_contracted_rate) {
                problems.push(`${this.id}: gpu segment ${i} rate ${seg.rate} above ceiling ${this.rec.gpu_contracted_rate}`);
            }
        }
        if (this.rec.status === 'running' && !this.openGpu()) problems.push(`${this.id}: running without an open gpu segment`);
        if (this.rec.status === 'stored' && this.openGpu()) problems.push(`${this.id}: stored with an open gpu segment`);
        return problems;
    }
}

export function sortedSlots(slots: readonly number[]): number[] {
    return [...slots].sort((a, b) => a - b);
}
