/**
 * Reconciler — infers session transitions from one snapshot pair.
 *
 * One call handles one machine for one cycle:
 *   (a) freed slots: partial release, pause, or end
 *   (b) claimed slots: continuity, resume, or new session
 *   (c) disk-only drop: end the stored session it matches
 *   (d) storage repricing
 *
 * Everything runs against a private working copy of the registry. Nothing is
 * persisted here; the caller commits `registry` and `archived` together, then
 * publishes `events`.
 */

import { RentalSession, cappedRate, sortedSlots } from './rental_session';
import { SessionRegistry } from './session_registry';
import { diffOccupancy, formatOccupancy, parseOccupancyLenient } from './occupancy';
import { PauseBudget, consumePauseBudget, estimatePauseBudget } from './pause_budget';
import { summarizeMachine } from './summary';
import { stableStringify } from './state_io';
import { RECONCILE } from './config';
import { createLogger, Logger } from './logger';
import { ErrorFactory, StructuredError, toLogData } from './structured_error';
import {
    FREE_CODE,
    LifecycleEvent,
    LifecycleEventType,
    MachineRegistry,
    MachineState,
    MachineSummary,
    RentalCategory,
    SessionRecord,
    SlotCode,
    demandClassOf,
} from './types';

const defaultLog = createLogger('reconciler');

export interface ReconcileOptions {
    /** ISO timestamp used for every transition in this pass */
    now: string;
    toleranceGb?: number;
    logger?: Logger;
}

export interface ReconcileResult {
    registry: MachineRegistry;
    events: LifecycleEvent[];
    archived: SessionRecord[];
    errors: StructuredError[];
    summary: MachineSummary;
}

/** Market rate for a slot code; free slots have none. */
export function rateForCode(state: MachineState, code: SlotCode): number {
    switch (code) {
        case 'D': return state.rates.on_demand;
        case 'I': return state.rates.interruptible;
        case 'R': return state.rates.reserved;
        default: return 0;
    }
}

/** Fingerprint of the fields that can change rental state. */
export function observedFingerprint(state: MachineState): string {
    return stableStringify({
        occupancy: formatOccupancy(state.slot_codes),
        alloc_disk_space: state.alloc_disk_space,
        counters: state.counters,
        client_hints: state.client_hints.map(h => ({ ...h, gpus: sortedSlots(h.gpus) })),
    });
}

/** True when the snapshot differs from what the registry last reconciled. */
export function needsReconcile(registry: MachineRegistry, state: MachineState): boolean {
    return registry.observed_fingerprint !== observedFingerprint(state);
}

/* -------------------------------------------------------------------------- */
/* Candidate matching                                                         */
/* -------------------------------------------------------------------------- */

export type MatchKind = 'continuity' | 'resume_exact' | 'resume_disk' | 'new';

export interface Candidate {
    kind: MatchKind;
    session: RentalSession | null;
}

/**
 * Pick what a claimed slot group belongs to. Fixed priority:
 * continuity > resume by exact GPU set > resume by disk continuity > new.
 * Sessions in `taken` were already matched this pass.
 */
export function selectCandidate(
    reg: SessionRegistry,
    slots: readonly number[],
    diskDelta: number,
    toleranceGb: number,
    taken: ReadonlySet<string>
): Candidate {
    const free = reg.all().filter(s => !taken.has(s.id));

    const owner = free.find(s => s.status === 'running' && s.ownsExactly(slots));
    if (owner) return { kind: 'continuity', session: owner };

    const exact = free.find(s => s.status === 'stored' && s.ownsExactly(slots));
    if (exact) return { kind: 'resume_exact', session: exact };

    if (Math.abs(diskDelta) < toleranceGb) {
        const stored = reg.stored();
        if (stored.length === 1 && !taken.has(stored[0].id)) {
            return { kind: 'resume_disk', session: stored[0] };
        }
    }

    return { kind: 'new', session: null };
}

/* -------------------------------------------------------------------------- */
/* Pass                                                                       */
/* -------------------------------------------------------------------------- */

interface PendingEvent {
    type: LifecycleEventType;
    session: SessionRecord;
    rate: number | null;
    match: LifecycleEvent['match'];
}

interface ClaimGroup {
    code: RentalCategory;
    rate: number;
    slots: number[];
}

function groupClaims(state: MachineState, started: number[]): ClaimGroup[] {
    const groups = new Map<string, ClaimGroup>();
    for (const slot of started) {
        const code = state.slot_codes[slot];
        if (code === undefined || code === FREE_CODE) continue;
        const rate = rateForCode(state, code);
        const key = `${code}|${rate}`;
        const g = groups.get(key);
        if (g) g.slots.push(slot);
        else groups.set(key, { code, rate, slots: [slot] });
    }
    return [...groups.values()];
}

export function reconcile(prior: MachineRegistry, state: MachineState, opts: ReconcileOptions): ReconcileResult {
    const log = opts.logger ?? defaultLog;
    const tol = opts.toleranceGb ?? RECONCILE.DISK_TOLERANCE_GB;
    const now = opts.now;
    const mid = state.machine_id;

    const reg = SessionRegistry.fromSnapshot(prior);
    const prevCodes = parseOccupancyLenient(prior.gpu_occupancy);
    const diff = diffOccupancy(prevCodes, state.slot_codes);
    const budget: PauseBudget = estimatePauseBudget(prior.counters, state.counters);
    const diskDelta = state.alloc_disk_space - prior.alloc_disk_space;

    const pending: PendingEvent[] = [];
    const archived: SessionRecord[] = [];
    const errors: StructuredError[] = [];
    let endedStorageGb = 0;

    const endSession = (s: RentalSession): void => {
        s.finalize(now);
        const rec = s.toRecord();
        reg.remove(s.id);
        archived.push(rec);
        pending.push({ type: 'end', session: rec, rate: null, match: null });
    };

    /* ---- (a) freed slots ---- */

    const freedBySession = new Map<string, number[]>();
    for (const slot of diff.ended) {
        const sid = reg.release(slot);
        if (sid === undefined) {
            log.debug('Freed slot had no owner', { machine_id: mid, slot });
            continue;
        }
        const list = freedBySession.get(sid);
        if (list) list.push(slot);
        else freedBySession.set(sid, [slot]);
    }

    for (const [sid, freed] of freedBySession) {
        const session = reg.get(sid);
        if (!session) continue;
        const remaining = reg.slotsOf(sid);

        if (remaining.length > 0) {
            const code = state.slot_codes[remaining[0]] ?? FREE_CODE;
            const observed = code === FREE_CODE ? rateForCode(state, session.rentalType) : rateForCode(state, code);
            session.setGpus(remaining);
            session.openGpuSegment(cappedRate(observed, session.gpuCeiling), remaining.length, now);
            log.debug('GPUs released, session continues', { machine_id: mid, session_id: sid, freed, remaining });
            continue;
        }

        const held = session.storageGb;
        const cls = demandClassOf(session.rentalType);
        const diskSteady = Math.abs(diskDelta) < tol;

        if (diskSteady && budget[cls] > 0) {
            consumePauseBudget(budget, cls);
            session.pause(now);
            pending.push({ type: 'pause', session: session.toRecord(), rate: null, match: null });
            log.info('Session paused', { machine_id: mid, session_id: sid, gpus: [...session.gpus] });
            continue;
        }

        if (Math.abs(diskDelta + held) >= tol) {
            const err = ErrorFactory.ambiguousReconciliation(mid, sid, diskDelta, held);
            errors.push(err);
            log.warn(err.message, toLogData(err));
        }
        endedStorageGb += held;
        endSession(session);
        log.info('Rental ended', { machine_id: mid, session_id: sid });
    }

    /* ---- (b) claimed slots ---- */

    const taken = new Set<string>();
    const claims = groupClaims(state, diff.started);
    const storageHint = (slots: readonly number[]) =>
        state.client_hints.find(h => h.storage_gb !== null && sortedSlots(h.gpus).join(',') === slots.join(','));

    // growth not explained by a hinted claim goes to the first unhinted new session
    let unattributedGrowth = Math.max(diskDelta, 0);
    for (const group of claims) {
        unattributedGrowth -= storageHint(sortedSlots(group.slots))?.storage_gb ?? 0;
    }
    unattributedGrowth = Math.max(unattributedGrowth, 0);

    for (const group of claims) {
        const slots = sortedSlots(group.slots);
        const pick = selectCandidate(reg, slots, diskDelta, tol, taken);

        if (pick.kind === 'continuity' && pick.session) {
            reg.assign(slots, pick.session.id);
            taken.add(pick.session.id);
            log.debug('Continuity detected', { machine_id: mid, session_id: pick.session.id, gpus: slots });
            continue;
        }

        if ((pick.kind === 'resume_exact' || pick.kind === 'resume_disk') && pick.session) {
            const s = pick.session;
            s.setGpus(slots);
            s.setRentalType(group.code);
            s.openGpuSegment(cappedRate(group.rate, s.gpuCeiling), slots.length, now);
            reg.assign(slots, s.id);
            taken.add(s.id);
            const match = pick.kind === 'resume_exact' ? 'exact' : 'disk_continuity';
            pending.push({ type: 'resume', session: s.toRecord(), rate: group.rate, match });
            log.info('Session resumed', { machine_id: mid, session_id: s.id, gpus: slots, match });
            continue;
        }

        const hint = storageHint(slots);
        let storageGb: number;
        if (hint && hint.storage_gb !== null) {
            storageGb = hint.storage_gb;
        } else {
            storageGb = unattributedGrowth;
            unattributedGrowth = 0;
        }

        const s = RentalSession.create({
            session_id: reg.allocateId(),
            machine_id: mid,
            gpus: slots,
            rental_type: group.code,
            gpu_contracted_rate: group.rate,
            storage_contracted_rate: state.rates.storage_per_gb_month,
            storage_gb: storageGb,
            client_end_date: hint?.end_date ?? state.client_end_date,
            at: now,
        });
        s.openStorageSegment(cappedRate(state.rates.storage_per_gb_month, s.storageCeiling), now);
        s.openGpuSegment(cappedRate(group.rate, s.gpuCeiling), slots.length, now);
        reg.add(s);
        reg.assign(slots, s.id);
        taken.add(s.id);
        pending.push({ type: 'start', session: s.toRecord(), rate: group.rate, match: null });
        log.info('New rental', { machine_id: mid, session_id: s.id, type: group.code, rate: group.rate, gpus: slots });
    }

    /* ---- (c) disk-only drop ---- */

    const residualDrop = -diskDelta - endedStorageGb;
    if (diskDelta < 0 && residualDrop > RECONCILE.DISK_DROP_EPSILON_GB) {
        const stored = reg.stored().sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
        let best: RentalSession | null = null;
        let bestDiff = Infinity;
        for (const s of stored) {
            const d = Math.abs(s.storageGb - residualDrop);
            if (d < bestDiff) {
                best = s;
                bestDiff = d;
            }
        }
        if (best && bestDiff <= tol) {
            endSession(best);
            log.info('Rental ended (disk-only)', { machine_id: mid, session_id: best.id });
        } else {
            const err = ErrorFactory.unmatchedDiskDrop(mid, residualDrop, best ? bestDiff : null);
            errors.push(err);
            log.warn(err.message, toLogData(err));
        }
    }

    /* ---- (d) storage repricing ---- */

    for (const s of reg.all()) {
        if (!s.openStorage()) continue;
        const offered = cappedRate(state.rates.storage_per_gb_month, s.storageCeiling);
        if (s.openStorageSegment(offered, now)) {
            log.info('Storage repriced', { machine_id: mid, session_id: s.id, rate_per_gb_month: offered });
        }
    }

    /* ---- commit view ---- */

    reg.meta.counters = { ...state.counters };
    reg.meta.alloc_disk_space = state.alloc_disk_space;
    reg.meta.gpu_occupancy = formatOccupancy(state.slot_codes);
    reg.meta.gpu_name = state.gpu_name;
    reg.meta.num_gpus = state.num_gpus;
    reg.meta.observed_fingerprint = observedFingerprint(state);

    const violations = reg.checkInvariants();
    if (violations.length > 0) {
        const err = ErrorFactory.invariantViolation(mid, violations);
        errors.push(err);
        log.error(err.message, toLogData(err));
    }

    const registry = reg.toSnapshot(now);
    const summary = summarizeMachine(registry, now);
    const events: LifecycleEvent[] = pending.map(p => ({
        type: p.type,
        machine_id: mid,
        at: now,
        session: p.session,
        summary,
        rate: p.rate,
        match: p.match,
    }));

    return { registry, events, archived, errors, summary };
}
