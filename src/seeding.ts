/**
 * Startup Seeding — rentals already running when the monitor first sees a
 * machine become placeholder sessions, so later diffs have owners to work on.
 */

import { RentalSession, cappedRate, sortedSlots } from './rental_session';
import { SessionRegistry, emptyRegistry } from './session_registry';
import { formatOccupancy, occupiedCount } from './occupancy';
import { observedFingerprint, rateForCode } from './reconciler';
import { createLogger } from './logger';
import { FREE_CODE, MachineRegistry, MachineState, RentalCategory, SessionRecord } from './types';

const log = createLogger('seeding');

export interface SeedResult {
    registry: MachineRegistry;
    seeded: SessionRecord[];
}

/**
 * Split `indices` into `count` contiguous chunks. The first chunk takes all
 * but one slot per remaining chunk; each later chunk takes one.
 */
export function splitIndices(indices: readonly number[], count: number): number[][] {
    if (indices.length === 0) return [];
    const n = Math.max(1, Math.min(count, indices.length));
    const chunks: number[][] = [];
    let remaining = indices.length;
    let cursor = 0;
    for (let i = 0; i < n; i++) {
        const sessionsLeft = n - i;
        const take = Math.max(1, remaining - (sessionsLeft - 1));
        chunks.push(indices.slice(cursor, cursor + take));
        cursor += take;
        remaining -= take;
    }
    return chunks;
}

/**
 * Seed only when the machine is first seen with occupied slots: no registry
 * at all, or (on the monitor's first cycle) an empty slot map with no stored
 * sessions. Every other change is reconciled.
 */
export function needsSeeding(reg: MachineRegistry | null, state: MachineState, firstCycle: boolean): boolean {
    if (occupiedCount(state.slot_codes) === 0) return false;
    if (reg === null) return true;
    if (!firstCycle) return false;
    const hasStored = Object.values(reg.sessions).some(s => s.status === 'stored');
    return Object.keys(reg.gpus).length === 0 && !hasStored;
}

interface SeedGroup {
    code: RentalCategory;
    rate: number;
    slots: number[];
}

export function seedRegistry(prior: MachineRegistry | null, state: MachineState, now: string): SeedResult {
    const reg = SessionRegistry.fromSnapshot(prior ?? emptyRegistry(state.machine_id, now));

    const groups = new Map<string, SeedGroup>();
    state.slot_codes.forEach((code, slot) => {
        if (code === FREE_CODE || reg.ownerOf(slot) !== undefined) return;
        const rate = rateForCode(state, code);
        const key = `${code}|${rate}`;
        const g = groups.get(key);
        if (g) g.slots.push(slot);
        else groups.set(key, { code, rate, slots: [slot] });
    });

    const ordered = [...groups.values()].sort((a, b) =>
        a.code !== b.code ? (a.code < b.code ? -1 : 1) : a.rate - b.rate
    );

    let onDemandLeft = state.counters.running_on_demand;
    let otherLeft = Math.max(state.counters.running - state.counters.running_on_demand, 0);
    const seeded: SessionRecord[] = [];

    for (const g of ordered) {
        let desired: number;
        if (g.code === 'D') {
            desired = Math.min(g.slots.length, onDemandLeft);
            onDemandLeft = Math.max(onDemandLeft - desired, 0);
        } else {
            desired = Math.min(g.slots.length, otherLeft);
            otherLeft = Math.max(otherLeft - desired, 0);
        }

        for (const chunk of splitIndices(g.slots, desired)) {
            const key = sortedSlots(chunk).join(',');
            const hint = state.client_hints.find(h => sortedSlots(h.gpus).join(',') === key);
            const s = RentalSession.create({
                session_id: reg.allocateId(),
                machine_id: state.machine_id,
                gpus: chunk,
                rental_type: g.code,
                gpu_contracted_rate: g.rate,
                storage_contracted_rate: state.rates.storage_per_gb_month,
                storage_gb: hint?.storage_gb ?? 0,
                client_end_date: hint?.end_date ?? state.client_end_date,
                at: now,
            });
            s.openGpuSegment(g.rate, chunk.length, now);
            s.openStorageSegment(cappedRate(state.rates.storage_per_gb_month, s.storageCeiling), now);
            reg.add(s);
            reg.assign(chunk, s.id);
            seeded.push(s.toRecord());
            log.info('Detected ongoing rental at startup', {
                machine_id: state.machine_id,
                session_id: s.id,
                type: g.code,
                rate: g.rate,
                gpus: chunk,
            });
        }
    }

    reg.meta.counters = { ...state.counters };
    reg.meta.alloc_disk_space = state.alloc_disk_space;
    reg.meta.gpu_occupancy = formatOccupancy(state.slot_codes);
    reg.meta.gpu_name = state.gpu_name;
    reg.meta.num_gpus = state.num_gpus;
    reg.meta.observed_fingerprint = observedFingerprint(state);

    return { registry: reg.toSnapshot(now), seeded };
}
