// Shared builders for machine snapshots and timestamps.

import assert from 'node:assert/strict';
import { padOccupancy, parseOccupancyLenient } from '../src/occupancy';
import { MachineState, RentalCounters } from '../src/types';

export const T0 = '2026-03-01T00:00:00.000Z';

/** T0 plus `hours`, as ISO. */
export function at(hours: number): string {
    return new Date(Date.parse(T0) + hours * 3_600_000).toISOString();
}

export function counters(running: number, runningOnDemand: number, resident: number, residentOnDemand: number): RentalCounters {
    return {
        running,
        running_on_demand: runningOnDemand,
        resident,
        resident_on_demand: residentOnDemand,
    };
}

export interface MachineOverrides extends Partial<Omit<MachineState, 'slot_codes' | 'rates'>> {
    occupancy?: string;
    rates?: Partial<MachineState['rates']>;
}

export function machine(over: MachineOverrides = {}): MachineState {
    const numGpus = over.num_gpus ?? 4;
    const occupancy = over.occupancy ?? 'x x x x';
    return {
        machine_id: over.machine_id ?? 1,
        gpu_name: over.gpu_name ?? 'RTX 4090',
        num_gpus: numGpus,
        gpu_occupancy: occupancy,
        slot_codes: padOccupancy(parseOccupancyLenient(occupancy), numGpus),
        counters: over.counters ?? counters(0, 0, 0, 0),
        alloc_disk_space: over.alloc_disk_space ?? 0,
        rates: {
            on_demand: 0.5,
            interruptible: 0.3,
            reserved: 0.4,
            storage_per_gb_month: 0.1,
            ...over.rates,
        },
        client_hints: over.client_hints ?? [],
        client_end_date: over.client_end_date ?? null,
        error_description: over.error_description ?? null,
        timeout: over.timeout ?? 0,
        listed: over.listed ?? true,
    };
}

export function approx(actual: number, expected: number, msg?: string): void {
    assert.ok(Math.abs(actual - expected) < 1e-9, msg ?? `expected ${expected}, got ${actual}`);
}
