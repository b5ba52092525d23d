/**
 * Pause Budget — how many sessions the counters say went from running to
 * stored this cycle. A full GPU release may only be treated as a pause while
 * budget remains for the session's demand class.
 */

import { DemandClass, RentalCounters } from './types';

export type PauseBudget = Record<DemandClass, number>;

interface StoredCounts {
    on_demand: number;
    interruptible: number;
}

function clamp0(n: number): number {
    return Math.max(n, 0);
}

export function storedCounts(c: RentalCounters): StoredCounts {
    const onDemand = clamp0(c.resident_on_demand - c.running_on_demand);
    const residentOther = clamp0(c.resident - c.resident_on_demand);
    const runningOther = clamp0(c.running - c.running_on_demand);
    return { on_demand: onDemand, interruptible: clamp0(residentOther - runningOther) };
}

export function estimatePauseBudget(prev: RentalCounters, next: RentalCounters): PauseBudget {
    const before = storedCounts(prev);
    const after = storedCounts(next);
    return {
        on_demand: clamp0(after.on_demand - before.on_demand),
        interruptible: clamp0(after.interruptible - before.interruptible),
    };
}

/** Take one unit for `cls`; false when none is left. */
export function consumePauseBudget(budget: PauseBudget, cls: DemandClass): boolean {
    if (budget[cls] <= 0) return false;
    budget[cls] -= 1;
    return true;
}

export const ZERO_COUNTERS: RentalCounters = {
    resident: 0,
    resident_on_demand: 0,
    running: 0,
    running_on_demand: 0,
};
