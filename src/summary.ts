/**
 * Machine Summary — occupancy and earnings. Attached to every lifecycle event
 * and rendered by `slotwatch status`. Values are full precision; only
 * renderEarningsReport rounds.
 */

import { RentalSession } from './rental_session';
import { occupiedCount, parseOccupancyLenient } from './occupancy';
import { MachineRegistry, MachineSummary } from './types';

export function summarizeMachine(reg: MachineRegistry, asOf: string): MachineSummary {
    let running = 0;
    let stored = 0;
    let hourlyGpu = 0;
    let hourlyStorage = 0;
    let accrued = 0;

    for (const rec of Object.values(reg.sessions)) {
        const s = RentalSession.fromRecord(rec);
        if (s.status === 'running') running++;
        else if (s.status === 'stored') stored++;
        const h = s.hourlyEstimate();
        hourlyGpu += h.gpu;
        hourlyStorage += h.storage;
        accrued += s.totals(asOf).earned_total;
    }

    return {
        machine_id: reg.machine_id,
        gpu_name: reg.gpu_name,
        num_gpus: reg.num_gpus,
        gpu_occupancy: reg.gpu_occupancy,
        occupied_slots: occupiedCount(parseOccupancyLenient(reg.gpu_occupancy)),
        running_sessions: running,
        stored_sessions: stored,
        hourly_gpu: hourlyGpu,
        hourly_storage: hourlyStorage,
        hourly_total: hourlyGpu + hourlyStorage,
        accrued_total: accrued,
        as_of: asOf,
    };
}

export function money(v: number, digits = 2): string {
    return `$${v.toFixed(digits)}`;
}

/** Plain-text table, one line per machine plus a total line. */
export function renderEarningsReport(summaries: readonly MachineSummary[]): string {
    const lines: string[] = [];
    let hourly = 0;
    let accrued = 0;
    for (const s of summaries) {
        hourly += s.hourly_total;
        accrued += s.accrued_total;
        lines.push(
            `machine ${s.machine_id} (${s.num_gpus}x ${s.gpu_name || 'unknown'}): ` +
            `${s.occupied_slots}/${s.num_gpus} occupied, ` +
            `${s.running_sessions} running, ${s.stored_sessions} stored, ` +
            `${money(s.hourly_total, 3)}/h, accrued ${money(s.accrued_total)}`
        );
    }
    lines.push(`total: ${money(hourly, 3)}/h, accrued ${money(accrued)}`);
    return lines.join('\n');
}
