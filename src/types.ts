/**
 * Domain types shared by the reconciler, the store and the notifiers.
 *
 * Persisted records use snake_case keys; they are written to SQLite as JSON
 * and read back through session_registry.ts, which fills defaults.
 */

/* -------------------------------------------------------------------------- */
/* Occupancy                                                                  */
/* -------------------------------------------------------------------------- */

/** D = on-demand, I = interruptible, R = reserved. */
export type RentalCategory = 'D' | 'I' | 'R';

export const FREE_CODE = 'x';

export type SlotCode = RentalCategory | typeof FREE_CODE;

/** On-demand sessions form one class; interruptible and reserved share the other. */
export type DemandClass = 'on_demand' | 'interruptible';

export function demandClassOf(category: RentalCategory): DemandClass {
    return category === 'D' ? 'on_demand' : 'interruptible';
}

/* -------------------------------------------------------------------------- */
/* Machine snapshot                                                           */
/* -------------------------------------------------------------------------- */

export interface RentalCounters {
    resident: number;
    resident_on_demand: number;
    running: number;
    running_on_demand: number;
}

export interface MarketRates {
    /** $/GPU/hour for D slots (listed price) */
    on_demand: number;
    /** $/GPU/hour for I slots (minimum bid) */
    interruptible: number;
    /** $/GPU/hour for R slots (reserved bid price) */
    reserved: number;
    /** $/GB/month */
    storage_per_gb_month: number;
}

export interface ClientHint {
    gpus: number[];
    storage_gb: number | null;
    end_date: string | null;
}

export interface MachineState {
    machine_id: number;
    gpu_name: string;
    num_gpus: number;
    gpu_occupancy: string;
    slot_codes: SlotCode[];
    counters: RentalCounters;
    alloc_disk_space: number;
    rates: MarketRates;
    client_hints: ClientHint[];
    client_end_date: string | null;
    error_description: string | null;
    timeout: number;
    listed: boolean;
}

/* -------------------------------------------------------------------------- */
/* Sessions                                                                   */
/* -------------------------------------------------------------------------- */

export type SessionStatus = 'running' | 'stored' | 'ended';

export interface GpuSegment {
    start: string;
    end: string | null;
    /** $/GPU/hour actually billed */
    rate: number;
    gpu_count: number;
}

export interface StorageSegment {
    start: string;
    end: string | null;
    rate_per_gb_month: number;
}

export interface SessionTotals {
    duration_seconds: number;
    earned_gpu: number;
    earned_storage: number;
    earned_total: number;
}

export interface SessionRecord {
    session_id: string;
    machine_id: number;
    status: SessionStatus;
    gpus: number[];
    rental_type: RentalCategory;
    gpu_contracted_rate: number;
    storage_contracted_rate: number;
    storage_gb: number;
    gpu_segments: GpuSegment[];
    storage_segments: StorageSegment[];
    start_time: string;
    last_state_change: string;
    client_end_date: string | null;
    end_time: string | null;
    totals: SessionTotals | null;
}

/* -------------------------------------------------------------------------- */
/* Registry                                                                   */
/* -------------------------------------------------------------------------- */

export interface MachineRegistry {
    machine_id: number;
    /** slot index (as string key) -> session id */
    gpus: Record<string, string>;
    sessions: Record<string, SessionRecord>;
    next_session_seq: number;
    counters: RentalCounters;
    alloc_disk_space: number;
    gpu_occupancy: string;
    gpu_name: string;
    num_gpus: number;
    /** fingerprint of the rental-relevant fields last reconciled */
    observed_fingerprint: string;
    last_error_description: string | null;
    last_error_notified_at: string | null;
    last_timeout: number;
    last_timeout_notified_at: string | null;
    updated_at: string;
}

/* -------------------------------------------------------------------------- */
/* Lifecycle events                                                           */
/* -------------------------------------------------------------------------- */

export type LifecycleEventType = 'start' | 'end' | 'pause' | 'resume';

export interface MachineSummary {
    machine_id: number;
    gpu_name: string;
    num_gpus: number;
    gpu_occupancy: string;
    occupied_slots: number;
    running_sessions: number;
    stored_sessions: number;
    hourly_gpu: number;
    hourly_storage: number;
    hourly_total: number;
    accrued_total: number;
    as_of: string;
}

export interface LifecycleEvent {
    type: LifecycleEventType;
    machine_id: number;
    at: string;
    session: SessionRecord;
    summary: MachineSummary;
    /** observed market rate for start/resume */
    rate: number | null;
    /** how a resume was matched, for logs and formatters */
    match: 'exact' | 'disk_continuity' | null;
}
