/**
 * Rental Monitor — the poll loop.
 *
 * Per cycle: fetch every configured machine once, then for each machine
 * load its registry, seed or reconcile against the snapshot, apply the
 * error/timeout throttle, commit, and only then publish what happened.
 * One machine failing never stops the others; its registry stays as last
 * committed and the next cycle tries again.
 */

import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from './config';
import { clearCorrelation, createLogger, errorMessage, Logger, setCorrelation } from './logger';
import { FetchReport } from './machine_client';
import { EventSink, NotificationEvent, StartupItem } from './notifications/types';
import { needsReconcile, reconcile } from './reconciler';
import { RegistryStore } from './registry_store';
import { abortableSleep, RetryExhaustedError } from './retry';
import { needsSeeding, seedRegistry } from './seeding';
import { emptyRegistry } from './session_registry';
import { ERRORS, ErrorFactory, MonitorError, StructuredError, toLogData } from './structured_error';
import { summarizeMachine } from './summary';
import { MachineRegistry, MachineState, SessionRecord } from './types';

/** What the loop needs from the poller; MachineClient satisfies it. */
export interface MachineSource {
    fetchMachines(machineIds?: readonly number[]): Promise<FetchReport>;
}

export interface MonitorOptions {
    config: AppConfig;
    store: RegistryStore;
    source: MachineSource;
    sink: EventSink;
    clock?: () => Date;
    sleepFn?: (ms: number, signal: AbortSignal) => Promise<void>;
    logger?: Logger;
}

export interface CycleReport {
    cycle_id: string;
    started_at: string;
    finished_at: string;
    machines_seen: number;
    machines_processed: number;
    seeded_sessions: number;
    reconciled: number;
    events: number;
    archived: number;
    notifications_delivered: number;
    errors: StructuredError[];
}

interface MachineOutcome {
    seeded: number;
    reconciled: boolean;
    events: number;
    archived: number;
    errors: StructuredError[];
    startup: StartupItem | null;
}

interface HealthResult {
    registry: MachineRegistry;
    notices: NotificationEvent[];
}

/* -------------------------------------------------------------------------- */
/* Error / timeout throttle                                                   */
/* -------------------------------------------------------------------------- */

function elapsedMs(since: string | null, now: string): number {
    if (!since) return Infinity;
    return Date.parse(now) - Date.parse(since);
}

/**
 * Compare the machine's reported error and timeout with what was last
 * notified. A new or changed condition pings at once; an unchanged one pings
 * again after `intervalMinutes`; a cleared one sends a single recovery.
 */
export function applyHealth(reg: MachineRegistry, state: MachineState, now: string, intervalMinutes: number): HealthResult {
    const next: MachineRegistry = { ...reg };
    const notices: NotificationEvent[] = [];
    const intervalMs = intervalMinutes * 60_000;
    let recovered = false;

    const desc = state.error_description;
    if (desc) {
        if (desc !== reg.last_error_description || elapsedMs(reg.last_error_notified_at, now) >= intervalMs) {
            notices.push({ kind: 'error', machine_id: state.machine_id, error: desc });
            next.last_error_notified_at = now;
        }
        next.last_error_description = desc;
    } else if (reg.last_error_description !== null) {
        recovered = true;
        next.last_error_description = null;
        next.last_error_notified_at = null;
    }

    if (state.timeout > 0) {
        if (reg.last_timeout <= 0 || elapsedMs(reg.last_timeout_notified_at, now) >= intervalMs) {
            notices.push({ kind: 'error', machine_id: state.machine_id, error: `Timeout: ${state.timeout}` });
            next.last_timeout_notified_at = now;
        }
        next.last_timeout = state.timeout;
    } else if (reg.last_timeout > 0) {
        recovered = true;
        next.last_timeout = 0;
        next.last_timeout_notified_at = null;
    }

    if (recovered && !desc && state.timeout <= 0) {
        notices.push({ kind: 'recovery', machine_id: state.machine_id });
    }
    return { registry: next, notices };
}

/* -------------------------------------------------------------------------- */
/* Monitor                                                                    */
/* -------------------------------------------------------------------------- */

export class RentalMonitor {
    private readonly log: Logger;
    private readonly clock: () => Date;
    private readonly sleepFn: (ms: number, signal: AbortSignal) => Promise<void>;
    private firstCycle = true;

    constructor(private readonly opts: MonitorOptions) {
        this.log = opts.logger ?? createLogger('monitor');
        this.clock = opts.clock ?? (() => new Date());
        this.sleepFn = opts.sleepFn ?? abortableSleep;
    }

    private now(): string {
        return this.clock().toISOString();
    }

    async runCycle(): Promise<CycleReport> {
        const { config, sink } = this.opts;
        const cycleId = uuidv4();
        const startedAt = this.now();
        setCorrelation({ cycleId, machineId: '' });

        const report: CycleReport = {
            cycle_id: cycleId,
            started_at: startedAt,
            finished_at: startedAt,
            machines_seen: 0,
            machines_processed: 0,
            seeded_sessions: 0,
            reconciled: 0,
            events: 0,
            archived: 0,
            notifications_delivered: 0,
            errors: [],
        };

        try {
            let fetched: FetchReport | null = null;
            try {
                fetched = await this.opts.source.fetchMachines(config.machine_ids);
            } catch (e) {
                if (!(e instanceof MonitorError) || e.code !== ERRORS.FETCH_EXHAUSTED) throw e;
                const attempts = e.cause instanceof RetryExhaustedError ? e.cause.attempts : 1;
                report.errors.push(ErrorFactory.fetchExhausted(attempts, e.message));
            }

            if (fetched) {
                report.errors.push(...fetched.errors);
                report.machines_seen = fetched.machines.length;

                const seen = new Set(fetched.machines.map(m => m.machine_id));
                const missing = config.machine_ids.filter(id => !seen.has(id));
                if (missing.length > 0) this.log.warn('Configured machines missing from provider response', { missing });

                const startup: StartupItem[] = [];
                for (const state of fetched.machines) {
                    setCorrelation({ machineId: state.machine_id });
                    try {
                        const out = this.processMachine(state);
                        report.machines_processed++;
                        report.seeded_sessions += out.seeded;
                        if (out.reconciled) report.reconciled++;
                        report.events += out.events;
                        report.archived += out.archived;
                        report.errors.push(...out.errors);
                        if (out.startup) startup.push(out.startup);
                    } catch (e) {
                        const err = ErrorFactory.machineFailed(state.machine_id, errorMessage(e));
                        report.errors.push(err);
                        this.log.error(err.message, toLogData(err));
                    }
                }
                setCorrelation({ machineId: '' });

                if (this.firstCycle && config.notify.on_startup_existing) {
                    sink.publish({ kind: 'startup', items: startup });
                }
                this.firstCycle = false;
            }

            const delivered = sink.collect();
            report.notifications_delivered = delivered.delivered;
            report.errors.push(...delivered.failed);
        } finally {
            report.finished_at = this.now();
            clearCorrelation();
        }

        this.log.info('Cycle complete', {
            cycle: cycleId,
            machines: report.machines_processed,
            reconciled: report.reconciled,
            seeded: report.seeded_sessions,
            events: report.events,
            archived: report.archived,
            errors: report.errors.length,
        });
        return report;
    }

    private processMachine(state: MachineState): MachineOutcome {
        const { config, store, sink } = this.opts;
        const now = this.now();
        const prior = store.loadRegistry(state.machine_id);

        let registry = prior ?? emptyRegistry(state.machine_id, now);
        let seeded = 0;
        let reconciled = false;
        let lifecycle: NotificationEvent[] = [];
        let archived: SessionRecord[] = [];
        let errors: StructuredError[] = [];

        if (needsSeeding(prior, state, this.firstCycle)) {
            const s = seedRegistry(prior, state, now);
            registry = s.registry;
            seeded = s.seeded.length;
        } else if (needsReconcile(registry, state)) {
            const r = reconcile(registry, state, {
                now,
                toleranceGb: config.disk_tolerance_gb,
                logger: this.log.child('reconciler'),
            });
            registry = r.registry;
            archived = r.archived;
            lifecycle = r.events.map((event): NotificationEvent => ({ kind: 'lifecycle', event }));
            errors = r.errors;
            reconciled = true;
        }

        const health = applyHealth(registry, state, now, config.notify.error_ping_interval_minutes);
        registry = health.registry;

        const commit = store.commitCycle(registry, archived, state);
        for (const w of commit.warnings) this.log.warn('Commit warning', { warning: w });

        for (const ev of lifecycle) sink.publish(ev);
        for (const ev of health.notices) sink.publish(ev);

        const startup = this.firstCycle && config.notify.on_startup_existing
            ? { summary: summarizeMachine(registry, now), sessions: Object.values(registry.sessions) }
            : null;

        return { seeded, reconciled, events: lifecycle.length, archived: commit.archivedCount, errors, startup };
    }

    /**
     * Poll until `signal` aborts (or once). A cycle that throws is logged and
     * announced, and polling carries on after the usual wait. Pending
     * deliveries are awaited only on the way out.
     */
    async run(signal: AbortSignal, opts: { once?: boolean } = {}): Promise<void> {
        const { config, sink } = this.opts;

        if (config.notify.on_start) {
            sink.publish({
                kind: 'system',
                title: 'Monitor Started',
                lines: [
                    `Machines: ${config.machine_ids.join(', ')}`,
                    `Check frequency: ${config.check_frequency}s`,
                ],
            });
        }
        this.log.info('Monitor started', { machines: config.machine_ids, check_frequency: config.check_frequency });

        while (!signal.aborted) {
            try {
                await this.runCycle();
            } catch (e) {
                this.log.error('Cycle failed', { error: errorMessage(e) });
                sink.publish({ kind: 'system', title: 'Cycle Failed', lines: [errorMessage(e), 'Retrying next cycle'] });
            }
            if (opts.once || signal.aborted) break;
            await this.sleepFn(config.check_frequency * 1000, signal);
        }

        this.log.info('Monitor stopped');
        if (config.notify.on_shutdown) {
            sink.publish({ kind: 'system', title: 'Monitor Stopped', lines: ['Shutdown requested'] });
        }
        const final = await sink.drain();
        this.log.info('Notifications flushed', { delivered: final.delivered, failed: final.failed.length });
    }
}
