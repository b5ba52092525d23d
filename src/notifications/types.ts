/**
 * Notification events, targets and target normalization.
 *
 * Lifecycle events come from the reconciler; system/startup/error/recovery
 * come from the monitor loop. Each target may subscribe to a subset.
 */

import { TargetConfig } from '../config';
import { Logger } from '../logger';
import { StructuredError } from '../structured_error';
import { LifecycleEvent, LifecycleEventType, MachineSummary, SessionRecord } from '../types';

export const EVENT_TYPES = [
    'system',
    'startup',
    'rental_start',
    'rental_end',
    'rental_pause',
    'rental_resume',
    'error',
    'recovery',
] as const;

export type NotificationEventType = (typeof EVENT_TYPES)[number];

export interface StartupItem {
    summary: MachineSummary;
    sessions: SessionRecord[];
}

export type NotificationEvent =
    | { kind: 'system'; title: string; lines: string[] }
    | { kind: 'startup'; items: StartupItem[] }
    | { kind: 'lifecycle'; event: LifecycleEvent }
    | { kind: 'error'; machine_id: number; error: string }
    | { kind: 'recovery'; machine_id: number };

const LIFECYCLE_EVENT_TYPES: Record<LifecycleEventType, NotificationEventType> = {
    start: 'rental_start',
    end: 'rental_end',
    pause: 'rental_pause',
    resume: 'rental_resume',
};

export function eventTypeOf(e: NotificationEvent): NotificationEventType {
    switch (e.kind) {
        case 'lifecycle': return LIFECYCLE_EVENT_TYPES[e.event.type];
        default: return e.kind;
    }
}

export interface DrainReport {
    delivered: number;
    failed: StructuredError[];
}

/** Where lifecycle and system events are sent. Implemented by the dispatcher. */
export interface EventSink {
    /** Queue delivery and return at once; never waits on the network. */
    publish(event: NotificationEvent): void;
    /** Outcomes of deliveries finished since the last call, without waiting for the rest. */
    collect(): DrainReport;
    /** Resolve once everything published so far has been delivered or given up on. Used at shutdown. */
    drain(): Promise<DrainReport>;
}

export interface Message {
    title: string;
    body: string;
}

export type ServiceName = 'discord' | 'default';

export interface NotificationTarget {
    name: string;
    url: string;
    service: ServiceName;
    mention: string | null;
    /** null = every event type */
    events: ReadonlySet<NotificationEventType> | null;
}

/* -------------------------------------------------------------------------- */
/* Normalization                                                              */
/* -------------------------------------------------------------------------- */

const WILDCARDS = new Set(['*', 'all', 'any']);
const SHORT_LIFECYCLE_NAMES = new Set(['start', 'end', 'pause', 'resume']);

function isEventType(v: string): v is NotificationEventType {
    return EVENT_TYPES.some(t => t === v);
}

/** Lower-cased event names; wildcard or nothing usable means everything. */
export function normalizeEvents(
    raw: readonly string[] | null,
    targetName: string,
    log: Logger
): ReadonlySet<NotificationEventType> | null {
    if (!raw || raw.length === 0) return null;
    const out = new Set<NotificationEventType>();
    for (const ev of raw) {
        const norm = ev.trim().toLowerCase();
        if (!norm) continue;
        if (WILDCARDS.has(norm)) return null;
        const name = SHORT_LIFECYCLE_NAMES.has(norm) ? `rental_${norm}` : norm;
        if (!isEventType(name)) {
            log.warn('Target specifies unknown event; skipping that entry', { target: targetName, event: ev });
            continue;
        }
        out.add(name);
    }
    return out.size > 0 ? out : null;
}

export function inferService(url: string, explicit: string | null, log: Logger): ServiceName {
    if (explicit) {
        const s = explicit.toLowerCase();
        if (s === 'discord' || s === 'default') return s;
        log.warn('Unknown notification service; using default', { service: explicit });
        return 'default';
    }
    if (/^discord:\/\//i.test(url) || /^https:\/\/(?:\w+\.)?discord(?:app)?\.com\/api\/webhooks\//i.test(url)) {
        return 'discord';
    }
    return 'default';
}

/**
 * Enabled targets with unique names. Unnamed targets become
 * `<service>-<n>`; a repeated name gets a numeric suffix.
 */
export function buildTargets(configs: readonly TargetConfig[], log: Logger): NotificationTarget[] {
    const out: NotificationTarget[] = [];
    const serviceCounts = new Map<ServiceName, number>();
    const names = new Set<string>();

    for (const cfg of configs) {
        if (!cfg.enabled) continue;
        if (!cfg.url) {
            log.warn('Skipping notification target without URL', { name: cfg.name });
            continue;
        }
        const service = inferService(cfg.url, cfg.service, log);
        const n = (serviceCounts.get(service) ?? 0) + 1;
        serviceCounts.set(service, n);

        const base = cfg.name ?? `${service}-${n}`;
        let name = base;
        let suffix = 1;
        while (names.has(name)) {
            suffix++;
            name = `${base}-${suffix}`;
        }
        names.add(name);

        out.push({
            name,
            url: cfg.url,
            service,
            mention: cfg.mention,
            events: normalizeEvents(cfg.events, name, log),
        });
    }
    return out;
}

export function acceptsEvent(target: NotificationTarget, type: NotificationEventType): boolean {
    return target.events === null || target.events.has(type);
}
