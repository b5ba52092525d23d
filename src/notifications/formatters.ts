/**
 * Message formatting per service.
 *
 * discord: markdown body only, split into chunks under the 2000-char webhook
 * limit, timestamps as <t:epoch:style> tags.
 * default: one {title, body} message, timestamps as ISO strings.
 *
 * This is the only place money and sizes are rounded.
 */

import { RentalSession } from '../rental_session';
import { MachineSummary, SessionRecord } from '../types';
import { Message, NotificationEvent, ServiceName, StartupItem } from './types';

export const HR = '~~                                                 ~~';
export const DISCORD_CHUNK_LIMIT = 1800;

export function humanizeDuration(seconds: number): string {
    const secs = Math.round(seconds);
    if (secs < 60) return `${secs}s`;
    const minutes = Math.floor(secs / 60);
    const s = secs % 60;
    if (minutes < 60) return `${minutes}m ${s}s`;
    const hours = Math.floor(minutes / 60);
    const m = minutes % 60;
    if (hours < 24) return `${hours}h ${m}m ${s}s`;
    const days = Math.floor(hours / 24);
    return `${days}d ${hours % 24}h ${m}m`;
}

export function discordTs(iso: string | null, style = 'f'): string {
    if (!iso) return '';
    const ms = Date.parse(iso);
    if (!Number.isFinite(ms)) return iso;
    return `<t:${Math.floor(ms / 1000)}:${style}>`;
}

function when(service: ServiceName, iso: string | null): string {
    if (!iso) return '';
    return service === 'discord' ? `${discordTs(iso, 'f')} (${discordTs(iso, 'R')})` : iso;
}

function f4(v: number): string {
    return v.toFixed(4);
}

function slotList(gpus: readonly number[]): string {
    return `[${[...gpus].sort((a, b) => a - b).join(', ')}]`;
}

function currentStorageRate(rec: SessionRecord): number {
    const last = rec.storage_segments[rec.storage_segments.length - 1];
    return last && last.end === null ? last.rate_per_gb_month : 0;
}

function currentGpuRate(rec: SessionRecord): number {
    const last = rec.gpu_segments[rec.gpu_segments.length - 1];
    return last && last.end === null ? last.rate : 0;
}

/* -------------------------------------------------------------------------- */
/* Blocks                                                                     */
/* -------------------------------------------------------------------------- */

export function machineSectionLines(summary: MachineSummary): string[] {
    const total = summary.num_gpus;
    const pct = total ? Math.round((summary.occupied_slots / total) * 100) : 0;
    const label = summary.gpu_name ? ` ${summary.gpu_name}` : '';
    return [
        `### Machine ${summary.machine_id}`,
        `Occupancy: ${summary.occupied_slots}/${total}${label} GPUs (${pct}%)`,
        `Total est hourly: ${f4(summary.hourly_gpu)}$ (GPUs) + ${f4(summary.hourly_storage)}$ (disk) = ${f4(summary.hourly_total)}$`,
        `Tracked sessions: ${summary.running_sessions} running, ${summary.stored_sessions} stored`,
        `Accrued (active sessions): ${f4(summary.accrued_total)}$`,
    ];
}

function sessionDetailLines(rec: SessionRecord, asOf: string, service: ServiceName): string[] {
    const s = RentalSession.fromRecord(rec);
    const h = s.hourlyEstimate();
    const t = s.totals(asOf);
    const lines = [`- ${rec.session_id} (${rec.status})`];
    if (rec.gpus.length > 0) {
        lines.push(rec.status === 'stored'
            ? `  - GPUs (inactive): x${rec.gpus.length} ${slotList(rec.gpus)} ${rec.rental_type}`
            : `  - GPUs: x${rec.gpus.length} ${slotList(rec.gpus)} ${rec.rental_type} @ ${f4(currentGpuRate(rec))}$/GPU/hr`);
    }
    if (rec.storage_gb) {
        lines.push(`  - Storage: ${rec.storage_gb.toFixed(2)} GB @ ${f4(currentStorageRate(rec))}$/GB/mo`);
    }
    lines.push(`  - Est hourly: ${f4(h.gpu)}$ (GPUs) + ${f4(h.storage)}$ (disk) = ${f4(h.total)}$`);
    lines.push(`  - Earnings: ${f4(t.earned_gpu)}$ (GPUs) + ${f4(t.earned_storage)}$ (disk) = ${f4(t.earned_total)}$`);
    const started = when(service, rec.start_time);
    if (started) lines.push(`  - Start: ${started}`);
    return lines;
}

function startBlock(rec: SessionRecord, rate: number, service: ServiceName): string[] {
    const n = rec.gpus.length;
    const gpuHourly = rate * n;
    const storageRate = currentStorageRate(rec);
    const storageHourly = (storageRate * rec.storage_gb) / 730;
    const out = [
        `- ${rec.session_id}:`,
        `  - ${rec.rental_type} @ $${f4(rate)}/gpu (est hourly ${f4(gpuHourly)}$ (GPUs) + ${f4(storageHourly)}$ (disk) = ${f4(gpuHourly + storageHourly)}$)`,
        `  - x${n} GPUs allocated: ${slotList(rec.gpus)}`,
    ];
    if (rec.storage_gb) out.push(`  - Storage: ${rec.storage_gb.toFixed(2)} GB @ ${f4(storageRate)}$/GB/mo`);
    const started = when(service, rec.start_time);
    if (started) out.push(`  - Start: ${started}`);
    return out;
}

function endBlock(rec: SessionRecord, service: ServiceName): string[] {
    const totals = rec.totals ?? RentalSession.fromRecord(rec).totals(rec.end_time ?? rec.last_state_change);
    const out = [
        `- ${rec.session_id}:`,
        `  - x${rec.gpus.length} GPUs released: ${slotList(rec.gpus)}`,
        `  - Duration: ${humanizeDuration(totals.duration_seconds)}`,
        `  - Total earned: ${f4(totals.earned_gpu)}$ (GPUs) + ${f4(totals.earned_storage)}$ (disk) = ${f4(totals.earned_total)}$`,
    ];
    const started = when(service, rec.start_time);
    if (started) out.push(`  - Start: ${started}`);
    const ended = when(service, rec.end_time);
    if (ended) out.push(`  - End: ${ended}`);
    return out;
}

function pauseBlock(rec: SessionRecord, service: ServiceName): string[] {
    const out = [`- ${rec.session_id}:`, `  - x${rec.gpus.length} GPUs released: ${slotList(rec.gpus)}`];
    if (rec.storage_gb) out.push(`  - Storage: ${rec.storage_gb.toFixed(2)} GB continues`);
    const paused = when(service, rec.last_state_change);
    if (paused) out.push(`  - Paused: ${paused}`);
    return out;
}

function resumeBlock(rec: SessionRecord, rate: number, service: ServiceName): string[] {
    const n = rec.gpus.length;
    const out = [
        `- ${rec.session_id}:`,
        `  - x${n} GPUs allocated: ${slotList(rec.gpus)}`,
        `  - GPU rate: $${f4(rate)}/gpu/hr (est hourly ${f4(rate * n)}$)`,
    ];
    if (rec.storage_gb) {
        const sr = currentStorageRate(rec);
        out.push(`  - Storage: ${rec.storage_gb.toFixed(2)} GB @ ${f4(sr)}$/GB/mo (~${f4((sr * rec.storage_gb) / 730)}$/hr)`);
    }
    const resumed = when(service, rec.last_state_change);
    if (resumed) out.push(`  - Resumed: ${resumed}`);
    return out;
}

/* -------------------------------------------------------------------------- */
/* Assembly                                                                   */
/* -------------------------------------------------------------------------- */

/**
 * Pack lines into bodies of at most `limit` characters (counting one newline
 * per line). Every chunk starts with the rule and, when `repeatHeader`, the
 * header again.
 */
export function chunkLines(header: string, lines: readonly string[], limit = DISCORD_CHUNK_LIMIT, repeatHeader = true): string[] {
    const first = [HR, header];
    const next = repeatHeader ? first : [];
    const bodies: string[] = [];

    let base = first;
    let current = [...first];
    let size = current.reduce((n, l) => n + l.length + 1, 0);

    for (const line of lines) {
        const add = line.length + 1;
        if (size + add > limit && current.length > base.length) {
            bodies.push(current.join('\n'));
            base = next;
            current = [...next];
            size = current.reduce((n, l) => n + l.length + 1, 0);
            if (!line) continue;
        }
        current.push(line);
        size += add;
    }
    if (current.length > base.length || bodies.length === 0) bodies.push(current.join('\n'));
    return bodies;
}

function assemble(service: ServiceName, title: string, lines: readonly string[], repeatHeader = true): Message[] {
    const header = `## ${title}`;
    if (service === 'discord') {
        return chunkLines(header, lines, DISCORD_CHUNK_LIMIT, repeatHeader).map(body => ({ title: '', body }));
    }
    return [{ title, body: [HR, header, ...lines].join('\n') }];
}

function startupLines(items: readonly StartupItem[], service: ServiceName): string[] {
    const lines: string[] = [];
    items.forEach((it, i) => {
        if (i > 0) lines.push('');
        lines.push(...machineSectionLines(it.summary));
        if (it.sessions.length === 0) lines.push('- No tracked sessions');
        for (const rec of it.sessions) lines.push(...sessionDetailLines(rec, it.summary.as_of, service));
    });
    return lines;
}

export interface FormatOptions {
    service: ServiceName;
    /** user/role id mentioned on error messages */
    mention?: string | null;
}

export function formatEvent(event: NotificationEvent, opts: FormatOptions): Message[] {
    const { service } = opts;
    switch (event.kind) {
        case 'system':
            return assemble(service, event.title, event.lines);

        case 'startup':
            if (event.items.length === 0) return assemble(service, 'Startup Summary', ['No tracked machines.']);
            return assemble(service, 'Startup Summary', startupLines(event.items, service), false);

        case 'error': {
            const lines = [`Machine ${event.machine_id}`];
            if (opts.mention) lines.push(service === 'discord' ? `<@${opts.mention}>` : `Attention: ${opts.mention}`);
            lines.push(`Error: ${event.error}`);
            return assemble(service, 'Machine Error', lines);
        }

        case 'recovery':
            return assemble(service, 'Machine Recovered', [`Machine ${event.machine_id}`, 'Status: OK']);

        case 'lifecycle': {
            const e = event.event;
            const head = [`Machine ${e.machine_id}`];
            const section = ['', ...machineSectionLines(e.summary)];
            switch (e.type) {
                case 'start':
                    return assemble(service, 'New Rental', [...head, ...startBlock(e.session, e.rate ?? 0, service), ...section]);
                case 'end':
                    return assemble(service, 'Rental Ended', [...head, ...endBlock(e.session, service), ...section]);
                case 'pause':
                    return assemble(service, 'Session Paused', [...head, ...pauseBlock(e.session, service), ...section]);
                case 'resume':
                    return assemble(service, 'Session Resumed', [...head, ...resumeBlock(e.session, e.rate ?? 0, service), ...section]);
            }
        }
    }
}
