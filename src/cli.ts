#!/usr/bin/env node
/**
 * CLI Entry Point for slotwatch
 */

import * as path from 'path';
import { AppConfig, loadConfig, LOCK } from './config';
import { configureLogging, createLogger, errorMessage } from './logger';
import { MachineClient } from './machine_client';
import { RentalMonitor } from './monitor_loop';
import { NotificationDispatcher } from './notifications/dispatcher';
import { buildTargets } from './notifications/types';
import { RegistryStore } from './registry_store';
import { RentalSession } from './rental_session';
import { acquireMonitorLock, releaseMonitorLock } from './state_io';
import { MonitorError } from './structured_error';
import { money, renderEarningsReport, summarizeMachine } from './summary';
import { SessionRecord } from './types';

const log = createLogger('cli');

interface ParsedArgs {
    command: string;
    positional: string[];
    flags: Map<string, string | true>;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
    const [command = 'help', ...rest] = argv;
    const positional: string[] = [];
    const flags = new Map<string, string | true>();
    for (let i = 0; i < rest.length; i++) {
        const a = rest[i];
        if (a.startsWith('--')) {
            const key = a.slice(2);
            const next = rest[i + 1];
            if (next !== undefined && !next.startsWith('--') && key !== 'once') {
                flags.set(key, next);
                i++;
            } else {
                flags.set(key, true);
            }
        } else {
            positional.push(a);
        }
    }
    return { command, positional, flags };
}

function sessionLine(rec: SessionRecord, asOf: string): string {
    const t = RentalSession.fromRecord(rec).totals(rec.end_time ?? asOf);
    const gpus = rec.gpus.length > 0 ? `[${rec.gpus.join(', ')}]` : '[]';
    return `${rec.session_id}  ${rec.status.padEnd(7)}  ${rec.rental_type}  gpus=${gpus}  ` +
        `storage=${rec.storage_gb.toFixed(2)}GB  start=${rec.start_time}  earned=${money(t.earned_total, 4)}`;
}

export class SlotwatchCLI {
    private loadConfig(args: ParsedArgs): AppConfig {
        const flag = args.flags.get('config');
        const configPath = typeof flag === 'string'
            ? flag
            : process.env.SLOTWATCH_CONFIG || path.join(process.cwd(), 'slotwatch.json');
        const cfg = loadConfig(configPath);
        configureLogging({ debug: cfg.debug, file: cfg.log_file });
        return cfg;
    }

    async run(argv: readonly string[]): Promise<number> {
        const args = parseArgs(argv);

        switch (args.command) {
            case 'run':
                return this.runMonitor(args);
            case 'status':
                return this.withStore(args, store => this.runStatus(store));
            case 'sessions':
                return this.withStore(args, store => this.runSessions(store, args));
            case 'archive':
                return this.withStore(args, store => this.runArchive(store, args));
            case 'help':
            case '--help':
            case '-h':
                this.showHelp();
                return 0;
            default:
                console.error(`Unknown command: ${args.command}`);
                this.showHelp();
                return 2;
        }
    }

    private withStore(args: ParsedArgs, fn: (store: RegistryStore) => number): number {
        const cfg = this.loadConfig(args);
        const store = RegistryStore.open(cfg.state_dir, false);
        try {
            return fn(store);
        } finally {
            store.close();
        }
    }

    private async runMonitor(args: ParsedArgs): Promise<number> {
        const cfg = this.loadConfig(args);
        const warnings: string[] = [];
        const lock = await acquireMonitorLock({
            lockPath: path.join(cfg.state_dir, LOCK.FILE_NAME),
            timeoutMs: LOCK.TIMEOUT_MS,
            staleTtlMs: LOCK.STALE_TTL_MS,
            warnings,
            identity: { command: 'run', machines: cfg.machine_ids },
        });
        for (const w of warnings) log.warn(w);

        const store = RegistryStore.open(cfg.state_dir);
        const ac = new AbortController();
        const stop = (signal: string) => {
            log.info('Shutdown requested', { signal });
            ac.abort();
        };
        process.once('SIGINT', () => stop('SIGINT'));
        process.once('SIGTERM', () => stop('SIGTERM'));

        try {
            const monitor = new RentalMonitor({
                config: cfg,
                store,
                source: new MachineClient({ apiUrl: cfg.api_url, apiKey: cfg.api_key }),
                sink: new NotificationDispatcher({
                    targets: buildTargets(cfg.targets, log.child('targets')),
                    errorMention: cfg.error_mention,
                }),
            });
            await monitor.run(ac.signal, { once: args.flags.get('once') === true });
            return 0;
        } finally {
            store.close();
            releaseMonitorLock(lock);
        }
    }

    private runStatus(store: RegistryStore): number {
        const now = new Date().toISOString();
        const summaries = store.listRegistries().map(reg => summarizeMachine(reg, now));
        if (summaries.length === 0) {
            console.log('No machines tracked yet.');
        } else {
            console.log(renderEarningsReport(summaries));
        }
        const m = store.metrics();
        console.log(
            `\narchive: ${m.archivedSessionCount} sessions, ${money(m.archivedEarningsTotal)} earned; ` +
            `db ${(m.dbSizeBytes / 1024).toFixed(1)} KiB`
        );
        return 0;
    }

    private runSessions(store: RegistryStore, args: ParsedArgs): number {
        const id = Number(args.positional[0]);
        if (!Number.isInteger(id)) {
            console.error('Usage: slotwatch sessions <machine_id>');
            return 2;
        }
        const reg = store.loadRegistry(id);
        if (!reg) {
            console.error(`No registry for machine ${id}`);
            return 1;
        }
        const now = new Date().toISOString();
        const sessions = Object.values(reg.sessions).sort((a, b) => a.session_id.localeCompare(b.session_id));
        if (sessions.length === 0) console.log(`Machine ${id}: no active sessions`);
        for (const rec of sessions) console.log(sessionLine(rec, now));
        return 0;
    }

    private runArchive(store: RegistryStore, args: ParsedArgs): number {
        const rawId = args.positional[0];
        const machineId = rawId === undefined ? undefined : Number(rawId);
        if (machineId !== undefined && !Number.isInteger(machineId)) {
            console.error('Usage: slotwatch archive [machine_id] [--limit n]');
            return 2;
        }
        const limitFlag = args.flags.get('limit');
        const limit = typeof limitFlag === 'string' ? parseInt(limitFlag, 10) : 20;
        const records = store.listArchivedSessions(machineId, Number.isFinite(limit) && limit > 0 ? limit : 20);
        if (records.length === 0) console.log('No archived sessions.');
        for (const rec of records) console.log(sessionLine(rec, rec.end_time ?? rec.last_state_change));
        return 0;
    }

    private showHelp(): void {
        console.log([
            'slotwatch - GPU rental session tracker',
            '',
            'Usage:',
            '  slotwatch run [--config path] [--once]   poll machines and reconcile sessions',
            '  slotwatch status [--config path]         per-machine occupancy and earnings',
            '  slotwatch sessions <machine_id>          active sessions of one machine',
            '  slotwatch archive [machine_id] [--limit n]  recently ended sessions',
            '  slotwatch help',
            '',
            'Config defaults to ./slotwatch.json or $SLOTWATCH_CONFIG.',
        ].join('\n'));
    }
}

// Run CLI
if (require.main === module) {
    const cli = new SlotwatchCLI();
    cli.run(process.argv.slice(2)).then(
        code => {
            process.exitCode = code;
        },
        (err: unknown) => {
            const msg = err instanceof MonitorError ? `${err.code}: ${err.message}` : errorMessage(err);
            console.error('Fatal error:', msg);
            process.exitCode = 1;
        }
    );
}
