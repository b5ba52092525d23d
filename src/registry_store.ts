// registry_store.ts — per-machine registries, archived sessions, last snapshots
//
// GUARANTEES:
// - One row per machine in machine_registries (stable key-sorted JSON payload)
// - A cycle's registry, archived sessions and observed state commit in one
//   transaction; readers never see a session both active and archived
// - Archived sessions are immutable once written (re-archiving is a no-op)
// - Forward-compatible schema migrations (schema_version)
// - Bounded LRU read cache for archived sessions
//
// CONTRACT: Synchronous API (better-sqlite3 blocks by design)

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { coerceCounters, coerceRegistry, coerceSession, serializeRegistry } from './session_registry';
import { atomicWriteJsonSync, stableStringify } from './state_io';
import { isRecord } from './schema_validator';
import { MonitorError, ERRORS } from './structured_error';
import { STORE } from './config';
import { createLogger, errorMessage } from './logger';
import { parseOccupancyLenient } from './occupancy';
import { ClientHint, MachineRegistry, MachineState, SessionRecord } from './types';

const log = createLogger('registry_store');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface RegistryStoreOptions {
  /** Directory for JSON copies of archived sessions; null disables the export. */
  archiveDir?: string | null;
  cacheMaxEntries?: number;
}

export interface CommitResult {
  archivedCount: number;
  /** non-fatal problems (archive export, fsync) */
  warnings: string[];
}

export interface StoreMetrics {
  registryCount: number;
  activeSessionCount: number;
  archivedSessionCount: number;
  archivedEarningsTotal: number;
  machineStateCount: number;
  dbSizeBytes: number;
  cacheEntries: number;
}

/* -------------------------------------------------------------------------- */
/* Constants                                                                  */
/* -------------------------------------------------------------------------- */

const SCHEMA_VERSION = 1;

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

function parseJson(payload: string, what: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (e) {
    throw new MonitorError(`Stored ${what} is not valid JSON`, ERRORS.CORRUPT_REGISTRY, e);
  }
}

function guard<T>(what: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (e instanceof MonitorError) throw e;
    throw new MonitorError(`Store failed to ${what}: ${errorMessage(e)}`, ERRORS.STORE_FAILURE, e);
  }
}

function numOr(v: unknown, fallback: number): number {
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function strOrNull(v: unknown): string | null {
  return typeof v === 'string' ? v : null;
}

function coerceHints(v: unknown): ClientHint[] {
  if (!Array.isArray(v)) return [];
  const out: ClientHint[] = [];
  for (const h of v) {
    if (!isRecord(h) || !Array.isArray(h.gpus)) continue;
    out.push({
      gpus: h.gpus.filter((g): g is number => typeof g === 'number'),
      storage_gb: typeof h.storage_gb === 'number' ? h.storage_gb : null,
      end_date: strOrNull(h.end_date),
    });
  }
  return out;
}

/** Rebuild a stored MachineState; null when the payload is not one. */
export function coerceMachineState(raw: unknown): MachineState | null {
  if (!isRecord(raw) || typeof raw.machine_id !== 'number') return null;
  const rates = isRecord(raw.rates) ? raw.rates : {};
  const occupancy = typeof raw.gpu_occupancy === 'string' ? raw.gpu_occupancy : '';
  return {
    machine_id: raw.machine_id,
    gpu_name: typeof raw.gpu_name === 'string' ? raw.gpu_name : '',
    num_gpus: numOr(raw.num_gpus, 0),
    gpu_occupancy: occupancy,
    slot_codes: parseOccupancyLenient(occupancy),
    counters: coerceCounters(raw.counters),
    alloc_disk_space: numOr(raw.alloc_disk_space, 0),
    rates: {
      on_demand: numOr(rates.on_demand, 0),
      interruptible: numOr(rates.interruptible, 0),
      reserved: numOr(rates.reserved, 0),
      storage_per_gb_month: numOr(rates.storage_per_gb_month, 0),
    },
    client_hints: coerceHints(raw.client_hints),
    client_end_date: strOrNull(raw.client_end_date),
    error_description: strOrNull(raw.error_description),
    timeout: numOr(raw.timeout, 0),
    listed: raw.listed === true,
  };
}

/* -------------------------------------------------------------------------- */
/* Registry Store                                                             */
/* -------------------------------------------------------------------------- */

export class RegistryStore {
  private readonly db: Database.Database;
  private readonly archiveDir: string | null;

  private cache: LRUCache<string, SessionRecord>;

  constructor(dbPath: string, opts: RegistryStoreOptions = {}) {
    this.archiveDir = opts.archiveDir ?? null;
    this.cache = new LRUCache<string, SessionRecord>({
      max: opts.cacheMaxEntries ?? STORE.ARCHIVE_CACHE_MAX_ENTRIES,
    });

    this.db = guard(`open ${dbPath}`, () => new Database(dbPath));
    guard(`initialize ${dbPath}`, () => {
      this.configureDatabase();
      this.runMigrations();
      this.integrityCheck();
    });
  }

  /** Store at `<stateDir>/slotwatch.db`, archive export under `<stateDir>/rental_logs`. */
  static open(stateDir: string, exportArchive = true): RegistryStore {
    fs.mkdirSync(stateDir, { recursive: true });
    return new RegistryStore(path.join(stateDir, STORE.DB_FILE_NAME), {
      archiveDir: exportArchive ? path.join(stateDir, STORE.ARCHIVE_DIR_NAME) : null,
    });
  }

  /* ------------------------------------------------------------------------ */
  /* SQLite Configuration                                                     */
  /* ------------------------------------------------------------------------ */

  private configureDatabase(): void {
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.pragma('cache_size = -2000'); // 2MB
  }

  /* ------------------------------------------------------------------------ */
  /* Migrations                                                               */
  /* ------------------------------------------------------------------------ */

  private runMigrations(): void {
    const tx = this.db.transaction(() => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS schema_version (
          version INTEGER PRIMARY KEY,
          applied_at TEXT DEFAULT CURRENT_TIMESTAMP
        ) STRICT
      `);

      const row = this.db
        .prepare<[], { version: number }>(`SELECT version FROM schema_version ORDER BY version DESC LIMIT 1`)
        .get();

      const current = row?.version ?? 0;

      if (current < 1) {
        this.db.exec(`
          CREATE TABLE IF NOT EXISTS machine_registries (
            machine_id INTEGER PRIMARY KEY,
            payload TEXT NOT NULL,
            updated_at TEXT NOT NULL
          ) STRICT;

          CREATE TABLE IF NOT EXISTS archived_sessions (
            session_id TEXT PRIMARY KEY,
            machine_id INTEGER NOT NULL,
            start_time TEXT NOT NULL,
            end_time TEXT NOT NULL,
            earned_total REAL NOT NULL DEFAULT 0.0,
            payload TEXT NOT NULL,
            archived_at TEXT DEFAULT CURRENT_TIMESTAMP
          ) STRICT;

          CREATE TABLE IF NOT EXISTS machine_states (
            machine_id INTEGER PRIMARY KEY,
            payload TEXT NOT NULL,
            observed_at TEXT NOT NULL
          ) STRICT;

          CREATE INDEX IF NOT EXISTS idx_archived_machine ON archived_sessions(machine_id, end_time);
        `);

        this.db.prepare(`INSERT INTO schema_version (version) VALUES (1)`).run();
      }

      // Future migrations: add only, never remove.
      if (current > SCHEMA_VERSION) {
        log.warn('Store schema is newer than this build', { store_version: current, supported: SCHEMA_VERSION });
      }
    });

    tx();
  }

  /* ------------------------------------------------------------------------ */
  /* Integrity                                                                */
  /* ------------------------------------------------------------------------ */

  private integrityCheck(): void {
    const result = this.db.prepare<[], { quick_check: string }>('PRAGMA quick_check').get();
    if (result?.quick_check !== 'ok') {
      throw new MonitorError(
        `Database integrity check failed: ${result?.quick_check ?? 'no result'}`,
        ERRORS.STORE_FAILURE
      );
    }
  }

  /* ------------------------------------------------------------------------ */
  /* Registries                                                               */
  /* ------------------------------------------------------------------------ */

  /** Null when the machine has never been committed. */
  loadRegistry(machineId: number): MachineRegistry | null {
    const row = this.db
      .prepare<[number], { payload: string }>(`SELECT payload FROM machine_registries WHERE machine_id = ?`)
      .get(machineId);
    if (!row) return null;

    const { registry, dropped } = coerceRegistry(parseJson(row.payload, `registry ${machineId}`), machineId);
    if (dropped.length > 0) {
      log.warn('Dropped unreadable sessions from stored registry', { machine_id: machineId, dropped });
    }
    return registry;
  }

  listRegistries(): MachineRegistry[] {
    const rows = this.db
      .prepare<[], { machine_id: number; payload: string }>(
        `SELECT machine_id, payload FROM machine_registries ORDER BY machine_id ASC`
      )
      .all();
    return rows.map(r => coerceRegistry(parseJson(r.payload, `registry ${r.machine_id}`), r.machine_id).registry);
  }

  private upsertRegistry(registry: MachineRegistry): void {
    this.db.prepare(
      `INSERT INTO machine_registries (machine_id, payload, updated_at) VALUES (?, ?, ?)
       ON CONFLICT(machine_id) DO UPDATE SET payload = excluded.payload, updated_at = excluded.updated_at`
    ).run(registry.machine_id, serializeRegistry(registry), registry.updated_at);
  }

  /* ------------------------------------------------------------------------ */
  /* Cycle commit                                                             */
  /* ------------------------------------------------------------------------ */

  /**
   * Persist one machine's pass: registry, newly archived sessions and the
   * observed snapshot, all or nothing. The JSON archive export runs after
   * the commit and only produces warnings.
   */
  commitCycle(registry: MachineRegistry, archived: readonly SessionRecord[], state: MachineState | null): CommitResult {
    const inserted = guard('commit cycle', () =>
      this.db.transaction(() => {
        this.upsertRegistry(registry);
        const fresh = archived.filter(rec => this.insertArchived(rec));
        if (state) this.upsertMachineState(state, registry.updated_at);
        return fresh;
      })()
    );

    for (const rec of inserted) this.cache.set(rec.session_id, rec);
    return { archivedCount: inserted.length, warnings: this.exportArchive(inserted) };
  }

  /* ------------------------------------------------------------------------ */
  /* Archive                                                                  */
  /* ------------------------------------------------------------------------ */

  /** Archive one ended session outside a cycle. Returns false if already archived. */
  archiveSession(record: SessionRecord): boolean {
    const fresh = guard('archive session', () => this.insertArchived(record));
    if (fresh) {
      this.cache.set(record.session_id, record);
      this.exportArchive([record]);
    }
    return fresh;
  }

  private insertArchived(rec: SessionRecord): boolean {
    if (rec.status !== 'ended' || rec.end_time === null) {
      throw new MonitorError(`Session ${rec.session_id} is ${rec.status}; only ended sessions are archived`, ERRORS.STORE_FAILURE);
    }
    const info = this.db.prepare(
      `INSERT INTO archived_sessions (session_id, machine_id, start_time, end_time, earned_total, payload)
       VALUES (?, ?, ?, ?, ?, ?)
       ON CONFLICT(session_id) DO NOTHING`
    ).run(
      rec.session_id,
      rec.machine_id,
      rec.start_time,
      rec.end_time,
      rec.totals?.earned_total ?? 0,
      stableStringify(rec)
    );
    return info.changes > 0;
  }

  private exportArchive(records: readonly SessionRecord[]): string[] {
    const warnings: string[] = [];
    if (!this.archiveDir) return warnings;
    for (const rec of records) {
      const filePath = path.join(this.archiveDir, `m${rec.machine_id}`, `${rec.session_id}.json`);
      try {
        atomicWriteJsonSync({ filePath, data: rec, mode: 0o644, fsyncMode: 'BEST_EFFORT', warnings });
      } catch (e) {
        warnings.push(`ARCHIVE_EXPORT_FAILED ${filePath}: ${errorMessage(e)}`);
      }
    }
    for (const w of warnings) log.warn(w);
    return warnings;
  }

  getArchivedSession(sessionId: string): SessionRecord | null {
    const cached = this.cache.get(sessionId);
    if (cached) return cached;

    const row = this.db
      .prepare<[string], { machine_id: number; payload: string }>(
        `SELECT machine_id, payload FROM archived_sessions WHERE session_id = ?`
      )
      .get(sessionId);
    if (!row) return null;

    const rec = coerceSession(parseJson(row.payload, `session ${sessionId}`), row.machine_id, sessionId);
    if (rec) this.cache.set(sessionId, rec);
    return rec;
  }

  /** Newest first. */
  listArchivedSessions(machineId?: number, limit = 50): SessionRecord[] {
    const rows = machineId === undefined
      ? this.db
          .prepare<[number], { session_id: string; machine_id: number; payload: string }>(
            `SELECT session_id, machine_id, payload FROM archived_sessions ORDER BY end_time DESC, session_id DESC LIMIT ?`
          )
          .all(limit)
      : this.db
          .prepare<[number, number], { session_id: string; machine_id: number; payload: string }>(
            `SELECT session_id, machine_id, payload FROM archived_sessions WHERE machine_id = ?
             ORDER BY end_time DESC, session_id DESC LIMIT ?`
          )
          .all(machineId, limit);

    const out: SessionRecord[] = [];
    for (const r of rows) {
      const rec = coerceSession(parseJson(r.payload, `session ${r.session_id}`), r.machine_id, r.session_id);
      if (rec) out.push(rec);
    }
    return out;
  }

  /* ------------------------------------------------------------------------ */
  /* Observed snapshots                                                       */
  /* ------------------------------------------------------------------------ */

  private upsertMachineState(state: MachineState, observedAt: string): void {
    this.db.prepare(
      `INSERT INTO machine_states (machine_id, payload, observed_at) VALUES (?, ?, ?)
       ON CONFLICT(machine_id) DO UPDATE SET payload = excluded.payload, observed_at = excluded.observed_at`
    ).run(state.machine_id, stableStringify(state), observedAt);
  }

  loadMachineState(machineId: number): MachineState | null {
    const row = this.db
      .prepare<[number], { payload: string }>(`SELECT payload FROM machine_states WHERE machine_id = ?`)
      .get(machineId);
    if (!row) return null;
    return coerceMachineState(parseJson(row.payload, `machine state ${machineId}`));
  }

  /* ------------------------------------------------------------------------ */
  /* Metrics                                                                   */
  /* ------------------------------------------------------------------------ */

  metrics(): StoreMetrics {
    const count = (table: string): number =>
      this.db.prepare<[], { c: number }>(`SELECT COUNT(*) as c FROM ${table}`).get()?.c ?? 0;

    const archivedEarningsTotal =
      this.db.prepare<[], { t: number | null }>(`SELECT SUM(earned_total) as t FROM archived_sessions`).get()?.t ?? 0;

    const dbSizeBytes =
      this.db
        .prepare<[], { size: number }>(
          `SELECT (page_count * page_size) as size FROM pragma_page_count(), pragma_page_size()`
        )
        .get()?.size ?? 0;

    let activeSessionCount = 0;
    for (const reg of this.listRegistries()) activeSessionCount += Object.keys(reg.sessions).length;

    return {
      registryCount: count('machine_registries'),
      activeSessionCount,
      archivedSessionCount: count('archived_sessions'),
      archivedEarningsTotal,
      machineStateCount: count('machine_states'),
      dbSizeBytes,
      cacheEntries: this.cache.size,
    };
  }

  /* ------------------------------------------------------------------------ */
  /* Close                                                                     */
  /* ------------------------------------------------------------------------ */

  close(): void {
    this.cache.clear();
    this.db.close();
  }
}
