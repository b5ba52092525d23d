/**
 * Structured Logger — line-oriented logging for the rental monitor
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when SLOTWATCH_LOG_JSON=1
 * - Optional file output via SLOTWATCH_LOG_FILE or the config file's log_file
 * - Module context (component name) on every line
 * - Cycle correlation ID and machine ID propagated through all log entries
 *
 * Environment:
 *   SLOTWATCH_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   SLOTWATCH_LOG_JSON   = 1 (default: text)
 *   SLOTWATCH_LOG_FILE   = path (optional, appends)
 *   SLOTWATCH_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'info' || v === 'warn' || v === 'error' ? v : 'info';
}

const DEBUG_OVERRIDE = process.env.SLOTWATCH_DEBUG === '1' || process.env.SLOTWATCH_DEBUG === 'true';

let effectiveMin: number = DEBUG_OVERRIDE ? 0 : LEVEL_ORDER[parseLevel(process.env.SLOTWATCH_LOG_LEVEL)];
let jsonMode = process.env.SLOTWATCH_LOG_JSON === '1';
let logFile = process.env.SLOTWATCH_LOG_FILE || '';
let silent = false;
let fileFailureReported = false;

/** Apply settings loaded from the config file. Environment flags keep precedence for debug. */
export function configureLogging(opts: { level?: LogLevel; debug?: boolean; file?: string; json?: boolean; silent?: boolean }): void {
    if (opts.level !== undefined) effectiveMin = LEVEL_ORDER[opts.level];
    if (opts.debug || DEBUG_OVERRIDE) effectiveMin = 0;
    if (opts.json !== undefined) jsonMode = opts.json;
    if (opts.silent !== undefined) silent = opts.silent;
    if (opts.file !== undefined) {
        logFile = opts.file;
        fileFailureReported = false;
        if (logFile) fs.mkdirSync(path.dirname(logFile), { recursive: true });
    }
}

/* -------------------------------------------------------------------------- */
/* Cycle Correlation Context (singleton)                                      */
/* -------------------------------------------------------------------------- */

let _cycleId: string = '';
let _machineId: string = '';

/** Set the active correlation context. Called by the monitor loop per cycle and per machine. */
export function setCorrelation(opts: { cycleId?: string; machineId?: number | string }): void {
    if (opts.cycleId !== undefined) _cycleId = opts.cycleId;
    if (opts.machineId !== undefined) _machineId = String(opts.machineId);
}

export function clearCorrelation(): void {
    _cycleId = '';
    _machineId = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < effectiveMin) return;

    const ts = new Date().toISOString();

    if (jsonMode) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_cycleId) entry.cycle = _cycleId;
        if (_machineId) entry.machine_id = _machineId;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _cycleId ? ` [${_cycleId.slice(0, 8)}${_machineId ? ':m' + _machineId : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    if (!silent) {
        switch (level) {
            case 'error': process.stderr.write(line + '\n'); break;
            case 'warn':  process.stderr.write(line + '\n'); break;
            default:      process.stdout.write(line + '\n'); break;
        }
    }

    if (logFile) {
        try {
            fs.appendFileSync(logFile, line + '\n');
        } catch (e) {
            if (!fileFailureReported) {
                fileFailureReported = true;
                process.stderr.write(`log file ${logFile} not writable: ${e instanceof Error ? e.message : String(e)}\n`);
            }
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}

/** Render an unknown thrown value for log payloads. */
export function errorMessage(e: unknown): string {
    if (e instanceof Error) return `${e.name}: ${e.message}`;
    return String(e);
}
