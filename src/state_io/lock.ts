// src/state_io/lock.ts

import * as fs from "fs";
import * as path from "path";
import { errnoCode } from "./errno";
import { sleep } from "../retry";
import { MonitorError, ERRORS } from "../structured_error";

export interface LockHandle {
    fd: number;
    lockPath: string;
}

interface LockInfo {
    pid: number | null;
    startedMs: number;
}

function backoff(attempt: number): number {
    // 50,100,200,400,800,... capped at 1000
    return Math.min(50 * Math.pow(2, attempt), 1000);
}

function readLockInfo(lockPath: string): LockInfo | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    } catch {
        return null;
    }
    if (typeof parsed !== "object" || parsed === null) return null;
    const pid = "pid" in parsed && typeof parsed.pid === "number" ? parsed.pid : null;
    const startedMs = "started_ms" in parsed && typeof parsed.started_ms === "number" ? parsed.started_ms : 0;
    return { pid, startedMs };
}

function pidAlive(pid: number): boolean {
    try {
        // signal 0 only checks existence
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: exists but owned by someone else
        return errnoCode(e) === "EPERM";
    }
}

/**
 * Take the single-writer lock on a state directory. Exclusive create ('wx');
 * a lock whose PID is dead or older than `staleTtlMs` is removed and retried.
 */
export async function acquireMonitorLock(params: {
    lockPath: string;
    timeoutMs: number;
    staleTtlMs: number;
    warnings: string[];
    identity: Record<string, unknown>;
}): Promise<LockHandle> {
    const { lockPath, timeoutMs, staleTtlMs, warnings, identity } = params;

    fs.mkdirSync(path.dirname(lockPath), { recursive: true, mode: 0o755 });

    const started = Date.now();
    let attempt = 0;

    while (true) {
        try {
            const fd = fs.openSync(lockPath, "wx");
            const lockData = {
                ...identity,
                pid: process.pid,
                started_utc: new Date().toISOString(),
                started_ms: Date.now(),
            };
            fs.writeSync(fd, JSON.stringify(lockData, null, 2));
            return { fd, lockPath };
        } catch (e) {
            if (errnoCode(e) !== "EEXIST") throw e;
        }

        const info = readLockInfo(lockPath);
        let stale = false;
        if (info === null) {
            stale = true;
            warnings.push(`STALE_LOCK(UNREADABLE) ${lockPath}`);
        } else if (info.pid !== null && !pidAlive(info.pid)) {
            stale = true;
            warnings.push(`STALE_LOCK(PID_DEAD) ${lockPath} pid=${info.pid}`);
        } else if (Date.now() - info.startedMs > staleTtlMs) {
            stale = true;
            warnings.push(`STALE_LOCK(AGE) ${lockPath} age=${Date.now() - info.startedMs}ms`);
        }

        if (stale) {
            try {
                fs.unlinkSync(lockPath);
            } catch (e) {
                // another process removed it first
                if (errnoCode(e) !== "ENOENT") throw e;
            }
            continue;
        }

        if (Date.now() - started >= timeoutMs) {
            throw new MonitorError(
                `Lock ${lockPath} held by pid ${info?.pid ?? "?"}; is another monitor running?`,
                ERRORS.LOCK_HELD
            );
        }

        const wait = backoff(attempt++);
        warnings.push(`LOCK_RETRY after ${wait}ms on ${lockPath}`);
        await sleep(wait);
    }
}

export function releaseMonitorLock(handle: LockHandle): void {
    fs.closeSync(handle.fd);
    try {
        fs.unlinkSync(handle.lockPath);
    } catch (e) {
        if (errnoCode(e) !== "ENOENT") throw e;
    }
}
