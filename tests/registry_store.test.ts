import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';

import { reconcile } from '../src/reconciler';
import { RegistryStore } from '../src/registry_store';
import { emptyRegistry } from '../src/session_registry';
import { ERRORS, MonitorError } from '../src/structured_error';
import { MachineRegistry, MachineState, SessionRecord } from '../src/types';
import { T0, approx, at, counters, machine } from './fixtures';

function withStore(fn: (store: RegistryStore, dir: string) => void): () => void {
    return () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'slotwatch-store-'));
        const store = RegistryStore.open(dir);
        try {
            fn(store, dir);
        } finally {
            store.close();
            fs.rmSync(dir, { recursive: true, force: true });
        }
    };
}

const RUNNING_STATE = machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: counters(1, 1, 1, 1) });

function startedRegistry(): MachineRegistry {
    return reconcile(emptyRegistry(1, T0), RUNNING_STATE, { now: T0 }).registry;
}

function endedPass(endHours: number, machineId = 1): { registry: MachineRegistry; archived: SessionRecord[]; state: MachineState } {
    const runningState = { ...RUNNING_STATE, machine_id: machineId };
    const start = reconcile(emptyRegistry(machineId, T0), runningState, { now: T0 }).registry;
    const state = machine({ machine_id: machineId, occupancy: 'x x x x', alloc_disk_space: 0 });
    const r = reconcile(start, state, { now: at(endHours) });
    return { registry: r.registry, archived: r.archived, state };
}

test('unknown machines have no registry', withStore(store => {
    assert.equal(store.loadRegistry(1), null);
    assert.equal(store.loadMachineState(1), null);
}));

test('a committed registry and snapshot read back unchanged', withStore(store => {
    const reg = startedRegistry();
    const res = store.commitCycle(reg, [], RUNNING_STATE);
    assert.deepEqual(res, { archivedCount: 0, warnings: [] });
    assert.deepEqual(store.loadRegistry(1), reg);
    assert.deepEqual(store.loadMachineState(1), RUNNING_STATE);
}));

test('ended sessions are archived once, with a JSON copy', withStore((store, dir) => {
    const pass = endedPass(10);
    const first = store.commitCycle(pass.registry, pass.archived, pass.state);
    assert.equal(first.archivedCount, 1);
    const exported = path.join(dir, 'rental_logs', 'm1', 'm1-0001.json');
    assert.deepEqual(JSON.parse(fs.readFileSync(exported, 'utf8')), pass.archived[0]);

    const again = store.commitCycle(pass.registry, pass.archived, pass.state);
    assert.equal(again.archivedCount, 0);
    assert.deepEqual(store.getArchivedSession('m1-0001'), pass.archived[0]);
    assert.deepEqual(store.loadRegistry(1)?.sessions, {});
}));

test('archived sessions survive a reopen', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'slotwatch-store-'));
    try {
        const pass = endedPass(10);
        const a = RegistryStore.open(dir);
        a.commitCycle(pass.registry, pass.archived, pass.state);
        a.close();

        const b = RegistryStore.open(dir);
        try {
            assert.deepEqual(b.getArchivedSession('m1-0001'), pass.archived[0]);
            assert.equal(b.getArchivedSession('m1-9999'), null);
        } finally {
            b.close();
        }
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
});

test('archive listing is newest first and filters by machine', withStore(store => {
    const early = endedPass(5, 1);
    const late = endedPass(8, 2);
    store.commitCycle(early.registry, early.archived, early.state);
    store.commitCycle(late.registry, late.archived, late.state);

    assert.deepEqual(store.listArchivedSessions().map(s => s.session_id), ['m2-0001', 'm1-0001']);
    assert.deepEqual(store.listArchivedSessions(1).map(s => s.session_id), ['m1-0001']);
    assert.deepEqual(store.listArchivedSessions(undefined, 1).map(s => s.session_id), ['m2-0001']);
}));

test('only ended sessions can be archived and a bad commit rolls back', withStore(store => {
    const reg = startedRegistry();
    const live = reg.sessions['m1-0001'];
    assert.throws(() => store.archiveSession(live), (e: unknown) => e instanceof MonitorError && e.code === ERRORS.STORE_FAILURE);

    assert.throws(() => store.commitCycle(reg, [live], RUNNING_STATE));
    assert.equal(store.loadRegistry(1), null);
    assert.equal(store.loadMachineState(1), null);
}));

test('archiveSession reports duplicates', withStore(store => {
    const rec = endedPass(3).archived[0];
    assert.equal(store.archiveSession(rec), true);
    assert.equal(store.archiveSession(rec), false);
}));

test('metrics count registries, sessions and archived earnings', withStore(store => {
    const pass = endedPass(10, 1);
    store.commitCycle(pass.registry, pass.archived, pass.state);
    const second = reconcile(emptyRegistry(2, T0), { ...RUNNING_STATE, machine_id: 2 }, { now: T0 }).registry;
    store.commitCycle(second, [], null);

    const m = store.metrics();
    assert.equal(m.registryCount, 2);
    assert.equal(m.activeSessionCount, 1);
    assert.equal(m.archivedSessionCount, 1);
    approx(m.archivedEarningsTotal, pass.archived[0].totals?.earned_total ?? -1);
    assert.equal(m.machineStateCount, 1);
    assert.ok(m.dbSizeBytes > 0);
}));

test('a corrupt stored registry is reported, not guessed at', withStore((store, dir) => {
    store.commitCycle(startedRegistry(), [], null);
    const raw = new Database(path.join(dir, 'slotwatch.db'));
    raw.prepare(`UPDATE machine_registries SET payload = '{broken' WHERE machine_id = 1`).run();
    raw.close();
    assert.throws(() => store.loadRegistry(1), (e: unknown) => e instanceof MonitorError && e.code === ERRORS.CORRUPT_REGISTRY);
}));
