import test from 'node:test';
import assert from 'node:assert/strict';

import { needsReconcile, observedFingerprint, reconcile, selectCandidate } from '../src/reconciler';
import { RentalSession } from '../src/rental_session';
import { SessionRegistry, emptyRegistry } from '../src/session_registry';
import { MachineRegistry } from '../src/types';
import { T0, approx, at, counters, machine } from './fixtures';

const ONE_DEMAND_RUNNING = counters(1, 1, 1, 1);
const ONE_DEMAND_STORED = counters(0, 0, 1, 1);

function assertConsistent(reg: MachineRegistry): void {
    assert.deepEqual(SessionRegistry.fromSnapshot(reg).checkInvariants(), []);
}

/** Scenario A result: one on-demand rental on slots 0-1 with 50 GB, started at T0. */
function started(): MachineRegistry {
    const r = reconcile(
        emptyRegistry(1, T0),
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING }),
        { now: T0 }
    );
    return r.registry;
}

/** Scenario B result: the rental above paused at T0+10h. */
function paused(): MachineRegistry {
    return reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 50, counters: ONE_DEMAND_STORED }),
        { now: at(10) }
    ).registry;
}

test('new rental opens a session with observed rates and the disk growth', () => {
    const r = reconcile(
        emptyRegistry(1, T0),
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING }),
        { now: T0 }
    );
    assert.deepEqual(r.errors, []);
    assert.equal(r.events.length, 1);
    const ev = r.events[0];
    assert.equal(ev.type, 'start');
    assert.equal(ev.rate, 0.5);
    assert.equal(ev.session.session_id, 'm1-0001');
    assert.deepEqual(ev.session.gpus, [0, 1]);
    assert.equal(ev.session.storage_gb, 50);
    assert.equal(ev.session.gpu_contracted_rate, 0.5);
    assert.equal(ev.session.storage_contracted_rate, 0.1);

    assert.deepEqual(r.registry.gpus, { '0': 'm1-0001', '1': 'm1-0001' });
    assert.equal(r.registry.next_session_seq, 2);
    assert.equal(r.registry.gpu_occupancy, 'D D x x');
    assert.equal(r.summary.running_sessions, 1);
    approx(r.summary.hourly_gpu, 1);
    approx(r.summary.hourly_storage, 5 / 730);
    assert.deepEqual(ev.summary, r.summary);
    assertConsistent(r.registry);
});

test('a further claimed slot with running +1 starts a second session', () => {
    const prior = started();
    const r = reconcile(
        prior,
        machine({ occupancy: 'D D D x', alloc_disk_space: 50, counters: counters(2, 2, 2, 2) }),
        { now: at(1) }
    );
    assert.deepEqual(r.errors, []);
    assert.deepEqual(r.events.map(e => [e.type, e.session.session_id]), [['start', 'm1-0002']]);
    assert.deepEqual(r.registry.gpus, { '0': 'm1-0001', '1': 'm1-0001', '2': 'm1-0002' });

    const second = r.registry.sessions['m1-0002'];
    assert.deepEqual(second.gpus, [2]);
    assert.equal(second.gpu_contracted_rate, 0.5);
    assert.equal(second.storage_gb, 0);

    const first = r.registry.sessions['m1-0001'];
    assert.deepEqual(first.gpus, [0, 1]);
    assert.deepEqual(first.gpu_segments, prior.sessions['m1-0001'].gpu_segments);
    assertConsistent(r.registry);
});

test('full release with disk kept and pause budget pauses the session', () => {
    const r = reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 50, counters: ONE_DEMAND_STORED }),
        { now: at(10) }
    );
    assert.deepEqual(r.errors, []);
    assert.deepEqual(r.events.map(e => e.type), ['pause']);
    const rec = r.registry.sessions['m1-0001'];
    assert.equal(rec.status, 'stored');
    assert.deepEqual(rec.gpus, [0, 1]);
    assert.equal(rec.gpu_segments[0].end, at(10));
    assert.equal(rec.storage_segments[0].end, null);
    assert.deepEqual(r.registry.gpus, {});
    assert.equal(r.summary.stored_sessions, 1);
    approx(r.summary.hourly_gpu, 0);
    assertConsistent(r.registry);
});

test('full release with the disk freed ends and archives the session', () => {
    const r = reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 0, counters: counters(0, 0, 0, 0) }),
        { now: at(10) }
    );
    assert.deepEqual(r.errors, []);
    assert.deepEqual(r.events.map(e => e.type), ['end']);
    assert.equal(r.archived.length, 1);
    const rec = r.archived[0];
    assert.equal(rec.status, 'ended');
    assert.equal(rec.end_time, at(10));
    assert.ok(rec.totals);
    approx(rec.totals.earned_gpu, 10);
    approx(rec.totals.earned_storage, 50 / 730);
    assert.deepEqual(r.registry.sessions, {});
    assertConsistent(r.registry);
});

test('a stored session whose disk disappears ends on the residual drop', () => {
    const r = reconcile(
        paused(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 0, counters: counters(0, 0, 0, 0) }),
        { now: at(12) }
    );
    assert.deepEqual(r.errors, []);
    assert.deepEqual(r.events.map(e => e.type), ['end']);
    const totals = r.archived[0].totals;
    assert.ok(totals);
    approx(totals.earned_gpu, 10);
    approx(totals.earned_storage, 0.1 * 50 * 12 / 730);
    assert.deepEqual(r.registry.sessions, {});
});

test('reclaiming the same GPU set resumes the stored session', () => {
    const r = reconcile(
        paused(),
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING }),
        { now: at(11) }
    );
    assert.deepEqual(r.errors, []);
    assert.equal(r.events.length, 1);
    assert.equal(r.events[0].type, 'resume');
    assert.equal(r.events[0].match, 'exact');
    const rec = r.registry.sessions['m1-0001'];
    assert.equal(rec.status, 'running');
    assert.equal(rec.gpu_segments.length, 2);
    assert.equal(rec.gpu_segments[1].start, at(11));
    approx(RentalSession.fromRecord(rec).totals(at(12)).earned_gpu, 11);
    assertConsistent(r.registry);
});

test('different GPUs with steady disk resume the only stored session', () => {
    const r = reconcile(
        paused(),
        machine({ occupancy: 'x x D D', alloc_disk_space: 50.4, counters: ONE_DEMAND_RUNNING }),
        { now: at(11) }
    );
    assert.equal(r.events.length, 1);
    assert.equal(r.events[0].type, 'resume');
    assert.equal(r.events[0].match, 'disk_continuity');
    assert.deepEqual(r.registry.sessions['m1-0001'].gpus, [2, 3]);
    assert.deepEqual(r.registry.gpus, { '2': 'm1-0001', '3': 'm1-0001' });
    assertConsistent(r.registry);
});

test('different GPUs with new disk start a new session beside the stored one', () => {
    const r = reconcile(
        paused(),
        machine({ occupancy: 'x x D D', alloc_disk_space: 80, counters: counters(1, 1, 2, 2) }),
        { now: at(11) }
    );
    assert.deepEqual(r.events.map(e => [e.type, e.session.session_id]), [['start', 'm1-0002']]);
    assert.equal(r.registry.sessions['m1-0002'].storage_gb, 30);
    assert.equal(r.registry.sessions['m1-0001'].status, 'stored');
    assertConsistent(r.registry);
});

test('a per-client hint sets storage for the session whose GPUs it names', () => {
    const r = reconcile(
        emptyRegistry(1, T0),
        machine({
            occupancy: 'D x I x',
            alloc_disk_space: 100,
            counters: counters(2, 1, 2, 1),
            client_hints: [{ gpus: [2], storage_gb: 70, end_date: null }],
        }),
        { now: T0 }
    );
    const byId = Object.fromEntries(r.events.map(e => [e.session.session_id, e.session]));
    assert.equal(byId['m1-0001'].rental_type, 'D');
    assert.equal(byId['m1-0001'].storage_gb, 30);
    assert.equal(byId['m1-0002'].rental_type, 'I');
    assert.equal(byId['m1-0002'].storage_gb, 70);
    assert.equal(byId['m1-0002'].gpu_contracted_rate, 0.3);
});

test('partial release keeps the session running on the remaining slots', () => {
    const r = reconcile(
        started(),
        machine({ occupancy: 'D x x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING }),
        { now: at(5) }
    );
    assert.deepEqual(r.events, []);
    const rec = r.registry.sessions['m1-0001'];
    assert.deepEqual(rec.gpus, [0]);
    assert.deepEqual(rec.gpu_segments.map(s => s.gpu_count), [2, 1]);
    approx(RentalSession.fromRecord(rec).totals(at(10)).earned_gpu, 7.5);
    assertConsistent(r.registry);
});

test('a partial release bills the remaining slots at no more than the contracted rate', () => {
    const above = reconcile(
        started(),
        machine({ occupancy: 'D x x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING, rates: { on_demand: 0.9 } }),
        { now: at(5) }
    );
    assert.deepEqual(above.registry.sessions['m1-0001'].gpu_segments.map(s => [s.rate, s.gpu_count]), [[0.5, 2], [0.5, 1]]);

    const below = reconcile(
        started(),
        machine({ occupancy: 'D x x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING, rates: { on_demand: 0.4 } }),
        { now: at(5) }
    );
    assert.deepEqual(below.registry.sessions['m1-0001'].gpu_segments.map(s => [s.rate, s.gpu_count]), [[0.5, 2], [0.4, 1]]);
});

test('an end whose disk change does not match the held storage is flagged', () => {
    const r = reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 30, counters: counters(0, 0, 0, 0) }),
        { now: at(10) }
    );
    assert.deepEqual(r.events.map(e => e.type), ['end']);
    assert.deepEqual(r.errors.map(e => e.code), ['AMBIGUOUS_RECONCILIATION']);
    assert.equal(r.errors[0].context.disk_delta_gb, -20);
});

test('without pause budget a full release ends even if disk is steady', () => {
    const r = reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 50, counters: counters(0, 0, 0, 0) }),
        { now: at(10) }
    );
    assert.deepEqual(r.events.map(e => e.type), ['end']);
    assert.deepEqual(r.errors.map(e => e.code), ['AMBIGUOUS_RECONCILIATION']);
});

test('a disk change of exactly the tolerance blocks a pause but still matches a residual drop', () => {
    const full = reconcile(
        started(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 49, counters: ONE_DEMAND_STORED }),
        { now: at(10), toleranceGb: 1 }
    );
    assert.deepEqual(full.events.map(e => e.type), ['end']);
    assert.deepEqual(full.errors.map(e => e.code), ['AMBIGUOUS_RECONCILIATION']);

    const residual = reconcile(
        paused(),
        machine({ occupancy: 'x x x x', alloc_disk_space: 1, counters: ONE_DEMAND_STORED }),
        { now: at(12), toleranceGb: 1 }
    );
    assert.deepEqual(residual.errors, []);
    assert.deepEqual(residual.events.map(e => e.type), ['end']);
    assert.deepEqual(residual.registry.sessions, {});
});

test('a disk drop that matches no stored session is reported and changes nothing', () => {
    const prior = paused();
    const r = reconcile(
        prior,
        machine({ occupancy: 'x x x x', alloc_disk_space: 20, counters: ONE_DEMAND_STORED }),
        { now: at(12) }
    );
    assert.deepEqual(r.events, []);
    assert.deepEqual(r.errors.map(e => e.code), ['UNMATCHED_DISK_DROP']);
    assert.equal(r.errors[0].context.closest_diff_gb, 20);
    assert.equal(r.registry.sessions['m1-0001'].status, 'stored');
});

test('storage price drops open a new segment; rises are ignored', () => {
    const base = started();
    const lower = reconcile(
        base,
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING, rates: { storage_per_gb_month: 0.08 } }),
        { now: at(1) }
    );
    assert.deepEqual(
        lower.registry.sessions['m1-0001'].storage_segments.map(s => s.rate_per_gb_month),
        [0.1, 0.08]
    );

    const higher = reconcile(
        base,
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING, rates: { storage_per_gb_month: 0.12 } }),
        { now: at(1) }
    );
    assert.equal(higher.registry.sessions['m1-0001'].storage_segments.length, 1);
});

test('a resumed session never bills above its contracted GPU rate', () => {
    const r = reconcile(
        paused(),
        machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING, rates: { on_demand: 0.9 } }),
        { now: at(11) }
    );
    const rec = r.registry.sessions['m1-0001'];
    assert.equal(rec.gpu_segments[1].rate, 0.5);
    assert.equal(r.events[0].rate, 0.9);
    assertConsistent(r.registry);
});

test('earnings never decrease across a start, pause, resume and end sequence', () => {
    let reg = started();
    const steps = [
        { hours: 3, state: machine({ occupancy: 'x x x x', alloc_disk_space: 50, counters: ONE_DEMAND_STORED }) },
        { hours: 5, state: machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING }) },
        { hours: 8, state: machine({ occupancy: 'x x x x', alloc_disk_space: 0, counters: counters(0, 0, 0, 0) }) },
    ];
    let last = 0;
    for (const step of steps) {
        const r = reconcile(reg, step.state, { now: at(step.hours) });
        const live = Object.values(r.registry.sessions).map(s => RentalSession.fromRecord(s).totals(at(step.hours)).earned_total);
        const done = r.archived.map(s => s.totals?.earned_total ?? 0);
        const total = [...live, ...done].reduce((a, b) => a + b, 0);
        assert.ok(total >= last, `earnings went from ${last} to ${total}`);
        last = total;
        reg = r.registry;
    }
    // 3h + 3h of two GPUs at 0.5, plus 8h of 50 GB at 0.1/GB/month
    approx(last, 6 + 0.1 * 50 * 8 / 730);
});

test('selectCandidate prefers continuity over resume', () => {
    const reg = SessionRegistry.fromSnapshot(started());
    const pick = selectCandidate(reg, [0, 1], 0, 1, new Set());
    assert.equal(pick.kind, 'continuity');
    assert.equal(pick.session?.id, 'm1-0001');
    assert.equal(selectCandidate(reg, [0, 1], 0, 1, new Set(['m1-0001'])).kind, 'new');
});

test('fingerprint gating ignores price-only changes', () => {
    const reg = started();
    const same = machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: ONE_DEMAND_RUNNING });
    assert.equal(needsReconcile(reg, same), false);
    assert.equal(needsReconcile(reg, { ...same, rates: { ...same.rates, on_demand: 0.7 } }), false);
    assert.equal(needsReconcile(reg, { ...same, alloc_disk_space: 51 }), true);
    assert.equal(reg.observed_fingerprint, observedFingerprint(same));
});
