import test, { mock } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { parseArgs, SlotwatchCLI } from '../src/cli';
import { reconcile } from '../src/reconciler';
import { RegistryStore } from '../src/registry_store';
import { emptyRegistry } from '../src/session_registry';
import { T0, counters, machine } from './fixtures';

function withConfig(fn: (configPath: string, dir: string) => Promise<void>): () => Promise<void> {
    return async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'slotwatch-cli-'));
        const configPath = path.join(dir, 'slotwatch.json');
        fs.writeFileSync(configPath, JSON.stringify({
            api_key: 'test-secret',
            machine_ids: [1],
            log_file: 'slotwatch.log',
            check_frequency: 60,
            state_dir: 'state',
        }));
        try {
            await fn(configPath, dir);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    };
}

function printed(calls: ReadonlyArray<{ arguments: unknown[] }>): string[] {
    return calls.map(c => c.arguments.map(String).join(' '));
}

test('parseArgs separates positionals from flags', () => {
    const args = parseArgs(['archive', '3', '--limit', '5', '--once', '--config', 'x.json']);
    assert.equal(args.command, 'archive');
    assert.deepEqual(args.positional, ['3']);
    assert.deepEqual([...args.flags], [['limit', '5'], ['once', true], ['config', 'x.json']]);
    assert.equal(parseArgs([]).command, 'help');
});

test('unknown commands exit with usage status', async t => {
    t.mock.method(console, 'log', () => {});
    const err = t.mock.method(console, 'error', () => {});
    assert.equal(await new SlotwatchCLI().run(['frobnicate']), 2);
    assert.deepEqual(printed(err.mock.calls), ['Unknown command: frobnicate']);
});

test('status on an empty store says so', withConfig(async configPath => {
    const log = mock.method(console, 'log', () => {});
    try {
        assert.equal(await new SlotwatchCLI().run(['status', '--config', configPath]), 0);
        assert.equal(printed(log.mock.calls)[0], 'No machines tracked yet.');
    } finally {
        log.mock.restore();
    }
}));

test('sessions lists the active sessions of one machine', withConfig(async (configPath, dir) => {
    const store = RegistryStore.open(path.join(dir, 'state'));
    const state = machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: counters(1, 1, 1, 1) });
    store.commitCycle(reconcile(emptyRegistry(1, T0), state, { now: T0 }).registry, [], state);
    store.close();

    const log = mock.method(console, 'log', () => {});
    const err = mock.method(console, 'error', () => {});
    try {
        const cli = new SlotwatchCLI();
        assert.equal(await cli.run(['sessions', '1', '--config', configPath]), 0);
        const [line] = printed(log.mock.calls);
        assert.ok(line.startsWith(`m1-0001  running  D  gpus=[0, 1]  storage=50.00GB  start=${T0}  earned=`));

        assert.equal(await cli.run(['sessions', '2', '--config', configPath]), 1);
        assert.equal(await cli.run(['sessions', 'abc', '--config', configPath]), 2);
        assert.deepEqual(printed(err.mock.calls), ['No registry for machine 2', 'Usage: slotwatch sessions <machine_id>']);
    } finally {
        log.mock.restore();
        err.mock.restore();
    }
}));
