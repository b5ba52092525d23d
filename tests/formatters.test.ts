import test from 'node:test';
import assert from 'node:assert/strict';

import { chunkLines, discordTs, formatEvent, HR, humanizeDuration } from '../src/notifications/formatters';
import { reconcile } from '../src/reconciler';
import { emptyRegistry } from '../src/session_registry';
import { LifecycleEvent } from '../src/types';
import { T0, at, counters, machine } from './fixtures';

const RUNNING = machine({ occupancy: 'D D x x', alloc_disk_space: 50, counters: counters(1, 1, 1, 1) });

function startEvent(): LifecycleEvent {
    return reconcile(emptyRegistry(1, T0), RUNNING, { now: T0 }).events[0];
}

function endEvent(): LifecycleEvent {
    const reg = reconcile(emptyRegistry(1, T0), RUNNING, { now: T0 }).registry;
    return reconcile(reg, machine({ occupancy: 'x x x x', alloc_disk_space: 0 }), { now: at(10) }).events[0];
}

const START_LINES = [
    'Machine 1',
    '- m1-0001:',
    '  - D @ $0.5000/gpu (est hourly 1.0000$ (GPUs) + 0.0068$ (disk) = 1.0068$)',
    '  - x2 GPUs allocated: [0, 1]',
    '  - Storage: 50.00 GB @ 0.1000$/GB/mo',
];

const START_SECTION = [
    '',
    '### Machine 1',
    'Occupancy: 2/4 RTX 4090 GPUs (50%)',
    'Total est hourly: 1.0000$ (GPUs) + 0.0068$ (disk) = 1.0068$',
    'Tracked sessions: 1 running, 0 stored',
    'Accrued (active sessions): 0.0000$',
];

test('humanizeDuration picks units by magnitude', () => {
    assert.equal(humanizeDuration(59), '59s');
    assert.equal(humanizeDuration(61), '1m 1s');
    assert.equal(humanizeDuration(3661), '1h 1m 1s');
    assert.equal(humanizeDuration(90061), '1d 1h 1m');
});

test('discordTs renders epoch tags', () => {
    assert.equal(discordTs(T0), '<t:1772323200:f>');
    assert.equal(discordTs(T0, 'R'), '<t:1772323200:R>');
    assert.equal(discordTs(null), '');
    assert.equal(discordTs('later'), 'later');
});

test('chunkLines splits under the limit and drops a blank line at the break', () => {
    const line = 'a'.repeat(10);
    const limit = HR.length + 1 + '## H'.length + 1 + 2 * (line.length + 1);

    assert.deepEqual(chunkLines('## H', [line, line, '', 'b'], limit), [
        [HR, '## H', line, line].join('\n'),
        [HR, '## H', 'b'].join('\n'),
    ]);
    assert.deepEqual(chunkLines('## H', [line, line, line], limit, false), [
        [HR, '## H', line, line].join('\n'),
        line,
    ]);
    assert.deepEqual(chunkLines('## H', []), [[HR, '## H'].join('\n')]);
});

test('a new rental renders as one titled message for generic webhooks', () => {
    const msgs = formatEvent({ kind: 'lifecycle', event: startEvent() }, { service: 'default' });
    assert.deepEqual(msgs, [{
        title: 'New Rental',
        body: [HR, '## New Rental', ...START_LINES, `  - Start: ${T0}`, ...START_SECTION].join('\n'),
    }]);
});

test('discord messages carry no title and use timestamp tags', () => {
    const msgs = formatEvent({ kind: 'lifecycle', event: startEvent() }, { service: 'discord' });
    assert.deepEqual(msgs, [{
        title: '',
        body: [
            HR,
            '## New Rental',
            ...START_LINES,
            '  - Start: <t:1772323200:f> (<t:1772323200:R>)',
            ...START_SECTION,
        ].join('\n'),
    }]);
});

test('an ended rental reports duration and frozen earnings', () => {
    const [msg] = formatEvent({ kind: 'lifecycle', event: endEvent() }, { service: 'default' });
    assert.equal(msg.title, 'Rental Ended');
    const lines = msg.body.split('\n');
    assert.deepEqual(lines.slice(2, 9), [
        'Machine 1',
        '- m1-0001:',
        '  - x2 GPUs released: [0, 1]',
        '  - Duration: 10h 0m 0s',
        '  - Total earned: 10.0000$ (GPUs) + 0.0685$ (disk) = 10.0685$',
        `  - Start: ${T0}`,
        `  - End: ${at(10)}`,
    ]);
    assert.equal(lines[lines.length - 3], 'Total est hourly: 0.0000$ (GPUs) + 0.0000$ (disk) = 0.0000$');
});

test('error messages mention the configured user', () => {
    const event = { kind: 'error', machine_id: 3, error: 'disk failure' } as const;
    assert.deepEqual(formatEvent(event, { service: 'discord', mention: '123' }), [{
        title: '',
        body: [HR, '## Machine Error', 'Machine 3', '<@123>', 'Error: disk failure'].join('\n'),
    }]);
    assert.deepEqual(formatEvent(event, { service: 'default', mention: 'ops' }), [{
        title: 'Machine Error',
        body: [HR, '## Machine Error', 'Machine 3', 'Attention: ops', 'Error: disk failure'].join('\n'),
    }]);
    assert.deepEqual(formatEvent(event, { service: 'default' })[0].body.split('\n').slice(2), ['Machine 3', 'Error: disk failure']);
});

test('system, recovery and empty startup messages', () => {
    assert.deepEqual(formatEvent({ kind: 'system', title: 'Monitor Stopped', lines: ['Shutdown requested'] }, { service: 'default' }), [
        { title: 'Monitor Stopped', body: [HR, '## Monitor Stopped', 'Shutdown requested'].join('\n') },
    ]);
    assert.deepEqual(formatEvent({ kind: 'recovery', machine_id: 2 }, { service: 'default' })[0].body.split('\n').slice(1), [
        '## Machine Recovered',
        'Machine 2',
        'Status: OK',
    ]);
    assert.deepEqual(formatEvent({ kind: 'startup', items: [] }, { service: 'discord' }), [
        { title: '', body: [HR, '## Startup Summary', 'No tracked machines.'].join('\n') },
    ]);
});
