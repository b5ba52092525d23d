import test from 'node:test';
import assert from 'node:assert/strict';

import {
    diffOccupancy,
    formatOccupancy,
    occupiedCount,
    padOccupancy,
    parseOccupancy,
    parseOccupancyLenient,
} from '../src/occupancy';

test('parseOccupancy splits on any whitespace', () => {
    const r = parseOccupancy('  D D\tx  I R ');
    assert.deepEqual(r, { ok: true, codes: ['D', 'D', 'x', 'I', 'R'] });
});

test('parseOccupancy rejects unknown codes and lists them', () => {
    const r = parseOccupancy('D Q x Z');
    assert.deepEqual(r, { ok: false, invalid: ['Q', 'Z'] });
});

test('lenient parse reads unknown tokens as free', () => {
    assert.deepEqual(parseOccupancyLenient('D ? I'), ['D', 'x', 'I']);
    assert.deepEqual(parseOccupancyLenient(''), []);
});

test('padOccupancy fills with free slots and never truncates', () => {
    assert.deepEqual(padOccupancy(['D'], 3), ['D', 'x', 'x']);
    assert.deepEqual(padOccupancy(['D', 'I'], 1), ['D', 'I']);
});

test('diff reports vacated and claimed slots', () => {
    const d = diffOccupancy(['D', 'D', 'x', 'x'], ['D', 'x', 'I', 'x']);
    assert.deepEqual(d, { ended: [1], started: [2] });
});

test('a code change on an occupied slot is both ended and started', () => {
    const d = diffOccupancy(['D', 'I'], ['I', 'I']);
    assert.deepEqual(d, { ended: [0], started: [0] });
});

test('diff against an empty previous snapshot treats everything occupied as started', () => {
    const d = diffOccupancy([], ['x', 'R', 'D']);
    assert.deepEqual(d, { ended: [], started: [1, 2] });
});

test('format and count', () => {
    assert.equal(formatOccupancy(['D', 'x', 'R']), 'D x R');
    assert.equal(occupiedCount(['D', 'x', 'R', 'x']), 2);
});
