import test from 'node:test';
import assert from 'node:assert/strict';

import { JsonSchema, SchemaValidator, describeErrors, isRecord } from '../src/schema_validator';

const TARGET: JsonSchema = {
    type: 'object',
    required: ['url'],
    properties: {
        url: { type: 'string', pattern: '^https?://' },
        service: { type: ['string', 'null'], enum: ['discord', 'default'] },
        retries: { type: 'integer', minimum: 0, maximum: 5 },
        events: { type: 'array', items: { type: 'string' }, minItems: 1 },
    },
};

function validator(): SchemaValidator {
    const v = new SchemaValidator();
    v.registerSchema('target', TARGET);
    return v;
}

test('valid payload passes', () => {
    const r = validator().validate({ url: 'https://example.test/hook', service: null, retries: 2, events: ['start'] }, 'target');
    assert.deepEqual(r, { valid: true, errors: [] });
});

test('missing required field and wrong nested types are reported with paths', () => {
    const r = validator().validate({ retries: 1.5, events: ['start', 3] }, 'target');
    assert.equal(r.valid, false);
    assert.deepEqual(describeErrors(r), [
        '.url: Required field missing',
        '.retries: Expected type integer, got number',
        '.events[1]: Expected type string, got integer',
    ]);
});

test('enum, pattern, bounds and minItems', () => {
    const r = validator().validate({ url: 'ftp://x', service: 'email', retries: 9, events: [] }, 'target');
    assert.deepEqual(describeErrors(r), [
        '.url: Value does not match pattern: ^https?://',
        '.service: Value must be one of: discord, default',
        '.retries: Value 9 > maximum 5',
        '.events: Expected at least 1 items, got 0',
    ]);
});

test('unknown schema id is an error, not a pass', () => {
    const r = new SchemaValidator().validate({}, 'nope');
    assert.deepEqual(describeErrors(r), ['<root>: Schema not found: nope']);
});

test('non-finite numbers are rejected', () => {
    const v = new SchemaValidator();
    v.registerSchema('n', { type: 'number' });
    assert.equal(v.validate(Number.NaN, 'n').valid, false);
    assert.equal(v.validate(2.5, 'n').valid, true);
});

test('isRecord excludes arrays and null', () => {
    assert.equal(isRecord({}), true);
    assert.equal(isRecord([]), false);
    assert.equal(isRecord(null), false);
});
