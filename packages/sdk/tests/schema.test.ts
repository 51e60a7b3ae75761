import { z } from 'zod';
import { anyValue, describeValue, zodSchema } from '../src/schema';

describe('zodSchema', () => {
    const schema = zodSchema(z.object({ value: z.number(), label: z.string().min(3).optional() }));

    it('returns the parsed value on success', () => {
        expect(schema.validate({ value: 42 })).toEqual({ ok: true, value: { value: 42 } });
    });

    it('reports expected and received type for a wrong type', () => {
        const result = schema.validate({ value: 'forty-two' });
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.issues).toEqual([{ path: ['value'], expected: 'number', actual: 'string' }]);
    });

    it('reports a missing field as undefined', () => {
        const result = schema.validate({});
        if (result.ok) throw new Error('expected failure');
        expect(result.error.issues).toEqual([{ path: ['value'], expected: 'number', actual: 'undefined' }]);
    });

    it('uses the zod message for refinements', () => {
        const result = schema.validate({ value: 1, label: 'ab' });
        if (result.ok) throw new Error('expected failure');
        expect(result.error.issues).toEqual([
            { path: ['label'], expected: 'String must contain at least 3 character(s)', actual: 'string' },
        ]);
    });

    it('applies zod transforms to the value handed on', () => {
        const trimmed = zodSchema(z.object({ name: z.string().trim() }));
        expect(trimmed.validate({ name: '  orders ' })).toEqual({ ok: true, value: { name: 'orders' } });
    });
});

describe('anyValue', () => {
    it('accepts everything unchanged', () => {
        const value = { nested: [1, 2] };
        const result = anyValue().validate(value);
        expect(result.ok && result.value).toBe(value);
    });
});

describe('describeValue', () => {
    it('distinguishes null, arrays and dates from objects', () => {
        expect(describeValue(null)).toBe('null');
        expect(describeValue([])).toBe('array');
        expect(describeValue(new Date(0))).toBe('date');
        expect(describeValue({})).toBe('object');
        expect(describeValue(undefined)).toBe('undefined');
    });
});
