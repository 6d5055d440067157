import { afterEach, describe, expect, it, vi } from 'vitest';
import { PropertyAdapter } from '@src/core/adapter/property-adapter.js';
import { ConversionError } from '@src/core/errors.js';
import type { SchemaObject } from '@src/core/types/index.js';
import { plainDocContext } from '../shared/helpers.js';

describe('PropertyAdapter', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should fail at construction when the property is missing', () => {
        const missing: unknown = null;
        expect(() => new PropertyAdapter(missing as SchemaObject)).toThrow(new TypeError('property must not be null'));
    });

    describe('getType', () => {
        it('should resolve an object with its raw properties', () => {
            const properties: Record<string, SchemaObject> = { name: { type: 'string' }, age: { type: 'integer' } };
            const adapter = new PropertyAdapter({ type: 'object', title: 'Pet', properties });

            expect(adapter.getType(() => undefined)).toEqual({ kind: 'object', title: 'Pet', properties });
        });

        it('should resolve a reference through the given resolver', () => {
            const adapter = new PropertyAdapter({ $ref: '#/components/schemas/Pet' });

            expect(adapter.getType(name => (name === 'Pet' ? 'other-doc.md' : undefined))).toEqual({
                kind: 'ref',
                location: 'other-doc.md',
                placeholder: { kind: 'object', title: 'Pet', properties: null },
            });
        });
    });

    describe('getExample', () => {
        it('should prefer the explicit example', () => {
            const adapter = new PropertyAdapter({ type: 'string', example: 'Dune' });
            expect(adapter.getExample(true, plainDocContext)).toBe('Dune');
        });

        it('should generate a map example when asked to', () => {
            const adapter = new PropertyAdapter({ type: 'object', additionalProperties: { type: 'boolean' } });
            expect(adapter.getExample(true, plainDocContext)).toEqual({ string: true });
            expect(adapter.getExample(false, plainDocContext)).toBeUndefined();
        });
    });

    describe('static helpers', () => {
        it('should generate examples', () => {
            expect(PropertyAdapter.generateExample({ type: 'array', items: { type: 'string' } }, plainDocContext)).toEqual(['string']);
        });

        it('should convert examples', () => {
            expect(PropertyAdapter.convertExample('12', 'integer')).toBe(12);
            expect(() => PropertyAdapter.convertExample('twelve', 'number')).toThrow(ConversionError);
        });
    });

    describe('accessors', () => {
        it('should return undefined or false for unset fields', () => {
            const adapter = new PropertyAdapter({ type: 'string' });

            expect(adapter.getDefaultValue()).toBeUndefined();
            expect(adapter.getMinLength()).toBeUndefined();
            expect(adapter.getMaxLength()).toBeUndefined();
            expect(adapter.getPattern()).toBeUndefined();
            expect(adapter.getMin()).toBeUndefined();
            expect(adapter.getMax()).toBeUndefined();
            expect(adapter.getExclusiveMin()).toBe(false);
            expect(adapter.getExclusiveMax()).toBe(false);
            expect(adapter.getReadOnly()).toBe(false);
        });

        it('should read string constraints and defaults', () => {
            const adapter = new PropertyAdapter({
                type: 'string',
                minLength: 2,
                maxLength: 64,
                pattern: '^[a-z]+$',
                default: 'abc',
                readOnly: true,
            });

            expect(adapter.getMinLength()).toBe(2);
            expect(adapter.getMaxLength()).toBe(64);
            expect(adapter.getPattern()).toBe('^[a-z]+$');
            expect(adapter.getDefaultValue()).toBe('abc');
            expect(adapter.getReadOnly()).toBe(true);
        });

        it('should keep falsy defaults', () => {
            expect(new PropertyAdapter({ type: 'boolean', default: false }).getDefaultValue()).toBe(false);
            expect(new PropertyAdapter({ type: 'integer', default: 0 }).getDefaultValue()).toBe(0);
        });

        it('should read numeric bounds as exact decimals with boolean exclusivity', () => {
            const adapter = new PropertyAdapter({
                type: 'number',
                minimum: 0.1,
                exclusiveMinimum: true,
                maximum: 1e21,
                exclusiveMaximum: false,
            });

            expect(adapter.getMin()).toBe('0.1');
            expect(adapter.getExclusiveMin()).toBe(true);
            expect(adapter.getMax()).toBe('1000000000000000000000');
            expect(adapter.getExclusiveMax()).toBe(false);
        });

        it('should read numeric exclusive bounds', () => {
            const adapter = new PropertyAdapter({ type: 'integer', minimum: -5, exclusiveMinimum: 0, exclusiveMaximum: 10 });

            expect(adapter.getMin()).toBe('0');
            expect(adapter.getExclusiveMin()).toBe(true);
            expect(adapter.getMax()).toBe('10');
            expect(adapter.getExclusiveMax()).toBe(true);
        });

        it('should accept decimal text bounds', () => {
            const adapter = new PropertyAdapter({ type: 'number', minimum: '0.30', maximum: 'high' });

            expect(adapter.getMin()).toBe('0.3');
            expect(adapter.getMax()).toBeUndefined();
        });
    });
});
