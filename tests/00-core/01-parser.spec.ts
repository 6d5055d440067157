import { describe, expect, it, vi } from 'vitest';
import { SwaggerParser } from '@src/core/parser.js';
import { bookstoreOpenApi31, bookstoreSwagger2 } from '../shared/specs.js';

describe('Core: SwaggerParser', () => {
    it('should list Swagger 2.0 definitions in document order', () => {
        const parser = new SwaggerParser(bookstoreSwagger2);

        expect(parser.schemas.map(s => s.name)).toEqual(['Book', 'Author']);
        expect(parser.getDefinition('Author')?.required).toEqual(['name']);
        expect(parser.getSpecVersion()).toEqual({ type: 'swagger', version: '2.0' });
    });

    it('should list OpenAPI 3.x component schemas', () => {
        const parser = new SwaggerParser(bookstoreOpenApi31);

        expect(parser.schemas.map(s => s.name)).toEqual(['Entity', 'Magazine']);
        expect(parser.getSpecVersion()).toEqual({ type: 'openapi', version: '3.1.0' });
    });

    it('should resolve local references', () => {
        const parser = new SwaggerParser(bookstoreOpenApi31);
        expect(parser.resolveReference('#/components/schemas/Entity')?.required).toEqual(['id']);
    });

    it('should return no definitions for a document without any', () => {
        const parser = new SwaggerParser({ openapi: '3.0.0', info: { title: 'T', version: '1' } });
        expect(parser.schemas).toEqual([]);
        expect(parser.getDefinition('Pet')).toBeUndefined();
    });

    it('should run the custom input validation', () => {
        const validateInput = vi.fn().mockReturnValue(false);

        expect(() => new SwaggerParser(bookstoreSwagger2, { validateInput })).toThrow('Custom input validation failed.');
        expect(validateInput).toHaveBeenCalledWith(bookstoreSwagger2);
    });

    it('should resolve references against the $self alias', () => {
        const parser = new SwaggerParser(
            {
                openapi: '3.1.0',
                $self: 'https://example.com/api/spec.json',
                info: { title: 'T', version: '1' },
                components: { schemas: { Tag: { type: 'string' } } },
            },
            undefined,
            undefined,
            'file:///local/spec.json',
        );
        expect(parser.resolveReference('https://example.com/api/spec.json#/components/schemas/Tag')).toEqual({ type: 'string' });
    });
});
