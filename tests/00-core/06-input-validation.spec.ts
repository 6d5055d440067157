import { describe, expect, it } from 'vitest';
import { SpecValidationError, validateSpec } from '@src/core/validator.js';
import type { SwaggerSpec } from '@src/core/types/index.js';
import { bookstoreOpenApi31, bookstoreSwagger2 } from '../shared/specs.js';

describe('Core: validateSpec', () => {
    const info = { title: 'T', version: '1' };

    it('should accept Swagger 2.0 and OpenAPI 3.x documents', () => {
        expect(() => validateSpec(bookstoreSwagger2)).not.toThrow();
        expect(() => validateSpec(bookstoreOpenApi31)).not.toThrow();
    });

    it('should reject a missing document', () => {
        expect(() => validateSpec(null)).toThrow(new SpecValidationError('Specification cannot be null or undefined.'));
    });

    it('should reject unknown versions', () => {
        expect(() => validateSpec({ swagger: '1.2', info })).toThrow(SpecValidationError);
        expect(() => validateSpec({ openapi: '4.0.0', info })).toThrow(/Unsupported or missing OpenAPI\/Swagger version/);
        expect(() => validateSpec({ info })).toThrow(SpecValidationError);
    });

    it('should require info title and version', () => {
        const noTitle: SwaggerSpec = { openapi: '3.0.0', info: { title: '', version: '1' } };
        const noVersion: SwaggerSpec = { openapi: '3.0.0', info: { title: 'T', version: '' } };

        expect(() => validateSpec(noTitle)).toThrow("Specification info object must contain a required string field: 'title'.");
        expect(() => validateSpec(noVersion)).toThrow("Specification info object must contain a required string field: 'version'.");
    });

    it('should reject definitions that are not schema objects', () => {
        const spec: SwaggerSpec = { swagger: '2.0', info, definitions: {} };
        Object.assign(spec.definitions ?? {}, { Broken: 'string' });

        expect(() => validateSpec(spec)).toThrow('Definition "Broken" must be a schema object.');
    });

    it('should name its errors', () => {
        try {
            validateSpec(undefined);
        } catch (error) {
            expect(error).toBeInstanceOf(SpecValidationError);
            expect(error instanceof Error && error.name).toBe('SpecValidationError');
        }
    });
});
