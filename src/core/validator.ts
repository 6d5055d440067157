// src/core/validator.ts

import type { SwaggerSpec } from './types/index.js';
import { isSchemaObject } from './utils/schema-kind.js';

/**
 * Error thrown when the OpenAPI specification fails validation.
 */
export class SpecValidationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SpecValidationError';
    }
}

/**
 * Validates that a parsed object conforms to the basic structure of a Swagger 2.0 or OpenAPI 3.x specification.
 * Checks for:
 * - Valid version string ('swagger: "2.x"' or 'openapi: "3.x"')
 * - "info" object with "title" and "version"
 * - Definitions ('definitions' or 'components.schemas') that are objects
 *
 * Schema contents are not validated: the describer is permissive about imperfect schemas.
 *
 * @param spec The parsed specification object.
 * @throws {SpecValidationError} if the specification is invalid.
 */
export function validateSpec(spec: SwaggerSpec | null | undefined): asserts spec is SwaggerSpec {
    if (!spec) {
        throw new SpecValidationError('Specification cannot be null or undefined.');
    }

    const isSwag2 = typeof spec.swagger === 'string' && spec.swagger.startsWith('2.');
    const isOpenApi3 = typeof spec.openapi === 'string' && spec.openapi.startsWith('3.');

    if (!isSwag2 && !isOpenApi3) {
        throw new SpecValidationError(
            'Unsupported or missing OpenAPI/Swagger version. Specification must contain \'swagger: "2.x"\' or \'openapi: "3.x"\'.',
        );
    }

    if (!spec.info) {
        throw new SpecValidationError("Specification must contain an 'info' object.");
    }
    if (!spec.info.title || typeof spec.info.title !== 'string') {
        throw new SpecValidationError("Specification info object must contain a required string field: 'title'.");
    }
    if (!spec.info.version || typeof spec.info.version !== 'string') {
        throw new SpecValidationError("Specification info object must contain a required string field: 'version'.");
    }

    const definitions: Record<string, unknown> = spec.definitions ?? spec.components?.schemas ?? {};
    for (const [name, definition] of Object.entries(definitions)) {
        if (!isSchemaObject(definition)) {
            throw new SpecValidationError(`Definition "${name}" must be a schema object.`);
        }
    }
}
