import type { DocumentContext, SchemaObject, SyntheticValue } from '../types/index.js';
import { ConversionError } from '../errors.js';
import { getMapValueSchema, getSchemaKind, getTypeTag, isArraySchema } from './schema-kind.js';

/** Stands in for an item or value schema the document left out. */
const MISSING_SCHEMA_PLACEHOLDER = 'object';

const INTEGER_LITERAL = /^[+-]?\d+$/;
const NUMBER_LITERAL = /^[+-]?(NaN|Infinity|(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?)$/;

export type ConvertedValue = string | number | boolean | null;

/**
 * Returns the example to display for a schema node.
 *
 * An explicit `example` always wins. For maps, the value schema's own example comes next.
 * Otherwise, a canonical stand-in is generated when `generateMissing` is set: maps get a
 * single `"string"` key, arrays a single item.
 *
 * @returns The example, or `undefined` when there is none.
 */
export function getExample(schema: SchemaObject, generateMissing: boolean, docContext: DocumentContext): unknown {
    if (hasExample(schema)) {
        return schema.example;
    }

    const kind = getSchemaKind(schema);
    if (kind === 'map') {
        const valueSchema = getMapValueSchema(schema);
        if (valueSchema && hasExample(valueSchema)) {
            return valueSchema.example;
        }
        if (generateMissing) {
            return { string: generateExample(valueSchema, docContext) };
        }
    } else if (kind === 'array') {
        if (generateMissing) {
            return [generateExample(schema.items, docContext)];
        }
    } else if (generateMissing) {
        return generateExample(schema, docContext);
    }

    return undefined;
}

/**
 * Generates a canonical placeholder value for a schema node. Never throws: anything
 * unrecognized falls back to its type tag.
 */
export function generateExample(schema: SchemaObject | undefined, docContext: DocumentContext): SyntheticValue {
    if (!schema) {
        return MISSING_SCHEMA_PLACEHOLDER;
    }
    if (typeof schema.$ref === 'string') {
        return docContext.crossReference(schema.$ref);
    }
    if (isArraySchema(schema)) {
        return [generateExample(schema.items, docContext)];
    }

    const tag = getTypeTag(schema);
    switch (tag) {
        case 'integer':
            return 0;
        case 'number':
            return 0.0;
        case 'boolean':
            return true;
        case 'string':
            return 'string';
        default:
            return tag;
    }
}

/**
 * Converts a textual example to the type it is declared with.
 * @throws {ConversionError} if the text is not a valid `integer` or `number` literal.
 */
export function convertExample(value: string | null | undefined, type: string | null | undefined): ConvertedValue {
    if (value === null || value === undefined) {
        return null;
    }

    switch (type) {
        case 'integer': {
            const parsed = Number(value);
            if (!INTEGER_LITERAL.test(value) || !Number.isSafeInteger(parsed)) {
                throw new ConversionError(value, type);
            }
            return parsed;
        }
        case 'number': {
            const trimmed = value.trim();
            if (!NUMBER_LITERAL.test(trimmed)) {
                throw new ConversionError(value, type);
            }
            return Number(trimmed);
        }
        case 'boolean':
            return value.toLowerCase() === 'true';
        default:
            return value;
    }
}

function hasExample(schema: SchemaObject): boolean {
    return schema.example !== undefined && schema.example !== null;
}
