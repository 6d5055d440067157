import type { SchemaObject } from '../types/index.js';

/**
 * The structural kinds a schema node is classified into. Some nodes satisfy several
 * structural tests at once, so {@link getSchemaKind} checks them in a fixed order.
 */
export type SchemaKind = 'reference' | 'array' | 'map' | 'string' | 'object' | 'primitive';

/**
 * Returns the node's type tag. An OAS 3.1 tag list such as `["string", "null"]`
 * yields its first entry that is not `"null"`.
 */
export function getTypeTag(schema: SchemaObject): string | null {
    const { type } = schema;
    if (Array.isArray(type)) {
        return type.find(t => t !== 'null') ?? type[0] ?? null;
    }
    return typeof type === 'string' ? type : null;
}

export function isReferenceSchema(schema: SchemaObject): schema is SchemaObject & { $ref: string } {
    return typeof schema.$ref === 'string';
}

export function isArraySchema(schema: SchemaObject): boolean {
    const tag = getTypeTag(schema);
    return tag === 'array' || (tag === null && schema.items !== undefined);
}

/**
 * A map is an object keyed by arbitrary strings with one shared value schema.
 * `additionalProperties: true` is a map whose value schema is missing.
 */
export function isMapSchema(schema: SchemaObject): boolean {
    const tag = getTypeTag(schema);
    if (tag !== null && tag !== 'object') return false;
    if (schema.properties !== undefined) return false;
    const { additionalProperties } = schema;
    return additionalProperties === true || isSchemaObject(additionalProperties);
}

export function isObjectSchema(schema: SchemaObject): boolean {
    const tag = getTypeTag(schema);
    return tag === 'object' || (tag === null && schema.properties !== undefined);
}

/** Returns the value schema of a map node, if it has one. */
export function getMapValueSchema(schema: SchemaObject): SchemaObject | undefined {
    const { additionalProperties } = schema;
    return isSchemaObject(additionalProperties) ? additionalProperties : undefined;
}

export function getSchemaKind(schema: SchemaObject): SchemaKind {
    if (isReferenceSchema(schema)) return 'reference';
    if (isArraySchema(schema)) return 'array';
    if (isMapSchema(schema)) return 'map';
    if (getTypeTag(schema) === 'string') return 'string';
    if (isObjectSchema(schema)) return 'object';
    return 'primitive';
}

export function isSchemaObject(value: unknown): value is SchemaObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
