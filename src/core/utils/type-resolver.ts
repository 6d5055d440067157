import type { RefResolver, SchemaObject, TypeDescriptor } from '../types/index.js';
import { arrayType, basicType, enumType, mapType, objectType, refType } from '../types/index.js';
import { computeSimpleRef } from './ref.js';
import { getMapValueSchema, getSchemaKind, getTypeTag } from './schema-kind.js';
import { isNotBlank } from './string.js';

/**
 * Recursively resolves a schema node into a type descriptor.
 *
 * A `$ref` stops the recursion: the result only carries the simple name of the target and
 * the location returned by `refResolver`, which is called again on every resolution.
 * Arrays and maps that lack their item or value schema resolve to an untyped object
 * placeholder instead of failing.
 */
export function resolveType(schema: SchemaObject, refResolver: RefResolver): TypeDescriptor {
    const title = schema.title ?? null;

    switch (getSchemaKind(schema)) {
        case 'reference': {
            const simpleRef = computeSimpleRef(schema.$ref ?? '');
            return refType(refResolver(simpleRef) ?? null, objectType(simpleRef, null));
        }
        case 'array': {
            const items = schema.items;
            if (!items) {
                console.debug(`[TypeResolver] Array schema "${title ?? '<untitled>'}" has no items. Using an object placeholder.`);
                return arrayType(title, objectType(null, null));
            }
            return arrayType(title, resolveType(items, refResolver));
        }
        case 'map': {
            const valueSchema = getMapValueSchema(schema);
            if (!valueSchema) {
                console.debug(`[TypeResolver] Map schema "${title ?? '<untitled>'}" has no value schema. Using an object placeholder.`);
                return mapType(title, objectType(null, null));
            }
            return mapType(title, resolveType(valueSchema, refResolver));
        }
        case 'string': {
            if (schema.enum && schema.enum.length > 0) {
                return enumType(title, schema.enum.map(value => String(value)));
            }
            return isNotBlank(schema.format) ? basicType('string', title, schema.format) : basicType('string', title);
        }
        case 'object':
            return objectType(title, schema.properties ?? null);
        case 'primitive': {
            // integer, number, boolean, or whatever tag the document carries (including none)
            const tag = getTypeTag(schema);
            return isNotBlank(schema.format) ? basicType(tag, title, schema.format) : basicType(tag, title);
        }
    }
}
