import type { DocumentContext, TypeDescriptor } from '../types/index.js';

/**
 * Renders a type descriptor as the one-line label of a property table, e.g.
 * `< string > array`, `< string, integer (int32) > map` or `enum (available, sold)`.
 * References are rendered through the document context.
 */
export function displayType(type: TypeDescriptor, docContext: DocumentContext): string {
    switch (type.kind) {
        case 'basic':
            return type.format ? `${type.name ?? 'null'} (${type.format})` : `${type.name ?? 'null'}`;
        case 'array':
            return `< ${displayType(type.itemType, docContext)} > array`;
        case 'map':
            return `< string, ${displayType(type.valueType, docContext)} > map`;
        case 'enum':
            return `enum (${type.values.join(', ')})`;
        case 'object':
            return type.title ?? 'object';
        case 'ref':
            return docContext.crossReference(type.placeholder.title ?? '', type.location);
    }
}
