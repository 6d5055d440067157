import type { SchemaObject } from './openapi.js';

/** A primitive scalar, e.g. `integer (int64)` or `string (date-time)`. */
export interface BasicType {
    kind: 'basic';
    /** The raw type tag. `null` when the node carried none. */
    name: string | null;
    title: string | null;
    format?: string;
}

export interface ArrayType {
    kind: 'array';
    title: string | null;
    itemType: TypeDescriptor;
}

/** A dictionary keyed by arbitrary strings. */
export interface MapType {
    kind: 'map';
    title: string | null;
    valueType: TypeDescriptor;
}

export interface EnumType {
    kind: 'enum';
    title: string | null;
    values: string[];
}

/**
 * A structured record. `properties` are the raw, unresolved schemas: resolving them
 * is left to whoever renders the object.
 */
export interface ObjectType {
    kind: 'object';
    title: string | null;
    properties: Record<string, SchemaObject> | null;
}

/**
 * A pointer to a named schema. The placeholder only carries the simple name of the
 * target, so a `$ref` always ends the resolution.
 */
export interface RefType {
    kind: 'ref';
    /** Where the referenced definition is documented, if not in the current document. */
    location: string | null;
    placeholder: ObjectType;
}

export type TypeDescriptor = BasicType | ArrayType | MapType | EnumType | ObjectType | RefType;

export type TypeDescriptorKind = TypeDescriptor['kind'];

export function basicType(name: string | null, title: string | null, format?: string): BasicType {
    return format === undefined ? { kind: 'basic', name, title } : { kind: 'basic', name, title, format };
}

export function arrayType(title: string | null, itemType: TypeDescriptor): ArrayType {
    return { kind: 'array', title, itemType };
}

export function mapType(title: string | null, valueType: TypeDescriptor): MapType {
    return { kind: 'map', title, valueType };
}

export function enumType(title: string | null, values: string[]): EnumType {
    return { kind: 'enum', title, values };
}

export function objectType(title: string | null, properties: Record<string, SchemaObject> | null): ObjectType {
    return { kind: 'object', title, properties };
}

export function refType(location: string | null, placeholder: ObjectType): RefType {
    return { kind: 'ref', location, placeholder };
}
