import type { TypeDescriptor } from './descriptor.js';
import type { Decimal } from '../utils/decimal.js';

export interface PropertyConstraints {
    minLength?: number;
    maxLength?: number;
    pattern?: string;
    minimum?: Decimal;
    exclusiveMinimum?: boolean;
    maximum?: Decimal;
    exclusiveMaximum?: boolean;
}

/** One row of a definition's property table. */
export interface PropertyDescription {
    name: string;
    type: TypeDescriptor;
    displayType: string;
    required: boolean;
    readOnly: boolean;
    description?: string;
    example?: unknown;
    default?: unknown;
    constraints: PropertyConstraints;
}

export interface DefinitionDescription {
    name: string;
    title?: string;
    description?: string;
    properties: PropertyDescription[];
}
