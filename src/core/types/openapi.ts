// ===================================================================================
// OpenAPI / Swagger Specification Types
// ===================================================================================

/** The primitive and structural type tags a schema node may carry. */
export type SchemaTypeName = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'file' | 'null';

export interface InfoObject {
    title: string;
    description?: string;
    version: string;

    [key: string]: unknown;
}

/**
 * A single schema node ("property") of an OpenAPI 3.x or Swagger 2.0 document.
 * Upstream documents are frequently imperfect, so `type` stays an open string
 * and unknown keys are tolerated.
 */
export interface SchemaObject {
    $ref?: string;
    type?: SchemaTypeName | string | (SchemaTypeName | string)[];
    title?: string;
    description?: string;
    format?: string;
    enum?: (string | number | boolean | null)[];
    items?: SchemaObject;
    additionalProperties?: SchemaObject | boolean;
    properties?: { [propertyName: string]: SchemaObject };
    required?: string[];
    allOf?: SchemaObject[];
    default?: unknown;
    example?: unknown;
    readOnly?: boolean;
    maxLength?: number;
    minLength?: number;
    pattern?: string;
    maximum?: number | string;
    /** `boolean` in Swagger 2.0 / OAS 3.0, the bound itself in OAS 3.1. */
    exclusiveMaximum?: boolean | number;
    minimum?: number | string;
    exclusiveMinimum?: boolean | number;

    [key: string]: unknown;
}

export interface SwaggerSpec {
    openapi?: string;
    swagger?: string;
    $self?: string;
    info: InfoObject;
    definitions?: { [definitionsName: string]: SchemaObject };
    components?: {
        schemas?: Record<string, SchemaObject>;

        [key: string]: unknown;
    };

    [key: string]: unknown;
}
