import { PropertyAdapter } from './adapter/property-adapter.js';
import { createDefinitionDocumentResolver } from './document/definition-resolver.js';
import { createDocumentContext } from './document/document-context.js';
import type { SwaggerParser } from './parser.js';
import type {
    DefinitionDescription,
    DescriberOptions,
    DocumentContext,
    PropertyConstraints,
    PropertyDescription,
    RefResolver,
    SchemaObject,
} from './types/index.js';
import { isSchemaObject } from './utils/schema-kind.js';
import { displayType } from './utils/type-display.js';

interface CollectedProperties {
    properties: Map<string, SchemaObject>;
    required: Set<string>;
}

/**
 * Describes every definition of the document as a property table.
 */
export function describeDefinitions(parser: SwaggerParser, options: DescriberOptions = {}): DefinitionDescription[] {
    const refResolver = createDefinitionDocumentResolver(options);
    const docContext = createDocumentContext(options);

    return parser.schemas.map(({ name, definition }) =>
        describeDefinition(parser, name, definition, refResolver, docContext, options.generateMissingExamples ?? false),
    );
}

export function describeDefinition(
    parser: SwaggerParser,
    name: string,
    definition: SchemaObject,
    refResolver: RefResolver,
    docContext: DocumentContext,
    generateMissingExamples: boolean,
): DefinitionDescription {
    const { properties, required } = collectProperties(parser, name, definition);

    const description: DefinitionDescription = {
        name,
        properties: Array.from(properties, ([propertyName, property]) =>
            describeProperty(propertyName, property, required.has(propertyName), refResolver, docContext, generateMissingExamples),
        ),
    };
    if (definition.title !== undefined) description.title = definition.title;
    if (definition.description !== undefined) description.description = definition.description;
    return description;
}

export function describeProperty(
    name: string,
    property: SchemaObject,
    required: boolean,
    refResolver: RefResolver,
    docContext: DocumentContext,
    generateMissingExamples: boolean,
): PropertyDescription {
    const adapter = new PropertyAdapter(property);
    const type = adapter.getType(refResolver);

    const row: PropertyDescription = {
        name,
        type,
        displayType: displayType(type, docContext),
        required,
        readOnly: adapter.getReadOnly(),
        constraints: collectConstraints(adapter),
    };

    if (property.description !== undefined) row.description = property.description;

    const example = adapter.getExample(generateMissingExamples, docContext);
    if (example !== undefined) row.example = example;

    const defaultValue = adapter.getDefaultValue();
    if (defaultValue !== undefined) row.default = defaultValue;

    return row;
}

function collectConstraints(adapter: PropertyAdapter): PropertyConstraints {
    const constraints: PropertyConstraints = {};

    const minLength = adapter.getMinLength();
    if (minLength !== undefined) constraints.minLength = minLength;

    const maxLength = adapter.getMaxLength();
    if (maxLength !== undefined) constraints.maxLength = maxLength;

    const pattern = adapter.getPattern();
    if (pattern !== undefined) constraints.pattern = pattern;

    const minimum = adapter.getMin();
    if (minimum !== undefined) {
        constraints.minimum = minimum;
        constraints.exclusiveMinimum = adapter.getExclusiveMin();
    }

    const maximum = adapter.getMax();
    if (maximum !== undefined) {
        constraints.maximum = maximum;
        constraints.exclusiveMaximum = adapter.getExclusiveMax();
    }

    return constraints;
}

/**
 * Collects the properties of a definition, flattening `allOf` members in order before the
 * definition's own properties. Members are flattened recursively, so inherited properties of
 * a composed member are kept. A later property replaces an earlier one of the same name.
 */
function collectProperties(parser: SwaggerParser, name: string, definition: SchemaObject): CollectedProperties {
    const collected: CollectedProperties = { properties: new Map(), required: new Set() };
    collectInto(parser, name, definition, collected, new Set());
    return collected;
}

function collectInto(
    parser: SwaggerParser,
    name: string,
    schema: SchemaObject,
    collected: CollectedProperties,
    visitedRefs: Set<string>,
): void {
    const members = Array.isArray(schema.allOf) ? schema.allOf : [];

    for (const member of members) {
        if (!isSchemaObject(member)) continue;

        if (typeof member.$ref !== 'string') {
            collectInto(parser, name, member, collected, visitedRefs);
            continue;
        }
        if (visitedRefs.has(member.$ref)) {
            console.warn(`[Describer] Skipping circular allOf member "${member.$ref}" of "${name}".`);
            continue;
        }
        const resolved = parser.resolveReference(member.$ref);
        if (!resolved) {
            console.warn(`[Describer] Skipping unresolved allOf member "${member.$ref}" of "${name}".`);
            continue;
        }
        collectInto(parser, name, resolved, collected, new Set([...visitedRefs, member.$ref]));
    }

    mergeProperties(collected, schema);
}

function mergeProperties(target: CollectedProperties, schema: SchemaObject): void {
    const { properties } = schema;
    if (typeof properties === 'object' && properties !== null) {
        for (const [propertyName, property] of Object.entries(properties)) {
            target.properties.set(propertyName, property);
        }
    }
    if (Array.isArray(schema.required)) {
        for (const requiredName of schema.required) {
            if (typeof requiredName === 'string') target.required.add(requiredName);
        }
    }
}
