import type { DocumentContext, RefResolver, SchemaObject, SyntheticValue, TypeDescriptor } from '../types/index.js';
import { type Decimal, toDecimal } from '../utils/decimal.js';
import { convertExample, type ConvertedValue, generateExample, getExample } from '../utils/example-generator.js';
import { resolveType } from '../utils/type-resolver.js';

/**
 * Read-only view over a single schema node ("property") of an OpenAPI/Swagger document.
 * Every query is computed fresh from the node; nothing is cached between calls.
 */
export class PropertyAdapter {
    private readonly property: SchemaObject;

    public constructor(property: SchemaObject) {
        if (property === null || property === undefined) {
            throw new TypeError('property must not be null');
        }
        this.property = property;
    }

    /**
     * Generates a default example value for a schema node.
     */
    public static generateExample(property: SchemaObject, docContext: DocumentContext): SyntheticValue {
        return generateExample(property, docContext);
    }

    /**
     * Converts a textual example to the given type tag.
     * @throws {ConversionError} if the text is not a valid `integer` or `number` literal.
     */
    public static convertExample(value: string | null | undefined, type: string | null | undefined): ConvertedValue {
        return convertExample(value, type);
    }

    /**
     * Resolves the type of the property.
     * @param refResolver Locates the document of referenced definitions.
     */
    public getType(refResolver: RefResolver): TypeDescriptor {
        return resolveType(this.property, refResolver);
    }

    /**
     * Returns the example to display for the property.
     * @param generateMissingExamples If true, a stand-in is generated when the document has none.
     * @returns The example, or `undefined` when there is none.
     */
    public getExample(generateMissingExamples: boolean, docContext: DocumentContext): unknown {
        return getExample(this.property, generateMissingExamples, docContext);
    }

    public getDefaultValue(): unknown {
        return this.property.default ?? undefined;
    }

    public getMinLength(): number | undefined {
        return this.property.minLength ?? undefined;
    }

    public getMaxLength(): number | undefined {
        return this.property.maxLength ?? undefined;
    }

    public getPattern(): string | undefined {
        return this.property.pattern ?? undefined;
    }

    /** The inclusive or exclusive lower bound, as exact decimal text. */
    public getMin(): Decimal | undefined {
        const { minimum, exclusiveMinimum } = this.property;
        return typeof exclusiveMinimum === 'number' ? toDecimal(exclusiveMinimum) : toDecimal(minimum);
    }

    public getExclusiveMin(): boolean {
        const { exclusiveMinimum } = this.property;
        return exclusiveMinimum === true || typeof exclusiveMinimum === 'number';
    }

    /** The inclusive or exclusive upper bound, as exact decimal text. */
    public getMax(): Decimal | undefined {
        const { maximum, exclusiveMaximum } = this.property;
        return typeof exclusiveMaximum === 'number' ? toDecimal(exclusiveMaximum) : toDecimal(maximum);
    }

    public getExclusiveMax(): boolean {
        const { exclusiveMaximum } = this.property;
        return exclusiveMaximum === true || typeof exclusiveMaximum === 'number';
    }

    public getReadOnly(): boolean {
        return this.property.readOnly === true;
    }
}
