/**
 * Maps the simple name of a referenced definition to the document it lives in.
 * Returns `undefined` when the definition is local or cannot be located.
 */
export type RefResolver = (simpleName: string) => string | undefined;

/** The part of the surrounding document the example synthesizer needs. */
export interface DocumentContext {
    /**
     * Renders a cross-reference to a definition.
     * @param target A `$ref` string or the simple name of the definition.
     * @param document The document holding the definition, when it is not the current one.
     */
    crossReference(target: string, document?: string | null): string;
}

/** The value tree a synthesized example is made of. */
export type SyntheticValue = string | number | boolean | null | SyntheticValue[] | { [key: string]: SyntheticValue };
