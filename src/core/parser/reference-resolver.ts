import type { SchemaObject, SwaggerSpec } from '../types/index.js';
import { isSchemaObject } from '../utils/schema-kind.js';

interface RefObject {
    $ref: string;
}

const isRefObject = (obj: unknown): obj is RefObject =>
    typeof obj === 'object' && obj !== null && '$ref' in obj && typeof obj.$ref === 'string';

/**
 * Resolves `$ref` strings against a cache of loaded documents, keyed by document URI.
 */
export class ReferenceResolver {
    constructor(
        private specCache: Map<string, SwaggerSpec>,
        private entryDocumentUri: string,
    ) {}

    /**
     * Recursively finds all unique $ref string values.
     */
    public static findRefs(obj: unknown): string[] {
        const refs = new Set<string>();

        function traverse(current: unknown, visited: Set<object>) {
            if (!current || typeof current !== 'object' || visited.has(current)) return;
            visited.add(current);
            if (isRefObject(current)) refs.add(current.$ref);
            for (const value of Object.values(current)) {
                traverse(value, visited);
            }
        }

        traverse(obj, new Set());
        return Array.from(refs);
    }

    /**
     * Resolves a specific reference string.
     * @param ref The reference string (URI or fragment).
     * @param currentDocUri The URI of the document containing the reference.
     * @param visited The references followed so far, to stop on `$ref` chains that loop.
     */
    public resolveReference(
        ref: string,
        currentDocUri: string = this.entryDocumentUri,
        visited: Set<string> = new Set(),
    ): SchemaObject | undefined {
        const [filePath, jsonPointer] = ref.split('#', 2);
        const currentDocSpec = this.specCache.get(currentDocUri);
        const logicalBaseUri = currentDocSpec?.$self
            ? new URL(currentDocSpec.$self, currentDocUri).href
            : currentDocUri;
        const targetUri = filePath ? new URL(filePath, logicalBaseUri).href : logicalBaseUri;

        const fullUriKey = jsonPointer ? `${targetUri}#${jsonPointer}` : targetUri;
        if (visited.has(fullUriKey)) {
            console.warn(`[Parser] Circular reference chain detected at "${ref}".`);
            return undefined;
        }

        const targetSpec = this.specCache.get(targetUri);
        if (!targetSpec) {
            if (filePath) {
                console.warn(`[Parser] Unresolved external file reference: ${targetUri}. File was not pre-loaded.`);
            }
            return undefined;
        }

        let result: unknown = targetSpec;
        if (jsonPointer) {
            const pointerParts = jsonPointer.split('/').filter(p => p !== '');
            for (const part of pointerParts) {
                const decodedPart = part.replace(/~1/g, '/').replace(/~0/g, '~');
                if (isSchemaObject(result) && Object.prototype.hasOwnProperty.call(result, decodedPart)) {
                    result = result[decodedPart];
                } else if (Array.isArray(result) && /^\d+$/.test(decodedPart) && Number(decodedPart) < result.length) {
                    result = result[Number(decodedPart)];
                } else {
                    console.warn(
                        `[Parser] Failed to resolve reference part "${decodedPart}" in path "${ref}" within file ${targetUri}`,
                    );
                    return undefined;
                }
            }
        }

        if (isRefObject(result)) {
            return this.resolveReference(result.$ref, targetUri, new Set([...visited, fullUriKey]));
        }

        return isSchemaObject(result) ? result : undefined;
    }
}
