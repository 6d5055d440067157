/**
 * Computes the simple name of a reference: the last segment of its JSON pointer.
 *
 * Example:
 * - "#/definitions/Pet" -> "Pet"
 * - "#/components/schemas/Pet" -> "Pet"
 * - "other.yaml#/definitions/Pet" -> "Pet"
 * - "Pet" -> "Pet"
 */
export function computeSimpleRef(ref: string): string {
    const hashIndex = ref.indexOf('#');
    const pointer = hashIndex >= 0 ? ref.slice(hashIndex + 1) : ref;
    const parts = pointer.split('/').filter(Boolean);
    const last = parts.length > 0 ? parts[parts.length - 1] : pointer;
    return last.replace(/~1/g, '/').replace(/~0/g, '~');
}

