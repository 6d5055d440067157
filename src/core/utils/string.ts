/**
 * Converts a string to kebab-case.
 */
export function kebabCase(str: string): string {
    if (!str) return '';
    return str
        .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

/**
 * Checks that a string has at least one non-whitespace character.
 */
export function isNotBlank(str: string | null | undefined): str is string {
    return typeof str === 'string' && str.trim().length > 0;
}

/**
 * Checks if a string is a valid URL.
 */
export function isUrl(input: string): boolean {
    try {
        new URL(input);
        return true;
    } catch {
        return false;
    }
}
