/**
 * Error thrown when a textual example cannot be converted to the type it is declared with.
 */
export class ConversionError extends Error {
    constructor(
        public readonly value: string,
        public readonly type: string,
        options?: { cause?: unknown },
    ) {
        super(`Value '${value}' cannot be converted to '${type}'`, options);
        this.name = 'ConversionError';
    }
}
