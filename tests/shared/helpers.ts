import type { DocumentContext, RefResolver } from '@src/core/types/index.js';

/** A reference resolver that treats every definition as local. */
export const localRefResolver: RefResolver = () => undefined;

/**
 * A document context that renders cross references as `xref:<target>`, so tests can assert
 * exactly which target was handed over.
 */
export const plainDocContext: DocumentContext = {
    crossReference: (target: string, document?: string | null) => (document ? `xref:${document}|${target}` : `xref:${target}`),
};
