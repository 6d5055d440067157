import type { DescriberOptions, DocumentContext } from '../types/index.js';
import { computeSimpleRef } from '../utils/ref.js';
import { kebabCase } from '../utils/string.js';

/**
 * Creates a document context that renders cross-references as markdown links
 * (`[Pet](#pet)`) or asciidoc cross references (`<<pet,Pet>>`).
 */
export function createDocumentContext(options: DescriberOptions = {}): DocumentContext {
    const markupLanguage = options.markupLanguage ?? 'markdown';
    const anchorPrefix = options.anchorPrefix ?? '';

    return {
        crossReference(target: string, document?: string | null): string {
            const name = computeSimpleRef(target);
            const anchor = `${anchorPrefix}${kebabCase(name)}`;

            if (markupLanguage === 'asciidoc') {
                return document ? `<<${document}#${anchor},${name}>>` : `<<${anchor},${name}>>`;
            }
            return `[${name}](${document ?? ''}#${anchor})`;
        },
    };
}
