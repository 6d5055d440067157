import type { DescriberOptions, RefResolver } from '../types/index.js';
import { kebabCase } from '../utils/string.js';
import { addFileExtension } from './markup.js';

/**
 * Creates the reference resolver used when definitions are documented apart from the
 * current document. With inter-document cross references disabled, every definition is
 * local and the resolver returns `undefined`.
 *
 * Example, with `interDocumentCrossReferencesPrefix: '../'`:
 * - "Pet" -> "../definitions.md"
 * - "Pet" -> "../definitions/pet.md" (with `separatedDefinitions`)
 */
export function createDefinitionDocumentResolver(options: DescriberOptions = {}): RefResolver {
    const markupLanguage = options.markupLanguage ?? 'markdown';
    const prefix = options.interDocumentCrossReferencesPrefix ?? '';

    return (definitionName: string): string | undefined => {
        if (!options.interDocumentCrossReferences) {
            return undefined;
        }
        if (options.separatedDefinitions) {
            const folder = options.definitionsFolder ?? 'definitions';
            return `${prefix}${folder}/${addFileExtension(kebabCase(definitionName), markupLanguage)}`;
        }
        return `${prefix}${addFileExtension(options.definitionsDocument ?? 'definitions', markupLanguage)}`;
    };
}
