import type { MarkupLanguage } from '../types/index.js';

const FILE_EXTENSIONS: Record<MarkupLanguage, string> = {
    markdown: '.md',
    asciidoc: '.adoc',
};

export function addFileExtension(fileName: string, markupLanguage: MarkupLanguage): string {
    return `${fileName}${FILE_EXTENSIONS[markupLanguage]}`;
}
