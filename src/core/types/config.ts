import type { SwaggerSpec } from './openapi.js';

export type MarkupLanguage = 'markdown' | 'asciidoc';

/** Options that customize how definitions are described. */
export interface DescriberOptions {
    /** If true, properties without an example get a generated stand-in value. Defaults to false. */
    generateMissingExamples?: boolean;
    /** The markup used for cross-reference links in examples and display types. Defaults to 'markdown'. */
    markupLanguage?: MarkupLanguage;
    /** Prepended to every definition anchor. */
    anchorPrefix?: string;
    /**
     * If true, references point at the document holding the definitions rather than
     * at an anchor in the current document.
     */
    interDocumentCrossReferences?: boolean;
    /** Prepended to every inter-document location, e.g. a relative folder. */
    interDocumentCrossReferencesPrefix?: string;
    /** If true, every definition is assumed to live in its own document under `definitionsFolder`. */
    separatedDefinitions?: boolean;
    /** @default 'definitions' */
    definitionsDocument?: string;
    /** @default 'definitions' */
    definitionsFolder?: string;
}

/** The main configuration object for a describe run. */
export interface DescriberConfig {
    /** The local file path or remote URL of the OpenAPI specification. */
    input: string;
    /** The file the report is written to. The report goes to stdout when unset. */
    output?: string;
    /** @default 'json' */
    format?: 'json' | 'yaml';
    /** An optional callback to validate the input specification before describing it. */
    validateInput?: (spec: SwaggerSpec) => boolean;
    options: DescriberOptions;
}
