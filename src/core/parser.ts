/**
 * @fileoverview
 * This file contains the SwaggerParser class, a thin wrapper that gives the describer a stable view
 * over a loaded OpenAPI (3.x) or Swagger (2.x) document and the documents it references.
 */

import type { DescriberConfig, SchemaObject, SwaggerSpec } from './types/index.js';
import { validateSpec } from './validator.js';
import { SpecLoader } from './parser/spec-loader.js';
import { ReferenceResolver } from './parser/reference-resolver.js';

export interface NamedDefinition {
    name: string;
    definition: SchemaObject;
}

/**
 * A wrapper class for a raw OpenAPI/Swagger specification object.
 */
export class SwaggerParser {
    public readonly spec: SwaggerSpec;
    public readonly documentUri: string;
    public readonly schemas: NamedDefinition[];

    private readonly resolver: ReferenceResolver;

    public constructor(
        spec: SwaggerSpec,
        config?: Pick<DescriberConfig, 'validateInput'>,
        specCache?: Map<string, SwaggerSpec>,
        documentUri: string = 'file:///entry-spec.json',
    ) {
        validateSpec(spec);

        if (config?.validateInput && !config.validateInput(spec)) {
            throw new Error('Custom input validation failed.');
        }

        this.spec = spec;
        this.documentUri = documentUri;

        const cache = specCache ?? new Map<string, SwaggerSpec>([[documentUri, spec]]);
        if (!specCache && spec.$self) {
            const baseUri = new URL(spec.$self, documentUri).href;
            if (baseUri !== documentUri) {
                cache.set(baseUri, spec);
            }
        }

        this.resolver = new ReferenceResolver(cache, documentUri);
        this.schemas = Object.entries(this.getDefinitions()).map(([name, definition]) => ({ name, definition }));
    }

    static async create(inputPath: string, config?: Pick<DescriberConfig, 'validateInput'>): Promise<SwaggerParser> {
        const { entrySpec, cache, documentUri } = await SpecLoader.load(inputPath);
        return new SwaggerParser(entrySpec, config, cache, documentUri);
    }

    public getDefinitions(): Record<string, SchemaObject> {
        return this.spec.definitions || this.spec.components?.schemas || {};
    }

    public getDefinition(name: string): SchemaObject | undefined {
        return this.getDefinitions()[name];
    }

    public resolveReference(ref: string): SchemaObject | undefined {
        return this.resolver.resolveReference(ref);
    }

    public getSpecVersion(): { type: 'swagger' | 'openapi'; version: string } | null {
        if (this.spec.swagger) return { type: 'swagger', version: this.spec.swagger };
        if (this.spec.openapi) return { type: 'openapi', version: this.spec.openapi };
        return null;
    }
}
