import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import yaml from 'js-yaml';

import type { SwaggerSpec } from '../types/index.js';
import { isUrl } from '../utils/string.js';
import { validateSpec } from '../validator.js';
import { ReferenceResolver } from './reference-resolver.js';

export interface LoadedSpec {
    entrySpec: SwaggerSpec;
    cache: Map<string, SwaggerSpec>;
    documentUri: string;
}

export class SpecLoader {
    /**
     * Asynchronously loads an OpenAPI specification and every document it references.
     * @returns A map cache of all loaded specifications and the entry document URI.
     */
    public static async load(inputPath: string): Promise<LoadedSpec> {
        const documentUri = isUrl(inputPath)
            ? inputPath
            : pathToFileURL(path.resolve(process.cwd(), inputPath)).href;

        const cache = new Map<string, SwaggerSpec>();
        await this.loadAndCacheSpecRecursive(documentUri, cache, new Set<string>());

        const entrySpec = cache.get(documentUri);
        validateSpec(entrySpec);

        return { entrySpec, cache, documentUri };
    }

    private static async loadAndCacheSpecRecursive(uri: string, cache: Map<string, SwaggerSpec>, visited: Set<string>): Promise<void> {
        if (visited.has(uri) || cache.has(uri)) return;
        visited.add(uri);

        const content = await this.loadContent(uri);
        const spec = this.parseSpecContent(content, uri);
        cache.set(uri, spec);

        const baseUri = spec.$self ? new URL(spec.$self, uri).href : uri;

        // Aliasing
        if (baseUri !== uri) {
            cache.set(baseUri, spec);
        }

        for (const ref of ReferenceResolver.findRefs(spec)) {
            const [filePath] = ref.split('#', 2);
            if (!filePath) continue;

            let nextUri: string;
            try {
                nextUri = new URL(filePath, baseUri).href;
            } catch {
                console.warn(`[SpecLoader] Failed to resolve referenced URI: ${filePath}. Skipping.`);
                continue;
            }
            await this.loadAndCacheSpecRecursive(nextUri, cache, visited);
        }
    }

    private static async loadContent(pathOrUrl: string): Promise<string> {
        try {
            if (isUrl(pathOrUrl) && !pathOrUrl.startsWith('file:')) {
                const response = await fetch(pathOrUrl);
                if (!response.ok) throw new Error(`Failed to fetch spec from ${pathOrUrl}: ${response.statusText}`);
                return await response.text();
            }
            const filePath = pathOrUrl.startsWith('file:') ? fileURLToPath(pathOrUrl) : pathOrUrl;
            if (!fs.existsSync(filePath)) throw new Error(`Input file not found at ${filePath}`);
            return fs.readFileSync(filePath, 'utf8');
        } catch (e) {
            const message = e instanceof Error ? e.message : String(e);
            throw new Error(`Failed to read content from "${pathOrUrl}": ${message}`, { cause: e });
        }
    }

    private static parseSpecContent(content: string, pathOrUrl: string): SwaggerSpec {
        let parsed: unknown;
        try {
            const extension = path.extname(new URL(pathOrUrl, 'file:///').pathname).toLowerCase();
            const trimmed = content.trim();
            const looksLikeYaml = !extension && (trimmed.startsWith('openapi:') || trimmed.startsWith('swagger:'));
            parsed = ['.yaml', '.yml'].includes(extension) || looksLikeYaml ? yaml.load(content) : JSON.parse(content);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new Error(`Failed to parse content from ${pathOrUrl}. Error: ${message}`, { cause: error });
        }
        if (!isSpecShaped(parsed)) {
            throw new Error(`Failed to parse content from ${pathOrUrl}. Error: document is not an object.`);
        }
        return parsed;
    }
}

function isSpecShaped(value: unknown): value is SwaggerSpec {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
