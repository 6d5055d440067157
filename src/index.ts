// src/index.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import type { DefinitionDescription, DescriberConfig, SwaggerSpec } from './core/types.js';
import { SwaggerParser } from './core/parser.js';
import { describeDefinitions } from './core/describer.js';
import { isUrl } from './core/utils.js';

export * from './core/types.js';
export * from './core/utils.js';
export * from './core/document/index.js';
export { ConversionError } from './core/errors.js';
export { PropertyAdapter } from './core/adapter/property-adapter.js';
export { SwaggerParser } from './core/parser.js';
export { SpecLoader } from './core/parser/spec-loader.js';
export { ReferenceResolver } from './core/parser/reference-resolver.js';
export { SpecValidationError, validateSpec } from './core/validator.js';
export { describeDefinition, describeDefinitions, describeProperty } from './core/describer.js';

/**
 * For test environments, allows passing a pre-parsed OpenAPI specification object.
 */
export type TestDescriberConfig = {
    /** The pre-parsed OpenAPI specification object. */
    spec: SwaggerSpec;
}

/**
 * Serializes a describe report in the configured format.
 */
export function formatReport(definitions: DefinitionDescription[], format: DescriberConfig['format'] = 'json'): string {
    return format === 'yaml'
        ? yaml.dump({ definitions }, { indent: 2, skipInvalid: true, noRefs: true })
        : `${JSON.stringify({ definitions }, null, 2)}\n`;
}

/**
 * Loads the configured specification and describes its definitions.
 * @param config The describer configuration object.
 * @param testConfig Optional configuration for test environments to inject a pre-parsed spec. Nothing is written when given.
 * @returns The description of every definition.
 */
export async function describeFromConfig(
    config: DescriberConfig,
    testConfig?: TestDescriberConfig,
): Promise<DefinitionDescription[]> {
    const isTestEnv = !!testConfig;

    if (!isTestEnv) {
        console.error(`📡 Processing OpenAPI specification from ${isUrl(config.input) ? 'URL' : 'file'}: ${config.input}`);
    }

    const parser = testConfig
        ? new SwaggerParser(testConfig.spec, config)
        : await SwaggerParser.create(config.input, config);

    const definitions = describeDefinitions(parser, config.options);

    if (!isTestEnv && config.output) {
        fs.mkdirSync(path.dirname(config.output), { recursive: true });
        fs.writeFileSync(config.output, formatReport(definitions, config.format));
    }

    return definitions;
}
