#!/usr/bin/env node
import { Command, Option } from 'commander';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import { describeFromConfig, formatReport } from './index.js';
import type { DescriberConfig, DescriberOptions, MarkupLanguage } from './core/types.js';
import { isUrl } from './core/utils.js';

interface DescribeCommandOptions {
    config?: string;
    input?: string;
    output?: string;
    format?: 'json' | 'yaml';
    markup?: MarkupLanguage;
    generateMissingExamples?: boolean;
    interDocumentCrossReferences?: boolean;
    separatedDefinitions?: boolean;
    anchorPrefix?: string;
}

const packageJsonPath = new URL('../package.json', import.meta.url);
const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
const version =
    typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
        ? packageJson.version
        : '0.0.0';

async function loadConfigFile(configPath: string): Promise<Partial<DescriberConfig>> {
    const resolvedPath = path.resolve(process.cwd(), configPath);
    if (!fs.existsSync(resolvedPath)) {
        throw new Error(`Configuration file not found: ${resolvedPath}`);
    }

    let config: Partial<DescriberConfig>;
    try {
        const configModule: { default?: Partial<DescriberConfig>; config?: Partial<DescriberConfig> } =
            await import(pathToFileURL(resolvedPath).href);
        config = { ...(configModule.default ?? configModule.config ?? {}) };
    } catch (error) {
        throw new Error(`Failed to load configuration file: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
    }

    const configDir = path.dirname(resolvedPath);
    if (config.input && !isUrl(config.input) && !path.isAbsolute(config.input)) {
        config.input = path.resolve(configDir, config.input);
    }
    if (config.output && !path.isAbsolute(config.output)) {
        config.output = path.resolve(configDir, config.output);
    }
    return config;
}

async function runDescribe(options: DescribeCommandOptions): Promise<void> {
    const startTime = Date.now();
    try {
        let baseConfig: Partial<DescriberConfig> = {};
        if (options.config) {
            console.error(`📜 Loading configuration from: ${options.config}`);
            baseConfig = await loadConfigFile(options.config);
        }

        const cliOptions: DescriberOptions = {};
        if (options.markup !== undefined) cliOptions.markupLanguage = options.markup;
        if (options.generateMissingExamples !== undefined) cliOptions.generateMissingExamples = options.generateMissingExamples;
        if (options.interDocumentCrossReferences !== undefined) cliOptions.interDocumentCrossReferences = options.interDocumentCrossReferences;
        if (options.separatedDefinitions !== undefined) cliOptions.separatedDefinitions = options.separatedDefinitions;
        if (options.anchorPrefix !== undefined) cliOptions.anchorPrefix = options.anchorPrefix;

        const input = options.input ?? baseConfig.input;
        if (!input) {
            throw new Error('Input path or URL is required. Provide it via --input or a config file.');
        }

        const output = options.output ?? baseConfig.output;
        const finalConfig: DescriberConfig = {
            input,
            output: output ? path.resolve(process.cwd(), output) : undefined,
            format: options.format ?? baseConfig.format ?? 'json',
            validateInput: baseConfig.validateInput,
            options: {
                generateMissingExamples: false,
                markupLanguage: 'markdown',
                ...baseConfig.options,
                ...cliOptions,
            },
        };

        const definitions = await describeFromConfig(finalConfig);

        if (finalConfig.output) {
            console.error(`✅ Described ${definitions.length} definition(s) into ${finalConfig.output}`);
        } else {
            process.stdout.write(formatReport(definitions, finalConfig.format));
        }
    } catch (error) {
        console.error('❌ Describe failed:', error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    } finally {
        const duration = (Date.now() - startTime) / 1000;
        console.error(`⏱️  Duration: ${duration.toFixed(2)} seconds`);
    }
}

const program = new Command();
program
    .name('schema_typeshape')
    .description('Resolves OpenAPI/Swagger definitions into type descriptors and example values')
    .version(version);

program
    .command('describe')
    .description('Describe every definition of an OpenAPI specification as a property table')
    .option('-c, --config <path>', 'Path to a configuration file (e.g., schema-typeshape.config.js)')
    .option('-i, --input <path>', 'Path or URL to the OpenAPI spec (overrides config)')
    .option('-o, --output <path>', 'File the report is written to; stdout when omitted (overrides config)')
    .addOption(new Option('--format <format>', 'Report format').choices(['json', 'yaml']))
    .addOption(new Option('--markup <language>', 'Markup used for cross references').choices(['markdown', 'asciidoc']))
    .option('--generate-missing-examples', 'Generate stand-in examples for properties that have none')
    .option('--inter-document-cross-references', 'Point references at the definitions document')
    .option('--separated-definitions', 'Assume one document per definition')
    .option('--anchor-prefix <prefix>', 'Prefix prepended to definition anchors')
    .action(runDescribe);

await program.parseAsync(process.argv);
