import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { describeFromConfig, formatReport } from '@src/index.js';
import type { DescriberConfig } from '@src/core/types.js';
import { bookstoreSwagger2 } from '../shared/specs.js';

const fixturePath = fileURLToPath(new URL('../fixtures/petshop.yaml', import.meta.url));

describe('E2E: describeFromConfig', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should describe an in-memory spec without logging', async () => {
        const config: DescriberConfig = { input: 'in-memory', options: { generateMissingExamples: true } };
        const definitions = await describeFromConfig(config, { spec: bookstoreSwagger2 });

        expect(definitions.map(d => d.name)).toEqual(['Book', 'Author']);
        expect(definitions[1].properties[1].example).toEqual(['[Book](#book)']);
        expect(console.error).not.toHaveBeenCalled();
    });

    it('should load a YAML file with external references', async () => {
        const config: DescriberConfig = { input: fixturePath, options: { markupLanguage: 'asciidoc' } };
        const [pet, litter] = await describeFromConfig(config);

        expect(pet.properties.map(p => [p.name, p.displayType])).toEqual([
            ['name', 'string'],
            ['category', '<<category,Category>>'],
            ['weight', 'number'],
        ]);
        expect(pet.properties[2].constraints).toEqual({ maximum: '80.5', exclusiveMaximum: true });
        expect(litter.properties.map(p => [p.name, p.required])).toEqual([
            ['label', true],
            ['size', false],
        ]);
        expect(console.error).toHaveBeenCalledWith(`📡 Processing OpenAPI specification from file: ${fixturePath}`);
    });

    it('should run the custom input validation', async () => {
        const config: DescriberConfig = { input: 'in-memory', validateInput: () => false, options: {} };
        await expect(describeFromConfig(config, { spec: bookstoreSwagger2 })).rejects.toThrow('Custom input validation failed.');
    });
});

describe('E2E: formatReport', () => {
    const definitions = [
        {
            name: 'Tag',
            properties: [
                {
                    name: 'label',
                    type: { kind: 'basic' as const, name: 'string', title: null },
                    displayType: 'string',
                    required: true,
                    readOnly: false,
                    constraints: {},
                },
            ],
        },
    ];

    it('should format JSON by default', () => {
        const report = formatReport(definitions);
        expect(report.endsWith('}\n')).toBe(true);
        expect(JSON.parse(report)).toEqual({ definitions });
    });

    it('should format YAML', () => {
        const report = formatReport(definitions, 'yaml');
        expect(report.startsWith('definitions:\n  - name: Tag\n')).toBe(true);
        expect(yaml.load(report)).toEqual({ definitions });
    });
});
