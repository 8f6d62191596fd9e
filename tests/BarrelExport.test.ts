import { describe, it, expect } from 'vitest';

// ============================================================================
// Barrel Export Verification
// Ensures all public API exports are accessible from the package entry point
// ============================================================================

describe('Barrel Export (src/index.ts)', () => {
    it('should export the pipeline entry points', async () => {
        const mod = await import('../src/index.js');

        expect(mod.parseSourceDocument).toBeTypeOf('function');
        expect(mod.buildDocument).toBeTypeOf('function');
        expect(mod.documentToValue).toBeTypeOf('function');
        expect(mod.generate).toBeTypeOf('function');
        expect(mod.renderDocument).toBeTypeOf('function');
        expect(mod.formatForPath).toBeTypeOf('function');
    });

    it('should export the serializers and the value model', async () => {
        const mod = await import('../src/index.js');

        expect(mod.emitYaml).toBeTypeOf('function');
        expect(mod.emitJson).toBeTypeOf('function');
        expect(mod.formatScalar).toBeTypeOf('function');
        expect(mod.formatKey).toBeTypeOf('function');
        expect(mod.toValue).toBeTypeOf('function');
        expect(mod.fromValue).toBeTypeOf('function');
        expect(mod.NULL).toEqual({ kind: 'null' });
    });

    it('should export the extractors and schema builders', async () => {
        const mod = await import('../src/index.js');

        expect(mod.extractEnumFromRemarks).toBeTypeOf('function');
        expect(mod.extractEnumFromValueMap).toBeTypeOf('function');
        expect(mod.guessStringEnum).toBeTypeOf('function');
        expect(mod.mapDataType).toBeTypeOf('function');
        expect(mod.FIELD_OVERRIDES.has('mode')).toBe(true);
        expect(mod.buildInitOptionsSchema).toBeTypeOf('function');
        expect(mod.buildResultSchema).toBeTypeOf('function');
        expect(mod.buildErrorCodeSchema).toBeTypeOf('function');
        expect(mod.schemaToValue).toBeTypeOf('function');
    });

    it('should export config, source and markdown helpers', async () => {
        const mod = await import('../src/index.js');

        expect(mod.DEFAULT_CONFIG.schemaPrefix).toBe('ZpPayment');
        expect(mod.loadConfig).toBeTypeOf('function');
        expect(mod.normalizeDocument).toBeTypeOf('function');
        expect(mod.normalizeCellText).toBeTypeOf('function');
        expect(mod.renderMarkdown).toBeTypeOf('function');
        expect(mod.createDebugObserver).toBeTypeOf('function');
    });

    it('should export the error classes', async () => {
        const mod = await import('../src/index.js');

        expect(new mod.SerializerContractError('Bad node', [])).toBeInstanceOf(Error);
        expect(mod.ConfigValidationError.prototype).toBeInstanceOf(Error);
        expect(mod.SourceValidationError.prototype).toBeInstanceOf(Error);
    });
});
