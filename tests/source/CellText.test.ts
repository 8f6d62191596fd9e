import { describe, it, expect } from 'vitest';
import { cleanCode, cleanProse, normalizeCellText } from '../../src/source/CellText.js';

// ============================================================================
// CellText Tests
// ============================================================================

describe('normalizeCellText()', () => {
    it('should collapse a broken pipe group', () => {
        expect(normalizeCellText('apiKey( \n | \n )userName')).toBe('apiKey(|)userName');
    });

    it('should join a colon pushed onto the next line', () => {
        expect(normalizeCellText('apiKey\n : refer apiKey parameter')).toBe('apiKey: refer apiKey parameter');
    });

    it('should merge doubled colons', () => {
        expect(normalizeCellText('userName: : provided')).toBe('userName: provided');
    });

    it('should drop lone bullet lines', () => {
        expect(normalizeCellText('first\n*\n  •  \nsecond')).toBe('first\nsecond');
    });

    it('should trim whitespace around line breaks and collapse runs', () => {
        expect(normalizeCellText('a  \n   b    c')).toBe('a\nb c');
    });

    it('should keep at most one blank line', () => {
        expect(normalizeCellText('a\r\n\r\n\r\n\r\nb')).toBe('a\n\nb');
    });

    it('should trim the result', () => {
        expect(normalizeCellText('\n  value \n')).toBe('value');
    });
});

describe('cleanProse()', () => {
    it('should flatten to one line', () => {
        expect(cleanProse('  Line one\n  line two  ')).toBe('Line one line two');
    });
});

describe('cleanCode()', () => {
    it('should drop outer blank lines and trailing spaces but keep indentation', () => {
        expect(cleanCode('\n\n  var a = 1;   \r\n  b();\n\n')).toBe('  var a = 1;\n  b();');
    });

    it('should return an empty string for blank input', () => {
        expect(cleanCode(' \n \n')).toBe('');
    });
});
